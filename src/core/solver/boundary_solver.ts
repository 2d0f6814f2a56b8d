/**
 * 🎯 置信區域邊界求解器
 *
 * 以 Lagrange 乘數法將
 *
 *   極值化  tᵀ V⁻¹ t
 *   約束    F = k (t − m)ᵀ V⁻¹ (t − m)
 *
 * 的一階條件疊成 n + 1 維非線性方程組，再以多元 Newton-Raphson 求根。
 *
 *   得分   s = [ 2V⁻¹t − 2λk V⁻¹(t − m) ;  F − k (t − m)ᵀ V⁻¹ (t − m) ]
 *   Hessian H = [ 2V⁻¹ − 2λk V⁻¹ ,  −2k V⁻¹(t − m) ]
 *              [ −2k (t − m)ᵀ V⁻¹ ,  0              ]
 *   更新   (t, λ) ← (t, λ) − H⁻¹ s
 *
 * 停止條件為得分向量各分量之和的絕對值 |Σ s| < tolerance。
 * 分量之間可能相互抵消，因此收斂並不保證約束成立，
 * 求得的點須再經 BoundaryVerifier 檢查。
 */

import type { BoundaryProblem, BoundarySolution, SolverEvent } from '../../types/index';
import { BoundaryStatus, SolverEventType } from '../../types/index';
import { Vector } from '../../math/dense/vector';
import { DenseMatrix } from '../../math/dense/matrix';
import { invert, quadraticForm } from '../../math/linalg/kernel';
import { NumericalDiagnostics, ProblemValidation } from '../../math/numerical/safety';
import { NonConvergenceWarning, SingularMatrixError } from '../errors';

/**
 * 求解器配置參數
 */
export interface SolverConfig {
  readonly maxIterations: number;   // 問題未指定時的最大迭代次數
  readonly tolerance: number;       // 問題未指定時的收斂閾值
  readonly verboseLogging: boolean; // 逐次迭代日誌
  readonly onWarning: (warning: NonConvergenceWarning) => void;
}

/**
 * 經驗證的問題，所有欄位已轉為內部表示
 */
interface PreparedProblem {
  readonly dimension: number;
  readonly scale: number;
  readonly target: Vector;
  readonly covarianceInverse: DenseMatrix;
  readonly criticalValue: number;
  readonly maxIterations: number;
  readonly tolerance: number;
}

/**
 * 單步迭代狀態 (t, λ)
 */
interface IterationState {
  readonly point: Vector;
  readonly iteration: number;
}

interface StepResult {
  readonly next: IterationState;
  readonly scoreSum: number;
}

const defaultWarningHandler = (warning: NonConvergenceWarning): void => {
  NumericalDiagnostics.logNumericalWarning('BoundarySolver', 'solve', warning.message);
};

export class BoundarySolver {
  private readonly _config: SolverConfig;
  private _events: SolverEvent[] = [];

  constructor(config: Partial<SolverConfig> = {}) {
    this._config = {
      maxIterations: 100,
      tolerance: 1e-9,
      verboseLogging: false,
      onWarning: defaultWarningHandler,
      ...config
    };

    ProblemValidation.requirePositiveInteger(this._config.maxIterations, 'maxIterations');
    ProblemValidation.requireNonNegative(this._config.tolerance, 'tolerance');
  }

  get config(): SolverConfig {
    return this._config;
  }

  /**
   * 🚀 搜索約束面上的邊界點
   *
   * @throws InvalidInputError 問題欄位不合法
   * @throws SingularMatrixError 共變異數矩陣或某次迭代的 Hessian 不可逆
   */
  solve(problem: BoundaryProblem): BoundarySolution {
    this._events = [];
    const prepared = this._prepare(problem);

    let state: IterationState = {
      point: Vector.from(problem.initialGuess),
      iteration: 0
    };
    let scoreSum = Number.NaN;
    let criterionMet = false;

    while (!criterionMet) {
      const step = this._step(prepared, state);
      state = step.next;
      scoreSum = step.scoreSum;
      criterionMet = Math.abs(scoreSum) < prepared.tolerance;

      this._logEvent(
        SolverEventType.Iteration,
        state.iteration,
        scoreSum,
        `|sum(score)| = ${Math.abs(scoreSum).toExponential(4)}`
      );

      if (state.iteration >= prepared.maxIterations) break;
    }

    const converged = criterionMet && state.iteration < prepared.maxIterations;

    if (criterionMet) {
      this._logEvent(
        SolverEventType.Converged,
        state.iteration,
        scoreSum,
        `Newton-Raphson converged in ${state.iteration} iterations.`
      );
    } else {
      const warning = new NonConvergenceWarning(state.iteration, prepared.maxIterations, scoreSum);
      this._logEvent(SolverEventType.NotConverged, state.iteration, scoreSum, warning.message);
      this._config.onWarning(warning);
    }

    return Object.freeze({
      point: Object.freeze(state.point.toArray()),
      converged,
      onBoundary: BoundaryStatus.Unknown,
      iterationsUsed: state.iteration,
      maxIterations: prepared.maxIterations,
      tolerance: prepared.tolerance
    });
  }

  /**
   * 📊 上一次求解的迭代事件
   */
  getEvents(): readonly SolverEvent[] {
    return this._events;
  }

  /**
   * 一次 Newton 步：由 (t, λ) 計算新的 (t, λ)，不修改輸入狀態
   *
   * 返回的得分之和屬於更新前的迭代點
   */
  private _step(problem: PreparedProblem, state: IterationState): StepResult {
    const { dimension, scale, target, covarianceInverse, criticalValue } = problem;

    const t = state.point.slice(0, dimension);
    const lambda = state.point.get(dimension);
    const tDiff = t.minus(target);

    const vInvT = covarianceInverse.multiply(t);
    const vInvDiff = covarianceInverse.multiply(tDiff);

    // 一階偏導數
    const fDeriv1 = vInvT.scale(2).minus(vInvDiff.scale(2 * lambda * scale));
    const gDeriv1 = criticalValue - scale * quadraticForm(tDiff, covarianceInverse);
    const score = Vector.concat(fDeriv1, [gDeriv1]);

    // 二階偏導數 (加邊 Hessian)
    const fDeriv2 = covarianceInverse.scale(2 - 2 * lambda * scale);
    const gDeriv2 = vInvDiff.scale(-2 * scale);
    const hessian = DenseMatrix.bordered(fDeriv2, gDeriv2, 0);

    const hessianInverse = this._invertHessian(hessian, state.iteration + 1);
    const point = state.point.minus(hessianInverse.multiply(score));
    if (!point.isFinite()) {
      throw new SingularMatrixError('hessian', 0);
    }

    return {
      next: { point, iteration: state.iteration + 1 },
      scoreSum: score.sum()
    };
  }

  private _invertHessian(hessian: DenseMatrix, iteration: number): DenseMatrix {
    try {
      return invert(hessian, 'hessian');
    } catch (error) {
      if (error instanceof SingularMatrixError && this._config.verboseLogging) {
        NumericalDiagnostics.diagnoseMatrix(hessian, `hessian@${iteration}`);
        hessian.print();
      }
      throw error;
    }
  }

  /**
   * 驗證問題並預先求出 V⁻¹
   */
  private _prepare(problem: BoundaryProblem): PreparedProblem {
    const dimension = ProblemValidation.requirePositiveInteger(problem.dimension, 'dimension');
    const scale = ProblemValidation.requireNonNegative(problem.scale, 'scale');
    const target = ProblemValidation.requireVector(problem.target, dimension, 'target');
    const covariance = ProblemValidation.requireSquareMatrix(problem.covariance, dimension, 'covariance');
    const criticalValue = ProblemValidation.requireNonNegative(problem.criticalValue, 'criticalValue');
    ProblemValidation.requireVector(problem.initialGuess, dimension + 1, 'initialGuess');
    const maxIterations = ProblemValidation.requirePositiveInteger(
      problem.maxIterations ?? this._config.maxIterations,
      'maxIterations'
    );
    const tolerance = ProblemValidation.requireNonNegative(
      problem.tolerance ?? this._config.tolerance,
      'tolerance'
    );

    return {
      dimension,
      scale,
      target: Vector.from(target),
      covarianceInverse: invert(DenseMatrix.from(covariance), 'covariance'),
      criticalValue,
      maxIterations,
      tolerance
    };
  }

  private _logEvent(type: SolverEventType, iteration: number, scoreSum: number, description: string): void {
    this._events.push({ type, iteration, scoreSum, description });

    if (this._config.verboseLogging) {
      console.log(`[${type}] iter=${iteration}: ${description}`);
    }
  }
}
