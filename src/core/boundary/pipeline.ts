/**
 * 🔗 邊界搜索流程
 *
 * 由 Hotelling T² 估計構造求解問題，依次執行求解與位置檢查，
 * 並利用置信區域關於平均差的對稱性給出對側的邊界點
 */

import type {
  BoundaryProblem,
  BoundarySolution,
  HotellingT2Estimate,
  SolverEvent
} from '../../types/index';
import { ProblemValidation } from '../../math/numerical/safety';
import { InvalidInputError } from '../errors';
import { BoundarySolver } from '../solver/boundary_solver';
import type { SolverConfig } from '../solver/boundary_solver';
import { BoundaryVerifier } from '../verifier/boundary_verifier';
import type { VerifyOptions } from '../verifier/boundary_verifier';

export type ProblemOverrides = Partial<Pick<BoundaryProblem, 'initialGuess' | 'maxIterations' | 'tolerance'>>;

export interface LocateOptions extends ProblemOverrides {
  readonly solver?: Partial<SolverConfig>;
  readonly verify?: VerifyOptions;
}

export interface BoundaryLocation {
  /** 已檢查邊界歸屬的求解結果 */
  readonly solution: BoundarySolution;
  /** 對側邊界點 2m − t，最後一項為 2/K − λ */
  readonly opposite: readonly number[];
  readonly events: readonly SolverEvent[];
}

/**
 * 由估計構造問題：dimension = df1, scale = K, criticalValue = F.crit
 *
 * 未給出起始點時使用長度 df1 + 1 的全 1 向量
 */
export function createBoundaryProblem(
  estimate: HotellingT2Estimate,
  overrides: ProblemOverrides = {}
): BoundaryProblem {
  const { df1, K, fCrit } = estimate.parameters;

  return {
    dimension: df1,
    scale: K,
    target: estimate.means.meanDiff,
    covariance: estimate.sPool,
    criticalValue: fCrit,
    initialGuess: overrides.initialGuess ?? new Array<number>(df1 + 1).fill(1),
    maxIterations: overrides.maxIterations,
    tolerance: overrides.tolerance
  };
}

/**
 * 對側邊界點
 *
 * 駐點滿足 t = λk(t − m)，故鏡像點 2m − t 的乘數為 2/k − λ
 *
 * @param target 平均差 m
 * @param scale 二次型的縮放因子 k
 */
export function oppositePoint(
  solution: BoundarySolution,
  target: readonly number[],
  scale: number
): number[] {
  const dimension = target.length;
  const point = ProblemValidation.requireVector(solution.point, dimension + 1, 'solution.point');
  const k = ProblemValidation.requireNonNegative(scale, 'scale');
  if (k === 0) {
    throw new InvalidInputError('scale', 'must be positive to mirror the multiplier: 0');
  }

  const mirrored = target.map((m, i) => 2 * m - point[i]);
  mirrored.push(2 / k - point[dimension]);
  return mirrored;
}

/**
 * 求解並檢查邊界點
 */
export function locateBoundary(estimate: HotellingT2Estimate, options: LocateOptions = {}): BoundaryLocation {
  const solver = new BoundarySolver(options.solver);
  const verifier = new BoundaryVerifier();

  const problem = createBoundaryProblem(estimate, options);
  const solution = verifier.verify(solver.solve(problem), estimate, options.verify);

  return {
    solution,
    opposite: oppositePoint(solution, estimate.means.meanDiff, estimate.parameters.K),
    events: solver.getEvents()
  };
}
