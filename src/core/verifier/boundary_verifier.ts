/**
 * ✅ 邊界點位置檢查
 *
 * Newton-Raphson 的停止條件只看得分之和，求得的點不一定落在
 * 置信區域邊界上。此處在該點重新計算
 *
 *   kdvd = K · (t − m)ᵀ · S_pool⁻¹ · (t − m)
 *
 * 並將其與 F.crit 舍入到相同位數後比較。
 */

import type { BoundarySolution, BoundaryStatistics } from '../../types/index';
import { BoundaryStatus } from '../../types/index';
import { Vector } from '../../math/dense/vector';
import { DenseMatrix } from '../../math/dense/matrix';
import { invert, quadraticForm } from '../../math/linalg/kernel';
import { NumericalSafety, ProblemValidation } from '../../math/numerical/safety';
import type { ValidationFailure } from '../../math/numerical/safety';
import { MalformedHandoffError } from '../errors';

export interface VerifyOptions {
  /**
   * 比較時使用的小數位數
   *
   * 未給出時沿用求解結果的 tolerance，經 floor(tolerance + 0.5) 規整為位數
   */
  readonly digits?: number;
}

export interface BoundaryCheck {
  /** 在候選點重新計算的約束左側 */
  readonly kdvd: number;
  readonly criticalValue: number;
  readonly digits: number;
  readonly onBoundary: boolean;
}

const malformed: ValidationFailure = (field, detail) => new MalformedHandoffError(field, detail);

const BOUNDARY_STATUSES: readonly string[] = Object.values(BoundaryStatus);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * 檢查一個值是否具有求解結果的全部欄位
 */
export function isBoundarySolution(value: unknown): value is BoundarySolution {
  if (!isRecord(value)) return false;

  const status = value['onBoundary'];
  return (
    Array.isArray(value['point']) &&
    typeof value['converged'] === 'boolean' &&
    typeof status === 'string' &&
    BOUNDARY_STATUSES.includes(status) &&
    typeof value['iterationsUsed'] === 'number' &&
    typeof value['maxIterations'] === 'number' &&
    typeof value['tolerance'] === 'number'
  );
}

/**
 * 檢查一個值是否具有 Hotelling T² 統計參數中驗證所需的欄位
 */
export function isBoundaryStatistics(value: unknown): value is BoundaryStatistics {
  if (!isRecord(value)) return false;

  const parameters = value['parameters'];
  const means = value['means'];
  if (!isRecord(parameters) || !isRecord(means)) return false;

  return (
    typeof parameters['K'] === 'number' &&
    typeof parameters['df1'] === 'number' &&
    typeof parameters['fCrit'] === 'number' &&
    Array.isArray(value['sPool']) &&
    Array.isArray(means['meanDiff'])
  );
}

export class BoundaryVerifier {
  /**
   * 重新計算約束左側並判定點是否位於邊界
   *
   * @throws MalformedHandoffError 輸入缺少欄位或形狀錯誤 (在任何數值計算之前)
   * @throws SingularMatrixError S_pool 不可逆
   */
  check(solution: unknown, statistics: unknown, options: VerifyOptions = {}): BoundaryCheck {
    if (!isBoundarySolution(solution)) {
      throw new MalformedHandoffError('solution', 'must be a result returned by BoundarySolver.solve()');
    }
    if (!isBoundaryStatistics(statistics)) {
      throw new MalformedHandoffError('statistics', 'must be an estimate returned by estimateHotellingT2()');
    }

    const { parameters } = statistics;
    const df1 = ProblemValidation.requirePositiveInteger(parameters.df1, 'parameters.df1', malformed);
    const K = ProblemValidation.requireNonNegative(parameters.K, 'parameters.K', malformed);
    const fCrit = ProblemValidation.requireNonNegative(parameters.fCrit, 'parameters.fCrit', malformed);
    const sPool = ProblemValidation.requireSquareMatrix(statistics.sPool, df1, 'sPool', malformed);
    const meanDiff = ProblemValidation.requireVector(statistics.means.meanDiff, df1, 'means.meanDiff', malformed);

    if (solution.point.length < df1 + 1) {
      throw new MalformedHandoffError(
        'solution.point',
        `must have at least df1 + 1 = ${df1 + 1} entries, got ${solution.point.length}`
      );
    }
    const point = ProblemValidation.requireVector(solution.point, solution.point.length, 'solution.point', malformed);
    const tolerance = ProblemValidation.requireFinite(solution.tolerance, 'solution.tolerance', malformed);

    const digits = options.digits === undefined
      ? NumericalSafety.coerceDigits(tolerance)
      : NumericalSafety.coerceDigits(ProblemValidation.requireFinite(options.digits, 'digits', malformed));

    const diff = Vector.from(point.slice(0, df1)).minus(Vector.from(meanDiff));
    const kdvd = K * quadraticForm(diff, invert(DenseMatrix.from(sPool), 'sPool'));

    return {
      kdvd,
      criticalValue: fCrit,
      digits,
      onBoundary: NumericalSafety.roundDigits(kdvd, digits) === NumericalSafety.roundDigits(fCrit, digits)
    };
  }

  /**
   * 返回 onBoundary 已設定的求解結果，其餘欄位不變
   */
  verify(solution: BoundarySolution, statistics: BoundaryStatistics, options: VerifyOptions = {}): BoundarySolution {
    const { onBoundary } = this.check(solution, statistics, options);

    return Object.freeze({
      ...solution,
      onBoundary: onBoundary ? BoundaryStatus.OnBoundary : BoundaryStatus.OffBoundary
    });
  }
}
