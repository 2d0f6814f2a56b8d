/**
 * 🧮 線性代數核心
 *
 * 方陣求逆 (附條件數檢查) 與二次型 xᵀ A⁻¹ x
 * 求逆與奇異值分解委託 numeric.js
 */

import numeric from 'numeric';
import type { IDenseMatrix, IVector, Matrix } from '../../types/index';
import { DenseMatrix } from '../dense/matrix';
import { NumericalSafety } from '../numerical/safety';
import { InvalidInputError, SingularMatrixError } from '../../core/errors';

/**
 * 倒數條件數低於此值即視為計算上奇異
 */
export const SINGULARITY_THRESHOLD = Number.EPSILON;

/**
 * 由奇異值估計 2-範數倒數條件數 σ_min / σ_max
 *
 * 零矩陣返回 0。numeric.svd 迭代不收斂時拋出的是字符串，
 * 此時無法估計條件數，按奇異矩陣處理
 *
 * @throws SingularMatrixError 奇異值分解不收斂
 */
export function reciprocalCondition(matrix: IDenseMatrix, matrixName = 'matrix'): number {
  const rows: Matrix = matrix.toArray();
  let singularValues: number[];
  try {
    singularValues = numeric.svd(rows).S;
  } catch (error) {
    if (error instanceof Error) {
      throw error;
    }
    throw new SingularMatrixError(matrixName, 0);
  }

  let max = 0;
  let min = Number.POSITIVE_INFINITY;
  for (const sigma of singularValues) {
    const magnitude = Math.abs(sigma);
    max = Math.max(max, magnitude);
    min = Math.min(min, magnitude);
  }

  if (!Number.isFinite(max) || !Number.isFinite(min)) {
    return Number.NaN;
  }
  return max === 0 ? 0 : min / max;
}

/**
 * 方陣求逆
 *
 * @param matrix 待求逆方陣
 * @param matrixName 錯誤信息中使用的名稱
 * @throws InvalidInputError 非方陣或含非有限元素
 * @throws SingularMatrixError 倒數條件數不是有限值或低於 SINGULARITY_THRESHOLD
 */
export function invert(matrix: IDenseMatrix, matrixName = 'matrix'): DenseMatrix {
  if (!matrix.isSquare()) {
    throw new InvalidInputError(matrixName, `must be a square matrix, got ${matrix.rows}x${matrix.cols}`);
  }
  if (!matrix.toArray().every(row => row.every(value => Number.isFinite(value)))) {
    throw new InvalidInputError(matrixName, 'must contain only finite numbers');
  }

  const rcond = reciprocalCondition(matrix, matrixName);
  if (!Number.isFinite(rcond) || rcond < SINGULARITY_THRESHOLD) {
    throw new SingularMatrixError(matrixName, Number.isFinite(rcond) ? rcond : 0);
  }

  const inverse = DenseMatrix.from(numeric.inv(matrix.toArray()));
  if (!inverse.isFinite()) {
    throw new SingularMatrixError(matrixName, rcond);
  }

  return inverse;
}

/**
 * 二次型 xᵀ · inverse · x
 *
 * 逐項乘積以補償求和累加，減少病態矩陣下的消去誤差
 */
export function quadraticForm(x: IVector, inverse: IDenseMatrix): number {
  if (!inverse.isSquare() || inverse.rows !== x.size) {
    throw new InvalidInputError(
      'inverse',
      `must be a ${x.size}x${x.size} matrix, got ${inverse.rows}x${inverse.cols}`
    );
  }

  const terms: number[] = [];
  for (let i = 0; i < x.size; i++) {
    const xi = x.get(i);
    for (let j = 0; j < x.size; j++) {
      terms.push(xi * inverse.get(i, j) * x.get(j));
    }
  }

  return NumericalSafety.compensatedSum(terms);
}

/**
 * 平方 Mahalanobis 距離 xᵀ A⁻¹ x
 */
export function mahalanobis(x: IVector, matrix: IDenseMatrix, matrixName = 'matrix'): number {
  return quadraticForm(x, invert(matrix, matrixName));
}
