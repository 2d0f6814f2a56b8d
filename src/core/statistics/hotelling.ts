/**
 * 📊 Hotelling 兩樣本 T² 統計量 (小樣本)
 *
 * 參考批次與測試批次的溶出曲線以「單位 × 時間點」表格給出，
 * 返回邊界求解器與驗證器所需的統計參數。
 */

import type { HotellingT2Estimate, Matrix, ReadonlyMatrix } from '../../types/index';
import { Vector } from '../../math/dense/vector';
import { DenseMatrix } from '../../math/dense/matrix';
import { mahalanobis } from '../../math/linalg/kernel';
import { ProblemValidation } from '../../math/numerical/safety';
import { fCdf, fQuantile } from '../../math/special/distributions';
import { InvalidInputError } from '../errors';

function validateTable(table: ReadonlyMatrix, field: string): { rows: number; cols: number } {
  if (table.length === 0) {
    throw new InvalidInputError(field, 'must be a non-empty table of unit x time-point values');
  }

  const cols = table[0].length;
  table.forEach((row, i) => {
    ProblemValidation.requireVector(row, cols, `${field}[${i}]`);
  });

  return { rows: table.length, cols };
}

/**
 * 各列平均值
 */
export function columnMeans(table: ReadonlyMatrix): number[] {
  const cols = table[0].length;
  const means = new Array<number>(cols).fill(0);

  for (const row of table) {
    for (let j = 0; j < cols; j++) {
      means[j] += row[j];
    }
  }

  return means.map(sum => sum / table.length);
}

/**
 * 不偏樣本共變異數矩陣 (除以 n − 1)
 */
export function sampleCovariance(table: ReadonlyMatrix): Matrix {
  const n = table.length;
  if (n < 2) {
    throw new InvalidInputError('table', `needs at least two rows to estimate a covariance, got ${n}`);
  }

  const means = columnMeans(table);
  const p = means.length;
  const cov: Matrix = Array.from({ length: p }, () => new Array<number>(p).fill(0));

  for (const row of table) {
    for (let i = 0; i < p; i++) {
      const di = row[i] - means[i];
      for (let j = i; j < p; j++) {
        cov[i][j] += di * (row[j] - means[j]);
      }
    }
  }

  for (let i = 0; i < p; i++) {
    for (let j = i; j < p; j++) {
      cov[i][j] /= n - 1;
      cov[j][i] = cov[i][j];
    }
  }

  return cov;
}

/**
 * 🚀 兩樣本 Hotelling T² 估計
 *
 * @param reference 參考批次，每行一個單位，每列一個時間點
 * @param test 測試批次，列數須與參考批次相同
 * @param significance 顯著性水準 α，F.crit = F⁻¹(1 − α; df1, df2)
 */
export function estimateHotellingT2(
  reference: ReadonlyMatrix,
  test: ReadonlyMatrix,
  significance = 0.05
): HotellingT2Estimate {
  const { rows: n1, cols: p } = validateTable(reference, 'reference');
  const { rows: n2, cols: pTest } = validateTable(test, 'test');

  if (p !== pTest) {
    throw new InvalidInputError('test', `must have the same number of columns as reference (${p}), got ${pTest}`);
  }
  if (p < 2) {
    throw new InvalidInputError('reference', `must have at least two time-point columns, got ${p}`);
  }
  if (!(significance > 0 && significance < 1)) {
    throw new InvalidInputError('significance', `must lie in (0, 1): ${significance}`);
  }

  const df1 = p;
  const df2 = n1 + n2 - p - 1;
  if (df2 < 1) {
    throw new InvalidInputError('reference', `n1 + n2 - p - 1 must be positive, got ${df2}`);
  }

  const meanReference = columnMeans(reference);
  const meanTest = columnMeans(test);
  const meanDiff = meanTest.map((value, j) => value - meanReference[j]);

  const covReference = sampleCovariance(reference);
  const covTest = sampleCovariance(test);
  const sPool = covReference.map((row, i) =>
    row.map((value, j) => ((n1 - 1) * value + (n2 - 1) * covTest[i][j]) / (n1 + n2 - 2))
  );

  const d2 = mahalanobis(Vector.from(meanDiff), DenseMatrix.from(sPool), 'sPool');
  const k = (n1 * n2) / (n1 + n2);
  const K = (k * df2) / ((n1 + n2 - 2) * df1);
  const F = K * d2;

  return {
    parameters: {
      DM: Math.sqrt(d2),
      df1,
      df2,
      alpha: significance,
      K,
      k,
      T2: k * d2,
      F,
      fCrit: fQuantile(1 - significance, df1, df2),
      pF: 1 - fCdf(F, df1, df2)
    },
    sPool,
    covs: {
      reference: covReference,
      test: covTest
    },
    means: {
      reference: meanReference,
      test: meanTest,
      meanDiff
    }
  };
}
