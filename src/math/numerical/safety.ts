/**
 * 🔢 数值稳定性工具
 *
 * 提供数值检查、十进制舍入、输入验证与诊断日志
 */

import type { IDenseMatrix } from '../../types/index';
import { InvalidInputError } from '../../core/errors';

/**
 * 🔍 数值有效性检查
 */
export namespace NumericalSafety {

  /**
   * 检查数值是否有效（非 NaN 且有限）
   */
  export function isValidNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
  }

  /**
   * 补偿求和 (Neumaier)，用于二次型的累加
   */
  export function compensatedSum(values: Iterable<number>): number {
    let sum = 0;
    let compensation = 0;

    for (const value of values) {
      const t = sum + value;
      if (Math.abs(sum) >= Math.abs(value)) {
        compensation += (sum - t) + value;
      } else {
        compensation += (value - t) + sum;
      }
      sum = t;
    }

    return sum + compensation;
  }

  /**
   * 舍入到指定小数位数，digits 可为负数 (舍入到十位、百位...)
   *
   * 在相邻的两个候选值中取与 value 距离更近者，距离相等时取末位为偶数者；
   * 因此按 value 实际存储的二进制值舍入：2.675 → 2.67，0.15 → 0.1
   */
  export function roundDigits(value: number, digits: number): number {
    if (!isValidNumber(value) || value === 0) {
      return value;
    }
    if (value < 0) {
      return -roundDigits(-value, digits);
    }

    const factor = Math.pow(10, Math.abs(digits));
    const scaled = digits >= 0 ? value * factor : value / factor;
    if (!Number.isFinite(scaled) || factor === 0) {
      return value;
    }

    const unscale = (n: number): number => (digits >= 0 ? n / factor : n * factor);
    const lower = Math.floor(scaled);
    const down = unscale(lower);
    const up = unscale(Math.ceil(scaled));

    const distanceDown = value - down;
    const distanceUp = up - value;
    if (distanceUp < distanceDown || (distanceUp === distanceDown && lower % 2 === 1)) {
      return up;
    }
    return down;
  }

  /**
   * 将非整数的位数参数规整为整数位数：floor(digits + 0.5)
   *
   * 容差 1e-9 作为位数时对应 0 位小数
   */
  export function coerceDigits(digits: number): number {
    return Math.floor(digits + 0.5);
  }
}

/**
 * 验证失败时构造的错误
 */
export type ValidationFailure = (field: string, detail: string) => Error;

const invalidInput: ValidationFailure = (field, detail) => new InvalidInputError(field, detail);

/**
 * 🎯 问题参数验证工具
 */
export namespace ProblemValidation {

  export function requirePositiveInteger(value: unknown, field: string, fail: ValidationFailure = invalidInput): number {
    if (!NumericalSafety.isValidNumber(value) || !Number.isInteger(value) || value < 1) {
      throw fail(field, `must be a positive integer: ${String(value)}`);
    }
    return value;
  }

  export function requireNonNegative(value: unknown, field: string, fail: ValidationFailure = invalidInput): number {
    if (!NumericalSafety.isValidNumber(value) || value < 0) {
      throw fail(field, `must be a non-negative finite number: ${String(value)}`);
    }
    return value;
  }

  export function requireFinite(value: unknown, field: string, fail: ValidationFailure = invalidInput): number {
    if (!NumericalSafety.isValidNumber(value)) {
      throw fail(field, `must be a finite number: ${String(value)}`);
    }
    return value;
  }

  /**
   * 验证有限数值向量的长度
   */
  export function requireVector(
    value: unknown,
    length: number,
    field: string,
    fail: ValidationFailure = invalidInput
  ): readonly number[] {
    if (!Array.isArray(value)) {
      throw fail(field, `must be a numeric vector of length ${length}`);
    }
    if (value.length !== length) {
      throw fail(field, `must be a numeric vector of length ${length}, got length ${value.length}`);
    }

    const vector: number[] = [];
    value.forEach((entry: unknown, i) => {
      if (!NumericalSafety.isValidNumber(entry)) {
        throw fail(field, `must contain only finite numbers: entry ${i} is ${String(entry)}`);
      }
      vector.push(entry);
    });
    return vector;
  }

  /**
   * 验证 size × size 的有限数值矩阵
   */
  export function requireSquareMatrix(
    value: unknown,
    size: number,
    field: string,
    fail: ValidationFailure = invalidInput
  ): readonly (readonly number[])[] {
    if (!Array.isArray(value) || value.length !== size) {
      throw fail(field, `must be a matrix of dimensions ${size} x ${size}`);
    }

    return value.map((row: unknown, i) => {
      if (!Array.isArray(row) || row.length !== size) {
        throw fail(field, `must be a matrix of dimensions ${size} x ${size}: row ${i} has the wrong length`);
      }
      return requireVector(row, size, `${field}[${i}]`, fail);
    });
  }
}

/**
 * 🚨 数值问题诊断工具
 */
export namespace NumericalDiagnostics {

  export interface MatrixDiagnosis {
    hasNaN: boolean;
    hasInfinite: boolean;
    symmetric: boolean;
    largeElements: Array<{ row: number; col: number; value: number }>;
  }

  /**
   * 诊断矩阵的数值特性
   */
  export function diagnoseMatrix(matrix: IDenseMatrix, matrixName?: string): MatrixDiagnosis {
    const diagnosis: MatrixDiagnosis = {
      hasNaN: false,
      hasInfinite: false,
      symmetric: matrix.isSymmetric(),
      largeElements: []
    };

    for (let i = 0; i < matrix.rows; i++) {
      for (let j = 0; j < matrix.cols; j++) {
        const value = matrix.get(i, j);
        if (Number.isNaN(value)) {
          diagnosis.hasNaN = true;
        } else if (!Number.isFinite(value)) {
          diagnosis.hasInfinite = true;
        } else if (Math.abs(value) > 1e12) {
          diagnosis.largeElements.push({ row: i, col: j, value });
        }
      }
    }

    if (matrixName) {
      if (diagnosis.hasNaN) {
        logNumericalError(matrixName, 'diagnose', '检测到 NaN 值');
      }
      if (diagnosis.hasInfinite) {
        logNumericalError(matrixName, 'diagnose', '检测到无穷大值');
      }
      if (diagnosis.largeElements.length > 0) {
        logNumericalWarning(matrixName, 'diagnose', `检测到 ${diagnosis.largeElements.length} 个大数值元素 (>1e12)`);
      }
    }

    return diagnosis;
  }

  /**
   * 记录数值警告
   */
  export function logNumericalWarning(
    source: string,
    operation: string,
    details: string
  ): void {
    console.warn(`🔢 数值警告 [${source}:${operation}]: ${details}`);
  }

  /**
   * 记录数值错误
   */
  export function logNumericalError(
    source: string,
    operation: string,
    details: string
  ): void {
    console.error(`❌ 数值错误 [${source}:${operation}]: ${details}`);
  }
}
