/**
 * 🔢 稠密矩陣實現
 *
 * 行主序存儲，針對小型 (n ≤ 數十) 共變異數矩陣
 * 與加邊 Hessian 矩陣
 *
 * 特點：
 * - 矩陣-向量乘法
 * - 加邊矩陣 (bordered matrix) 組裝
 * - 與 numeric.js 的 number[][] 互轉
 */

import type { IDenseMatrix, IVector, Matrix, ReadonlyMatrix } from '../../types/index';
import { Vector } from './vector';

export class DenseMatrix implements IDenseMatrix {
  private readonly _values: Float64Array;

  constructor(
    public readonly rows: number,
    public readonly cols: number
  ) {
    if (!Number.isInteger(rows) || rows <= 0 || !Number.isInteger(cols) || cols <= 0) {
      throw new Error(`矩陣維度必須為正整數: ${rows}x${cols}`);
    }
    this._values = new Float64Array(rows * cols);
  }

  get(row: number, col: number): number {
    this._validateIndices(row, col);
    return this._values[row * this.cols + col];
  }

  set(row: number, col: number, value: number): void {
    this._validateIndices(row, col);
    this._values[row * this.cols + col] = value;
  }

  /**
   * 矩陣-向量乘法: y = A * x
   */
  multiply(x: IVector): Vector {
    if (x.size !== this.cols) {
      throw new Error(`向量維度不匹配: ${x.size} vs ${this.cols}`);
    }

    const y = new Vector(this.rows);

    for (let i = 0; i < this.rows; i++) {
      let sum = 0;
      const offset = i * this.cols;
      for (let j = 0; j < this.cols; j++) {
        sum += this._values[offset + j] * x.get(j);
      }
      y.set(i, sum);
    }

    return y;
  }

  /**
   * 標量乘法: factor * A
   */
  scale(factor: number): DenseMatrix {
    const result = new DenseMatrix(this.rows, this.cols);
    for (let k = 0; k < this._values.length; k++) {
      result._values[k] = factor * this._values[k];
    }
    return result;
  }

  isSquare(): boolean {
    return this.rows === this.cols;
  }

  isSymmetric(tolerance = 1e-12): boolean {
    if (!this.isSquare()) return false;

    for (let i = 0; i < this.rows; i++) {
      for (let j = i + 1; j < this.cols; j++) {
        const a = this.get(i, j);
        const b = this.get(j, i);
        const scale = Math.max(1, Math.abs(a), Math.abs(b));
        if (Math.abs(a - b) > tolerance * scale) {
          return false;
        }
      }
    }

    return true;
  }

  /**
   * 所有元素皆為有限數值
   */
  isFinite(): boolean {
    return this._values.every(value => Number.isFinite(value));
  }

  /**
   * 轉換為 number[][] (numeric.js 接口)
   */
  toArray(): Matrix {
    const dense: Matrix = [];
    for (let i = 0; i < this.rows; i++) {
      dense.push(Array.from(this._values.subarray(i * this.cols, (i + 1) * this.cols)));
    }
    return dense;
  }

  /**
   * 按行輸出矩陣元素 (診斷用)
   */
  print(): void {
    console.log(`DenseMatrix (${this.rows}x${this.cols})`);
    let header = '      ';
    for (let j = 0; j < this.cols; j++) {
      header += `${j}`.padStart(11, ' ');
    }
    console.log(header);

    for (let i = 0; i < this.rows; i++) {
      let rowStr = `[${i}]`.padStart(5, ' ') + ' |';
      for (let j = 0; j < this.cols; j++) {
        rowStr += this.get(i, j).toExponential(3).padStart(11, ' ');
      }
      console.log(rowStr);
    }
  }

  /**
   * 從二維陣列創建矩陣，要求每行長度一致
   */
  static from(array: ReadonlyMatrix): DenseMatrix {
    const rows = array.length;
    const cols = rows > 0 ? array[0].length : 0;
    const matrix = new DenseMatrix(rows, cols);

    array.forEach((row, i) => {
      if (row.length !== cols) {
        throw new Error(`第 ${i} 行長度 ${row.length} 與第 0 行長度 ${cols} 不一致`);
      }
      row.forEach((value, j) => {
        matrix._values[i * cols + j] = value;
      });
    });

    return matrix;
  }

  static identity(size: number): DenseMatrix {
    const matrix = new DenseMatrix(size, size);
    for (let i = 0; i < size; i++) {
      matrix._values[i * size + i] = 1;
    }
    return matrix;
  }

  /**
   * 組裝對稱加邊矩陣
   *
   *   [ block    border ]
   *   [ borderᵀ  corner ]
   *
   * @param block n×n 左上區塊
   * @param border 長度 n 的邊向量
   * @param corner 右下角元素
   */
  static bordered(block: IDenseMatrix, border: IVector, corner: number): DenseMatrix {
    if (!block.isSquare() || block.rows !== border.size) {
      throw new Error(`加邊矩陣維度不匹配: 區塊 ${block.rows}x${block.cols}, 邊向量 ${border.size}`);
    }

    const n = block.rows;
    const result = new DenseMatrix(n + 1, n + 1);

    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        result.set(i, j, block.get(i, j));
      }
      result.set(i, n, border.get(i));
      result.set(n, i, border.get(i));
    }
    result.set(n, n, corner);

    return result;
  }

  private _validateIndices(row: number, col: number): void {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows) {
      throw new Error(`行索引超出範圍: ${row}`);
    }
    if (!Number.isInteger(col) || col < 0 || col >= this.cols) {
      throw new Error(`列索引超出範圍: ${col}`);
    }
  }
}
