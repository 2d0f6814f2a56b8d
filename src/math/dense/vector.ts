/**
 * 🔢 稠密向量
 *
 * 邊界搜索中的迭代點 [t; λ]、得分向量與平均差都以此表示。
 * 運算一律返回新向量，迭代狀態因此不會被就地修改。
 */

import type { IVector } from '../../types/index';

export class Vector implements IVector {
  private readonly _values: Float64Array;

  constructor(size: number, initialValue = 0) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`向量大小必須為正整數: ${size}`);
    }
    this._values = new Float64Array(size).fill(initialValue);
  }

  get size(): number {
    return this._values.length;
  }

  get(index: number): number {
    this._validateIndex(index);
    return this._values[index];
  }

  set(index: number, value: number): void {
    this._validateIndex(index);
    this._values[index] = value;
  }

  /**
   * 各分量之和，正負分量會相互抵消
   */
  sum(): number {
    return this._values.reduce((total, value) => total + value, 0);
  }

  minus(other: IVector): Vector {
    this._validateSize(other);
    return this._map((value, i) => value - other.get(i));
  }

  scale(factor: number): Vector {
    return this._map(value => factor * value);
  }

  /**
   * 子向量 [start, end)，用於從 [t; λ] 中取出坐標部分
   */
  slice(start: number, end: number): Vector {
    if (!Number.isInteger(start) || start < 0 || end > this.size || end <= start) {
      throw new Error(`子向量範圍無效: [${start}, ${end}) (大小: ${this.size})`);
    }
    return Vector.from(Array.from(this._values.subarray(start, end)));
  }

  /**
   * 溢出或 0/0 後的檢查
   */
  isFinite(): boolean {
    return this._values.every(value => Number.isFinite(value));
  }

  toArray(): number[] {
    return Array.from(this._values);
  }

  static from(values: readonly number[]): Vector {
    const vector = new Vector(values.length);
    vector._values.set(values);
    return vector;
  }

  /**
   * [head; tail]：組裝得分向量 [f′; g′]
   */
  static concat(head: IVector, tail: readonly number[]): Vector {
    return Vector.from([...head.toArray(), ...tail]);
  }

  private _map(fn: (value: number, index: number) => number): Vector {
    const result = new Vector(this.size);
    this._values.forEach((value, i) => {
      result._values[i] = fn(value, i);
    });
    return result;
  }

  private _validateSize(other: IVector): void {
    if (other.size !== this.size) {
      throw new Error(`向量維度不匹配: ${this.size} vs ${other.size}`);
    }
  }

  private _validateIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new Error(`索引超出範圍: ${index} (大小: ${this.size})`);
    }
  }
}
