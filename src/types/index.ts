/**
 * 🎯 MCR 邊界搜索核心類型定義
 *
 * 多變量置信區域 (MCR) 邊界求解器、驗證器
 * 與 Hotelling T² 估計量之間傳遞的類型
 */

// 基礎數值類型
export type Matrix = number[][];
export type ReadonlyMatrix = readonly (readonly number[])[];

// 向量接口
export interface IVector {
  readonly size: number;

  get(index: number): number;
  set(index: number, value: number): void;

  sum(): number;

  minus(other: IVector): IVector;
  scale(factor: number): IVector;
  slice(start: number, end: number): IVector;

  isFinite(): boolean;
  toArray(): number[];
}

// 稠密矩陣接口
export interface IDenseMatrix {
  readonly rows: number;
  readonly cols: number;

  get(row: number, col: number): number;
  set(row: number, col: number, value: number): void;
  multiply(vector: IVector): IVector;
  scale(factor: number): IDenseMatrix;

  isSquare(): boolean;
  isSymmetric(tolerance?: number): boolean;
  toArray(): Matrix;
  print(): void;
}

// === 邊界搜索問題 ===

/**
 * 約束面 critical = scale · (t − target)ᵀ · V⁻¹ · (t − target)
 * 上的極值搜索問題
 */
export interface BoundaryProblem {
  /** 邊界點的坐標數 (時間點或模型參數的個數) */
  readonly dimension: number;

  /** 二次型的縮放因子 (Hotelling T² 的 K) */
  readonly scale: number;

  /** 平均差向量，長度 = dimension */
  readonly target: readonly number[];

  /** 合併變異數-共變異數矩陣，dimension × dimension */
  readonly covariance: ReadonlyMatrix;

  /** 約束右側的臨界 F 值 */
  readonly criticalValue: number;

  /** 起始點，長度 = dimension + 1，最後一項為 λ 的初始估計 */
  readonly initialGuess: readonly number[];

  /** 最大 Newton 迭代次數，未給出時使用求解器配置 */
  readonly maxIterations?: number;

  /** 收斂閾值，未給出時使用求解器配置 */
  readonly tolerance?: number;
}

/**
 * 邊界歸屬狀態
 */
export enum BoundaryStatus {
  Unknown = 'unknown',
  OnBoundary = 'on_boundary',
  OffBoundary = 'off_boundary'
}

/**
 * 求解器輸出
 */
export interface BoundarySolution {
  /** 前 dimension 項為邊界坐標，最後一項為 Lagrange 乘數 λ */
  readonly point: readonly number[];

  /** 在迭代預算耗盡前滿足停止條件 */
  readonly converged: boolean;

  /** 求解後為 Unknown，由驗證器設定 */
  readonly onBoundary: BoundaryStatus;

  readonly iterationsUsed: number;
  readonly maxIterations: number;
  readonly tolerance: number;
}

// === Hotelling T² 估計量 ===

export interface HotellingT2Parameters {
  /** Mahalanobis 距離 */
  readonly DM: number;
  readonly df1: number;
  readonly df2: number;
  readonly alpha: number;
  /** 用於 F 分佈轉換的縮放因子 */
  readonly K: number;
  /** n1·n2 / (n1 + n2) */
  readonly k: number;
  readonly T2: number;
  readonly F: number;
  readonly fCrit: number;
  readonly pF: number;
}

export interface HotellingT2Estimate {
  readonly parameters: HotellingT2Parameters;
  readonly sPool: ReadonlyMatrix;
  readonly covs: {
    readonly reference: ReadonlyMatrix;
    readonly test: ReadonlyMatrix;
  };
  readonly means: {
    readonly reference: readonly number[];
    readonly test: readonly number[];
    /** test − reference */
    readonly meanDiff: readonly number[];
  };
}

/**
 * 驗證器實際使用的參數子集
 */
export type BoundaryStatistics = {
  readonly parameters: Pick<HotellingT2Parameters, 'K' | 'df1' | 'fCrit'>;
  readonly sPool: ReadonlyMatrix;
  readonly means: Pick<HotellingT2Estimate['means'], 'meanDiff'>;
};

// === 求解事件 ===

export enum SolverEventType {
  Iteration = 'NR_ITERATION',
  Converged = 'NR_CONVERGED',
  NotConverged = 'NR_NOT_CONVERGED'
}

export interface SolverEvent {
  readonly type: SolverEventType;
  readonly iteration: number;
  readonly scoreSum: number;
  readonly description: string;
}
