/**
 * 🚨 邊界搜索錯誤類型
 *
 * InvalidInputError / SingularMatrixError / MalformedHandoffError 會中止當前調用；
 * NonConvergenceWarning 不會被拋出，只隨盡力解一起回報給調用方
 */

export class BoundarySearchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 問題欄位的形狀、類型或範圍不合法
 */
export class InvalidInputError extends BoundarySearchError {
  constructor(
    public readonly field: string,
    detail: string
  ) {
    super(`${field} ${detail}`);
  }
}

/**
 * 共變異數矩陣或 Hessian 在數值上不可逆
 */
export class SingularMatrixError extends BoundarySearchError {
  constructor(
    public readonly matrixName: string,
    public readonly reciprocalCondition: number
  ) {
    super(
      `${matrixName} is computationally singular: reciprocal condition number = ${reciprocalCondition.toExponential(6)}`
    );
  }
}

/**
 * 傳給驗證器的求解結果或統計參數缺少欄位或形狀錯誤
 */
export class MalformedHandoffError extends BoundarySearchError {
  constructor(
    public readonly field: string,
    detail: string
  ) {
    super(`${field} ${detail}`);
  }
}

/**
 * 迭代預算耗盡而未達到容差
 */
export class NonConvergenceWarning extends BoundarySearchError {
  constructor(
    public readonly iterationsUsed: number,
    public readonly maxIterations: number,
    public readonly scoreSum: number
  ) {
    super(
      `The Newton-Raphson search did not converge: |sum(score)| = ${Math.abs(scoreSum).toExponential(3)} after ${iterationsUsed}/${maxIterations} iterations`
    );
  }
}
