/**
 * 🧪 BoundarySolver 單元測試
 *
 * 以共線解析解驗證 Newton-Raphson 的邊界點
 */

import { describe, test, expect, vi, afterEach } from 'vitest';
import fc from 'fast-check';
import { BoundarySolver } from '../../../src/core/solver/boundary_solver';
import { BoundaryVerifier } from '../../../src/core/verifier/boundary_verifier';
import {
  InvalidInputError,
  NonConvergenceWarning,
  SingularMatrixError
} from '../../../src/core/errors';
import { BoundaryStatus, SolverEventType } from '../../../src/types/index';
import type { BoundaryProblem, BoundaryStatistics } from '../../../src/types/index';
import { AnalyticalSolutions } from '../../utils/AnalyticalSolutions';
import { captureError } from '../../utils/captureError';

// m = 2, V = 4, k = 1, F = 9: 邊界為 2 ± 6
const oneDimensional: BoundaryProblem = {
  dimension: 1,
  scale: 1,
  target: [2],
  covariance: [[4]],
  criticalValue: 9,
  initialGuess: [1, 1]
};

const threeDimensional: BoundaryProblem = {
  dimension: 3,
  scale: 0.5,
  target: [3, -1, 2],
  covariance: [
    [4, 1, 0.5],
    [1, 3, 0.25],
    [0.5, 0.25, 2]
  ],
  criticalValue: 6,
  initialGuess: [1, 1, 1, 1]
};

const quietSolver = (): BoundarySolver => new BoundarySolver({ onWarning: vi.fn() });

afterEach(() => {
  vi.restoreAllMocks();
});

describe('BoundarySolver - 配置', () => {
  test('默認配置', () => {
    const solver = new BoundarySolver();

    expect(solver.config.maxIterations).toBe(100);
    expect(solver.config.tolerance).toBe(1e-9);
    expect(solver.config.verboseLogging).toBe(false);
  });

  test('非法配置應拋出 InvalidInputError', () => {
    expect(() => new BoundarySolver({ maxIterations: 0 })).toThrow(InvalidInputError);
    expect(() => new BoundarySolver({ maxIterations: 2.5 })).toThrow('maxIterations must be a positive integer: 2.5');
    expect(() => new BoundarySolver({ tolerance: -1e-3 })).toThrow(InvalidInputError);
  });

  test('問題未指定時沿用配置中的預算與容差', () => {
    const solver = new BoundarySolver({ maxIterations: 50, tolerance: 1e-6 });
    const solution = solver.solve(oneDimensional);

    expect(solution.maxIterations).toBe(50);
    expect(solution.tolerance).toBe(1e-6);
  });

  test('問題中的預算與容差優先於配置', () => {
    const solver = new BoundarySolver({ maxIterations: 50 });
    const solution = solver.solve({ ...oneDimensional, maxIterations: 20, tolerance: 1e-8 });

    expect(solution.maxIterations).toBe(20);
    expect(solution.tolerance).toBe(1e-8);
  });
});

describe('BoundarySolver - 收斂到解析解', () => {
  test('一維：從全 1 出發收斂到下界', () => {
    const solution = quietSolver().solve(oneDimensional);
    const [lower] = AnalyticalSolutions.oneDimensionalBounds(2, 4, 1, 9);

    expect(solution.converged).toBe(true);
    expect(solution.onBoundary).toBe(BoundaryStatus.Unknown);
    expect(solution.point).toHaveLength(2);
    expect(solution.point[0]).toBeCloseTo(lower, 8);
    expect(solution.point[0]).toBeCloseTo(-4, 8);
    expect(solution.point[1]).toBeCloseTo(2 / 3, 8);
    expect(solution.iterationsUsed).toBeGreaterThan(1);
    expect(solution.iterationsUsed).toBeLessThanOrEqual(10);
  });

  test('一維：k ≠ 1 時仍滿足 t = m − sqrt(F / (k v⁻¹))', () => {
    const solution = quietSolver().solve({
      dimension: 1,
      scale: 2,
      target: [5],
      covariance: [[0.5]],
      criticalValue: 3,
      initialGuess: [1, 1]
    });
    const roots = AnalyticalSolutions.collinearRoots([5], 5 * 2 * 5, 2, 3);

    expect(solution.converged).toBe(true);
    expect(solution.point[0]).toBeCloseTo(5 - Math.sqrt(0.75), 8);
    expect(solution.point[0]).toBeCloseTo(roots.near.t[0], 8);
    expect(solution.point[1]).toBeCloseTo(roots.near.lambda, 6);
  });

  test('三維：與共線解一致', () => {
    const solution = quietSolver().solve(threeDimensional);

    expect(solution.converged).toBe(true);
    expect(solution.point[0]).toBeCloseTo(-1.7103409, 6);
    expect(solution.point[1]).toBeCloseTo(0.5701136, 6);
    expect(solution.point[2]).toBeCloseTo(-1.1402273, 6);
    expect(solution.point[3]).toBeCloseTo(0.7262068, 6);
  });

  test('三維：邊界點與平均差共線', () => {
    const solution = quietSolver().solve(threeDimensional);
    const c = solution.point[0] / 3;

    expect(solution.point[1]).toBeCloseTo(-c, 8);
    expect(solution.point[2]).toBeCloseTo(2 * c, 8);
  });

  test('重複求解結果相同', () => {
    const solver = quietSolver();
    const first = solver.solve(threeDimensional);
    const second = solver.solve(threeDimensional);

    expect(second.point).toEqual(first.point);
    expect(second.iterationsUsed).toBe(first.iterationsUsed);
  });

  test('結果凍結且不修改輸入', () => {
    const initialGuess = [1, 1];
    const solution = quietSolver().solve({ ...oneDimensional, initialGuess });

    expect(Object.isFrozen(solution)).toBe(true);
    expect(Object.isFrozen(solution.point)).toBe(true);
    expect(initialGuess).toEqual([1, 1]);
  });
});

/**
 * 隨機 SPD 問題：V = AAᵀ + n·I，|m_i| ∈ [2, 6]，起始點取全 1
 */
const spdProblem = fc.integer({ min: 2, max: 7 }).chain(dimension => {
  const row = fc.array(fc.double({ min: -1, max: 1, noNaN: true }), { minLength: dimension, maxLength: dimension });

  return fc.record({
    factor: fc.array(row, { minLength: dimension, maxLength: dimension }),
    target: fc.array(fc.tuple(fc.boolean(), fc.double({ min: 2, max: 6, noNaN: true })), {
      minLength: dimension,
      maxLength: dimension
    }),
    scale: fc.double({ min: 0.25, max: 2, noNaN: true }),
    criticalValue: fc.double({ min: 1, max: 10, noNaN: true })
  }).map(({ factor, target, scale, criticalValue }): BoundaryProblem => ({
    dimension,
    scale,
    target: target.map(([negative, magnitude]) => (negative ? -magnitude : magnitude)),
    covariance: factor.map((a, i) =>
      factor.map((b, j) => a.reduce((sum, value, l) => sum + value * b[l], i === j ? dimension : 0))
    ),
    criticalValue,
    initialGuess: new Array<number>(dimension + 1).fill(1)
  }));
});

describe('BoundarySolver - 隨機 SPD 問題', () => {
  test('從全 1 出發均在預算內收斂且位於邊界上', () => {
    const solver = quietSolver();
    const verifier = new BoundaryVerifier();

    fc.assert(
      fc.property(spdProblem, problem => {
        const solution = solver.solve(problem);
        const statistics: BoundaryStatistics = {
          parameters: { K: problem.scale, df1: problem.dimension, fCrit: problem.criticalValue },
          sPool: problem.covariance,
          means: { meanDiff: problem.target }
        };
        const check = verifier.check(solution, statistics);

        expect(solution.converged).toBe(true);
        expect(check.onBoundary).toBe(true);
        expect(Math.abs(check.kdvd - problem.criticalValue)).toBeLessThan(1e-8);
      }),
      { seed: 20240611, numRuns: 200 }
    );
  });
});

describe('BoundarySolver - 迭代預算', () => {
  test('容差為 0 時耗盡預算並回報警告', () => {
    const onWarning = vi.fn();
    const solver = new BoundarySolver({ onWarning });
    const solution = solver.solve({ ...oneDimensional, maxIterations: 3, tolerance: 0 });

    expect(solution.converged).toBe(false);
    expect(solution.iterationsUsed).toBe(3);
    expect(solution.point[0]).toBeCloseTo(-4.8722267, 6);
    expect(onWarning).toHaveBeenCalledTimes(1);

    const warning = onWarning.mock.calls[0][0];
    expect(warning).toBeInstanceOf(NonConvergenceWarning);
    expect(warning.iterationsUsed).toBe(3);
    expect(warning.maxIterations).toBe(3);
  });

  test('最後一次迭代才滿足條件：不算收斂，也不發出警告', () => {
    const onWarning = vi.fn();
    const solver = new BoundarySolver({ onWarning });
    const reference = quietSolver().solve(oneDimensional);

    const solution = solver.solve({ ...oneDimensional, maxIterations: reference.iterationsUsed });

    expect(solution.iterationsUsed).toBe(reference.iterationsUsed);
    expect(solution.converged).toBe(false);
    expect(onWarning).not.toHaveBeenCalled();
    expect(solution.point).toEqual(reference.point);
  });

  test('默認警告處理寫入 console.warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    new BoundarySolver().solve({ ...oneDimensional, maxIterations: 2 });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain('[BoundarySolver:solve]');
    expect(warn.mock.calls[0][0]).toContain('after 2/2 iterations');
  });
});

describe('BoundarySolver - 迭代事件', () => {
  test('每次迭代一個事件，最後為收斂事件', () => {
    const solver = quietSolver();
    const solution = solver.solve(oneDimensional);
    const events = solver.getEvents();

    expect(events).toHaveLength(solution.iterationsUsed + 1);
    expect(events[0].type).toBe(SolverEventType.Iteration);
    expect(events[0].iteration).toBe(1);
    // 起始點 (1, 1) 的得分為 [1; 8.75]
    expect(events[0].scoreSum).toBeCloseTo(9.75, 12);

    const last = events[events.length - 1];
    expect(last.type).toBe(SolverEventType.Converged);
    expect(last.iteration).toBe(solution.iterationsUsed);
    expect(Math.abs(last.scoreSum)).toBeLessThan(1e-9);
  });

  test('未收斂時最後為 NR_NOT_CONVERGED', () => {
    const solver = quietSolver();
    solver.solve({ ...oneDimensional, maxIterations: 2 });
    const events = solver.getEvents();

    expect(events.map(e => e.type)).toEqual([
      SolverEventType.Iteration,
      SolverEventType.Iteration,
      SolverEventType.NotConverged
    ]);
  });

  test('每次求解重置事件', () => {
    const solver = quietSolver();
    solver.solve({ ...oneDimensional, maxIterations: 2 });
    solver.solve({ ...oneDimensional, maxIterations: 1 });

    expect(solver.getEvents()).toHaveLength(2);
  });

  test('verboseLogging 逐次輸出日誌', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const solver = new BoundarySolver({ verboseLogging: true, onWarning: vi.fn() });
    solver.solve({ ...oneDimensional, maxIterations: 2 });

    expect(log).toHaveBeenCalledTimes(3);
    expect(log.mock.calls[0][0]).toContain('[NR_ITERATION] iter=1');
  });
});

describe('BoundarySolver - 錯誤處理', () => {
  const invalidFields: Array<{ field: string; patch: Partial<BoundaryProblem> }> = [
    { field: 'dimension', patch: { dimension: 0 } },
    { field: 'dimension', patch: { dimension: 1.5 } },
    { field: 'scale', patch: { scale: -1 } },
    { field: 'target', patch: { target: [2, 3] } },
    { field: 'covariance', patch: { covariance: [[4, 1]] } },
    { field: 'criticalValue', patch: { criticalValue: -1 } },
    { field: 'criticalValue', patch: { criticalValue: Number.NaN } },
    { field: 'initialGuess', patch: { initialGuess: [1] } },
    { field: 'maxIterations', patch: { maxIterations: 2.5 } },
    { field: 'tolerance', patch: { tolerance: Number.POSITIVE_INFINITY } }
  ];

  test.each(invalidFields)('非法的 $field 應拋出 InvalidInputError', ({ field, patch }) => {
    const error = captureError(() => quietSolver().solve({ ...oneDimensional, ...patch }));

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ field });
  });

  test('目標向量含 NaN', () => {
    expect(() => quietSolver().solve({ ...oneDimensional, target: [Number.NaN] }))
      .toThrow('target must contain only finite numbers: entry 0 is NaN');
  });

  test('多個欄位非法時先報告 dimension', () => {
    expect(() => quietSolver().solve({ ...oneDimensional, dimension: -1, scale: -1 }))
      .toThrow('dimension must be a positive integer: -1');
  });

  test('奇異的共變異數矩陣', () => {
    const problem: BoundaryProblem = {
      dimension: 2,
      scale: 1,
      target: [1, 2],
      covariance: [[1, 0], [0, 0]],
      criticalValue: 4,
      initialGuess: [1, 1, 1]
    };

    expect(() => quietSolver().solve(problem)).toThrow(SingularMatrixError);
    expect(() => quietSolver().solve(problem)).toThrow('covariance is computationally singular');
  });

  test('起始點等於平均差時 Hessian 奇異', () => {
    const problem: BoundaryProblem = { ...oneDimensional, initialGuess: [2, 1] };

    expect(() => quietSolver().solve(problem)).toThrow('hessian is computationally singular');
  });

  test('verboseLogging 時輸出奇異 Hessian', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const solver = new BoundarySolver({ verboseLogging: true, onWarning: vi.fn() });

    expect(() => solver.solve({ ...oneDimensional, initialGuess: [2, 1] })).toThrow(SingularMatrixError);
    expect(log).toHaveBeenCalledWith('DenseMatrix (2x2)');
  });
});
