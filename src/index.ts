/**
 * 多變量置信區域邊界搜索
 */

export * from './types/index';
export * from './core/errors';
export { Vector } from './math/dense/vector';
export { DenseMatrix } from './math/dense/matrix';
export { invert, quadraticForm, mahalanobis, reciprocalCondition, SINGULARITY_THRESHOLD } from './math/linalg/kernel';
export { NumericalSafety, ProblemValidation, NumericalDiagnostics } from './math/numerical/safety';
export { logGamma, regularizedBeta, fCdf, fQuantile } from './math/special/distributions';
export { BoundarySolver } from './core/solver/boundary_solver';
export type { SolverConfig } from './core/solver/boundary_solver';
export { BoundaryVerifier, isBoundarySolution, isBoundaryStatistics } from './core/verifier/boundary_verifier';
export type { VerifyOptions, BoundaryCheck } from './core/verifier/boundary_verifier';
export { estimateHotellingT2, columnMeans, sampleCovariance } from './core/statistics/hotelling';
export { createBoundaryProblem, oppositePoint, locateBoundary } from './core/boundary/pipeline';
export type { ProblemOverrides, LocateOptions, BoundaryLocation } from './core/boundary/pipeline';
