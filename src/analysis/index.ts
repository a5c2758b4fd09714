/**
 * Analysis module exports
 */

export { inferTypes, typeCheck, TYPE_ERROR } from './inferrer.js';
export type {
  InferenceResult,
  InferenceSuccess,
  InferenceFailure,
  ResolvedBinding,
} from './inferrer.js';

export { findUndefinedVariables, isWellScoped } from './scope.js';

export { evaluate } from './evaluator.js';
export type { Value, EvalResult, EvalError, EvalErrorKind } from './evaluator.js';
