export { resolve, createEvaluator, PathEvaluator } from "./PathEvaluator.js";
export type { EvaluatorOptions, TracedResolution } from "./PathEvaluator.js";
export { resolveModel } from "./operators.js";
export { toText } from "./coerce.js";
export { ptr, Pointer, UNWRAP } from "./pointer.js";
export type { Indirect } from "./pointer.js";
export { parsePathDiagnostics } from "./lint/index.js";
export type { PathDiagnostic, PathParseResult, PathSegment, SegmentKind } from "./lint/index.js";
export { ModelPathError, PathSyntaxError } from "./errors.js";
export type { ReferenceTrace, TraceLevel } from "./tracing.js";
export type { Logger, ReferenceResolver } from "./types.js";
