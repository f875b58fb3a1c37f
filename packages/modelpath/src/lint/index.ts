export { parsePathDiagnostics } from "./diagnostics.js";
export type {
  PathDiagnostic,
  PathParseResult,
  PathSegment,
  SegmentKind,
} from "./diagnostics.js";
