import type { PathDiagnostic } from "./lint/diagnostics.js";

/** Base class for errors raised by the evaluator. */
export class ModelPathError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = this.constructor.name;
  }
}

/**
 * Thrown by a strict evaluator when a path has error-severity diagnostics.
 * The message names the first one; all of them are on `diagnostics`.
 */
export class PathSyntaxError extends ModelPathError {
  readonly path: string;
  readonly diagnostics: PathDiagnostic[];

  constructor(path: string, diagnostics: PathDiagnostic[]) {
    const first = diagnostics.find((d) => d.severity === "error") ?? diagnostics[0];
    const where = first ? ` at offset ${first.range.start}: ${first.message}` : "";
    super("PATH_SYNTAX_ERROR", `Invalid path "${path}"${where}`);
    this.path = path;
    this.diagnostics = diagnostics;
  }
}
