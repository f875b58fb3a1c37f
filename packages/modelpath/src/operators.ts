/**
 * Operand resolvers: model references, negation, external references and
 * comparisons. Each takes the index of its leading sigil and returns the
 * value together with the index where scanning resumes.
 */

import { toText } from "./coerce.js";
import { extractValue, introspect } from "./introspect.js";
import { resolvePathAgainstValue } from "./resolver.js";
import { readUntilTerminator, scanStringLiteral } from "./scan.js";
import type { EvalContext, Logger, Resolution } from "./types.js";

type Operator =
  | { kind: "==" | "!="; index: number }
  | { kind: "invalid"; index: number };

/**
 * Resolve a model reference (`.User.Address.City`) at `index`, which must
 * point at the leading `.`.
 *
 * ```ts
 * resolveModel(".Name", { Name: "Alice" }, 0); // { value: "Alice", index: 5 }
 * ```
 */
export function resolveModel(
  path: string,
  data: unknown,
  index: number,
  logger?: Logger,
): Resolution {
  const { text: modelPath, index: next } = readUntilTerminator(path, index + 1);
  if (data === undefined || data === null) {
    return { value: undefined, index: next };
  }
  const result = resolvePathAgainstValue(modelPath, introspect(data), logger);
  return { value: extractValue(result), index: next };
}

/**
 * `!operand`: booleans are complemented. Anything else is matched as text,
 * case-insensitively: "false" negates to true, everything else to false.
 */
export function resolveNegation(
  path: string,
  data: unknown,
  index: number,
  ctx: EvalContext,
): Resolution<boolean> {
  const { value, index: next } = resolveOperand(path, data, index + 1, ctx);
  if (typeof value === "boolean") {
    return { value: !value, index: next };
  }
  return { value: toText(value).toLowerCase() === "false", index: next };
}

/** `:name`, resolved through the evaluator's reference resolver. */
export function resolveReference(
  path: string,
  data: unknown,
  index: number,
  ctx: EvalContext,
): Resolution {
  const { text: name, index: next } = readUntilTerminator(path, index + 1);
  return { value: ctx.callReference(name, data), index: next };
}

/**
 * `?left==right` or `?left!=right`. Both operands are compared by their
 * canonical text. A missing or malformed operator makes the comparison false.
 */
export function resolveComparison(
  path: string,
  data: unknown,
  index: number,
  ctx: EvalContext,
): Resolution<boolean> {
  const left = resolveOperand(path, data, index + 1, ctx);
  const operator = parseOperator(path, left.index);
  if (operator.kind === "invalid") {
    ctx.logger.warn(
      `[modelpath] Comparison at offset ${index} has no "==" or "!=" operator, evaluating to false`,
    );
    return { value: false, index: operator.index };
  }

  const leftText = toText(left.value);
  const right = resolveOperand(path, data, operator.index, ctx);
  const equal = leftText === toText(right.value);
  return { value: operator.kind === "==" ? equal : !equal, index: right.index };
}

/**
 * Resolve a single operand: a model reference, string literal, negation or
 * reference. Anything else before it is skipped; with nothing left the
 * operand is the root data.
 */
export function resolveOperand(
  path: string,
  data: unknown,
  start: number,
  ctx: EvalContext,
): Resolution {
  let index = start;
  while (index < path.length) {
    const c = path[index];
    switch (c) {
      case ".":
        return resolveModel(path, data, index, ctx.logger);
      case "'":
      case '"':
        return scanStringLiteral(path, index, c);
      case "!":
        return resolveNegation(path, data, index, ctx);
      case ":":
        return resolveReference(path, data, index, ctx);
      default:
        index++;
    }
  }
  return { value: data, index };
}

function parseOperator(path: string, index: number): Operator {
  if (index >= path.length - 1) {
    return { kind: "invalid", index: index + 1 };
  }
  const pair = path.slice(index, index + 2);
  if (pair === "==" || pair === "!=") {
    return { kind: pair, index: index + 2 };
  }
  return { kind: "invalid", index: index + 1 };
}
