/**
 * Expression dispatcher: scans a path, evaluates each segment found by its
 * leading sigil and combines the results.
 *
 *   .        model reference    .User.Address.City
 *   ' "      string literal     'Hello, '
 *   !        negation           !.IsActive
 *   :        external reference :config
 *   ?        comparison         ?.Age=='30'
 *
 * A single segment keeps its native type. Several segments are converted
 * to text and concatenated in order.
 */

import { toText } from "./coerce.js";
import {
  resolveComparison,
  resolveModel,
  resolveNegation,
  resolveReference,
} from "./operators.js";
import { scanStringLiteral } from "./scan.js";
import type { EvalContext, Resolution } from "./types.js";

export function resolveExpressions(
  path: string,
  data: unknown,
  ctx: EvalContext,
  startIndex = 0,
): Resolution {
  if (path.length === 0) {
    return { value: data, index: startIndex };
  }

  let index = startIndex;
  // Most paths hold one segment; the array is only created for a second one
  let first: unknown;
  let hasFirst = false;
  let rest: unknown[] | undefined;

  while (index < path.length) {
    const segment = resolveSegment(path, data, index, ctx);
    if (!segment) {
      // spaces, and anything that does not start a segment
      index++;
      continue;
    }
    index = segment.index;
    if (!hasFirst) {
      first = segment.value;
      hasFirst = true;
    } else {
      (rest ??= []).push(segment.value);
    }
  }

  if (rest) {
    let text = toText(first);
    for (const value of rest) text += toText(value);
    return { value: text, index };
  }
  return { value: hasFirst ? first : data, index };
}

function resolveSegment(
  path: string,
  data: unknown,
  index: number,
  ctx: EvalContext,
): Resolution | undefined {
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
    case "?":
      return resolveComparison(path, data, index, ctx);
    default:
      return undefined;
  }
}
