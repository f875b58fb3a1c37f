/**
 * Generic path resolver: walks a {@link Value} along a dotted/bracketed
 * sub-path such as `Users[0].Address.City`.
 *
 * Every failed hop (missing member, unset indirection, bad index or key)
 * ends the walk with an absent value.
 */

import { getMapValue } from "./keyed.js";
import { ABSENT } from "./types.js";
import type { Logger, Value } from "./types.js";

const INDEX = /^[+-]?\d+$/;

/**
 * Resolve `path` against `value`. A single leading `.` is ignored and an
 * empty path yields `value` itself.
 */
export function resolvePathAgainstValue(
  path: string,
  value: Value,
  logger?: Logger,
): Value {
  if (value.kind === "absent") return ABSENT;

  const rest = path.startsWith(".") ? path.slice(1) : path;
  if (rest === "") return value;

  if (value.kind === "indirection") {
    return resolvePathAgainstValue(rest, value.handle.unwrap(), logger);
  }

  return resolvePathSegments(rest, value, logger);
}

function resolvePathSegments(path: string, value: Value, logger?: Logger): Value {
  if (path.startsWith("[")) {
    return resolveBracketAccess(path, value, logger);
  }

  // Single pass for the first '.' or '['
  let split = -1;
  for (let i = 0; i < path.length; i++) {
    const c = path[i];
    if (c === "." || c === "[") {
      split = i;
      break;
    }
  }

  let segment = path;
  let remaining = "";
  if (split !== -1) {
    segment = path.slice(0, split);
    // A '[' stays on the remainder so bracket access picks it up
    remaining = path[split] === "." ? path.slice(split + 1) : path.slice(split);
  }

  const resolved = resolveFieldOrMethod(segment, value, logger);
  if (resolved.kind === "absent" || remaining === "") {
    return resolved;
  }
  return resolvePathAgainstValue(remaining, resolved, logger);
}

function resolveBracketAccess(path: string, value: Value, logger?: Logger): Value {
  const close = path.indexOf("]");
  if (close === -1) return ABSENT;

  const resolved = resolveIndexOrKey(path.slice(1, close), value);
  if (resolved.kind === "absent" || close === path.length - 1) {
    return resolved;
  }
  return resolvePathAgainstValue(path.slice(close + 1), resolved, logger);
}

function resolveIndexOrKey(indexOrKey: string, value: Value): Value {
  switch (value.kind) {
    case "indexed": {
      if (!INDEX.test(indexOrKey)) return ABSENT;
      return value.handle.getIndex(Number(indexOrKey));
    }
    case "keyed":
      return getMapValue(indexOrKey, value.handle);
    case "record":
      // Plain objects double as string-keyed maps; class instances do not
      return isPlainObject(value.handle.raw) ? value.handle.getField(indexOrKey) : ABSENT;
    default:
      return ABSENT;
  }
}

function isPlainObject(raw: object): boolean {
  const proto: unknown = Object.getPrototypeOf(raw);
  return proto === Object.prototype || proto === null;
}

/**
 * Resolve one named hop. Records try a zero-argument method first and fall
 * back to the field; maps look the name up as a key.
 */
function resolveFieldOrMethod(name: string, value: Value, logger?: Logger): Value {
  if (name === "") return ABSENT;

  switch (value.kind) {
    case "record": {
      const result = value.handle.invoke0(name);
      if (result.kind !== "absent") return result;
      return value.handle.getField(name);
    }
    case "keyed":
      return getMapValue(name, value.handle);
    case "indexed":
      logger?.warn(
        `[modelpath] Accessing ".${name}" on an array (${value.handle.len()} items), use [index] instead`,
      );
      return ABSENT;
    default:
      return ABSENT;
  }
}
