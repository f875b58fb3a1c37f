import { ABSENT } from "./types.js";
import type { KeyKind, KeyedHandle, MapKey, Value } from "./types.js";

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

/**
 * A `Map` carries no declared key type, so the kind of its first key stands
 * in for it. Empty maps and maps keyed by objects or symbols have none.
 */
export function keyKindOf(map: Map<unknown, unknown>): KeyKind | undefined {
  const first = map.keys().next();
  if (first.done) return undefined;
  switch (typeof first.value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "bigint":
      return "bigint";
    case "boolean":
      return "boolean";
    default:
      return undefined;
  }
}

/** Parse a key written in a path into the given key kind. Undefined when it does not parse. */
export function parseMapKey(text: string, kind: KeyKind): MapKey | undefined {
  switch (kind) {
    case "string":
      return text;
    case "number":
      return DECIMAL.test(text) ? Number(text) : undefined;
    case "bigint":
      return INTEGER.test(text) ? BigInt(text) : undefined;
    case "boolean":
      if (text === "true") return true;
      if (text === "false") return false;
      return undefined;
  }
}

/**
 * Look up `text` in a keyed collection. The stored value comes back as a
 * fresh {@link Value}, never as a view onto the map.
 */
export function getMapValue(text: string, map: KeyedHandle): Value {
  if (!map.keyKind) return ABSENT;
  const key = parseMapKey(text, map.keyKind);
  if (key === undefined) return ABSENT;
  return map.getKey(key);
}
