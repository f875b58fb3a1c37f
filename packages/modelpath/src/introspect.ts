/**
 * Value extraction adapter: classifies raw values into the {@link Value}
 * union and converts resolved values back.
 */

import { keyKindOf } from "./keyed.js";
import { UNWRAP, isIndirect } from "./pointer.js";
import type { Indirect } from "./pointer.js";
import { ABSENT } from "./types.js";
import type {
  IndexedHandle,
  IndirectionHandle,
  KeyedHandle,
  RecordHandle,
  Value,
} from "./types.js";

const BLOCKED_NAMES = new Set(["constructor", "__proto__", "prototype"]);

export function introspect(raw: unknown): Value {
  if (raw === undefined || raw === null) return ABSENT;
  if (typeof raw === "boolean") return { kind: "bool", value: raw };
  if (typeof raw === "bigint") return { kind: "int", value: raw };
  if (typeof raw === "number") {
    return Number.isInteger(raw)
      ? { kind: "int", value: raw }
      : { kind: "float", value: raw };
  }
  if (typeof raw === "string") return { kind: "text", value: raw };
  if (typeof raw !== "object") return { kind: "opaque", value: raw };

  if (raw instanceof WeakRef || isIndirect(raw)) {
    return { kind: "indirection", handle: indirectionHandle(raw) };
  }
  if (Array.isArray(raw) || isTypedArray(raw)) {
    return { kind: "indexed", handle: indexedHandle(raw) };
  }
  if (raw instanceof Map) {
    return { kind: "keyed", handle: keyedHandle(raw) };
  }
  return { kind: "record", handle: recordHandle(raw) };
}

/**
 * Convert a resolved value back to a plain JavaScript value. Indirections are
 * followed to their target; an unset one becomes `undefined`.
 */
export function extractValue(value: Value): unknown {
  switch (value.kind) {
    case "absent":
      return undefined;
    case "indirection":
      return extractValue(value.handle.unwrap());
    case "record":
    case "indexed":
    case "keyed":
      return value.handle.raw;
    default:
      return value.value;
  }
}

function isTypedArray(value: object): value is ArrayLike<number | bigint> {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function indirectionHandle(raw: WeakRef<object> | Indirect): IndirectionHandle {
  return {
    raw,
    unwrap: () => introspect(raw instanceof WeakRef ? raw.deref() : raw[UNWRAP]()),
  };
}

function indexedHandle(raw: ArrayLike<unknown>): IndexedHandle {
  return {
    raw,
    len: () => raw.length,
    getIndex: (index) =>
      index >= 0 && index < raw.length ? introspect(raw[index]) : ABSENT,
  };
}

function keyedHandle(raw: Map<unknown, unknown>): KeyedHandle {
  return {
    raw,
    keyKind: keyKindOf(raw),
    getKey: (key) => (raw.has(key) ? introspect(raw.get(key)) : ABSENT),
  };
}

/**
 * Find a member by name on the object or its prototype chain, stopping before
 * Object.prototype. Blocked names are only looked up as own properties.
 */
function findMember(target: object, name: string): PropertyDescriptor | undefined {
  const own = Object.getOwnPropertyDescriptor(target, name);
  if (own) return own;
  if (BLOCKED_NAMES.has(name)) return undefined;
  let cursor: object | null = Object.getPrototypeOf(target);
  while (cursor && cursor !== Object.prototype) {
    const descriptor = Object.getOwnPropertyDescriptor(cursor, name);
    if (descriptor) return descriptor;
    cursor = Object.getPrototypeOf(cursor);
  }
  return undefined;
}

function recordHandle(raw: object): RecordHandle {
  return {
    raw,
    invoke0(name) {
      const descriptor = findMember(raw, name);
      const member: unknown = descriptor?.value;
      if (typeof member !== "function" || member.length !== 0) return ABSENT;
      const result: unknown = Reflect.apply(member, raw, []);
      return introspect(result);
    },
    getField(name) {
      const descriptor = findMember(raw, name);
      if (!descriptor) return ABSENT;
      const value: unknown = descriptor.get
        ? Reflect.apply(descriptor.get, raw, [])
        : descriptor.value;
      // Function-valued members are behaviour, not data
      if (typeof value === "function") return ABSENT;
      return introspect(value);
    },
  };
}
