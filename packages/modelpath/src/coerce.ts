import { extractValue, introspect } from "./introspect.js";

/**
 * Canonical string form of a value, used when segments are concatenated and
 * when comparison operands are matched.
 *
 * Numbers never use exponent notation: `1e21` renders as
 * `"1000000000000000000000"` and `1e-7` as `"0.0000001"`.
 */
export function toText(value: unknown): string {
  const v = introspect(value);
  switch (v.kind) {
    case "absent":
      return "";
    case "text":
      return v.value;
    case "bool":
      return v.value ? "true" : "false";
    case "int":
    case "float":
      return typeof v.value === "bigint" ? v.value.toString() : formatNumber(v.value);
    case "indirection":
      return toText(extractValue(v));
    case "record":
    case "indexed":
    case "keyed":
      return renderObject(v.handle.raw);
    case "opaque":
      return String(v.value);
  }
}

function formatNumber(n: number): string {
  // String(-0) is already "0"
  const text = String(n);
  if (!Number.isFinite(n)) return text;
  const e = text.indexOf("e");
  if (e === -1) return text;
  return expandExponent(text.slice(0, e), Number(text.slice(e + 1)));
}

function expandExponent(mantissa: string, exponent: number): string {
  const negative = mantissa.startsWith("-");
  const unsigned = negative ? mantissa.slice(1) : mantissa;
  const dot = unsigned.indexOf(".");
  const digits = dot === -1 ? unsigned : unsigned.slice(0, dot) + unsigned.slice(dot + 1);
  const pointAt = (dot === -1 ? unsigned.length : dot) + exponent;

  let result: string;
  if (pointAt <= 0) {
    result = "0." + "0".repeat(-pointAt) + digits;
  } else if (pointAt >= digits.length) {
    result = digits + "0".repeat(pointAt - digits.length);
  } else {
    result = digits.slice(0, pointAt) + "." + digits.slice(pointAt);
  }
  return negative ? "-" + result : result;
}

function renderObject(value: object): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (
    !Array.isArray(value) &&
    typeof value.toString === "function" &&
    value.toString !== Object.prototype.toString
  ) {
    return String(value);
  }
  try {
    return JSON.stringify(value, jsonReplacer);
  } catch {
    // cyclic structures
    return String(value);
  }
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    const entries: Record<string, unknown> = {};
    for (const [k, v] of value) entries[String(k)] = v;
    return entries;
  }
  if (value instanceof Set) return Array.from(value);
  if (typeof value === "bigint") return value.toString();
  return value;
}
