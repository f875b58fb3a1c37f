/**
 * Runtime value model for path resolution.
 *
 * Every raw JavaScript value reaching the resolver is classified once into a
 * closed tagged union. Container kinds carry a handle exposing only the
 * capabilities the resolver needs, so the walk never switches on `typeof`
 * itself.
 */

/** Key kinds a `Map` can be addressed by from a path */
export type KeyKind = "string" | "number" | "bigint" | "boolean";

/** A parsed map key, matching one of the {@link KeyKind}s */
export type MapKey = string | number | bigint | boolean;

/** Field and computed-accessor access on an object */
export interface RecordHandle {
  readonly raw: object;
  /** Call a zero-argument method named `name`; absent when there is none or it returns nothing */
  invoke0(name: string): Value;
  /** Read a data property or getter named `name` */
  getField(name: string): Value;
}

/** Positional access on an array or typed array */
export interface IndexedHandle {
  readonly raw: ArrayLike<unknown>;
  len(): number;
  getIndex(index: number): Value;
}

/** Lookup on a `Map` by a parsed key */
export interface KeyedHandle {
  readonly raw: Map<unknown, unknown>;
  /** Undefined when the map is empty or keyed by objects/symbols */
  readonly keyKind: KeyKind | undefined;
  getKey(key: MapKey): Value;
}

/** A pointer-like wrapper (Pointer, UNWRAP protocol, WeakRef) */
export interface IndirectionHandle {
  readonly raw: object;
  unwrap(): Value;
}

export type Value =
  | { kind: "absent" }
  | { kind: "bool"; value: boolean }
  | { kind: "int"; value: number | bigint }
  | { kind: "float"; value: number }
  | { kind: "text"; value: string }
  | { kind: "record"; handle: RecordHandle }
  | { kind: "indexed"; handle: IndexedHandle }
  | { kind: "keyed"; handle: KeyedHandle }
  | { kind: "indirection"; handle: IndirectionHandle }
  | { kind: "opaque"; value: unknown };

export const ABSENT: Value = Object.freeze({ kind: "absent" });

/**
 * Resolves `:name` references in a path. Receives the reference name and the
 * root data the path is evaluated against.
 */
export type ReferenceResolver = (name: string, data: unknown) => unknown;

/**
 * Structured logger interface for evaluator events.
 * Accepts any compatible logger: pino, winston, bunyan, `console`, etc.
 */
export interface Logger {
  debug: (...args: any[]) => void;
  info: (...args: any[]) => void;
  warn: (...args: any[]) => void;
  error: (...args: any[]) => void;
}

/** Result of evaluating one piece of a path: the value and where scanning resumes */
export type Resolution<T = unknown> = { value: T; index: number };

/** What the scanner needs from the evaluator running it */
export interface EvalContext {
  readonly logger: Logger;
  /** Returns undefined when no reference resolver is configured */
  callReference(name: string, data: unknown): unknown;
}
