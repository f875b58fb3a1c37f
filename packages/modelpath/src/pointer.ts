/**
 * Indirection: values that stand in for another value.
 *
 * Any object implementing `[UNWRAP]()` is unwrapped transparently by the
 * resolver before it is inspected. An indirection whose target is `null` or
 * `undefined` is unset and resolves to nothing.
 */

export const UNWRAP: unique symbol = Symbol.for("modelpath.unwrap");

export interface Indirect<T = unknown> {
  [UNWRAP](): T | null | undefined;
}

export function isIndirect(value: object): value is Indirect {
  return UNWRAP in value && typeof value[UNWRAP] === "function";
}

/** A boxed reference to a value, possibly unset. */
export class Pointer<T> implements Indirect<T> {
  constructor(private readonly target?: T | null) {}

  deref(): T | null | undefined {
    return this.target;
  }

  [UNWRAP](): T | null | undefined {
    return this.target;
  }
}

/**
 * Wrap a value in a {@link Pointer}. Called with no argument (or `null`) it
 * yields an unset pointer.
 *
 * ```ts
 * resolve(".owner.name", { owner: ptr({ name: "Ada" }) }); // "Ada"
 * resolve(".owner.name", { owner: ptr() });                // undefined
 * ```
 */
export function ptr<T>(target?: T | null): Pointer<T> {
  return new Pointer(target);
}
