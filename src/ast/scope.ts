/**
 * Locally nameless binders.
 *
 * A scope's body ranges over `Bound<B, V>`: either one of the binder's own
 * placeholders (`bound`) or a variable from outside (`free`). Because the two
 * are different types, substituting outer variables can never rewrite a
 * placeholder, and no renaming is ever needed.
 *
 * Operations that need substitution (abstract, instantiate, ...) live next to
 * `substitute` in ./expression.
 */

import type { Expression } from "./expression";

export type Bound<B, V> =
  | { kind: "bound"; index: B }
  | { kind: "free"; value: V };

export type Scope<B, V> = {
  body: Expression<Bound<B, V>>;
};

/** Binds a single placeholder (`let` and lambda). */
export type Scope1<V> = Scope<0, V>;

/** Binds the integer indices a `case` pattern declares. */
export type ScopeN<V> = Scope<number, V>;

export function bound<B>(index: B): Bound<B, never> {
  return { kind: "bound", index };
}

export function free<V>(value: V): Bound<never, V> {
  return { kind: "free", value };
}

/**
 * Case analysis on a `Bound`.
 */
export function unvar<B, V, R>(
  onBound: (index: B) => R,
  onFree: (value: V) => R
): (v: Bound<B, V>) => R {
  return (v) => (v.kind === "bound" ? onBound(v.index) : onFree(v.value));
}

export function toScope<B, V>(body: Expression<Bound<B, V>>): Scope<B, V> {
  return { body };
}

export function fromScope<B, V>(scope: Scope<B, V>): Expression<Bound<B, V>> {
  return scope.body;
}
