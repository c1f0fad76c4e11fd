/**
 * Environment - display names for the variables in scope while printing.
 * Immutable: extend() returns a new Environment and leaves this one usable.
 */

import { Pattern, patternIndices } from "../ast/pattern";
import { Bound, unvar } from "../ast/scope";
import { InternalError, absurd } from "../errors";

const LETTERS = "abcdefghijklmnopqrstuvwxyz";

/**
 * The n-th name of the fresh name supply:
 * `a` .. `z`, then `a0` .. `z0`, `a1` .. `z1`, and so on.
 */
export function freshName(n: number): string {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new InternalError(`Fresh name supply exhausted at ${n}`, "environment");
  }
  if (n < LETTERS.length) {
    return LETTERS[n];
  }
  const k = n - LETTERS.length;
  return `${LETTERS[k % LETTERS.length]}${Math.floor(k / LETTERS.length)}`;
}

export class Environment<V> {
  private readonly locals: (v: V) => string;
  // Position of the next unused name in the supply.
  private readonly next: number;
  // Names of free variables; the supply skips them.
  private readonly reserved: ReadonlySet<string>;

  private constructor(
    locals: (v: V) => string,
    next: number,
    reserved: ReadonlySet<string>
  ) {
    this.locals = locals;
    this.next = next;
    this.reserved = reserved;
  }

  /**
   * The environment for closed trees.
   */
  static empty(): Environment<never> {
    return new Environment<never>(absurd, 0, new Set());
  }

  /**
   * An environment for trees with free variables, named by `show`.
   * `reserved` lists the names `show` produces for the tree being printed;
   * binders never take one of them.
   */
  static open<V>(show: (v: V) => string, reserved: Iterable<string> = []): Environment<V> {
    return new Environment(show, 0, new Set(reserved));
  }

  lookup(v: V): string {
    return this.locals(v);
  }

  /**
   * Open a `let` or lambda binder: the new placeholder gets the next fresh
   * name, every other variable resolves as before.
   */
  extend(): [Environment<Bound<0, V>>, string] {
    const [name, next] = this.take(this.next);
    const env = new Environment<Bound<0, V>>(
      unvar(() => name, this.locals),
      next,
      this.reserved
    );
    return [env, name];
  }

  /**
   * Open a `case` branch: each distinct index the pattern declares gets a
   * fresh name, in ascending numeric order of the index.
   */
  extendPattern(pattern: Pattern<number>): Environment<Bound<number, V>> {
    const indices = patternIndices(pattern);
    const names = new Map<number, string>();
    let next = this.next;
    for (const index of indices) {
      const [name, after] = this.take(next);
      names.set(index, name);
      next = after;
    }

    const lookupIndex = (index: number): string => {
      const name = names.get(index);
      if (name === undefined) {
        throw new InternalError(
          `Unbound pattern variable ${index}`,
          "environment"
        ).addNote(`the pattern declares [${indices.join(", ")}]`);
      }
      return name;
    };

    return new Environment<Bound<number, V>>(
      unvar(lookupIndex, this.locals),
      next,
      this.reserved
    );
  }

  // The first unreserved name at or after `position`, and the position after it.
  private take(position: number): [string, number] {
    let n = position;
    while (this.reserved.has(freshName(n))) {
      n++;
    }
    return [freshName(n), n + 1];
  }
}
