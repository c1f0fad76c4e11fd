/**
 * Patterns for `case` branches.
 *
 * A pattern declares its variables by index; the branch body is a scope
 * over exactly those indices.
 */

import { Qualified, parseQualified } from "./name";

export type Pattern<V> =
  | { kind: "var"; value: V }
  | { kind: "wildcard" }
  | { kind: "con"; con: Qualified; args: readonly Pattern<V>[] }
  | { kind: "string"; value: string }
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number };

// ============================================
// Constructors
// ============================================

export function varPattern<V>(value: V): Pattern<V> {
  return { kind: "var", value };
}

export function wildcardPattern<V = never>(): Pattern<V> {
  return { kind: "wildcard" };
}

export function conPattern<V>(
  con: Qualified | string,
  args: readonly Pattern<V>[] = []
): Pattern<V> {
  return {
    kind: "con",
    con: typeof con === "string" ? parseQualified(con) : con,
    args,
  };
}

export function stringPattern<V = never>(value: string): Pattern<V> {
  return { kind: "string", value };
}

export function intPattern<V = never>(value: number | bigint): Pattern<V> {
  return { kind: "int", value: BigInt(value) };
}

export function floatPattern<V = never>(value: number): Pattern<V> {
  return { kind: "float", value };
}

// ============================================
// Traversal
// ============================================

/**
 * Rename the variables a pattern declares.
 */
export function mapPattern<V, W>(pattern: Pattern<V>, f: (value: V) => W): Pattern<W> {
  switch (pattern.kind) {
    case "var":
      return varPattern(f(pattern.value));
    case "con":
      return conPattern(
        pattern.con,
        pattern.args.map((arg) => mapPattern(arg, f))
      );
    case "wildcard":
    case "string":
    case "int":
    case "float":
      return pattern;
  }
}

/**
 * Fold over the variables a pattern declares, left to right.
 */
export function foldPattern<V, A>(
  pattern: Pattern<V>,
  f: (acc: A, value: V) => A,
  initial: A
): A {
  switch (pattern.kind) {
    case "var":
      return f(initial, pattern.value);
    case "con":
      return pattern.args.reduce(
        (acc: A, arg) => foldPattern(arg, f, acc),
        initial
      );
    case "wildcard":
    case "string":
    case "int":
    case "float":
      return initial;
  }
}

/**
 * The distinct indices a pattern declares, in ascending numeric order.
 */
export function patternIndices(pattern: Pattern<number>): number[] {
  const seen = foldPattern(
    pattern,
    (acc: Set<number>, index) => acc.add(index),
    new Set<number>()
  );
  return [...seen].sort((a, b) => a - b);
}
