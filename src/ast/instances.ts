/**
 * Structural ordering, equality and debug text for expressions.
 *
 * Each operation is generic in the free variable type and takes the matching
 * operation for `V` as a dictionary. Entering a scope lifts the dictionary
 * through `Bound`, so the same code compares `Expression<never>`,
 * `Expression<string>` and every scope body in between.
 */

import { compareQualified, compareStrings, showQualified } from "./name";
import { Pattern } from "./pattern";
import { Bound, Scope } from "./scope";
import { Expression, ExpressionKind } from "./expression";
import { InternalError, absurd } from "../errors";

export type Compare<A> = (a: A, b: A) => number;
export type Show<A> = (a: A) => string;

// ============================================
// Dictionaries
// ============================================

export const compareNever: Compare<never> = absurd;
export const showNever: Show<never> = absurd;

/**
 * NaN equals only itself and sorts after every other number.
 */
export function compareNumbers(a: number, b: number): number {
  if (Number.isNaN(a) || Number.isNaN(b)) {
    return Number(Number.isNaN(a)) - Number(Number.isNaN(b));
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareIntegers(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export { compareStrings };

// Scope1 placeholders all carry the index 0.
const compareUnit: Compare<0> = () => 0;

/**
 * Placeholders sort before free variables.
 */
export function compareBound<B, V>(
  compareB: Compare<B>,
  compareV: Compare<V>
): Compare<Bound<B, V>> {
  return (a, b) => {
    if (a.kind === "bound") {
      return b.kind === "bound" ? compareB(a.index, b.index) : -1;
    }
    return b.kind === "free" ? compareV(a.value, b.value) : 1;
  };
}

export function showBound<B, V>(showB: Show<B>, showV: Show<V>): Show<Bound<B, V>> {
  return (v) =>
    v.kind === "bound" ? `B ${showB(v.index)}` : `F ${atom(showV(v.value))}`;
}

// ============================================
// Ordering
// ============================================

const EXPRESSION_KINDS: readonly ExpressionKind[] = [
  "var",
  "global",
  "app",
  "let",
  "lam",
  "record",
  "proj",
  "case",
  "list",
  "string",
  "int",
  "float",
];

const PATTERN_KINDS: readonly Pattern<unknown>["kind"][] = [
  "var",
  "wildcard",
  "con",
  "string",
  "int",
  "float",
];

function orElse(first: number, next: () => number): number {
  return first !== 0 ? first : next();
}

function compareLists<A>(as: readonly A[], bs: readonly A[], compare: Compare<A>): number {
  const length = Math.min(as.length, bs.length);
  for (let i = 0; i < length; i++) {
    const c = compare(as[i], bs[i]);
    if (c !== 0) return c;
  }
  return as.length - bs.length;
}

function compareScopes<B, V>(
  a: Scope<B, V>,
  b: Scope<B, V>,
  compareB: Compare<B>,
  compareV: Compare<V>
): number {
  return compareExpressions(a.body, b.body, compareBound(compareB, compareV));
}

/**
 * A total order on expressions: by variant in declaration order, then by
 * fields left to right. Lists compare lexicographically.
 */
export function compareExpressions<V>(
  a: Expression<V>,
  b: Expression<V>,
  compareV: Compare<V>
): number {
  const byKind = EXPRESSION_KINDS.indexOf(a.kind) - EXPRESSION_KINDS.indexOf(b.kind);
  if (byKind !== 0) return byKind;

  const sub: Compare<Expression<V>> = (x, y) => compareExpressions(x, y, compareV);

  if (a.kind === "var" && b.kind === "var") {
    return compareV(a.value, b.value);
  }
  if (a.kind === "global" && b.kind === "global") {
    return compareQualified(a.name, b.name);
  }
  if (a.kind === "app" && b.kind === "app") {
    return orElse(sub(a.fn, b.fn), () => sub(a.arg, b.arg));
  }
  if (a.kind === "let" && b.kind === "let") {
    return orElse(sub(a.value, b.value), () =>
      compareScopes(a.scope, b.scope, compareUnit, compareV)
    );
  }
  if (a.kind === "lam" && b.kind === "lam") {
    return compareScopes(a.scope, b.scope, compareUnit, compareV);
  }
  if (a.kind === "record" && b.kind === "record") {
    return compareLists(a.fields, b.fields, (x, y) =>
      orElse(compareStrings(x.field, y.field), () => sub(x.value, y.value))
    );
  }
  if (a.kind === "proj" && b.kind === "proj") {
    return compareStrings(a.field, b.field);
  }
  if (a.kind === "case" && b.kind === "case") {
    return orElse(sub(a.scrutinee, b.scrutinee), () =>
      compareLists(a.branches, b.branches, (x, y) =>
        orElse(comparePatterns(x.pattern, y.pattern, compareNumbers), () =>
          compareScopes(x.scope, y.scope, compareNumbers, compareV)
        )
      )
    );
  }
  if (a.kind === "list" && b.kind === "list") {
    return compareLists(a.elements, b.elements, sub);
  }
  if (a.kind === "string" && b.kind === "string") {
    return compareStrings(a.value, b.value);
  }
  if (a.kind === "int" && b.kind === "int") {
    return compareIntegers(a.value, b.value);
  }
  if (a.kind === "float" && b.kind === "float") {
    return compareNumbers(a.value, b.value);
  }
  throw new InternalError(`Cannot compare ${a.kind} with ${b.kind}`, "instances");
}

export function expressionsEqual<V>(
  a: Expression<V>,
  b: Expression<V>,
  compareV: Compare<V>
): boolean {
  return compareExpressions(a, b, compareV) === 0;
}

export function comparePatterns<V>(
  a: Pattern<V>,
  b: Pattern<V>,
  compareV: Compare<V>
): number {
  const byKind = PATTERN_KINDS.indexOf(a.kind) - PATTERN_KINDS.indexOf(b.kind);
  if (byKind !== 0) return byKind;

  if (a.kind === "var" && b.kind === "var") {
    return compareV(a.value, b.value);
  }
  if (a.kind === "con" && b.kind === "con") {
    return orElse(compareQualified(a.con, b.con), () =>
      compareLists(a.args, b.args, (x, y) => comparePatterns(x, y, compareV))
    );
  }
  if (a.kind === "string" && b.kind === "string") {
    return compareStrings(a.value, b.value);
  }
  if (a.kind === "int" && b.kind === "int") {
    return compareIntegers(a.value, b.value);
  }
  if (a.kind === "float" && b.kind === "float") {
    return compareNumbers(a.value, b.value);
  }
  // wildcards
  return 0;
}

// ============================================
// Debug text
// ============================================

// Parenthesise anything that would not read as a single argument.
function atom(text: string): string {
  if (/^[(["{]/.test(text)) return text;
  return /\s/.test(text) || text.startsWith("-") ? `(${text})` : text;
}

function showScope<B, V>(scope: Scope<B, V>, showB: Show<B>, showV: Show<V>): string {
  return `Scope ${atom(showExpression(scope.body, showBound(showB, showV)))}`;
}

/**
 * Constructor-style text for debugging, e.g. `App (Global "f") (Int 1)`.
 */
export function showExpression<V>(expr: Expression<V>, showV: Show<V>): string {
  const sub = (e: Expression<V>) => atom(showExpression(e, showV));

  switch (expr.kind) {
    case "var":
      return `Var ${atom(showV(expr.value))}`;
    case "global":
      return `Global ${JSON.stringify(showQualified(expr.name))}`;
    case "app":
      return `App ${sub(expr.fn)} ${sub(expr.arg)}`;
    case "let":
      return `Let ${sub(expr.value)} (${showScope(expr.scope, String, showV)})`;
    case "lam":
      return `Lam (${showScope(expr.scope, String, showV)})`;
    case "record": {
      const fields = expr.fields.map(
        ({ field, value }) => `(${JSON.stringify(field)}, ${showExpression(value, showV)})`
      );
      return `Record [${fields.join(", ")}]`;
    }
    case "proj":
      return `Proj ${JSON.stringify(expr.field)}`;
    case "case": {
      const branches = expr.branches.map(
        ({ pattern, scope }) =>
          `(${showPattern(pattern, String)}, ${showScope(scope, String, showV)})`
      );
      return `Case ${sub(expr.scrutinee)} [${branches.join(", ")}]`;
    }
    case "list":
      return `List [${expr.elements.map((e) => showExpression(e, showV)).join(", ")}]`;
    case "string":
      return `String ${JSON.stringify(expr.value)}`;
    case "int":
      return `Int ${atom(String(expr.value))}`;
    case "float":
      return `Float ${atom(String(expr.value))}`;
  }
}

export function showPattern<V>(pattern: Pattern<V>, showV: Show<V>): string {
  switch (pattern.kind) {
    case "var":
      return `Var ${atom(showV(pattern.value))}`;
    case "wildcard":
      return "Wildcard";
    case "con": {
      const args = pattern.args.map((p) => showPattern(p, showV));
      return `Con ${JSON.stringify(showQualified(pattern.con))} [${args.join(", ")}]`;
    }
    case "string":
      return `String ${JSON.stringify(pattern.value)}`;
    case "int":
      return `Int ${atom(String(pattern.value))}`;
    case "float":
      return `Float ${atom(String(pattern.value))}`;
  }
}
