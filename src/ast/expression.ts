/**
 * Expression Core - the expression tree of the target language.
 *
 * `Expression<V>` is parameterised by the type of its free variables.
 * Binders (`let`, lambda, `case` branches) hold a `Scope` whose body ranges
 * over `Bound<B, V>`, so bound and free variables can never be confused.
 * Closed top-level trees use `Expression<never>`.
 *
 * Trees are never mutated; every operation here builds a new tree.
 */

import { Field, Qualified, parseQualified } from "./name";
import { Pattern } from "./pattern";
import {
  Bound,
  Scope,
  Scope1,
  ScopeN,
  bound,
  free,
  toScope,
} from "./scope";
import { InternalError, assertNever } from "../errors";

export type Expression<V> =
  | { kind: "var"; value: V }
  | { kind: "global"; name: Qualified }
  | { kind: "app"; fn: Expression<V>; arg: Expression<V> }
  | { kind: "let"; value: Expression<V>; scope: Scope1<V> }
  | { kind: "lam"; scope: Scope1<V> }
  | { kind: "record"; fields: readonly RecordField<V>[] }
  | { kind: "proj"; field: Field }
  | { kind: "case"; scrutinee: Expression<V>; branches: readonly Branch<V>[] }
  | { kind: "list"; elements: readonly Expression<V>[] }
  | { kind: "string"; value: string }
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number };

export type RecordField<V> = {
  field: Field;
  value: Expression<V>;
};

export type Branch<V> = {
  pattern: Pattern<number>;
  scope: ScopeN<V>;
};

export type ExpressionKind = Expression<unknown>["kind"];

// ============================================
// Constructors
// ============================================

export function varExpr<V>(value: V): Expression<V> {
  return { kind: "var", value };
}

/**
 * Reference a global. Accepts the dotted shorthand, e.g. `"Basics.+"`.
 */
export function globalExpr<V = never>(name: Qualified | string): Expression<V> {
  return {
    kind: "global",
    name: typeof name === "string" ? parseQualified(name) : name,
  };
}

export function appExpr<V>(fn: Expression<V>, arg: Expression<V>): Expression<V> {
  return { kind: "app", fn, arg };
}

export function letExpr<V>(value: Expression<V>, scope: Scope1<V>): Expression<V> {
  return { kind: "let", value, scope };
}

export function lamExpr<V>(scope: Scope1<V>): Expression<V> {
  return { kind: "lam", scope };
}

export function recordExpr<V>(
  fields: readonly (readonly [Field, Expression<V>])[]
): Expression<V> {
  return {
    kind: "record",
    fields: fields.map(([field, value]) => ({ field, value })),
  };
}

export function projExpr<V = never>(field: Field): Expression<V> {
  return { kind: "proj", field };
}

export function caseExpr<V>(
  scrutinee: Expression<V>,
  branches: readonly (readonly [Pattern<number>, ScopeN<V>])[]
): Expression<V> {
  return {
    kind: "case",
    scrutinee,
    branches: branches.map(([pattern, scope]) => ({ pattern, scope })),
  };
}

export function listExpr<V>(elements: readonly Expression<V>[]): Expression<V> {
  return { kind: "list", elements };
}

export function stringExpr<V = never>(value: string): Expression<V> {
  return { kind: "string", value };
}

/**
 * Integer literals are stored as `bigint`; a `number` must be an integer.
 */
export function intExpr<V = never>(value: number | bigint): Expression<V> {
  return { kind: "int", value: BigInt(value) };
}

export function floatExpr<V = never>(value: number): Expression<V> {
  return { kind: "float", value };
}

// ============================================
// Combinators
// ============================================

/**
 * Apply `fn` to each argument in turn: `apps(f, [a, b])` is `(f a) b`.
 */
export function apps<V>(
  fn: Expression<V>,
  args: readonly Expression<V>[]
): Expression<V> {
  return args.reduce((acc, arg) => appExpr(acc, arg), fn);
}

/**
 * `e1 |> e2`
 */
export function pipe<V>(e1: Expression<V>, e2: Expression<V>): Expression<V> {
  return apps(globalExpr<V>("Basics.|>"), [e1, e2]);
}

/**
 * The pair `( e1, e2 )`.
 */
export function tuple<V>(e1: Expression<V>, e2: Expression<V>): Expression<V> {
  return apps(globalExpr<V>("Basics.,"), [e1, e2]);
}

export type Spine<V> = {
  head: Expression<V>;
  args: Expression<V>[];
};

/**
 * Split a chain of applications into its head and arguments.
 * A non-application is its own head with no arguments.
 */
export function appsView<V>(expr: Expression<V>): Spine<V> {
  const args: Expression<V>[] = [];
  let head = expr;
  while (head.kind === "app") {
    args.push(head.arg);
    head = head.fn;
  }
  args.reverse();
  return { head, args };
}

// ============================================
// Substitution
// ============================================

/**
 * Replace every free variable `v` with `f(v)`.
 *
 * Scopes are entered with `f` lifted past the binder: the scope's own
 * placeholders stay placeholders, and whatever `f` returns is shifted so its
 * variables are free with respect to the scope.
 */
export function substitute<V, W>(
  expr: Expression<V>,
  f: (v: V) => Expression<W>
): Expression<W> {
  switch (expr.kind) {
    case "var":
      return f(expr.value);

    case "global":
    case "proj":
    case "string":
    case "int":
    case "float":
      return expr;

    case "app":
      return appExpr(substitute(expr.fn, f), substitute(expr.arg, f));

    case "let":
      return letExpr(
        substitute(expr.value, f),
        substituteScope(expr.scope, f)
      );

    case "lam":
      return lamExpr(substituteScope(expr.scope, f));

    case "record":
      return {
        kind: "record",
        fields: expr.fields.map(({ field, value }) => ({
          field,
          value: substitute(value, f),
        })),
      };

    case "case":
      return {
        kind: "case",
        scrutinee: substitute(expr.scrutinee, f),
        branches: expr.branches.map(({ pattern, scope }) => ({
          pattern,
          scope: substituteScope(scope, f),
        })),
      };

    case "list":
      return listExpr(expr.elements.map((e) => substitute(e, f)));

    default:
      return assertNever(expr, "substitute");
  }
}

/**
 * Substitute the free variables of a scope.
 */
export function substituteScope<B, V, W>(
  scope: Scope<B, V>,
  f: (v: V) => Expression<W>
): Scope<B, W> {
  return toScope(
    substitute(scope.body, (v): Expression<Bound<B, W>> =>
      v.kind === "bound"
        ? varExpr<Bound<B, W>>(bound(v.index))
        : mapVariables(f(v.value), (w): Bound<B, W> => free(w))
    )
  );
}

/**
 * Rename free variables.
 */
export function mapVariables<V, W>(
  expr: Expression<V>,
  f: (v: V) => W
): Expression<W> {
  return substitute(expr, (v) => varExpr(f(v)));
}

/**
 * Fold over free variable occurrences, left to right.
 * Placeholders bound inside the tree are not visited.
 */
export function foldVariables<V, A>(
  expr: Expression<V>,
  f: (acc: A, v: V) => A,
  initial: A
): A {
  switch (expr.kind) {
    case "var":
      return f(initial, expr.value);

    case "global":
    case "proj":
    case "string":
    case "int":
    case "float":
      return initial;

    case "app":
      return foldVariables(expr.arg, f, foldVariables(expr.fn, f, initial));

    case "let":
      return foldScope(expr.scope, f, foldVariables(expr.value, f, initial));

    case "lam":
      return foldScope(expr.scope, f, initial);

    case "record":
      return expr.fields.reduce(
        (acc: A, { value }) => foldVariables(value, f, acc),
        initial
      );

    case "case":
      return expr.branches.reduce(
        (acc: A, { scope }) => foldScope(scope, f, acc),
        foldVariables(expr.scrutinee, f, initial)
      );

    case "list":
      return expr.elements.reduce(
        (acc: A, e) => foldVariables(e, f, acc),
        initial
      );

    default:
      return assertNever(expr, "substitute");
  }
}

function foldScope<B, V, A>(
  scope: Scope<B, V>,
  f: (acc: A, v: V) => A,
  initial: A
): A {
  return foldVariables(
    scope.body,
    (acc: A, v: Bound<B, V>) => (v.kind === "free" ? f(acc, v.value) : acc),
    initial
  );
}

/**
 * Free variable occurrences, left to right, duplicates included.
 */
export function freeVariables<V>(expr: Expression<V>): V[] {
  return foldVariables(
    expr,
    (acc: V[], v) => {
      acc.push(v);
      return acc;
    },
    []
  );
}

/**
 * The same tree at `Expression<never>`, or undefined if it has free variables.
 */
export function closed<V>(expr: Expression<V>): Expression<never> | undefined {
  const vars = freeVariables(expr);
  if (vars.length > 0) {
    return undefined;
  }
  return mapVariables(expr, (v): never => {
    throw new InternalError(`Free variable ${String(v)} in a closed tree`, "substitute");
  });
}

// ============================================
// Scopes
// ============================================

/**
 * Close over the free variables `f` assigns an index to.
 */
export function abstract<B, V>(
  expr: Expression<V>,
  f: (v: V) => B | undefined
): Scope<B, V> {
  return toScope(
    mapVariables(expr, (v): Bound<B, V> => {
      const index = f(v);
      return index === undefined ? free(v) : bound(index);
    })
  );
}

/**
 * Close over a single variable.
 */
export function abstract1<V>(
  expr: Expression<V>,
  variable: V,
  equals: (a: V, b: V) => boolean = Object.is
): Scope1<V> {
  return abstract(expr, (v): 0 | undefined =>
    equals(v, variable) ? 0 : undefined
  );
}

/**
 * Open a scope by replacing each placeholder with `f(index)`.
 */
export function instantiate<B, V>(
  scope: Scope<B, V>,
  f: (index: B) => Expression<V>
): Expression<V> {
  return substitute(scope.body, (v) =>
    v.kind === "bound" ? f(v.index) : varExpr(v.value)
  );
}

export function instantiate1<V>(
  scope: Scope1<V>,
  value: Expression<V>
): Expression<V> {
  return instantiate(scope, () => value);
}

/**
 * The distinct placeholder indices a scope's body refers to, ascending.
 */
export function boundIndices<V>(scope: ScopeN<V>): number[] {
  const seen = foldVariables(
    scope.body,
    (acc: Set<number>, v) => (v.kind === "bound" ? acc.add(v.index) : acc),
    new Set<number>()
  );
  return [...seen].sort((a, b) => a - b);
}
