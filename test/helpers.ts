/**
 * Builders that name binders with strings and close over them, so tests can
 * write terms the way a frontend would produce them.
 */

import {
  Expression,
  Pattern,
  ScopeN,
  abstract,
  abstract1,
  apps,
  closed,
  foldPattern,
  globalExpr,
  lamExpr,
  letExpr,
  mapPattern,
} from "../src/index";

export type Term = Expression<string>;

export function lam(name: string, body: Term): Term {
  return lamExpr(abstract1(body, name));
}

export function letIn(name: string, value: Term, body: Term): Term {
  return letExpr(value, abstract1(body, name));
}

/**
 * A case branch whose pattern names its variables; each distinct name
 * becomes an index, in order of first appearance.
 */
export function branch(
  pattern: Pattern<string>,
  body: Term
): [Pattern<number>, ScopeN<string>] {
  const names = foldPattern(
    pattern,
    (acc: string[], name) => (acc.includes(name) ? acc : [...acc, name]),
    []
  );
  const indexOf = (name: string): number | undefined => {
    const i = names.indexOf(name);
    return i < 0 ? undefined : i;
  };
  return [
    mapPattern(pattern, (name) => names.indexOf(name)),
    abstract<number, string>(body, indexOf),
  ];
}

/**
 * `left op right` for the operator with the given qualified name.
 */
export function binop(op: string, left: Term, right: Term): Term {
  return apps(globalExpr<string>(op), [left, right]);
}

export function close(term: Term): Expression<never> {
  const result = closed(term);
  if (result === undefined) {
    throw new Error("term has free variables");
  }
  return result;
}
