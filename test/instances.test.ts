import { describe, it, expect } from "vitest";
import {
  Expression,
  appExpr,
  bound,
  caseExpr,
  compareBound,
  compareExpressions,
  compareIntegers,
  compareNever,
  compareNumbers,
  comparePatterns,
  compareStrings,
  conPattern,
  expressionsEqual,
  floatExpr,
  free,
  globalExpr,
  intExpr,
  intPattern,
  listExpr,
  projExpr,
  recordExpr,
  showExpression,
  showNever,
  showPattern,
  stringExpr,
  varExpr,
  varPattern,
  wildcardPattern,
} from "../src/index";
import { branch, close, lam, letIn } from "./helpers";

const x = varExpr("x");
const y = varExpr("y");
const z = varExpr("z");
const id = (s: string) => s;

describe("compareExpressions", () => {
  it("orders by variant first", () => {
    const items: Expression<string>[] = [
      stringExpr("b"),
      floatExpr(1),
      z,
      intExpr(3),
      globalExpr("a"),
    ];
    const sorted = items.sort((a, b) => compareExpressions(a, b, compareStrings));
    expect(sorted.map((e) => e.kind)).toEqual(["var", "global", "string", "int", "float"]);
  });

  it("orders variables by the supplied comparison", () => {
    expect(compareExpressions(x, y, compareStrings)).toBeLessThan(0);
    expect(compareExpressions(y, x, compareStrings)).toBeGreaterThan(0);
  });

  it("compares applications function first", () => {
    const a = appExpr(x, z);
    const b = appExpr(y, x);
    expect(compareExpressions(a, b, compareStrings)).toBeLessThan(0);
  });

  it("compares lists lexicographically", () => {
    const short = listExpr([intExpr<string>(1)]);
    const long = listExpr([intExpr<string>(1), intExpr<string>(2)]);
    expect(compareExpressions(short, long, compareStrings)).toBeLessThan(0);
    expect(compareExpressions(long, listExpr([intExpr<string>(2)]), compareStrings)).toBeLessThan(0);
  });

  it("compares records field by field", () => {
    const a = recordExpr([["a", intExpr<string>(2)]]);
    const b = recordExpr([["b", intExpr<string>(1)]]);
    expect(compareExpressions(a, b, compareStrings)).toBeLessThan(0);
  });

  it("places binder placeholders before free variables", () => {
    expect(compareExpressions(lam("x", x), lam("x", y), compareStrings)).toBeLessThan(0);
    const order = compareBound(compareNumbers, compareStrings);
    expect(order(bound(5), free("a"))).toBe(-1);
    expect(order(free("a"), bound(0))).toBe(1);
  });
});

describe("numeric literals", () => {
  it("places NaN after every other float and equal only to itself", () => {
    expect(expressionsEqual(floatExpr(NaN), floatExpr(5), compareNever)).toBe(false);
    expect(expressionsEqual(floatExpr(NaN), floatExpr(NaN), compareNever)).toBe(true);
    expect(compareNumbers(NaN, 1)).toBe(1);
    expect(compareNumbers(1, NaN)).toBe(-1);
    expect([NaN, 2, 1].sort(compareNumbers)).toEqual([1, 2, NaN]);
  });

  it("compares integers beyond double precision exactly", () => {
    const above = intExpr(9007199254740993n);
    const below = intExpr(9007199254740992n);
    expect(compareExpressions(above, below, compareNever)).toBeGreaterThan(0);
    expect(compareIntegers(9007199254740993n, 9007199254740992n)).toBe(1);
  });

  it("stores a number and a bigint of the same value alike", () => {
    expect(expressionsEqual(intExpr(7), intExpr(7n), compareNever)).toBe(true);
    expect(showExpression(intExpr(9007199254740993n), showNever)).toBe("Int 9007199254740993");
  });
});

describe("expressionsEqual", () => {
  it("ignores the names binders had", () => {
    expect(expressionsEqual(lam("x", x), lam("y", y), compareStrings)).toBe(true);
    expect(
      expressionsEqual(lam("x", appExpr(x, z)), lam("y", appExpr(y, z)), compareStrings)
    ).toBe(true);
    expect(
      expressionsEqual(letIn("a", z, varExpr("a")), letIn("b", z, varExpr("b")), compareStrings)
    ).toBe(true);
  });

  it("distinguishes bound from free occurrences", () => {
    expect(expressionsEqual(lam("x", x), lam("y", x), compareStrings)).toBe(false);
  });

  it("compares case branches by pattern and body", () => {
    const justX = branch(conPattern("Maybe.Just", [varPattern("x")]), x);
    const justY = branch(conPattern("Maybe.Just", [varPattern("y")]), y);
    const other = branch(wildcardPattern(), z);
    expect(
      expressionsEqual(caseExpr(z, [justX, other]), caseExpr(z, [justY, other]), compareStrings)
    ).toBe(true);
    expect(
      expressionsEqual(caseExpr(z, [justX]), caseExpr(z, [other]), compareStrings)
    ).toBe(false);
  });

  it("works on closed trees", () => {
    const a = close(lam("f", lam("x", appExpr(varExpr("f"), x))));
    const b = close(lam("g", lam("y", appExpr(varExpr("g"), y))));
    expect(expressionsEqual(a, b, () => 0)).toBe(true);
  });
});

describe("comparePatterns", () => {
  it("orders by variant then contents", () => {
    expect(comparePatterns(varPattern(0), wildcardPattern(), compareNumbers)).toBeLessThan(0);
    expect(comparePatterns(intPattern(1), intPattern(2), compareNumbers)).toBeLessThan(0);
    expect(
      comparePatterns(
        conPattern("Maybe.Just", [varPattern(0)]),
        conPattern("Maybe.Just", [varPattern(0)]),
        compareNumbers
      )
    ).toBe(0);
  });
});

describe("showExpression", () => {
  it("parenthesises nested constructors and negative numbers", () => {
    const e = appExpr<never>(globalExpr("f"), intExpr(-1));
    expect(showExpression(e, showNever)).toBe('App (Global "f") (Int (-1))');
  });

  it("shows placeholders and free variables inside scopes", () => {
    expect(showExpression(close(lam("x", x)), showNever)).toBe("Lam (Scope (Var (B 0)))");
    expect(showExpression(lam("x", appExpr(x, y)), id)).toBe(
      "Lam (Scope (App (Var (B 0)) (Var (F y))))"
    );
  });

  it("shows records, projections and lists", () => {
    expect(showExpression(recordExpr<never>([["a", intExpr(1)]]), showNever)).toBe(
      'Record [("a", Int 1)]'
    );
    expect(showExpression(projExpr("name"), showNever)).toBe('Proj "name"');
    expect(showExpression(listExpr<never>([stringExpr("a"), floatExpr(1.5)]), showNever)).toBe(
      'List [String "a", Float 1.5]'
    );
  });

  it("shows case branches with their patterns", () => {
    const e = caseExpr(x, [branch(conPattern("Maybe.Just", [varPattern("y")]), y)]);
    expect(showExpression(e, id)).toBe(
      'Case (Var x) [(Con "Maybe.Just" [Var 0], Scope (Var (B 0)))]'
    );
  });

  it("shows let bindings", () => {
    const e = close(letIn("a", intExpr(1), varExpr("a")));
    expect(showExpression(e, showNever)).toBe("Let (Int 1) (Scope (Var (B 0)))");
  });
});

describe("showPattern", () => {
  it("shows nested constructor patterns", () => {
    const p = conPattern("Pair", [varPattern(1), conPattern("Maybe.Nothing")]);
    expect(showPattern(p, String)).toBe('Con "Pair" [Var 1, Con "Maybe.Nothing" []]');
  });
});
