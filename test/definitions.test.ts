import { describe, it, expect } from "vitest";
import {
  aliasDef,
  appExpr,
  constantDef,
  funType,
  funTypes,
  globalExpr,
  intExpr,
  prettyDefinition,
  prettyModule,
  prettyType,
  recordType,
  typeApp,
  typeApps,
  typeDef,
  typeGlobal,
  varExpr,
} from "../src/index";
import { binop, close, lam } from "./helpers";

const int = typeGlobal("Basics.Int");
const float = typeGlobal("Basics.Float");
const string = typeGlobal("String.String");

describe("prettyType", () => {
  it("prints arrows right-associated", () => {
    expect(prettyType(funTypes([int, int], int))).toBe("Int -> Int -> Int");
    expect(prettyType(funType(funType(int, int), int))).toBe("(Int -> Int) -> Int");
  });

  it("parenthesises applied type arguments", () => {
    const maybeInt = typeApp(typeGlobal("Maybe.Maybe"), int);
    expect(prettyType(typeApp(typeGlobal("List.List"), maybeInt))).toBe("List (Maybe Int)");
    expect(prettyType(typeApps(typeGlobal("Result.Result"), [string, int]))).toBe(
      "Result String Int"
    );
  });

  it("prints record types", () => {
    expect(prettyType(recordType([["name", string], ["age", int]]))).toBe(
      "{ name : String, age : Int }"
    );
    expect(prettyType(recordType([]))).toBe("{}");
  });

  it("qualifies types outside the default imports", () => {
    expect(prettyType(typeGlobal("Dict.Dict"))).toBe("Dict.Dict");
  });
});

describe("prettyDefinition", () => {
  it("turns leading lambdas into parameters", () => {
    const body = close(lam("x", lam("y", binop("Basics.+", varExpr("x"), varExpr("y")))));
    const def = constantDef("add", funTypes([int, int], int), body);
    expect(prettyDefinition(def)).toBe("add : Int -> Int -> Int\nadd a b =\n    a + b");
  });

  it("prints a constant without parameters", () => {
    expect(prettyDefinition(constantDef("zero", int, intExpr(0)))).toBe(
      "zero : Int\nzero =\n    0"
    );
  });

  it("indents a multi-line body under the equation", () => {
    const body = close(
      lam("x", binop("Basics.|>", varExpr("x"), globalExpr("List.sum")))
    );
    const def = constantDef(
      "total",
      funType(typeApp(typeGlobal("List.List"), int), int),
      body
    );
    expect(prettyDefinition(def)).toBe(
      "total : List Int -> Int\ntotal a =\n    a |>\n        List.sum"
    );
  });

  it("prints a union type one constructor per line", () => {
    const def = typeDef("Shape", [
      ["Circle", [float]],
      ["Rect", [float, float]],
      ["Items", [typeApp(typeGlobal("List.List"), string)]],
      ["Empty", []],
    ]);
    expect(prettyDefinition(def)).toBe(
      "type Shape\n    = Circle Float\n    | Rect Float Float\n    | Items (List String)\n    | Empty"
    );
  });

  it("prints a type alias", () => {
    const def = aliasDef("Point", recordType([["x", float], ["y", float]]));
    expect(prettyDefinition(def)).toBe("type alias Point =\n    { x : Float, y : Float }");
  });

  it("uses the module-local name of a qualified definition", () => {
    const def = constantDef("Main.main", string, appExpr(globalExpr("String.fromInt"), intExpr(1)));
    expect(prettyDefinition(def)).toBe("main : String\nmain =\n    String.fromInt 1");
  });
});

describe("prettyModule", () => {
  it("separates definitions with two blank lines", () => {
    const defs = [
      constantDef("zero", int, intExpr(0)),
      aliasDef("Name", string),
    ];
    expect(prettyModule(defs)).toBe(
      "zero : Int\nzero =\n    0\n\n\ntype alias Name =\n    String"
    );
  });
});
