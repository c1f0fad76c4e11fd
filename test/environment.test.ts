import { describe, it, expect } from "vitest";
import {
  Environment,
  InternalError,
  bound,
  conPattern,
  free,
  freshName,
  varPattern,
  wildcardPattern,
} from "../src/index";

describe("freshName", () => {
  it("starts with the single letters", () => {
    expect(freshName(0)).toBe("a");
    expect(freshName(1)).toBe("b");
    expect(freshName(25)).toBe("z");
  });

  it("continues with numbered letters", () => {
    expect(freshName(26)).toBe("a0");
    expect(freshName(27)).toBe("b0");
    expect(freshName(51)).toBe("z0");
    expect(freshName(52)).toBe("a1");
    expect(freshName(26 * 11)).toBe("a10");
  });

  it("never repeats a name", () => {
    const names = Array.from({ length: 26 * 5 }, (_, i) => freshName(i));
    expect(new Set(names).size).toBe(names.length);
  });

  it("rejects positions outside the supply", () => {
    expect(() => freshName(-1)).toThrow(InternalError);
    expect(() => freshName(1.5)).toThrow(InternalError);
  });
});

describe("Environment", () => {
  it("names a binder with the next fresh name", () => {
    const [env, name] = Environment.empty().extend();
    expect(name).toBe("a");
    expect(env.lookup(bound<0>(0))).toBe("a");
  });

  it("resolves outer binders through nested scopes", () => {
    const [outer] = Environment.empty().extend();
    const [inner, name] = outer.extend();
    expect(name).toBe("b");
    expect(inner.lookup(bound<0>(0))).toBe("b");
    expect(inner.lookup(free(bound<0>(0)))).toBe("a");
  });

  it("leaves the parent usable after extending", () => {
    const root = Environment.empty();
    const [, first] = root.extend();
    const [, second] = root.extend();
    expect(first).toBe("a");
    expect(second).toBe("a");
  });

  it("names free variables with the supplied function", () => {
    const root = Environment.open((v: string) => v.toUpperCase());
    expect(root.lookup("q")).toBe("Q");
    const [env, name] = root.extend();
    expect(name).toBe("a");
    expect(env.lookup(free("q"))).toBe("Q");
  });

  it("skips reserved names", () => {
    const root = Environment.open((v: string) => v, ["a", "c"]);
    const [env, first] = root.extend();
    const [, second] = env.extend();
    expect(first).toBe("b");
    expect(second).toBe("d");
    const branch = root.extendPattern(conPattern("Pair", [varPattern(0), varPattern(1)]));
    expect(branch.lookup(bound(0))).toBe("b");
    expect(branch.lookup(bound(1))).toBe("d");
  });

  it("names pattern indices in ascending order", () => {
    const pattern = conPattern("Pair", [varPattern(3), varPattern(1)]);
    const env = Environment.empty().extendPattern(pattern);
    expect(env.lookup(bound(1))).toBe("a");
    expect(env.lookup(bound(3))).toBe("b");
  });

  it("continues the supply after a pattern", () => {
    const [outer] = Environment.empty().extend();
    const branch = outer.extendPattern(conPattern("Maybe.Just", [varPattern(0)]));
    expect(branch.lookup(bound(0))).toBe("b");
    const [, next] = branch.extend();
    expect(next).toBe("c");
  });

  it("binds nothing for a pattern without variables", () => {
    const env = Environment.empty().extendPattern(wildcardPattern());
    const [, next] = env.extend();
    expect(next).toBe("a");
  });

  it("reports an index the pattern does not declare", () => {
    const env = Environment.empty().extendPattern(
      conPattern("Pair", [varPattern(1), varPattern(3)])
    );
    let caught: unknown;
    try {
      env.lookup(bound(2));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(InternalError);
    if (caught instanceof InternalError) {
      expect(caught.message).toBe("Unbound pattern variable 2");
      expect(caught.site).toBe("environment");
      expect(caught.notes).toEqual(["the pattern declares [1, 3]"]);
    }
  });
});
