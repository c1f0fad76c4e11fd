/**
 * Pattern printing.
 */

import { Pattern } from "../ast/pattern";
import { Bound, bound } from "../ast/scope";
import { NameConfig, printQualified } from "./names";
import { Environment } from "./environment";
import { PREC } from "./precedence";
import { parensWhen } from "./code-builder";
import { printLiteral } from "./print-expr";

/**
 * Print a branch pattern. `env` must come from `extendPattern` on this very
 * pattern, so every variable it declares has a name.
 */
export function printPattern<V>(
  pattern: Pattern<number>,
  env: Environment<Bound<number, V>>,
  precedence: number,
  config: NameConfig
): string {
  switch (pattern.kind) {
    case "var":
      return env.lookup(bound(pattern.value));

    case "wildcard":
      return "_";

    case "con": {
      const con = printQualified(pattern.con, config);
      if (pattern.args.length === 0) {
        return con;
      }
      const args = pattern.args.map((arg) =>
        printPattern(arg, env, PREC.ARGUMENT, config)
      );
      return parensWhen(
        precedence > PREC.APPLICATION,
        `${con} ${args.join(" ")}`
      );
    }

    case "string":
    case "int":
    case "float":
      return printLiteral(pattern);
  }
}
