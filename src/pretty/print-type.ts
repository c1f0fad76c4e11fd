/**
 * Type printing for signatures and type definitions.
 */

import { Type } from "../ast/type";
import { absurd } from "../errors";
import { NameConfig, printQualified } from "./names";
import { PREC } from "./precedence";
import { delimited, parensWhen } from "./code-builder";

export function printType(
  type: Type<never>,
  precedence: number,
  config: NameConfig
): string {
  switch (type.kind) {
    case "var":
      return absurd(type.value);

    case "global":
      return printQualified(type.name, config);

    case "app":
      return parensWhen(
        precedence > PREC.APPLICATION,
        `${printType(type.fn, PREC.APPLICATION, config)} ${printType(type.arg, PREC.ARGUMENT, config)}`
      );

    // Arrows associate to the right.
    case "fun":
      return parensWhen(
        precedence > PREC.FUNCTION_TYPE,
        `${printType(type.from, PREC.FUNCTION_TYPE + 1, config)} -> ${printType(type.to, PREC.FUNCTION_TYPE, config)}`
      );

    case "record":
      return delimited(
        "{",
        "}",
        type.fields.map(
          ({ field, type: fieldType }) =>
            `${field} : ${printType(fieldType, PREC.LOWEST, config)}`
        )
      );
  }
}
