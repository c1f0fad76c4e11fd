/**
 * Definition printing.
 */

import { ConstructorDef, Definition } from "../ast/definition";
import { assertNever } from "../errors";
import { CodeBuilder } from "./code-builder";
import { PREC } from "./precedence";
import { PrintContext, collectLambdas } from "./print-expr";
import { printType } from "./print-type";

export function printDefinition(def: Definition, ctx: PrintContext<never>): string {
  switch (def.kind) {
    case "constant":
      return printConstant(def, ctx);

    case "type":
      return printUnionType(def.name.name, def.constructors, ctx);

    case "alias":
      return new CodeBuilder(ctx.config.indent)
        .nested(
          `type alias ${def.name.name} =`,
          printType(def.type, PREC.LOWEST, ctx.config)
        )
        .build();

    default:
      return assertNever(def, "print");
  }
}

/**
 * ```
 * name : Type
 * name a b =
 *     body
 * ```
 *
 * Leading lambdas of the body become the equation's parameters.
 */
function printConstant(
  def: Extract<Definition, { kind: "constant" }>,
  ctx: PrintContext<never>
): string {
  const name = def.name.name;
  const { names, body } = collectLambdas(def.body, ctx);
  const lhs = [name, ...names].join(" ");
  return new CodeBuilder(ctx.config.indent)
    .writeLine(`${name} : ${printType(def.type, PREC.LOWEST, ctx.config)}`)
    .nested(`${lhs} =`, body)
    .build();
}

/**
 * ```
 * type Name
 *     = A t
 *     | B
 * ```
 */
function printUnionType(
  name: string,
  constructors: readonly ConstructorDef[],
  ctx: PrintContext<never>
): string {
  const alternatives = constructors.map(({ name: con, fields }, i) => {
    const args = fields.map((field) => printType(field, PREC.ARGUMENT, ctx.config));
    return `${i === 0 ? "=" : "|"} ${[con, ...args].join(" ")}`;
  });
  return new CodeBuilder(ctx.config.indent)
    .nested(`type ${name}`, alternatives.join("\n"))
    .build();
}
