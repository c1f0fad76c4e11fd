/**
 * Pretty - renders expressions and definitions as Elm source.
 *
 * Main entry point for printing.
 */

import { Definition } from "../ast/definition";
import { Expression, freeVariables } from "../ast/expression";
import { Type } from "../ast/type";
import { Environment } from "./environment";
import { PrettyOptions, resolveOptions } from "./options";
import { PREC } from "./precedence";
import { PrintContext, printExpr } from "./print-expr";
import { printDefinition } from "./print-decl";
import { printType } from "./print-type";

function rootContext<V>(env: Environment<V>, options: PrettyOptions): PrintContext<V> {
  return {
    env,
    parentPrecedence: PREC.LOWEST,
    config: resolveOptions(options),
  };
}

/**
 * Print a closed expression.
 */
export function prettyExpression(
  expr: Expression<never>,
  options: PrettyOptions = {}
): string {
  return printExpr(expr, rootContext(Environment.empty(), options));
}

/**
 * Print an expression with free variables, naming them with `show`.
 * Binders are named around those names, never with them.
 */
export function prettyOpenExpression<V>(
  expr: Expression<V>,
  show: (v: V) => string,
  options: PrettyOptions = {}
): string {
  const reserved = freeVariables(expr).map(show);
  return printExpr(expr, rootContext(Environment.open(show, reserved), options));
}

export function prettyType(type: Type<never>, options: PrettyOptions = {}): string {
  return printType(type, PREC.LOWEST, resolveOptions(options));
}

export function prettyDefinition(
  def: Definition,
  options: PrettyOptions = {}
): string {
  return printDefinition(def, rootContext(Environment.empty(), options));
}

/**
 * Print definitions one after another, separated by two blank lines.
 */
export function prettyModule(
  defs: readonly Definition[],
  options: PrettyOptions = {}
): string {
  return defs.map((def) => prettyDefinition(def, options)).join("\n\n\n");
}
