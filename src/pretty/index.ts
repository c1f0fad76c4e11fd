/**
 * Pretty module - renders the syntax trees as Elm source.
 *
 * Public exports for the printing phase.
 */

export {
  prettyExpression,
  prettyOpenExpression,
  prettyType,
  prettyDefinition,
  prettyModule,
} from "./pretty";
export type { PrettyOptions, PrettyConfig } from "./options";
export { resolveOptions } from "./options";
export { Environment, freshName } from "./environment";
export {
  PREC,
  ELM_FIXITIES,
  TWO_LINE_OPERATORS,
  operandPrecedence,
} from "./precedence";
export type { Fixity, FixityTable, Associativity } from "./precedence";
export { DEFAULT_IMPORTS, DEFAULT_OPEN_MODULES, printQualified } from "./names";
export { printExpr, printExprPrec } from "./print-expr";
export type { PrintContext } from "./print-expr";
export { printPattern } from "./print-pattern";
export { printType } from "./print-type";
export { printDefinition } from "./print-decl";
export { CodeBuilder } from "./code-builder";
