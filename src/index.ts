/**
 * Expression IR and pretty-printer for generating Elm source.
 */

// Names
export {
  qualified,
  parseQualified,
  showQualified,
  compareQualified,
  qualifiedEqual,
  isSymbolic,
} from "./ast/name";
export type { Local, Field, Constructor, Qualified } from "./ast/name";

// Patterns, types and definitions
export {
  varPattern,
  wildcardPattern,
  conPattern,
  stringPattern,
  intPattern,
  floatPattern,
  mapPattern,
  foldPattern,
  patternIndices,
} from "./ast/pattern";
export type { Pattern } from "./ast/pattern";
export {
  typeVar,
  typeGlobal,
  typeApp,
  typeApps,
  funType,
  funTypes,
  recordType,
} from "./ast/type";
export type { Type, RecordFieldType } from "./ast/type";
export { constantDef, typeDef, aliasDef } from "./ast/definition";
export type { Definition, ConstructorDef } from "./ast/definition";

// Expression core
export {
  varExpr,
  globalExpr,
  appExpr,
  letExpr,
  lamExpr,
  recordExpr,
  projExpr,
  caseExpr,
  listExpr,
  stringExpr,
  intExpr,
  floatExpr,
  apps,
  pipe,
  tuple,
  appsView,
  substitute,
  substituteScope,
  mapVariables,
  foldVariables,
  freeVariables,
  closed,
  abstract,
  abstract1,
  instantiate,
  instantiate1,
  boundIndices,
} from "./ast/expression";
export type {
  Expression,
  ExpressionKind,
  RecordField,
  Branch,
  Spine,
} from "./ast/expression";
export { bound, free, unvar, toScope, fromScope } from "./ast/scope";
export type { Bound, Scope, Scope1, ScopeN } from "./ast/scope";
export {
  compareExpressions,
  expressionsEqual,
  comparePatterns,
  showExpression,
  showPattern,
  compareBound,
  showBound,
  compareNever,
  compareNumbers,
  compareIntegers,
  compareStrings,
  showNever,
} from "./ast/instances";
export type { Compare, Show } from "./ast/instances";

// Errors
export { InternalError, absurd } from "./errors";
export type { InternalErrorSite } from "./errors";

// Printing
export * from "./pretty";
