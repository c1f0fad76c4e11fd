/**
 * Display forms for qualified names.
 *
 * Elm imports a handful of names into every module; those print unqualified.
 */

import { Qualified, isSymbolic, showQualified } from "../ast/name";

/**
 * Modules whose every export is in scope unqualified.
 */
export const DEFAULT_OPEN_MODULES: readonly string[] = ["Basics"];

/**
 * Individual default imports, keyed by dotted qualified name.
 */
export const DEFAULT_IMPORTS: ReadonlyMap<string, string> = new Map([
  ["List.List", "List"],
  ["List.::", "::"],
  ["Maybe.Maybe", "Maybe"],
  ["Maybe.Nothing", "Nothing"],
  ["Maybe.Just", "Just"],
  ["Result.Result", "Result"],
  ["Result.Ok", "Ok"],
  ["Result.Err", "Err"],
  ["String.String", "String"],
  ["Char.Char", "Char"],
]);

export type NameConfig = {
  openModules: readonly string[];
  defaultImports: ReadonlyMap<string, string>;
};

/**
 * The unqualified name a default import makes available, if any.
 */
export function defaultImport(name: Qualified, config: NameConfig): string | undefined {
  if (name.module.length === 1 && config.openModules.includes(name.module[0])) {
    return name.name;
  }
  return config.defaultImports.get(showQualified(name));
}

export function printQualified(name: Qualified, config: NameConfig): string {
  return defaultImport(name, config) ?? showQualified(name);
}

/**
 * A name in function position: operators are wrapped in parentheses.
 */
export function printPrefix(name: Qualified, config: NameConfig): string {
  return isSymbolic(name.name)
    ? `(${printQualified(name, config)})`
    : printQualified(name, config);
}
