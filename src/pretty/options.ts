/**
 * Printer options.
 */

import {
  ELM_FIXITIES,
  FixityTable,
  TWO_LINE_OPERATORS,
} from "./precedence";
import { DEFAULT_IMPORTS, DEFAULT_OPEN_MODULES, NameConfig } from "./names";

export type PrettyOptions = {
  /** Indentation unit (default: four spaces) */
  indent?: string;
  /** Operator fixities used for infix printing (default: Elm's operators) */
  fixities?: FixityTable;
  /** Operators whose right operand starts a new line (default: `>>`, `<<`, `|>`, `<|`) */
  twoLineOperators?: ReadonlySet<string>;
  /** Modules imported unqualified in full (default: `Basics`) */
  openModules?: readonly string[];
  /** Qualified names printed unqualified (default: Elm's default imports) */
  defaultImports?: ReadonlyMap<string, string>;
};

export type PrettyConfig = NameConfig & {
  indent: string;
  fixities: FixityTable;
  twoLineOperators: ReadonlySet<string>;
};

export function resolveOptions(options: PrettyOptions = {}): PrettyConfig {
  return {
    indent: options.indent ?? "    ",
    fixities: options.fixities ?? ELM_FIXITIES,
    twoLineOperators: options.twoLineOperators ?? TWO_LINE_OPERATORS,
    openModules: options.openModules ?? DEFAULT_OPEN_MODULES,
    defaultImports: options.defaultImports ?? DEFAULT_IMPORTS,
  };
}
