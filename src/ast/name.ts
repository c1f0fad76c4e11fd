/**
 * Names used by the syntax trees.
 *
 * Locals, fields and constructors are plain identifiers. Qualified names
 * carry a module path so the printer can decide how to display them.
 */

export type Local = string;
export type Field = string;
export type Constructor = string;

export type Qualified = {
  module: readonly string[];
  name: string;
};

export function qualified(module: readonly string[], name: string): Qualified {
  return { module, name };
}

// Module segments are capitalised identifiers followed by a dot.
const MODULE_SEGMENT = /^([A-Z][A-Za-z0-9_]*)\.(.+)$/s;

/**
 * Parse the dotted shorthand for a qualified name.
 *
 * Leading capitalised segments form the module path; whatever remains is the
 * identifier, so operator names keep their dots: `"Parser.|."` is the
 * operator `|.` in module `Parser`.
 */
export function parseQualified(text: string): Qualified {
  const module: string[] = [];
  let rest = text;
  for (;;) {
    const match = MODULE_SEGMENT.exec(rest);
    if (!match) break;
    module.push(match[1]);
    rest = match[2];
  }
  return { module, name: rest };
}

/**
 * The dotted form of a qualified name, exactly as `parseQualified` reads it.
 */
export function showQualified(name: Qualified): string {
  return [...name.module, name.name].join(".");
}

export function compareQualified(a: Qualified, b: Qualified): number {
  const length = Math.min(a.module.length, b.module.length);
  for (let i = 0; i < length; i++) {
    const c = compareStrings(a.module[i], b.module[i]);
    if (c !== 0) return c;
  }
  if (a.module.length !== b.module.length) {
    return a.module.length - b.module.length;
  }
  return compareStrings(a.name, b.name);
}

export function qualifiedEqual(a: Qualified, b: Qualified): boolean {
  return compareQualified(a, b) === 0;
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * True for operator names such as `+` or `|.`, which need parentheses when
 * used as ordinary functions.
 */
export function isSymbolic(name: string): boolean {
  return !/^[A-Za-z_]/.test(name);
}
