/**
 * Internal errors.
 *
 * Nothing in this library validates user input: every failure is a broken
 * invariant in the tree handed to it (or in the library itself), and aborts
 * the whole render.
 */

export type InternalErrorSite =
  | "environment"
  | "substitute"
  | "instances"
  | "spine"
  | "print";

export class InternalError extends Error {
  site: InternalErrorSite;
  notes: string[];

  constructor(message: string, site: InternalErrorSite = "print") {
    super(message);
    this.name = "InternalError";
    this.site = site;
    this.notes = [];
  }

  addNote(message: string): this {
    this.notes.push(message);
    return this;
  }
}

/**
 * Eliminate a value of the uninhabited type.
 * Reaching this at runtime means a closed tree carried a free variable.
 */
export function absurd(value: never): never {
  throw new InternalError(
    `Free variable in a closed tree: ${String(value)}`,
    "environment"
  );
}

/**
 * Exhaustiveness guard for `switch` statements over tagged unions.
 */
export function assertNever(value: never, site: InternalErrorSite): never {
  const text = JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "bigint" ? v.toString() : v
  );
  throw new InternalError(`Unknown node: ${text}`, site);
}
