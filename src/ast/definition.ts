/**
 * Top-level definitions of a generated module.
 */

import { Constructor, Qualified, parseQualified } from "./name";
import { Type } from "./type";
import { Expression } from "./expression";

export type Definition =
  | {
      kind: "constant";
      name: Qualified;
      type: Type<never>;
      body: Expression<never>;
    }
  | { kind: "type"; name: Qualified; constructors: readonly ConstructorDef[] }
  | { kind: "alias"; name: Qualified; type: Type<never> };

export type ConstructorDef = {
  name: Constructor;
  fields: readonly Type<never>[];
};

function toQualified(name: Qualified | string): Qualified {
  return typeof name === "string" ? parseQualified(name) : name;
}

export function constantDef(
  name: Qualified | string,
  type: Type<never>,
  body: Expression<never>
): Definition {
  return { kind: "constant", name: toQualified(name), type, body };
}

export function typeDef(
  name: Qualified | string,
  constructors: readonly (readonly [Constructor, readonly Type<never>[]])[]
): Definition {
  return {
    kind: "type",
    name: toQualified(name),
    constructors: constructors.map(([con, fields]) => ({ name: con, fields })),
  };
}

export function aliasDef(name: Qualified | string, type: Type<never>): Definition {
  return { kind: "alias", name: toQualified(name), type };
}
