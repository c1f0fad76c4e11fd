/**
 * Types as they appear in signatures and type definitions.
 *
 * There is no binder machinery here; the printer only ever sees `Type<never>`.
 */

import { Field, Qualified, parseQualified } from "./name";

export type Type<V> =
  | { kind: "var"; value: V }
  | { kind: "global"; name: Qualified }
  | { kind: "app"; fn: Type<V>; arg: Type<V> }
  | { kind: "fun"; from: Type<V>; to: Type<V> }
  | { kind: "record"; fields: readonly RecordFieldType<V>[] };

export type RecordFieldType<V> = {
  field: Field;
  type: Type<V>;
};

export function typeVar<V>(value: V): Type<V> {
  return { kind: "var", value };
}

export function typeGlobal<V = never>(name: Qualified | string): Type<V> {
  return {
    kind: "global",
    name: typeof name === "string" ? parseQualified(name) : name,
  };
}

export function typeApp<V>(fn: Type<V>, arg: Type<V>): Type<V> {
  return { kind: "app", fn, arg };
}

/**
 * Apply a type constructor to several arguments.
 */
export function typeApps<V>(fn: Type<V>, args: readonly Type<V>[]): Type<V> {
  return args.reduce((acc, arg) => typeApp(acc, arg), fn);
}

export function funType<V>(from: Type<V>, to: Type<V>): Type<V> {
  return { kind: "fun", from, to };
}

/**
 * `a -> b -> result` from a parameter list.
 */
export function funTypes<V>(params: readonly Type<V>[], result: Type<V>): Type<V> {
  return params.reduceRight((acc, param) => funType(param, acc), result);
}

export function recordType<V>(
  fields: readonly (readonly [Field, Type<V>])[]
): Type<V> {
  return {
    kind: "record",
    fields: fields.map(([field, type]) => ({ field, type })),
  };
}
