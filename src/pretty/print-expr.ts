/**
 * Expression printing.
 *
 * Precedence climbing: every call carries the precedence its context
 * requires, and a form whose own precedence is lower wraps itself in
 * parentheses.
 */

import {
  Branch,
  Expression,
  RecordField,
  Spine,
  apps,
  appsView,
} from "../ast/expression";
import { Qualified, showQualified } from "../ast/name";
import { fromScope } from "../ast/scope";
import { InternalError, assertNever } from "../errors";
import { CodeBuilder, delimited, parensWhen } from "./code-builder";
import { Environment } from "./environment";
import { printPrefix } from "./names";
import { PrettyConfig } from "./options";
import { Fixity, PREC, operandPrecedence } from "./precedence";
import { printPattern } from "./print-pattern";

// Context passed during expression printing
export type PrintContext<V> = {
  env: Environment<V>;
  parentPrecedence: number;
  config: PrettyConfig;
};

export function printExpr<V>(expr: Expression<V>, ctx: PrintContext<V>): string {
  switch (expr.kind) {
    case "var":
      return ctx.env.lookup(expr.value);

    case "global":
    case "app":
      return printSpine(appsView<V>(expr), ctx);

    case "let":
      return parensWhen(ctx.parentPrecedence > PREC.LET, printLets(expr, ctx));

    case "lam":
      return parensWhen(
        ctx.parentPrecedence > PREC.LAMBDA,
        printLambdas(expr, ctx)
      );

    case "record":
      return printRecord(expr.fields, ctx);

    case "proj":
      return `.${expr.field}`;

    case "case":
      return parensWhen(
        ctx.parentPrecedence > PREC.CASE,
        printCase(expr.scrutinee, expr.branches, ctx)
      );

    case "list":
      return delimited(
        "[",
        "]",
        expr.elements.map((e) => printExprPrec(e, ctx, PREC.LOWEST))
      );

    case "string":
    case "int":
    case "float":
      return printLiteral(expr);

    default:
      return assertNever(expr, "print");
  }
}

/**
 * Print an expression in a context that requires `precedence`.
 */
export function printExprPrec<V>(
  expr: Expression<V>,
  ctx: PrintContext<V>,
  precedence: number
): string {
  return printExpr(expr, { ...ctx, parentPrecedence: precedence });
}

// ============================================
// Literals
// ============================================

export type Literal =
  | { kind: "string"; value: string }
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number };

/**
 * String contents are emitted as stored: the producer escapes them. Raw line
 * breaks are the exception and print as escapes, so a literal always sits on
 * one line and indentation never reaches inside it.
 */
export function printLiteral(literal: Literal): string {
  switch (literal.kind) {
    case "string":
      return `"${literal.value.replace(/\r/g, "\\r").replace(/\n/g, "\\n")}"`;
    case "int":
      return literal.value.toString();
    case "float": {
      // Keep integral floats recognisable as floats.
      const text = String(literal.value);
      return /^-?\d+$/.test(text) ? `${text}.0` : text;
    }
  }
}

// ============================================
// Applications and operators
// ============================================

function printSpine<V>({ head, args }: Spine<V>, ctx: PrintContext<V>): string {
  if (head.kind === "global") {
    if (args.length === 2 && showQualified(head.name) === TUPLE) {
      return printTuple(args[0], args[1], ctx);
    }
    const fixity = ctx.config.fixities.get(showQualified(head.name));
    if (fixity === undefined) {
      return printAtomApps(printPrefix(head.name, ctx.config), args, ctx);
    }
    if (args.length === 2) {
      return printOperator(head.name, fixity, args[0], args[1], ctx);
    }
    if (args.length > 2) {
      // Close the operator over its first two operands and apply the result.
      return printApps(apps<V>(head, args.slice(0, 2)), args.slice(2), ctx);
    }
    return printAtomApps(`(${head.name.name})`, args, ctx);
  }

  if (args.length === 0) {
    throw new InternalError(
      `Application spine with a ${head.kind} head and no arguments`,
      "spine"
    );
  }
  return printApps(head, args, ctx);
}

// The pair constructor prints as tuple syntax when saturated.
const TUPLE = "Basics.,";

function printTuple<V>(
  first: Expression<V>,
  second: Expression<V>,
  ctx: PrintContext<V>
): string {
  return delimited("(", ")", [
    printExprPrec(first, ctx, PREC.LOWEST),
    printExprPrec(second, ctx, PREC.LOWEST),
  ]);
}

function printOperator<V>(
  name: Qualified,
  fixity: Fixity,
  left: Expression<V>,
  right: Expression<V>,
  ctx: PrintContext<V>
): string {
  const prec = operandPrecedence(fixity);
  const leftCode = printExprPrec(left, ctx, prec.left);
  const rightCode = printExprPrec(right, ctx, prec.right);

  const code = ctx.config.twoLineOperators.has(showQualified(name))
    ? new CodeBuilder(ctx.config.indent)
        .writeLine(`${leftCode} ${name.name}`)
        .indent()
        .write(rightCode)
        .build()
    : `${leftCode} ${name.name} ${rightCode}`;

  return parensWhen(ctx.parentPrecedence > prec.operator, code);
}

function printArguments<V>(args: readonly Expression<V>[], ctx: PrintContext<V>): string {
  return args.map((arg) => printExprPrec(arg, ctx, PREC.ARGUMENT)).join(" ");
}

function printApps<V>(
  fn: Expression<V>,
  args: readonly Expression<V>[],
  ctx: PrintContext<V>
): string {
  if (args.length === 0) {
    return printExpr(fn, ctx);
  }
  return parensWhen(
    ctx.parentPrecedence > PREC.APPLICATION,
    `${printExprPrec(fn, ctx, PREC.APPLICATION)} ${printArguments(args, ctx)}`
  );
}

/**
 * Application of an already printed atomic head.
 */
function printAtomApps<V>(
  fn: string,
  args: readonly Expression<V>[],
  ctx: PrintContext<V>
): string {
  if (args.length === 0) {
    return fn;
  }
  return parensWhen(
    ctx.parentPrecedence > PREC.APPLICATION,
    `${fn} ${printArguments(args, ctx)}`
  );
}

// ============================================
// Binders
// ============================================

type LetChain = { bindings: string[]; body: string };

function collectLets<V>(expr: Expression<V>, ctx: PrintContext<V>): LetChain {
  if (expr.kind !== "let") {
    return { bindings: [], body: printExprPrec(expr, ctx, PREC.LET) };
  }
  const [env, name] = ctx.env.extend();
  const binding = new CodeBuilder(ctx.config.indent)
    .nested(`${name} =`, printExprPrec(expr.value, ctx, PREC.LOWEST))
    .build();
  const rest = collectLets(fromScope(expr.scope), { ...ctx, env });
  return { bindings: [binding, ...rest.bindings], body: rest.body };
}

/**
 * A run of nested `let`s prints as one block:
 *
 * ```
 * let
 *     a =
 *         1
 *
 *     b =
 *         2
 * in
 * body
 * ```
 */
function printLets<V>(expr: Expression<V>, ctx: PrintContext<V>): string {
  const { bindings, body } = collectLets(expr, ctx);
  return new CodeBuilder(ctx.config.indent)
    .nested("let", bindings.join("\n\n"))
    .newline()
    .writeLine("in")
    .write(body)
    .build();
}

export type LambdaChain = { names: string[]; body: string };

/**
 * Open a run of nested lambdas, naming each parameter.
 */
export function collectLambdas<V>(expr: Expression<V>, ctx: PrintContext<V>): LambdaChain {
  if (expr.kind !== "lam") {
    return { names: [], body: printExprPrec(expr, ctx, PREC.LAMBDA) };
  }
  const [env, name] = ctx.env.extend();
  const rest = collectLambdas(fromScope(expr.scope), { ...ctx, env });
  return { names: [name, ...rest.names], body: rest.body };
}

function printLambdas<V>(expr: Expression<V>, ctx: PrintContext<V>): string {
  const { names, body } = collectLambdas(expr, ctx);
  return `\\${names.join(" ")} -> ${body}`;
}

// ============================================
// Records and case
// ============================================

function printRecord<V>(fields: readonly RecordField<V>[], ctx: PrintContext<V>): string {
  return delimited(
    "{",
    "}",
    fields.map(
      ({ field, value }) => `${field} = ${printExprPrec(value, ctx, PREC.LOWEST)}`
    )
  );
}

/**
 * Each branch gets its own environment from `extendPattern`; siblings may
 * reuse the same fresh names.
 */
function printCase<V>(
  scrutinee: Expression<V>,
  branches: readonly Branch<V>[],
  ctx: PrintContext<V>
): string {
  const arms = branches.map(({ pattern, scope }) => {
    const env = ctx.env.extendPattern(pattern);
    const patternCode = printPattern(pattern, env, PREC.LOWEST, ctx.config);
    const body = printExprPrec(fromScope(scope), { ...ctx, env }, PREC.LOWEST);
    return new CodeBuilder(ctx.config.indent)
      .nested(`${patternCode} ->`, body)
      .build();
  });

  return new CodeBuilder(ctx.config.indent)
    .nested(
      `case ${printExprPrec(scrutinee, ctx, PREC.LOWEST)} of`,
      arms.join("\n\n")
    )
    .build();
}
