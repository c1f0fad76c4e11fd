/**
 * Operator precedence for the printer.
 *
 * Higher numbers bind tighter. Application binds tighter than any operator;
 * `let`, lambda and `case` sit at the bottom and only need parentheses as an
 * operand or an argument.
 */

export const PREC = {
  LOWEST: 0,
  LET: 0,
  LAMBDA: 0,
  CASE: 0,
  FUNCTION_TYPE: 0,
  APPLICATION: 10,
  ARGUMENT: 11,
} as const;

export type Associativity = "left" | "right" | "none";

export type Fixity = {
  precedence: number;
  associativity: Associativity;
};

/**
 * Fixities keyed by the operator's dotted qualified name.
 */
export type FixityTable = ReadonlyMap<string, Fixity>;

function infixl(precedence: number): Fixity {
  return { precedence, associativity: "left" };
}

function infixr(precedence: number): Fixity {
  return { precedence, associativity: "right" };
}

function infix(precedence: number): Fixity {
  return { precedence, associativity: "none" };
}

export const ELM_FIXITIES: FixityTable = new Map([
  ["Basics.>>", infixl(9)],
  ["Basics.<<", infixr(9)],
  ["Basics.^", infixr(8)],
  ["Basics.*", infixl(7)],
  ["Basics./", infixl(7)],
  ["Basics.//", infixl(7)],
  ["Basics.%", infixl(7)],
  ["Basics.+", infixl(6)],
  ["Basics.-", infixl(6)],
  ["Parser.|.", infixl(6)],
  ["Parser.|=", infixl(5)],
  ["Basics.++", infixr(5)],
  ["List.::", infixr(5)],
  ["Basics.==", infix(4)],
  ["Basics./=", infix(4)],
  ["Basics.<", infix(4)],
  ["Basics.>", infix(4)],
  ["Basics.<=", infix(4)],
  ["Basics.>=", infix(4)],
  ["Basics.&&", infixr(3)],
  ["Basics.||", infixl(2)],
  ["Basics.|>", infixl(0)],
  ["Basics.<|", infixr(0)],
]);

/**
 * Operators whose right operand goes on its own indented line.
 */
export const TWO_LINE_OPERATORS: ReadonlySet<string> = new Set([
  "Basics.>>",
  "Basics.<<",
  "Basics.|>",
  "Basics.<|",
]);

export type OperandPrecedence = {
  left: number;
  operator: number;
  right: number;
};

/**
 * The thresholds for an operator's two operands. The operand on the
 * associative side may itself be an operator of the same precedence without
 * parentheses; the other side needs something tighter.
 */
export function operandPrecedence(fixity: Fixity): OperandPrecedence {
  const n = fixity.precedence;
  switch (fixity.associativity) {
    case "left":
      return { left: n, operator: n, right: n + 1 };
    case "right":
      return { left: n + 1, operator: n, right: n };
    case "none":
      return { left: n + 1, operator: n, right: n + 1 };
  }
}
