import { typeError } from "../common/errors.js";
import { Span } from "../common/span.js";
import { TokenType } from "../lexer/token.js";
import {
  Value,
  bool,
  float,
  int,
  list,
  str,
  truthiness,
  typeName,
  valuesEqual,
} from "../runtime/values.js";

type Numeric = { kind: "Integer"; value: bigint } | { kind: "Float"; value: number };

function isNumeric(value: Value): value is Numeric {
  return value.kind === "Integer" || value.kind === "Float";
}

function asNumber(value: Numeric): number {
  return value.kind === "Float" ? value.value : Number(value.value);
}

function operandError(op: string, left: Value, right: Value, span: Span): never {
  return typeError(
    `unsupported operand types for ${op}: ${typeName(left)} and ${typeName(right)}`,
    span
  );
}

function arithmetic(op: TokenType, symbol: string, left: Value, right: Value, span: Span): Value {
  if (!isNumeric(left) || !isNumeric(right)) return operandError(symbol, left, right, span);

  const divides = op === TokenType.Slash || op === TokenType.Percent;
  if (divides && (right.kind === "Integer" ? right.value === 0n : right.value === 0)) {
    return typeError(symbol === "/" ? "division by zero" : "modulo by zero", span);
  }

  if (left.kind === "Integer" && right.kind === "Integer") {
    const a = left.value;
    const b = right.value;
    switch (op) {
      case TokenType.Plus:
        return int(a + b);
      case TokenType.Minus:
        return int(a - b);
      case TokenType.Star:
        return int(a * b);
      case TokenType.Slash:
        return int(a / b);
      default:
        return int(a % b);
    }
  }

  const a = asNumber(left);
  const b = asNumber(right);
  switch (op) {
    case TokenType.Plus:
      return float(a + b);
    case TokenType.Minus:
      return float(a - b);
    case TokenType.Star:
      return float(a * b);
    case TokenType.Slash:
      return float(a / b);
    default:
      return float(a % b);
  }
}

function compare(left: Value, right: Value, symbol: string, span: Span): number {
  if (left.kind === "String" && right.kind === "String") {
    return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  }
  if (isNumeric(left) && isNumeric(right)) {
    if (left.kind === "Integer" && right.kind === "Integer") {
      return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
    }
    const a = asNumber(left);
    const b = asNumber(right);
    if (Number.isNaN(a) || Number.isNaN(b)) return NaN;
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return operandError(symbol, left, right, span);
}

/** Evaluates a non-short-circuit binary operator on two values. */
export function binaryOp(
  op: TokenType,
  symbol: string,
  left: Value,
  right: Value,
  span: Span
): Value {
  switch (op) {
    case TokenType.Plus:
      if (left.kind === "String" && right.kind === "String") {
        return str(left.value + right.value);
      }
      if (left.kind === "List" && right.kind === "List") {
        return list([...left.elements, ...right.elements]);
      }
      return arithmetic(op, symbol, left, right, span);
    case TokenType.Minus:
    case TokenType.Star:
    case TokenType.Slash:
    case TokenType.Percent:
      return arithmetic(op, symbol, left, right, span);
    case TokenType.EqualEqual:
      return bool(valuesEqual(left, right));
    case TokenType.BangEqual:
      return bool(!valuesEqual(left, right));
    case TokenType.Less:
      return bool(compare(left, right, symbol, span) < 0);
    case TokenType.LessEqual:
      return bool(compare(left, right, symbol, span) <= 0);
    case TokenType.Greater:
      return bool(compare(left, right, symbol, span) > 0);
    case TokenType.GreaterEqual:
      return bool(compare(left, right, symbol, span) >= 0);
    default:
      return typeError(`unknown operator ${symbol}`, span);
  }
}

export function unaryOp(op: TokenType, symbol: string, right: Value, span: Span): Value {
  if (op === TokenType.Bang) return bool(!condition(right, span));
  if (right.kind === "Integer") return int(-right.value);
  if (right.kind === "Float") return float(-right.value);
  return typeError(`bad operand type for unary ${symbol}: ${typeName(right)}`, span);
}

/** Truthiness for conditions; structs and callables are rejected. */
export function condition(value: Value, span: Span): boolean {
  const result = truthiness(value);
  if (result === undefined) {
    return typeError(`${typeName(value)} cannot be used as a condition`, span);
  }
  return result;
}

/** Maps a compound assignment operator to the binary operator it applies. */
export const COMPOUND_OPERATORS: Partial<Record<TokenType, [TokenType, string]>> = {
  [TokenType.PlusEqual]: [TokenType.Plus, "+"],
  [TokenType.MinusEqual]: [TokenType.Minus, "-"],
  [TokenType.StarEqual]: [TokenType.Star, "*"],
  [TokenType.SlashEqual]: [TokenType.Slash, "/"],
};
