import { FieldDecl } from "../ast/ast.js";
import { ErrorKind, KestrelError, typeError } from "../common/errors.js";
import { Span } from "../common/span.js";
import { Environment } from "./environment.js";
import {
  Builtin,
  BuiltinContext,
  NONE,
  StructInstance,
  StructType,
  Value,
  display,
  float,
  fnRef,
  int,
  list,
  str,
  truthiness,
  typeName,
} from "./values.js";

const BUILTIN_SPAN: Span = {
  start: { line: 0, column: 0, offset: 0 },
  end: { line: 0, column: 0, offset: 0 },
  sourceFile: "<builtin>",
};

function optionalField(name: string): FieldDecl {
  return { name, optional: true, span: BUILTIN_SPAN };
}

/** Raised by `throw` and `assert`; carries the thrown value for `catch`. */
export class ThrownError extends KestrelError {
  constructor(
    readonly value: Value,
    message: string,
    span?: Span
  ) {
    super(ErrorKind.UserError, { message }, span);
  }
}

export function createErrorType(env: Environment): StructType {
  return {
    kind: "StructType",
    name: "Error",
    fields: [
      { name: "kind", optional: false, span: BUILTIN_SPAN },
      { name: "message", optional: false, span: BUILTIN_SPAN },
      optionalField("line"),
      optionalField("column"),
    ],
    env,
  };
}

export function errorInstance(
  type: StructType,
  kind: string,
  message: string,
  span?: Span
): StructInstance {
  const fields = new Map<string, Value>([
    ["kind", str(kind)],
    ["message", str(message)],
    ["line", span ? int(span.start.line) : NONE],
    ["column", span ? int(span.start.column) : NONE],
  ]);
  return { kind: "Struct", type, fields, frozen: false };
}

function builtin(
  name: string,
  minArity: number,
  maxArity: number,
  call: (args: Value[], ctx: BuiltinContext) => Value
): Builtin {
  return { kind: "Builtin", name, minArity, maxArity, call };
}

function expectInteger(value: Value, fn: string, span: Span): bigint {
  if (value.kind !== "Integer") {
    return typeError(`${fn}() expects an int, got ${typeName(value)}`, span);
  }
  return value.value;
}

function toInt(value: Value, span: Span): Value {
  switch (value.kind) {
    case "Integer":
      return value;
    case "Float":
      if (!Number.isFinite(value.value)) {
        return typeError(`cannot convert ${display(value)} to int`, span);
      }
      return int(BigInt(Math.trunc(value.value)));
    case "Boolean":
      return int(value.value ? 1n : 0n);
    case "String": {
      const text = value.value.trim();
      if (!/^[-+]?\d+$/.test(text)) {
        return typeError(`cannot convert "${value.value}" to int`, span);
      }
      return int(BigInt(text));
    }
    default:
      return typeError(`cannot convert ${typeName(value)} to int`, span);
  }
}

function toFloat(value: Value, span: Span): Value {
  switch (value.kind) {
    case "Float":
      return value;
    case "Integer":
      return float(Number(value.value));
    case "Boolean":
      return float(value.value ? 1 : 0);
    case "String": {
      const text = value.value.trim();
      const parsed = Number(text);
      if (text === "" || Number.isNaN(parsed)) {
        return typeError(`cannot convert "${value.value}" to float`, span);
      }
      return float(parsed);
    }
    default:
      return typeError(`cannot convert ${typeName(value)} to float`, span);
  }
}

function mutableList(value: Value, fn: string, span: Span) {
  if (value.kind !== "List") {
    return typeError(`${fn}() expects a list, got ${typeName(value)}`, span);
  }
  if (value.frozen) typeError("cannot modify an imported list", span);
  return value;
}

export interface Globals {
  env: Environment;
  errorType: StructType;
}

/** The root frame every module frame chains to. It is frozen; modules shadow, never rebind. */
export function createGlobals(): Globals {
  const env = new Environment();
  const errorType = createErrorType(env);

  const builtins: Builtin[] = [
    builtin("print", 0, Infinity, (args, ctx) => {
      ctx.print(args.map((arg) => display(arg)).join(" "));
      return NONE;
    }),
    builtin("str", 1, 1, ([value]) => str(display(value))),
    builtin("len", 1, 1, ([value], { span }) => {
      if (value.kind === "String") return int([...value.value].length);
      if (value.kind === "List") return int(value.elements.length);
      return typeError(`len() of ${typeName(value)}`, span);
    }),
    builtin("push", 2, 2, ([target, value], { span }) => {
      mutableList(target, "push", span).elements.push(value);
      return NONE;
    }),
    builtin("pop", 1, 1, ([target], { span }) => {
      const popped = mutableList(target, "pop", span).elements.pop();
      if (popped === undefined) return typeError("pop from empty list", span);
      return popped;
    }),
    builtin("type", 1, 1, ([value]) => str(typeName(value))),
    builtin("int", 1, 1, ([value], { span }) => toInt(value, span)),
    builtin("float", 1, 1, ([value], { span }) => toFloat(value, span)),
    builtin("range", 1, 2, (args, { span }) => {
      const [start, end] =
        args.length === 1
          ? [0n, expectInteger(args[0], "range", span)]
          : [expectInteger(args[0], "range", span), expectInteger(args[1], "range", span)];
      const elements: Value[] = [];
      for (let i = start; i < end; i++) elements.push(int(i));
      return list(elements);
    }),
    builtin("keys", 1, 1, ([value], { span }) => {
      if (value.kind !== "Struct") {
        return typeError(`keys() expects a struct, got ${typeName(value)}`, span);
      }
      return list([...value.fields.keys()].map((name) => str(name)));
    }),
    builtin("assert", 1, 2, ([cond, message], { span }) => {
      if (truthiness(cond) !== true) {
        const text = message ? display(message) : "assertion failed";
        throw new ThrownError(errorInstance(errorType, ErrorKind.UserError, text, span), text, span);
      }
      return NONE;
    }),
    builtin("error", 2, 2, ([kind, message]) =>
      errorInstance(errorType, display(kind), display(message))
    ),
  ];

  for (const fn of builtins) env.declare(fn.name, fnRef(fn));
  env.declare(errorType.name, fnRef(errorType));
  env.freeze("the builtin frame");
  return { env, errorType };
}
