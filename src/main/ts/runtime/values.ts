import { AsmSource, BlockExpr, FieldDecl } from "../ast/ast.js";
import type { AsmProgram } from "../asm/decoder.js";
import { Span } from "../common/span.js";
import type { Environment } from "./environment.js";

export interface IntegerValue {
  kind: "Integer";
  value: bigint;
}

export interface FloatValue {
  kind: "Float";
  value: number;
}

export interface StringValue {
  kind: "String";
  value: string;
}

export interface BooleanValue {
  kind: "Boolean";
  value: boolean;
}

export interface NoneValue {
  kind: "None";
}

export interface ListValue {
  kind: "List";
  elements: Value[];
  frozen: boolean;
}

export interface StructInstance {
  kind: "Struct";
  type: StructType;
  /** Insertion order follows the declaration's field order. */
  fields: Map<string, Value>;
  frozen: boolean;
}

export interface FunctionRef {
  kind: "Function";
  callable: Callable;
}

export interface AsmRef {
  kind: "Asm";
  block: AsmBlock;
}

export type Value =
  | IntegerValue
  | FloatValue
  | StringValue
  | BooleanValue
  | NoneValue
  | ListValue
  | StructInstance
  | FunctionRef
  | AsmRef;

// --- Callables ---

export interface Closure {
  kind: "Closure";
  name: string;
  params: string[];
  body: BlockExpr;
  /** Captured by reference: calls see its current bindings. */
  env: Environment;
}

export interface StructType {
  kind: "StructType";
  name: string;
  fields: FieldDecl[];
  /** Frame default expressions are evaluated under. */
  env: Environment;
}

export interface BuiltinContext {
  print(line: string): void;
  span: Span;
}

export interface Builtin {
  kind: "Builtin";
  name: string;
  minArity: number;
  maxArity: number;
  call(args: Value[], ctx: BuiltinContext): Value;
}

export type Callable = Closure | StructType | Builtin;

export interface AsmBlock {
  name: string;
  source: AsmSource;
  program: AsmProgram;
}

// --- Constructors ---

export const NONE: NoneValue = { kind: "None" };
export const TRUE: BooleanValue = { kind: "Boolean", value: true };
export const FALSE: BooleanValue = { kind: "Boolean", value: false };

export function int(value: bigint | number): IntegerValue {
  return { kind: "Integer", value: typeof value === "bigint" ? value : BigInt(value) };
}

export function float(value: number): FloatValue {
  return { kind: "Float", value };
}

export function str(value: string): StringValue {
  return { kind: "String", value };
}

export function bool(value: boolean): BooleanValue {
  return value ? TRUE : FALSE;
}

export function list(elements: Value[]): ListValue {
  return { kind: "List", elements, frozen: false };
}

export function fnRef(callable: Callable): FunctionRef {
  return { kind: "Function", callable };
}

// --- Queries ---

export function typeName(value: Value): string {
  switch (value.kind) {
    case "Integer":
      return "int";
    case "Float":
      return "float";
    case "String":
      return "string";
    case "Boolean":
      return "bool";
    case "None":
      return "none";
    case "List":
      return "list";
    case "Struct":
      return value.type.name;
    case "Function":
      return "function";
    case "Asm":
      return "asm";
  }
}

/**
 * Condition coercion. Undefined for structs and callables, which callers
 * report as a TypeError.
 */
export function truthiness(value: Value): boolean | undefined {
  switch (value.kind) {
    case "Boolean":
      return value.value;
    case "Integer":
      return value.value !== 0n;
    case "Float":
      return value.value !== 0 && !Number.isNaN(value.value);
    case "String":
      return value.value.length > 0;
    case "List":
      return value.elements.length > 0;
    case "None":
      return false;
    case "Struct":
    case "Function":
    case "Asm":
      return undefined;
  }
}

function numericEquals(i: bigint, f: number): boolean {
  return Number.isInteger(f) && BigInt(f) === i;
}

/** Records the pair and reports whether it was already being compared. */
function revisits(assumed: Map<Value, Set<Value>>, a: Value, b: Value): boolean {
  let partners = assumed.get(a);
  if (partners === undefined) {
    partners = new Set();
    assumed.set(a, partners);
  }
  if (partners.has(b)) return true;
  partners.add(b);
  return false;
}

/**
 * Structural equality; callables compare by identity. A pair of containers
 * met again while comparing is assumed equal, so cyclic values terminate.
 */
export function valuesEqual(a: Value, b: Value, assumed = new Map<Value, Set<Value>>()): boolean {
  switch (a.kind) {
    case "Integer":
      if (b.kind === "Integer") return a.value === b.value;
      return b.kind === "Float" && numericEquals(a.value, b.value);
    case "Float":
      if (b.kind === "Float") return a.value === b.value;
      return b.kind === "Integer" && numericEquals(b.value, a.value);
    case "String":
      return b.kind === "String" && a.value === b.value;
    case "Boolean":
      return b.kind === "Boolean" && a.value === b.value;
    case "None":
      return b.kind === "None";
    case "List":
      if (b.kind !== "List") return false;
      if (a === b || revisits(assumed, a, b)) return true;
      return (
        a.elements.length === b.elements.length &&
        a.elements.every((el, i) => valuesEqual(el, b.elements[i], assumed))
      );
    case "Struct": {
      if (b.kind !== "Struct" || a.type !== b.type) return false;
      if (a === b || revisits(assumed, a, b)) return true;
      for (const [name, value] of a.fields) {
        const other = b.fields.get(name);
        if (other === undefined || !valuesEqual(value, other, assumed)) return false;
      }
      return true;
    }
    case "Function":
      return b.kind === "Function" && a.callable === b.callable;
    case "Asm":
      return b.kind === "Asm" && a.block === b.block;
  }
}

function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Text shown by `print` and `str`. Strings nested in lists and structs are
 * quoted; a container that contains itself shows as `[...]` or `Name {...}`.
 */
export function display(value: Value, nested = false, open = new Set<Value>()): string {
  switch (value.kind) {
    case "Integer":
      return value.value.toString();
    case "Float":
      return formatFloat(value.value);
    case "String":
      return nested ? JSON.stringify(value.value) : value.value;
    case "Boolean":
      return value.value ? "true" : "false";
    case "None":
      return "none";
    case "List": {
      if (open.has(value)) return "[...]";
      open.add(value);
      const elements = value.elements.map((el) => display(el, true, open));
      open.delete(value);
      return `[${elements.join(", ")}]`;
    }
    case "Struct": {
      if (open.has(value)) return `${value.type.name} {...}`;
      open.add(value);
      const fields = [...value.fields].map(
        ([name, field]) => `${name}: ${display(field, true, open)}`
      );
      open.delete(value);
      return fields.length === 0
        ? `${value.type.name} {}`
        : `${value.type.name} { ${fields.join(", ")} }`;
    }
    case "Function":
      return displayCallable(value.callable);
    case "Asm":
      return `<asm ${value.block.name}>`;
  }
}

function displayCallable(callable: Callable): string {
  switch (callable.kind) {
    case "Closure":
      return `<fn ${callable.name}>`;
    case "StructType":
      return `<struct ${callable.name}>`;
    case "Builtin":
      return `<builtin ${callable.name}>`;
  }
}

/** Marks lists and struct instances reachable from `value` read-only. */
export function deepFreeze(value: Value, seen = new Set<Value>()) {
  if (seen.has(value)) return;
  seen.add(value);
  if (value.kind === "List") {
    value.frozen = true;
    for (const el of value.elements) deepFreeze(el, seen);
  } else if (value.kind === "Struct") {
    value.frozen = true;
    for (const field of value.fields.values()) deepFreeze(field, seen);
  }
}
