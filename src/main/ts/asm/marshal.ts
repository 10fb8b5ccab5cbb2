import { AsmLocation } from "../ast/ast.js";
import { typeError } from "../common/errors.js";
import { Span } from "../common/span.js";
import { Value, int, list, typeName } from "../runtime/values.js";
import { Memory } from "./memory.js";
import { RegisterFile, RegisterRef, lookupRegister, toSigned } from "./registers.js";

const encoder = new TextEncoder();

/** Register named by a location; unknown names are rejected when evaluated. */
export function registerFor(location: Extract<AsmLocation, { kind: "Register" }>): RegisterRef {
  const reg = lookupRegister(location.name);
  if (!reg) return typeError(`unknown register '${location.name}'`, location.span);
  return reg;
}

function scalar(value: Value, span: Span): bigint {
  switch (value.kind) {
    case "Integer":
      return value.value;
    case "Boolean":
      return value.value ? 1n : 0n;
    case "None":
      return 0n;
    default:
      return typeError(`cannot pass ${typeName(value)} to an asm register`, span);
  }
}

/** Bytes a value occupies when stored at a memory slot. */
export function slotExtent(value: Value | undefined, location: Extract<AsmLocation, { kind: "Memory" }>): number {
  const declared = (location.count ?? 1) * 8;
  if (value?.kind === "String") return Math.max(declared, encoder.encode(value.value).length + 1);
  if (value?.kind === "List") return Math.max(declared, value.elements.length * 8);
  return declared;
}

export function storeValue(
  value: Value,
  location: AsmLocation,
  regs: RegisterFile,
  memory: Memory,
  span: Span
) {
  if (location.kind === "Register") {
    regs.write(registerFor(location), scalar(value, span));
    return;
  }

  const base = location.offset;
  if (value.kind === "String") {
    const bytes = encoder.encode(value.value);
    const withNul = new Uint8Array(bytes.length + 1);
    withNul.set(bytes);
    memory.writeBytes(base, withNul);
    return;
  }
  if (value.kind === "List") {
    if (location.count !== undefined && value.elements.length > location.count) {
      typeError(`list of ${value.elements.length} does not fit mem[${base}; ${location.count}]`, span);
    }
    value.elements.forEach((el, i) => {
      memory.write(BigInt(base + i * 8), 64, scalar(el, span));
    });
    return;
  }
  memory.write(BigInt(base), 64, scalar(value, span));
}

/** Reads an exit location back as signed Integers. */
export function loadValue(location: AsmLocation, regs: RegisterFile, memory: Memory): Value {
  if (location.kind === "Register") {
    const reg = registerFor(location);
    return int(toSigned(regs.read(reg), reg.width));
  }
  const read = (i: number) => int(toSigned(memory.read(BigInt(location.offset + i * 8), 64), 64));
  if (location.count === undefined) return read(0);
  return list(Array.from({ length: location.count }, (_, i) => read(i)));
}
