import { AsmSource } from "../ast/ast.js";
import { ErrorKind, fail, isKestrelError } from "../common/errors.js";
import { Span } from "../common/span.js";
import { NONE, Value, list } from "../runtime/values.js";
import { Cpu } from "./cpu.js";
import { AsmProgram } from "./decoder.js";
import { Memory } from "./memory.js";
import { loadValue, slotExtent, storeValue } from "./marshal.js";
import { RegisterFile } from "./registers.js";

export const DEFAULT_STACK_SIZE = 256;
export const DEFAULT_MEMORY_LIMIT = 1 << 20;

export interface AsmRunOptions {
  stepLimit?: number;
  stackSize?: number;
  /** Largest region, data plus stack, a block may allocate. */
  memoryLimit?: number;
}

export interface AsmResult {
  /** Single exit, the tuple exits as a list, or none. */
  value: Value;
  /** Tuple exits by name, in declared order. */
  outputs: [string, Value][];
}

function dataSize(source: AsmSource, inputs: Value[]): number {
  if (source.memorySize !== undefined) return source.memorySize;
  let size = 0;
  source.bindings.forEach((binding, i) => {
    if (binding.location.kind === "Memory") {
      size = Math.max(size, binding.location.offset + slotExtent(inputs[i], binding.location));
    }
  });
  const exits =
    source.exits.kind === "Tuple"
      ? source.exits.bindings.map((b) => b.location)
      : source.exits.kind === "Single"
        ? [source.exits.location]
        : [];
  for (const location of exits) {
    if (location.kind === "Memory") {
      size = Math.max(size, location.offset + slotExtent(undefined, location));
    }
  }
  return size;
}

/**
 * Runs one asm block in a fresh register file and memory region. Nothing
 * reaches the caller unless the whole block completes.
 */
export function executeAsm(
  source: AsmSource,
  program: AsmProgram,
  inputs: Value[],
  span: Span,
  options: AsmRunOptions = {}
): AsmResult {
  try {
    const regs = new RegisterFile();
    const size = dataSize(source, inputs) + (options.stackSize ?? DEFAULT_STACK_SIZE);
    const limit = options.memoryLimit ?? DEFAULT_MEMORY_LIMIT;
    if (size > limit) fail(ErrorKind.MemoryFault, { requested: size, limit }, span);
    const memory = new Memory(size);

    source.bindings.forEach((binding, i) => {
      storeValue(inputs[i], binding.location, regs, memory, binding.span);
    });

    new Cpu(regs, memory, { stepLimit: options.stepLimit }).run(program);

    switch (source.exits.kind) {
      case "None":
        return { value: NONE, outputs: [] };
      case "Single":
        return { value: loadValue(source.exits.location, regs, memory), outputs: [] };
      case "Tuple": {
        const outputs = source.exits.bindings.map((b): [string, Value] => [
          b.name,
          loadValue(b.location, regs, memory),
        ]);
        return { value: list(outputs.map(([, value]) => value)), outputs };
      }
    }
  } catch (e) {
    if (isKestrelError(e)) throw e.at(span);
    throw e;
  }
}
