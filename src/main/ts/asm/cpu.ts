import { ErrorKind, fail, typeError } from "../common/errors.js";
import { CONDITIONS } from "./conditions.js";
import { AsmProgram, Instruction, Operand } from "./decoder.js";
import { Memory } from "./memory.js";
import {
  RAX,
  RCX,
  RDX,
  RSP,
  RegisterFile,
  RegisterRef,
  Width,
  mask,
  toSigned,
  toUnsigned,
} from "./registers.js";

export const DEFAULT_STEP_LIMIT = 1_000_000;

export interface CpuOptions {
  stepLimit?: number;
}

function parity(value: bigint): boolean {
  let byte = Number(value & 0xffn);
  let bits = 0;
  while (byte) {
    bits += byte & 1;
    byte >>= 1;
  }
  return bits % 2 === 0;
}

const AL: RegisterRef = { name: "al", index: RAX, width: 8, high: false };
const AH: RegisterRef = { name: "ah", index: RAX, width: 8, high: true };

/**
 * Executes decoded instructions against a register file and a bounded
 * memory region. Return addresses pushed by `call` are instruction indices.
 */
export class Cpu {
  rip = 0;
  steps = 0;
  private readonly stackTop: bigint;
  private readonly stepLimit: number;

  constructor(
    readonly regs: RegisterFile,
    readonly memory: Memory,
    options: CpuOptions = {}
  ) {
    this.stepLimit = options.stepLimit ?? DEFAULT_STEP_LIMIT;
    this.stackTop = BigInt(memory.size);
    regs.set(RSP, this.stackTop);
  }

  run(program: AsmProgram) {
    const { instructions } = program;
    while (this.rip < instructions.length) {
      if (++this.steps > this.stepLimit) {
        fail(ErrorKind.ExecutionLimit, { what: "asm block", limit: this.stepLimit });
      }
      const instruction = instructions[this.rip];
      this.rip++;
      if (!this.step(instruction, instructions.length)) return;
    }
  }

  /** Executes one instruction; false when execution halts. */
  private step(ins: Instruction, length: number): boolean {
    const [a, b] = ins.operands;
    const w = ins.width;

    switch (ins.op) {
      case "nop":
        return true;
      case "hlt":
        return false;
      case "mov":
        this.write(a, w, this.read(b, w));
        return true;
      case "movzx":
        this.write(a, w, this.read(b, this.widthOf(b)));
        return true;
      case "movsx":
        this.write(a, w, toSigned(this.read(b, this.widthOf(b)), this.widthOf(b)));
        return true;
      case "lea":
        this.write(a, w, this.address(b));
        return true;
      case "xchg": {
        const left = this.read(a, w);
        this.write(a, w, this.read(b, w));
        this.write(b, w, left);
        return true;
      }
      case "add":
      case "adc": {
        const carry = ins.op === "adc" && this.regs.cf ? 1n : 0n;
        this.write(a, w, this.add(this.read(a, w), this.read(b, w), carry, w));
        return true;
      }
      case "sub":
      case "sbb": {
        const borrow = ins.op === "sbb" && this.regs.cf ? 1n : 0n;
        this.write(a, w, this.sub(this.read(a, w), this.read(b, w), borrow, w));
        return true;
      }
      case "cmp":
        this.sub(this.read(a, w), this.read(b, w), 0n, w);
        return true;
      case "inc":
      case "dec": {
        const cf = this.regs.cf;
        const value = this.read(a, w);
        this.write(a, w, ins.op === "inc" ? this.add(value, 1n, 0n, w) : this.sub(value, 1n, 0n, w));
        this.regs.cf = cf;
        return true;
      }
      case "neg": {
        const value = this.read(a, w);
        this.write(a, w, this.sub(0n, value, 0n, w));
        this.regs.cf = value !== 0n;
        return true;
      }
      case "not":
        this.write(a, w, ~this.read(a, w));
        return true;
      case "and":
      case "or":
      case "xor":
      case "test": {
        const x = this.read(a, w);
        const y = this.read(b, w);
        const result = toUnsigned(ins.op === "or" ? x | y : ins.op === "xor" ? x ^ y : x & y, w);
        this.logicFlags(result, w);
        if (ins.op !== "test") this.write(a, w, result);
        return true;
      }
      case "shl":
      case "sal":
      case "shr":
      case "sar":
        this.shift(ins.op, a, b, w);
        return true;
      case "imul":
        this.imul(ins.operands, w);
        return true;
      case "mul":
        this.mul(this.read(a, w), w);
        return true;
      case "div":
      case "idiv":
        this.divide(this.read(a, w), w, ins.op === "idiv");
        return true;
      case "cqo":
        this.regs.set(RDX, toSigned(this.regs.get(RAX), 64) < 0n ? -1n : 0n);
        return true;
      case "jmp":
        this.rip = this.target(a);
        return true;
      case "j":
        if (this.condition(ins)) this.rip = this.target(a);
        return true;
      case "cmov":
        if (this.condition(ins)) this.write(a, w, this.read(b, w));
        return true;
      case "set":
        this.write(a, 8, this.condition(ins) ? 1n : 0n);
        return true;
      case "loop": {
        const count = toUnsigned(this.regs.get(RCX) - 1n, 64);
        this.regs.set(RCX, count);
        if (count !== 0n) this.rip = this.target(a);
        return true;
      }
      case "push":
        this.push(a.kind === "imm" ? a.value : this.read(a, 64));
        return true;
      case "pop":
        this.write(a, 64, this.pop());
        return true;
      case "call":
        this.push(BigInt(this.rip));
        this.rip = this.target(a);
        return true;
      case "ret": {
        if (this.regs.get(RSP) === this.stackTop) return false;
        const address = this.pop();
        if (address < 0n || address > BigInt(length)) {
          return fail(ErrorKind.UnsupportedOpcode, {
            opcode: "ret",
            line: ins.line,
            reason: `invalid return address ${address}`,
          });
        }
        this.rip = Number(address);
        return true;
      }
    }
    return fail(ErrorKind.UnsupportedOpcode, { opcode: ins.mnemonic, line: ins.line });
  }

  // --- Operands ---

  private widthOf(operand: Operand): Width {
    if (operand.kind === "reg") return operand.reg.width;
    if (operand.kind === "mem") return operand.width ?? 64;
    return 64;
  }

  private address(operand: Operand): bigint {
    if (operand.kind !== "mem") return 0n;
    let address = operand.disp;
    if (operand.base) address += this.regs.get(operand.base.index);
    if (operand.index) address += this.regs.get(operand.index.index) * operand.scale;
    return toUnsigned(address, 64);
  }

  private read(operand: Operand, width: Width): bigint {
    switch (operand.kind) {
      case "reg":
        return this.regs.read(operand.reg);
      case "imm":
        return toUnsigned(operand.value, width);
      case "mem":
        return this.memory.read(this.address(operand), width);
      case "label":
        return BigInt(operand.target);
    }
  }

  private write(operand: Operand, width: Width, value: bigint) {
    if (operand.kind === "reg") {
      this.regs.write(operand.reg, value);
    } else if (operand.kind === "mem") {
      this.memory.write(this.address(operand), width, value);
    }
  }

  private target(operand: Operand): number {
    return operand.kind === "label" ? operand.target : this.rip;
  }

  private condition(ins: Instruction): boolean {
    const test = ins.cond === undefined ? undefined : CONDITIONS.get(ins.cond);
    return test ? test(this.regs) : false;
  }

  // --- Stack ---

  private push(value: bigint) {
    const rsp = toUnsigned(this.regs.get(RSP) - 8n, 64);
    this.memory.write(rsp, 64, value);
    this.regs.set(RSP, rsp);
  }

  private pop(): bigint {
    const rsp = this.regs.get(RSP);
    const value = this.memory.read(rsp, 64);
    this.regs.set(RSP, rsp + 8n);
    return value;
  }

  // --- Arithmetic ---

  private resultFlags(result: bigint, width: Width) {
    this.regs.zf = result === 0n;
    this.regs.sf = toSigned(result, width) < 0n;
    this.regs.pf = parity(result);
  }

  private logicFlags(result: bigint, width: Width) {
    this.resultFlags(result, width);
    this.regs.cf = false;
    this.regs.of = false;
  }

  private add(x: bigint, y: bigint, carry: bigint, width: Width): bigint {
    const result = toUnsigned(x + y + carry, width);
    const signed = toSigned(x, width) + toSigned(y, width) + carry;
    this.regs.cf = x + y + carry > mask(width);
    this.regs.of = signed !== toSigned(result, width);
    this.resultFlags(result, width);
    return result;
  }

  private sub(x: bigint, y: bigint, borrow: bigint, width: Width): bigint {
    const result = toUnsigned(x - y - borrow, width);
    const signed = toSigned(x, width) - toSigned(y, width) - borrow;
    this.regs.cf = x < y + borrow;
    this.regs.of = signed !== toSigned(result, width);
    this.resultFlags(result, width);
    return result;
  }

  private shift(op: string, target: Operand, countOperand: Operand, width: Width) {
    const count = this.read(countOperand, 8) & (width === 64 ? 63n : 31n);
    if (count === 0n) return;
    const value = this.read(target, width);
    const bits = BigInt(width);
    let result: bigint;
    let carry: boolean;

    if (op === "shl" || op === "sal") {
      result = toUnsigned(value << count, width);
      carry = count <= bits ? ((value >> (bits - count)) & 1n) === 1n : false;
      this.regs.of = ((result >> (bits - 1n)) & 1n) === 1n ? !carry : carry;
    } else if (op === "shr") {
      result = value >> count;
      carry = ((value >> (count - 1n)) & 1n) === 1n;
      this.regs.of = ((value >> (bits - 1n)) & 1n) === 1n;
    } else {
      const signed = toSigned(value, width);
      result = toUnsigned(signed >> count, width);
      carry = ((signed >> (count - 1n)) & 1n) === 1n;
      this.regs.of = false;
    }

    this.regs.cf = carry;
    this.resultFlags(result, width);
    this.write(target, width, result);
  }

  private imul(operands: Operand[], width: Width) {
    const [a, b, c] = operands;
    if (operands.length === 1) {
      const product = toSigned(this.regs.get(RAX), width) * toSigned(this.read(a, width), width);
      this.storeWide(product, width);
      const fits = product === toSigned(product, width);
      this.regs.cf = !fits;
      this.regs.of = !fits;
      return;
    }
    const x = toSigned(this.read(operands.length === 2 ? a : b, width), width);
    const y = toSigned(operands.length === 2 ? this.read(b, width) : this.read(c, width), width);
    const product = x * y;
    const fits = product === toSigned(product, width);
    this.write(a, width, product);
    this.regs.cf = !fits;
    this.regs.of = !fits;
  }

  private mul(source: bigint, width: Width) {
    const product = toUnsigned(this.regs.get(RAX), width) * source;
    this.storeWide(product, width);
    const high = product >> BigInt(width);
    this.regs.cf = high !== 0n;
    this.regs.of = high !== 0n;
  }

  /** Writes a double-width product to ax, dx:ax, edx:eax or rdx:rax. */
  private storeWide(product: bigint, width: Width) {
    const bits = BigInt(width);
    const low = toUnsigned(product, width);
    const high = toUnsigned(product >> bits, width);
    if (width === 8) {
      this.writeRax(16, (high << 8n) | low);
      return;
    }
    this.writeRax(width, low);
    this.writeRdx(width, high);
  }

  private divide(divisor: bigint, width: Width, signed: boolean) {
    if (divisor === 0n) typeError("divide error");
    const bits = BigInt(width);
    const rax = this.regs.get(RAX);
    const rdx = this.regs.get(RDX);
    const dividendBits = width === 8 ? toUnsigned(rax, 16) : (toUnsigned(rdx, width) << bits) | toUnsigned(rax, width);

    let quotient: bigint;
    let remainder: bigint;
    if (signed) {
      const dividend = BigInt.asIntN(width * 2, dividendBits);
      const d = toSigned(divisor, width);
      quotient = dividend / d;
      remainder = dividend % d;
      if (quotient !== toSigned(quotient, width)) typeError("divide error");
    } else {
      quotient = dividendBits / divisor;
      remainder = dividendBits % divisor;
      if (quotient > mask(width)) typeError("divide error");
    }

    if (width === 8) {
      this.regs.write(AL, quotient);
      this.regs.write(AH, remainder);
      return;
    }
    this.writeRax(width, quotient);
    this.writeRdx(width, remainder);
  }

  private writeRax(width: Width, value: bigint) {
    this.writeGeneral(RAX, width, value);
  }

  private writeRdx(width: Width, value: bigint) {
    this.writeGeneral(RDX, width, value);
  }

  private writeGeneral(index: number, width: Width, value: bigint) {
    this.regs.write({ name: "", index, width, high: false }, value);
  }
}
