import { ErrorKind, fail } from "../common/errors.js";
import { Span } from "../common/span.js";
import { CONDITIONS } from "./conditions.js";
import { RegisterRef, Width, lookupRegister } from "./registers.js";

export type Operand =
  | { kind: "reg"; reg: RegisterRef }
  | { kind: "imm"; value: bigint }
  | {
      kind: "mem";
      /** Explicit `byte/word/dword/qword ptr` size, if any. */
      width?: Width;
      base?: RegisterRef;
      index?: RegisterRef;
      scale: bigint;
      disp: bigint;
    }
  | { kind: "label"; name: string; target: number };

export interface Instruction {
  /** Base operation: `j`, `cmov` and `set` for the conditional families. */
  op: string;
  /** Condition-code suffix for `j`, `cmov` and `set`. */
  cond?: string;
  mnemonic: string;
  operands: Operand[];
  /** Operation size, taken from a register or sized memory operand (qword otherwise). */
  width: Width;
  /** 1-based line within the asm body. */
  line: number;
}

export interface AsmProgram {
  instructions: Instruction[];
  labels: ReadonlyMap<string, number>;
}

// Operand signatures per mnemonic: r register, m memory, i immediate, l label.
// "rm,rmi" means a register or memory destination and any source.
const FORMS: Record<string, string[]> = {
  mov: ["rm,rmi"],
  movzx: ["r,rm"],
  movsx: ["r,rm"],
  lea: ["r,m"],
  xchg: ["rm,rm"],
  add: ["rm,rmi"],
  sub: ["rm,rmi"],
  adc: ["rm,rmi"],
  sbb: ["rm,rmi"],
  and: ["rm,rmi"],
  or: ["rm,rmi"],
  xor: ["rm,rmi"],
  cmp: ["rm,rmi"],
  test: ["rm,ri"],
  imul: ["rm", "r,rm", "r,rm,i"],
  mul: ["rm"],
  div: ["rm"],
  idiv: ["rm"],
  inc: ["rm"],
  dec: ["rm"],
  neg: ["rm"],
  not: ["rm"],
  shl: ["rm,ri"],
  sal: ["rm,ri"],
  shr: ["rm,ri"],
  sar: ["rm,ri"],
  jmp: ["l"],
  call: ["l"],
  loop: ["l"],
  j: ["l"],
  cmov: ["r,rm"],
  set: ["rm"],
  push: ["rmi"],
  pop: ["rm"],
  ret: [""],
  cqo: [""],
  nop: [""],
  hlt: [""],
};

const SIZE_KEYWORDS: Record<string, Width> = {
  byte: 8,
  word: 16,
  dword: 32,
  qword: 64,
};

const LABEL_LINE = /^([A-Za-z_.][\w.]*)\s*:\s*(.*)$/;
const NUMBER = /^[-+]?(0x[0-9a-f]+|0b[01]+|\d+)$/i;
const IDENTIFIER = /^[A-Za-z_.][\w.]*$/;

interface LineInfo {
  text: string;
  line: number;
  offset: number;
}

/**
 * Decodes the raw text of an asm body. Every line is validated against the
 * supported subset up front so nothing executes from a malformed block.
 */
export class AsmDecoder {
  private readonly labels = new Map<string, number>();
  private readonly instructions: Instruction[] = [];
  private readonly pendingLabels: { operand: { name: string; target: number }; line: LineInfo; mnemonic: string }[] = [];

  constructor(
    private readonly text: string,
    private readonly origin?: Span
  ) {}

  decode(): AsmProgram {
    let offset = 0;
    this.text.split("\n").forEach((raw, i) => {
      this.decodeLine({ text: raw, line: i + 1, offset });
      offset += raw.length + 1;
    });

    for (const pending of this.pendingLabels) {
      const target = this.labels.get(pending.operand.name);
      if (target === undefined) {
        this.unsupported(pending.mnemonic, pending.line, `unknown label '${pending.operand.name}'`);
      }
      pending.operand.target = target;
    }

    return { instructions: this.instructions, labels: this.labels };
  }

  private decodeLine(info: LineInfo) {
    let body = stripComment(info.text).trim();
    if (body === "") return;

    const labelMatch = LABEL_LINE.exec(body);
    if (labelMatch) {
      const name = labelMatch[1];
      if (this.labels.has(name)) this.unsupported(name, info, `duplicate label '${name}'`);
      this.labels.set(name, this.instructions.length);
      body = labelMatch[2].trim();
      if (body === "") return;
    }

    const space = body.search(/\s/);
    const mnemonic = (space < 0 ? body : body.slice(0, space)).toLowerCase();
    const rest = space < 0 ? "" : body.slice(space + 1).trim();
    const { op, cond } = this.classify(mnemonic, info);

    const operands = rest === "" ? [] : rest.split(",").map((part) => this.operand(part.trim(), mnemonic, info));
    const instruction: Instruction = {
      op,
      cond,
      mnemonic,
      operands,
      width: 64,
      line: info.line,
    };
    this.validate(instruction, info);
    for (const operand of operands) {
      if (operand.kind === "label") this.pendingLabels.push({ operand, line: info, mnemonic });
    }
    this.instructions.push(instruction);
  }

  private classify(mnemonic: string, info: LineInfo): { op: string; cond?: string } {
    if (FORMS[mnemonic] !== undefined && mnemonic !== "j" && mnemonic !== "set" && mnemonic !== "cmov") {
      return { op: mnemonic };
    }
    for (const family of ["cmov", "set", "j"]) {
      const cond = mnemonic.slice(family.length);
      if (mnemonic.startsWith(family) && CONDITIONS.has(cond)) {
        return { op: family, cond };
      }
    }
    return this.unsupported(mnemonic, info);
  }

  private operand(text: string, mnemonic: string, info: LineInfo): Operand {
    const lower = text.toLowerCase();
    let width: Width | undefined;
    let rest = lower;

    const sized = /^(byte|word|dword|qword)\s+(?:ptr\s+)?(.*)$/.exec(lower);
    if (sized) {
      width = SIZE_KEYWORDS[sized[1]];
      rest = sized[2].trim();
      if (!rest.startsWith("[")) {
        this.unsupported(mnemonic, info, `size prefix needs a memory operand: '${text}'`);
      }
    }

    if (rest.startsWith("[")) {
      if (!rest.endsWith("]")) this.unsupported(mnemonic, info, `unterminated memory operand '${text}'`);
      return { kind: "mem", width, ...this.address(rest.slice(1, -1), mnemonic, info) };
    }

    const reg = lookupRegister(lower);
    if (reg) return { kind: "reg", reg };
    if (NUMBER.test(lower)) return { kind: "imm", value: parseNumber(lower) };
    if (IDENTIFIER.test(text)) return { kind: "label", name: text, target: -1 };
    return this.unsupported(mnemonic, info, `bad operand '${text}'`);
  }

  /** `base + index*scale + disp`, terms in any order. */
  private address(
    text: string,
    mnemonic: string,
    info: LineInfo
  ): { base?: RegisterRef; index?: RegisterRef; scale: bigint; disp: bigint } {
    let base: RegisterRef | undefined;
    let index: RegisterRef | undefined;
    let scale = 1n;
    let disp = 0n;

    const terms = text.replace(/\s+/g, "").match(/[+-]?[^+-]+/g) ?? [];
    if (terms.length === 0) this.unsupported(mnemonic, info, "empty memory operand");

    for (const term of terms) {
      const negative = term.startsWith("-");
      const body = term.replace(/^[+-]/, "");

      if (NUMBER.test(body)) {
        const value = parseNumber(body);
        disp += negative ? -value : value;
        continue;
      }

      const scaled = /^(\w+)\*(\w+)$/.exec(body);
      if (scaled) {
        const [regName, factor] = lookupRegister(scaled[1]) ? [scaled[1], scaled[2]] : [scaled[2], scaled[1]];
        const reg = lookupRegister(regName);
        if (!reg || negative || index || !/^[1248]$/.test(factor)) {
          this.unsupported(mnemonic, info, `bad memory operand '[${text}]'`);
        }
        index = reg;
        scale = BigInt(factor);
        continue;
      }

      const reg = lookupRegister(body);
      if (!reg || negative || reg.width !== 64) {
        this.unsupported(mnemonic, info, `bad memory operand '[${text}]'`);
      }
      if (!base) {
        base = reg;
      } else if (!index) {
        index = reg;
      } else {
        this.unsupported(mnemonic, info, `bad memory operand '[${text}]'`);
      }
    }

    return { base, index, scale, disp };
  }

  private validate(instruction: Instruction, info: LineInfo) {
    const { op, mnemonic, operands } = instruction;
    const signature = operands.map(operandClass).join(",");
    const accepted = FORMS[op].some((form) => matchesForm(form, signature));
    if (!accepted) {
      this.unsupported(mnemonic, info, `invalid operands '${signature || "none"}'`);
    }
    if (operands.filter((o) => o.kind === "mem").length > 1) {
      this.unsupported(mnemonic, info, "two memory operands");
    }

    const sizes = operands.flatMap((o) =>
      o.kind === "reg" ? [o.reg.width] : o.kind === "mem" && o.width ? [o.width] : []
    );
    instruction.width = sizes[0] ?? 64;

    switch (op) {
      case "movzx":
      case "movsx": {
        const [dst, src] = operands;
        const srcWidth = widthOf(src);
        if (srcWidth === undefined || srcWidth >= widthOf(dst, 64)) {
          this.unsupported(mnemonic, info, "source must be narrower than destination");
        }
        return;
      }
      case "set":
        if (widthOf(operands[0], 8) !== 8) this.unsupported(mnemonic, info, "operand must be a byte");
        instruction.width = 8;
        return;
      case "shl":
      case "sal":
      case "shr":
      case "sar": {
        const count = operands[1];
        if (count.kind === "reg" && count.reg.name !== "cl") {
          this.unsupported(mnemonic, info, "shift count must be an immediate or cl");
        }
        instruction.width = widthOf(operands[0], 64);
        return;
      }
      case "lea":
      case "cmov":
        if (instruction.width === 8) this.unsupported(mnemonic, info, "byte register not allowed");
        return;
      case "push":
      case "pop":
        if (operands[0].kind !== "imm" && widthOf(operands[0], 64) !== 64) {
          this.unsupported(mnemonic, info, "operand must be 64-bit");
        }
        instruction.width = 64;
        return;
    }

    if (new Set(sizes).size > 1) this.unsupported(mnemonic, info, "operand size mismatch");
    for (const operand of operands) {
      if (operand.kind === "imm" && !fits(operand.value, instruction.width)) {
        this.unsupported(mnemonic, info, `immediate ${operand.value} does not fit in ${instruction.width} bits`);
      }
    }
  }

  private unsupported(opcode: string, info: LineInfo, reason?: string): never {
    const details: Record<string, string | number> = { opcode, line: info.line };
    if (reason) details.reason = reason;
    return fail(ErrorKind.UnsupportedOpcode, details, this.lineSpan(info));
  }

  private lineSpan(info: LineInfo): Span | undefined {
    if (!this.origin) return undefined;
    const { start, sourceFile } = this.origin;
    const at = {
      line: start.line + info.line - 1,
      column: info.line === 1 ? start.column : 1,
      offset: start.offset + info.offset,
    };
    return {
      start: at,
      end: { ...at, column: at.column + info.text.length, offset: at.offset + info.text.length },
      sourceFile,
    };
  }
}

function stripComment(line: string): string {
  const cut = line.search(/[;#]/);
  return cut < 0 ? line : line.slice(0, cut);
}

function parseNumber(text: string): bigint {
  const negative = text.startsWith("-");
  const digits = text.replace(/^[+-]/, "");
  const value = BigInt(digits);
  return negative ? -value : value;
}

function operandClass(operand: Operand): string {
  switch (operand.kind) {
    case "reg":
      return "r";
    case "mem":
      return "m";
    case "imm":
      return "i";
    case "label":
      return "l";
  }
}

function matchesForm(form: string, signature: string): boolean {
  const slots = form === "" ? [] : form.split(",");
  const actual = signature === "" ? [] : signature.split(",");
  return slots.length === actual.length && slots.every((slot, i) => slot.includes(actual[i]));
}

function widthOf(operand: Operand): Width | undefined;
function widthOf(operand: Operand, fallback: Width): Width;
function widthOf(operand: Operand, fallback?: Width): Width | undefined {
  if (operand.kind === "reg") return operand.reg.width;
  if (operand.kind === "mem") return operand.width ?? fallback;
  return fallback;
}

/** An immediate fits when it is a valid signed or unsigned value of `width` bits. */
function fits(value: bigint, width: Width): boolean {
  const bits = BigInt(width);
  return value >= -(1n << (bits - 1n)) && value < 1n << bits;
}

export function decodeAsm(text: string, origin?: Span): AsmProgram {
  return new AsmDecoder(text, origin).decode();
}
