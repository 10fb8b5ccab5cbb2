export type Width = 8 | 16 | 32 | 64;

export interface RegisterRef {
  name: string;
  /** Index into the 16-entry general register file. */
  index: number;
  width: Width;
  /** `ah`, `bh`, `ch`, `dh`: bits 8..15 of their register. */
  high: boolean;
}

export const RSP = 4;
export const RAX = 0;
export const RCX = 1;
export const RDX = 2;

// Encoding order: rax rcx rdx rbx rsp rbp rsi rdi.
const LEGACY: [string, string, string, string][] = [
  ["rax", "eax", "ax", "al"],
  ["rcx", "ecx", "cx", "cl"],
  ["rdx", "edx", "dx", "dl"],
  ["rbx", "ebx", "bx", "bl"],
  ["rsp", "esp", "sp", "spl"],
  ["rbp", "ebp", "bp", "bpl"],
  ["rsi", "esi", "si", "sil"],
  ["rdi", "edi", "di", "dil"],
];

const HIGH_BYTES = ["ah", "ch", "dh", "bh"];

function buildTable(): Map<string, RegisterRef> {
  const table = new Map<string, RegisterRef>();
  const add = (name: string, index: number, width: Width, high = false) =>
    table.set(name, { name, index, width, high });

  LEGACY.forEach(([q, d, w, b], index) => {
    add(q, index, 64);
    add(d, index, 32);
    add(w, index, 16);
    add(b, index, 8);
  });
  HIGH_BYTES.forEach((name, index) => add(name, index, 8, true));
  for (let index = 8; index < 16; index++) {
    add(`r${index}`, index, 64);
    add(`r${index}d`, index, 32);
    add(`r${index}w`, index, 16);
    add(`r${index}b`, index, 8);
  }
  return table;
}

const REGISTERS = buildTable();

export function lookupRegister(name: string): RegisterRef | undefined {
  return REGISTERS.get(name.toLowerCase());
}

export const MASK64 = (1n << 64n) - 1n;

export function mask(width: Width): bigint {
  return (1n << BigInt(width)) - 1n;
}

export function toSigned(value: bigint, width: Width): bigint {
  return BigInt.asIntN(width, value);
}

export function toUnsigned(value: bigint, width: Width): bigint {
  return BigInt.asUintN(width, value);
}

/** General registers plus the arithmetic flags the subset maintains. */
export class RegisterFile {
  readonly gpr: bigint[] = new Array<bigint>(16).fill(0n);
  cf = false;
  zf = false;
  sf = false;
  of = false;
  pf = false;

  read(reg: RegisterRef): bigint {
    const full = this.gpr[reg.index];
    if (reg.high) return (full >> 8n) & 0xffn;
    return toUnsigned(full, reg.width);
  }

  /** 32-bit writes zero the upper half; 8- and 16-bit writes preserve the rest. */
  write(reg: RegisterRef, value: bigint) {
    const old = this.gpr[reg.index];
    if (reg.high) {
      this.gpr[reg.index] = (old & ~0xff00n & MASK64) | ((value & 0xffn) << 8n);
    } else if (reg.width === 64 || reg.width === 32) {
      this.gpr[reg.index] = toUnsigned(value, reg.width);
    } else {
      const m = mask(reg.width);
      this.gpr[reg.index] = (old & ~m & MASK64) | (value & m);
    }
  }

  get(index: number): bigint {
    return this.gpr[index];
  }

  set(index: number, value: bigint) {
    this.gpr[index] = toUnsigned(value, 64);
  }
}
