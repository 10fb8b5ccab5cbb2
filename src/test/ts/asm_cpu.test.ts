import { describe, expect, it } from "vitest";
import { ErrorKind } from "../../main/ts/common/errors.js";
import { Cpu } from "../../main/ts/asm/cpu.js";
import { decodeAsm } from "../../main/ts/asm/decoder.js";
import { Memory } from "../../main/ts/asm/memory.js";
import { RegisterFile, lookupRegister, toSigned } from "../../main/ts/asm/registers.js";
import { errorOf } from "./helpers.js";

function execute(text: string, options: { memory?: number; stepLimit?: number } = {}) {
  const regs = new RegisterFile();
  const memory = new Memory(options.memory ?? 64);
  new Cpu(regs, memory, { stepLimit: options.stepLimit }).run(decodeAsm(text));
  const reg = (name: string) => {
    const ref = lookupRegister(name);
    if (!ref) throw new Error(`no register ${name}`);
    return regs.read(ref);
  };
  const signed = (name: string) => toSigned(reg(name), 64);
  return { regs, memory, reg, signed };
}

describe("asm decoder", () => {
  it("should skip comments and blank lines", () => {
    const program = decodeAsm("mov rax, 1 ; one\n# full line\n\nadd rax, 2 # two");
    expect(program.instructions.map((i) => [i.mnemonic, i.line])).toEqual([
      ["mov", 1],
      ["add", 4],
    ]);
  });

  it("should split conditional families", () => {
    const [jump, set, move] = decodeAsm("top:\njne top\nsetl al\ncmovg rax, rbx").instructions;
    expect([jump.op, jump.cond]).toEqual(["j", "ne"]);
    expect([set.op, set.cond]).toEqual(["set", "l"]);
    expect([move.op, move.cond]).toEqual(["cmov", "g"]);
  });

  it("should reject unknown mnemonics with their line", () => {
    const error = errorOf(() => decodeAsm("nop\n\n  bogus rax"));
    expect(error.kind).toBe(ErrorKind.UnsupportedOpcode);
    expect(error.message).toBe("unsupported instruction 'bogus' on asm line 3");
  });

  it("should reject jumps to unknown labels", () => {
    expect(errorOf(() => decodeAsm("jmp nowhere")).message).toBe(
      "unsupported instruction 'jmp' on asm line 1: unknown label 'nowhere'"
    );
  });

  it("should reject operand forms outside the subset", () => {
    expect(errorOf(() => decodeAsm("inc 5")).message).toBe(
      "unsupported instruction 'inc' on asm line 1: invalid operands 'i'"
    );
    expect(errorOf(() => decodeAsm("mov rax, ebx")).message).toBe(
      "unsupported instruction 'mov' on asm line 1: operand size mismatch"
    );
    expect(errorOf(() => decodeAsm("mov al, 300")).message).toBe(
      "unsupported instruction 'mov' on asm line 1: immediate 300 does not fit in 8 bits"
    );
    expect(errorOf(() => decodeAsm("shl rax, bl")).message).toBe(
      "unsupported instruction 'shl' on asm line 1: shift count must be an immediate or cl"
    );
  });
});

describe("Cpu", () => {
  it("should move and add", () => {
    expect(execute("mov rax, 5\nadd rax, 7").reg("rax")).toBe(12n);
  });

  it("should zero-extend 32-bit writes and preserve the rest on 8-bit writes", () => {
    expect(execute("mov rax, -1\nmov eax, 1").reg("rax")).toBe(1n);
    expect(execute("mov rax, -1\nmov al, 0").reg("rax")).toBe(0xffffffffffffff00n);
  });

  it("should set carry and sign on borrow", () => {
    const { regs, signed } = execute("mov rax, 1\nsub rax, 2");
    expect(signed("rax")).toBe(-1n);
    expect([regs.cf, regs.sf, regs.zf]).toEqual([true, true, false]);
  });

  it("should set overflow on signed wraparound", () => {
    const { regs, reg } = execute("mov al, 127\nadd al, 1");
    expect(reg("al")).toBe(0x80n);
    expect([regs.of, regs.sf, regs.cf]).toEqual([true, true, false]);
  });

  it("should compute parity of the low byte", () => {
    expect(execute("mov rax, 3\nand rax, 3").regs.pf).toBe(true);
    expect(execute("mov rax, 7\nand rax, 7").regs.pf).toBe(false);
  });

  it("should count down with loop", () => {
    expect(execute("mov rcx, 10\nxor rax, rax\ntop:\nadd rax, rcx\nloop top").reg("rax")).toBe(55n);
  });

  it("should call and return", () => {
    const { reg } = execute(
      "mov rdi, 6\ncall double\njmp end\ndouble:\nlea rax, [rdi + rdi]\nret\nend:"
    );
    expect(reg("rax")).toBe(12n);
  });

  it("should halt on ret with an empty stack", () => {
    expect(execute("mov rax, 1\nret\nmov rax, 2").reg("rax")).toBe(1n);
  });

  it("should push and pop through the stack", () => {
    const { reg } = execute("mov rax, 7\npush rax\npop rbx");
    expect(reg("rbx")).toBe(7n);
    expect(reg("rsp")).toBe(64n);
  });

  it("should divide unsigned and signed", () => {
    const unsigned = execute("mov rax, 17\nmov rcx, 5\nxor rdx, rdx\ndiv rcx");
    expect([unsigned.reg("rax"), unsigned.reg("rdx")]).toEqual([3n, 2n]);
    const signed = execute("mov rax, -17\ncqo\nmov rcx, 5\nidiv rcx");
    expect([signed.signed("rax"), signed.signed("rdx")]).toEqual([-3n, -2n]);
  });

  it("should raise a divide error", () => {
    const error = errorOf(() => execute("xor rcx, rcx\ndiv rcx"));
    expect(error.kind).toBe(ErrorKind.TypeError);
    expect(error.message).toBe("divide error");
  });

  it("should shift logically and arithmetically", () => {
    expect(execute("mov rax, 1\nshl rax, 4").reg("rax")).toBe(16n);
    expect(execute("mov rax, -16\nsar rax, 2").signed("rax")).toBe(-4n);
    expect(execute("mov cl, 3\nmov rax, 64\nshr rax, cl").reg("rax")).toBe(8n);
  });

  it("should materialize conditions with set and movzx", () => {
    expect(execute("mov rax, 5\ncmp rax, 5\nsete bl\nmovzx rcx, bl").reg("rcx")).toBe(1n);
  });

  it("should multiply with three operands", () => {
    expect(execute("mov rbx, 6\nimul rax, rbx, 7").reg("rax")).toBe(42n);
  });

  it("should address memory with index and scale", () => {
    const { reg, memory } = execute("mov rbx, 8\nmov qword ptr [rbx*2 + 0], 99\nmov rax, [16]");
    expect(reg("rax")).toBe(99n);
    expect(memory.read(16n, 64)).toBe(99n);
  });

  it("should fault outside the memory region", () => {
    const error = errorOf(() => execute("mov rax, [100]"));
    expect(error.kind).toBe(ErrorKind.MemoryFault);
    expect(error.message).toBe("memory fault: 8-byte access at 100 outside region of 64 bytes");
  });

  it("should stop at the step limit", () => {
    const error = errorOf(() => execute("top:\njmp top", { stepLimit: 100 }));
    expect(error.kind).toBe(ErrorKind.ExecutionLimit);
    expect(error.message).toBe("asm block exceeded the limit of 100");
  });
});
