import {
  AsmSource,
  AssignExpr,
  CallExpr,
  Expression,
  ForExpr,
  ImportDecl,
  Program,
  Statement,
  TryExpr,
  WhileExpr,
} from "../ast/ast.js";
import { AsmProgram, decodeAsm } from "../asm/decoder.js";
import { DEFAULT_MEMORY_LIMIT, DEFAULT_STACK_SIZE, executeAsm } from "../asm/emulator.js";
import { registerFor } from "../asm/marshal.js";
import { DEFAULT_STEP_LIMIT } from "../asm/cpu.js";
import {
  ErrorKind,
  KestrelError,
  fail,
  isKestrelError,
  typeError,
} from "../common/errors.js";
import { Span } from "../common/span.js";
import { TokenType } from "../lexer/token.js";
import { Globals, ThrownError, errorInstance } from "../runtime/builtins.js";
import { Environment, Namespace } from "../runtime/environment.js";
import {
  AsmBlock,
  Closure,
  NONE,
  StructInstance,
  StructType,
  Value,
  bool,
  display,
  float,
  fnRef,
  int,
  list,
  str,
  typeName,
} from "../runtime/values.js";
import { COMPOUND_OPERATORS, binaryOp, condition, unaryOp } from "./operators.js";

export const DEFAULT_MAX_CALL_DEPTH = 256;

const CALL_DEPTH_EXCEEDED = "maximum call depth exceeded";

/** V8 reports host stack exhaustion as a RangeError. */
function isHostStackOverflow(e: unknown): boolean {
  return e instanceof RangeError && e.message.includes("call stack");
}

/** Instrumentation points for debuggers and tracing tools. */
export interface EvaluatorHooks {
  beforeStatement?(stmt: Statement, env: Environment): void;
  afterStatement?(stmt: Statement, env: Environment, value: Value): void;
}

export interface ModuleLoader {
  load(path: string, fromFile: string, span: Span): Namespace;
}

export interface EvaluatorOptions {
  globals: Globals;
  loader?: ModuleLoader;
  print?: (line: string) => void;
  hooks?: EvaluatorHooks;
  maxCallDepth?: number;
  asmStepLimit?: number;
  asmStackSize?: number;
  asmMemoryLimit?: number;
}

export interface ModuleResult {
  /** Value of the last top-level statement. */
  value: Value;
  exports: string[];
}

export interface NamedArg {
  name: string;
  value: Value;
  span: Span;
}

class BreakSignal {}
class ContinueSignal {}
class ReturnSignal {
  constructor(readonly value: Value) {}
}

export class Evaluator {
  private callDepth = 0;
  private readonly asmPrograms = new WeakMap<AsmSource, AsmProgram>();
  private readonly print: (line: string) => void;
  private readonly maxCallDepth: number;

  constructor(private readonly options: EvaluatorOptions) {
    this.print = options.print ?? ((line) => console.log(line));
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  }

  evaluateModule(program: Program, env: Environment): ModuleResult {
    const exports: string[] = [];
    for (const stmt of program.statements) {
      if ("exported" in stmt && stmt.exported) exports.push(stmt.name);
    }

    try {
      return { value: this.executeStatements(program.statements, env), exports };
    } catch (e) {
      if (e instanceof ReturnSignal) return { value: e.value, exports };
      throw this.stray(e, program.span);
    }
  }

  execute(stmt: Statement, env: Environment): Value {
    this.options.hooks?.beforeStatement?.(stmt, env);
    const value = this.executeInner(stmt, env);
    this.options.hooks?.afterStatement?.(stmt, env, value);
    return value;
  }

  /** Runs statements in `env`; the value is that of a trailing expression statement. */
  executeStatements(statements: Statement[], env: Environment): Value {
    let value: Value = NONE;
    for (const stmt of statements) {
      const result = this.execute(stmt, env);
      value = stmt.kind === "ExpressionStmt" ? result : NONE;
    }
    return value;
  }

  private executeInner(stmt: Statement, env: Environment): Value {
    switch (stmt.kind) {
      case "ExpressionStmt":
        return this.evaluate(stmt.expression, env);
      case "LetDecl":
        env.declare(stmt.name, this.evaluate(stmt.initializer, env), stmt.span);
        return NONE;
      case "FnDecl": {
        const closure: Closure = {
          kind: "Closure",
          name: stmt.name,
          params: stmt.params,
          body: stmt.body,
          env,
        };
        env.declare(stmt.name, fnRef(closure), stmt.span);
        return NONE;
      }
      case "StructDecl": {
        const type: StructType = {
          kind: "StructType",
          name: stmt.name,
          fields: stmt.fields,
          env,
        };
        env.declare(stmt.name, fnRef(type), stmt.span);
        return NONE;
      }
      case "AsmDecl": {
        const block: AsmBlock = {
          name: stmt.name,
          source: stmt.source,
          program: this.prepareAsm(stmt.source),
        };
        env.declare(stmt.name, { kind: "Asm", block }, stmt.span);
        return NONE;
      }
      case "ImportDecl":
        this.importModule(stmt, env);
        return NONE;
      case "MacroDecl":
      case "KeywordDecl":
        return NONE;
      case "ReturnStmt":
        throw new ReturnSignal(stmt.value ? this.evaluate(stmt.value, env) : NONE);
      case "BreakStmt":
        throw new BreakSignal();
      case "ContinueStmt":
        throw new ContinueSignal();
      case "ThrowStmt":
        throw this.thrown(this.evaluate(stmt.value, env), stmt.span);
    }
  }

  evaluate(expr: Expression, env: Environment): Value {
    switch (expr.kind) {
      case "LiteralExpr": {
        const { value } = expr;
        if (value === null) return NONE;
        if (typeof value === "bigint") return int(value);
        if (typeof value === "number") return float(value);
        if (typeof value === "string") return str(value);
        return bool(value);
      }
      case "IdentifierExpr": {
        const value = env.get(expr.name);
        if (value !== undefined) return value;
        if (env.lookupNamespace(expr.name)) {
          return typeError(`module '${expr.name}' is not a value`, expr.span);
        }
        return fail(ErrorKind.UndefinedNameError, { name: expr.name }, expr.span);
      }
      case "ListExpr":
        return list(expr.elements.map((el) => this.evaluate(el, env)));
      case "UnaryExpr":
        return unaryOp(
          expr.operator.type,
          expr.operator.lexeme,
          this.evaluate(expr.right, env),
          expr.span
        );
      case "BinaryExpr": {
        const op = expr.operator.type;
        const left = this.evaluate(expr.left, env);
        if (op === TokenType.AmpersandAmpersand || op === TokenType.PipePipe) {
          const leftTruth = condition(left, expr.left.span);
          if (op === TokenType.AmpersandAmpersand ? !leftTruth : leftTruth) {
            return bool(leftTruth);
          }
          return bool(condition(this.evaluate(expr.right, env), expr.right.span));
        }
        const right = this.evaluate(expr.right, env);
        return binaryOp(op, expr.operator.lexeme, left, right, expr.span);
      }
      case "AssignExpr":
        return this.assign(expr, env);
      case "CallExpr":
        return this.callExpression(expr, env);
      case "AccessExpr":
        return this.access(expr.object, expr.member, expr.span, env);
      case "IndexExpr":
        return this.index(this.evaluate(expr.object, env), this.evaluate(expr.index, env), expr.span);
      case "FnExpr":
        return fnRef({
          kind: "Closure",
          name: "anonymous",
          params: expr.params,
          body: expr.body,
          env,
        });
      case "BlockExpr":
        return this.executeStatements(expr.statements, new Environment(env));
      case "IfExpr": {
        if (condition(this.evaluate(expr.condition, env), expr.condition.span)) {
          return this.evaluate(expr.thenBranch, env);
        }
        return expr.elseBranch ? this.evaluate(expr.elseBranch, env) : NONE;
      }
      case "WhileExpr":
        return this.whileLoop(expr, env);
      case "ForExpr":
        return this.forLoop(expr, env);
      case "TryExpr":
        return this.tryCatch(expr, env);
      case "AsmExpr":
        return this.inlineAsm(expr.source, expr.span, env);
    }
  }

  // --- Calls ---

  private callExpression(expr: CallExpr, env: Environment): Value {
    const callee = this.evaluate(expr.callee, env);
    const positional: Value[] = [];
    const named: NamedArg[] = [];
    for (const arg of expr.args) {
      const value = this.evaluate(arg.value, env);
      if (arg.name === undefined) {
        if (named.length > 0) {
          typeError("positional argument follows named argument", arg.span);
        }
        positional.push(value);
      } else {
        named.push({ name: arg.name, value, span: arg.span });
      }
    }
    return this.call(callee, positional, expr.span, named);
  }

  /** Invokes any callable value. `Session.call` enters scripts through here. */
  call(callee: Value, positional: Value[], span: Span, named: NamedArg[] = []): Value {
    if (this.callDepth >= this.maxCallDepth) {
      typeError(CALL_DEPTH_EXCEEDED, span);
    }
    this.callDepth++;
    try {
      return this.dispatch(callee, positional, named, span);
    } catch (e) {
      // The host stack can run out before maxCallDepth does.
      if (isHostStackOverflow(e)) typeError(CALL_DEPTH_EXCEEDED, span);
      throw e;
    } finally {
      this.callDepth--;
    }
  }

  private dispatch(callee: Value, positional: Value[], named: NamedArg[], span: Span): Value {
    if (callee.kind === "Asm") {
      const { block } = callee;
      if (named.length > 0) typeError(`asm block '${block.name}' takes positional arguments`, span);
      if (positional.length !== block.source.bindings.length) {
        fail(
          ErrorKind.ArityError,
          { name: block.name, expected: block.source.bindings.length, actual: positional.length },
          span
        );
      }
      return executeAsm(block.source, block.program, positional, span, this.asmOptions()).value;
    }
    if (callee.kind !== "Function") {
      return typeError(`${typeName(callee)} is not callable`, span);
    }

    const { callable } = callee;
    switch (callable.kind) {
      case "Closure":
        return this.callClosure(callable, positional, named, span);
      case "StructType":
        return this.construct(callable, positional, named, span);
      case "Builtin": {
        if (named.length > 0) typeError(`${callable.name}() takes no named arguments`, span);
        if (positional.length < callable.minArity || positional.length > callable.maxArity) {
          const expected =
            callable.minArity === callable.maxArity
              ? String(callable.minArity)
              : callable.maxArity === Infinity
                ? `at least ${callable.minArity}`
                : `${callable.minArity} to ${callable.maxArity}`;
          fail(ErrorKind.ArityError, { name: callable.name, expected, actual: positional.length }, span);
        }
        try {
          return callable.call(positional, { print: this.print, span });
        } catch (e) {
          if (isKestrelError(e)) throw e.at(span);
          throw e;
        }
      }
    }
  }

  private callClosure(closure: Closure, positional: Value[], named: NamedArg[], span: Span): Value {
    const { params } = closure;
    const arity = () =>
      fail(
        ErrorKind.ArityError,
        { name: closure.name, expected: params.length, actual: positional.length + named.length },
        span
      );
    if (positional.length > params.length) arity();

    const frame = new Environment(closure.env);
    positional.forEach((value, i) => frame.declare(params[i], value));
    for (const arg of named) {
      if (!params.includes(arg.name)) {
        typeError(`${closure.name}() has no parameter '${arg.name}'`, arg.span);
      }
      if (frame.hasOwn(arg.name)) typeError(`argument '${arg.name}' given twice`, arg.span);
      frame.declare(arg.name, arg.value);
    }
    if (params.some((p) => !frame.hasOwn(p))) arity();

    try {
      return this.executeStatements(closure.body.statements, frame);
    } catch (e) {
      if (e instanceof ReturnSignal) return e.value;
      throw this.stray(e, span);
    }
  }

  /**
   * Binds arguments to fields in declaration order. Defaults are evaluated
   * per instantiation in a frame where the fields bound so far are visible.
   */
  private construct(
    type: StructType,
    positional: Value[],
    named: NamedArg[],
    span: Span
  ): StructInstance {
    if (positional.length > type.fields.length) {
      fail(
        ErrorKind.ArityError,
        { name: type.name, expected: type.fields.length, actual: positional.length },
        span
      );
    }

    const supplied = new Map<string, Value>();
    positional.forEach((value, i) => supplied.set(type.fields[i].name, value));
    for (const arg of named) {
      if (!type.fields.some((f) => f.name === arg.name)) {
        typeError(`${type.name} has no field '${arg.name}'`, arg.span);
      }
      if (supplied.has(arg.name)) typeError(`field '${arg.name}' given twice`, arg.span);
      supplied.set(arg.name, arg.value);
    }

    const frame = new Environment(type.env);
    const fields = new Map<string, Value>();
    for (const field of type.fields) {
      let value = supplied.get(field.name);
      if (value === undefined) {
        if (field.defaultValue) {
          value = this.evaluate(field.defaultValue, frame);
        } else if (field.optional) {
          value = NONE;
        } else {
          return fail(ErrorKind.MissingField, { struct: type.name, field: field.name }, span);
        }
      }
      frame.declare(field.name, value);
      fields.set(field.name, value);
    }
    return { kind: "Struct", type, fields, frozen: false };
  }

  // --- Member access and assignment ---

  private namespaceOf(object: Expression, env: Environment): Namespace | undefined {
    return object.kind === "IdentifierExpr" ? env.lookupNamespace(object.name) : undefined;
  }

  private access(object: Expression, member: string, span: Span, env: Environment): Value {
    const namespace = this.namespaceOf(object, env);
    if (namespace) {
      const value = namespace.exports.get(member);
      if (value === undefined) {
        return fail(ErrorKind.UndefinedNameError, { name: member, what: "export" }, span);
      }
      return value;
    }

    const target = this.evaluate(object, env);
    if (target.kind !== "Struct") {
      return typeError(`${typeName(target)} has no field '${member}'`, span);
    }
    const value = target.fields.get(member);
    if (value === undefined) return typeError(`${target.type.name} has no field '${member}'`, span);
    return value;
  }

  private index(target: Value, index: Value, span: Span): Value {
    if (target.kind === "List") {
      return target.elements[this.position(index, target.elements.length, span)];
    }
    if (target.kind === "String") {
      const chars = [...target.value];
      return str(chars[this.position(index, chars.length, span)]);
    }
    return typeError(`${typeName(target)} is not indexable`, span);
  }

  private position(index: Value, length: number, span: Span): number {
    if (index.kind !== "Integer") return typeError(`index must be int, got ${typeName(index)}`, span);
    if (index.value < 0n || index.value >= BigInt(length)) {
      return typeError(`index ${index.value} out of range for length ${length}`, span);
    }
    return Number(index.value);
  }

  private assign(expr: AssignExpr, env: Environment): Value {
    const { target, operator } = expr;
    const compound = COMPOUND_OPERATORS[operator.type];
    const combine = (current: () => Value): Value => {
      const value = this.evaluate(expr.value, env);
      if (!compound) return value;
      return binaryOp(compound[0], compound[1], current(), value, expr.span);
    };

    switch (target.kind) {
      case "IdentifierExpr": {
        if (!env.has(target.name) && env.lookupNamespace(target.name)) {
          typeError(`cannot assign to module '${target.name}'`, target.span);
        }
        const value = combine(() => env.lookup(target.name, target.span));
        env.assign(target.name, value, target.span);
        return value;
      }
      case "AccessExpr": {
        if (this.namespaceOf(target.object, env)) {
          typeError(`cannot assign to imported '${target.member}'`, target.span);
        }
        const object = this.evaluate(target.object, env);
        if (object.kind !== "Struct") {
          return typeError(`${typeName(object)} has no field '${target.member}'`, target.span);
        }
        const current = object.fields.get(target.member);
        if (current === undefined) {
          typeError(`${object.type.name} has no field '${target.member}'`, target.span);
        }
        if (object.frozen) typeError(`cannot modify an imported ${object.type.name}`, target.span);
        const value = combine(() => current);
        object.fields.set(target.member, value);
        return value;
      }
      case "IndexExpr": {
        const object = this.evaluate(target.object, env);
        const index = this.evaluate(target.index, env);
        if (object.kind !== "List") {
          return typeError(`${typeName(object)} does not support item assignment`, target.span);
        }
        const at = this.position(index, object.elements.length, target.span);
        if (object.frozen) typeError("cannot modify an imported list", target.span);
        const value = combine(() => object.elements[at]);
        object.elements[at] = value;
        return value;
      }
    }
  }

  // --- Control flow ---

  private whileLoop(expr: WhileExpr, env: Environment): Value {
    while (condition(this.evaluate(expr.condition, env), expr.condition.span)) {
      if (this.iteration(expr.body.statements, new Environment(env)) === "break") break;
    }
    return NONE;
  }

  private forLoop(expr: ForExpr, env: Environment): Value {
    const iterable = this.evaluate(expr.iterable, env);
    let items: () => Iterable<Value>;
    if (iterable.kind === "List") {
      items = function* () {
        for (let i = 0; i < iterable.elements.length; i++) yield iterable.elements[i];
      };
    } else if (iterable.kind === "String") {
      items = () => [...iterable.value].map((ch) => str(ch));
    } else {
      return typeError(`cannot iterate over ${typeName(iterable)}`, expr.iterable.span);
    }

    for (const item of items()) {
      const frame = new Environment(env);
      frame.declare(expr.variable, item);
      if (this.iteration(expr.body.statements, frame) === "break") break;
    }
    return NONE;
  }

  private iteration(statements: Statement[], frame: Environment): "break" | "next" {
    try {
      this.executeStatements(statements, frame);
    } catch (e) {
      if (e instanceof BreakSignal) return "break";
      if (e instanceof ContinueSignal) return "next";
      throw e;
    }
    return "next";
  }

  private tryCatch(expr: TryExpr, env: Environment): Value {
    try {
      return this.evaluate(expr.body, env);
    } catch (caught) {
      const e = isHostStackOverflow(caught)
        ? new KestrelError(ErrorKind.TypeError, { message: CALL_DEPTH_EXCEEDED }, expr.span)
        : caught;
      if (!isKestrelError(e)) throw e;
      const frame = new Environment(env);
      frame.declare(expr.errorName, this.errorValue(e));
      return this.executeStatements(expr.handler.statements, frame);
    }
  }

  private errorValue(error: KestrelError): Value {
    const { errorType } = this.options.globals;
    if (error instanceof ThrownError && error.value.kind === "Struct" && error.value.type === errorType) {
      return error.value;
    }
    return errorInstance(errorType, error.kind, error.message, error.span);
  }

  private thrown(value: Value, span: Span): ThrownError {
    const { errorType } = this.options.globals;
    if (value.kind === "Struct" && value.type === errorType) {
      const message = value.fields.get("message");
      return new ThrownError(value, message ? display(message) : "error", span);
    }
    return new ThrownError(value, display(value), span);
  }

  /** Signals that escaped their construct become errors. */
  private stray(e: unknown, span: Span): unknown {
    if (e instanceof BreakSignal) return new KestrelError(ErrorKind.TypeError, { message: "'break' outside of a loop" }, span);
    if (e instanceof ContinueSignal) return new KestrelError(ErrorKind.TypeError, { message: "'continue' outside of a loop" }, span);
    return e;
  }

  // --- Modules ---

  private importModule(stmt: ImportDecl, env: Environment) {
    const { loader } = this.options;
    if (!loader) {
      fail(ErrorKind.ModuleNotFound, { path: stmt.path }, stmt.span);
    }
    const namespace = loader.load(stmt.path, stmt.span.sourceFile, stmt.span);

    if (stmt.alias !== undefined) {
      env.defineNamespace(stmt.alias, namespace);
      return;
    }
    if (stmt.members) {
      for (const member of stmt.members) {
        const value = namespace.exports.get(member.name);
        if (value === undefined) {
          fail(ErrorKind.UndefinedNameError, { name: member.name, what: "export" }, member.span);
        }
        env.declare(member.name, value, member.span);
      }
      return;
    }
    for (const [name, value] of namespace.exports) env.declare(name, value, stmt.span);
  }

  // --- Assembly ---

  private asmOptions() {
    return {
      stepLimit: this.options.asmStepLimit ?? DEFAULT_STEP_LIMIT,
      stackSize: this.options.asmStackSize ?? DEFAULT_STACK_SIZE,
      memoryLimit: this.options.asmMemoryLimit ?? DEFAULT_MEMORY_LIMIT,
    };
  }

  /** Decodes once per block and checks that every named register exists. */
  private prepareAsm(source: AsmSource): AsmProgram {
    const cached = this.asmPrograms.get(source);
    if (cached) return cached;

    const locations = [
      ...source.bindings.map((b) => b.location),
      ...(source.exits.kind === "Single" ? [source.exits.location] : []),
      ...(source.exits.kind === "Tuple" ? source.exits.bindings.map((b) => b.location) : []),
    ];
    for (const location of locations) {
      if (location.kind === "Register") registerFor(location);
    }

    const program = decodeAsm(source.text, source.textSpan);
    this.asmPrograms.set(source, program);
    return program;
  }

  /** Runs an inline block; tuple exits are written back only after it completes. */
  private inlineAsm(source: AsmSource, span: Span, env: Environment): Value {
    const program = this.prepareAsm(source);
    const inputs = source.bindings.map((b) => env.lookup(b.name, b.span));
    const result = executeAsm(source, program, inputs, span, this.asmOptions());

    if (source.exits.kind !== "Tuple") return result.value;
    for (const [name, value] of result.outputs) {
      if (env.has(name)) {
        env.assign(name, value, span);
      } else {
        env.declare(name, value, span);
      }
    }
    return NONE;
  }
}
