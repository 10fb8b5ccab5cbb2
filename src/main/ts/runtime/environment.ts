import { ErrorKind, fail, typeError } from "../common/errors.js";
import { Span } from "../common/span.js";
import { Value } from "./values.js";

/** A loaded module as an importer sees it. */
export interface Namespace {
  readonly path: string;
  readonly exports: ReadonlyMap<string, Value>;
}

/**
 * One lexical frame. Lookup walks the parent chain; assignment mutates the
 * nearest frame that defines the name; declaration always targets this frame.
 */
export class Environment {
  private readonly values = new Map<string, Value>();
  private readonly namespaces = new Map<string, Namespace>();
  /** What a frozen frame belongs to, for error messages. */
  private frozenAs?: string;

  constructor(readonly parent?: Environment) {}

  declare(name: string, value: Value, span?: Span) {
    if (this.frozenAs) typeError(`cannot declare '${name}' in ${this.frozenAs}`, span);
    this.namespaces.delete(name);
    this.values.set(name, value);
  }

  assign(name: string, value: Value, span?: Span) {
    const frame = this.frameOf(name);
    if (!frame) return fail(ErrorKind.UndefinedNameError, { name }, span);
    if (frame.frozenAs) typeError(`cannot assign to '${name}' of ${frame.frozenAs}`, span);
    frame.values.set(name, value);
  }

  lookup(name: string, span?: Span): Value {
    const value = this.get(name);
    if (value === undefined) return fail(ErrorKind.UndefinedNameError, { name }, span);
    return value;
  }

  get(name: string): Value | undefined {
    return this.frameOf(name)?.values.get(name);
  }

  has(name: string): boolean {
    return this.frameOf(name) !== undefined;
  }

  hasOwn(name: string): boolean {
    return this.values.has(name);
  }

  getOwn(name: string): Value | undefined {
    return this.values.get(name);
  }

  defineNamespace(alias: string, namespace: Namespace) {
    if (this.frozenAs) typeError(`cannot declare '${alias}' in ${this.frozenAs}`);
    this.values.delete(alias);
    this.namespaces.set(alias, namespace);
  }

  /** The namespace bound to `name`, unless a nearer value binding shadows it. */
  lookupNamespace(name: string): Namespace | undefined {
    let frame: Environment | undefined = this;
    while (frame) {
      if (frame.values.has(name)) return undefined;
      const namespace = frame.namespaces.get(name);
      if (namespace) return namespace;
      frame = frame.parent;
    }
    return undefined;
  }

  freeze(owner = "an imported module") {
    this.frozenAs = owner;
  }

  isFrozen(): boolean {
    return this.frozenAs !== undefined;
  }

  /** This frame's own bindings, in declaration order. */
  bindings(): IterableIterator<[string, Value]> {
    return this.values.entries();
  }

  depth(): number {
    let count = 0;
    let frame: Environment | undefined = this;
    while (frame) {
      count++;
      frame = frame.parent;
    }
    return count;
  }

  private frameOf(name: string): Environment | undefined {
    let frame: Environment | undefined = this;
    while (frame) {
      if (frame.values.has(name)) return frame;
      frame = frame.parent;
    }
    return undefined;
  }
}
