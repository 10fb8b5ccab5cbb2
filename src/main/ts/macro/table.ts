import {
  Definition,
  KeywordDefinition,
  MacroDefinition,
} from "./definitions.js";

/**
 * Registered macros and keywords for one session. Macros and keywords share
 * a namespace: defining either kind under an existing name replaces it.
 */
export class MacroTable {
  private readonly entries = new Map<string, Definition>();

  define(definition: Definition) {
    this.entries.set(definition.name, definition);
  }

  macro(name: string): MacroDefinition | undefined {
    const entry = this.entries.get(name);
    return entry?.kind === "macro" ? entry : undefined;
  }

  keyword(name: string): KeywordDefinition | undefined {
    const entry = this.entries.get(name);
    return entry?.kind === "keyword" ? entry : undefined;
  }

  remove(name: string): boolean {
    return this.entries.delete(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }
}
