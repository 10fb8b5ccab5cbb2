import { ErrorKind, KestrelError, fail } from "../common/errors.js";
import { Span } from "../common/span.js";
import { tokenize } from "../lexer/lexer.js";
import { Token, TokenType, tokenSpan } from "../lexer/token.js";
import {
  MacroDefinition,
  readDefinition,
  readTokenTree,
} from "./definitions.js";
import { MacroTable } from "./table.js";

export const DEFAULT_MACRO_DEPTH_LIMIT = 64;

/** How `#insert` finds and reads the files it splices in. */
export interface IncludeLoader {
  /** Canonical path of `path` as seen from `fromFile`; throws ModuleNotFound. */
  locate(path: string, fromFile: string, span?: Span): string;
  read(canonicalPath: string): string;
}

export interface ExpanderOptions {
  depthLimit?: number;
  loader?: IncludeLoader;
}

type Bindings = Map<string, Token[]>;

const CLOSERS = new Set<TokenType>([
  TokenType.CloseParen,
  TokenType.CloseBracket,
  TokenType.CloseBrace,
]);

/**
 * Rewrites a token stream until no macro invocation or keyword trigger is
 * left. One left-to-right pass: definitions register where they are scanned,
 * and each expansion is spliced back in at the cursor and rescanned, so the
 * outermost invocation always expands first.
 */
export class MacroExpander {
  private readonly depthLimit: number;
  private readonly loader?: IncludeLoader;
  private readonly inserting: string[] = [];

  constructor(
    readonly table: MacroTable,
    options: ExpanderOptions = {}
  ) {
    this.depthLimit = options.depthLimit ?? DEFAULT_MACRO_DEPTH_LIMIT;
    this.loader = options.loader;
  }

  expand(tokens: Token[], sourceFile: string): Token[] {
    this.inserting.push(sourceFile);
    try {
      return this.run(tokens.slice());
    } finally {
      this.inserting.pop();
    }
  }

  private run(work: Token[]): Token[] {
    const output: Token[] = [];
    let i = 0;

    while (i < work.length) {
      const token = work[i];

      switch (token.type) {
        case TokenType.Macro:
        case TokenType.Keyword: {
          const { value, end } = readDefinition(work, i);
          this.table.define(value);
          output.push(...work.slice(i, end));
          i = end;
          continue;
        }
        case TokenType.Insert:
          output.push(...this.insert(work, i));
          i = this.skipSemicolon(work, i + 2);
          continue;
        case TokenType.Undef: {
          const name = work[i + 1];
          if (name === undefined || name.type !== TokenType.Identifier) {
            throw this.parseError(name ?? token, "Expect macro name after '#undef'.");
          }
          this.table.remove(name.lexeme);
          i = this.skipSemicolon(work, i + 2);
          continue;
        }
        case TokenType.Identifier: {
          const replacement = this.expandAt(work, i);
          if (replacement) {
            work.splice(i, replacement.end - i, ...replacement.tokens);
            continue;
          }
          break;
        }
      }

      output.push(token);
      i++;
    }

    return output;
  }

  /** Expansion of the trigger at `index`, if there is one. */
  private expandAt(
    work: Token[],
    index: number
  ): { tokens: Token[]; end: number } | undefined {
    const trigger = work[index];
    const next = work[index + 1];

    if (
      next?.type === TokenType.Bang &&
      work[index + 2]?.type === TokenType.OpenParen
    ) {
      const macro = this.table.macro(trigger.lexeme);
      if (!macro) {
        return fail(
          ErrorKind.UndefinedNameError,
          { name: trigger.lexeme, what: "macro" },
          tokenSpan(trigger)
        );
      }
      const group = readTokenTree(work, index + 2);
      const args = splitArguments(group.value.slice(1, -1));
      return {
        tokens: this.invokeMacro(macro, trigger, args),
        end: group.end,
      };
    }

    const keyword = this.table.keyword(trigger.lexeme);
    if (!keyword) return undefined;
    const match = matchPattern(keyword.pattern, work, index + 1);
    if (!match) return undefined;
    return {
      tokens: this.substitute(keyword.name, keyword.template, match.bindings, trigger),
      end: match.end,
    };
  }

  private invokeMacro(
    macro: MacroDefinition,
    trigger: Token,
    args: Token[][]
  ): Token[] {
    if (args.length !== macro.params.length) {
      return fail(
        ErrorKind.ArityError,
        {
          name: `${macro.name}!`,
          expected: macro.params.length,
          actual: args.length,
        },
        tokenSpan(trigger)
      );
    }
    const bindings: Bindings = new Map();
    macro.params.forEach((param, i) => bindings.set(param, args[i]));
    return this.substitute(macro.name, macro.body, bindings, trigger);
  }

  /**
   * Instantiates a template. Template tokens take the trigger's position so
   * later diagnostics point at the call site; captured tokens keep their own.
   */
  private substitute(
    name: string,
    template: Token[],
    bindings: Bindings,
    trigger: Token
  ): Token[] {
    const depth = trigger.depth + 1;
    if (depth > this.depthLimit) {
      fail(
        ErrorKind.MacroExpansionLimit,
        { name, limit: this.depthLimit },
        tokenSpan(trigger)
      );
    }

    const result: Token[] = [];
    for (const token of template) {
      const captured =
        token.type === TokenType.MacroVar ? bindings.get(token.lexeme.slice(1)) : undefined;
      if (captured) {
        for (const piece of captured) result.push({ ...piece, depth });
      } else {
        result.push({
          ...token,
          line: trigger.line,
          column: trigger.column,
          offset: trigger.offset,
          length: trigger.length,
          sourceFile: trigger.sourceFile,
          depth,
        });
      }
    }
    return result;
  }

  private insert(work: Token[], index: number): Token[] {
    const directive = work[index];
    const pathToken = work[index + 1];
    if (pathToken === undefined || pathToken.type !== TokenType.String) {
      throw this.parseError(pathToken ?? directive, "Expect file path after '#insert'.");
    }
    if (!this.loader) {
      return fail(
        ErrorKind.ModuleNotFound,
        { path: String(pathToken.literal ?? "") },
        tokenSpan(pathToken)
      );
    }

    const span = tokenSpan(pathToken);
    const target = this.loader.locate(String(pathToken.literal ?? ""), directive.sourceFile, span);
    if (this.inserting.includes(target)) {
      const start = this.inserting.indexOf(target);
      return fail(
        ErrorKind.CircularImport,
        { chain: [...this.inserting.slice(start), target].join(" -> ") },
        span
      );
    }

    const tokens = tokenize(this.loader.read(target), target);
    return this.expand(tokens, target).filter((t) => t.type !== TokenType.EOF);
  }

  private skipSemicolon(work: Token[], index: number): number {
    return work[index]?.type === TokenType.Semicolon ? index + 1 : index;
  }

  private parseError(token: Token, message: string): KestrelError {
    const found = token.type === TokenType.EOF ? "end of input" : token.lexeme;
    return new KestrelError(ErrorKind.ParseError, { message, found }, tokenSpan(token));
  }
}

/** Splits the tokens between a macro call's parentheses on top-level commas. */
export function splitArguments(tokens: Token[]): Token[][] {
  if (tokens.length === 0) return [];
  const args: Token[][] = [];
  let current: Token[] = [];
  let i = 0;
  while (i < tokens.length) {
    if (tokens[i].type === TokenType.Comma) {
      args.push(current);
      current = [];
      i++;
      continue;
    }
    const tree = readTokenTree(tokens, i);
    current.push(...tree.value);
    i = tree.end;
  }
  args.push(current);
  return args;
}

/**
 * Matches a keyword pattern against the tokens after its trigger. Literal
 * pattern tokens compare by kind and lexeme; `$x` captures one token tree.
 */
export function matchPattern(
  pattern: Token[],
  tokens: Token[],
  start: number
): { bindings: Bindings; end: number } | undefined {
  const bindings: Bindings = new Map();
  let i = start;
  for (const expected of pattern) {
    const token = tokens[i];
    if (token === undefined || token.type === TokenType.EOF) return undefined;
    if (expected.type === TokenType.MacroVar) {
      if (CLOSERS.has(token.type)) return undefined;
      const tree = readTokenTree(tokens, i);
      bindings.set(expected.lexeme.slice(1), tree.value);
      i = tree.end;
    } else if (token.type === expected.type && token.lexeme === expected.lexeme) {
      i++;
    } else {
      return undefined;
    }
  }
  return { bindings, end: i };
}
