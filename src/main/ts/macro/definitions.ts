import { ErrorKind, KestrelError } from "../common/errors.js";
import { OPENERS, Token, TokenType, tokenSpan } from "../lexer/token.js";

export interface MacroDefinition {
  kind: "macro";
  name: string;
  params: string[];
  body: Token[];
  /** The `macro` token, for diagnostics. */
  origin: Token;
}

export interface KeywordDefinition {
  kind: "keyword";
  name: string;
  pattern: Token[];
  template: Token[];
  origin: Token;
}

export type Definition = MacroDefinition | KeywordDefinition;

export interface ReadResult<T> {
  value: T;
  /** Index of the first token after what was read. */
  end: number;
}

function parseError(token: Token, message: string): KestrelError {
  const found = token.type === TokenType.EOF ? "end of input" : token.lexeme;
  return new KestrelError(ErrorKind.ParseError, { message, found }, tokenSpan(token));
}

function expect(tokens: Token[], index: number, type: TokenType, message: string): Token {
  const token = tokens[index];
  if (token === undefined || token.type !== type) {
    throw parseError(token ?? tokens[tokens.length - 1], message);
  }
  return token;
}

/**
 * Reads one balanced token tree starting at `index`: a single token, or an
 * opening bracket through its matching close.
 */
export function readTokenTree(tokens: Token[], index: number): ReadResult<Token[]> {
  const first = tokens[index];
  const close = OPENERS.get(first.type);
  if (close === undefined) return { value: [first], end: index + 1 };

  const stack: TokenType[] = [close];
  let i = index + 1;
  while (stack.length > 0) {
    const token = tokens[i];
    if (token === undefined || token.type === TokenType.EOF) {
      throw parseError(first, "Unterminated group.");
    }
    const nested = OPENERS.get(token.type);
    if (nested !== undefined) {
      stack.push(nested);
    } else if (token.type === stack[stack.length - 1]) {
      stack.pop();
    } else if (
      token.type === TokenType.CloseParen ||
      token.type === TokenType.CloseBracket ||
      token.type === TokenType.CloseBrace
    ) {
      throw parseError(token, "Mismatched closing bracket.");
    }
    i++;
  }
  return { value: tokens.slice(index, i), end: i };
}

/** Reads `{ … }` and returns the tokens between the braces. */
function readBraced(tokens: Token[], index: number, message: string): ReadResult<Token[]> {
  expect(tokens, index, TokenType.OpenBrace, message);
  const tree = readTokenTree(tokens, index);
  return { value: tree.value.slice(1, -1), end: tree.end };
}

/**
 * Reads `macro name($a, $b) { … }` or `keyword name pattern => { … }`
 * starting at the `macro` / `keyword` token.
 */
export function readDefinition(tokens: Token[], index: number): ReadResult<Definition> {
  const origin = tokens[index];
  const name = expect(tokens, index + 1, TokenType.Identifier, `Expect ${origin.lexeme} name.`);

  if (origin.type === TokenType.Macro) {
    let i = index + 2;
    expect(tokens, i, TokenType.OpenParen, "Expect '(' after macro name.");
    i++;
    const params: string[] = [];
    if (tokens[i]?.type !== TokenType.CloseParen) {
      for (;;) {
        const param = expect(tokens, i, TokenType.MacroVar, "Expect '$name' macro parameter.");
        params.push(param.lexeme.slice(1));
        i++;
        if (tokens[i]?.type !== TokenType.Comma) break;
        i++;
      }
    }
    expect(tokens, i, TokenType.CloseParen, "Expect ')' after macro parameters.");
    const body = readBraced(tokens, i + 1, "Expect '{' before macro body.");
    return {
      value: { kind: "macro", name: name.lexeme, params, body: body.value, origin },
      end: body.end,
    };
  }

  const pattern: Token[] = [];
  let i = index + 2;
  while (tokens[i] !== undefined && tokens[i].type !== TokenType.FatArrow) {
    if (tokens[i].type === TokenType.EOF) {
      throw parseError(tokens[i], "Expect '=>' after keyword pattern.");
    }
    const tree = readTokenTree(tokens, i);
    pattern.push(...tree.value);
    i = tree.end;
  }
  expect(tokens, i, TokenType.FatArrow, "Expect '=>' after keyword pattern.");
  const template = readBraced(tokens, i + 1, "Expect '{' before keyword template.");
  return {
    value: { kind: "keyword", name: name.lexeme, pattern, template: template.value, origin },
    end: template.end,
  };
}
