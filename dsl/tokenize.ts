/**
 * Rule-table tokenizer.
 * Splits table source into tokens carrying 1-based line and column.
 */
import { TableSyntaxError } from "../pattern/errors";

export const TokenType = {
  IDENT: 0, // identifier or keyword (type, where, true, ...)
  NUMBER: 1, // 12, 0x1f, 0b0110
  STRING: 2, // "0001'rr__"
  FAT_ARROW: 3, // =>
  PATH: 4, // ::
  LT: 5, // <
  GT: 6, // >
  LBRACE: 7, // {
  RBRACE: 8, // }
  LPAREN: 9, // (
  RPAREN: 10, // )
  COMMA: 11, // ,
  SEMI: 12, // ;
  COLON: 13, // :
  EQUALS: 14, // =
  EOF: 15,
} as const;
export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export interface Token {
  type: TokenType;
  value: string; // for STRING, the contents without quotes
  line: number;
  col: number;
}

const SINGLE: Record<string, TokenType> = {
  "<": TokenType.LT,
  ">": TokenType.GT,
  "{": TokenType.LBRACE,
  "}": TokenType.RBRACE,
  "(": TokenType.LPAREN,
  ")": TokenType.RPAREN,
  ",": TokenType.COMMA,
  ";": TokenType.SEMI,
  ":": TokenType.COLON,
  "=": TokenType.EQUALS,
};

export function tokenizeTable(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let lineStart = 0;

  const col = () => pos - lineStart + 1;
  const push = (type: TokenType, value: string, atLine: number, atCol: number) =>
    tokens.push({ type, value, line: atLine, col: atCol });

  while (pos < source.length) {
    const ch = source[pos];

    if (ch === "\n") {
      pos++;
      line++;
      lineStart = pos;
      continue;
    }
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    // Comments
    if (source.startsWith("//", pos)) {
      while (pos < source.length && source[pos] !== "\n") pos++;
      continue;
    }
    if (source.startsWith("/*", pos)) {
      const startLine = line;
      const startCol = col();
      const end = source.indexOf("*/", pos + 2);
      if (end < 0) throw new TableSyntaxError(startLine, startCol, "Unterminated comment");
      for (let i = pos; i < end; i++) {
        if (source[i] === "\n") {
          line++;
          lineStart = i + 1;
        }
      }
      pos = end + 2;
      continue;
    }

    const startCol = col();

    // Two-character operators
    if (source.startsWith("=>", pos)) {
      push(TokenType.FAT_ARROW, "=>", line, startCol);
      pos += 2;
      continue;
    }
    if (source.startsWith("::", pos)) {
      push(TokenType.PATH, "::", line, startCol);
      pos += 2;
      continue;
    }

    const single = SINGLE[ch];
    if (single !== undefined) {
      push(single, ch, line, startCol);
      pos++;
      continue;
    }

    if (ch === '"') {
      let value = "";
      pos++;
      while (pos < source.length && source[pos] !== '"') {
        if (source[pos] === "\n")
          throw new TableSyntaxError(line, startCol, "Unterminated string");
        if (source[pos] === "\\" && pos + 1 < source.length) pos++;
        value += source[pos];
        pos++;
      }
      if (pos >= source.length)
        throw new TableSyntaxError(line, startCol, "Unterminated string");
      pos++; // closing quote
      push(TokenType.STRING, value, line, startCol);
      continue;
    }

    // Number literal (including negative)
    if (/\d/.test(ch) || (ch === "-" && /\d/.test(source[pos + 1] ?? ""))) {
      const start = pos;
      if (ch === "-") pos++;
      if (/^0[xX]/.test(source.slice(pos, pos + 2))) {
        pos += 2;
        while (pos < source.length && /[0-9a-fA-F_]/.test(source[pos])) pos++;
      } else if (/^0[bB]/.test(source.slice(pos, pos + 2))) {
        pos += 2;
        while (pos < source.length && /[01_]/.test(source[pos])) pos++;
      } else {
        while (pos < source.length && /[\d_]/.test(source[pos])) pos++;
      }
      push(TokenType.NUMBER, source.slice(start, pos).replace(/_/g, ""), line, startCol);
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const start = pos;
      while (pos < source.length && /[A-Za-z0-9_]/.test(source[pos])) pos++;
      push(TokenType.IDENT, source.slice(start, pos), line, startCol);
      continue;
    }

    throw new TableSyntaxError(line, startCol, `Unexpected character: '${ch}'`);
  }

  push(TokenType.EOF, "", line, col());
  return tokens;
}
