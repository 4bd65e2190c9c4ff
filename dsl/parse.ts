// Recursive-descent parser for rule tables:
//
//   type Opcode = u8;
//   dispatcher = dispatch;
//   context = Vm;
//   "11rr'____" => add<Register::{r}> where { r: Register = { 0b00 => R0, ... } };

import { Token, TokenType, tokenizeTable } from "./tokenize";
import { OpcodeWidth } from "../pattern/types";
import { TableSyntaxError } from "../pattern/errors";

export type ConstantAst =
  | { kind: "number"; value: number | bigint }
  | { kind: "bool"; value: boolean }
  | { kind: "string"; value: string }
  | { kind: "ident"; name: string }
  | { kind: "path"; type: string; name: string };

export interface MappingEntryAst {
  raw: number;
  value: ConstantAst;
  line: number;
  col: number;
}

export type MappingAst =
  | { kind: "table"; entries: MappingEntryAst[] }
  | { kind: "call"; fn: string; arg: string; line: number; col: number };

export interface VariableAst {
  name: string;
  type?: string;
  mapping?: MappingAst;
  line: number;
  col: number;
}

export type GenericArgAst =
  | { kind: "var"; name: string; type?: string; line: number; col: number }
  | { kind: "braced"; value: ConstantAst; line: number; col: number }
  | { kind: "const"; value: ConstantAst; line: number; col: number };

export interface RuleAst {
  pattern: string;
  handler: string;
  args: GenericArgAst[];
  where: VariableAst[];
  line: number;
  col: number;
}

export interface TableHeader {
  opcodeType: string; // u8 / u16 / u32 / u64
  width: OpcodeWidth;
  dispatcher: string;
  context: string;
}

export interface TableAst {
  header: TableHeader;
  rules: RuleAst[];
}

const OPCODE_TYPES: Record<string, OpcodeWidth> = {
  u8: 8,
  u16: 16,
  u32: 32,
  u64: 64,
};

const TOKEN_NAMES: Record<TokenType, string> = {
  [TokenType.IDENT]: "identifier",
  [TokenType.NUMBER]: "number",
  [TokenType.STRING]: "string",
  [TokenType.FAT_ARROW]: "'=>'",
  [TokenType.PATH]: "'::'",
  [TokenType.LT]: "'<'",
  [TokenType.GT]: "'>'",
  [TokenType.LBRACE]: "'{'",
  [TokenType.RBRACE]: "'}'",
  [TokenType.LPAREN]: "'('",
  [TokenType.RPAREN]: "')'",
  [TokenType.COMMA]: "','",
  [TokenType.SEMI]: "';'",
  [TokenType.COLON]: "':'",
  [TokenType.EQUALS]: "'='",
  [TokenType.EOF]: "end of input",
};

// Integer literal as written in a constant position
export function parseNumber(text: string): number | bigint {
  const negative = text.startsWith("-");
  const digits = negative ? text.slice(1) : text;
  const big = BigInt(digits);
  const value = negative ? -big : big;
  if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER))
    return Number(value);
  return value;
}

// Mapping keys: 0b.. / 0x.. / decimal with a prefix, bare digits are binary
export function parseMappingKey(text: string): number | null {
  if (/^0[bB][01]+$/.test(text)) return parseInt(text.slice(2), 2);
  if (/^0[xX][0-9a-fA-F]+$/.test(text)) return parseInt(text.slice(2), 16);
  if (/^[01]+$/.test(text)) return parseInt(text, 2);
  return null;
}

class TableParser {
  private pos = 0;

  constructor(private tokens: Token[]) {}

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const tok = this.peek();
    if (tok.type !== TokenType.EOF) this.pos++;
    return tok;
  }

  private at(type: TokenType, value?: string): boolean {
    const tok = this.peek();
    return tok.type === type && (value === undefined || tok.value === value);
  }

  private fail(tok: Token, message: string): never {
    throw new TableSyntaxError(tok.line, tok.col, message);
  }

  private expect(type: TokenType, value?: string): Token {
    const tok = this.peek();
    if (tok.type !== type || (value !== undefined && tok.value !== value)) {
      const wanted = value !== undefined ? `'${value}'` : TOKEN_NAMES[type];
      const got = tok.type === TokenType.EOF ? "end of input" : `'${tok.value}'`;
      this.fail(tok, `Expected ${wanted}, got ${got}`);
    }
    return this.next();
  }

  parse(): TableAst {
    const header = this.parseHeader();
    const rules: RuleAst[] = [];
    while (!this.at(TokenType.EOF)) {
      rules.push(this.parseRule());
      this.expect(TokenType.SEMI);
    }
    return { header, rules };
  }

  private parseHeader(): TableHeader {
    this.expect(TokenType.IDENT, "type");
    this.expect(TokenType.IDENT);
    this.expect(TokenType.EQUALS);
    const typeTok = this.expect(TokenType.IDENT);
    const width = OPCODE_TYPES[typeTok.value];
    if (width === undefined)
      return this.fail(typeTok, `Opcode type must be u8, u16, u32 or u64, got '${typeTok.value}'`);
    this.expect(TokenType.SEMI);

    this.expect(TokenType.IDENT, "dispatcher");
    this.expect(TokenType.EQUALS);
    const dispatcher = this.expect(TokenType.IDENT).value;
    this.expect(TokenType.SEMI);

    this.expect(TokenType.IDENT, "context");
    this.expect(TokenType.EQUALS);
    let context: string;
    if (this.at(TokenType.LPAREN)) {
      // unit context: ()
      this.next();
      this.expect(TokenType.RPAREN);
      context = "void";
    } else {
      context = this.expect(TokenType.IDENT).value;
    }
    this.expect(TokenType.SEMI);

    return { opcodeType: typeTok.value, width, dispatcher, context };
  }

  private parseRule(): RuleAst {
    const patternTok = this.expect(TokenType.STRING);
    this.expect(TokenType.FAT_ARROW);
    const handler = this.expect(TokenType.IDENT).value;

    const args: GenericArgAst[] = [];
    if (this.at(TokenType.LT)) {
      this.next();
      while (!this.at(TokenType.GT)) {
        args.push(this.parseGenericArg());
        if (!this.at(TokenType.COMMA)) break;
        this.next();
      }
      this.expect(TokenType.GT);
    }

    const where: VariableAst[] = [];
    if (this.at(TokenType.IDENT, "where")) {
      this.next();
      this.expect(TokenType.LBRACE);
      while (!this.at(TokenType.RBRACE)) {
        where.push(this.parseVariable());
        if (!this.at(TokenType.COMMA)) break;
        this.next();
      }
      this.expect(TokenType.RBRACE);
    }

    return {
      pattern: patternTok.value,
      handler,
      args,
      where,
      line: patternTok.line,
      col: patternTok.col,
    };
  }

  private parseGenericArg(): GenericArgAst {
    const start = this.peek();
    const { line, col } = start;

    if (this.at(TokenType.LBRACE)) {
      this.next();
      const value = this.parseConstant();
      this.expect(TokenType.RBRACE);
      return { kind: "braced", value, line, col };
    }

    if (this.at(TokenType.IDENT) && this.peek(1).type === TokenType.PATH) {
      const type = this.next().value;
      this.next(); // ::
      if (this.at(TokenType.LBRACE)) {
        this.next();
        const name = this.expect(TokenType.IDENT).value;
        this.expect(TokenType.RBRACE);
        return { kind: "var", name, type, line, col };
      }
      const name = this.expect(TokenType.IDENT).value;
      return { kind: "const", value: { kind: "path", type, name }, line, col };
    }

    return { kind: "const", value: this.parseConstant(), line, col };
  }

  private parseConstant(): ConstantAst {
    const tok = this.peek();
    switch (tok.type) {
      case TokenType.NUMBER:
        this.next();
        return { kind: "number", value: parseNumber(tok.value) };
      case TokenType.STRING:
        this.next();
        return { kind: "string", value: tok.value };
      case TokenType.IDENT: {
        this.next();
        if (tok.value === "true" || tok.value === "false")
          return { kind: "bool", value: tok.value === "true" };
        if (this.at(TokenType.PATH)) {
          this.next();
          const name = this.expect(TokenType.IDENT).value;
          return { kind: "path", type: tok.value, name };
        }
        return { kind: "ident", name: tok.value };
      }
      default:
        return this.fail(tok, `Expected a constant, got '${tok.value || TOKEN_NAMES[tok.type]}'`);
    }
  }

  private parseVariable(): VariableAst {
    const nameTok = this.expect(TokenType.IDENT);
    const variable: VariableAst = {
      name: nameTok.value,
      line: nameTok.line,
      col: nameTok.col,
    };

    if (this.at(TokenType.COLON)) {
      this.next();
      variable.type = this.expect(TokenType.IDENT).value;
    }
    if (this.at(TokenType.EQUALS)) {
      this.next();
      variable.mapping = this.parseMapping();
    }
    return variable;
  }

  private parseMapping(): MappingAst {
    if (this.at(TokenType.IDENT)) {
      const fnTok = this.next();
      this.expect(TokenType.LPAREN);
      const arg = this.expect(TokenType.IDENT).value;
      this.expect(TokenType.RPAREN);
      return { kind: "call", fn: fnTok.value, arg, line: fnTok.line, col: fnTok.col };
    }

    this.expect(TokenType.LBRACE);
    const entries: MappingEntryAst[] = [];
    while (!this.at(TokenType.RBRACE)) {
      const keyTok = this.expect(TokenType.NUMBER);
      const raw = parseMappingKey(keyTok.value);
      if (raw === null)
        return this.fail(keyTok, `Mapping key '${keyTok.value}' must be binary digits, 0b.. or 0x..`);
      this.expect(TokenType.FAT_ARROW);
      const value = this.parseConstant();
      entries.push({ raw, value, line: keyTok.line, col: keyTok.col });
      if (!this.at(TokenType.COMMA)) break;
      this.next();
    }
    this.expect(TokenType.RBRACE);
    return { kind: "table", entries };
  }
}

export function parseTable(source: string): TableAst {
  return new TableParser(tokenizeTable(source)).parse();
}
