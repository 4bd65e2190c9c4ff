import { tokenizeTable, TokenType } from "./tokenize";
import { TableSyntaxError } from "../pattern/errors";

const kinds = (source: string) => tokenizeTable(source).map((t) => [t.type, t.value]);

describe("tokenizeTable", () => {
  it("should tokenize a rule line", () => {
    expect(kinds(`"11rr'____" => add<Register::{r}>;`)).toEqual([
      [TokenType.STRING, "11rr'____"],
      [TokenType.FAT_ARROW, "=>"],
      [TokenType.IDENT, "add"],
      [TokenType.LT, "<"],
      [TokenType.IDENT, "Register"],
      [TokenType.PATH, "::"],
      [TokenType.LBRACE, "{"],
      [TokenType.IDENT, "r"],
      [TokenType.RBRACE, "}"],
      [TokenType.GT, ">"],
      [TokenType.SEMI, ";"],
      [TokenType.EOF, ""],
    ]);
  });

  it("should track lines and columns from 1", () => {
    const tokens = tokenizeTable("type\n  Opcode = u8;");
    expect(tokens.map((t) => [t.value, t.line, t.col])).toEqual([
      ["type", 1, 1],
      ["Opcode", 2, 3],
      ["=", 2, 10],
      ["u8", 2, 12],
      [";", 2, 14],
      ["", 2, 15],
    ]);
  });

  it("should skip line and block comments", () => {
    const tokens = tokenizeTable("// header\n/* a\nb */ x");
    expect(tokens.map((t) => [t.value, t.line, t.col])).toEqual([
      ["x", 3, 6],
      ["", 3, 7],
    ]);
  });

  it("should read hex, binary, decimal and negative numbers", () => {
    expect(kinds("0x1F 0b0110 42 -7 1_000")).toEqual([
      [TokenType.NUMBER, "0x1F"],
      [TokenType.NUMBER, "0b0110"],
      [TokenType.NUMBER, "42"],
      [TokenType.NUMBER, "-7"],
      [TokenType.NUMBER, "1000"],
      [TokenType.EOF, ""],
    ]);
  });

  it("should unescape strings", () => {
    expect(tokenizeTable('"a\\"b"')[0].value).toBe('a"b');
  });

  it("should report an unterminated string", () => {
    expect(() => tokenizeTable('x = "abc')).toThrow(new TableSyntaxError(1, 5, "Unterminated string"));
  });

  it("should report a string broken by a newline", () => {
    expect(() => tokenizeTable('"ab\ncd"')).toThrow("1:1: Unterminated string");
  });

  it("should report an unterminated comment", () => {
    expect(() => tokenizeTable("a /* b")).toThrow("1:3: Unterminated comment");
  });

  it("should reject unexpected characters", () => {
    expect(() => tokenizeTable("a\n  @")).toThrow("2:3: Unexpected character: '@'");
  });
});
