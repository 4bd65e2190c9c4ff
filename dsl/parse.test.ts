import { parseMappingKey, parseNumber, parseTable } from "./parse";
import { TableSyntaxError } from "../pattern/errors";

const HEADER = "type Opcode = u8;\ndispatcher = dispatch;\ncontext = Vm;\n";

describe("parseTable", () => {
  it("should parse the header", () => {
    expect(parseTable(HEADER)).toEqual({
      header: { opcodeType: "u8", width: 8, dispatcher: "dispatch", context: "Vm" },
      rules: [],
    });
  });

  it("should map the unit context to void", () => {
    const ast = parseTable("type Opcode = u64; dispatcher = run; context = ();");
    expect(ast.header).toEqual({ opcodeType: "u64", width: 64, dispatcher: "run", context: "void" });
  });

  it("should reject unsupported opcode types", () => {
    expect(() => parseTable("type Opcode = u12;")).toThrow(
      "1:15: Opcode type must be u8, u16, u32 or u64, got 'u12'",
    );
  });

  it("should parse a rule with a literal mapping", () => {
    const ast = parseTable(
      HEADER + `"11rr'____" => add<Register::{r}> where { r: Register = { 0b00 => R0, 01 => Register::R1 } };`,
    );
    expect(ast.rules).toEqual([
      {
        pattern: "11rr'____",
        handler: "add",
        args: [{ kind: "var", name: "r", type: "Register", line: 4, col: 20 }],
        where: [
          {
            name: "r",
            type: "Register",
            mapping: {
              kind: "table",
              entries: [
                { raw: 0, value: { kind: "ident", name: "R0" }, line: 4, col: 59 },
                { raw: 1, value: { kind: "path", type: "Register", name: "R1" }, line: 4, col: 71 },
              ],
            },
            line: 4,
            col: 43,
          },
        ],
        line: 4,
        col: 1,
      },
    ]);
  });

  it("should parse a mapping function call", () => {
    const ast = parseTable(HEADER + `"0000'i___" => load<{i}> where { i: bool = bit_to_bool(i) };`);
    const [rule] = ast.rules;
    expect(rule.args).toEqual([
      { kind: "braced", value: { kind: "ident", name: "i" }, line: 4, col: 21 },
    ]);
    expect(rule.where[0].mapping).toEqual({ kind: "call", fn: "bit_to_bool", arg: "i", line: 4, col: 44 });
  });

  it("should parse constant generic arguments", () => {
    const ast = parseTable(HEADER + `"0000'0000" => op<3, true, "x", Mode::Fast, {0x10}>;`);
    expect(ast.rules[0].args.map((a) => [a.kind, a.kind === "var" ? a.name : a.value])).toEqual([
      ["const", { kind: "number", value: 3 }],
      ["const", { kind: "bool", value: true }],
      ["const", { kind: "string", value: "x" }],
      ["const", { kind: "path", type: "Mode", name: "Fast" }],
      ["braced", { kind: "number", value: 16 }],
    ]);
  });

  it("should parse rules without arguments or where clause", () => {
    const ast = parseTable(HEADER + `"0000'0000" => nop;\n"0000'0001" => halt<>;`);
    expect(ast.rules.map((r) => [r.handler, r.args, r.where])).toEqual([
      ["nop", [], []],
      ["halt", [], []],
    ]);
  });

  it("should allow trailing commas", () => {
    const ast = parseTable(HEADER + `"0000'000b" => f<{b},> where { b: bool = { 0 => false, 1 => true, }, };`);
    expect(ast.rules[0].args).toHaveLength(1);
    expect(ast.rules[0].where).toHaveLength(1);
  });

  it("should require a semicolon after each rule", () => {
    expect(() => parseTable(HEADER + `"0000'0000" => nop`)).toThrow("4:19: Expected ';', got end of input");
  });

  it("should reject non-binary mapping keys", () => {
    expect(() => parseTable(HEADER + `"0000'000b" => f where { b: bool = { 2 => true } };`)).toThrow(
      TableSyntaxError,
    );
  });

  it("should report what it found instead", () => {
    expect(() => parseTable(HEADER + `"0000'0000" nop;`)).toThrow("4:13: Expected '=>', got 'nop'");
  });
});

describe("parseNumber", () => {
  it("should parse numbers in every base", () => {
    expect(parseNumber("0x1F")).toBe(31);
    expect(parseNumber("0b101")).toBe(5);
    expect(parseNumber("-12")).toBe(-12);
  });

  it("should keep large values exact as bigint", () => {
    expect(parseNumber("0xFFFFFFFFFFFFFFFF")).toBe(0xffffffffffffffffn);
  });
});

describe("parseMappingKey", () => {
  it("should read bare digits as binary", () => {
    expect(parseMappingKey("10")).toBe(2);
    expect(parseMappingKey("0b11")).toBe(3);
    expect(parseMappingKey("0x3")).toBe(3);
    expect(parseMappingKey("7")).toBeNull();
  });
});
