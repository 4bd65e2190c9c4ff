import { deriveMaskValue, expandRule } from "./expand";
import { parsePattern } from "./parse";
import { buildRule } from "./compile";
import * as bindings from "./bindings";
import { ExpansionLimitError, UnknownVariableError, VariableWidthOverflowError } from "./errors";
import { argLit, argVar, literal, mapped } from "./types";
import { thrown } from "./test-utils";

const REGISTERS = literal("Register", { 0: "R0", 1: "R1", 2: "R2", 3: "R3" });

describe("deriveMaskValue", () => {
  it("should fold an assigned variable into mask and expected", () => {
    const pattern = parsePattern("0001'rr__", 8);
    expect(deriveMaskValue(pattern, { r: 0b10 })).toEqual({
      mask: 0b11111100n,
      expected: 0b00011000n,
    });
  });

  it("should leave unassigned variables and wildcards open", () => {
    const pattern = parsePattern("0001'rr__", 8);
    expect(deriveMaskValue(pattern, {})).toEqual({ mask: 0xf0n, expected: 0x10n });
  });

  it("should place scattered variable bits MSB first", () => {
    const pattern = parsePattern("a0a0'a0a0", 8);
    // a = 0b1010 puts its bits at positions 0 and 4
    expect(deriveMaskValue(pattern, { a: 0b1010 })).toEqual({
      mask: 0xffn,
      expected: 0b10001000n,
    });
  });

  it("should round-trip the raw value through the opcode", () => {
    const pattern = parsePattern("0001'rr__", 8);
    const { mask, expected } = deriveMaskValue(pattern, { r: 0b10 });
    for (const opcode of [0x18n, 0x19n, 0x1an, 0x1bn]) {
      expect(opcode & mask).toBe(expected);
      expect(Number((opcode >> 2n) & 0b11n)).toBe(0b10);
    }
    expect(0x14n & mask).not.toBe(expected);
  });

  it("should reject values that do not fit the variable", () => {
    const pattern = parsePattern("0001'rr__", 8);
    const err = thrown(() => deriveMaskValue(pattern, { r: 4 }, 7));
    expect(err).toBeInstanceOf(VariableWidthOverflowError);
    expect(err).toMatchObject({
      message: "Rule 7: variable 'r' raw value 4 does not fit in 2 bit(s)",
    });
  });

  it("should reject unknown variables", () => {
    const pattern = parsePattern("0001'rr__", 8);
    expect(() => deriveMaskValue(pattern, { q: 0 })).toThrow(UnknownVariableError);
  });

  it("should handle 64-bit patterns exactly", () => {
    const pattern = parsePattern("1" + "_".repeat(59) + "rrrr", 64);
    expect(deriveMaskValue(pattern, { r: 0xf })).toEqual({
      mask: (1n << 63n) | 0xfn,
      expected: (1n << 63n) | 0xfn,
    });
  });
});

describe("expandRule", () => {
  it("should emit one entry per combination, first variable slowest", () => {
    const rule = buildRule(
      8,
      {
        pattern: "0010'ddss",
        handler: "move",
        args: [argVar("d"), argVar("s")],
        where: { d: REGISTERS, s: REGISTERS },
      },
      0,
    );
    const entries = expandRule(rule);
    expect(entries).toHaveLength(16);
    expect(entries.slice(0, 3).map((e) => e.values)).toEqual([
      ["R0", "R0"],
      ["R0", "R1"],
      ["R0", "R2"],
    ]);
    expect(entries[4]).toEqual({
      rule: 0,
      mask: 0xffn,
      expected: 0x24n,
      handler: "move",
      values: ["R1", "R0"],
      raw: { d: 1, s: 0 },
    });
  });

  it("should produce pairwise disjoint tests", () => {
    const rule = buildRule(8, { pattern: "11rr'____", handler: "add", args: [argVar("r")], where: { r: REGISTERS } }, 0);
    const entries = expandRule(rule);
    for (let i = 0; i < entries.length; i++) {
      for (let j = i + 1; j < entries.length; j++) {
        const shared = entries[i].mask & entries[j].mask;
        expect((entries[i].expected ^ entries[j].expected) & shared).not.toBe(0n);
      }
    }
  });

  it("should expand a rule without variables to a single entry", () => {
    const rule = buildRule(8, { pattern: "0000'0000", handler: "nop" }, 2);
    expect(expandRule(rule)).toEqual([
      { rule: 2, mask: 0xffn, expected: 0n, handler: "nop", values: [], raw: {} },
    ]);
  });

  it("should expand variables the handler does not take", () => {
    const rule = buildRule(8, { pattern: "0000'00xx", handler: "op" }, 0);
    expect(expandRule(rule).map((e) => e.expected)).toEqual([0n, 1n, 2n, 3n]);
  });

  it("should produce two entries for a one-bit boolean mapper", () => {
    const toBool = jest.fn((rawValue: number) => rawValue === 1);
    const rule = buildRule(
      8,
      { pattern: "0000'i___", handler: "load", args: [argVar("i")], where: { i: mapped("bool", toBool) } },
      0,
    );
    const entries = expandRule(rule);
    expect(entries.map((e) => [e.mask, e.expected, e.values])).toEqual([
      [0xf8n, 0x00n, [false]],
      [0xf8n, 0x08n, [true]],
    ]);
    expect(toBool).toHaveBeenCalledTimes(2);
  });

  it("should pass literal arguments through unchanged", () => {
    const rule = buildRule(
      8,
      { pattern: "0000'000c", handler: "op", args: [argLit(7), argVar("c"), argLit("x")] },
      0,
    );
    expect(expandRule(rule).map((e) => e.values)).toEqual([
      [7, 0, "x"],
      [7, 1, "x"],
    ]);
  });

  it("should reject generic arguments naming missing variables", () => {
    const rule = buildRule(8, { pattern: "0000'0000", handler: "op", args: [argVar("z")] }, 4);
    expect(() => expandRule(rule)).toThrow(
      "Rule 4: generic argument of op names variable 'z' which is not in the pattern",
    );
  });

  it("should stop at the expansion limit", () => {
    const rule = buildRule(16, { pattern: "0000'aaaa'bbbb'cccc", handler: "op" }, 0);
    const err = thrown(() => expandRule(rule, { maxEntriesPerRule: 1000 }));
    expect(err).toBeInstanceOf(ExpansionLimitError);
    expect(err).toMatchObject({
      message: "Rule 0 expands to 4096 entries, more than the limit of 1000",
      entries: 4096,
      limit: 1000,
    });
  });

  it("should size a wide variable before enumerating it", () => {
    const domainSpy = jest.spyOn(bindings, "bindingDomain");
    const rule = buildRule(32, { pattern: "0" + "i".repeat(31), handler: "op" }, 0);
    const err = thrown(() => expandRule(rule));
    expect(err).toBeInstanceOf(ExpansionLimitError);
    expect(err).toMatchObject({
      message: "Rule 0 expands to 2147483648 entries, more than the limit of 65536",
    });
    expect(domainSpy).not.toHaveBeenCalled();
    domainSpy.mockRestore();
  });

  it("should report variables too wide to enumerate as an expansion limit", () => {
    const rule = buildRule(64, { pattern: "0".repeat(32) + "v".repeat(32), handler: "op" }, 1);
    const err = thrown(() => expandRule(rule, { maxEntriesPerRule: Infinity }));
    expect(err).toBeInstanceOf(ExpansionLimitError);
    expect(err).toMatchObject({ code: "ExpansionLimit", entries: 2 ** 32 });
  });
});
