import { argVar, compileRules, createDispatcher, DecoderTable, PatternError, UnmatchedOpcodeError } from "./index";

describe("public API", () => {
  it("should compile and dispatch through the package entry point", () => {
    const table = compileRules(8, [{ pattern: "1010'nnnn", handler: "imm", args: [argVar("n")] }]);
    const seen: number[] = [];
    const dispatch = createDispatcher<number[]>(table, {
      imm: (out, _opcode, n) => {
        if (typeof n === "number") out.push(n);
      },
    });
    dispatch(seen, 0xa7);
    expect(seen).toEqual([7]);
    expect(() => dispatch(seen, 0x07)).toThrow(UnmatchedOpcodeError);
  });

  it("should expose the loader and error base class", () => {
    expect(() => DecoderTable.fromSource("type Opcode = u7;")).toThrow(PatternError);
  });
});
