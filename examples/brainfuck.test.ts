import { compileBrainfuck, runBrainfuck } from "./brainfuck";

describe("brainfuck", () => {
  it("should compile one exact entry per command", () => {
    const table = compileBrainfuck();
    expect(table.entries).toHaveLength(8);
    expect(table.entries.every((e) => e.mask === 0xffn)).toBe(true);
    expect(table.entries[0].expected).toBe(BigInt(">".charCodeAt(0)));
  });

  it("should run nested loops", () => {
    expect(runBrainfuck("++++++++[>++++++++<-]>+.")).toBe("A");
  });

  it("should skip comment characters", () => {
    expect(runBrainfuck("+++ three\n++ five [-] cleared +++++++++++++++++++++++++++++++++.")).toBe("!");
  });

  it("should echo its input", () => {
    expect(runBrainfuck(",[.,]", "hi")).toBe("hi");
  });
});
