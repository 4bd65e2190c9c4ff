/**
 * Common test utilities for rule compilation tests
 */
import { compileRules, CompileOptions } from "./compile";
import { DecisionTable, OpcodeWidth, RuleDecl } from "./types";

// Run fn and hand back whatever it threw
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

// Compile with console.warn silenced; warnings stay on the table
export function compileQuietly(
  width: OpcodeWidth,
  decls: RuleDecl[],
  options: CompileOptions = {},
): DecisionTable {
  const warnSpy = jest.spyOn(console, "warn").mockImplementation();
  try {
    return compileRules(width, decls, options);
  } finally {
    warnSpy.mockRestore();
  }
}

export class MockContext {
  public calls: { handler: string; opcode: number | bigint; values: unknown[] }[] = [];

  record(handler: string) {
    return (ctx: MockContext, opcode: number | bigint, ...values: unknown[]) => {
      ctx.calls.push({ handler, opcode, values });
    };
  }
}
