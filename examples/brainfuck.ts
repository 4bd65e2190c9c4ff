/**
 * Brainfuck interpreter whose command decoding is a compiled rule table.
 * Each command character is one fixed 8-bit pattern; any other byte is a
 * comment and falls through to the dispatcher's fallback.
 */
import { compileRules } from "../pattern/compile";
import { createDispatcher, Dispatcher } from "../pattern/emit";
import { DecisionTable, RuleDecl } from "../pattern/types";

const TAPE_SIZE = 30000;

export class Brainfuck {
  public tape = new Uint8Array(TAPE_SIZE);
  public ptr = 0;
  public pc = 0;
  public output = "";

  constructor(
    public program: number[],
    public input: number[] = [],
  ) {}

  // Index of the bracket matching the one at `from`
  findMatch(from: number, step: 1 | -1): number {
    const open = step === 1 ? 0x5b : 0x5d;
    let depth = 0;
    for (let i = from; i >= 0 && i < this.program.length; i += step) {
      if (this.program[i] === open) depth++;
      else if (this.program[i] === (step === 1 ? 0x5d : 0x5b)) depth--;
      if (depth === 0) return i;
    }
    throw new Error(`Unbalanced bracket at ${from}`);
  }
}

const bits = (ch: string) => ch.charCodeAt(0).toString(2).padStart(8, "0");

export const BRAINFUCK_RULES: RuleDecl[] = [
  { pattern: bits(">"), handler: "op_inc_ptr" },
  { pattern: bits("<"), handler: "op_dec_ptr" },
  { pattern: bits("+"), handler: "op_inc_val" },
  { pattern: bits("-"), handler: "op_dec_val" },
  { pattern: bits("."), handler: "op_output" },
  { pattern: bits(","), handler: "op_input" },
  { pattern: bits("["), handler: "op_jump_fwd" },
  { pattern: bits("]"), handler: "op_jump_bwd" },
];

const handlers = {
  op_inc_ptr(bf: Brainfuck) {
    bf.ptr = (bf.ptr + 1) % TAPE_SIZE;
  },
  op_dec_ptr(bf: Brainfuck) {
    bf.ptr = (bf.ptr + TAPE_SIZE - 1) % TAPE_SIZE;
  },
  op_inc_val(bf: Brainfuck) {
    bf.tape[bf.ptr]++;
  },
  op_dec_val(bf: Brainfuck) {
    bf.tape[bf.ptr]--;
  },
  op_output(bf: Brainfuck) {
    bf.output += String.fromCharCode(bf.tape[bf.ptr]);
  },
  op_input(bf: Brainfuck) {
    bf.tape[bf.ptr] = bf.input.shift() ?? 0;
  },
  op_jump_fwd(bf: Brainfuck) {
    if (bf.tape[bf.ptr] === 0) bf.pc = bf.findMatch(bf.pc, 1);
  },
  op_jump_bwd(bf: Brainfuck) {
    if (bf.tape[bf.ptr] !== 0) bf.pc = bf.findMatch(bf.pc, -1);
  },
};

export function compileBrainfuck(): DecisionTable {
  return compileRules(8, BRAINFUCK_RULES);
}

export function createBrainfuckDispatcher(
  table: DecisionTable = compileBrainfuck(),
): Dispatcher<Brainfuck> {
  return createDispatcher<Brainfuck>(table, handlers, {
    fallback: () => {},
  });
}

export function runBrainfuck(source: string, input = ""): string {
  const dispatch = createBrainfuckDispatcher();
  const bf = new Brainfuck(
    [...source].map((ch) => ch.charCodeAt(0)),
    [...input].map((ch) => ch.charCodeAt(0)),
  );
  while (bf.pc < bf.program.length) {
    dispatch(bf, bf.program[bf.pc]);
    bf.pc++;
  }
  return bf.output;
}
