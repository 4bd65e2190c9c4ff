import * as path from "path";
import { DecoderTable } from "../DecoderTable";
import { Dispatcher } from "../pattern/emit";

export const PRIMITIVE_TABLE = path.join(__dirname, "primitive.dtab");

export const AluOp = { SHL: 0, SHR: 1, INC: 2, DEC: 3 } as const;

export interface Cpu {
  reg: number;
}

export function bit_to_bool(raw: number): boolean {
  return raw !== 0;
}

export function load(cpu: Cpu, opcode: number, fromImmediate: boolean) {
  cpu.reg = fromImmediate ? opcode & 0x0f : 0;
}

export function alu(cpu: Cpu, _opcode: number, op: number) {
  switch (op) {
    case AluOp.SHL:
      cpu.reg = (cpu.reg << 1) & 0xff;
      break;
    case AluOp.SHR:
      cpu.reg = cpu.reg >> 1;
      break;
    case AluOp.INC:
      cpu.reg = (cpu.reg + 1) & 0xff;
      break;
    case AluOp.DEC:
      cpu.reg = (cpu.reg - 1) & 0xff;
      break;
  }
}

export async function loadPrimitive(): Promise<Dispatcher<Cpu>> {
  const dt = new DecoderTable(PRIMITIVE_TABLE, { mappers: { bit_to_bool } });
  await dt.load();
  return dt.createDispatcher<Cpu>({ load, alu });
}
