/**
 * A four-register toy machine decoded from simpleVm.dtab.
 */
import * as path from "path";
import { DecoderTable } from "../DecoderTable";
import { Dispatcher, HandlerMap } from "../pattern/emit";

export const Register = { R0: 0, R1: 1, R2: 2, R3: 3 } as const;
export type Register = (typeof Register)[keyof typeof Register];

export const SIMPLE_VM_TABLE = path.join(__dirname, "simpleVm.dtab");

export class Vm {
  public regs: number[] = [0, 0, 0, 0];
  public pc = 0;
  public log: string[] = [];

  constructor(public memory: number[]) {}

  fetch8(addr: number): number {
    return this.memory[addr] ?? 0;
  }

  getReg(reg: Register): number {
    return this.regs[reg];
  }

  setReg(reg: Register, value: number) {
    this.regs[reg] = value & 0xff;
  }
}

export function impl_add(vm: Vm, opcode: number, reg: Register) {
  const imm = opcode & 0x0f;
  vm.setReg(reg, vm.getReg(reg) + imm);
  vm.log.push(`add r${reg}, ${imm}`);
}

export function impl_move(vm: Vm, _opcode: number, dest: Register, src: Register) {
  vm.setReg(dest, vm.getReg(src));
  vm.log.push(`move r${dest}, r${src}`);
}

export function impl_load(vm: Vm, opcode: number, reg: Register) {
  const addr = opcode & 0x0f;
  vm.setReg(reg, vm.fetch8(addr));
  vm.log.push(`load r${reg}, [${addr}]`);
}

export const SIMPLE_VM_HANDLERS: HandlerMap<Vm> = {
  impl_add,
  impl_move,
  impl_load,
};

export async function loadSimpleVm(trace = false): Promise<Dispatcher<Vm>> {
  const dt = new DecoderTable(SIMPLE_VM_TABLE, { enums: { Register } });
  dt.setTrace(trace);
  await dt.load();
  return dt.createDispatcher(SIMPLE_VM_HANDLERS);
}

// Runs the program in place: it is both code and memory
export function runProgram(dispatch: Dispatcher<Vm>, program: number[]): Vm {
  const vm = new Vm(program);
  while (vm.pc < program.length) {
    const opcode = vm.fetch8(vm.pc);
    vm.pc++;
    dispatch(vm, opcode);
  }
  return vm;
}
