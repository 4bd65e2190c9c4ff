import { bit_to_bool, Cpu, loadPrimitive } from "./primitive";

describe("primitive CPU", () => {
  it("should load an immediate and run ALU operations", async () => {
    const dispatch = await loadPrimitive();
    const cpu: Cpu = { reg: 0 };

    dispatch(cpu, 0b0000_1111); // load 15
    expect(cpu.reg).toBe(15);
    dispatch(cpu, 0b0001_0000); // shl
    expect(cpu.reg).toBe(30);
    dispatch(cpu, 0b0001_0001); // shr
    expect(cpu.reg).toBe(15);
    dispatch(cpu, 0b0001_0010); // inc
    expect(cpu.reg).toBe(16);
    dispatch(cpu, 0b0001_0011); // dec
    expect(cpu.reg).toBe(15);
    dispatch(cpu, 0b0000_0111); // i = 0 clears
    expect(cpu.reg).toBe(0);
  });

  it("should map the load bit to a boolean", () => {
    expect(bit_to_bool(0)).toBe(false);
    expect(bit_to_bool(1)).toBe(true);
  });
});
