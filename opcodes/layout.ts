import type { Instruction } from "../Instruction";

// Assign byte offsets in order; returns the size of the method body's code
export function updateInstructionOffsets(instructions: readonly Instruction[]): number {
  let offset = 0;
  for (const instr of instructions) {
    instr.offset = offset;
    offset += instr.getSize();
  }
  return offset;
}
