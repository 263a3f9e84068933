import type { Instruction } from "../Instruction";
import { OperandType } from "./types";

// Bytes an operand of each type occupies after the opcode. InlineSwitch is
// the only one that depends on the operand itself and is handled separately.
function fixedOperandSize(operandType: Exclude<OperandType, "InlineSwitch">): number {
  switch (operandType) {
    case "InlineBrTarget":
    case "InlineField":
    case "InlineI":
    case "InlineMethod":
    case "InlineSig":
    case "InlineString":
    case "InlineTok":
    case "InlineType":
    case "ShortInlineR":
      return 4;

    case "InlineI8":
    case "InlineR":
      return 8;

    case "InlineNone":
    case "InlinePhi":
      return 0;

    case "InlineVar":
      return 2;

    case "ShortInlineBrTarget":
    case "ShortInlineI":
    case "ShortInlineVar":
      return 1;

    default: {
      const unreachable: never = operandType;
      throw new Error(`Unknown operand type: ${String(unreachable)}`);
    }
  }
}

export function getInstructionSize(instr: Instruction): number {
  const { opCode, operand } = instr;
  if (opCode.operandType === "InlineSwitch") {
    // uint32 count followed by one int32 displacement per target
    const count = operand.kind === "targets" ? operand.targets.length : 0;
    return opCode.size + 4 + count * 4;
  }
  return opCode.size + fixedOperandSize(opCode.operandType);
}
