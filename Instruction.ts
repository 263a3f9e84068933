import { OpCode, OperandType, Code, formatOpCodeValue } from "./opcodes/types";
import {
  FieldRef,
  Local,
  MethodRef,
  MethodSig,
  NO_OPERAND,
  Operand,
  Parameter,
  TokenOperand,
  TypeRef,
  immediateRangeError,
  operandFitsOpCode,
  operandTypesFor,
} from "./opcodes/operands";
import { InvalidOperandError } from "./opcodes/errors";
import { getInstructionSize } from "./opcodes/size";
import { StackUsage, calculateStackUsage } from "./opcodes/stack";
import { formatInstruction } from "./opcodes/format";

function requireInRange(operand: Operand): Operand {
  const problem = immediateRangeError(operand);
  if (problem) throw new RangeError(problem);
  return operand;
}

function requireOperandType(
  opCode: OpCode,
  accepted: readonly OperandType[],
  what: string,
): void {
  if (!accepted.includes(opCode.operandType))
    throw new InvalidOperandError(opCode, accepted.join(" or "), what);
}

// The two 1-byte immediate shapes each belong to exactly one opcode
function requireOpCodeIdentity(opCode: OpCode, value: number, name: string, what: string): void {
  if (opCode.value !== value)
    throw new InvalidOperandError(opCode, `${name} (${formatOpCodeValue(value)})`, what);
}

/**
 * A CIL instruction: opcode, operand and its byte offset in the method body.
 *
 * Instructions built through the `create*` factories always carry an operand
 * that matches the opcode. `createRaw` skips every check and is meant for
 * decoders that have already validated the bytes against the same table.
 */
class Instruction {
  // Written by the layout pass (see updateInstructionOffsets)
  offset: number = 0;

  private constructor(
    readonly opCode: OpCode,
    readonly operand: Operand,
  ) {}

  static create(opCode: OpCode): Instruction {
    requireOperandType(opCode, ["InlineNone"], "an empty");
    return new Instruction(opCode, NO_OPERAND);
  }

  static createByte(opCode: OpCode, value: number): Instruction {
    requireOpCodeIdentity(opCode, Code.Unaligned, "unaligned.", "a byte");
    return new Instruction(opCode, requireInRange({ kind: "byte", value }));
  }

  static createSByte(opCode: OpCode, value: number): Instruction {
    requireOpCodeIdentity(opCode, Code.Ldc_I4_S, "ldc.i4.s", "an sbyte");
    return new Instruction(opCode, requireInRange({ kind: "sbyte", value }));
  }

  static createInt32(opCode: OpCode, value: number): Instruction {
    requireOperandType(opCode, ["InlineI"], "an int32");
    return new Instruction(opCode, requireInRange({ kind: "int32", value }));
  }

  static createInt64(opCode: OpCode, value: bigint): Instruction {
    requireOperandType(opCode, ["InlineI8"], "an int64");
    return new Instruction(opCode, requireInRange({ kind: "int64", value }));
  }

  static createFloat32(opCode: OpCode, value: number): Instruction {
    requireOperandType(opCode, ["ShortInlineR"], "a real4");
    return new Instruction(opCode, { kind: "float32", value });
  }

  static createFloat64(opCode: OpCode, value: number): Instruction {
    requireOperandType(opCode, ["InlineR"], "a real8");
    return new Instruction(opCode, { kind: "float64", value });
  }

  static createString(opCode: OpCode, value: string): Instruction {
    requireOperandType(opCode, ["InlineString"], "a string");
    return new Instruction(opCode, { kind: "string", value });
  }

  static createBranch(opCode: OpCode, target: Instruction): Instruction {
    requireOperandType(opCode, ["ShortInlineBrTarget", "InlineBrTarget"], "an instruction");
    return new Instruction(opCode, { kind: "target", target });
  }

  static createSwitch(opCode: OpCode, targets: readonly Instruction[]): Instruction {
    requireOperandType(opCode, ["InlineSwitch"], "a targets array");
    return new Instruction(opCode, { kind: "targets", targets: [...targets] });
  }

  static createType(opCode: OpCode, type: TypeRef): Instruction {
    requireOperandType(opCode, ["InlineType"], "a type");
    return new Instruction(opCode, { kind: "type", type });
  }

  static createField(opCode: OpCode, field: FieldRef): Instruction {
    requireOperandType(opCode, ["InlineField"], "a field");
    return new Instruction(opCode, { kind: "field", field });
  }

  static createMethod(opCode: OpCode, method: MethodRef): Instruction {
    requireOperandType(opCode, ["InlineMethod"], "a method");
    return new Instruction(opCode, { kind: "method", method });
  }

  static createToken(opCode: OpCode, token: TokenOperand): Instruction {
    requireOperandType(opCode, ["InlineTok"], "a token");
    return new Instruction(opCode, { kind: "token", token });
  }

  static createMethodSig(opCode: OpCode, methodSig: MethodSig): Instruction {
    requireOperandType(opCode, ["InlineSig"], "a method sig");
    return new Instruction(opCode, { kind: "methodSig", methodSig });
  }

  static createParameter(opCode: OpCode, parameter: Parameter): Instruction {
    requireOperandType(opCode, ["ShortInlineVar", "InlineVar"], "a method parameter");
    return new Instruction(opCode, { kind: "parameter", parameter });
  }

  static createLocal(opCode: OpCode, local: Local): Instruction {
    requireOperandType(opCode, ["ShortInlineVar", "InlineVar"], "a method local");
    return new Instruction(opCode, { kind: "local", local });
  }

  // Unchecked: no operand/opcode agreement is guaranteed
  static createRaw(opCode: OpCode, operand: Operand = NO_OPERAND): Instruction {
    return new Instruction(opCode, operand);
  }

  // Diagnose a raw-constructed instruction; null when the operand fits
  validate(): string | null {
    const { opCode, operand } = this;
    if (!operandFitsOpCode(operand, opCode)) {
      return (
        `${opCode.name}: ${operand.kind} operand needs ` +
        `${operandTypesFor(operand.kind).join(" or ")}, opcode has ${opCode.operandType}`
      );
    }
    if (operand.kind === "byte" && opCode.value !== Code.Unaligned)
      return `${opCode.name}: byte operand is only valid on unaligned.`;
    if (operand.kind === "sbyte" && opCode.value !== Code.Ldc_I4_S)
      return `${opCode.name}: sbyte operand is only valid on ldc.i4.s`;
    const problem = immediateRangeError(operand);
    return problem ? `${opCode.name}: ${problem}` : null;
  }

  getSize(): number {
    return getInstructionSize(this);
  }

  calculateStackUsage(methodHasReturnValue: boolean = false): StackUsage {
    return calculateStackUsage(this, methodHasReturnValue);
  }

  toString(): string {
    return formatInstruction(this);
  }
}

export { Instruction };
