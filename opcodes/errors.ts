import { OpCode, formatOpCodeValue } from "./types";

/**
 * Thrown by the validated instruction constructors when the operand shape
 * does not match the opcode. `expected` is the operand type (or, for the
 * byte-sized immediates, the opcode) the constructor requires.
 */
export class InvalidOperandError extends Error {
  readonly opCode: OpCode;
  readonly expected: string;

  constructor(opCode: OpCode, expected: string, what: string) {
    super(
      `Opcode ${opCode.name} (${formatOpCodeValue(opCode.value)}) does not have ${what} operand: ` +
        `expected ${expected}, opcode has ${opCode.operandType}`,
    );
    this.name = "InvalidOperandError";
    this.opCode = opCode;
    this.expected = expected;
  }
}
