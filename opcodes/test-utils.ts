/**
 * Common test utilities for instruction testing
 */
import { Instruction } from "../Instruction";
import { ElementType, MethodRef, MethodSig, TypeRef, TypeSig } from "./operands";
import { OpCodeTable, STANDARD_OPCODES, requireOpCode } from "./tables";
import { OpCode, defineOpCode } from "./types";

export function op(name: string, table: OpCodeTable = STANDARD_OPCODES): OpCode {
  return requireOpCode(table, name);
}

// Synthetic descriptor, defaulting to an ordinary no-operand opcode
export function fakeOpCode(value: number, overrides: Partial<Omit<OpCode, "value" | "size">> = {}): OpCode {
  return defineOpCode(value, {
    name: `fake_${value.toString(16)}`,
    operandType: "InlineNone",
    flowControl: "Next",
    push: "Push0",
    pop: "Pop0",
    ...overrides,
  });
}

export function sig(elementType: ElementType, name?: string): TypeSig {
  return name === undefined ? { elementType } : { elementType, name };
}

export function typeRef(fullName: string): TypeRef {
  return { kind: "type", fullName };
}

export function methodSig(
  retType: ElementType,
  params: ElementType[],
  options: { hasThis?: boolean; explicitThis?: boolean } = {},
): MethodSig {
  return {
    hasThis: options.hasThis ?? false,
    explicitThis: options.explicitThis ?? false,
    retType: sig(retType),
    params: params.map((p) => sig(p)),
  };
}

export function methodRef(name: string, signature: MethodSig | null, declaringType?: string): MethodRef {
  return {
    kind: "method",
    name,
    declaringType: declaringType === undefined ? null : typeRef(declaringType),
    methodSig: signature,
  };
}

export function nop(): Instruction {
  return Instruction.create(op("nop"));
}
