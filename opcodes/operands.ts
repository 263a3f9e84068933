import type { Instruction } from "../Instruction";
import { OpCode, OperandType } from "./types";

// Metadata references are opaque payloads here: they are owned by whoever
// loaded the module and only observed by instructions.

export const ELEMENT_TYPES = [
  "Void",
  "Boolean",
  "Char",
  "I1",
  "U1",
  "I2",
  "U2",
  "I4",
  "U4",
  "I8",
  "U8",
  "R4",
  "R8",
  "String",
  "I",
  "U",
  "Object",
  "Class",
  "ValueType",
  "SZArray",
  "Array",
  "Ptr",
  "ByRef",
  "GenericInst",
  "Var",
  "MVar",
  "TypedByRef",
] as const;

export type ElementType = (typeof ELEMENT_TYPES)[number];

export function isElementType(s: string): s is ElementType {
  return ELEMENT_TYPES.some((t) => t === s);
}

export interface TypeSig {
  elementType: ElementType;
  name?: string; // for Class / ValueType / GenericInst
}

export interface TypeRef {
  kind: "type";
  fullName: string;
}

export interface FieldRef {
  kind: "field";
  name: string;
  declaringType: TypeRef | null;
  fieldType: TypeSig | null;
}

export interface MethodSig {
  hasThis: boolean;
  explicitThis: boolean;
  retType: TypeSig | null;
  params: TypeSig[];
}

export interface MethodRef {
  kind: "method";
  name: string;
  declaringType: TypeRef | null;
  methodSig: MethodSig | null; // null when the signature could not be resolved
}

export type TokenOperand = TypeRef | FieldRef | MethodRef;

export interface Parameter {
  index: number;
  name: string;
  type: TypeSig | null;
}

export interface Local {
  index: number;
  name?: string;
  type: TypeSig | null;
}

export type Operand =
  | { kind: "none" }
  | { kind: "byte"; value: number }
  | { kind: "sbyte"; value: number }
  | { kind: "int32"; value: number }
  | { kind: "int64"; value: bigint }
  | { kind: "float32"; value: number }
  | { kind: "float64"; value: number }
  | { kind: "string"; value: string }
  | { kind: "target"; target: Instruction }
  | { kind: "targets"; targets: readonly Instruction[] }
  | { kind: "type"; type: TypeRef }
  | { kind: "field"; field: FieldRef }
  | { kind: "method"; method: MethodRef }
  | { kind: "token"; token: TokenOperand }
  | { kind: "methodSig"; methodSig: MethodSig }
  | { kind: "parameter"; parameter: Parameter }
  | { kind: "local"; local: Local };

export type OperandKind = Operand["kind"];

export const NO_OPERAND: Operand = { kind: "none" };

// Operand types each operand shape may appear with
export function operandTypesFor(kind: OperandKind): readonly OperandType[] {
  switch (kind) {
    case "none":
      return ["InlineNone"];
    case "byte":
    case "sbyte":
      return ["ShortInlineI"];
    case "int32":
      return ["InlineI"];
    case "int64":
      return ["InlineI8"];
    case "float32":
      return ["ShortInlineR"];
    case "float64":
      return ["InlineR"];
    case "string":
      return ["InlineString"];
    case "target":
      return ["ShortInlineBrTarget", "InlineBrTarget"];
    case "targets":
      return ["InlineSwitch"];
    case "type":
      return ["InlineType"];
    case "field":
      return ["InlineField"];
    case "method":
      return ["InlineMethod"];
    case "token":
      return ["InlineTok"];
    case "methodSig":
      return ["InlineSig"];
    case "parameter":
    case "local":
      return ["ShortInlineVar", "InlineVar"];
    default: {
      const unreachable: never = kind;
      throw new Error(`Unknown operand kind: ${String(unreachable)}`);
    }
  }
}

export function operandFitsOpCode(operand: Operand, opCode: OpCode): boolean {
  return operandTypesFor(operand.kind).includes(opCode.operandType);
}

// Null when an immediate operand can be encoded in its slot
export function immediateRangeError(operand: Operand): string | null {
  switch (operand.kind) {
    case "byte":
      return Number.isInteger(operand.value) && operand.value >= 0 && operand.value <= 0xff
        ? null
        : `Byte operand out of range: ${operand.value}`;
    case "sbyte":
      return Number.isInteger(operand.value) && operand.value >= -0x80 && operand.value <= 0x7f
        ? null
        : `Sbyte operand out of range: ${operand.value}`;
    case "int32":
      return Number.isInteger(operand.value) &&
        operand.value >= -0x80000000 &&
        operand.value <= 0x7fffffff
        ? null
        : `Int32 operand out of range: ${operand.value}`;
    case "int64":
      return BigInt.asIntN(64, operand.value) === operand.value
        ? null
        : `Int64 operand out of range: ${operand.value}`;
    default:
      return null;
  }
}
