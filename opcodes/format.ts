import type { Instruction } from "../Instruction";
import { TokenOperand, TypeRef, TypeSig } from "./operands";

export function formatLabel(offset: number): string {
  return `IL_${offset.toString(16).padStart(4, "0")}`;
}

function typeSigName(type: TypeSig | null): string {
  if (!type) return "?";
  return type.name ?? type.elementType;
}

function memberName(declaringType: TypeRef | null, name: string): string {
  return declaringType ? `${declaringType.fullName}::${name}` : name;
}

function tokenText(token: TokenOperand): string {
  switch (token.kind) {
    case "type":
      return token.fullName;
    case "field":
    case "method":
      return memberName(token.declaringType, token.name);
  }
}

export function formatOperand(instr: Instruction): string {
  const { operand } = instr;
  switch (operand.kind) {
    case "none":
      return "";
    case "byte":
    case "sbyte":
    case "int32":
    case "float32":
    case "float64":
      return String(operand.value);
    case "int64":
      return operand.value.toString();
    case "string":
      return JSON.stringify(operand.value);
    case "target":
      return formatLabel(operand.target.offset);
    case "targets":
      return `(${operand.targets.map((t) => formatLabel(t.offset)).join(",")})`;
    case "type":
      return operand.type.fullName;
    case "field":
      return memberName(operand.field.declaringType, operand.field.name);
    case "method":
      return memberName(operand.method.declaringType, operand.method.name);
    case "token":
      return tokenText(operand.token);
    case "methodSig": {
      const sig = operand.methodSig;
      const params = sig.params.map(typeSigName).join(",");
      return `${sig.hasThis ? "instance " : ""}${typeSigName(sig.retType)}(${params})`;
    }
    case "parameter":
      return operand.parameter.name || `A_${operand.parameter.index}`;
    case "local":
      return operand.local.name ?? `V_${operand.local.index}`;
  }
}

export function formatInstruction(instr: Instruction): string {
  const text = `${formatLabel(instr.offset)}: ${instr.opCode.name}`;
  const operand = formatOperand(instr);
  return operand ? `${text} ${operand}` : text;
}
