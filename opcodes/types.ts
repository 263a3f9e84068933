// Strongly-typed, table-driven opcode metadata for the CIL instruction set

export const OPERAND_TYPES = [
  "InlineNone",
  "ShortInlineI",
  "InlineI",
  "InlineI8",
  "ShortInlineR",
  "InlineR",
  "InlineString",
  "ShortInlineBrTarget",
  "InlineBrTarget",
  "InlineSwitch",
  "InlineType",
  "InlineField",
  "InlineMethod",
  "InlineTok",
  "InlineSig",
  "ShortInlineVar",
  "InlineVar",
  "InlinePhi", // reserved, never used by a public opcode
] as const;

export const FLOW_CONTROLS = [
  "Next",
  "Break",
  "Call",
  "Branch",
  "Cond_Branch",
  "Return",
  "Throw",
  "Meta",
  "Phi",
] as const;

export const PUSH_BEHAVIOURS = [
  "Push0",
  "Push1",
  "Pushi",
  "Pushi8",
  "Pushr4",
  "Pushr8",
  "Pushref",
  "Push1_push1",
  "Varpush", // call family only
] as const;

export const POP_BEHAVIOURS = [
  "Pop0",
  "Pop1",
  "Popi",
  "Popref",
  "Pop1_pop1",
  "Popi_pop1",
  "Popi_popi",
  "Popi_popi8",
  "Popi_popr4",
  "Popi_popr8",
  "Popref_pop1",
  "Popref_popi",
  "Popi_popi_popi",
  "Popref_popi_popi",
  "Popref_popi_popi8",
  "Popref_popi_popr4",
  "Popref_popi_popr8",
  "Popref_popi_popref",
  "Popref_popi_pop1",
  "PopAll",
  "Varpop", // call family and ret
] as const;

export type OperandType = (typeof OPERAND_TYPES)[number];
export type FlowControl = (typeof FLOW_CONTROLS)[number];
export type PushBehaviour = (typeof PUSH_BEHAVIOURS)[number];
export type PopBehaviour = (typeof POP_BEHAVIOURS)[number];

export interface OpCode {
  name: string; // mnemonic, e.g. "ldc.i4.s", "callvirt"
  value: number; // 0x00-0xff, or 0xfe00-0xfeff for two-byte opcodes
  size: 1 | 2; // encoded length of the opcode itself
  operandType: OperandType;
  flowControl: FlowControl;
  push: PushBehaviour;
  pop: PopBehaviour;
}

// Opcodes the instruction model depends on by identity rather than metadata
export const Code = {
  Ldc_I4_S: 0x1f,
  Jmp: 0x27,
  Calli: 0x29,
  Newobj: 0x73,
  Unaligned: 0xfe12,
} as const;

export function isTwoByteValue(value: number): boolean {
  return value >= 0xfe00 && value <= 0xfeff;
}

// Build a descriptor with a range check; size follows from the value
export function defineOpCode(
  value: number,
  init: Omit<OpCode, "value" | "size">,
): OpCode {
  if (!Number.isInteger(value)) throw new Error(`Opcode value is not an integer: ${value}`);
  const twoByte = isTwoByteValue(value);
  if (!twoByte && (value < 0 || value > 0xff))
    throw new Error(`Opcode value out of range: 0x${value.toString(16)}`);
  return { value, size: twoByte ? 2 : 1, ...init };
}

function member<T extends string>(values: readonly T[], s: string): s is T {
  return values.some((v) => v === s);
}

export function isOperandType(s: string): s is OperandType {
  return member(OPERAND_TYPES, s);
}

export function isFlowControl(s: string): s is FlowControl {
  return member(FLOW_CONTROLS, s);
}

export function isPushBehaviour(s: string): s is PushBehaviour {
  return member(PUSH_BEHAVIOURS, s);
}

export function isPopBehaviour(s: string): s is PopBehaviour {
  return member(POP_BEHAVIOURS, s);
}

export function formatOpCodeValue(value: number): string {
  return `0x${value.toString(16).padStart(isTwoByteValue(value) ? 4 : 2, "0")}`;
}
