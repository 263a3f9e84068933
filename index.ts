export { Instruction } from "./Instruction";
export { InvalidOperandError } from "./opcodes/errors";
export {
  OpCode,
  OperandType,
  FlowControl,
  PushBehaviour,
  PopBehaviour,
  Code,
  defineOpCode,
} from "./opcodes/types";
export {
  OpCodeTable,
  STANDARD_OPCODES,
  createOpCodeTable,
  requireOpCode,
} from "./opcodes/tables";
export {
  ElementType,
  FieldRef,
  Local,
  MethodRef,
  MethodSig,
  Operand,
  OperandKind,
  Parameter,
  TokenOperand,
  TypeRef,
  TypeSig,
  operandFitsOpCode,
} from "./opcodes/operands";
export { getInstructionSize } from "./opcodes/size";
export { POP_ALL, StackUsage, calculateStackUsage } from "./opcodes/stack";
export { updateInstructionOffsets } from "./opcodes/layout";
export { MaxStackOptions, MaxStackResult, calculateMaxStack } from "./opcodes/maxstack";
export { formatInstruction, formatLabel } from "./opcodes/format";
export {
  ListingError,
  MethodListing,
  loadMethodListing,
  parseMethodListing,
} from "./MethodListing";
