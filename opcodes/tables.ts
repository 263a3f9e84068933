import {
  OpCode,
  defineOpCode,
  formatOpCodeValue,
  isFlowControl,
  isOperandType,
  isPopBehaviour,
  isPushBehaviour,
} from "./types";
import standardTable from "./opcodes.json";

// Read-only opcode lookup. Instructions never reach for a global table;
// callers hand one of these to whatever needs to resolve opcodes.
export interface OpCodeTable extends Iterable<OpCode> {
  readonly size: number;
  get(value: number): OpCode | undefined;
  byName(name: string): OpCode | undefined;
  has(value: number): boolean;
}

export function createOpCodeTable(descriptors: Iterable<OpCode>): OpCodeTable {
  const byValue = new Map<number, OpCode>();
  const byName = new Map<string, OpCode>();

  for (const desc of descriptors) {
    if (byValue.has(desc.value))
      throw new Error(`Duplicate opcode value: ${formatOpCodeValue(desc.value)}`);
    if (byName.has(desc.name)) throw new Error(`Duplicate opcode name: ${desc.name}`);
    const frozen = Object.freeze({ ...desc });
    byValue.set(desc.value, frozen);
    byName.set(desc.name, frozen);
  }

  return {
    size: byValue.size,
    get: (value) => byValue.get(value),
    byName: (name) => byName.get(name),
    has: (value) => byValue.has(value),
    [Symbol.iterator]: () => byValue.values(),
  };
}

interface RawOpCodeEntry {
  name: string;
  value: number;
  operandType: string;
  flowControl: string;
  push: string;
  pop: string;
}

// Narrow a JSON row to a descriptor; the JSON module types every field as string
export function parseOpCodeEntry(entry: RawOpCodeEntry): OpCode {
  const { name, value, operandType, flowControl, push, pop } = entry;
  if (!isOperandType(operandType))
    throw new Error(`Opcode ${name}: unknown operand type "${operandType}"`);
  if (!isFlowControl(flowControl))
    throw new Error(`Opcode ${name}: unknown flow control "${flowControl}"`);
  if (!isPushBehaviour(push))
    throw new Error(`Opcode ${name}: unknown push behaviour "${push}"`);
  if (!isPopBehaviour(pop))
    throw new Error(`Opcode ${name}: unknown pop behaviour "${pop}"`);
  return defineOpCode(value, { name, operandType, flowControl, push, pop });
}

// --- ECMA-335 Partition III instruction set ---
export const STANDARD_OPCODES: OpCodeTable = createOpCodeTable(
  standardTable.map(parseOpCodeEntry),
);

export function requireOpCode(table: OpCodeTable, name: string): OpCode {
  const desc = table.byName(name);
  if (!desc) throw new Error(`Illegal/unknown opcode: ${name}`);
  return desc;
}
