// JSON method listings: a readable stand-in for a decoded method body
import { readFile } from "fs/promises";
import { Instruction } from "./Instruction";
import {
  FieldRef,
  Local,
  MethodRef,
  MethodSig,
  Parameter,
  TokenOperand,
  TypeRef,
  TypeSig,
  isElementType,
} from "./opcodes/operands";
import { OpCodeTable } from "./opcodes/tables";
import { OpCode } from "./opcodes/types";

type JsonObject = { [key: string]: unknown };

export interface MethodListing {
  name: string;
  hasReturnValue: boolean;
  instructions: Instruction[];
}

// At most one of these may appear on an instruction entry
const OPERAND_KEYS = [
  "byte",
  "sbyte",
  "int32",
  "int64",
  "float32",
  "float64",
  "string",
  "target",
  "targets",
  "type",
  "field",
  "method",
  "token",
  "methodSig",
  "parameter",
  "local",
] as const;

function isObject(x: unknown): x is JsonObject {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

class ListingError extends Error {
  constructor(where: string, message: string) {
    super(`${where}: ${message}`);
    this.name = "ListingError";
  }
}

function expectNumber(where: string, x: unknown): number {
  if (typeof x !== "number" || Number.isNaN(x)) throw new ListingError(where, "expected a number");
  return x;
}

function expectIndex(where: string, x: unknown): number {
  const n = expectNumber(where, x);
  if (!Number.isInteger(n) || n < 0) throw new ListingError(where, "expected a non-negative integer");
  return n;
}

function expectString(where: string, x: unknown): string {
  if (typeof x !== "string") throw new ListingError(where, "expected a string");
  return x;
}

function expectObject(where: string, x: unknown): JsonObject {
  if (!isObject(x)) throw new ListingError(where, "expected an object");
  return x;
}

function optionalString(where: string, x: unknown): string | undefined {
  return x === undefined ? undefined : expectString(where, x);
}

// "I4", "Void", ... name an element type; anything else is a class name
function parseTypeSig(where: string, x: unknown): TypeSig | null {
  if (x === undefined || x === null) return null;
  const name = expectString(where, x);
  return isElementType(name) ? { elementType: name } : { elementType: "Class", name };
}

function parseTypeRef(where: string, x: unknown): TypeRef {
  return { kind: "type", fullName: expectString(where, x) };
}

function parseDeclaringType(where: string, x: unknown): TypeRef | null {
  return x === undefined ? null : parseTypeRef(where, x);
}

function parseMethodSig(where: string, x: unknown): MethodSig {
  const o = expectObject(where, x);
  const raw = o.params ?? [];
  if (!Array.isArray(raw)) throw new ListingError(`${where}.params`, "expected an array");
  const params: readonly unknown[] = raw;
  return {
    hasThis: o.hasThis === true,
    explicitThis: o.explicitThis === true,
    retType: parseTypeSig(`${where}.returnType`, o.returnType ?? "Void"),
    params: params.map((p, i) => {
      const sig = parseTypeSig(`${where}.params[${i}]`, p);
      if (!sig) throw new ListingError(`${where}.params[${i}]`, "expected a type");
      return sig;
    }),
  };
}

function parseField(where: string, x: unknown): FieldRef {
  const o = expectObject(where, x);
  return {
    kind: "field",
    name: expectString(`${where}.name`, o.name),
    declaringType: parseDeclaringType(`${where}.declaringType`, o.declaringType),
    fieldType: parseTypeSig(`${where}.fieldType`, o.fieldType),
  };
}

// A method without "signature" models metadata that could not be resolved
function parseMethod(where: string, x: unknown): MethodRef {
  const o = expectObject(where, x);
  return {
    kind: "method",
    name: expectString(`${where}.name`, o.name),
    declaringType: parseDeclaringType(`${where}.declaringType`, o.declaringType),
    methodSig:
      o.signature === undefined ? null : parseMethodSig(`${where}.signature`, o.signature),
  };
}

function parseToken(where: string, x: unknown): TokenOperand {
  const o = expectObject(where, x);
  if (o.type !== undefined) return parseTypeRef(`${where}.type`, o.type);
  if (o.field !== undefined) return parseField(`${where}.field`, o.field);
  if (o.method !== undefined) return parseMethod(`${where}.method`, o.method);
  throw new ListingError(where, "token needs a type, field or method");
}

function parseParameter(where: string, x: unknown): Parameter {
  const o = expectObject(where, x);
  return {
    index: expectIndex(`${where}.index`, o.index),
    name: optionalString(`${where}.name`, o.name) ?? "",
    type: parseTypeSig(`${where}.type`, o.type),
  };
}

function parseLocal(where: string, x: unknown): Local {
  const o = expectObject(where, x);
  return {
    index: expectIndex(`${where}.index`, o.index),
    name: optionalString(`${where}.name`, o.name),
    type: parseTypeSig(`${where}.type`, o.type),
  };
}

function parseInt64(where: string, x: unknown): bigint {
  if (typeof x === "number" && Number.isInteger(x)) return BigInt(x);
  if (typeof x === "string" && /^-?\d+$/.test(x)) return BigInt(x);
  throw new ListingError(where, "expected an integer or a decimal string");
}

type OperandKey = (typeof OPERAND_KEYS)[number];

interface PendingEntry {
  where: string;
  entry: JsonObject;
  opCode: OpCode;
  key: OperandKey | undefined;
  targets: number[];
}

interface BuildFrame {
  index: number;
  pending: PendingEntry;
  next: number;
}

function instantiate(
  opCode: OpCode,
  key: OperandKey | undefined,
  entry: JsonObject,
  where: string,
  resolve: (index: unknown, from: string) => Instruction,
): Instruction {
  switch (key) {
    case undefined:
      return Instruction.create(opCode);
    case "byte":
      return Instruction.createByte(opCode, expectNumber(`${where}.byte`, entry.byte));
    case "sbyte":
      return Instruction.createSByte(opCode, expectNumber(`${where}.sbyte`, entry.sbyte));
    case "int32":
      return Instruction.createInt32(opCode, expectNumber(`${where}.int32`, entry.int32));
    case "int64":
      return Instruction.createInt64(opCode, parseInt64(`${where}.int64`, entry.int64));
    case "float32":
      return Instruction.createFloat32(opCode, expectNumber(`${where}.float32`, entry.float32));
    case "float64":
      return Instruction.createFloat64(opCode, expectNumber(`${where}.float64`, entry.float64));
    case "string":
      return Instruction.createString(opCode, expectString(`${where}.string`, entry.string));
    case "target":
      return Instruction.createBranch(opCode, resolve(entry.target, `${where}.target`));
    case "targets": {
      if (!Array.isArray(entry.targets))
        throw new ListingError(`${where}.targets`, "expected an array");
      const targets: readonly unknown[] = entry.targets;
      return Instruction.createSwitch(
        opCode,
        targets.map((t, n) => resolve(t, `${where}.targets[${n}]`)),
      );
    }
    case "type":
      return Instruction.createType(opCode, parseTypeRef(`${where}.type`, entry.type));
    case "field":
      return Instruction.createField(opCode, parseField(`${where}.field`, entry.field));
    case "method":
      return Instruction.createMethod(opCode, parseMethod(`${where}.method`, entry.method));
    case "token":
      return Instruction.createToken(opCode, parseToken(`${where}.token`, entry.token));
    case "methodSig":
      return Instruction.createMethodSig(opCode, parseMethodSig(`${where}.methodSig`, entry.methodSig));
    case "parameter":
      return Instruction.createParameter(opCode, parseParameter(`${where}.parameter`, entry.parameter));
    case "local":
      return Instruction.createLocal(opCode, parseLocal(`${where}.local`, entry.local));
  }
}

/**
 * Build instructions from a parsed JSON listing. Targets are instruction
 * indices; operands go through the validated constructors, so a shape the
 * opcode does not take throws InvalidOperandError.
 */
export function parseMethodListing(json: unknown, table: OpCodeTable): MethodListing {
  const root = expectObject("listing", json);
  if (!Array.isArray(root.instructions))
    throw new ListingError("listing.instructions", "expected an array");
  const entries: readonly unknown[] = root.instructions;

  const targetIndex = (index: unknown, from: string): number => {
    const i = expectNumber(from, index);
    if (!Number.isInteger(i) || i < 0 || i >= entries.length)
      throw new ListingError(from, `target ${i} is not an instruction index`);
    return i;
  };

  const prepare = (i: number): PendingEntry => {
    const where = `instructions[${i}]`;
    const entry = expectObject(where, entries[i]);
    const name = expectString(`${where}.op`, entry.op);
    const opCode = table.byName(name);
    if (!opCode) throw new ListingError(where, `Illegal/unknown opcode: ${name}`);

    const keys = OPERAND_KEYS.filter((k) => entry[k] !== undefined);
    if (keys.length > 1) throw new ListingError(where, `more than one operand: ${keys.join(", ")}`);
    const key = keys[0];

    let targets: number[] = [];
    if (key === "target") {
      targets = [targetIndex(entry.target, `${where}.target`)];
    } else if (key === "targets") {
      if (!Array.isArray(entry.targets))
        throw new ListingError(`${where}.targets`, "expected an array");
      const raw: readonly unknown[] = entry.targets;
      targets = raw.map((t, n) => targetIndex(t, `${where}.targets[${n}]`));
    }
    return { where, entry, opCode, key, targets };
  };

  const built = new Map<number, Instruction>();
  const onPath = new Set<number>();

  const resolve = (index: unknown, from: string): Instruction => {
    const target = built.get(targetIndex(index, from));
    if (!target) throw new ListingError(from, "target was not built before its branch");
    return target;
  };

  // Targets are built before their branches, depth-first over an explicit
  // stack so long branch chains do not exhaust the call stack. A chain that
  // leads back to itself cannot be expressed immutably.
  const build = (root: number): Instruction => {
    const stack: BuildFrame[] = [];
    const enter = (i: number) => {
      onPath.add(i);
      stack.push({ index: i, pending: prepare(i), next: 0 });
    };

    if (!built.has(root)) enter(root);
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const { targets } = frame.pending;
      if (frame.next < targets.length) {
        const t = targets[frame.next++];
        if (built.has(t)) continue;
        if (onPath.has(t)) throw new ListingError(`instructions[${t}]`, "branch target cycle");
        enter(t);
        continue;
      }
      stack.pop();
      onPath.delete(frame.index);
      const { opCode, key, entry, where } = frame.pending;
      built.set(frame.index, instantiate(opCode, key, entry, where, resolve));
    }
    return resolve(root, `instructions[${root}]`);
  };

  const instructions = entries.map((_, i) => build(i));
  const hasReturnValue = root.hasReturnValue;
  if (hasReturnValue !== undefined && typeof hasReturnValue !== "boolean")
    throw new ListingError("listing.hasReturnValue", "expected a boolean");

  return {
    name: optionalString("listing.name", root.name) ?? "<anonymous>",
    hasReturnValue: hasReturnValue ?? false,
    instructions,
  };
}

export async function loadMethodListing(
  path: string,
  table: OpCodeTable,
): Promise<MethodListing> {
  const text = await readFile(path, "utf8");
  return parseMethodListing(JSON.parse(text), table);
}

export { ListingError };
