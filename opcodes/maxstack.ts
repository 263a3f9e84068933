import type { Instruction } from "../Instruction";
import { formatLabel } from "./format";
import { POP_ALL } from "./stack";
import { Code } from "./types";

export interface MaxStackOptions {
  hasReturnValue?: boolean; // whether the enclosing method returns a value (for ret)
  trace?: boolean; // log each step
}

export interface MaxStackResult {
  maxStack: number;
  errors: number;
}

/**
 * Linear max-stack pass over a method body. Heights are recorded at every
 * branch target; after an unconditional transfer the walk resumes from the
 * height recorded for the next instruction, or 0 if nothing branches there.
 * Exception handler entry heights are not modelled.
 */
export function calculateMaxStack(
  instructions: readonly Instruction[],
  options: MaxStackOptions = {},
): MaxStackResult {
  const { hasReturnValue = false, trace = false } = options;
  const inBody = new Set(instructions);
  const heights = new Map<Instruction, number>();
  let errors = 0;

  const report = (message: string) => {
    errors++;
    if (trace) console.error(`maxstack: ${message}`);
  };

  // Record the height at a join point; a conflicting height keeps the first one
  const writeHeight = (instr: Instruction, stack: number): number => {
    const known = heights.get(instr);
    if (known === undefined) {
      heights.set(instr, stack);
      return stack;
    }
    if (known !== stack)
      report(`${formatLabel(instr.offset)} reached with stack ${stack}, expected ${known}`);
    return known;
  };

  const writeTarget = (from: Instruction, target: Instruction, stack: number) => {
    if (!inBody.has(target)) {
      report(`${formatLabel(from.offset)} ${from.opCode.name} targets an instruction outside the body`);
      return;
    }
    writeHeight(target, stack);
  };

  let stack = 0;
  let maxStack = 0;
  let resetStack = false;

  for (const instr of instructions) {
    if (resetStack) {
      stack = heights.get(instr) ?? 0;
      resetStack = false;
    }
    stack = writeHeight(instr, stack);

    const isJmp = instr.opCode.value === Code.Jmp;
    if (isJmp) {
      if (stack !== 0) report(`${formatLabel(instr.offset)} jmp with non-empty stack`);
    } else {
      const { pushes, pops } = instr.calculateStackUsage(hasReturnValue);
      if (pops === POP_ALL) {
        stack = 0;
      } else {
        stack -= pops;
        if (stack < 0) {
          report(`${formatLabel(instr.offset)} ${instr.opCode.name} stack underflow`);
          stack = 0;
        }
        stack += pushes;
      }
    }
    if (stack > maxStack) maxStack = stack;

    if (trace) {
      console.log(`${formatLabel(instr.offset)}: ${instr.opCode.name} -> stack=${stack}`);
    }

    const { operand } = instr;
    switch (instr.opCode.flowControl) {
      case "Branch":
        if (operand.kind === "target") writeTarget(instr, operand.target, stack);
        else report(`${formatLabel(instr.offset)} ${instr.opCode.name} has no branch target`);
        resetStack = true;
        break;

      case "Call":
        if (isJmp) resetStack = true;
        break;

      case "Cond_Branch":
        if (operand.kind === "targets") {
          for (const target of operand.targets) writeTarget(instr, target, stack);
        } else if (operand.kind === "target") {
          writeTarget(instr, operand.target, stack);
        } else {
          report(`${formatLabel(instr.offset)} ${instr.opCode.name} has no branch target`);
        }
        break;

      case "Return":
      case "Throw":
        resetStack = true;
        break;

      default:
        break;
    }
  }

  return { maxStack, errors };
}
