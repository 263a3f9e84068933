// Stack effect of a single instruction

import type { Instruction } from "../Instruction";
import { MethodSig, TypeSig } from "./operands";
import { Code, PopBehaviour, PushBehaviour } from "./types";

// pops value meaning "the whole evaluation stack is discarded"
export const POP_ALL = -1;

export interface StackUsage {
  pushes: number;
  pops: number; // POP_ALL or a fixed count
}

function isVoid(type: TypeSig | null): boolean {
  return type !== null && type.elementType === "Void";
}

// call/calli/callvirt/newobj take the method operand; calli carries a bare signature
function callSignature(instr: Instruction): MethodSig | null {
  const { operand } = instr;
  if (operand.kind === "method") return operand.method.methodSig;
  if (operand.kind === "methodSig") return operand.methodSig;
  return null;
}

function callStackUsage(instr: Instruction): StackUsage {
  const sig = callSignature(instr);
  // Unresolved metadata: report nothing rather than fail
  if (!sig) return { pushes: 0, pops: 0 };

  const code = instr.opCode.value;
  const implicitThis = sig.hasThis && !sig.explicitThis;
  let pushes = 0;
  let pops = 0;

  // newobj leaves the new object behind even though .ctor returns void
  if (!isVoid(sig.retType) || (code === Code.Newobj && sig.hasThis)) pushes++;

  pops += sig.params.length;
  if (implicitThis && code !== Code.Newobj) pops++;
  if (code === Code.Calli) pops++; // function pointer

  return { pushes, pops };
}

export function pushCount(push: PushBehaviour): number {
  switch (push) {
    case "Push0":
    case "Varpush": // only the call family, handled from the signature
      return 0;

    case "Push1":
    case "Pushi":
    case "Pushi8":
    case "Pushr4":
    case "Pushr8":
    case "Pushref":
      return 1;

    case "Push1_push1":
      return 2;

    default: {
      const unreachable: never = push;
      throw new Error(`Unknown push behaviour: ${String(unreachable)}`);
    }
  }
}

export function popCount(pop: PopBehaviour, methodHasReturnValue: boolean): number {
  switch (pop) {
    case "Pop0":
      return 0;

    case "Pop1":
    case "Popi":
    case "Popref":
      return 1;

    case "Pop1_pop1":
    case "Popi_pop1":
    case "Popi_popi":
    case "Popi_popi8":
    case "Popi_popr4":
    case "Popi_popr8":
    case "Popref_pop1":
    case "Popref_popi":
      return 2;

    case "Popi_popi_popi":
    case "Popref_popi_popi":
    case "Popref_popi_popi8":
    case "Popref_popi_popr4":
    case "Popref_popi_popr8":
    case "Popref_popi_popref":
    case "Popref_popi_pop1":
      return 3;

    case "PopAll":
      return POP_ALL;

    // Outside the call family only ret uses this
    case "Varpop":
      return methodHasReturnValue ? 1 : 0;

    default: {
      const unreachable: never = pop;
      throw new Error(`Unknown pop behaviour: ${String(unreachable)}`);
    }
  }
}

export function calculateStackUsage(
  instr: Instruction,
  methodHasReturnValue: boolean = false,
): StackUsage {
  if (instr.opCode.flowControl === "Call") return callStackUsage(instr);
  return {
    pushes: pushCount(instr.opCode.push),
    pops: popCount(instr.opCode.pop, methodHasReturnValue),
  };
}
