#!/usr/bin/env node
import { loadMethodListing } from "./MethodListing";
import { STANDARD_OPCODES } from "./opcodes/tables";
import { updateInstructionOffsets } from "./opcodes/layout";
import { calculateMaxStack } from "./opcodes/maxstack";
import { POP_ALL } from "./opcodes/stack";

async function main() {
  // Parse command line arguments
  const args = process.argv.slice(2);
  const traceEnabled = args.includes("--trace");
  const forceReturnValue = args.includes("--ret");
  const listingPath = args.find((arg) => !arg.startsWith("--"));

  if (!listingPath) {
    console.error("Error: method listing path is required");
    console.error("Usage: ilstat <listing.json> [--trace] [--ret]");
    process.exit(1);
  }

  const listing = await loadMethodListing(listingPath, STANDARD_OPCODES);
  const hasReturnValue = forceReturnValue || listing.hasReturnValue;
  const codeSize = updateInstructionOffsets(listing.instructions);

  if (traceEnabled) {
    console.log(
      `Loaded ${listing.name}: ${listing.instructions.length} instructions, returns value: ${hasReturnValue}`,
    );
  }

  for (const instr of listing.instructions) {
    const { pushes, pops } = instr.calculateStackUsage(hasReturnValue);
    const popText = pops === POP_ALL ? "all" : String(pops);
    console.log(
      `${instr.toString().padEnd(40)} size=${instr.getSize()} push=${pushes} pop=${popText}`,
    );
  }

  const { maxStack, errors } = calculateMaxStack(listing.instructions, {
    hasReturnValue,
    trace: traceEnabled,
  });
  console.log(`code size: ${codeSize}`);
  console.log(`max stack: ${maxStack}`);
  if (errors > 0) {
    console.error(`${errors} stack error(s) found`);
    process.exit(2);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  if (process.argv.includes("--trace") && err instanceof Error) {
    console.error("Stack trace:", err.stack);
  }
  process.exit(1);
});
