import { readFileSync } from "fs";
import { readFile } from "fs/promises";
import { join } from "path";
import { ListingError, loadMethodListing, parseMethodListing } from "./MethodListing";
import { InvalidOperandError } from "./opcodes/errors";
import { updateInstructionOffsets } from "./opcodes/layout";
import { calculateMaxStack } from "./opcodes/maxstack";
import { STANDARD_OPCODES } from "./opcodes/tables";

// Mock fs/promises
jest.mock("fs/promises");
const mockedReadFile = jest.mocked(readFile);

describe("MethodListing", () => {
  const parse = (json: unknown) => parseMethodListing(json, STANDARD_OPCODES);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("parseMethodListing", () => {
    it("should build instructions in order", () => {
      const listing = parse({
        name: "Demo.Calc::Twice",
        hasReturnValue: true,
        instructions: [
          { op: "ldarg.1" },
          { op: "ldc.i4.s", sbyte: 2 },
          { op: "mul" },
          { op: "ret" },
        ],
      });

      expect(listing.name).toBe("Demo.Calc::Twice");
      expect(listing.hasReturnValue).toBe(true);
      expect(listing.instructions.map((i) => i.opCode.name)).toEqual(["ldarg.1", "ldc.i4.s", "mul", "ret"]);
      expect(listing.instructions[1].operand).toEqual({ kind: "sbyte", value: 2 });
    });

    it("should default the name and return flag", () => {
      const listing = parse({ instructions: [{ op: "ret" }] });
      expect(listing.name).toBe("<anonymous>");
      expect(listing.hasReturnValue).toBe(false);
    });

    it("should resolve forward and backward targets to shared instructions", () => {
      const { instructions } = parse({
        instructions: [
          { op: "nop" },
          { op: "br.s", target: 3 },
          { op: "br", target: 0 },
          { op: "switch", targets: [0, 4, 0] },
          { op: "ret" },
        ],
      });

      const forward = instructions[1].operand;
      expect(forward.kind === "target" && forward.target).toBe(instructions[3]);
      const backward = instructions[2].operand;
      expect(backward.kind === "target" && backward.target).toBe(instructions[0]);
      const table = instructions[3].operand;
      expect(table.kind).toBe("targets");
      if (table.kind === "targets") {
        expect(table.targets[0]).toBe(instructions[0]);
        expect(table.targets[1]).toBe(instructions[4]);
        expect(table.targets[2]).toBe(instructions[0]);
      }
    });

    it("should build metadata operands", () => {
      const { instructions } = parse({
        instructions: [
          { op: "ldc.i8", int64: "9007199254740993" },
          { op: "ldc.r8", float64: 0.25 },
          { op: "ldstr", string: "hi" },
          { op: "newarr", type: "System.Int32" },
          { op: "ldfld", field: { name: "count", declaringType: "Demo.Counter", fieldType: "I4" } },
          {
            op: "callvirt",
            method: {
              name: "Add",
              declaringType: "Demo.Calc",
              signature: { hasThis: true, returnType: "I4", params: ["I4", "Demo.Point"] },
            },
          },
          { op: "call", method: { name: "Missing" } },
          { op: "ldtoken", token: { type: "Demo.Point" } },
          { op: "calli", methodSig: { params: ["I4"] } },
          { op: "ldarg.s", parameter: { index: 1, name: "x" } },
          { op: "stloc", local: { index: 300 } },
          { op: "unaligned.", byte: 1 },
        ],
      });

      expect(instructions.map((i) => i.operand)).toEqual([
        { kind: "int64", value: 9007199254740993n },
        { kind: "float64", value: 0.25 },
        { kind: "string", value: "hi" },
        { kind: "type", type: { kind: "type", fullName: "System.Int32" } },
        {
          kind: "field",
          field: {
            kind: "field",
            name: "count",
            declaringType: { kind: "type", fullName: "Demo.Counter" },
            fieldType: { elementType: "I4" },
          },
        },
        {
          kind: "method",
          method: {
            kind: "method",
            name: "Add",
            declaringType: { kind: "type", fullName: "Demo.Calc" },
            methodSig: {
              hasThis: true,
              explicitThis: false,
              retType: { elementType: "I4" },
              params: [{ elementType: "I4" }, { elementType: "Class", name: "Demo.Point" }],
            },
          },
        },
        { kind: "method", method: { kind: "method", name: "Missing", declaringType: null, methodSig: null } },
        { kind: "token", token: { kind: "type", fullName: "Demo.Point" } },
        {
          kind: "methodSig",
          methodSig: { hasThis: false, explicitThis: false, retType: { elementType: "Void" }, params: [{ elementType: "I4" }] },
        },
        { kind: "parameter", parameter: { index: 1, name: "x", type: null } },
        { kind: "local", local: { index: 300, name: undefined, type: null } },
        { kind: "byte", value: 1 },
      ]);
    });

    it("should let operand mismatches surface as InvalidOperandError", () => {
      expect(() => parse({ instructions: [{ op: "ldc.i4", string: "x" }] })).toThrow(InvalidOperandError);
      expect(() => parse({ instructions: [{ op: "ldc.i4" }] })).toThrow(
        "Opcode ldc.i4 (0x20) does not have an empty operand: expected InlineNone, opcode has InlineI",
      );
    });

    it("should report malformed entries with their index", () => {
      expect(() => parse({ instructions: [{ op: "nop" }, { op: "frob" }] })).toThrow(
        "instructions[1]: Illegal/unknown opcode: frob",
      );
      expect(() => parse({ instructions: [{ op: "ldc.i4", int32: 1, string: "x" }] })).toThrow(
        "instructions[0]: more than one operand: int32, string",
      );
      expect(() => parse({ instructions: [{ op: "br.s", target: 5 }] })).toThrow(
        "instructions[0].target: target 5 is not an instruction index",
      );
      expect(() => parse({ instructions: [{ op: "ldc.i4", int32: "7" }] })).toThrow(
        "instructions[0].int32: expected a number",
      );
      expect(() => parse({ instructions: [{ op: "ldc.i8", int64: 1.5 }] })).toThrow(
        "instructions[0].int64: expected an integer or a decimal string",
      );
      expect(() => parse({ instructions: [42] })).toThrow(ListingError);
    });

    it("should require whole, non-negative parameter and local indices", () => {
      expect(() => parse({ instructions: [{ op: "ldarg.s", parameter: { index: 1.5 } }] })).toThrow(
        "instructions[0].parameter.index: expected a non-negative integer",
      );
      expect(() => parse({ instructions: [{ op: "stloc", local: { index: -1 } }] })).toThrow(
        "instructions[0].local.index: expected a non-negative integer",
      );
      expect(() => parse({ instructions: [{ op: "ldloc.s", local: { index: 0 } }] })).not.toThrow();
    });

    it("should build a long chain of forward branches", () => {
      const count = 10000;
      const entries: { op: string; target?: number }[] = [];
      for (let i = 0; i < count; i++) entries.push({ op: "br", target: i + 1 });
      entries.push({ op: "ret" });

      const { instructions } = parse({ instructions: entries });

      expect(instructions).toHaveLength(count + 1);
      const first = instructions[0].operand;
      expect(first.kind === "target" && first.target).toBe(instructions[1]);
      const last = instructions[count - 1].operand;
      expect(last.kind === "target" && last.target).toBe(instructions[count]);
    });

    it("should reject a cycle that runs through several branches", () => {
      expect(() =>
        parse({
          instructions: [
            { op: "br", target: 1 },
            { op: "br", target: 2 },
            { op: "br", target: 0 },
          ],
        }),
      ).toThrow("instructions[0]: branch target cycle");
    });

    it("should reject a branch that targets itself", () => {
      expect(() => parse({ instructions: [{ op: "br.s", target: 0 }] })).toThrow(
        "instructions[0]: branch target cycle",
      );
    });

    it("should reject a malformed listing", () => {
      expect(() => parse(null)).toThrow("listing: expected an object");
      expect(() => parse({})).toThrow("listing.instructions: expected an array");
      expect(() => parse({ hasReturnValue: "yes", instructions: [] })).toThrow(
        "listing.hasReturnValue: expected a boolean",
      );
    });
  });

  describe("bundled sample", () => {
    it("should lay out and analyse the countdown loop", () => {
      const json = JSON.parse(readFileSync(join(__dirname, "samples", "countdown.json"), "utf8"));
      const listing = parse(json);

      expect(listing.instructions).toHaveLength(17);
      expect(updateInstructionOffsets(listing.instructions)).toBe(31);
      expect(listing.instructions[12].toString()).toBe("IL_0011: bgt.s IL_0004");
      expect(calculateMaxStack(listing.instructions, { hasReturnValue: listing.hasReturnValue })).toEqual({
        maxStack: 2,
        errors: 0,
      });
    });
  });

  describe("loadMethodListing", () => {
    it("should read and parse a listing file", async () => {
      mockedReadFile.mockResolvedValue(JSON.stringify({ hasReturnValue: true, instructions: [{ op: "ret" }] }));

      const listing = await loadMethodListing("method.json", STANDARD_OPCODES);

      expect(mockedReadFile).toHaveBeenCalledWith("method.json", "utf8");
      expect(listing.hasReturnValue).toBe(true);
      expect(listing.instructions).toHaveLength(1);
    });

    it("should propagate read errors", async () => {
      mockedReadFile.mockRejectedValue(new Error("ENOENT: no such file"));
      await expect(loadMethodListing("missing.json", STANDARD_OPCODES)).rejects.toThrow("ENOENT: no such file");
    });
  });
});
