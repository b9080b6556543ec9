import { decode, extract, opcodeOf } from "../src/parser/parser";

describe("opcodeOf", () => {
  test("strips the label prefix before matching", () => {
    expect(opcodeOf("L42:   LOADK R0 K3")).toBe("LOADK");
    expect(opcodeOf("L3:JUMP L5")).toBe("JUMP");
  });

  test("accepts digits and underscores after the first letter", () => {
    expect(opcodeOf("GETIMPORT_K R0 1")).toBe("GETIMPORT_K");
    expect(opcodeOf("FASTCALL2K 18 R1 K0 L0")).toBe("FASTCALL2K");
  });

  test("ignores lines that do not start with an opcode", () => {
    expect(opcodeOf("")).toBeUndefined();
    expect(opcodeOf("L7:")).toBeUndefined();
    expect(opcodeOf("local x = 1")).toBeUndefined();
    expect(opcodeOf("Function 0 (??):")).toBeUndefined();
    expect(opcodeOf("; upvalues: 0")).toBeUndefined();
    expect(opcodeOf("   ")).toBeUndefined();
  });
});

describe("extract", () => {
  test("counts each instruction line once", () => {
    const text = "L0: LOADK R0 K0\n    ADD R1 R0 R0\nL1: RETURN R1 1\n";
    expect(extract(text)).toEqual({ LOADK: 1, ADD: 1, RETURN: 1 });
  });

  test("accumulates repeated opcodes", () => {
    const text = [
      "Function 0 (main):",
      "MOVE R1 R0",
      "MOVE R2 R0",
      "L0: MOVE R3 R0",
      "",
      "RETURN R0 0",
    ].join("\n");
    expect(extract(text)).toEqual({ MOVE: 3, RETURN: 1 });
  });

  test("splits on any line break style", () => {
    const text = "MOVE R0 R1\r\nMOVE R1 R0\rRETURN R0 0";
    expect(extract(text)).toEqual({ MOVE: 2, RETURN: 1 });
  });

  test("returns an empty map for text without instructions", () => {
    expect(extract("")).toEqual({});
    expect(extract("L1:\n\n-- comment\n")).toEqual({});
  });
});

describe("decode", () => {
  test("replaces invalid byte sequences", () => {
    expect(decode(new Uint8Array([0x41, 0xff, 0x42]))).toBe("A�B");
  });

  test("decodes utf-8 text", () => {
    expect(decode(Buffer.from("NOP\n"))).toBe("NOP\n");
  });
});
