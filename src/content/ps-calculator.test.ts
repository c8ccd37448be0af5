import { describe, expect, it } from "vitest";
import { stringToBytes } from "#src/test-utils";
import { ContentError } from "./errors";
import { parsePsProgram, runPsProgram } from "./ps-calculator";

function run(source: string, inputs: number[], outputs: number): number[] {
  return runPsProgram(parsePsProgram(stringToBytes(source)), inputs, outputs);
}

describe("PostScript calculator", () => {
  it("does arithmetic on the inputs", () => {
    expect(run("{ 3 add 2 div }", [1], 1)).toEqual([2]);
    expect(run("{ neg abs 0.5 sub }", [2], 1)).toEqual([1.5]);
  });

  it("returns the top of the stack in order", () => {
    expect(run("{ dup 2 mul exch }", [0.25], 2)).toEqual([0.5, 0.25]);
  });

  it("branches with if and ifelse", () => {
    const program = "{ dup 0.5 gt { pop 1 } { pop 0 } ifelse }";

    expect(run(program, [0.7], 1)).toEqual([1]);
    expect(run(program, [0.2], 1)).toEqual([0]);
    expect(run("{ dup 0 lt { neg } if }", [-3], 1)).toEqual([3]);
  });

  it("converts booleans left on the stack to 0 and 1", () => {
    expect(run("{ 0.5 gt }", [0.7], 1)).toEqual([1]);
    expect(run("{ 0.5 gt }", [0.2], 1)).toEqual([0]);
  });

  it("manipulates the stack", () => {
    expect(run("{ 1 2 3 3 1 roll }", [], 3)).toEqual([3, 1, 2]);
    expect(run("{ 5 6 7 2 index }", [], 4)).toEqual([5, 6, 7, 5]);
    expect(run("{ 1 2 2 copy }", [], 4)).toEqual([1, 2, 1, 2]);
  });

  it("does integer and bitwise operations", () => {
    expect(run("{ 1 3 bitshift 16 -2 bitshift }", [], 2)).toEqual([8, 4]);
    expect(run("{ 7 2 idiv 7 2 mod -7 2 mod }", [], 3)).toEqual([3, 1, -1]);
    expect(run("{ 12 10 and 12 10 or 12 10 xor }", [], 3)).toEqual([8, 14, 6]);
    expect(run("{ 2.5 round -2.5 round 2.7 truncate }", [], 3)).toEqual([3, -2, 2]);
  });

  it("uses degrees for trigonometry", () => {
    expect(run("{ 90 sin 0 cos }", [], 2)).toEqual([1, 1]);
    expect(run("{ 0 -1 atan }", [], 1)[0]).toBeCloseTo(180);
    expect(run("{ -1 0 atan }", [], 1)[0]).toBeCloseTo(270);
  });

  it("divides by zero to zero", () => {
    expect(run("{ 0 div }", [4], 1)).toEqual([0]);
  });

  it("rejects malformed programs", () => {
    expect(() => parsePsProgram(stringToBytes("dup"))).toThrow(ContentError);
    expect(() => parsePsProgram(stringToBytes("{ 1 2"))).toThrow(ContentError);
    expect(() => parsePsProgram(stringToBytes("{ 1 frobnicate }"))).toThrow(ContentError);
    expect(() => parsePsProgram(stringToBytes("{ { 1 } 2 }"))).toThrow(ContentError);
  });

  it("reports stack and type errors", () => {
    expect(() => run("{ add }", [], 1)).toThrow("stack underflow");
    expect(() => run("{ true 1 add }", [], 1)).toThrow("type check");
    expect(() => run("{ pop }", [1], 1)).toThrow("too few results");
  });
});
