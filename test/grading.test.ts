import { describe, expect, it } from "vitest";
import { gradeAnswer, normalizeBool, resolveMcLetter, toVfAnswer } from "../src/services/grading";

describe("normalizeBool", () => {
  it.each([
    ["V", true],
    ["Sim", true],
    [" verdadeiro ", true],
    ["t", true],
    ["1", true],
    ["F", false],
    ["Falso", false],
    ["no", false],
    ["", false],
  ])("%j -> %s", (input, expected) => {
    expect(normalizeBool(input)).toBe(expected);
  });

  it("passes booleans and numbers through", () => {
    expect(normalizeBool(true)).toBe(true);
    expect(normalizeBool(0)).toBe(false);
    expect(normalizeBool(2)).toBe(true);
  });

  it("maps to V/F", () => {
    expect(toVfAnswer("TRUE")).toBe("V");
    expect(toVfAnswer("x")).toBe("F");
  });
});

describe("resolveMcLetter", () => {
  const alternativas = ["x", "2x", "x^2"];

  it("accepts a letter in any case", () => {
    expect(resolveMcLetter(alternativas, "b")).toBe("B");
    expect(resolveMcLetter(alternativas, " C ")).toBe("C");
  });

  it("matches an alternative's text ignoring case", () => {
    expect(resolveMcLetter(alternativas, "2X")).toBe("B");
    expect(resolveMcLetter(["21", "22", "80", "110", "443"], "80")).toBe("C");
  });

  it("rejects letters past the last alternative and unknown text", () => {
    expect(resolveMcLetter(alternativas, "D")).toBeNull();
    expect(resolveMcLetter(alternativas, "3x")).toBeNull();
  });
});

describe("gradeAnswer", () => {
  const vfTrue = { tipo: "VF" as const, alternativas: [], corretaText: "V" };
  const vfFalse = { tipo: "VF" as const, alternativas: [], corretaText: "F" };
  const mc = { tipo: "MC" as const, alternativas: ["Paris", "Rome", "Madrid"], corretaText: "A" };

  it("grades VF answers", () => {
    expect(gradeAnswer(vfTrue, "Verdadeiro")).toBe(true);
    expect(gradeAnswer(vfTrue, false)).toBe(false);
    expect(gradeAnswer(vfFalse, "Falso")).toBe(true);
    expect(gradeAnswer(vfFalse, "V")).toBe(false);
  });

  it("grades MC answers by letter or text", () => {
    expect(gradeAnswer(mc, "a")).toBe(true);
    expect(gradeAnswer(mc, "paris")).toBe(true);
    expect(gradeAnswer(mc, "B")).toBe(false);
    expect(gradeAnswer(mc, "Lisbon")).toBe(false);
  });

  it("treats a boolean choice on an MC question as wrong", () => {
    expect(gradeAnswer(mc, true)).toBe(false);
  });
});
