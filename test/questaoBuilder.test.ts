import { describe, expect, it } from "vitest";
import { buildQuestao, parseAlternativas, parseTags } from "../src/services/questaoBuilder";
import { ValidationError } from "../src/utils/errors";

describe("parseAlternativas", () => {
  it("splits on ; when present, otherwise on |", () => {
    expect(parseAlternativas("x;2x;x^2")).toEqual(["x", "2x", "x^2"]);
    expect(parseAlternativas("21|22|80")).toEqual(["21", "22", "80"]);
  });

  it("drops blanks so || separators work", () => {
    expect(parseAlternativas(" a || b ||c ")).toEqual(["a", "b", "c"]);
  });

  it("keeps at most five alternatives", () => {
    expect(parseAlternativas("1;2;3;4;5;6;7")).toEqual(["1", "2", "3", "4", "5"]);
  });
});

describe("parseTags", () => {
  it("splits on ; and ,", () => {
    expect(parseTags("lei; licitação,  cf ")).toEqual(["lei", "licitação", "cf"]);
  });
});

describe("buildQuestao", () => {
  it("defaults to VF and normalises the answer", () => {
    expect(buildQuestao({ tipo: "", texto: "  The sky is blue.  ", correta: "true" })).toEqual({
      tipo: "VF",
      texto: "The sky is blue.",
      explicacao: "",
      alternativas: [],
      corretaText: "V",
      tags: [],
    });
  });

  it("stores anything that is not truthy as F", () => {
    expect(buildQuestao({ tipo: "vf", texto: "Water boils at 50C.", correta: "nao" }).corretaText).toBe("F");
  });

  it("builds an MC question answered by text", () => {
    const questao = buildQuestao({
      tipo: "MC",
      texto: "Default HTTP port?",
      correta: "80",
      explicacao: " Historical default ",
      alternativas: "21|22|80|110|443",
      tags: "net;http",
    });

    expect(questao).toEqual({
      tipo: "MC",
      texto: "Default HTTP port?",
      explicacao: "Historical default",
      alternativas: ["21", "22", "80", "110", "443"],
      corretaText: "C",
      tags: ["net", "http"],
    });
  });

  it("accepts alternative and tag arrays", () => {
    const questao = buildQuestao({
      tipo: "MC",
      texto: "Capital of France?",
      correta: "a",
      alternativas: ["Paris", " ", "Rome"],
      tags: [" geo "],
    });

    expect(questao.alternativas).toEqual(["Paris", "Rome"]);
    expect(questao.corretaText).toBe("A");
    expect(questao.tags).toEqual(["geo"]);
  });

  it("requires at least two MC alternatives", () => {
    const build = () => buildQuestao({ tipo: "MC", texto: "Pick one", correta: "A", alternativas: "only" });
    expect(build).toThrow(ValidationError);
    expect(build).toThrow("MC question requires at least 2 alternatives.");
  });

  it("rejects an MC answer that matches nothing", () => {
    expect(() => buildQuestao({ tipo: "MC", texto: "Pick one", correta: "E", alternativas: "a;b" })).toThrow(
      "Invalid correct answer for MC question."
    );
    expect(() => buildQuestao({ tipo: "MC", texto: "Pick one", correta: true, alternativas: "a;b" })).toThrow(
      "Invalid correct answer for MC question."
    );
  });

  it("rejects unknown types and empty text", () => {
    expect(() => buildQuestao({ tipo: "XX", texto: "What?", correta: "V" })).toThrow("tipo must be 'VF' or 'MC'.");
    expect(() => buildQuestao({ tipo: "VF", texto: "   ", correta: "V" })).toThrow("Question text is empty.");
  });
});
