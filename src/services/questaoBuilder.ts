// src/services/questaoBuilder.ts
import type { NewQuestao } from "../store/quizStore";
import { ValidationError } from "../utils/errors";
import { resolveMcLetter, toVfAnswer } from "./grading";

export const MAX_ALTERNATIVAS = 5;

/** Loose question input, shared by the CSV importer and the JSON API. */
export type QuestaoInput = {
  tipo?: string;
  texto: string;
  correta: string | boolean;
  explicacao?: string;
  alternativas?: string | string[];
  tags?: string | string[];
};

/** "a;b;c" or "a|b|c" (so "a||b" works too). */
export function parseAlternativas(value: string): string[] {
  const s = value.trim();
  if (!s) return [];
  const sep = s.includes(";") ? ";" : "|";
  return s
    .split(sep)
    .map((part) => part.trim())
    .filter(Boolean)
    .slice(0, MAX_ALTERNATIVAS);
}

export function parseTags(value: string): string[] {
  return value
    .split(/[;,]/)
    .map((tag) => tag.trim())
    .filter(Boolean);
}

function cleanList(values: string[]): string[] {
  return values.map((v) => v.trim()).filter(Boolean);
}

export function buildQuestao(input: QuestaoInput): NewQuestao {
  const tipo = (input.tipo ?? "").trim().toUpperCase() || "VF";
  const texto = input.texto.trim();
  if (!texto) throw new ValidationError("Question text is empty.");

  const explicacao = (input.explicacao ?? "").trim();
  const tags = Array.isArray(input.tags) ? cleanList(input.tags) : parseTags(input.tags ?? "");

  if (tipo === "VF") {
    return { tipo: "VF", texto, explicacao, alternativas: [], corretaText: toVfAnswer(input.correta), tags };
  }

  if (tipo === "MC") {
    const alternativas = Array.isArray(input.alternativas)
      ? cleanList(input.alternativas).slice(0, MAX_ALTERNATIVAS)
      : parseAlternativas(input.alternativas ?? "");
    if (alternativas.length < 2) {
      throw new ValidationError("MC question requires at least 2 alternatives.");
    }

    const letter = typeof input.correta === "string" ? resolveMcLetter(alternativas, input.correta) : null;
    if (!letter) throw new ValidationError("Invalid correct answer for MC question.");

    return { tipo: "MC", texto, explicacao, alternativas, corretaText: letter, tags };
  }

  throw new ValidationError("tipo must be 'VF' or 'MC'.");
}
