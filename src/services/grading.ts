// src/services/grading.ts
import type { QuestaoRecord } from "../store/quizStore";

export const MC_LETTERS = "ABCDE";

const TRUTHY = new Set(["v", "true", "t", "1", "sim", "s", "verdadeiro"]);

export type Choice = string | boolean;

export function normalizeBool(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  return TRUTHY.has(String(value).trim().toLowerCase());
}

export function toVfAnswer(value: unknown): "V" | "F" {
  return normalizeBool(value) ? "V" : "F";
}

/**
 * Map an answer to the letter of its alternative. Accepts the letter itself
 * (any case, within the number of alternatives) or the alternative's text.
 */
export function resolveMcLetter(alternativas: string[], answer: string): string | null {
  const trimmed = answer.trim();
  const upper = trimmed.toUpperCase();
  if (upper.length === 1 && MC_LETTERS.slice(0, alternativas.length).includes(upper)) {
    return upper;
  }

  const wanted = trimmed.toLowerCase();
  const index = alternativas.findIndex((alt) => alt.trim().toLowerCase() === wanted);
  return index >= 0 ? MC_LETTERS[index] : null;
}

export function gradeAnswer(
  questao: Pick<QuestaoRecord, "tipo" | "alternativas" | "corretaText">,
  choice: Choice
): boolean {
  if (questao.tipo === "VF") {
    return toVfAnswer(choice) === questao.corretaText;
  }
  if (typeof choice !== "string") return false;
  return resolveMcLetter(questao.alternativas, choice) === questao.corretaText;
}
