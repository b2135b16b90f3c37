// src/routes/dto.ts
import { z } from "zod";
import type { QuestaoRecord, QuestionarioRecord } from "../store/quizStore";
import type { QuestionarioSummary } from "../services/questionario.service";

/**
 * Store record -> JSON shape (dates as ISO strings)
 */
export function toQuestionarioDTO(record: QuestionarioRecord | QuestionarioSummary) {
  return {
    ...record,
    createdAt: record.createdAt.toISOString(),
  };
}

export function toQuestaoDTO(record: QuestaoRecord) {
  return {
    id: record.id,
    questionarioId: record.questionarioId,
    tipo: record.tipo,
    texto: record.texto,
    explicacao: record.explicacao,
    alternativas: record.alternativas,
    correta_text: record.corretaText,
    tags: record.tags,
    createdAt: record.createdAt.toISOString(),
  };
}

export const ChoiceSchema = z.object({
  choice: z.union([z.string().trim().min(1), z.boolean()]),
});

/** "a,b" or repeated query params -> string[] */
export function queryList(value: unknown): string[] {
  const raw = Array.isArray(value) ? value : [value];
  return raw
    .filter((v): v is string => typeof v === "string")
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter(Boolean);
}
