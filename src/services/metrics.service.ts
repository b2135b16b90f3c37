// src/services/metrics.service.ts
import type { QuizStore, RespostaTally } from "../store/quizStore";
import { NotFoundError } from "../utils/errors";

export type Desempenho = {
  total: number;
  correct: number;
  /** 0..100, one decimal */
  percentage: number;
};

export function percentage(correct: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((correct / total) * 1000) / 10;
}

export function computeDesempenho(tally: RespostaTally): Desempenho {
  return {
    total: tally.total,
    correct: tally.correct,
    percentage: percentage(tally.correct, tally.total),
  };
}

export async function getDesempenho(store: QuizStore, questionarioId: string): Promise<Desempenho> {
  const questionario = await store.findQuestionarioById(questionarioId);
  if (!questionario) throw new NotFoundError("Questionario");
  return computeDesempenho(await store.tallyRespostas(questionarioId));
}
