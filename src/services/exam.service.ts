// src/services/exam.service.ts
import type { QuestaoRecord, QuizStore } from "../store/quizStore";
import { NotFoundError, ValidationError } from "../utils/errors";
import { gradeAnswer, type Choice } from "./grading";
import { percentage } from "./metrics.service";
import { FAVORITOS_NAME } from "./questionario.service";
import { toAnswerResult, toQuestaoView, type AnswerResult, type QuestaoView } from "./questaoView";

export const DEFAULT_EXAM_SIZE = 10;

export type ExamState = {
  questionarioIds: string[];
  finished: boolean;
  /** 1-based position of the current question; equals total once finished */
  position: number;
  total: number;
  correct: number;
  percentage: number;
  question: QuestaoView | null;
  result: AnswerResult | null;
};

async function resolveExamQuestionarios(store: QuizStore, ids: string[]): Promise<string[]> {
  const unique = [...new Set(ids.map((id) => id.trim()).filter(Boolean))];
  if (!unique.length) throw new ValidationError("Select at least one questionario");

  for (const id of unique) {
    const questionario = await store.findQuestionarioById(id);
    if (!questionario) throw new NotFoundError("Questionario");
    if (questionario.nome === FAVORITOS_NAME) {
      throw new ValidationError(`"${FAVORITOS_NAME}" cannot be used in an exam`);
    }
  }
  return unique;
}

export async function availableQuestions(store: QuizStore, questionarioIds: string[]): Promise<number> {
  const ids = await resolveExamQuestionarios(store, questionarioIds);
  return store.countQuestoes(ids);
}

/**
 * A random sample of questions across questionarios. Answers are graded but
 * never written to respostas, so exams do not skew questionario metrics.
 */
export class ExamSession {
  private index = 0;
  private correct = 0;
  private readonly results = new Map<string, boolean>();

  private constructor(
    readonly questionarioIds: string[],
    private readonly questoes: QuestaoRecord[]
  ) {}

  static async start(store: QuizStore, questionarioIds: string[], count = DEFAULT_EXAM_SIZE): Promise<ExamSession> {
    const ids = await resolveExamQuestionarios(store, questionarioIds);
    const available = await store.countQuestoes(ids);
    if (available === 0) throw new ValidationError("The selected questionarios have no questions");

    const size = Math.min(Math.max(1, Math.floor(count)), available);
    const questoes = await store.sampleQuestoes(ids, size);
    return new ExamSession(ids, questoes);
  }

  private current(): QuestaoRecord | undefined {
    return this.questoes[this.index];
  }

  state(): ExamState {
    const q = this.current();
    const answered = q ? this.results.get(q.id) : undefined;
    const total = this.questoes.length;
    return {
      questionarioIds: [...this.questionarioIds],
      finished: !q,
      position: q ? this.index + 1 : total,
      total,
      correct: this.correct,
      percentage: percentage(this.correct, total),
      question: q ? toQuestaoView(q) : null,
      result: q && answered !== undefined ? toAnswerResult(q, answered, true) : null,
    };
  }

  answer(choice: Choice): AnswerResult {
    const q = this.current();
    if (!q) throw new ValidationError("Exam is finished");

    const previous = this.results.get(q.id);
    if (previous !== undefined) return toAnswerResult(q, previous, true);

    const correct = gradeAnswer(q, choice);
    this.results.set(q.id, correct);
    if (correct) this.correct += 1;
    return toAnswerResult(q, correct, false);
  }

  next(): ExamState {
    if (!this.current()) throw new ValidationError("Exam is finished");
    this.index += 1;
    return this.state();
  }
}
