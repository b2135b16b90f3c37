// src/services/practice.service.ts
import type { QuestaoRecord, QuizStore } from "../store/quizStore";
import { NotFoundError, ValidationError } from "../utils/errors";
import { gradeAnswer, type Choice } from "./grading";
import { toAnswerResult, toQuestaoView, type AnswerResult, type QuestaoView } from "./questaoView";

export type PracticeOrder = "random" | "sequential";

export type PracticeState = {
  questionarioId: string;
  finished: boolean;
  total: number;
  remaining: number;
  answered: number;
  correct: number;
  question: QuestaoView | null;
  /** Set once the current question has been answered. */
  result: AnswerResult | null;
};

export function shuffle<T>(items: T[], random: () => number = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Walks one questionario's questions. The pool is a stack: the current
 * question is its top and `next` pops it. Each answer is graded and recorded
 * as a resposta once per question per pass.
 */
export class PracticeSession {
  private pool: QuestaoRecord[] = [];
  private total = 0;
  private answered = 0;
  private correct = 0;
  private readonly results = new Map<string, boolean>();
  /** Answers whose resposta is still being written, by questao id. */
  private readonly pending = new Map<string, Promise<boolean>>();
  private pass = 0;

  private constructor(
    private readonly store: QuizStore,
    readonly questionarioId: string,
    readonly order: PracticeOrder,
    private readonly random: () => number
  ) {}

  static async start(
    store: QuizStore,
    questionarioId: string,
    order: PracticeOrder = "random",
    random: () => number = Math.random
  ): Promise<PracticeSession> {
    const questionario = await store.findQuestionarioById(questionarioId);
    if (!questionario) throw new NotFoundError("Questionario");

    const session = new PracticeSession(store, questionarioId, order, random);
    await session.load();
    return session;
  }

  private async load(): Promise<void> {
    const questoes = await this.store.listQuestoes(this.questionarioId);
    this.pool = this.order === "sequential" ? [...questoes].reverse() : shuffle(questoes, this.random);
    this.total = questoes.length;
    this.answered = 0;
    this.correct = 0;
    this.results.clear();
    this.pending.clear();
    this.pass += 1;
  }

  private current(): QuestaoRecord | undefined {
    return this.pool[this.pool.length - 1];
  }

  state(): PracticeState {
    const q = this.current();
    const answered = q ? this.results.get(q.id) : undefined;
    return {
      questionarioId: this.questionarioId,
      finished: !q,
      total: this.total,
      remaining: this.pool.length,
      answered: this.answered,
      correct: this.correct,
      question: q ? toQuestaoView(q) : null,
      result: q && answered !== undefined ? toAnswerResult(q, answered, true) : null,
    };
  }

  async answer(choice: Choice): Promise<AnswerResult> {
    const q = this.current();
    if (!q) throw new ValidationError("Practice session is finished");

    const previous = this.results.get(q.id);
    if (previous !== undefined) return toAnswerResult(q, previous, true);

    // a second answer while the first is still being recorded gets the first outcome
    const inFlight = this.pending.get(q.id);
    if (inFlight) return toAnswerResult(q, await inFlight, true);

    const correct = gradeAnswer(q, choice);
    const pass = this.pass;
    const recording = this.store
      .insertResposta({ questionarioId: this.questionarioId, questaoId: q.id, correto: correct })
      .then(() => correct);
    this.pending.set(q.id, recording);

    try {
      await recording;
    } finally {
      if (this.pending.get(q.id) === recording) this.pending.delete(q.id);
    }

    // a restart while recording starts a new pass; the old answer does not count there
    if (pass === this.pass) {
      this.results.set(q.id, correct);
      this.answered += 1;
      if (correct) this.correct += 1;
    }
    return toAnswerResult(q, correct, false);
  }

  /** Drop the current question, answered or not. */
  next(): PracticeState {
    if (!this.pool.length) throw new ValidationError("Practice session is finished");
    this.pool.pop();
    return this.state();
  }

  async restart(): Promise<PracticeState> {
    await this.load();
    return this.state();
  }
}
