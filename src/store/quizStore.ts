// src/store/quizStore.ts
import type { QuestaoTipo } from "../models/Questao";

export type { QuestaoTipo };

export type QuestionarioRecord = {
  id: string;
  nome: string;
  descricao: string;
  createdAt: Date;
};

export type NewQuestao = {
  tipo: QuestaoTipo;
  texto: string;
  explicacao: string;
  alternativas: string[];
  corretaText: string;
  tags: string[];
};

export type QuestaoRecord = NewQuestao & {
  id: string;
  questionarioId: string;
  createdAt: Date;
};

export type NewResposta = {
  questionarioId: string;
  questaoId: string;
  correto: boolean;
};

export type RespostaTally = {
  total: number;
  correct: number;
};

/**
 * Persistence for questionarios, questoes and respostas.
 * Lookups by an id that does not exist (or is not a valid id) resolve to null.
 */
export interface QuizStore {
  /** Create indexes. Safe to call on every start. */
  init(): Promise<void>;

  /** Sorted by nome. */
  listQuestionarios(): Promise<QuestionarioRecord[]>;
  findQuestionarioById(id: string): Promise<QuestionarioRecord | null>;
  findQuestionarioByName(nome: string): Promise<QuestionarioRecord | null>;
  /** @throws ConflictError when the nome is taken */
  insertQuestionario(nome: string, descricao: string): Promise<QuestionarioRecord>;
  /** Removes the questionario with its questoes and respostas. */
  deleteQuestionario(id: string): Promise<boolean>;

  /** Insertion order. */
  listQuestoes(questionarioId: string): Promise<QuestaoRecord[]>;
  findQuestao(id: string): Promise<QuestaoRecord | null>;
  insertQuestao(questionarioId: string, questao: NewQuestao): Promise<QuestaoRecord>;
  updateExplicacao(questaoId: string, explicacao: string): Promise<QuestaoRecord | null>;
  countQuestoes(questionarioIds: string[]): Promise<number>;
  sampleQuestoes(questionarioIds: string[], size: number): Promise<QuestaoRecord[]>;

  insertResposta(resposta: NewResposta): Promise<void>;
  tallyRespostas(questionarioId: string): Promise<RespostaTally>;
  /** One grouped tally keyed by questionario id; ids without respostas are absent. */
  tallyAllRespostas(): Promise<Map<string, RespostaTally>>;
}
