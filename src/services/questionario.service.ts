// src/services/questionario.service.ts
import type { QuestaoRecord, QuestionarioRecord, QuizStore } from "../store/quizStore";
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";
import { computeDesempenho, type Desempenho } from "./metrics.service";
import { buildQuestao, type QuestaoInput } from "./questaoBuilder";

export const FAVORITOS_NAME = "Favoritos";
export const FAVORITOS_DESCRIPTION = "Questions saved as favourites.";
export const DEFAULT_QUESTIONARIO_NAME = "Untitled";

export type QuestionarioSummary = QuestionarioRecord & {
  desempenho: Desempenho;
};

/**
 * Find a questionario by name, creating it when absent. A blank name maps to
 * the default one.
 */
export async function ensureQuestionario(
  store: QuizStore,
  nome: string,
  descricao = ""
): Promise<QuestionarioRecord> {
  const name = nome.trim() || DEFAULT_QUESTIONARIO_NAME;
  const existing = await store.findQuestionarioByName(name);
  if (existing) return existing;

  try {
    return await store.insertQuestionario(name, descricao);
  } catch (err) {
    // lost a race with a concurrent insert of the same name
    if (err instanceof ConflictError) {
      const winner = await store.findQuestionarioByName(name);
      if (winner) return winner;
    }
    throw err;
  }
}

/** Indexes plus the favourites questionario. Run once on startup. */
export async function initDatabase(store: QuizStore): Promise<void> {
  await store.init();
  await ensureQuestionario(store, FAVORITOS_NAME, FAVORITOS_DESCRIPTION);
  logger.info("Database initialised");
}

export async function listQuestionarios(store: QuizStore, filter?: string): Promise<QuestionarioSummary[]> {
  const needle = filter?.trim().toLowerCase();
  const all = await store.listQuestionarios();
  const matching = needle ? all.filter((q) => q.nome.toLowerCase().includes(needle)) : all;

  const tallies = await store.tallyAllRespostas();
  return matching.map((q) => ({
    ...q,
    desempenho: computeDesempenho(tallies.get(q.id) ?? { total: 0, correct: 0 }),
  }));
}

export async function getQuestionario(store: QuizStore, id: string): Promise<QuestionarioRecord> {
  const questionario = await store.findQuestionarioById(id);
  if (!questionario) throw new NotFoundError("Questionario");
  return questionario;
}

export async function createQuestionario(
  store: QuizStore,
  input: { nome: string; descricao?: string }
): Promise<QuestionarioRecord> {
  const nome = input.nome.trim();
  if (!nome) throw new ValidationError("nome is required");

  if (await store.findQuestionarioByName(nome)) {
    throw new ConflictError(`Questionario "${nome}" already exists`);
  }
  return store.insertQuestionario(nome, input.descricao?.trim() ?? "");
}

export async function deleteQuestionario(store: QuizStore, id: string): Promise<void> {
  const questionario = await getQuestionario(store, id);
  if (questionario.nome === FAVORITOS_NAME) {
    throw new ForbiddenError(`"${FAVORITOS_NAME}" cannot be deleted`);
  }

  await store.deleteQuestionario(id);
  logger.info("Questionario deleted", { id, nome: questionario.nome });
}

export async function getQuestoes(store: QuizStore, questionarioId: string): Promise<QuestaoRecord[]> {
  await getQuestionario(store, questionarioId);
  return store.listQuestoes(questionarioId);
}

export async function addQuestao(
  store: QuizStore,
  questionarioId: string,
  input: QuestaoInput
): Promise<QuestaoRecord> {
  const questao = buildQuestao(input);
  await getQuestionario(store, questionarioId);
  return store.insertQuestao(questionarioId, questao);
}

export async function updateExplicacao(
  store: QuizStore,
  questaoId: string,
  explicacao: string
): Promise<QuestaoRecord> {
  const updated = await store.updateExplicacao(questaoId, explicacao);
  if (!updated) throw new NotFoundError("Questao");
  return updated;
}

/** Copy a question into the favourites questionario. */
export async function addToFavoritos(store: QuizStore, questaoId: string): Promise<QuestaoRecord> {
  const questao = await store.findQuestao(questaoId);
  if (!questao) throw new NotFoundError("Questao");

  const favoritos = await ensureQuestionario(store, FAVORITOS_NAME, FAVORITOS_DESCRIPTION);
  return store.insertQuestao(favoritos.id, {
    tipo: questao.tipo,
    texto: questao.texto,
    explicacao: questao.explicacao,
    alternativas: [...questao.alternativas],
    corretaText: questao.corretaText,
    tags: [...questao.tags],
  });
}
