// src/services/questaoView.ts
import type { QuestaoRecord, QuestaoTipo } from "../store/quizStore";
import { MC_LETTERS } from "./grading";

export type QuestaoOption = { key: string; label: string };

/** A question as shown to someone answering it: no correct answer, no explanation. */
export type QuestaoView = {
  id: string;
  questionarioId: string;
  tipo: QuestaoTipo;
  texto: string;
  options: QuestaoOption[];
  tags: string[];
};

export type AnswerResult = {
  correct: boolean;
  correctAnswer: string;
  explicacao: string;
  alreadyAnswered: boolean;
};

const VF_OPTIONS: QuestaoOption[] = [
  { key: "V", label: "True" },
  { key: "F", label: "False" },
];

export function toQuestaoView(questao: QuestaoRecord): QuestaoView {
  const options =
    questao.tipo === "VF"
      ? VF_OPTIONS.map((o) => ({ ...o }))
      : questao.alternativas.map((label, i) => ({ key: MC_LETTERS[i], label }));

  return {
    id: questao.id,
    questionarioId: questao.questionarioId,
    tipo: questao.tipo,
    texto: questao.texto,
    options,
    tags: [...questao.tags],
  };
}

export function toAnswerResult(questao: QuestaoRecord, correct: boolean, alreadyAnswered: boolean): AnswerResult {
  return {
    correct,
    correctAnswer: questao.corretaText,
    explicacao: questao.explicacao,
    alreadyAnswered,
  };
}
