import type { NewQuestao } from "../../src/store/quizStore";

export function vf(texto: string, corretaText: "V" | "F", explicacao = ""): NewQuestao {
  return { tipo: "VF", texto, explicacao, alternativas: [], corretaText, tags: [] };
}

export function mc(texto: string, alternativas: string[], corretaText: string, explicacao = ""): NewQuestao {
  return { tipo: "MC", texto, explicacao, alternativas, corretaText, tags: [] };
}
