// src/routes/questoes.ts
import { Router } from "express";
import { z } from "zod";
import type { QuizStore } from "../store/quizStore";
import { addToFavoritos, updateExplicacao } from "../services/questionario.service";
import { NotFoundError } from "../utils/errors";
import { toQuestaoDTO } from "./dto";

const ExplicacaoSchema = z.object({
  explicacao: z.string().max(10000),
});

export function questoesRouter(store: QuizStore) {
  const router = Router();

  router.get("/:id", async (req, res, next) => {
    try {
      const questao = await store.findQuestao(req.params.id);
      if (!questao) throw new NotFoundError("Questao");
      res.json({ data: toQuestaoDTO(questao) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * @openapi
   * /questoes/{id}/explicacao:
   *   patch:
   *     summary: Replace the explanation of a question
   *     tags:
   *       - Questoes
   *     responses:
   *       200:
   *         description: Updated question
   */
  router.patch("/:id/explicacao", async (req, res, next) => {
    try {
      const { explicacao } = ExplicacaoSchema.parse(req.body);
      const updated = await updateExplicacao(store, req.params.id, explicacao);
      res.json({ data: toQuestaoDTO(updated) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * @openapi
   * /questoes/{id}/favoritos:
   *   post:
   *     summary: Copy a question into the "Favoritos" questionario
   *     tags:
   *       - Questoes
   *     responses:
   *       201:
   *         description: The copy
   */
  router.post("/:id/favoritos", async (req, res, next) => {
    try {
      const copy = await addToFavoritos(store, req.params.id);
      res.status(201).json({ data: toQuestaoDTO(copy) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
