// src/routes/questionarios.ts
import { Router } from "express";
import { z } from "zod";
import type { QuizStore } from "../store/quizStore";
import {
  addQuestao,
  createQuestionario,
  deleteQuestionario,
  getQuestionario,
  getQuestoes,
  listQuestionarios,
} from "../services/questionario.service";
import { getDesempenho } from "../services/metrics.service";
import { toQuestaoDTO, toQuestionarioDTO } from "./dto";

const CreateQuestionarioSchema = z.object({
  nome: z.string().trim().min(1).max(200),
  descricao: z.string().max(2000).optional(),
});

const CreateQuestaoSchema = z.object({
  tipo: z.enum(["VF", "MC"]).default("VF"),
  texto: z.string().min(1),
  correta: z.union([z.string(), z.boolean()]),
  explicacao: z.string().optional(),
  alternativas: z.array(z.string()).max(5).optional(),
  tags: z.array(z.string()).optional(),
});

export function questionariosRouter(store: QuizStore) {
  const router = Router();

  /**
   * @openapi
   * /questionarios:
   *   get:
   *     summary: List questionarios with their answer metrics
   *     tags:
   *       - Questionarios
   *     parameters:
   *       - in: query
   *         name: q
   *         schema:
   *           type: string
   *         description: Case-insensitive name filter.
   *     responses:
   *       200:
   *         description: Questionarios sorted by name
   */
  router.get("/", async (req, res, next) => {
    try {
      const q = typeof req.query.q === "string" ? req.query.q : undefined;
      const rows = await listQuestionarios(store, q);
      res.json({ data: rows.map(toQuestionarioDTO) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * @openapi
   * /questionarios:
   *   post:
   *     summary: Create a questionario
   *     tags:
   *       - Questionarios
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [nome]
   *             properties:
   *               nome:
   *                 type: string
   *               descricao:
   *                 type: string
   *     responses:
   *       201:
   *         description: Created
   *       409:
   *         description: Name already taken
   */
  router.post("/", async (req, res, next) => {
    try {
      const body = CreateQuestionarioSchema.parse(req.body);
      const created = await createQuestionario(store, body);
      res.status(201).json({ data: toQuestionarioDTO(created) });
    } catch (err) {
      next(err);
    }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      const questionario = await getQuestionario(store, req.params.id);
      res.json({ data: toQuestionarioDTO(questionario) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * @openapi
   * /questionarios/{id}:
   *   delete:
   *     summary: Delete a questionario with its questions and answers
   *     tags:
   *       - Questionarios
   *     responses:
   *       204:
   *         description: Deleted
   *       403:
   *         description: The favourites questionario cannot be deleted
   */
  router.delete("/:id", async (req, res, next) => {
    try {
      await deleteQuestionario(store, req.params.id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  /**
   * @openapi
   * /questionarios/{id}/questoes:
   *   get:
   *     summary: List the questions of a questionario, answers included
   *     tags:
   *       - Questionarios
   *     responses:
   *       200:
   *         description: Questions in insertion order
   */
  router.get("/:id/questoes", async (req, res, next) => {
    try {
      const questoes = await getQuestoes(store, req.params.id);
      res.json({ data: questoes.map(toQuestaoDTO), count: questoes.length });
    } catch (err) {
      next(err);
    }
  });

  router.post("/:id/questoes", async (req, res, next) => {
    try {
      const body = CreateQuestaoSchema.parse(req.body);
      const created = await addQuestao(store, req.params.id, body);
      res.status(201).json({ data: toQuestaoDTO(created) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * @openapi
   * /questionarios/{id}/desempenho:
   *   get:
   *     summary: Answers recorded for a questionario, correct count and percentage
   *     tags:
   *       - Questionarios
   *     responses:
   *       200:
   *         description: Metrics
   */
  router.get("/:id/desempenho", async (req, res, next) => {
    try {
      res.json({ data: await getDesempenho(store, req.params.id) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
