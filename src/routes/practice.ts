// src/routes/practice.ts
import { Router } from "express";
import { z } from "zod";
import type { QuizStore } from "../store/quizStore";
import { PracticeSession } from "../services/practice.service";
import type { SessionRegistry } from "../services/sessionRegistry";
import { ChoiceSchema } from "./dto";

const StartPracticeSchema = z.object({
  questionarioId: z.string().min(1),
  order: z.enum(["random", "sequential"]).default("random"),
});

export function practiceRouter(store: QuizStore, sessions: SessionRegistry<PracticeSession>) {
  const router = Router();

  /**
   * @openapi
   * /practice:
   *   post:
   *     summary: Start practising a questionario
   *     tags:
   *       - Practice
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [questionarioId]
   *             properties:
   *               questionarioId:
   *                 type: string
   *               order:
   *                 type: string
   *                 enum: [random, sequential]
   *     responses:
   *       201:
   *         description: Session id and first question
   */
  router.post("/", async (req, res, next) => {
    try {
      const body = StartPracticeSchema.parse(req.body);
      const session = await PracticeSession.start(store, body.questionarioId, body.order);
      const sessionId = sessions.create(session);
      res.status(201).json({ data: { sessionId, ...session.state() } });
    } catch (err) {
      next(err);
    }
  });

  router.get("/:sessionId", (req, res, next) => {
    try {
      const session = sessions.get(req.params.sessionId);
      res.json({ data: { sessionId: req.params.sessionId, ...session.state() } });
    } catch (err) {
      next(err);
    }
  });

  /**
   * @openapi
   * /practice/{sessionId}/answer:
   *   post:
   *     summary: Answer the current question (recorded once per question)
   *     tags:
   *       - Practice
   *     responses:
   *       200:
   *         description: Whether the answer was right, with the correct answer and explanation
   */
  router.post("/:sessionId/answer", async (req, res, next) => {
    try {
      const { choice } = ChoiceSchema.parse(req.body);
      const session = sessions.get(req.params.sessionId);
      const result = await session.answer(choice);
      res.json({ data: { result, state: session.state() } });
    } catch (err) {
      next(err);
    }
  });

  router.post("/:sessionId/next", (req, res, next) => {
    try {
      const session = sessions.get(req.params.sessionId);
      res.json({ data: { sessionId: req.params.sessionId, ...session.next() } });
    } catch (err) {
      next(err);
    }
  });

  router.post("/:sessionId/restart", async (req, res, next) => {
    try {
      const session = sessions.get(req.params.sessionId);
      res.json({ data: { sessionId: req.params.sessionId, ...(await session.restart()) } });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/:sessionId", (req, res) => {
    sessions.delete(req.params.sessionId);
    res.status(204).end();
  });

  return router;
}
