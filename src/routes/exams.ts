// src/routes/exams.ts
import { Router } from "express";
import { z } from "zod";
import type { QuizStore } from "../store/quizStore";
import { availableQuestions, DEFAULT_EXAM_SIZE, ExamSession } from "../services/exam.service";
import type { SessionRegistry } from "../services/sessionRegistry";
import { ChoiceSchema, queryList } from "./dto";

const StartExamSchema = z.object({
  questionarioIds: z.array(z.string().min(1)).min(1),
  count: z.number().int().min(1).default(DEFAULT_EXAM_SIZE),
});

export function examsRouter(store: QuizStore, sessions: SessionRegistry<ExamSession>) {
  const router = Router();

  /**
   * @openapi
   * /exams/available:
   *   get:
   *     summary: Count the questions an exam over these questionarios could draw from
   *     tags:
   *       - Exams
   *     parameters:
   *       - in: query
   *         name: questionarioIds
   *         schema:
   *           type: string
   *         description: CSV of questionario ids.
   *     responses:
   *       200:
   *         description: Available question count
   */
  router.get("/available", async (req, res, next) => {
    try {
      const ids = queryList(req.query.questionarioIds);
      res.json({ data: { available: await availableQuestions(store, ids) } });
    } catch (err) {
      next(err);
    }
  });

  /**
   * @openapi
   * /exams:
   *   post:
   *     summary: Start an exam with questions sampled at random (answers are not recorded)
   *     tags:
   *       - Exams
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [questionarioIds]
   *             properties:
   *               questionarioIds:
   *                 type: array
   *                 items:
   *                   type: string
   *               count:
   *                 type: integer
   *                 minimum: 1
   *     responses:
   *       201:
   *         description: Exam id and first question
   */
  router.post("/", async (req, res, next) => {
    try {
      const body = StartExamSchema.parse(req.body);
      const exam = await ExamSession.start(store, body.questionarioIds, body.count);
      const examId = sessions.create(exam);
      res.status(201).json({ data: { examId, ...exam.state() } });
    } catch (err) {
      next(err);
    }
  });

  router.get("/:examId", (req, res, next) => {
    try {
      const exam = sessions.get(req.params.examId);
      res.json({ data: { examId: req.params.examId, ...exam.state() } });
    } catch (err) {
      next(err);
    }
  });

  router.post("/:examId/answer", (req, res, next) => {
    try {
      const { choice } = ChoiceSchema.parse(req.body);
      const exam = sessions.get(req.params.examId);
      const result = exam.answer(choice);
      res.json({ data: { result, state: exam.state() } });
    } catch (err) {
      next(err);
    }
  });

  router.post("/:examId/next", (req, res, next) => {
    try {
      const exam = sessions.get(req.params.examId);
      res.json({ data: { examId: req.params.examId, ...exam.next() } });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/:examId", (req, res) => {
    sessions.delete(req.params.examId);
    res.status(204).end();
  });

  return router;
}
