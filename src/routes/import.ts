// src/routes/import.ts
import { Router } from "express";
import { z } from "zod";
import type { QuizStore } from "../store/quizStore";
import { csvUpload } from "../middleware/csvUpload";
import { CSV_TEMPLATE, importCsv } from "../services/csvImport.service";
import { ValidationError } from "../utils/errors";

const PastedCsvSchema = z.object({
  csv: z.string().optional(),
});

export function importRouter(store: QuizStore) {
  const router = Router();

  /**
   * @openapi
   * /import/template:
   *   get:
   *     summary: Describe the supported CSV format
   *     tags:
   *       - Import
   *     responses:
   *       200:
   *         description: Plain-text template
   */
  router.get("/template", (_req, res) => {
    res.type("text/plain").send(CSV_TEMPLATE);
  });

  /**
   * @openapi
   * /import:
   *   post:
   *     summary: Import questions from a CSV upload (field "file") or pasted text (JSON field "csv")
   *     tags:
   *       - Import
   *     responses:
   *       200:
   *         description: Import report (imported count, row errors, questions per questionario)
   *       400:
   *         description: Empty input or missing required columns
   */
  router.post("/", csvUpload.single("file"), async (req, res, next) => {
    try {
      let input: Buffer | string | undefined = req.file?.buffer;
      if (!input) {
        const { csv } = PastedCsvSchema.parse(req.body ?? {});
        if (csv?.trim()) input = csv;
      }
      if (!input) throw new ValidationError("Upload a file or send the CSV text in the csv field");

      const report = await importCsv(store, input);
      res.json({ data: report });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
