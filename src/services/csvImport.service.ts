// src/services/csvImport.service.ts
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { QuizStore } from "../store/quizStore";
import { handleError, ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";
import { buildQuestao, type QuestaoInput } from "./questaoBuilder";
import { ensureQuestionario } from "./questionario.service";

export const REQUIRED_COLUMNS = ["questionario", "texto", "correta"] as const;

const COLUMN_ALIASES: Record<string, string> = {
  gabarito: "correta",
};

export const CSV_TEMPLATE = `SUPPORTED CSV FORMAT (comma or semicolon delimited)

Header row required, columns in any order, names are case-insensitive:
- tipo          -> 'VF' or 'MC' (default VF)
- questionario  -> questionario name (created when missing)
- texto         -> question text
- correta       -> VF: 'V', 'F', 'True', 'False'; MC: 'A'..'E' or the exact text of the right alternative
                   ('gabarito' is accepted as an alias)
- explicacao    -> optional
- alternativas  -> MC only: alternatives A..E separated by ';' or '|'
- tags          -> optional, separated by ';' or ','

Examples:
tipo,questionario,texto,correta,explicacao,alternativas
VF,Direito Adm,"A licitação é regra e a contratação direta é exceção.",V,"Art. 37, XXI, CF/88",
MC,Matemática,"Qual é a derivada de x^2?",B,"d/dx x^2 = 2x","x;2x;x^2;1;0"
MC,TI,"Qual a porta padrão do HTTP?",80,"Padrão histórico","21|22|80|110|443"
`;

export type CsvRow = {
  /** 1-based; the header is line 1 */
  line: number;
  questionario: string;
  input: QuestaoInput;
};

export type ImportReport = {
  imported: number;
  errors: string[];
  /** questions added per questionario name */
  impact: Record<string, number>;
};

const CellsSchema = z.array(z.array(z.string()));

/** UTF-8, falling back to latin-1 for legacy spreadsheet exports. */
export function decodeCsv(input: Buffer | string): string {
  if (typeof input === "string") return input;
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(input);
  } catch {
    return input.toString("latin1");
  }
}

export function detectDelimiter(text: string): ";" | "," {
  const header = text.split(/\r?\n/, 1)[0] ?? "";
  const semicolons = header.split(";").length - 1;
  const commas = header.split(",").length - 1;
  return semicolons > commas ? ";" : ",";
}

function normalizeHeader(name: string): string {
  const key = name.trim().toLowerCase();
  return COLUMN_ALIASES[key] ?? key;
}

/**
 * Split CSV text into question rows.
 *
 * @throws ValidationError when the text is empty or a required column is missing
 */
export function readCsvRows(text: string): CsvRow[] {
  if (!text.trim()) throw new ValidationError("CSV is empty.");

  const cells = CellsSchema.parse(
    parse(text, {
      delimiter: detectDelimiter(text),
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    })
  );

  const [headerCells, ...records] = cells;
  const header = (headerCells ?? []).map(normalizeHeader);
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length) {
    throw new ValidationError(
      `CSV is missing required columns: ${missing.join(", ")}. Header found: ${header.join(", ")}`
    );
  }

  return records.map((record, index) => {
    const cell = (column: string): string => {
      const at = header.indexOf(column);
      return at >= 0 ? record[at] ?? "" : "";
    };

    return {
      line: index + 2,
      questionario: cell("questionario").trim(),
      input: {
        tipo: cell("tipo"),
        texto: cell("texto"),
        correta: cell("correta").trim(),
        explicacao: cell("explicacao"),
        alternativas: cell("alternativas"),
        tags: cell("tags"),
      },
    };
  });
}

/**
 * Import questions from CSV text or an uploaded file. Bad rows are reported
 * as `Line N: reason` and skipped; the rest are stored.
 */
export async function importCsv(store: QuizStore, input: Buffer | string): Promise<ImportReport> {
  const rows = readCsvRows(decodeCsv(input));
  const report: ImportReport = { imported: 0, errors: [], impact: {} };
  const impact = new Map<string, number>();

  for (const row of rows) {
    try {
      const questao = buildQuestao(row.input);
      const questionario = await ensureQuestionario(store, row.questionario);
      await store.insertQuestao(questionario.id, questao);

      report.imported += 1;
      impact.set(questionario.nome, (impact.get(questionario.nome) ?? 0) + 1);
    } catch (err) {
      report.errors.push(`Line ${row.line}: ${handleError(err).message}`);
    }
  }

  report.impact = Object.fromEntries(impact);
  logger.info("CSV import finished", { imported: report.imported, errors: report.errors.length });
  return report;
}
