import { describe, expect, it } from "vitest";
import { computeDesempenho, getDesempenho, percentage } from "../src/services/metrics.service";
import { NotFoundError } from "../src/utils/errors";
import { MemoryQuizStore } from "./fakes/memoryQuizStore";

describe("percentage", () => {
  it("rounds to one decimal", () => {
    expect(percentage(2, 3)).toBe(66.7);
    expect(percentage(1, 8)).toBe(12.5);
  });

  it("is zero without answers", () => {
    expect(percentage(0, 0)).toBe(0);
  });
});

describe("getDesempenho", () => {
  it("tallies recorded answers", async () => {
    const store = new MemoryQuizStore();
    const geo = await store.insertQuestionario("Geo", "");
    for (const correto of [true, true, false]) {
      await store.insertResposta({ questionarioId: geo.id, questaoId: "q", correto });
    }

    expect(await getDesempenho(store, geo.id)).toEqual({ total: 3, correct: 2, percentage: 66.7 });
    expect(computeDesempenho({ total: 4, correct: 4 })).toEqual({ total: 4, correct: 4, percentage: 100 });
  });

  it("rejects unknown questionarios", async () => {
    await expect(getDesempenho(new MemoryQuizStore(), "missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});
