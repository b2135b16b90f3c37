import mongoose from "mongoose";
import { afterEach, describe, expect, it, vi } from "vitest";
import Questao from "../src/models/Questao";
import Questionario from "../src/models/Questionario";
import Resposta from "../src/models/Resposta";
import { MongoQuizStore } from "../src/store/mongoQuizStore";
import { ConflictError } from "../src/utils/errors";

const store = new MongoQuizStore();

afterEach(() => {
  vi.restoreAllMocks();
});

describe("MongoQuizStore", () => {
  it("turns a duplicate-key error into a conflict", async () => {
    vi.spyOn(Questionario, "create").mockRejectedValue(
      new mongoose.mongo.MongoServerError({ message: "E11000 duplicate key error", code: 11000 })
    );

    const insert = store.insertQuestionario("Geo", "");
    await expect(insert).rejects.toBeInstanceOf(ConflictError);
    await expect(insert).rejects.toThrow('Questionario "Geo" already exists');
  });

  it("passes other write errors through", async () => {
    vi.spyOn(Questionario, "create").mockRejectedValue(new Error("network down"));

    await expect(store.insertQuestionario("Geo", "")).rejects.toThrow("network down");
  });

  it("resolves malformed ids without querying", async () => {
    const findById = vi.spyOn(Questionario, "findById");
    const deleteMany = vi.spyOn(Resposta, "deleteMany");
    const count = vi.spyOn(Questao, "countDocuments");
    const aggregate = vi.spyOn(Resposta, "aggregate");

    expect(await store.findQuestionarioById("not-an-id")).toBeNull();
    expect(await store.deleteQuestionario("nope")).toBe(false);
    expect(await store.listQuestoes("x")).toEqual([]);
    expect(await store.countQuestoes(["x", "y"])).toBe(0);
    expect(await store.tallyRespostas("x")).toEqual({ total: 0, correct: 0 });

    expect(findById).not.toHaveBeenCalled();
    expect(deleteMany).not.toHaveBeenCalled();
    expect(count).not.toHaveBeenCalled();
    expect(aggregate).not.toHaveBeenCalled();
  });

  it("deletes respostas and questoes before the questionario", async () => {
    const oid = new mongoose.Types.ObjectId();
    const respostas = vi.spyOn(Resposta, "deleteMany").mockResolvedValue({ acknowledged: true, deletedCount: 4 });
    const questoes = vi.spyOn(Questao, "deleteMany").mockResolvedValue({ acknowledged: true, deletedCount: 2 });
    const questionario = vi
      .spyOn(Questionario, "deleteOne")
      .mockResolvedValue({ acknowledged: true, deletedCount: 1 });

    expect(await store.deleteQuestionario(oid.toString())).toBe(true);

    expect(respostas).toHaveBeenCalledWith({ questionario_id: oid });
    expect(questoes).toHaveBeenCalledWith({ questionario_id: oid });
    expect(questionario).toHaveBeenCalledWith({ _id: oid });
    expect(respostas.mock.invocationCallOrder[0]).toBeLessThan(questoes.mock.invocationCallOrder[0]);
    expect(questoes.mock.invocationCallOrder[0]).toBeLessThan(questionario.mock.invocationCallOrder[0]);
  });

  it("reports a missing questionario as not deleted", async () => {
    vi.spyOn(Resposta, "deleteMany").mockResolvedValue({ acknowledged: true, deletedCount: 0 });
    vi.spyOn(Questao, "deleteMany").mockResolvedValue({ acknowledged: true, deletedCount: 0 });
    vi.spyOn(Questionario, "deleteOne").mockResolvedValue({ acknowledged: true, deletedCount: 0 });

    expect(await store.deleteQuestionario(new mongoose.Types.ObjectId().toString())).toBe(false);
  });

  it("tallies one questionario's respostas", async () => {
    const oid = new mongoose.Types.ObjectId();
    const aggregate = vi.spyOn(Resposta, "aggregate").mockResolvedValue([{ total: 3, correct: 2 }]);

    expect(await store.tallyRespostas(oid.toString())).toEqual({ total: 3, correct: 2 });
    expect(aggregate.mock.calls[0][0]?.[0]).toEqual({ $match: { questionario_id: oid } });
  });

  it("tallies zero when nothing was answered", async () => {
    vi.spyOn(Resposta, "aggregate").mockResolvedValue([]);

    expect(await store.tallyRespostas(new mongoose.Types.ObjectId().toString())).toEqual({ total: 0, correct: 0 });
  });

  it("groups tallies by questionario id", async () => {
    const geo = new mongoose.Types.ObjectId();
    const mat = new mongoose.Types.ObjectId();
    vi.spyOn(Resposta, "aggregate").mockResolvedValue([
      { _id: geo, total: 2, correct: 1 },
      { _id: mat, total: 5, correct: 5 },
    ]);

    const tallies = await store.tallyAllRespostas();

    expect([...tallies.entries()]).toEqual([
      [geo.toString(), { total: 2, correct: 1 }],
      [mat.toString(), { total: 5, correct: 5 }],
    ]);
  });

  it("maps sampled documents to records", async () => {
    const qid = new mongoose.Types.ObjectId();
    const id = new mongoose.Types.ObjectId();
    const createdAt = new Date("2026-01-01T00:00:00.000Z");
    vi.spyOn(Questao, "aggregate").mockResolvedValue([
      {
        _id: id,
        questionario_id: qid,
        tipo: "MC",
        texto: "Capital of Peru?",
        explicacao: "",
        alternativas: ["Quito", "Lima"],
        correta_text: "B",
        tags: ["geo"],
        created_at: createdAt,
      },
    ]);

    expect(await store.sampleQuestoes([qid.toString()], 1)).toEqual([
      {
        id: id.toString(),
        questionarioId: qid.toString(),
        tipo: "MC",
        texto: "Capital of Peru?",
        explicacao: "",
        alternativas: ["Quito", "Lima"],
        corretaText: "B",
        tags: ["geo"],
        createdAt,
      },
    ]);
  });
});
