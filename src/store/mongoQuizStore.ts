// src/store/mongoQuizStore.ts
import mongoose from "../config/mongo";
import type { Types } from "mongoose";
import Questionario, { type IQuestionario } from "../models/Questionario";
import Questao, { type IQuestao } from "../models/Questao";
import Resposta from "../models/Resposta";
import { ConflictError } from "../utils/errors";
import type {
  NewQuestao,
  NewResposta,
  QuestaoRecord,
  QuestionarioRecord,
  QuizStore,
  RespostaTally,
} from "./quizStore";

type WithId<T> = T & { _id: Types.ObjectId };

function toObjectId(id: string): Types.ObjectId | null {
  return mongoose.isValidObjectId(id) ? new mongoose.Types.ObjectId(id) : null;
}

function toObjectIds(ids: string[]): Types.ObjectId[] {
  return ids.map(toObjectId).filter((oid): oid is Types.ObjectId => oid !== null);
}

function isDuplicateKey(err: unknown): boolean {
  return err instanceof mongoose.mongo.MongoServerError && err.code === 11000;
}

function toQuestionarioRecord(doc: WithId<IQuestionario>): QuestionarioRecord {
  return {
    id: doc._id.toString(),
    nome: doc.nome,
    descricao: doc.descricao ?? "",
    createdAt: doc.created_at,
  };
}

function toQuestaoRecord(doc: WithId<IQuestao>): QuestaoRecord {
  return {
    id: doc._id.toString(),
    questionarioId: doc.questionario_id.toString(),
    tipo: doc.tipo,
    texto: doc.texto,
    explicacao: doc.explicacao ?? "",
    alternativas: [...(doc.alternativas ?? [])],
    corretaText: doc.correta_text,
    tags: [...(doc.tags ?? [])],
    createdAt: doc.created_at,
  };
}

export class MongoQuizStore implements QuizStore {
  async init(): Promise<void> {
    await Questionario.syncIndexes();
    await Questao.syncIndexes();
    await Resposta.syncIndexes();
  }

  async listQuestionarios(): Promise<QuestionarioRecord[]> {
    const docs = await Questionario.find({}).sort({ nome: 1 });
    return docs.map(toQuestionarioRecord);
  }

  async findQuestionarioById(id: string): Promise<QuestionarioRecord | null> {
    const oid = toObjectId(id);
    if (!oid) return null;
    const doc = await Questionario.findById(oid);
    return doc ? toQuestionarioRecord(doc) : null;
  }

  async findQuestionarioByName(nome: string): Promise<QuestionarioRecord | null> {
    const doc = await Questionario.findOne({ nome });
    return doc ? toQuestionarioRecord(doc) : null;
  }

  async insertQuestionario(nome: string, descricao: string): Promise<QuestionarioRecord> {
    try {
      const doc = await Questionario.create({ nome, descricao, created_at: new Date() });
      return toQuestionarioRecord(doc);
    } catch (err) {
      if (isDuplicateKey(err)) throw new ConflictError(`Questionario "${nome}" already exists`);
      throw err;
    }
  }

  async deleteQuestionario(id: string): Promise<boolean> {
    const oid = toObjectId(id);
    if (!oid) return false;

    await Resposta.deleteMany({ questionario_id: oid });
    await Questao.deleteMany({ questionario_id: oid });
    const res = await Questionario.deleteOne({ _id: oid });
    return res.deletedCount > 0;
  }

  async listQuestoes(questionarioId: string): Promise<QuestaoRecord[]> {
    const oid = toObjectId(questionarioId);
    if (!oid) return [];
    const docs = await Questao.find({ questionario_id: oid }).sort({ _id: 1 });
    return docs.map(toQuestaoRecord);
  }

  async findQuestao(id: string): Promise<QuestaoRecord | null> {
    const oid = toObjectId(id);
    if (!oid) return null;
    const doc = await Questao.findById(oid);
    return doc ? toQuestaoRecord(doc) : null;
  }

  async insertQuestao(questionarioId: string, questao: NewQuestao): Promise<QuestaoRecord> {
    const doc = await Questao.create({
      questionario_id: new mongoose.Types.ObjectId(questionarioId),
      tipo: questao.tipo,
      texto: questao.texto,
      explicacao: questao.explicacao,
      alternativas: questao.alternativas,
      correta_text: questao.corretaText,
      tags: questao.tags,
      created_at: new Date(),
    });
    return toQuestaoRecord(doc);
  }

  async updateExplicacao(questaoId: string, explicacao: string): Promise<QuestaoRecord | null> {
    const oid = toObjectId(questaoId);
    if (!oid) return null;
    const doc = await Questao.findByIdAndUpdate(oid, { $set: { explicacao } }, { new: true });
    return doc ? toQuestaoRecord(doc) : null;
  }

  async countQuestoes(questionarioIds: string[]): Promise<number> {
    const oids = toObjectIds(questionarioIds);
    if (!oids.length) return 0;
    return Questao.countDocuments({ questionario_id: { $in: oids } });
  }

  async sampleQuestoes(questionarioIds: string[], size: number): Promise<QuestaoRecord[]> {
    const oids = toObjectIds(questionarioIds);
    if (!oids.length || size < 1) return [];
    const docs = await Questao.aggregate<WithId<IQuestao>>([
      { $match: { questionario_id: { $in: oids } } },
      { $sample: { size } },
    ]);
    return docs.map(toQuestaoRecord);
  }

  async insertResposta(resposta: NewResposta): Promise<void> {
    await Resposta.create({
      questionario_id: new mongoose.Types.ObjectId(resposta.questionarioId),
      questao_id: new mongoose.Types.ObjectId(resposta.questaoId),
      correto: resposta.correto,
      respondido_em: new Date(),
    });
  }

  async tallyRespostas(questionarioId: string): Promise<RespostaTally> {
    const oid = toObjectId(questionarioId);
    if (!oid) return { total: 0, correct: 0 };

    const [row] = await Resposta.aggregate<RespostaTally>([
      { $match: { questionario_id: oid } },
      {
        $group: {
          _id: null,
          total: { $sum: 1 },
          correct: { $sum: { $cond: ["$correto", 1, 0] } },
        },
      },
      { $project: { _id: 0, total: 1, correct: 1 } },
    ]);
    return row ?? { total: 0, correct: 0 };
  }

  async tallyAllRespostas(): Promise<Map<string, RespostaTally>> {
    const rows = await Resposta.aggregate<RespostaTally & { _id: Types.ObjectId }>([
      {
        $group: {
          _id: "$questionario_id",
          total: { $sum: 1 },
          correct: { $sum: { $cond: ["$correto", 1, 0] } },
        },
      },
    ]);
    return new Map(rows.map((row) => [row._id.toString(), { total: row.total, correct: row.correct }]));
  }
}
