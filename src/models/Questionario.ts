// src/models/Questionario.ts
import mongoose from "../config/mongo";

const { Schema, model } = mongoose;

export interface IQuestionario {
  nome: string;
  descricao: string;
  created_at: Date;
}

const QuestionarioSchema = new Schema<IQuestionario>(
  {
    nome: { type: String, required: true, trim: true },
    descricao: { type: String, default: "" },
    created_at: { type: Date, default: () => new Date() },
  },
  { versionKey: false }
);

QuestionarioSchema.index({ nome: 1 }, { unique: true, name: "uq_nome" });

export default model<IQuestionario>("Questionario", QuestionarioSchema, "questionarios");
