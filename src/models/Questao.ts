// src/models/Questao.ts
import mongoose from "../config/mongo";
import type { Types } from "mongoose";

const { Schema, model } = mongoose;

export type QuestaoTipo = "VF" | "MC";

export interface IQuestao {
  questionario_id: Types.ObjectId;
  tipo: QuestaoTipo;
  texto: string;
  explicacao: string;
  alternativas: string[]; // A..E, empty for VF
  correta_text: string; // "V"/"F" or "A".."E"
  tags: string[];
  created_at: Date;
}

const QuestaoSchema = new Schema<IQuestao>(
  {
    questionario_id: { type: Schema.Types.ObjectId, ref: "Questionario", required: true },
    tipo: { type: String, enum: ["VF", "MC"], required: true },
    texto: { type: String, required: true },
    explicacao: { type: String, default: "" },
    alternativas: {
      type: [String],
      default: [],
      validate: {
        validator: (v: string[]) => v.length <= 5,
        message: "At most 5 alternatives are allowed",
      },
    },
    correta_text: { type: String, required: true },
    tags: { type: [String], default: [] },
    created_at: { type: Date, default: () => new Date() },
  },
  { versionKey: false }
);

QuestaoSchema.index({ questionario_id: 1 }, { name: "ix_qid" });
QuestaoSchema.index({ tags: 1 }, { name: "ix_tags" });

export default model<IQuestao>("Questao", QuestaoSchema, "questoes");
