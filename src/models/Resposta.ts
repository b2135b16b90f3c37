// src/models/Resposta.ts
import mongoose from "../config/mongo";
import type { Types } from "mongoose";

const { Schema, model } = mongoose;

export interface IResposta {
  questionario_id: Types.ObjectId;
  questao_id: Types.ObjectId;
  correto: boolean;
  respondido_em: Date;
}

const RespostaSchema = new Schema<IResposta>(
  {
    questionario_id: { type: Schema.Types.ObjectId, ref: "Questionario", required: true },
    questao_id: { type: Schema.Types.ObjectId, ref: "Questao", required: true },
    correto: { type: Boolean, required: true },
    respondido_em: { type: Date, default: () => new Date() },
  },
  { versionKey: false }
);

RespostaSchema.index({ questionario_id: 1 }, { name: "ix_respostas_q" });
RespostaSchema.index({ questao_id: 1 }, { name: "ix_respostas_questao" });

export default model<IResposta>("Resposta", RespostaSchema, "respostas");
