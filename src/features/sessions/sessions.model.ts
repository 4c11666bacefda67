import { Schema, model, Document } from 'mongoose';
import type { ChatRole } from '@/features/llm/llm.types';

export interface SessionMessage {
  role: ChatRole;
  content: string;
  at: Date;
}

export interface SessionDocument extends Document {
  userId: string;
  agentId: string;
  history: SessionMessage[];
  createdAt: Date;
  updatedAt: Date;
}

const sessionSchema = new Schema<SessionDocument>(
  {
    userId: { type: String, required: true },
    agentId: { type: String, required: true },
    history: {
      type: [
        {
          role: { type: String, enum: ['system', 'user', 'assistant'], required: true },
          content: { type: String, required: true },
          at: { type: Date, default: Date.now },
        },
      ],
      default: [],
    },
  },
  { timestamps: true },
);

sessionSchema.index({ userId: 1, agentId: 1 }, { unique: true });

export const SessionModel = model<SessionDocument>('Session', sessionSchema);
