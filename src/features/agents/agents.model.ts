import { Schema, model, Document } from 'mongoose';

export interface AgentDocument extends Document {
  agentId: string;
  agentName: string;
  owner: string;
  version: string;
  definition: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

const agentSchema = new Schema<AgentDocument>(
  {
    agentId: { type: String, required: true, unique: true, index: true },
    agentName: { type: String, required: true },
    owner: { type: String, required: true, index: true },
    version: { type: String, default: '1.0' },
    definition: { type: Schema.Types.Mixed, required: true },
  },
  { timestamps: true, minimize: false },
);

export const AgentModel = model<AgentDocument>('Agent', agentSchema);
