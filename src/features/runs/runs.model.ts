import { Schema, model, Document } from 'mongoose';
import type { RunSource } from './runs.types';

export interface RunDocument extends Document {
  runId: string;
  agentId: string;
  workflowId: string;
  owner: string;
  userId?: string;
  source: RunSource;
  status: 'completed' | 'halted' | 'failed';
  steps: number;
  context: Record<string, unknown>;
  records: Array<Record<string, unknown>>;
  responses: string[];
  haltReason?: string;
  error?: Record<string, unknown>;
  startedAt: Date;
  endedAt: Date;
}

const runSchema = new Schema<RunDocument>(
  {
    runId: { type: String, required: true, unique: true },
    agentId: { type: String, required: true, index: true },
    workflowId: { type: String, required: true },
    owner: { type: String, required: true, index: true },
    userId: { type: String },
    source: { type: String, enum: ['chat', 'api', 'schedule'], required: true },
    status: { type: String, enum: ['completed', 'halted', 'failed'], required: true },
    steps: { type: Number, default: 0 },
    context: { type: Schema.Types.Mixed, default: {} },
    records: { type: [{ type: Schema.Types.Mixed }], default: [] },
    responses: { type: [String], default: [] },
    haltReason: { type: String },
    error: { type: Schema.Types.Mixed },
    startedAt: { type: Date, required: true },
    endedAt: { type: Date, required: true },
  },
  { timestamps: true, minimize: false },
);

export const RunModel = model<RunDocument>('Run', runSchema);
