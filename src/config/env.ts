import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().default(4000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MONGO_URI: z.string().min(1),
  JWT_SECRET: z.string().min(1),
  JWT_EXPIRES_IN: z.string().default('1d'),
  REFRESH_TOKEN_SECRET: z.string().min(1),
  REFRESH_TOKEN_EXPIRES_IN: z.string().default('7d'),
  ENCRYPTION_KEY: z.string().min(16),

  QUEUE_REDIS_URL: z.string().url().optional(),
  RUN_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(5),
  CORS_ORIGINS: z.string().optional(),

  OPENAI_API_KEY: z.string().optional(),
  DEEPSEEK_API_KEY: z.string().optional(),
  DEEPSEEK_BASE_URL: z.string().url().default('https://api.deepseek.com/v1'),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),

  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_API_URL: z.string().url().default('https://api.telegram.org'),

  WORKFLOW_MAX_STEPS: z.coerce.number().int().positive().default(100),
  WORKFLOW_FAILURE_MESSAGE: z
    .string()
    .default('Sorry, something went wrong while processing your request. Please try again later.'),
  CHAT_HISTORY_LIMIT: z.coerce.number().int().positive().default(20),
});

export const envConfig = envSchema.parse(process.env);

export type EnvConfig = typeof envConfig;
