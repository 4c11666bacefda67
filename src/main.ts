import 'tsconfig-paths/register';
import http from 'http';
import app from '@/app';
import { envConfig } from '@/config/env';
import { connectMongo, disconnectMongo } from '@/config/mongo';
import { closeRedis } from '@/config/redis';
import { logger } from '@/utils/logger';
import { initializeAgentSchedules } from '@/features/jobs/schedule-runner';
import type { Worker } from 'bullmq';
import { startRunWorker, type ScheduledRunJob } from '@/queues/run-queue';

const server = http.createServer(app);
let worker: Worker<ScheduledRunJob> | null = null;

const start = async (): Promise<void> => {
  try {
    await connectMongo();
    await initializeAgentSchedules();
    worker = startRunWorker();
    server.listen(envConfig.PORT, () => {
      logger.info(`Server running on port ${envConfig.PORT}`);
    });
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void start();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});

const shutdown = async (): Promise<void> => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await worker?.close();
  await closeRedis();
  await disconnectMongo();
};

process.on('SIGINT', () => {
  logger.info('Shutting down...');
  shutdown()
    .catch((error: unknown) => logger.error({ err: error }, 'Unclean shutdown'))
    .finally(() => process.exit(0));
});
