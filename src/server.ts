import mongoose from 'mongoose';
import { z } from 'zod';
import { createApp } from './app';
import { initializeScheduler } from './jobs/scheduler';
import { client } from './lib/auth';
import { createDependencies } from './lib/dependencies';
import { logger } from './utils/logger';

const serverEnv = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  })
  .parse(process.env);

async function start(): Promise<void> {
  await mongoose.connect(serverEnv.MONGODB_URI);
  await client.connect();
  logger.info('Connected to MongoDB');

  const authDb = client.db();
  const deps = createDependencies((name) => authDb.collection(name));
  const scheduler = {
    controller: deps.deletionController,
    store: deps.store,
    config: deps.config,
  };

  const app = createApp({ accountController: deps.accountController, scheduler });

  if (process.env.NODE_ENV !== 'test') {
    initializeScheduler(scheduler);
  }

  app.listen(serverEnv.PORT, () => {
    logger.info(`MarketPulse backend listening on port ${serverEnv.PORT}`);
  });
}

start().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
