import dotenv from 'dotenv';

import { createCivicEye, createHttpApp } from './app';
import { loadConfig } from './config';
import { describeError } from './utils/errors';
import { createLogger } from './utils/logger';

dotenv.config();

const logger = createLogger('Server');

async function start() {
  const config = loadConfig();
  const civicEye = await createCivicEye(config);

  if (config.embedding.preload) {
    // Loading takes a while; searches without a photo do not wait for it.
    void civicEye.modelLoader.load();
  }

  const app = createHttpApp(civicEye);
  app.listen(config.port, () => {
    logger.info(`CivicEye listening on port ${config.port}`);
  });
}

start().catch((error) => {
  logger.error('Failed to start server', { error: describeError(error) });
  process.exit(1);
});
