/**
 * Main server entry point
 */

import { createApp } from './app';
import { config, corsOrigins } from './config';
import { logger } from './utils/logger';

const app = createApp();

app.listen(config.PORT, () => {
  logger.info(`Server started on port ${config.PORT}`, {
    port: config.PORT,
    nodeEnv: config.NODE_ENV,
    corsOrigins: corsOrigins(),
    defaultMaxCandidates: config.DEFAULT_MAX_CANDIDATES,
    maxCandidatesLimit: config.MAX_CANDIDATES_LIMIT,
  });
});

export default app;
