// Load environment variables FIRST (app.config runs dotenv on import)
import { appConfig } from '@/config/app.config';
import { createApp } from '@/app';
import { getPlannerDeps, closePlannerDeps } from '@/services/pipeline-deps';
import { setupProcessHandlers } from '@/stability/errorHandlers';
import { logger } from '@/services/logger';

const deps = getPlannerDeps();
const app = createApp(deps, appConfig);

const server = app.listen(appConfig.port, '0.0.0.0', () => {
  logger.info(`Server running on http://localhost:${appConfig.port}`);
  logger.info(`Environment: ${appConfig.nodeEnv}`);
  if (!appConfig.openaiApiKey) {
    logger.warn('OPENAI_API_KEY not set; itineraries will use the fallback summary');
  }
});

setupProcessHandlers(server, closePlannerDeps);
