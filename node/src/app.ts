// src/app.ts: Express app factory; listen and shutdown live in index.ts
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from '@/config/app.config';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler } from '@/middleware/errorHandler';
import { notFoundHandler } from '@/middleware/notFoundHandler';
import { createItineraryRouter, type ItineraryRouteDeps } from '@/routes/itinerary';
import { requestTimeout } from '@/stability/errorHandlers';

export type AppSettings = Pick<AppConfig, 'nodeEnv' | 'corsOrigins' | 'redisUrl' | 'openaiApiKey'>;

export function createApp(deps: ItineraryRouteDeps, settings: AppSettings): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: settings.corsOrigins, credentials: true }));

  // Keep protection in production only
  if (settings.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(requestTimeout(60000));
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());
  if (settings.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (settings.nodeEnv === 'production') {
    app.use(morgan('combined'));
  }
  app.use(attachCorrelationId);

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: settings.nodeEnv,
      backends: {
        vector: deps.vector.name,
        redisConfigured: Boolean(settings.redisUrl),
        narrativeConfigured: Boolean(settings.openaiApiKey),
      },
    });
  });

  app.use('/api/itinerary', createItineraryRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
