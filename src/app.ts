/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { crawlOrchestrator } from './lib/orchestration';

// Import routers
import digestRouter from './modules/scraper/scraper.router';

export const createApp = (): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type'],
    })
  );

  // strict: false lets a double-serialized body (a JSON string) through to the controller
  app.use(express.json({ limit: '1mb', strict: false }));

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Site digest API is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
      engines: crawlOrchestrator.getEngineNames(),
      crawls: crawlOrchestrator.getStatistics(),
    });
  });

  app.use('/api/digest', digestRouter);

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
