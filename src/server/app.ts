/**
 * HTTP surface of the answer service
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { GraphExecutor } from '../core/executor';
import { getLogger } from '../utils/logger';
import { getMetrics } from '../utils/metrics';
import { answerQuery, type WorkflowServices } from '../workflow';
import { AppError, asyncHandler, errorHandler, notFoundHandler } from './errors';

export interface AppDependencies {
  services: WorkflowServices;
  executor: GraphExecutor;
}

const AgentRequestSchema = z.object({
  query: z.string(),
});

function cors(req: Request, res: Response, next: NextFunction): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  if (req.method === 'OPTIONS') {
    res.sendStatus(204);
    return;
  }
  next();
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  res.on('finish', () => {
    getLogger().request(req.method, req.path, res.statusCode, Date.now() - startTime);
  });
  next();
}

export function createApp({ services, executor }: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(cors);
  app.use(requestLogger);
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', message: 'Service is healthy' });
  });

  app.get('/metrics', (_req, res) => {
    res.json(getMetrics().generateSummary());
  });

  app.post(
    '/api/agent1',
    asyncHandler(async (req, res) => {
      const parsed = AgentRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new AppError('BAD_REQUEST', 'Request body must be an object with a string "query"', 400);
      }

      const query = parsed.data.query;
      if (query.trim().length === 0) {
        throw new AppError('VALIDATION_ERROR', 'Query cannot be empty or only whitespace', 400);
      }

      const outcome = await answerQuery(query, services, executor);
      if (outcome.status === 'failed') {
        getLogger().error('Workflow failed', { reason: outcome.reason });
        throw new AppError('INTERNAL_SERVER_ERROR', outcome.reason, 500);
      }

      res.json({ answer: outcome.answer });
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
