import { Server } from 'node:http';
import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { config } from './core/config';
import { logger } from './core/logger';
import { AppError, NotFoundError, ValidationError, errorMessage } from './core/errors';
import { describeWorkflow } from './graph/graph';
import { toErrorPayload } from './graph/graph-stream';
import { QueryOrchestrator } from './graph/orchestrator';
import { AnalyticsService } from './services/analytics.service';
import { createDefaultCapabilities } from './services/capabilities';
import { SessionHandle, SessionStore } from './services/session.service';
import { isValidSessionId, maskSensitiveData, validateInput } from './utils/security';

export interface AppDependencies {
  orchestrator: QueryOrchestrator;
  sessions: SessionStore;
  analytics: AnalyticsService;
}

const queryBodySchema = z.object({
  query: z.unknown(),
  sessionId: z.unknown().optional(),
});

function readQueryBody(body: unknown, sessions: SessionStore): { question: string; session: SessionHandle } {
  const parsed = queryBodySchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const question = validateInput(parsed.data.query);
  const { sessionId } = parsed.data;

  if (sessionId === undefined) {
    return { question, session: sessions.getOrCreate(SessionStore.newSessionId()) };
  }
  if (!isValidSessionId(sessionId)) {
    throw new ValidationError('Invalid sessionId format');
  }
  return { question, session: sessions.getOrCreate(sessionId) };
}

/** Rejections raised by `express.json` carry the client status and a `type`. */
function toAppError(error: Error): AppError | null {
  if (error instanceof AppError) return error;
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    const malformed = 'type' in error && error.type === 'entity.parse.failed';
    return new ValidationError(malformed ? 'Request body is not valid JSON' : error.message);
  }
  return null;
}

function requireSessionId(value: string): string {
  if (!isValidSessionId(value)) {
    throw new ValidationError('Invalid sessionId format');
  }
  return value;
}

export function createApp({ orchestrator, sessions, analytics }: AppDependencies): Express {
  const app = express();
  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    logger.http('Request', { method: req.method, path: req.path, ip: req.ip });
    next();
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      sessions: sessions.getStats().validEntries,
    });
  });

  app.post('/query', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { question, session } = readQueryBody(req.body, sessions);

      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort();
      });

      const result = await orchestrator.runQuery(session.conversation, question, {
        signal: controller.signal,
      });

      res.json({
        success: true,
        data: result,
        metadata: {
          sessionId: session.sessionId,
          timestamp: new Date().toISOString(),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/query/stream', async (req: Request, res: Response, next: NextFunction) => {
    let question: string;
    let session: SessionHandle;
    try {
      ({ question, session } = readQueryBody(req.body, sessions));
    } catch (error) {
      next(error);
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    // Client went away: stop the run
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const sendEvent = (payload: object) => {
      if (!res.writableEnded && !res.destroyed) {
        res.write(`data: ${JSON.stringify(payload)}\n\n`);
      }
    };

    sendEvent({ type: 'start', sessionId: session.sessionId });

    try {
      for await (const event of orchestrator.streamQuery(session.conversation, question, {
        signal: controller.signal,
      })) {
        sendEvent(event);
      }
    } catch (error) {
      logger.error('Stream delivery failed', { error: errorMessage(error) });
      sendEvent({ type: 'error', error: toErrorPayload(error) });
    }
    res.end();
  });

  app.get('/sessions/:sessionId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = requireSessionId(req.params.sessionId);
      const handle = sessions.get(sessionId);
      if (!handle) {
        throw new NotFoundError(`Session ${sessionId} not found`);
      }
      res.json({
        success: true,
        data: {
          sessionId,
          createdAt: new Date(handle.createdAt).toISOString(),
          turns: handle.conversation.snapshot(),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.delete('/sessions/:sessionId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = requireSessionId(req.params.sessionId);
      if (!sessions.delete(sessionId)) {
        throw new NotFoundError(`Session ${sessionId} not found`);
      }
      res.json({ success: true, message: 'Session cleared' });
    } catch (error) {
      next(error);
    }
  });

  app.get('/analytics', (req: Request, res: Response) => {
    res.json({ success: true, data: analytics.snapshot() });
  });

  app.get('/graph', (req: Request, res: Response) => {
    res.type('text/plain').send(describeWorkflow());
  });

  app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
    const appError = toAppError(error);
    const status = appError ? appError.statusCode : 500;
    logger.log(status >= 500 ? 'error' : 'warn', 'Request failed', {
      path: req.path,
      error: maskSensitiveData(error.message),
      stack: status >= 500 ? error.stack : undefined,
    });

    if (appError) {
      res.status(appError.statusCode).json({
        success: false,
        message: appError.message,
        error: {
          message: appError.message,
          code: appError.code,
          details: appError.details,
        },
      });
    } else {
      res.status(500).json({
        success: false,
        message: 'Internal server error',
        error: {
          message: 'Internal server error',
          code: 'INTERNAL_ERROR',
        },
      });
    }
  });

  return app;
}

export function startServer(): Server {
  const analytics = new AnalyticsService();
  const orchestrator = new QueryOrchestrator(createDefaultCapabilities(), {
    metricsSinks: [analytics.record],
  });
  const sessions = new SessionStore();

  const app = createApp({ orchestrator, sessions, analytics });
  return app.listen(config.server.port, () => {
    logger.info('Document QA server started', {
      port: config.server.port,
      env: config.server.env,
      nodeVersion: process.version,
      settings: orchestrator.getSettings(),
    });
  });
}

export { QueryOrchestrator } from './graph/orchestrator';
export { Conversation } from './graph/conversation';
export * from './types';
export * from './types/graph';

if (require.main === module) {
  try {
    startServer();
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}
