import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { sendError } from './controllers/errorResponse.js';
import { createAdminRouter } from './routes/admin.js';
import { createEntitiesRouter } from './routes/entities.js';
import { createEntriesRouter } from './routes/entries.js';
import { createSyncRouter } from './routes/sync.js';
import type { ArchiveServices } from './services/archiveServices.js';

export interface AppOptions {
  /** morgan format; null disables request logging */
  requestLog?: string | null;
}

export function createApp(services: ArchiveServices, options: AppOptions = {}): Express {
  const app: Express = express();
  const requestLog = options.requestLog === undefined ? 'dev' : options.requestLog;

  // Middleware
  app.use(helmet());
  app.use(cors());
  if (requestLog) {
    app.use(morgan(requestLog));
  }
  app.use(express.json({ limit: '5mb' }));

  // Health check route
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', store: services.store.backend, timestamp: new Date().toISOString() });
  });

  app.use('/api/entries', createEntriesRouter(services));
  app.use('/api/entities', createEntitiesRouter(services));
  app.use('/api/sync', createSyncRouter(services));
  app.use('/admin', createAdminRouter(services));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'NOT_FOUND', message: 'Route not found' });
  });

  // Error handling middleware (malformed JSON bodies and anything a route rethrows)
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if ('type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'INVALID_JSON', message: err.message });
      return;
    }
    sendError(res, err);
  });

  return app;
}
