import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { AppConfig } from './config';
import { errorHandler } from './middleware/error-handler';
import { slicingRouter } from './routes/slicing.routes';
import { ExportService } from './services/export.service';
import { SessionService } from './services/session.service';

export interface AppServices {
  sessions: SessionService;
  exportService: ExportService;
}

/**
 * Express app without a listening socket, shared by the server and the tests
 */
export function createApp(config: Pick<AppConfig, 'exportDir' | 'defaultAtlasPadding'>, services: AppServices): Express {
  const app = express();

  app.locals.sessions = services.sessions;
  app.locals.exportService = services.exportService;
  app.locals.exportDir = config.exportDir;
  app.locals.defaultAtlasPadding = config.defaultAtlasPadding;

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api/slicing', slicingRouter);

  // Health check
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Nine-slice API is running', sessions: services.sessions.size });
  });

  app.use(errorHandler);

  return app;
}
