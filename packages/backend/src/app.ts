import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config.js';
import { ReportStore } from './store.js';
import { createUploadRouter } from './routes/upload.js';
import { createReportsRouter } from './routes/reports.js';

export function createApp(config: AppConfig, store: ReportStore = new ReportStore(config.reportTtlMs)) {
  const app = express();

  // Middleware
  app.use(cors());

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/api/upload', createUploadRouter(config, store));
  app.use('/api/reports', createReportsRouter(config, store));

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('[Server Error]', err.message);
    res.status(500).json({ error: err.message });
  });

  return app;
}
