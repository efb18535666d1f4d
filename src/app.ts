/**
 * Express Application
 * Exported separately from index.ts so tests can import the app without starting the server.
 */

import express from 'express';
import cors from 'cors';
import { config } from './config';
import { logger } from './utils/logger';
import { errorHandler } from './middleware/errorHandler';
import { apiRoutes } from './routes';

export const app = express();

app.use(
  cors({
    origin: config.allowedOrigins.length > 0 ? config.allowedOrigins : true,
  })
);

app.use(express.json());

app.use((req, _res, next) => {
  logger.info('Request received', { method: req.method, path: req.path });
  next();
});

app.use('/api', apiRoutes);

app.get('/', (_req, res) => {
  res.json({
    name: 'capture-date-fixer',
    status: 'running',
    endpoints: {
      health: 'GET /api/health',
      analyze: 'POST /api/analysis',
      preview: 'POST /api/analysis/preview',
      update: 'POST /api/updates',
      restore: 'POST /api/backups/restore',
      restoreFile: 'POST /api/backups/restore-file',
      cleanup: 'POST /api/backups/cleanup',
    },
  });
});

app.use(errorHandler);
