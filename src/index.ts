/**
 * Capture Date Fixer entry point
 * Local HTTP API over the analysis and update services
 */

import { Server } from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { app } from './app';

let server: Server | undefined;

function start(): void {
  server = app.listen(config.port, () => {
    logger.info('Server started', {
      port: config.port,
      nodeEnv: config.nodeEnv,
      createBackups: config.createBackups,
    });

    console.log(`\nCapture date service running on http://localhost:${config.port}`);
    console.log('\nAPI Endpoints:');
    console.log(`   GET  http://localhost:${config.port}/api/health`);
    console.log(`   POST http://localhost:${config.port}/api/analysis`);
    console.log(`   POST http://localhost:${config.port}/api/analysis/preview`);
    console.log(`   POST http://localhost:${config.port}/api/updates`);
    console.log(`   POST http://localhost:${config.port}/api/backups/restore`);
    console.log(`   POST http://localhost:${config.port}/api/backups/restore-file`);
    console.log(`   POST http://localhost:${config.port}/api/backups/cleanup\n`);
  });
}

// Graceful shutdown: let in-flight file writes finish before exiting
function shutdown(signal: string): void {
  logger.info(`${signal} received, closing gracefully`);
  if (!server) process.exit(0);
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

start();
