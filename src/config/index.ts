/**
 * Centralized Configuration
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface Config {
  // Server
  port: number;
  nodeEnv: string;
  logLevel: LogLevelSetting;

  // CORS
  allowedOrigins: string[];

  // Backups
  createBackups: boolean;
  backupSuffix: string;

  // Date plausibility window
  minPlausibleYear: number;
  maxFutureYears: number;
}

const LOG_LEVELS: LogLevelSetting[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevelSetting {
  const level = LOG_LEVELS.find((l) => l === value);
  return level ?? 'info';
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(value.toLowerCase());
}

function validateSuffix(value: string): string {
  if (!value.startsWith('.') || value.length < 2 || /[\\/]/.test(value)) {
    throw new Error(`Invalid BACKUP_SUFFIX: ${value}`);
  }
  return value;
}

export const config: Config = {
  // Server
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),

  // CORS
  allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:5173').split(',').map(s => s.trim()).filter(Boolean),

  // Backups
  createBackups: parseBoolean(process.env.CREATE_BACKUPS, true),
  backupSuffix: validateSuffix(process.env.BACKUP_SUFFIX || '.backup'),

  // Date plausibility window
  minPlausibleYear: parseInt(process.env.MIN_PLAUSIBLE_YEAR || '1900', 10),
  maxFutureYears: parseInt(process.env.MAX_FUTURE_YEARS || '1', 10),
};
