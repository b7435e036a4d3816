import dotenv from 'dotenv';

dotenv.config();

export type StoreDriver = 'postgres' | 'memory';
export type HistoryRetention = 'retain' | 'discard';

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

/**
 * Problems found while reading the environment. The logger depends on this
 * config, so startup logs them once the logger exists.
 */
export const configIssues: string[] = [];

export const parseStoreDriver = (value: string | undefined, issues: string[]): StoreDriver => {
  const driver = (value || 'postgres').toLowerCase();
  if (driver === 'postgres' || driver === 'memory') {
    return driver;
  }
  issues.push(`Invalid STORE_DRIVER: ${driver}, defaulting to 'postgres'`);
  return 'postgres';
};

export const parseHistoryRetention = (value: string | undefined, issues: string[]): HistoryRetention => {
  const retention = (value || 'retain').toLowerCase();
  if (retention === 'retain' || retention === 'discard') {
    return retention;
  }
  issues.push(`Invalid HISTORY_RETENTION: ${retention}, defaulting to 'retain'`);
  return 'retain';
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000'),
  nodeEnv: process.env.NODE_ENV || 'development',
  corsOrigins: parseCorsOrigins(),
  storeDriver: parseStoreDriver(process.env.STORE_DRIVER, configIssues),
  historyRetention: parseHistoryRetention(process.env.HISTORY_RETENTION, configIssues),
  logLevel: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  logDir: process.env.LOG_DIR || './logs',
};
