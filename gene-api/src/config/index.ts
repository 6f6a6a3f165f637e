import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../utils/errors';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export const config = {
  server: {
    port: parseInt(process.env.PORT || '3000'),
    nodeEnv: process.env.NODE_ENV || 'development',
  },

  api: {
    title: 'Chromosome 21 Gene API',
    version: process.env.npm_package_version || '2.0.0',
  },

  database: {
    url: process.env.DATABASE_URL || 'sqlite:data/chromosome21.sqlite3',
  },

  dataset: {
    file: process.env.GENE_DATA_FILE || path.resolve(process.cwd(), 'data', 'mart_export.txt'),
  },

  rateLimit: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000'),
    max: parseInt(process.env.RATE_LIMIT_MAX || '300'),
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
};

export type AppConfig = typeof config;

const MEMORY = ':memory:';

/**
 * Turn a DATABASE_URL into a path better-sqlite3 can open.
 *
 * Accepts `sqlite:<path>`, `sqlite:///relative`, `sqlite:////absolute`,
 * `file:<path>`, a bare path, or `:memory:`.
 */
export function resolveSqlitePath(url: string): string {
  const trimmed = url.trim();
  if (trimmed === '' || trimmed === MEMORY) {
    return MEMORY;
  }

  const sqlite = /^sqlite:(?:\/\/\/?)?(.*)$/i.exec(trimmed);
  if (sqlite) {
    return sqlite[1] === '' ? MEMORY : sqlite[1];
  }

  const file = /^file:(?:\/\/)?(.+)$/i.exec(trimmed);
  if (file) {
    return file[1];
  }

  const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(trimmed);
  if (scheme) {
    throw new ConfigurationError(`Unsupported DATABASE_URL scheme: ${scheme[1]}`);
  }

  return trimmed;
}

export function validateConfig(cfg: AppConfig = config): void {
  const { port } = cfg.server;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid PORT: ${process.env.PORT}`);
  }

  if (!Number.isInteger(cfg.rateLimit.max) || cfg.rateLimit.max < 1) {
    throw new ConfigurationError(`Invalid RATE_LIMIT_MAX: ${process.env.RATE_LIMIT_MAX}`);
  }

  resolveSqlitePath(cfg.database.url);

  if (!fs.existsSync(cfg.dataset.file)) {
    console.warn(`⚠️  Dataset file not found: ${cfg.dataset.file}`);
    console.warn('The API will serve an empty dataset unless the store is already seeded.');
  }
}
