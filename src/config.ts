/**
 * Sync Configuration
 * Codex scraper, admin guide client and local data layout.
 */

import 'dotenv/config';
import { ConfigError } from './errors.js';

function host(name: string, fallback: string): string {
  return (process.env[name] || fallback).replace(/\/+$/, '');
}

function num(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw || !raw.trim()) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigError(name, `not a number: ${raw}`);
  return value;
}

export const config = {
  // Admin guide (read/write)
  guide: {
    host: host('GUIDE_HOST', 'https://orna.guide'),
    cookie: process.env.GUIDE_COOKIE || '',
    sleepSeconds: num('GUIDE_SLEEP', 0),        // Delay between requests; >0 forces serial fetches
    concurrency: num('GUIDE_CONCURRENCY', 4),   // Pool size when no delay is set
    timeout: num('GUIDE_TIMEOUT_MS', 30000),
  },

  // Public codex (read-only)
  codex: {
    host: host('CODEX_HOST', 'https://playorna.com'),
    sleepSeconds: num('CODEX_SLEEP', 0),
    concurrency: num('CODEX_CONCURRENCY', 4),
    timeout: num('CODEX_TIMEOUT_MS', 30000),
  },

  // Local data layout
  data: {
    currentDir: process.env.DATA_CURRENT_DIR || './data/current_entries',
    mergeDir: process.env.DATA_MERGE_DIR || './data/merge',
    backupDir: process.env.DATA_BACKUP_DIR || './data/backups',
    changesFile: process.env.DATA_BACKUP_CHANGES || './data/backup_changes.json',
  },

  // Match-report ledger
  database: {
    path: process.env.DB_PATH || './data/reports.db',
  },

  api: {
    port: num('API_PORT', 5060),
  },
};

export type Config = typeof config;
