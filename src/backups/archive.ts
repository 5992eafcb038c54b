/**
 * Backup archives
 * A backup is one gzip'd JSON bundle holding every snapshot document plus
 * both locale overlays, named `{name}-YYYY-MM-DDTHH-mm-ss.json.gz`. Older archives named down to the
 * minute still load.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { gunzipSync, gzipSync } from 'zlib';
import { z } from 'zod';
import {
  localeDocumentName,
  ornaDataFromDocuments,
  ornaDataToDocuments,
  parseLocaleStrings,
  type SnapshotDocuments,
} from '../data/snapshot.js';
import type { LocaleDb, OrnaData } from '../types.js';

export interface Backup {
  data: OrnaData;
  locales: LocaleDb;
  manualLocales: LocaleDb;
}

export interface BackupEntry {
  path: string;
  name: string;
  /** `YYYY-MM-DDTHH-mm-ss` (or `YYYY-MM-DDTHH-mm`), UTC. Sorts chronologically as a string. */
  timestamp: string;
}

const BUNDLE_VERSION = 1;

const BundleSchema = z.object({
  version: z.literal(BUNDLE_VERSION),
  createdAt: z.string(),
  documents: z.record(z.string(), z.unknown()),
});

const FILE_PATTERN = /^(.+?)-(\d{4}-\d{2}-\d{2}T\d{2}-\d{2}(?:-\d{2})?)\.json\.gz$/;

// =============================================================================
// Names
// =============================================================================

export function backupTimestamp(now: Date): string {
  return now.toISOString().slice(0, 19).replace(/:/g, '-');
}

export function backupFileName(name: string, now: Date): string {
  return `${name}-${backupTimestamp(now)}.json.gz`;
}

export function parseBackupFileName(file: string): { name: string; timestamp: string } | null {
  const match = FILE_PATTERN.exec(file);
  return match ? { name: match[1], timestamp: match[2] } : null;
}

// =============================================================================
// Bundling
// =============================================================================

export function backupToDocuments(backup: Backup): SnapshotDocuments {
  const docs = ornaDataToDocuments(backup.data);
  for (const [locale, strings] of Object.entries(backup.locales.locales)) {
    docs[localeDocumentName(locale, false)] = strings;
  }
  for (const [locale, strings] of Object.entries(backup.manualLocales.locales)) {
    docs[localeDocumentName(locale, true)] = strings;
  }
  return docs;
}

export function backupFromDocuments(docs: SnapshotDocuments): Backup {
  const locales: LocaleDb = { locales: {} };
  const manualLocales: LocaleDb = { locales: {} };
  for (const [file, value] of Object.entries(docs)) {
    if (!file.startsWith('i18n/')) continue;
    const strings = parseLocaleStrings(file, value);
    const target = file.startsWith('i18n/manual/') ? manualLocales : locales;
    target.locales[strings.locale] = strings;
  }
  return { data: ornaDataFromDocuments(docs), locales, manualLocales };
}

// =============================================================================
// Files
// =============================================================================

/** Write a backup into `dir` and return its path. An existing file is never overwritten. */
export function saveBackup(dir: string, name: string, backup: Backup, now: Date = new Date()): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, backupFileName(name, now));
  const bundle = { version: BUNDLE_VERSION, createdAt: now.toISOString(), documents: backupToDocuments(backup) };
  if (existsSync(path)) throw new Error(`Backup ${path} already exists`);
  writeFileSync(path, gzipSync(JSON.stringify(bundle)), { flag: 'wx' });
  console.log(`[Backups] Saved ${path}`);
  return path;
}

export function loadBackup(path: string): Backup {
  const raw: unknown = JSON.parse(gunzipSync(readFileSync(path)).toString('utf-8'));
  const result = BundleSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid backup ${path}: ${result.error.issues[0]?.message ?? 'unknown format'}`);
  }
  return backupFromDocuments(result.data.documents);
}

/** Backups in `dir`, oldest first. Files not named like a backup are ignored. */
export function listBackups(dir: string): BackupEntry[] {
  if (!existsSync(dir)) return [];
  const entries: BackupEntry[] = [];
  for (const file of readdirSync(dir)) {
    const parsed = parseBackupFileName(file);
    if (parsed) entries.push({ path: join(dir, file), ...parsed });
  }
  return entries.sort((a, b) => a.timestamp.localeCompare(b.timestamp) || a.path.localeCompare(b.path));
}
