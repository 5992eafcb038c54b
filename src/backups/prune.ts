/**
 * Backup pruning
 * Drops backups whose content equals the one right before them. Timestamps
 * and bundle metadata don't take part in the comparison.
 */

import { unlinkSync } from 'fs';
import { isDeepStrictEqual } from 'util';
import { errorMessage } from '../errors.js';
import { listBackups, loadBackup, type Backup } from './archive.js';

export interface LoadedBackup {
  path: string;
  backup: Backup;
}

/** Paths of the later backup of every consecutive pair with equal content. */
export function findRedundantBackups(entries: readonly LoadedBackup[]): string[] {
  const redundant: string[] = [];
  for (let i = 1; i < entries.length; i++) {
    if (isDeepStrictEqual(entries[i - 1].backup, entries[i].backup)) redundant.push(entries[i].path);
  }
  return redundant;
}

/**
 * Delete redundant backups in `dir`; returns the deleted paths. An archive
 * that fails to load is skipped: it is neither compared nor deleted.
 */
export function pruneBackups(dir: string): string[] {
  const loaded: LoadedBackup[] = [];
  for (const entry of listBackups(dir)) {
    try {
      loaded.push({ path: entry.path, backup: loadBackup(entry.path) });
    } catch (error) {
      console.warn(`[Backups] ⚠️ Skipping ${entry.path}: ${errorMessage(error)}`);
    }
  }
  const redundant = findRedundantBackups(loaded);
  for (const path of redundant) {
    unlinkSync(path);
    console.log(`[Backups] 🗑️ Removed duplicate ${path}`);
  }
  console.log(`[Backups] ${redundant.length} of ${loaded.length} backup(s) pruned`);
  return redundant;
}
