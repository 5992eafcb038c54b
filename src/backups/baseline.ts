/**
 * Merged baseline
 * Every backup in a directory folded oldest first, with the changes file
 * applied on top. This is the snapshot `merge match` reconciles.
 */

import { listBackups, loadBackup, type Backup } from './archive.js';
import { applyBackupChanges, loadBackupChanges } from './changes.js';
import { mergeBackups } from './merger.js';

export function mergeBackupDir(backupDir: string, changesFile: string): Backup {
  const entries = listBackups(backupDir);
  console.log(`[Backups] Merging ${entries.length} backups from ${backupDir}`);

  const merged = mergeBackups(entries.map(entry => {
    console.log(`[Backups]   ${entry.name} @ ${entry.timestamp}`);
    return loadBackup(entry.path);
  }));
  return { ...merged, data: applyBackupChanges(merged.data, loadBackupChanges(changesFile)) };
}
