#!/usr/bin/env node
/**
 * codex-guide-sync
 * Keeps the admin guide in line with the public codex: snapshots both sides,
 * reports every field that differs and, with --fix, writes the codex value
 * back to the guide.
 */

import { config } from './config.js';
import { saveBackup, type Backup } from './backups/archive.js';
import { mergeBackupDir } from './backups/baseline.js';
import { pruneBackups } from './backups/prune.js';
import {
  loadLocaleDb,
  loadManualLocaleDb,
  loadOrnaData,
  saveLocaleDb,
  saveManualLocaleDb,
  saveOrnaData,
} from './data/snapshot.js';
import { OrnaStore } from './data/store.js';
import { initDatabase, closeDatabase, getLedgerStats, getRecentRuns, recordMatchRun } from './database/db.js';
import { errorMessage, RefreshCancelledError } from './errors.js';
import { loadMatchConfig } from './matching/config.js';
import { DEFAULT_MATCH_KINDS, parseMatchKind, runMatch, type MatchRun } from './matching/driver.js';
import { refreshCodex, refreshGuide, type RefreshOptions } from './refresh.js';
import { createCodex } from './sources/codex.js';
import { createAdminGuide } from './sources/guide.js';
import { interruptSignal } from './utils/resilience.js';
import type { MatchKind, OrnaData } from './types.js';

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0] || 'status';

  console.log('╔══════════════════════════════════════════════════════════════════╗');
  console.log('║                        CODEX-GUIDE-SYNC                          ║');
  console.log('║                Codex → Admin Guide Reconciler                    ║');
  console.log('╚══════════════════════════════════════════════════════════════════╝');
  console.log('');

  switch (command) {
    case 'status':
      showStatus();
      return 0;

    case 'match': {
      const kinds = parseKinds(args.slice(1));
      if (!kinds) return 1;
      const dir = config.data.currentDir;
      return runMatchCommand(dir, loadOrnaData(dir), kinds, args.includes('--fix'));
    }

    case 'merge': {
      if (args[1] !== 'match') {
        printUsage();
        return 1;
      }
      const kinds = parseKinds(args.slice(2));
      if (!kinds) return 1;
      const merged = runBackupMerge();
      return runMatchCommand(config.data.mergeDir, merged.data, kinds, args.includes('--fix'));
    }

    case 'refresh': {
      const target = args[1] || 'all';
      if (target !== 'guide' && target !== 'codex' && target !== 'all') {
        printUsage();
        return 1;
      }
      return runRefresh(target);
    }

    case 'backups':
      switch (args[1]) {
        case 'merge':
          runBackupMerge();
          return 0;
        case 'prune':
          pruneBackups(config.data.backupDir);
          return 0;
        case 'save':
          runBackupSave(args[2] || 'current');
          return 0;
        default:
          printUsage();
          return 1;
      }

    case 'runs': {
      const limit = parseInt(args.find(a => a.startsWith('--limit='))?.split('=')[1] || '10');
      showRuns(limit);
      return 0;
    }

    case 'serve':
    case 'api': {
      const { startServer } = await import('./api.js');
      startServer();
      return -1; // Keep running
    }

    default:
      printUsage();
      return 1;
  }
}

function printUsage(): void {
  console.log('Usage: codex-guide-sync <command>');
  console.log('');
  console.log('Commands:');
  console.log('  status                   Show snapshot and ledger statistics');
  console.log('  match [kinds...]         Compare the snapshot against the guide');
  console.log('                           kinds: items monsters skills pets status_effects');
  console.log('  refresh guide|codex|all  Re-download a side into the current snapshot');
  console.log('  backups save [name]      Back up the current snapshot');
  console.log('  backups merge            Merge all backups and apply the changes file');
  console.log('  backups prune            Delete backups identical to their predecessor');
  console.log('  merge match [kinds...]   Merge all backups, then match the merged snapshot');
  console.log('  runs                     Show recent match runs');
  console.log('  serve / api              Start the HTTP API server');
  console.log('');
  console.log('Options:');
  console.log('  --fix                    Write codex values back to the guide (match, merge match)');
  console.log('  --limit=N                Number of runs to show (runs)');
}

// =============================================================================
// Commands
// =============================================================================

/** Kinds named on the command line, all defaults when none; null after printing usage. */
function parseKinds(args: readonly string[]): MatchKind[] | null {
  const kinds: MatchKind[] = [];
  for (const arg of args.filter(a => !a.startsWith('--'))) {
    const kind = parseMatchKind(arg);
    if (!kind) {
      console.error(`Unknown entity kind: ${arg}`);
      printUsage();
      return null;
    }
    kinds.push(kind);
  }
  return kinds.length > 0 ? kinds : [...DEFAULT_MATCH_KINDS];
}

function showStatus(): void {
  const data = loadOrnaData(config.data.currentDir);
  const stats = getLedgerStats();

  console.log(`📂 Snapshot: ${config.data.currentDir}`);
  console.log(`  Codex: ${data.codex.items.length} items, ${data.codex.monsters.length} monsters, ${data.codex.bosses.length} bosses, ${data.codex.raids.length} raids, ${data.codex.skills.length} skills, ${data.codex.followers.length} followers`);
  console.log(`  Guide: ${data.guide.items.length} items, ${data.guide.monsters.length} monsters, ${data.guide.skills.length} skills, ${data.guide.pets.length} pets`);
  console.log('');
  console.log('📊 Ledger');
  console.log(`  Runs:        ${stats.totalRuns} (${stats.okRuns} ok)`);
  console.log(`  Mismatches:  ${stats.totalMismatches} (${stats.fixedMismatches} fixed)`);
  console.log(`  Last run:    ${stats.lastRunAt ?? 'never'}`);
}

function printRunSummary(run: MatchRun): void {
  console.log('');
  console.log('═'.repeat(60));
  console.log(`📊 Match Summary${run.fix ? ' (fix mode)' : ''}`);
  console.log('═'.repeat(60));
  for (const r of run.results) {
    console.log(`  ${r.kind.padEnd(14)} checked ${r.checked}, matched ${r.matched}, mismatches ${r.mismatches.length}, fixed ${r.fixed}, errors ${r.errors.length}`);
    if (r.missingOnGuide.length > 0) console.log(`    Missing on guide: ${r.missingOnGuide.join(', ')}`);
    if (r.notOnCodex.length > 0) console.log(`    Not on codex:     ${r.notOnCodex.join(', ')}`);
    if (r.created.length > 0) console.log(`    Created:          ${r.created.join(', ')}`);
    for (const e of r.errors) console.log(`    ⚠️  ${e.entity}: ${e.message}`);
  }
  console.log('═'.repeat(60));
  console.log(run.ok ? '✅ Completed without errors' : '❌ Completed with errors');
}

/** Match `data` against the guide; with fix, the updated snapshot is written back to `dir`. */
async function runMatchCommand(dir: string, data: OrnaData, kinds: readonly MatchKind[], fix: boolean): Promise<number> {
  initDatabase();
  console.log(`[Snapshot] Matching ${dir}`);
  const store = new OrnaStore(data);
  const run = await runMatch({ store, guide: createAdminGuide(), config: loadMatchConfig(fix) }, kinds);

  printRunSummary(run);
  recordMatchRun(run);

  // Fixes updated the guide side of the store; keep the snapshot in step.
  if (fix) {
    saveOrnaData(dir, store.toData());
    console.log(`[Snapshot] Saved ${dir}`);
  }
  return run.ok ? 0 : 1;
}

async function runRefresh(target: 'guide' | 'codex' | 'all'): Promise<number> {
  const dir = config.data.currentDir;
  const data = loadOrnaData(dir);
  const signal = interruptSignal();

  try {
    if (target === 'guide' || target === 'all') {
      const options: RefreshOptions = { ...config.guide, signal };
      data.guide = await refreshGuide(createAdminGuide(), options);
      saveOrnaData(dir, data);
    }
    if (target === 'codex' || target === 'all') {
      const options: RefreshOptions = { ...config.codex, signal };
      data.codex = await refreshCodex(createCodex(), options);
      saveOrnaData(dir, data);
    }
  } catch (error) {
    if (error instanceof RefreshCancelledError) {
      console.log(`[Refresh] ⛔ ${error.message}; snapshot left as it was`);
      return 130;
    }
    throw error;
  }

  console.log(`[Snapshot] Saved ${dir}`);
  return 0;
}

function runBackupSave(name: string): void {
  const dir = config.data.currentDir;
  saveBackup(config.data.backupDir, name, {
    data: loadOrnaData(dir),
    locales: loadLocaleDb(dir),
    manualLocales: loadManualLocaleDb(dir),
  });
}

function runBackupMerge(): Backup {
  const merged = mergeBackupDir(config.data.backupDir, config.data.changesFile);
  const out = config.data.mergeDir;
  saveOrnaData(out, merged.data);
  saveLocaleDb(out, merged.locales);
  saveManualLocaleDb(out, merged.manualLocales);
  console.log(`[Backups] ✅ Merged snapshot written to ${out}`);
  return merged;
}

function showRuns(limit: number): void {
  initDatabase();
  const runs = getRecentRuns(limit);
  if (runs.length === 0) {
    console.log('No match runs recorded yet');
    return;
  }
  console.log('🕑 Recent match runs');
  for (const run of runs) {
    const flag = run.ok ? '✅' : '❌';
    console.log(`  ${flag} #${run.id} ${run.started_at} [${run.kinds.join(', ')}]${run.fix ? ' fix' : ''}: ${run.checked} checked, ${run.mismatch_count} mismatches, ${run.error_count} errors`);
  }
}

main()
  .then(code => {
    if (code < 0) return;
    closeDatabase();
    process.exit(code);
  })
  .catch(error => {
    console.error('[Sync] FATAL:', errorMessage(error));
    closeDatabase();
    process.exit(1);
  });
