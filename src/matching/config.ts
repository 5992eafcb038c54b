/**
 * Match Configuration
 * Immutable settings handed to the driver and every matcher.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));

const MatchTablesSchema = z.object({
  statusEffectRenames: z.record(z.string(), z.string()),
  elementStatuses: z.record(z.string(), z.array(z.string())),
  weaponItemType: z.string(),
  guideOnlySkillTypes: z.array(z.string()),
});

export type MatchTables = z.infer<typeof MatchTablesSchema>;

export interface MatchConfig {
  readonly fix: boolean;
  /** Codex status effect name → guide name, where they differ. */
  readonly statusEffectRenames: Readonly<Record<string, string>>;
  /** Statuses a weapon of the given element inflicts on top of its listed causes. */
  readonly elementStatuses: Readonly<Record<string, readonly string[]>>;
  readonly weaponItemType: string;
  /** Guide skill types that never appear on the codex. */
  readonly guideOnlySkillTypes: readonly string[];
}

export function loadMatchTables(path = join(__dirname, 'match-tables.json')): MatchTables {
  return MatchTablesSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

export function createMatchConfig(tables: MatchTables, fix: boolean): MatchConfig {
  const elementStatuses: Record<string, readonly string[]> = {};
  for (const [element, statuses] of Object.entries(tables.elementStatuses)) {
    elementStatuses[element] = Object.freeze([...statuses]);
  }
  return Object.freeze({
    fix,
    statusEffectRenames: Object.freeze({ ...tables.statusEffectRenames }),
    elementStatuses: Object.freeze(elementStatuses),
    weaponItemType: tables.weaponItemType,
    guideOnlySkillTypes: Object.freeze([...tables.guideOnlySkillTypes]),
  });
}

export function loadMatchConfig(fix: boolean): MatchConfig {
  return createMatchConfig(loadMatchTables(), fix);
}

/** Guide name for a codex status effect. */
export function guideStatusName(config: MatchConfig, codexName: string): string {
  return config.statusEffectRenames[codexName] ?? codexName;
}
