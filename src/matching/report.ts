/**
 * Match report
 * Collects what one matcher found and prints it as it goes.
 */

import { errorMessage } from '../errors.js';
import type { MatchKind, MatchResult, Mismatch } from '../types.js';

export class MatchReport {
  private readonly result: MatchResult;

  constructor(public readonly kind: MatchKind) {
    this.result = {
      kind,
      checked: 0,
      matched: 0,
      fixed: 0,
      mismatches: [],
      missingOnGuide: [],
      notOnCodex: [],
      unmatched: [],
      created: [],
      errors: [],
    };
  }

  get tag(): string {
    return `[Match:${this.kind}]`;
  }

  mismatch(entity: string, id: number | null, field: string, codex: string, guide: string): Mismatch {
    const mismatch: Mismatch = { entity, id, field, codex, guide, fixed: false };
    this.result.mismatches.push(mismatch);
    const where = id === null ? entity : `${entity} (#${id})`;
    console.log(`❌ ${this.kind} ${where}: ${field}`);
    console.log(`     codex= ${codex}`);
    console.log(`     guide= ${guide}`);
    return mismatch;
  }

  suggest(verb: 'adding' | 'removing', field: string, values: readonly string[]): void {
    if (values.length > 0) console.log(`     Suggest ${verb} ${field}: ${values.join(', ')}`);
  }

  fixed(mismatch: Mismatch): void {
    mismatch.fixed = true;
    this.result.fixed++;
    console.log(`✅ ${this.kind} ${mismatch.entity}: ${mismatch.field} fixed`);
  }

  entityChecked(allMatched: boolean): void {
    this.result.checked++;
    if (allMatched) this.result.matched++;
  }

  missingOnGuide(name: string): void {
    this.result.missingOnGuide.push(name);
  }

  notOnCodex(name: string): void {
    this.result.notOnCodex.push(name);
  }

  unmatched(name: string): void {
    this.result.unmatched.push(name);
  }

  created(name: string): void {
    this.result.created.push(name);
  }

  error(entity: string, error: unknown): void {
    const message = errorMessage(error);
    this.result.errors.push({ entity, message });
    console.error(`${this.tag} ${entity}: ${message}`);
  }

  partial(entity: string, category: string, failures: readonly string[]): void {
    console.log(`⚠️ ${this.tag} ${entity}: unresolved ${category}: ${failures.join(', ')}`);
  }

  /** Print the missing/extra listings and the counts. */
  printSummary(): void {
    const r = this.result;
    const listing = (title: string, names: readonly string[]) => {
      if (names.length === 0) return;
      console.log(`\x1b[1m${names.length} ${title}:\x1b[0m`);
      for (const name of names) console.log(`  - ${name}`);
    };
    listing(`${this.kind} missing on guide`, r.missingOnGuide);
    listing(`${this.kind} not on codex`, r.notOnCodex);
    listing(`${this.kind} with no codex URI on guide`, r.unmatched);
    listing(`${this.kind} created on guide`, r.created);
    console.log(
      `${this.tag} ${r.matched}/${r.checked} matched, ${r.mismatches.length} mismatched field(s), ` +
      `${r.fixed} fixed, ${r.errors.length} error(s)`,
    );
  }

  toResult(): MatchResult {
    return this.result;
  }
}
