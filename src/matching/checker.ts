/**
 * Field checker
 * Compares one guide entity against its codex counterpart field by field and,
 * in fix mode, pushes corrections:
 *
 *   retrieve (retry once) → apply → save (no retry) → retrieve (retry once) → confirm
 *
 * The fix always starts from a freshly fetched entity, never from the
 * in-memory copy. Errors propagate to the matcher, which records them and
 * moves on to the next entity.
 */

import { isDeepStrictEqual } from 'util';
import { FixNotConfirmedError } from '../errors.js';
import { retryOnce } from '../utils/resilience.js';
import { diffUnsorted } from './diff.js';
import type { MatchReport } from './report.js';

export interface CheckerOptions<E> {
  report: MatchReport;
  entityName: string;
  entityId: number;
  fix: boolean;
  retrieve: () => Promise<E>;
  save: (entity: E) => Promise<void>;
  /** Receives the confirmed entity so the in-memory snapshot stays current. */
  onConfirmed: (entity: E) => void;
}

export interface ListAccessor<E> {
  get: (entity: E) => readonly number[];
  set: (entity: E, ids: number[]) => void;
}

/** Name of a guide id, for display. */
export type IdFormatter = (id: number) => string;

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'None';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/** Remove `toRemove`, then append the missing `toAdd`. Everything else stays. */
export function applyListDelta(current: readonly number[], toAdd: readonly number[], toRemove: readonly number[]): number[] {
  const next = current.filter(id => !toRemove.includes(id));
  for (const id of toAdd) {
    if (!next.includes(id)) next.push(id);
  }
  return next;
}

export class Checker<E> {
  private matchedAll = true;

  constructor(private readonly options: CheckerOptions<E>) {}

  /** Whether every field checked so far matched. */
  get allMatched(): boolean {
    return this.matchedAll;
  }

  /**
   * Scalar (or whole-value) field. `apply` writes the codex value into a live
   * entity and `read` is used to confirm it stuck.
   */
  async scalar<T>(
    field: string,
    codexValue: T,
    guideValue: T,
    apply: (entity: E, value: T) => void,
    read: (entity: E) => T,
    format: (value: T) => string = formatValue,
  ): Promise<boolean> {
    if (isDeepStrictEqual(codexValue, guideValue)) return true;
    this.matchedAll = false;

    const { report, entityName, entityId } = this.options;
    const mismatch = report.mismatch(entityName, entityId, field, format(codexValue), format(guideValue));
    if (!this.options.fix) return false;

    await this.fixEntity(field, entity => apply(entity, codexValue), entity => isDeepStrictEqual(read(entity), codexValue));
    report.fixed(mismatch);
    return false;
  }

  /**
   * Id-list field, compared as sets. Fixes only add the missing ids and drop
   * the extra ones; ids the codex has no opinion on are left alone.
   */
  async list(
    field: string,
    codexIds: readonly number[],
    guideIds: readonly number[],
    format: IdFormatter,
    accessor: ListAccessor<E>,
  ): Promise<boolean> {
    const delta = this.compareLists(field, codexIds, guideIds, format);
    if (!delta) return true;
    const { toAdd, toRemove, mismatch } = delta;
    if (!this.options.fix) return false;

    await this.fixEntity(
      field,
      entity => accessor.set(entity, applyListDelta(accessor.get(entity), toAdd, toRemove)),
      entity => {
        const ids = accessor.get(entity);
        return toAdd.every(id => ids.includes(id)) && !toRemove.some(id => ids.includes(id));
      },
    );
    this.options.report.fixed(mismatch);
    return false;
  }

  /**
   * Id-list field whose fix lives on other entities (an item's "dropped by"
   * is stored on the monsters). `fixer` gets the delta and does the writes.
   */
  async external(
    field: string,
    codexIds: readonly number[],
    guideIds: readonly number[],
    format: IdFormatter,
    fixer: (toAdd: number[], toRemove: number[]) => Promise<void>,
  ): Promise<boolean> {
    const delta = this.compareLists(field, codexIds, guideIds, format);
    if (!delta) return true;
    if (!this.options.fix) return false;

    await fixer(delta.toAdd, delta.toRemove);
    this.options.report.fixed(delta.mismatch);
    return false;
  }

  private compareLists(field: string, codexIds: readonly number[], guideIds: readonly number[], format: IdFormatter) {
    const [toAdd, toRemove] = diffUnsorted(codexIds, guideIds);
    if (toAdd.length === 0 && toRemove.length === 0) return null;
    this.matchedAll = false;

    const { report, entityName, entityId } = this.options;
    const names = (ids: readonly number[]) => [...ids].sort((a, b) => a - b).map(format);
    const mismatch = report.mismatch(
      entityName,
      entityId,
      field,
      `[${names(codexIds).join(', ')}]`,
      `[${names(guideIds).join(', ')}]`,
    );
    report.suggest('adding', field, toAdd.map(format));
    report.suggest('removing', field, toRemove.map(format));
    return { toAdd, toRemove, mismatch };
  }

  private async fixEntity(field: string, apply: (entity: E) => void, confirmed: (entity: E) => boolean): Promise<void> {
    const { entityName, retrieve, save, onConfirmed } = this.options;
    console.log(`🔧 Fixing ${entityName}: ${field}`);

    const live = await retryOnce(retrieve, `retrieve ${entityName}`);
    apply(live);
    await save(live);

    const after = await retryOnce(retrieve, `retrieve ${entityName}`);
    if (!confirmed(after)) {
      console.log(`⚠️ ${entityName}: ${field} still differs after save`);
      throw new FixNotConfirmedError(entityName, field);
    }
    onConfirmed(after);
  }
}

/**
 * Fix protocol for an entity other than the one being checked, e.g. a
 * monster whose drops list has to change for an item check.
 */
export async function fixOther<E>(
  label: string,
  retrieve: () => Promise<E>,
  save: (entity: E) => Promise<void>,
  apply: (entity: E) => boolean,
  confirmed: (entity: E) => boolean,
): Promise<E | null> {
  const live = await retryOnce(retrieve, `retrieve ${label}`);
  if (!apply(live)) return null;
  await save(live);
  const after = await retryOnce(retrieve, `retrieve ${label}`);
  if (!confirmed(after)) throw new FixNotConfirmedError(label, 'linked list');
  return after;
}
