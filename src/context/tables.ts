import type { AuditEntry } from '../domain/types';
import type { AuthorityGuard } from '../authority/guard';
import { deepFreeze } from '../utils/freeze';
import {
  TABLE_NAMES,
  TABLE_RESOURCES,
  type AuditFilter,
  type ContextQuery,
  type ContextSnapshot,
  type ContextTables,
  type Expectation,
  type RowChange,
  type TableName,
} from './types';

export function emptyTables(): ContextTables {
  return {
    assets: {},
    observations: {},
    entities: {},
    coverageGaps: {},
    plans: {},
    tasks: {},
  };
}

/**
 * Own rows only; ids such as `constructor` never resolve to prototype members.
 */
export function rowOf<R>(records: Readonly<Record<string, R>>, id: string): R | undefined {
  return Object.hasOwn(records, id) ? records[id] : undefined;
}

function put<R extends { id: string }>(
  records: Readonly<Record<string, R>>,
  row: R
): Readonly<Record<string, R>> {
  return { ...records, [row.id]: deepFreeze(row) };
}

function remove<R>(records: Readonly<Record<string, R>>, id: string): Readonly<Record<string, R>> {
  const next = { ...records };
  delete next[id];
  return next;
}

/**
 * Copy-on-write application; the input tables are left untouched.
 */
export function applyChanges(tables: ContextTables, changes: readonly RowChange[]): ContextTables {
  let next = tables;
  for (const change of changes) {
    switch (change.table) {
      case 'assets':
        next = { ...next, assets: put(next.assets, change.row) };
        break;
      case 'observations':
        next = { ...next, observations: put(next.observations, change.row) };
        break;
      case 'entities':
        next = { ...next, entities: put(next.entities, change.row) };
        break;
      case 'coverageGaps':
        next = {
          ...next,
          coverageGaps:
            change.op === 'put'
              ? put(next.coverageGaps, change.row)
              : remove(next.coverageGaps, change.id),
        };
        break;
      case 'plans':
        next = { ...next, plans: put(next.plans, change.row) };
        break;
      case 'tasks':
        next = { ...next, tasks: put(next.tasks, change.row) };
        break;
    }
  }
  return next;
}

export function activePlanId(tables: ContextTables): string | null {
  for (const plan of Object.values(tables.plans)) {
    if (plan.status === 'active') return plan.id;
  }
  return null;
}

export function meetsExpectation(tables: ContextTables, expectation: Expectation): boolean {
  if (expectation.kind === 'active-plan') {
    return activePlanId(tables) === expectation.planId;
  }
  const row = rowOf<ContextTables[TableName][string]>(tables[expectation.table], expectation.id);
  if (expectation.revision === null) return row === undefined;
  return row !== undefined && row.revision === expectation.revision;
}

const byId = <R extends { id: string }>(a: R, b: R): number =>
  a.id < b.id ? -1 : a.id > b.id ? 1 : 0;

/**
 * Immutable array view of the tables, restricted to what `query` selects and
 * the role may read.
 */
export function toSnapshot(
  tables: ContextTables,
  query: ContextQuery,
  guard: AuthorityGuard
): ContextSnapshot {
  const requested = query.tables ?? TABLE_NAMES;
  const scope: TableName[] = requested.filter(
    (table) => query.role === undefined || guard.canRead(query.role, TABLE_RESOURCES[table])
  );
  const include = (table: TableName): boolean => scope.includes(table);
  const { role } = query;

  const observations = include('observations')
    ? Object.values(tables.observations)
        .filter(
          (record) =>
            role === undefined ||
            guard.readScope(role, 'observation') !== 'own' ||
            record.producedBy === role
        )
        .sort((a, b) => a.timestamp - b.timestamp || byId(a, b))
    : [];

  return Object.freeze({
    scope,
    assets: include('assets') ? Object.values(tables.assets).sort(byId) : [],
    observations,
    entities: include('entities')
      ? Object.values(tables.entities).sort((a, b) => a.createdAt - b.createdAt || byId(a, b))
      : [],
    coverageGaps: include('coverageGaps') ? Object.values(tables.coverageGaps).sort(byId) : [],
    plans: include('plans')
      ? Object.values(tables.plans).sort((a, b) => a.version - b.version || byId(a, b))
      : [],
    tasks: include('tasks')
      ? Object.values(tables.tasks).sort((a, b) => a.createdAt - b.createdAt || byId(a, b))
      : [],
  });
}

export function filterAudit(entries: readonly AuditEntry[], filter: AuditFilter): AuditEntry[] {
  const matched = entries.filter(
    (entry) =>
      (filter.since === undefined || entry.timestamp >= filter.since) &&
      (filter.afterSeq === undefined || entry.seq > filter.afterSeq) &&
      (filter.actor === undefined || entry.actor === filter.actor)
  );
  return filter.limit === undefined ? matched : matched.slice(0, filter.limit);
}
