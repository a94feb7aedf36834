/**
 * Context store contracts shared by the store façade and its backends.
 */

import type { Resource } from '../authority/grants';
import type {
  Actor,
  Asset,
  AuditEntry,
  CoverageGap,
  ObservationRecord,
  Plan,
  Task,
  TrackedEntity,
} from '../domain/types';
import type { MutationKind } from '../domain/schemas';
import type {
  AuthorizationError,
  ConflictError,
  FatalStoreError,
  ValidationError,
} from '../errors';

// ============================================================================
// Tables
// ============================================================================

export interface ContextTables {
  readonly assets: Readonly<Record<string, Asset>>;
  readonly observations: Readonly<Record<string, ObservationRecord>>;
  readonly entities: Readonly<Record<string, TrackedEntity>>;
  readonly coverageGaps: Readonly<Record<string, CoverageGap>>;
  readonly plans: Readonly<Record<string, Plan>>;
  readonly tasks: Readonly<Record<string, Task>>;
}

export type TableName = keyof ContextTables;

export const TABLE_NAMES: readonly TableName[] = [
  'assets',
  'observations',
  'entities',
  'coverageGaps',
  'plans',
  'tasks',
];

export const TABLE_RESOURCES: Readonly<Record<TableName, Resource>> = {
  assets: 'asset',
  observations: 'observation',
  entities: 'tracked_entity',
  coverageGaps: 'coverage_gap',
  plans: 'plan',
  tasks: 'task',
};

export type RowChange =
  | { op: 'put'; table: 'assets'; row: Asset }
  | { op: 'put'; table: 'observations'; row: ObservationRecord }
  | { op: 'put'; table: 'entities'; row: TrackedEntity }
  | { op: 'put'; table: 'coverageGaps'; row: CoverageGap }
  | { op: 'put'; table: 'plans'; row: Plan }
  | { op: 'put'; table: 'tasks'; row: Task }
  | { op: 'delete'; table: 'coverageGaps'; id: string };

/**
 * Condition a commit must still satisfy. `revision: null` means the row must
 * not exist yet.
 */
export type Expectation =
  | { kind: 'row'; table: TableName; id: string; revision: number | null }
  | { kind: 'active-plan'; planId: string | null };

export type AuditDraft = Omit<AuditEntry, 'seq'>;

export interface AuditFilter {
  /** Inclusive lower bound on timestamp */
  since?: number;
  actor?: Actor;
  /** Entries with seq greater than this */
  afterSeq?: number;
  limit?: number;
}

// ============================================================================
// Backend contract
// ============================================================================

export interface ContextTransaction {
  /** Snapshot the transaction was opened against */
  readonly view: ContextTables;
  stage(changes: readonly RowChange[], expectations: readonly Expectation[]): void;
  appendAudit(entry: AuditDraft): void;
  /**
   * Validates every expectation, then applies changes and audit entries in
   * one step. Resolves with the assigned audit sequence numbers.
   * Rejects with StaleWriteError when an expectation no longer holds.
   */
  commit(): Promise<number[]>;
  abort(): Promise<void>;
}

export interface ContextBackend {
  readonly name: string;
  begin(): Promise<ContextTransaction>;
  snapshot(): Promise<ContextTables>;
  readAudit(filter: AuditFilter): Promise<AuditEntry[]>;
  auditCount(): Promise<number>;
  close(): Promise<void>;
}

export class StaleWriteError extends Error {
  constructor(readonly expectation: Expectation) {
    super(`Stale write: ${describeExpectation(expectation)}`);
    this.name = 'StaleWriteError';
  }
}

export function describeExpectation(expectation: Expectation): string {
  if (expectation.kind === 'active-plan') {
    return `active plan expected ${expectation.planId ?? 'none'}`;
  }
  const expected = expectation.revision === null ? 'absent' : `r${expectation.revision}`;
  return `${expectation.table}/${expectation.id} expected ${expected}`;
}

// ============================================================================
// Store surface
// ============================================================================

export interface ContextSnapshot {
  /** Tables included in this snapshot; the rest are empty */
  scope: TableName[];
  assets: Asset[];
  observations: ObservationRecord[];
  entities: TrackedEntity[];
  coverageGaps: CoverageGap[];
  plans: Plan[];
  tasks: Task[];
}

export interface ContextQuery {
  /** Narrow to what this role may read */
  role?: Actor;
  tables?: TableName[];
}

export interface WriteReceipt {
  seq: number;
  operation: MutationKind;
  target: string | null;
  revision: number | null;
}

export type WriteError = AuthorizationError | ValidationError | ConflictError | FatalStoreError;

export type WriteResult = { ok: true; value: WriteReceipt } | { ok: false; error: WriteError };
