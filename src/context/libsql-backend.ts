/**
 * LibsqlBackend
 *
 * Durable backend on a SQLite file through @libsql/client. Each entity table
 * keeps the row body as JSON next to its id and revision; `audit_log` is
 * append-only and its AUTOINCREMENT seq is the commit order.
 *
 * Write transactions are chained on a promise so only one is in flight per
 * backend; reads run in their own read transaction and never wait on writers.
 */

import { createClient, type Client, type InStatement, type Row, type Transaction } from '@libsql/client';
import type { z } from 'zod';
import {
  AssetRowSchema,
  AuditEntryRowSchema,
  CoverageGapRowSchema,
  ObservationRowSchema,
  PlanRowSchema,
  TaskRowSchema,
  TrackedEntityRowSchema,
} from '../domain/schemas';
import type { AuditEntry } from '../domain/types';
import { FatalStoreError } from '../errors';
import { createModuleLogger } from '../utils/logger';
import {
  StaleWriteError,
  TABLE_NAMES,
  type AuditDraft,
  type AuditFilter,
  type ContextBackend,
  type ContextTables,
  type ContextTransaction,
  type Expectation,
  type RowChange,
  type TableName,
} from './types';

const log = createModuleLogger('libsql-backend');

// ============================================================================
// Schema
// ============================================================================

const SQL_TABLES: Readonly<Record<TableName, string>> = {
  assets: 'asset',
  observations: 'observation',
  entities: 'tracked_entity',
  coverageGaps: 'coverage_gap',
  plans: 'plan',
  tasks: 'task',
};

const SCHEMA: string[] = [
  ...TABLE_NAMES.map(
    (table) => `CREATE TABLE IF NOT EXISTS ${SQL_TABLES[table]} (
      id TEXT PRIMARY KEY,
      revision INTEGER NOT NULL,
      body TEXT NOT NULL
    )`
  ),
  `CREATE TABLE IF NOT EXISTS audit_log (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp INTEGER NOT NULL,
    actor TEXT NOT NULL,
    operation TEXT NOT NULL,
    resource TEXT NOT NULL,
    target TEXT,
    authorized INTEGER NOT NULL,
    outcome TEXT NOT NULL,
    reason TEXT,
    before TEXT,
    after TEXT
  )`,
  'CREATE INDEX IF NOT EXISTS idx_audit_log_timestamp ON audit_log(timestamp)',
];

// ============================================================================
// Row decoding
// ============================================================================

function text(value: Row[string], column: string): string {
  if (typeof value !== 'string') {
    throw new FatalStoreError(`Column ${column} holds ${typeof value}, expected text`);
  }
  return value;
}

function optionalText(value: Row[string], column: string): string | null {
  return value === null ? null : text(value, column);
}

function integer(value: Row[string], column: string): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw new FatalStoreError(`Column ${column} holds ${typeof value}, expected integer`);
}

function decodeBodies<T extends { id: string }>(
  rows: readonly Row[],
  schema: z.ZodType<T>,
  table: string
): Record<string, T> {
  const entries: [string, T][] = [];
  for (const row of rows) {
    const parsed = schema.safeParse(JSON.parse(text(row.body, `${table}.body`)));
    if (!parsed.success) {
      throw new FatalStoreError(`Corrupt ${table} row: ${parsed.error.message}`);
    }
    entries.push([parsed.data.id, parsed.data]);
  }
  // fromEntries defines own properties, even for an id like `__proto__`
  return Object.fromEntries(entries);
}

function decodeAudit(row: Row): AuditEntry {
  return AuditEntryRowSchema.parse({
    seq: integer(row.seq, 'audit_log.seq'),
    timestamp: integer(row.timestamp, 'audit_log.timestamp'),
    actor: text(row.actor, 'audit_log.actor'),
    operation: text(row.operation, 'audit_log.operation'),
    resource: text(row.resource, 'audit_log.resource'),
    target: optionalText(row.target, 'audit_log.target'),
    authorized: integer(row.authorized, 'audit_log.authorized') === 1,
    outcome: text(row.outcome, 'audit_log.outcome'),
    reason: optionalText(row.reason, 'audit_log.reason'),
    before: optionalText(row.before, 'audit_log.before'),
    after: optionalText(row.after, 'audit_log.after'),
  });
}

// ============================================================================
// Transaction
// ============================================================================

class LibsqlTransaction implements ContextTransaction {
  private readonly changes: RowChange[] = [];
  private readonly expectations: Expectation[] = [];
  private readonly audit: AuditDraft[] = [];
  private finished = false;

  constructor(
    private readonly backend: LibsqlBackend,
    readonly view: ContextTables
  ) {}

  stage(changes: readonly RowChange[], expectations: readonly Expectation[]): void {
    this.assertOpen();
    this.changes.push(...changes);
    this.expectations.push(...expectations);
  }

  appendAudit(entry: AuditDraft): void {
    this.assertOpen();
    this.audit.push(entry);
  }

  commit(): Promise<number[]> {
    this.assertOpen();
    this.finished = true;
    return this.backend.enqueueCommit(this.changes, this.expectations, this.audit);
  }

  async abort(): Promise<void> {
    // Nothing reached the database before commit
    this.finished = true;
  }

  private assertOpen(): void {
    if (this.finished) throw new Error('Transaction already finished');
  }
}

// ============================================================================
// Backend
// ============================================================================

export interface LibsqlBackendConfig {
  /** e.g. `file:.cop/context.db` */
  url: string;
  authToken?: string;
}

export class LibsqlBackend implements ContextBackend {
  readonly name = 'libsql';
  private readonly client: Client;
  private initialization: Promise<void> | null = null;
  private writeChain: Promise<unknown> = Promise.resolve();
  private closed = false;

  constructor(config: LibsqlBackendConfig) {
    this.client = createClient({ url: config.url, authToken: config.authToken });
  }

  /**
   * Creates tables on first use. Safe to call repeatedly.
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.createSchema();
    }
    return this.initialization;
  }

  private async createSchema(): Promise<void> {
    try {
      await this.client.execute('PRAGMA journal_mode = WAL');
      await this.client.batch(SCHEMA, 'write');
    } catch (error) {
      throw new FatalStoreError('Failed to initialize context database', { cause: error });
    }
  }

  async begin(): Promise<ContextTransaction> {
    return new LibsqlTransaction(this, await this.snapshot());
  }

  async snapshot(): Promise<ContextTables> {
    await this.initialize();
    const results = await this.guard('snapshot', () =>
      this.client.batch(
        TABLE_NAMES.map((table) => `SELECT body FROM ${SQL_TABLES[table]} ORDER BY id`),
        'read'
      )
    );
    const [assets, observations, entities, coverageGaps, plans, tasks] = results;
    return {
      assets: decodeBodies(assets.rows, AssetRowSchema, 'asset'),
      observations: decodeBodies(observations.rows, ObservationRowSchema, 'observation'),
      entities: decodeBodies(entities.rows, TrackedEntityRowSchema, 'tracked_entity'),
      coverageGaps: decodeBodies(coverageGaps.rows, CoverageGapRowSchema, 'coverage_gap'),
      plans: decodeBodies(plans.rows, PlanRowSchema, 'plan'),
      tasks: decodeBodies(tasks.rows, TaskRowSchema, 'task'),
    };
  }

  async readAudit(filter: AuditFilter): Promise<AuditEntry[]> {
    await this.initialize();
    const clauses: string[] = [];
    const args: (string | number)[] = [];
    if (filter.since !== undefined) {
      clauses.push('timestamp >= ?');
      args.push(filter.since);
    }
    if (filter.afterSeq !== undefined) {
      clauses.push('seq > ?');
      args.push(filter.afterSeq);
    }
    if (filter.actor !== undefined) {
      clauses.push('actor = ?');
      args.push(filter.actor);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = filter.limit !== undefined ? `LIMIT ${Math.max(0, Math.floor(filter.limit))}` : '';
    const result = await this.guard('readAudit', () =>
      this.client.execute({
        sql: `SELECT * FROM audit_log ${where} ORDER BY seq ${limit}`,
        args,
      })
    );
    return result.rows.map(decodeAudit);
  }

  async auditCount(): Promise<number> {
    await this.initialize();
    const result = await this.guard('auditCount', () =>
      this.client.execute('SELECT COUNT(*) AS count FROM audit_log')
    );
    return result.rows.length === 0 ? 0 : integer(result.rows[0].count, 'count');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.writeChain;
    this.client.close();
  }

  /**
   * @internal called by LibsqlTransaction
   */
  enqueueCommit(
    changes: readonly RowChange[],
    expectations: readonly Expectation[],
    audit: readonly AuditDraft[]
  ): Promise<number[]> {
    const run = this.writeChain.then(() => this.commit(changes, expectations, audit));
    // Keep the chain alive; the caller observes the failure through `run`
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async commit(
    changes: readonly RowChange[],
    expectations: readonly Expectation[],
    audit: readonly AuditDraft[]
  ): Promise<number[]> {
    await this.initialize();
    const tx = await this.guard('begin', () => this.client.transaction('write'));
    try {
      for (const expectation of expectations) {
        await this.verify(tx, expectation);
      }
      for (const change of changes) {
        await tx.execute(this.changeStatement(change));
      }
      const seqs: number[] = [];
      for (const draft of audit) {
        const result = await tx.execute(this.auditStatement(draft));
        if (result.lastInsertRowid === undefined) {
          throw new FatalStoreError('Audit insert returned no sequence number');
        }
        seqs.push(Number(result.lastInsertRowid));
      }
      await tx.commit();
      return seqs;
    } catch (error) {
      await tx.rollback().catch((rollbackError: unknown) => {
        log.warn({ error: String(rollbackError) }, 'Rollback after failed commit also failed');
      });
      if (error instanceof StaleWriteError || error instanceof FatalStoreError) throw error;
      throw new FatalStoreError('Context commit failed', { cause: error });
    } finally {
      tx.close();
    }
  }

  private async verify(tx: Transaction, expectation: Expectation): Promise<void> {
    if (expectation.kind === 'active-plan') {
      const result = await tx.execute(
        "SELECT id FROM plan WHERE json_extract(body, '$.status') = 'active'"
      );
      const activeId = result.rows.length === 0 ? null : text(result.rows[0].id, 'plan.id');
      if (activeId !== expectation.planId) throw new StaleWriteError(expectation);
      return;
    }
    const result = await tx.execute({
      sql: `SELECT revision FROM ${SQL_TABLES[expectation.table]} WHERE id = ?`,
      args: [expectation.id],
    });
    const revision =
      result.rows.length === 0 ? null : integer(result.rows[0].revision, 'revision');
    if (revision !== expectation.revision) throw new StaleWriteError(expectation);
  }

  private changeStatement(change: RowChange): InStatement {
    const table = SQL_TABLES[change.table];
    if (change.op === 'delete') {
      return { sql: `DELETE FROM ${table} WHERE id = ?`, args: [change.id] };
    }
    return {
      sql: `INSERT INTO ${table} (id, revision, body) VALUES (?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET revision = excluded.revision, body = excluded.body`,
      args: [change.row.id, change.row.revision, JSON.stringify(change.row)],
    };
  }

  /**
   * Overridable so tests can fail the audit insert after entity rows were
   * written inside the same transaction.
   */
  protected auditStatement(draft: AuditDraft): InStatement {
    return {
      sql: `INSERT INTO audit_log (timestamp, actor, operation, resource, target, authorized, outcome, reason, before, after)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      args: [
        draft.timestamp,
        draft.actor,
        draft.operation,
        draft.resource,
        draft.target,
        draft.authorized ? 1 : 0,
        draft.outcome,
        draft.reason,
        draft.before,
        draft.after,
      ],
    };
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new FatalStoreError(`Context store ${operation} failed`, { cause: error });
    }
  }
}
