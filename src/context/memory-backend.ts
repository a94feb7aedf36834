/**
 * In-process backend. Tables are immutable records replaced wholesale on
 * commit, so a snapshot handed out earlier never changes underneath a reader.
 */

import type { AuditEntry } from '../domain/types';
import { FatalStoreError } from '../errors';
import { applyChanges, emptyTables, filterAudit, meetsExpectation } from './tables';
import {
  StaleWriteError,
  type AuditDraft,
  type AuditFilter,
  type ContextBackend,
  type ContextTables,
  type ContextTransaction,
  type Expectation,
  type RowChange,
} from './types';

class MemoryTransaction implements ContextTransaction {
  private readonly changes: RowChange[] = [];
  private readonly expectations: Expectation[] = [];
  private readonly audit: AuditDraft[] = [];
  private finished = false;

  constructor(
    private readonly backend: MemoryBackend,
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

  async commit(): Promise<number[]> {
    this.assertOpen();
    this.finished = true;
    return this.backend.apply(this.changes, this.expectations, this.audit);
  }

  async abort(): Promise<void> {
    this.finished = true;
  }

  private assertOpen(): void {
    if (this.finished) throw new Error('Transaction already finished');
  }
}

export class MemoryBackend implements ContextBackend {
  readonly name = 'memory';
  private tables: ContextTables = emptyTables();
  private readonly auditLog: AuditEntry[] = [];
  private closed = false;

  async begin(): Promise<ContextTransaction> {
    this.assertOpen();
    return new MemoryTransaction(this, this.tables);
  }

  async snapshot(): Promise<ContextTables> {
    this.assertOpen();
    return this.tables;
  }

  async readAudit(filter: AuditFilter): Promise<AuditEntry[]> {
    this.assertOpen();
    return filterAudit(this.auditLog, filter);
  }

  async auditCount(): Promise<number> {
    this.assertOpen();
    return this.auditLog.length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Validates and applies in one synchronous step. Nothing is published to
   * `tables` or `auditLog` until every change and audit entry is built.
   *
   * @internal called by MemoryTransaction
   */
  apply(
    changes: readonly RowChange[],
    expectations: readonly Expectation[],
    audit: readonly AuditDraft[]
  ): number[] {
    this.assertOpen();
    for (const expectation of expectations) {
      if (!meetsExpectation(this.tables, expectation)) throw new StaleWriteError(expectation);
    }
    const next = applyChanges(this.tables, changes);
    const base = this.auditLog.length;
    const sealed = audit.map((draft, index) => this.sealAudit(draft, base + index + 1));

    this.tables = next;
    this.auditLog.push(...sealed);
    return sealed.map((entry) => entry.seq);
  }

  protected sealAudit(draft: AuditDraft, seq: number): AuditEntry {
    return Object.freeze({ ...draft, seq });
  }

  private assertOpen(): void {
    if (this.closed) throw new FatalStoreError('Context store is closed');
  }
}
