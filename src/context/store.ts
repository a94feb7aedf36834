/**
 * ContextStore
 *
 * The single shared picture every role reads and writes. Each write passes
 * the AuthorityGuard, schema validation and the mutation planner, then
 * commits its row changes and one audit entry through the backend in a
 * single transaction. Expected rejections come back as values; the audit
 * trail records every attempt whichever way it went.
 */

import type { AuthorityGuard } from '../authority/guard';
import type { Resource } from '../authority/grants';
import { MutationSchema, MUTATION_KINDS, type Mutation, type ValidMutation } from '../domain/schemas';
import type { Actor, AuditEntry, AuditOutcome } from '../domain/types';
import {
  AuthorizationError,
  ConflictError,
  FatalStoreError,
  ValidationError,
  describeError,
} from '../errors';
import { generateId } from '../utils/ids';
import { createModuleLogger, type Logger } from '../utils/logger';
import {
  hasCallerExpectation,
  planMutation,
  requiredGrants,
  targetOf,
  type MutationPlan,
} from './mutations';
import { toSnapshot } from './tables';
import {
  StaleWriteError,
  describeExpectation,
  type AuditFilter,
  type ContextBackend,
  type ContextQuery,
  type ContextSnapshot,
  type ContextTransaction,
  type WriteResult,
} from './types';

// ============================================================================
// Configuration
// ============================================================================

export interface ContextStoreOptions {
  /** Millisecond clock; the store never lets timestamps go backwards */
  clock?: () => number;
  /** Re-plans of a stale write that carried no caller expectation */
  maxInternalRetries?: number;
  idGenerator?: (prefix: string) => string;
  logger?: Logger;
}

const DEFAULT_MAX_INTERNAL_RETRIES = 5;

interface Rejection {
  actor: Actor;
  operation: string;
  resource: Resource | 'unknown';
  target: string | null;
  authorized: boolean;
  outcome: Exclude<AuditOutcome, 'applied'>;
  reason: string;
}

// ============================================================================
// Store
// ============================================================================

export class ContextStore {
  private readonly clock: () => number;
  private readonly maxInternalRetries: number;
  private readonly idGenerator: (prefix: string) => string;
  private readonly log: Logger;
  private lastTimestamp = 0;

  constructor(
    private readonly backend: ContextBackend,
    private readonly guard: AuthorityGuard,
    options: ContextStoreOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.maxInternalRetries = options.maxInternalRetries ?? DEFAULT_MAX_INTERNAL_RETRIES;
    this.idGenerator = options.idGenerator ?? generateId;
    this.log = options.logger ?? createModuleLogger('context-store');
  }

  /**
   * Point-in-time view. With `role`, only the tables that role may read.
   *
   * @throws FatalStoreError when the backend cannot be read
   */
  async read(query: ContextQuery = {}): Promise<ContextSnapshot> {
    try {
      return toSnapshot(await this.backend.snapshot(), query, this.guard);
    } catch (error) {
      throw this.asFatal('read', error);
    }
  }

  async write(actor: Actor, mutation: Mutation): Promise<WriteResult> {
    // Callers may hand over raw JSON; the kind may not be one we know
    const kind: unknown = typeof mutation === 'object' && mutation !== null ? mutation.kind : undefined;
    if (typeof kind !== 'string' || !MUTATION_KINDS.some((known) => known === kind)) {
      const error = new ValidationError(`Unknown mutation kind '${String(kind)}'`);
      return this.reject(
        {
          actor,
          operation: String(kind),
          resource: 'unknown',
          target: null,
          authorized: false,
          outcome: 'invalid',
          reason: error.message,
        },
        error
      );
    }

    const requirements = requiredGrants(mutation);
    const decision = this.guard.checkAll(actor, requirements);
    if (!decision.allowed) {
      const error = new AuthorizationError(actor, decision.resource, decision.operation, decision.reason);
      this.log.warn(
        { actor, operation: mutation.kind, resource: decision.resource },
        'Write denied'
      );
      return this.reject(
        {
          actor,
          operation: mutation.kind,
          resource: decision.resource,
          target: targetOf(mutation),
          authorized: false,
          outcome: 'denied',
          reason: decision.reason,
        },
        error
      );
    }

    const resource = requirements[0].resource;
    const parsed = MutationSchema.safeParse(mutation);
    if (!parsed.success) {
      const error = new ValidationError(
        `Malformed ${mutation.kind}`,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
      return this.reject(
        {
          actor,
          operation: mutation.kind,
          resource,
          target: targetOf(mutation),
          authorized: true,
          outcome: 'invalid',
          reason: error.message,
        },
        error
      );
    }

    return this.commitWithRetry(actor, parsed.data, resource);
  }

  async audit(filter: AuditFilter = {}): Promise<AuditEntry[]> {
    try {
      return await this.backend.readAudit(filter);
    } catch (error) {
      throw this.asFatal('audit', error);
    }
  }

  async auditCount(): Promise<number> {
    try {
      return await this.backend.auditCount();
    } catch (error) {
      throw this.asFatal('auditCount', error);
    }
  }

  async close(): Promise<void> {
    await this.backend.close();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async commitWithRetry(
    actor: Actor,
    mutation: ValidMutation,
    resource: Resource
  ): Promise<WriteResult> {
    for (let attempt = 1; ; attempt++) {
      let tx: ContextTransaction;
      try {
        tx = await this.backend.begin();
      } catch (error) {
        return { ok: false, error: this.asFatal('begin', error) };
      }

      let plan: MutationPlan;
      try {
        plan = planMutation(tx.view, actor, mutation, {
          now: this.now(),
          newId: this.idGenerator,
        });
      } catch (error) {
        await tx.abort();
        if (error instanceof ValidationError || error instanceof ConflictError) {
          return this.reject(
            {
              actor,
              operation: mutation.kind,
              resource,
              target: error instanceof ConflictError ? (error.target ?? null) : targetOf(mutation),
              authorized: true,
              outcome: error instanceof ConflictError ? 'conflict' : 'invalid',
              reason: error.message,
            },
            error
          );
        }
        throw error;
      }

      try {
        tx.stage(plan.changes, plan.expectations);
        tx.appendAudit({
          timestamp: this.now(),
          actor,
          operation: mutation.kind,
          resource: plan.resource,
          target: plan.target,
          authorized: true,
          outcome: 'applied',
          reason: null,
          before: plan.before,
          after: plan.after,
        });
        const [seq] = await tx.commit();
        this.log.debug({ actor, operation: mutation.kind, target: plan.target, seq }, 'Write applied');
        return {
          ok: true,
          value: { seq, operation: mutation.kind, target: plan.target, revision: plan.revision },
        };
      } catch (error) {
        await tx.abort();
        if (!(error instanceof StaleWriteError)) {
          return { ok: false, error: this.asFatal('commit', error) };
        }
        if (!hasCallerExpectation(mutation) && attempt <= this.maxInternalRetries) {
          this.log.debug(
            { actor, operation: mutation.kind, attempt, expectation: describeExpectation(error.expectation) },
            'Stale write, re-planning'
          );
          continue;
        }
        const conflict = new ConflictError(
          `${mutation.kind} lost a race: ${describeExpectation(error.expectation)}`,
          plan.target ?? undefined
        );
        return this.reject(
          {
            actor,
            operation: mutation.kind,
            resource,
            target: plan.target,
            authorized: true,
            outcome: 'conflict',
            reason: conflict.message,
          },
          conflict
        );
      }
    }
  }

  /**
   * Audits a rejected attempt in a transaction of its own. If even that
   * fails the store is unusable and the rejection becomes fatal.
   */
  private async reject(
    rejection: Rejection,
    error: AuthorizationError | ValidationError | ConflictError
  ): Promise<WriteResult> {
    try {
      const tx = await this.backend.begin();
      tx.appendAudit({
        timestamp: this.now(),
        actor: rejection.actor,
        operation: rejection.operation,
        resource: rejection.resource,
        target: rejection.target,
        authorized: rejection.authorized,
        outcome: rejection.outcome,
        reason: rejection.reason,
        before: null,
        after: null,
      });
      await tx.commit();
    } catch (auditError) {
      return { ok: false, error: this.asFatal('audit rejection', auditError) };
    }
    return { ok: false, error };
  }

  private now(): number {
    this.lastTimestamp = Math.max(this.clock(), this.lastTimestamp);
    return this.lastTimestamp;
  }

  private asFatal(operation: string, error: unknown): FatalStoreError {
    if (error instanceof FatalStoreError) {
      this.log.error({ operation, error: error.message }, 'Context store failure');
      return error;
    }
    this.log.error({ operation, error: describeError(error) }, 'Context store failure');
    return new FatalStoreError(`Context store ${operation} failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}
