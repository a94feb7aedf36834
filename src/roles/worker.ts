/**
 * RoleWorker
 *
 * One independent async loop per role:
 *
 *   idle ──stimulus──▶ reasoning ──decision──▶ applying ──▶ idle
 *     └──────────────── stop / fatal store error ─────────▶ stopped
 *
 * Every suspension point (queue wait, reasoning call, backoff sleep) observes
 * the worker's AbortSignal, so `stop()` returns promptly. Failures that never
 * reach the store are surfaced as WorkerEvents.
 */

import { EventEmitter } from 'node:events';
import type { InboundQueue } from '../channel/queue';
import type { MessageChannel } from '../channel/message-channel';
import type { Message } from '../channel/types';
import type { ContextStore } from '../context/store';
import type { WriteReceipt } from '../context/types';
import type { OperatingMode, Role, Trigger } from '../domain/types';
import {
  ChannelClosedError,
  ConflictError,
  FatalStoreError,
  TransientCollaboratorError,
  describeError,
} from '../errors';
import {
  ReasoningDecisionSchema,
  type Reasoner,
  type ReasoningDecision,
  type Stimulus,
} from '../reasoning/types';
import { AbortedError, retryWithBackoff, withDeadline } from '../utils/backoff';
import { generateId } from '../utils/ids';
import { createModuleLogger, type Logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type WorkerPhase = 'idle' | 'reasoning' | 'applying' | 'stopped';

export type WorkerEventType =
  | 'reasoning.failed'
  | 'decision.invalid'
  | 'write.rejected'
  | 'write.conflict'
  | 'publish.failed'
  | 'store.fatal';

export interface WorkerEvent {
  id: string;
  role: Role;
  type: WorkerEventType;
  reason: string;
  data: Readonly<Record<string, unknown>>;
  timestamp: number;
}

export interface WorkerReasoningOptions {
  /** Per-call deadline (default: 30000ms) */
  deadlineMs?: number;
  /** Calls per stimulus, including the first (default: 3) */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export interface RoleWorkerConfig {
  role: Role;
  store: ContextStore;
  channel: MessageChannel;
  reasoner: Reasoner;
  /** Subscription queue for this role */
  inbound?: InboundQueue<Message>;
  /** External triggers; Observe only */
  triggers?: InboundQueue<Trigger>;
  mode?: OperatingMode;
  reasoning?: WorkerReasoningOptions;
  /** Re-read and re-reason rounds after a lost race (default: 3) */
  maxConflictRetries?: number;
  clock?: () => number;
}

const DEFAULT_REASONING: Required<WorkerReasoningOptions> = {
  deadlineMs: 30_000,
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 4_000,
};

const MAX_EVENTS = 200;

// ============================================================================
// Worker
// ============================================================================

export class RoleWorker extends EventEmitter {
  readonly role: Role;
  private readonly store: ContextStore;
  private readonly channel: MessageChannel;
  private readonly reasoner: Reasoner;
  private readonly inbound: InboundQueue<Message> | undefined;
  private readonly triggers: InboundQueue<Trigger> | undefined;
  private readonly reasoning: Required<WorkerReasoningOptions>;
  private readonly maxConflictRetries: number;
  private readonly clock: () => number;
  private readonly controller = new AbortController();
  private readonly log: Logger;
  private mode: OperatingMode;
  private phase: WorkerPhase = 'idle';
  private loop: Promise<void> | null = null;
  private recentEvents: WorkerEvent[] = [];
  private handledCount = 0;

  constructor(config: RoleWorkerConfig) {
    super();
    this.role = config.role;
    this.store = config.store;
    this.channel = config.channel;
    this.reasoner = config.reasoner;
    this.inbound = config.inbound;
    this.triggers = config.triggers;
    this.mode = config.mode ?? 'professional';
    this.reasoning = { ...DEFAULT_REASONING, ...config.reasoning };
    this.maxConflictRetries = config.maxConflictRetries ?? 3;
    this.clock = config.clock ?? Date.now;
    this.log = createModuleLogger('role-worker').child({ role: config.role });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  get state(): WorkerPhase {
    return this.phase;
  }

  /** Stimuli fully handled since start */
  get handled(): number {
    return this.handledCount;
  }

  get operatingMode(): OperatingMode {
    return this.mode;
  }

  /**
   * Idle with nothing waiting in any of its queues.
   */
  isQuiet(): boolean {
    return (
      this.phase === 'idle' && (this.inbound?.size ?? 0) === 0 && (this.triggers?.size ?? 0) === 0
    );
  }

  start(): void {
    if (this.loop || this.phase === 'stopped') return;
    this.loop = this.run();
  }

  /**
   * Abort the current suspension point and wait for the loop to exit.
   */
  async stop(): Promise<void> {
    this.controller.abort();
    if (this.loop) {
      await this.loop;
    } else {
      this.setPhase('stopped');
    }
  }

  setMode(mode: OperatingMode): void {
    this.mode = mode;
    this.log.info({ mode }, 'Operating mode changed');
  }

  events(): WorkerEvent[] {
    return [...this.recentEvents];
  }

  // ==========================================================================
  // Loop
  // ==========================================================================

  private get signal(): AbortSignal {
    return this.controller.signal;
  }

  private async run(): Promise<void> {
    this.log.debug('Worker started');
    try {
      while (!this.signal.aborted) {
        const stimulus = await this.nextStimulus();
        if (!stimulus) break;
        try {
          await this.handle(stimulus);
        } finally {
          this.handledCount++;
          if (!this.signal.aborted) this.setPhase('idle');
        }
      }
    } catch (error) {
      if (error instanceof FatalStoreError) {
        this.report('store.fatal', error.message, {});
        this.emit('fatal', error);
      } else if (!(error instanceof AbortedError) && !(error instanceof ChannelClosedError)) {
        this.log.error({ error: describeError(error) }, 'Worker loop crashed');
        this.emit('crashed', error);
      }
    } finally {
      this.setPhase('stopped');
      this.log.debug('Worker stopped');
    }
  }

  /**
   * Next trigger or message, whichever is available first. Null once every
   * source is closed.
   */
  private async nextStimulus(): Promise<Stimulus | null> {
    for (;;) {
      const trigger = this.triggers?.tryTake();
      if (trigger) return { kind: 'trigger', trigger };
      const message = this.inbound?.tryTake();
      if (message) return { kind: 'message', message };

      const sources = [this.triggers, this.inbound].filter(
        (queue): queue is InboundQueue<Trigger> | InboundQueue<Message> =>
          queue !== undefined && !queue.isClosed
      );
      if (sources.length === 0) return null;

      const race = new AbortController();
      const forward = () => race.abort();
      this.signal.addEventListener('abort', forward, { once: true });
      try {
        await Promise.race(sources.map((queue) => queue.waitReadable(race.signal)));
      } finally {
        race.abort();
        this.signal.removeEventListener('abort', forward);
      }
      if (this.signal.aborted) throw new AbortedError();
    }
  }

  private async handle(stimulus: Stimulus): Promise<void> {
    const causationId = stimulus.kind === 'trigger' ? stimulus.trigger.id : stimulus.message.id;
    let calls = 0;
    // Writes from earlier rounds are committed even when a later one lost a race
    const applied: WriteReceipt[] = [];

    for (let round = 0; ; round++) {
      this.setPhase('reasoning');
      const excerpt = await this.store.read({ role: this.role });

      let raw: unknown;
      try {
        raw = await retryWithBackoff(
          () => {
            calls++;
            const attempt = calls;
            return withDeadline(
              (signal) =>
                this.reasoner.decide(
                  { role: this.role, mode: this.mode, excerpt, stimulus, attempt },
                  { signal }
                ),
              this.reasoning.deadlineMs,
              () =>
                new TransientCollaboratorError(
                  `Reasoning exceeded ${this.reasoning.deadlineMs}ms deadline`
                ),
              this.signal
            );
          },
          {
            attempts: this.reasoning.maxAttempts,
            baseDelayMs: this.reasoning.baseDelayMs,
            maxDelayMs: this.reasoning.maxDelayMs,
            signal: this.signal,
            shouldRetry: (error) => error instanceof TransientCollaboratorError,
            onRetry: (error, attempt, delayMs) =>
              this.log.warn({ attempt, delayMs, error: describeError(error) }, 'Retrying reasoning'),
          }
        );
      } catch (error) {
        if (this.signal.aborted) throw new AbortedError();
        this.report('reasoning.failed', describeError(error), { causationId, calls });
        return;
      }

      const parsed = ReasoningDecisionSchema.safeParse(raw);
      if (!parsed.success) {
        this.report('decision.invalid', 'Decision does not match the reasoning contract', {
          causationId,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        return;
      }

      this.setPhase('applying');
      const outcome = await this.apply(parsed.data, causationId);
      applied.push(...outcome.applied);
      if (outcome.conflict) {
        if (round < this.maxConflictRetries) {
          this.log.debug({ round, reason: outcome.conflict.message }, 'Conflict, re-reading');
          continue;
        }
        this.report('write.conflict', outcome.conflict.message, { causationId, rounds: round + 1 });
        return;
      }

      if (applied.length > 0 || parsed.data.mutations.length === 0) {
        await this.publish(parsed.data, applied, causationId);
      }
      return;
    }
  }

  /**
   * Writes each mutation on its own. Stops at the first conflict so the
   * caller can re-read; rejections only skip the offending mutation.
   *
   * @throws FatalStoreError
   */
  private async apply(
    decision: ReasoningDecision,
    causationId: string
  ): Promise<{ applied: WriteReceipt[]; conflict: ConflictError | null }> {
    const applied: WriteReceipt[] = [];
    for (const mutation of decision.mutations) {
      if (this.signal.aborted) throw new AbortedError();
      const result = await this.store.write(this.role, mutation);
      if (result.ok) {
        applied.push(result.value);
        continue;
      }
      const { error } = result;
      if (error instanceof FatalStoreError) throw error;
      if (error instanceof ConflictError) return { applied, conflict: error };
      this.report('write.rejected', error.message, {
        causationId,
        operation: mutation.kind,
        code: error.code,
      });
    }
    return { applied, conflict: null };
  }

  private async publish(
    decision: ReasoningDecision,
    applied: readonly WriteReceipt[],
    causationId: string
  ): Promise<void> {
    const writes = applied.map((receipt) => ({
      operation: receipt.operation,
      target: receipt.target,
      seq: receipt.seq,
    }));
    for (const outbound of decision.messages) {
      try {
        await this.channel.publish({
          topic: outbound.topic,
          sender: this.role,
          ...(outbound.targets ? { targets: outbound.targets } : {}),
          payload: { ...outbound.payload, writes },
          causationId,
        });
      } catch (error) {
        this.report('publish.failed', describeError(error), { causationId, topic: outbound.topic });
      }
    }
  }

  private report(type: WorkerEventType, reason: string, data: Record<string, unknown>): void {
    const event: WorkerEvent = Object.freeze({
      id: generateId('wev'),
      role: this.role,
      type,
      reason,
      data: Object.freeze({ ...data }),
      timestamp: this.clock(),
    });
    this.recentEvents.push(event);
    if (this.recentEvents.length > MAX_EVENTS) {
      this.recentEvents = this.recentEvents.slice(-MAX_EVENTS);
    }
    this.log.warn({ type, reason }, 'Worker event');
    this.emit('worker-event', event);
  }

  private setPhase(phase: WorkerPhase): void {
    if (this.phase === phase || this.phase === 'stopped') return;
    this.phase = phase;
    this.emit('phase', phase);
  }
}
