/**
 * Orchestrator
 *
 * Wires the four role workers onto one ContextStore and one MessageChannel,
 * seeds the picture, feeds external triggers to Observe and drives a run
 * until the system settles. A FatalStoreError from any worker halts all of
 * them.
 */

import { EventEmitter } from 'node:events';
import type { MessageChannel } from '../channel/message-channel';
import { InboundQueue } from '../channel/queue';
import type { ContextStore } from '../context/store';
import type { WriteReceipt, WriteResult } from '../context/types';
import { TriggerInputSchema } from '../domain/schemas';
import {
  ROLES,
  type AssetStatus,
  type GeoPosition,
  type OperatingMode,
  type Role,
  type TaskStatus,
  type Trigger,
} from '../domain/types';
import { FatalStoreError, ValidationError } from '../errors';
import type { Reasoner } from '../reasoning/types';
import { ROLE_PROFILES } from '../roles/profiles';
import { RoleWorker, type WorkerEvent, type WorkerReasoningOptions } from '../roles/worker';
import { sleep } from '../utils/backoff';
import { generateId } from '../utils/ids';
import { createModuleLogger } from '../utils/logger';
import { CopObserver } from './observer';
import { seedMutations, type ScenarioSeed } from './scenario';

const log = createModuleLogger('orchestrator');

// ============================================================================
// Types
// ============================================================================

export type RunOutcome = 'quiescent' | 'stopped' | 'halted' | 'timeout';

export type OrchestratorStatus = 'created' | 'running' | 'stopped' | 'halted';

export interface OrchestratorOptions {
  store: ContextStore;
  channel: MessageChannel;
  reasoner: Reasoner;
  mode?: OperatingMode;
  reasoning?: WorkerReasoningOptions;
  maxConflictRetries?: number;
  /** Quiet time required before a run counts as settled (default: 50ms) */
  quiescenceGraceMs?: number;
  /** Default bound on runUntilQuiescent (default: 60s) */
  runTimeoutMs?: number;
  /** Wait for workers to exit on stop (default: 5s) */
  shutdownTimeoutMs?: number;
  /** Per-worker reasoner, e.g. a scripted one in tests */
  reasoners?: Partial<Record<Role, Reasoner>>;
}

export interface TelemetryReport {
  position?: GeoPosition;
  fuelPercent?: number;
  status?: AssetStatus;
}

export interface RunOptions {
  graceMs?: number;
  timeoutMs?: number;
}

const POLL_INTERVAL_MS = 5;

// ============================================================================
// Orchestrator
// ============================================================================

export class Orchestrator extends EventEmitter {
  readonly observer: CopObserver;
  private readonly store: ContextStore;
  private readonly channel: MessageChannel;
  private readonly workers = new Map<Role, RoleWorker>();
  private readonly triggers = new InboundQueue<Trigger>('triggers');
  private readonly graceMs: number;
  private readonly runTimeoutMs: number;
  private readonly shutdownTimeoutMs: number;
  private status: OrchestratorStatus = 'created';
  private fatal: FatalStoreError | null = null;
  private halting: Promise<void> | null = null;

  constructor(options: OrchestratorOptions) {
    super();
    this.store = options.store;
    this.channel = options.channel;
    this.graceMs = options.quiescenceGraceMs ?? 50;
    this.runTimeoutMs = options.runTimeoutMs ?? 60_000;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 5_000;

    for (const role of ROLES) {
      const profile = ROLE_PROFILES[role];
      const worker = new RoleWorker({
        role,
        store: this.store,
        channel: this.channel,
        reasoner: options.reasoners?.[role] ?? options.reasoner,
        inbound: this.channel.subscribe(role, profile.subscribes),
        ...(profile.acceptsTriggers ? { triggers: this.triggers } : {}),
        mode: options.mode,
        reasoning: options.reasoning,
        maxConflictRetries: options.maxConflictRetries,
      });
      worker.on('fatal', (error: FatalStoreError) => this.halt(error));
      worker.on('worker-event', (event: WorkerEvent) => this.emit('worker-event', event));
      this.workers.set(role, worker);
    }
    this.channel.seal();

    this.observer = new CopObserver(this.store, this.channel, () => this.workerEvents());
  }

  get state(): OrchestratorStatus {
    return this.status;
  }

  get fatalError(): FatalStoreError | null {
    return this.fatal;
  }

  worker(role: Role): RoleWorker {
    const worker = this.workers.get(role);
    if (!worker) throw new Error(`No worker for role ${role}`);
    return worker;
  }

  // ==========================================================================
  // Setup
  // ==========================================================================

  /**
   * Writes the initial picture as the `system` actor. Each write is checked
   * and audited like any other.
   *
   * @throws the first write error; the seed is not rolled back
   */
  async seed(seed: ScenarioSeed): Promise<WriteReceipt[]> {
    const receipts: WriteReceipt[] = [];
    for (const mutation of seedMutations(seed)) {
      const result = await this.store.write('system', mutation);
      if (!result.ok) {
        log.error({ operation: mutation.kind, error: result.error.message }, 'Seed write failed');
        throw result.error;
      }
      receipts.push(result.value);
    }
    log.info(
      { assets: seed.assets.length, entities: seed.entities.length, plan: seed.plan?.id ?? null },
      'Picture seeded'
    );
    return receipts;
  }

  start(): void {
    if (this.status !== 'created') return;
    this.status = 'running';
    for (const worker of this.workers.values()) worker.start();
    log.info({ roles: ROLES }, 'Workers started');
  }

  /**
   * Validates a normalized trigger and queues it for Observe.
   *
   * @throws ValidationError when the trigger is malformed
   */
  async injectTrigger(raw: unknown): Promise<Trigger> {
    const parsed = TriggerInputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(
        'Malformed trigger',
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    const trigger: Trigger = {
      ...parsed.data,
      id: parsed.data.id ?? generateId('trg'),
    };
    await this.triggers.put(trigger);
    log.info({ triggerId: trigger.id, detections: trigger.detections.length }, 'Trigger injected');
    return trigger;
  }

  setMode(mode: OperatingMode): void {
    for (const worker of this.workers.values()) worker.setMode(mode);
  }

  // ==========================================================================
  // Field reports
  // ==========================================================================

  /**
   * Records a task status reported by the asset flying it and wakes Act.
   * A failed task frees its assignment for re-dispatch.
   */
  async reportTaskStatus(taskId: string, status: TaskStatus): Promise<WriteResult> {
    const result = await this.store.write('system', { kind: 'task.update', taskId, status });
    if (!result.ok) return this.rejected(result, { taskId, status });
    await this.channel.publish({
      topic: 'task.status',
      sender: 'system',
      payload: { taskId, status },
    });
    log.info({ taskId, status }, 'Task status reported');
    return result;
  }

  /**
   * Records asset telemetry and wakes Act to check fuel.
   */
  async reportTelemetry(assetId: string, report: TelemetryReport): Promise<WriteResult> {
    const result = await this.store.write('system', { kind: 'asset.telemetry', assetId, ...report });
    if (!result.ok) return this.rejected(result, { assetId });
    await this.channel.publish({
      topic: 'asset.status',
      sender: 'system',
      payload: { assetId, ...report },
    });
    log.info({ assetId, fuelPercent: report.fuelPercent }, 'Telemetry reported');
    return result;
  }

  // ==========================================================================
  // Running
  // ==========================================================================

  /**
   * Starts the workers if needed and waits until nothing is queued and every
   * worker has been idle for the grace period.
   */
  async runUntilQuiescent(options: RunOptions = {}): Promise<RunOutcome> {
    const graceMs = options.graceMs ?? this.graceMs;
    const timeoutMs = options.timeoutMs ?? this.runTimeoutMs;
    this.start();

    const deadline = Date.now() + timeoutMs;
    let quietSince: number | null = null;
    let epoch = this.activityEpoch();

    for (;;) {
      if (this.status === 'halted') {
        await this.halting;
        return 'halted';
      }
      if (this.status === 'stopped') return 'stopped';

      const now = Date.now();
      const current = this.activityEpoch();
      if (this.isQuiet() && current === epoch) {
        quietSince ??= now;
        if (now - quietSince >= graceMs) return 'quiescent';
      } else {
        quietSince = null;
        epoch = current;
      }
      if (now >= deadline) {
        log.warn({ timeoutMs }, 'Run did not settle before timeout');
        return 'timeout';
      }
      await sleep(Math.min(POLL_INTERVAL_MS, Math.max(1, graceMs)));
    }
  }

  /**
   * Stops every worker, waiting at most shutdownTimeoutMs. Store and channel
   * stay readable through the observer.
   */
  async stop(): Promise<void> {
    if (this.status === 'running' || this.status === 'created') this.status = 'stopped';
    this.triggers.close();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.shutdownTimeoutMs);
    });
    const stopped = Promise.all(Array.from(this.workers.values(), (worker) => worker.stop())).then(
      () => false
    );
    const late = await Promise.race([stopped, timedOut]);
    clearTimeout(timer);
    if (late) {
      log.warn({ timeoutMs: this.shutdownTimeoutMs }, 'Workers did not stop in time');
    }
  }

  /**
   * Stop, then release the channel and the store.
   */
  async shutdown(): Promise<void> {
    await this.stop();
    await this.channel.close();
    await this.store.close();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private halt(error: FatalStoreError): void {
    if (this.status === 'halted') return;
    this.status = 'halted';
    this.fatal = error;
    log.error({ error: error.message }, 'Store failure, halting all workers');
    this.triggers.close();
    this.halting = Promise.all(Array.from(this.workers.values(), (worker) => worker.stop())).then(
      () => undefined
    );
    this.emit('halted', error);
  }

  private rejected(
    result: Extract<WriteResult, { ok: false }>,
    context: Record<string, unknown>
  ): WriteResult {
    if (result.error instanceof FatalStoreError) {
      this.halt(result.error);
    } else {
      log.warn({ ...context, error: result.error.message }, 'Field report rejected');
    }
    return result;
  }

  private isQuiet(): boolean {
    if (this.triggers.size > 0 || this.channel.pendingCount() > 0) return false;
    for (const worker of this.workers.values()) {
      if (!worker.isQuiet()) return false;
    }
    return true;
  }

  /**
   * Changes whenever a worker finishes a stimulus or a message is published.
   */
  private activityEpoch(): number {
    let handled = 0;
    for (const worker of this.workers.values()) handled += worker.handled;
    return handled + this.channel.stats().published;
  }

  private workerEvents(): WorkerEvent[] {
    return Array.from(this.workers.values())
      .flatMap((worker) => worker.events())
      .sort((a, b) => a.timestamp - b.timestamp);
  }
}
