/**
 * COP Observer - read-only view over the running system
 *
 * Every query reads committed state; there is no path from here to a write.
 * Two calls with no write in between return equal values.
 */

import type { MessageChannel } from '../channel/message-channel';
import type { Message, Topic } from '../channel/types';
import { computeCoverageGaps, findActivePlan, type CoverageGapProjection } from '../context/projections';
import type { ContextStore } from '../context/store';
import type { ContextSnapshot } from '../context/types';
import type {
  Area,
  Asset,
  AuditEntry,
  CoverageGap,
  Plan,
  Role,
  Task,
  TrackedEntity,
} from '../domain/types';
import type { WorkerEvent } from '../roles/worker';

export class CopObserver {
  constructor(
    private readonly store: ContextStore,
    private readonly channel: MessageChannel,
    private readonly workerEvents: () => WorkerEvent[]
  ) {}

  getPicture(): Promise<ContextSnapshot> {
    return this.store.read();
  }

  async getActivePlan(): Promise<Plan | null> {
    const { plans } = await this.store.read({ tables: ['plans'] });
    return findActivePlan(plans);
  }

  async getPlans(): Promise<Plan[]> {
    return (await this.store.read({ tables: ['plans'] })).plans;
  }

  async getAssets(): Promise<Asset[]> {
    return (await this.store.read({ tables: ['assets'] })).assets;
  }

  async getEntities(): Promise<TrackedEntity[]> {
    return (await this.store.read({ tables: ['entities'] })).entities;
  }

  async getTasks(): Promise<Task[]> {
    return (await this.store.read({ tables: ['tasks'] })).tasks;
  }

  async getCoverageGaps(): Promise<CoverageGap[]> {
    return (await this.store.read({ tables: ['coverageGaps'] })).coverageGaps;
  }

  /**
   * Gaps as they would be computed now, independent of what Orient last wrote.
   */
  async computeCoverageGaps(
    threshold: number,
    areas: readonly Area[] = []
  ): Promise<CoverageGapProjection[]> {
    const { entities, assets } = await this.store.read({ tables: ['entities', 'assets'] });
    return computeCoverageGaps(entities, assets, threshold, areas);
  }

  /**
   * @param since - inclusive lower bound on entry timestamp
   */
  getAuditLog(since?: number): Promise<AuditEntry[]> {
    return this.store.audit(since === undefined ? {} : { since });
  }

  getAuditCount(): Promise<number> {
    return this.store.auditCount();
  }

  getMessageHistory(topic?: Topic): Message[] {
    return this.channel.history(topic === undefined ? {} : { topic });
  }

  getWorkerEvents(role?: Role): WorkerEvent[] {
    const events = this.workerEvents();
    return role === undefined ? events : events.filter((event) => event.role === role);
  }
}
