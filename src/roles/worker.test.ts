import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AuthorityGuard } from '../authority/guard';
import { MessageChannel } from '../channel/message-channel';
import { InboundQueue } from '../channel/queue';
import { MemoryBackend } from '../context/memory-backend';
import { ContextStore } from '../context/store';
import { DEFAULT_AREAS, getDefaultConfig } from '../config/types';
import type { Trigger } from '../domain/types';
import { TransientCollaboratorError } from '../errors';
import { RuleBasedReasoner } from '../reasoning/rule-based';
import type { Reasoner } from '../reasoning/types';
import { RoleWorker, type RoleWorkerConfig, type WorkerEvent } from './worker';

const trigger: Trigger = {
  id: 'T1',
  sourceAssetId: 'UAV-002',
  timestamp: 500,
  position: { lat: 34.08, lon: -118.3 },
  detections: [{ type: 'truck', position: { lat: 34.1015, lon: -118.2012 }, confidence: 0.88 }],
};

const FAST = { deadlineMs: 1000, maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

function scripted(decide: Reasoner['decide']): Reasoner {
  return { name: 'scripted', decide };
}

describe('RoleWorker', () => {
  let store: ContextStore;
  let channel: MessageChannel;
  let triggers: InboundQueue<Trigger>;
  const workers: RoleWorker[] = [];

  function observeWorker(reasoner: Reasoner, overrides: Partial<RoleWorkerConfig> = {}): RoleWorker {
    const worker = new RoleWorker({
      role: 'observe',
      store,
      channel,
      reasoner,
      triggers,
      reasoning: FAST,
      ...overrides,
    });
    workers.push(worker);
    return worker;
  }

  beforeEach(() => {
    store = new ContextStore(new MemoryBackend(), new AuthorityGuard(), { clock: () => 1000 });
    channel = new MessageChannel({ clock: () => 1000 });
    triggers = new InboundQueue<Trigger>('triggers');
  });

  afterEach(async () => {
    await Promise.all(workers.splice(0).map((worker) => worker.stop()));
    await channel.close();
    await store.close();
  });

  describe('handling', () => {
    it('writes the decision and announces it with the write receipts', async () => {
      const orient = channel.subscribe('orient', ['observation.recorded']);
      const worker = observeWorker(
        new RuleBasedReasoner({ analysis: getDefaultConfig().analysis, areas: DEFAULT_AREAS })
      );
      worker.start();

      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.handled).toBe(1));

      expect((await store.read()).observations.map((record) => record.id)).toEqual(['obs_T1_0']);
      const message = orient.tryTake();
      expect(message).toMatchObject({
        topic: 'observation.recorded',
        sender: 'observe',
        causationId: 'T1',
        payload: {
          triggerId: 'T1',
          observationIds: ['obs_T1_0'],
          writes: [{ operation: 'observation.append', target: 'obs_T1_0', seq: 1 }],
        },
      });
      expect(worker.events()).toEqual([]);
    });

    it('passes the operating mode to the reasoner', async () => {
      const decide = vi.fn<Reasoner['decide']>().mockResolvedValue({});
      const worker = observeWorker(scripted(decide), { mode: 'casual' });
      worker.setMode('relaxed');
      worker.start();

      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.handled).toBe(1));

      expect(decide.mock.calls[0][0]).toMatchObject({ role: 'observe', mode: 'relaxed', attempt: 1 });
      expect(worker.operatingMode).toBe('relaxed');
    });

    it('returns to idle and reports quiet once drained', async () => {
      const worker = observeWorker(scripted(async () => ({})));
      worker.start();

      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.handled).toBe(1));

      expect(worker.state).toBe('idle');
      expect(worker.isQuiet()).toBe(true);
    });
  });

  describe('reasoning failures', () => {
    it('retries a transient failure', async () => {
      const decide = vi
        .fn<Reasoner['decide']>()
        .mockRejectedValueOnce(new TransientCollaboratorError('endpoint busy'))
        .mockResolvedValue({ messages: [{ topic: 'observation.recorded' }] });
      const worker = observeWorker(scripted(decide));
      worker.start();

      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.handled).toBe(1));

      expect(decide.mock.calls.map(([request]) => request.attempt)).toEqual([1, 2]);
      expect(channel.history()).toHaveLength(1);
      expect(worker.events()).toEqual([]);
    });

    it('reports reasoning that keeps failing', async () => {
      const decide = vi.fn<Reasoner['decide']>().mockRejectedValue(new TransientCollaboratorError('endpoint busy'));
      const worker = observeWorker(scripted(decide), { reasoning: { ...FAST, maxAttempts: 2 } });
      worker.start();

      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.handled).toBe(1));

      const [event] = worker.events();
      expect(event).toMatchObject({
        role: 'observe',
        type: 'reasoning.failed',
        reason: 'endpoint busy',
        data: { causationId: 'T1', calls: 2 },
      });
      expect(channel.history()).toEqual([]);
      expect(await store.auditCount()).toBe(0);
    });

    it('does not retry a failure that is not transient', async () => {
      const decide = vi.fn<Reasoner['decide']>().mockRejectedValue(new TypeError('bad prompt'));
      const worker = observeWorker(scripted(decide));
      worker.start();

      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.handled).toBe(1));

      expect(decide).toHaveBeenCalledTimes(1);
      expect(worker.events()[0].reason).toBe('bad prompt');
    });

    it('gives up on a call that outlives its deadline', async () => {
      const worker = observeWorker(
        scripted(() => new Promise<unknown>(() => undefined)),
        { reasoning: { ...FAST, deadlineMs: 20, maxAttempts: 1 } }
      );
      worker.start();

      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.handled).toBe(1));

      expect(worker.events()[0]).toMatchObject({
        type: 'reasoning.failed',
        reason: 'Reasoning exceeded 20ms deadline',
      });
    });

    it('rejects a decision that breaks the contract', async () => {
      const worker = observeWorker(scripted(async () => ({ mutations: 'all of them' })));
      const seen: WorkerEvent[] = [];
      worker.on('worker-event', (event: WorkerEvent) => seen.push(event));
      worker.start();

      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.handled).toBe(1));

      expect(seen.map((event) => [event.type, event.reason])).toEqual([
        ['decision.invalid', 'Decision does not match the reasoning contract'],
      ]);
      expect(channel.history()).toEqual([]);
    });
  });

  describe('writes', () => {
    it('reports a denied write and stays silent', async () => {
      const inbound = channel.subscribe('orient', ['observation.recorded']);
      const worker = new RoleWorker({
        role: 'orient',
        store,
        channel,
        inbound,
        reasoning: FAST,
        reasoner: scripted(async () => ({
          mutations: [
            {
              kind: 'task.create',
              task: { assetId: 'UAV-1', planId: 'P1', type: 'tracking', targetArea: 'Area Alpha', priority: 5 },
            },
          ],
          messages: [{ topic: 'picture.updated' }],
        })),
      });
      workers.push(worker);
      worker.start();

      await channel.publish({ topic: 'observation.recorded', sender: 'observe' });
      await vi.waitFor(() => expect(worker.handled).toBe(1));

      expect(worker.events()[0]).toMatchObject({
        type: 'write.rejected',
        reason: "Actor 'orient' lacks authority: task:create",
        data: { operation: 'task.create', code: 'AUTHORIZATION' },
      });
      expect(channel.history({ topic: 'picture.updated' })).toEqual([]);
      expect((await store.read()).tasks).toEqual([]);
    });

    describe('conflicts', () => {
      beforeEach(async () => {
        await store.write('system', {
          kind: 'asset.register',
          asset: { id: 'UAV-1', position: { lat: 34, lon: -118 }, fuelPercent: 80 },
        });
        await store.write('system', {
          kind: 'plan.revise',
          basedOnVersion: null,
          plan: { id: 'P1', name: 'first', assignments: [] },
        });
      });

      function decideWorker(decide: Reasoner['decide'], maxConflictRetries = 2): RoleWorker {
        const worker = new RoleWorker({
          role: 'decide',
          store,
          channel,
          inbound: channel.subscribe('decide', ['picture.updated']),
          reasoner: scripted(decide),
          reasoning: FAST,
          maxConflictRetries,
        });
        workers.push(worker);
        return worker;
      }

      it('re-reads and re-reasons after losing a race', async () => {
        const act = channel.subscribe('act', ['plan.revised']);
        const decide = vi.fn<Reasoner['decide']>(async (request) => ({
          mutations: [
            {
              kind: 'plan.revise',
              basedOnVersion: request.attempt === 1 ? 0 : 1,
              plan: { name: 'next', assignments: [] },
            },
          ],
          messages: [{ topic: 'plan.revised' }],
        }));
        const worker = decideWorker(decide);
        worker.start();

        await channel.publish({ topic: 'picture.updated', sender: 'orient' });
        await vi.waitFor(() => expect(worker.handled).toBe(1));

        expect(decide).toHaveBeenCalledTimes(2);
        expect(act.tryTake()?.payload).toMatchObject({ writes: [{ operation: 'plan.revise', seq: 4 }] });
        expect(worker.events()).toEqual([]);
      });

      it('announces writes committed before a lost race', async () => {
        const act = channel.subscribe('act', ['plan.revised']);
        const decide = vi.fn<Reasoner['decide']>(async (request) =>
          request.attempt === 1
            ? {
                mutations: [
                  { kind: 'plan.draft', plan: { id: 'D1', name: 'draft', assignments: [] } },
                  { kind: 'plan.revise', basedOnVersion: 0, plan: { name: 'next', assignments: [] } },
                ],
                messages: [{ topic: 'plan.revised' }],
              }
            : { mutations: [], messages: [{ topic: 'plan.revised' }] }
        );
        const worker = decideWorker(decide);
        worker.start();

        await channel.publish({ topic: 'picture.updated', sender: 'orient' });
        await vi.waitFor(() => expect(worker.handled).toBe(1));

        expect(decide).toHaveBeenCalledTimes(2);
        expect(act.tryTake()?.payload).toEqual({
          writes: [{ operation: 'plan.draft', target: 'D1', seq: 3 }],
        });
      });

      it('reports a conflict that outlasts its retries', async () => {
        const decide = vi.fn<Reasoner['decide']>().mockResolvedValue({
          mutations: [{ kind: 'plan.revise', basedOnVersion: 0, plan: { name: 'next', assignments: [] } }],
        });
        const worker = decideWorker(decide, 2);
        worker.start();

        await channel.publish({ topic: 'picture.updated', sender: 'orient' });
        await vi.waitFor(() => expect(worker.handled).toBe(1));

        expect(decide).toHaveBeenCalledTimes(3);
        expect(worker.events()[0]).toMatchObject({
          type: 'write.conflict',
          reason: 'Active plan is v1, revision was based on v0',
          data: { rounds: 3 },
        });
      });
    });
  });

  describe('lifecycle', () => {
    it('stops promptly while waiting for work', async () => {
      const worker = observeWorker(scripted(async () => ({})));
      worker.start();

      await worker.stop();

      expect(worker.state).toBe('stopped');
      expect(worker.isQuiet()).toBe(false);
    });

    it('stops while a reasoning call is in flight', async () => {
      const worker = observeWorker(
        scripted((_request, options) =>
          new Promise<unknown>((_, reject) => {
            options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
        ),
        { reasoning: { ...FAST, deadlineMs: 60_000 } }
      );
      worker.start();
      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.state).toBe('reasoning'));

      await worker.stop();

      expect(worker.state).toBe('stopped');
      expect(worker.events()).toEqual([]);
    });

    it('exits once its sources close', async () => {
      const worker = observeWorker(scripted(async () => ({})));
      worker.start();

      triggers.close();

      await vi.waitFor(() => expect(worker.state).toBe('stopped'));
    });

    it('halts on a store failure', async () => {
      const worker = observeWorker(scripted(async () => ({})));
      const fatal = vi.fn<(error: Error) => void>();
      worker.on('fatal', fatal);
      worker.start();
      await store.close();

      await triggers.put(trigger);
      await vi.waitFor(() => expect(worker.state).toBe('stopped'));

      expect(fatal).toHaveBeenCalledTimes(1);
      expect(worker.events()[0]).toMatchObject({ type: 'store.fatal', reason: 'Context store is closed' });
    });
  });
});
