import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MessageChannel } from './message-channel';
import { MessageJournal } from './journal';
import type { Message } from './types';
import { ChannelClosedError, ChannelSealedError } from '../errors';

describe('MessageChannel', () => {
  let channel: MessageChannel;

  beforeEach(() => {
    channel = new MessageChannel({ clock: () => 42 });
  });

  afterEach(async () => {
    await channel.close();
  });

  describe('publish', () => {
    it('delivers to topic subscribers in publish order', async () => {
      const orient = channel.subscribe('orient', ['observation.recorded']);
      const decide = channel.subscribe('decide', ['picture.updated']);

      const first = await channel.publish({ topic: 'observation.recorded', sender: 'observe', payload: { n: 1 } });
      const second = await channel.publish({ topic: 'observation.recorded', sender: 'observe', payload: { n: 2 } });

      expect(orient.tryTake()).toBe(first);
      expect(orient.tryTake()).toBe(second);
      expect(decide.size).toBe(0);
    });

    it('never delivers a message back to its sender', async () => {
      const orient = channel.subscribe('orient', ['picture.updated']);

      await channel.publish({ topic: 'picture.updated', sender: 'orient' });

      expect(orient.size).toBe(0);
    });

    it('routes targeted messages only to their targets', async () => {
      const orient = channel.subscribe('orient', ['observation.recorded']);
      const decide = channel.subscribe('decide', []);

      await channel.publish({ topic: 'observation.recorded', sender: 'observe', targets: ['decide'] });

      expect(orient.size).toBe(0);
      expect(decide.size).toBe(1);
    });

    it('produces frozen messages stamped by the clock', async () => {
      const message = await channel.publish({
        topic: 'plan.revised',
        sender: 'decide',
        payload: { basedOnVersion: 1 },
        causationId: 'msg_cause',
      });

      expect(message).toMatchObject({
        topic: 'plan.revised',
        sender: 'decide',
        payload: { basedOnVersion: 1 },
        timestamp: 42,
        causationId: 'msg_cause',
      });
      expect(message.id).toMatch(/^msg_/);
      expect(Object.isFrozen(message)).toBe(true);
      expect(Object.isFrozen(message.payload)).toBe(true);
    });

    it('detaches the payload from the publisher and freezes it all the way down', async () => {
      const orient = channel.subscribe('orient', ['observation.recorded']);
      const ids = ['obs-1'];

      await channel.publish({ topic: 'observation.recorded', sender: 'observe', payload: { ids } });
      ids.push('obs-2');

      const received = orient.tryTake()?.payload.ids;
      expect(received).toEqual(['obs-1']);
      expect(Object.isFrozen(received)).toBe(true);
      if (!Array.isArray(received)) return;
      expect(() => received.push('obs-3')).toThrow(TypeError);
      expect(channel.history()[0].payload.ids).toEqual(['obs-1']);
    });

    it('emits published', async () => {
      const listener = vi.fn<(message: Message) => void>();
      channel.on('published', listener);

      const message = await channel.publish({ topic: 'task.dispatched', sender: 'act' });

      expect(listener).toHaveBeenCalledWith(message);
    });

    it('waits on a full blocking subscriber', async () => {
      const act = channel.subscribe('act', ['plan.revised'], { bound: 1 });
      await channel.publish({ topic: 'plan.revised', sender: 'decide', payload: { v: 1 } });

      let settled = false;
      const pending = channel
        .publish({ topic: 'plan.revised', sender: 'decide', payload: { v: 2 } })
        .then(() => {
          settled = true;
        });
      await Promise.resolve();
      expect(settled).toBe(false);
      expect(channel.pendingCount()).toBe(2);

      expect(act.tryTake()?.payload).toEqual({ v: 1 });
      await pending;
      expect(settled).toBe(true);
    });

    it('rejects after close', async () => {
      await channel.close();

      await expect(channel.publish({ topic: 'plan.revised', sender: 'decide' })).rejects.toBeInstanceOf(
        ChannelClosedError
      );
    });
  });

  describe('subscribe', () => {
    it('allows one subscription per role', () => {
      channel.subscribe('orient', ['observation.recorded']);

      expect(() => channel.subscribe('orient', ['picture.updated'])).toThrow(
        'Role orient already has a subscription'
      );
    });

    it('is fixed once sealed', () => {
      channel.seal();

      expect(() => channel.subscribe('orient', [])).toThrow(ChannelSealedError);
      expect(() => channel.unsubscribe('orient')).toThrow('Cannot unsubscribe after the channel is sealed');
      expect(channel.isSealed).toBe(true);
    });

    it('applies the default options to subscriptions without their own', async () => {
      const bounded = new MessageChannel({ defaultSubscribeOptions: { bound: 1, policy: 'drop-oldest' } });
      const queue = bounded.subscribe('orient', ['observation.recorded']);

      await bounded.publish({ topic: 'observation.recorded', sender: 'observe', payload: { n: 1 } });
      await bounded.publish({ topic: 'observation.recorded', sender: 'observe', payload: { n: 2 } });

      expect(queue.tryTake()?.payload).toEqual({ n: 2 });
      expect(bounded.stats()).toEqual({ published: 2, delivered: 2, dropped: 1, pending: 0, subscribers: 1 });
      await bounded.close();
    });
  });

  describe('history', () => {
    it('keeps the most recent messages up to the limit', async () => {
      const short = new MessageChannel({ historyLimit: 2 });
      await short.publish({ topic: 'observation.recorded', sender: 'observe', payload: { n: 1 } });
      await short.publish({ topic: 'picture.updated', sender: 'orient', payload: { n: 2 } });
      await short.publish({ topic: 'observation.recorded', sender: 'observe', payload: { n: 3 } });

      expect(short.history().map((message) => message.payload.n)).toEqual([2, 3]);
      expect(short.history({ topic: 'observation.recorded' }).map((message) => message.payload.n)).toEqual([3]);
      expect(short.history({ limit: 1 }).map((message) => message.payload.n)).toEqual([3]);
      expect(short.history({ limit: 0 })).toEqual([]);
      await short.close();
    });
  });

  describe('journal', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'cop-channel-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('records every published message', async () => {
      const journal = new MessageJournal({ path: join(dir, 'messages.jsonl') });
      const journaled = new MessageChannel({ journal, clock: () => 7 });

      const first = await journaled.publish({ topic: 'observation.recorded', sender: 'observe', payload: { n: 1 } });
      const second = await journaled.publish({ topic: 'picture.updated', sender: 'orient', payload: { n: 2 } });
      await journaled.close();

      expect(await journal.readAll()).toEqual([first, second]);
    });
  });
});
