/**
 * Message Channel
 *
 * In-process publish/subscribe between role workers. `publish` fans out to
 * every matching queue before it yields, so two messages on one topic reach
 * each subscriber in publish order. Subscriptions are fixed once the channel
 * is sealed.
 */

import { EventEmitter } from 'node:events';
import type { Actor, Role } from '../domain/types';
import { ChannelClosedError, ChannelSealedError } from '../errors';
import { deepFreeze } from '../utils/freeze';
import { generateId } from '../utils/ids';
import { createModuleLogger } from '../utils/logger';
import type { MessageJournal } from './journal';
import { InboundQueue } from './queue';
import type {
  ChannelStats,
  HistoryFilter,
  Message,
  PublishInput,
  SubscribeOptions,
  Topic,
} from './types';

const log = createModuleLogger('message-channel');

export interface MessageChannelConfig {
  /** Messages kept in history (default: 1000) */
  historyLimit?: number;
  /** Applied to subscriptions that don't pass their own */
  defaultSubscribeOptions?: SubscribeOptions;
  journal?: MessageJournal;
  clock?: () => number;
}

interface Subscription {
  role: Role;
  topics: ReadonlySet<Topic>;
  queue: InboundQueue<Message>;
}

export class MessageChannel extends EventEmitter {
  private readonly historyLimit: number;
  private readonly defaultSubscribeOptions: SubscribeOptions;
  private readonly journal: MessageJournal | undefined;
  private readonly clock: () => number;
  private readonly subscriptions = new Map<Role, Subscription>();
  private recent: Message[] = [];
  private sealed = false;
  private closed = false;
  private published = 0;
  private delivered = 0;

  constructor(config: MessageChannelConfig = {}) {
    super();
    this.historyLimit = config.historyLimit ?? 1000;
    this.defaultSubscribeOptions = config.defaultSubscribeOptions ?? {};
    this.journal = config.journal;
    this.clock = config.clock ?? Date.now;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  subscribe(role: Role, topics: readonly Topic[], options?: SubscribeOptions): InboundQueue<Message> {
    this.assertMutable('subscribe');
    if (this.subscriptions.has(role)) {
      throw new Error(`Role ${role} already has a subscription`);
    }
    const queue = new InboundQueue<Message>(role, options ?? this.defaultSubscribeOptions);
    this.subscriptions.set(role, { role, topics: new Set(topics), queue });
    log.debug({ role, topics }, 'Subscribed');
    return queue;
  }

  unsubscribe(role: Role): void {
    this.assertMutable('unsubscribe');
    const subscription = this.subscriptions.get(role);
    if (!subscription) return;
    subscription.queue.close();
    this.subscriptions.delete(role);
  }

  /**
   * Freeze wiring. Publishing is unaffected.
   */
  seal(): void {
    this.sealed = true;
  }

  async publish(input: PublishInput): Promise<Message> {
    if (this.closed) throw new ChannelClosedError('Message channel is closed');

    // Detached from the publisher's objects; nobody downstream can change it
    const message: Message = deepFreeze({
      id: generateId('msg'),
      topic: input.topic,
      sender: input.sender,
      ...(input.targets ? { targets: [...input.targets] } : {}),
      payload: structuredClone(input.payload ?? {}),
      timestamp: this.clock(),
      ...(input.causationId ? { causationId: input.causationId } : {}),
    });

    this.recent.push(message);
    if (this.recent.length > this.historyLimit) {
      this.recent = this.recent.slice(-this.historyLimit);
    }
    this.published++;

    const recipients = this.recipientsOf(message);
    // Enqueue synchronously; only the blocked puts are awaited
    const deliveries = recipients.map((subscription) => subscription.queue.put(message));
    const journaled = this.journal ? this.journal.append(message) : Promise.resolve();
    this.delivered += recipients.length;

    this.emit('published', message);
    log.debug(
      { topic: message.topic, sender: message.sender, recipients: recipients.map((s) => s.role) },
      'Published'
    );

    await Promise.all([...deliveries, journaled]);
    return message;
  }

  history(filter: HistoryFilter = {}): Message[] {
    let messages = this.recent.filter(
      (message) =>
        (filter.topic === undefined || message.topic === filter.topic) &&
        (filter.since === undefined || message.timestamp >= filter.since)
    );
    if (filter.limit !== undefined) {
      messages = filter.limit > 0 ? messages.slice(-filter.limit) : [];
    }
    return messages;
  }

  /** Messages queued or parked across every subscriber */
  pendingCount(): number {
    let pending = 0;
    for (const { queue } of this.subscriptions.values()) pending += queue.size;
    return pending;
  }

  stats(): ChannelStats {
    let dropped = 0;
    for (const { queue } of this.subscriptions.values()) dropped += queue.dropped;
    return {
      published: this.published,
      delivered: this.delivered,
      dropped,
      pending: this.pendingCount(),
      subscribers: this.subscriptions.size,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const { queue } of this.subscriptions.values()) queue.close();
    if (this.journal) await this.journal.flush();
    this.removeAllListeners();
  }

  private recipientsOf(message: Message): Subscription[] {
    const recipients: Subscription[] = [];
    for (const subscription of this.subscriptions.values()) {
      if (isSender(subscription.role, message.sender)) continue;
      const wanted = message.targets
        ? message.targets.includes(subscription.role)
        : subscription.topics.has(message.topic);
      if (wanted) recipients.push(subscription);
    }
    return recipients;
  }

  private assertMutable(operation: string): void {
    if (this.closed) throw new ChannelClosedError('Message channel is closed');
    if (this.sealed) {
      throw new ChannelSealedError(`Cannot ${operation} after the channel is sealed`);
    }
  }
}

function isSender(role: Role, sender: Actor): boolean {
  return role === sender;
}
