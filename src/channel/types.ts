/**
 * Message Channel Types
 */

import type { Actor, Role } from '../domain/types';

export const TOPICS = [
  'observation.recorded',
  'picture.updated',
  'plan.revised',
  'task.dispatched',
  // External status reports, published by the system actor
  'task.status',
  'asset.status',
  'asset.alert',
] as const;

export type Topic = (typeof TOPICS)[number];

export type MessagePayload = Readonly<Record<string, unknown>>;

/**
 * Immutable once published.
 */
export interface Message {
  id: string;
  topic: Topic;
  sender: Actor;
  /** When present, delivered only to these roles and not by topic */
  targets?: readonly Role[];
  payload: MessagePayload;
  timestamp: number;
  /** Id of the message or trigger that caused this one */
  causationId?: string;
}

export interface PublishInput {
  topic: Topic;
  sender: Actor;
  targets?: readonly Role[];
  payload?: MessagePayload;
  causationId?: string;
}

export type BackpressurePolicy = 'block' | 'drop-oldest';

export interface SubscribeOptions {
  /** Maximum queued messages; unbounded when omitted */
  bound?: number;
  policy?: BackpressurePolicy;
}

export interface HistoryFilter {
  topic?: Topic;
  /** Inclusive lower bound on timestamp */
  since?: number;
  /** Most recent N; 0 yields nothing */
  limit?: number;
}

export interface ChannelStats {
  published: number;
  delivered: number;
  dropped: number;
  pending: number;
  subscribers: number;
}
