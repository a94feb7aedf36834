/**
 * Reasoning contract between role workers and whatever produces decisions.
 *
 * Reasoners are untrusted collaborators: they may be slow, fail, or return
 * garbage. Workers validate every decision against ReasoningDecisionSchema
 * before anything reaches the store.
 */

import { z } from 'zod';
import { TOPICS, type Message } from '../channel/types';
import type { ContextSnapshot } from '../context/types';
import { MutationSchema } from '../domain/schemas';
import { ROLES, type OperatingMode, type Role, type Trigger } from '../domain/types';

export type Stimulus =
  | { kind: 'trigger'; trigger: Trigger }
  | { kind: 'message'; message: Message };

export interface ReasoningRequest {
  role: Role;
  mode: OperatingMode;
  /** What the role may read, taken right before the call */
  excerpt: ContextSnapshot;
  stimulus: Stimulus;
  /** 1 on the first call for a stimulus; bumped by retries and conflict re-reads */
  attempt: number;
}

export const OutboundMessageSchema = z.object({
  topic: z.enum(TOPICS),
  targets: z.array(z.enum(ROLES)).optional(),
  payload: z.record(z.unknown()).default({}),
});

export const ReasoningDecisionSchema = z.object({
  mutations: z.array(MutationSchema).default([]),
  messages: z.array(OutboundMessageSchema).default([]),
  rationale: z.string().optional(),
});

export type ReasoningDecision = z.output<typeof ReasoningDecisionSchema>;
export type ReasoningDecisionInput = z.input<typeof ReasoningDecisionSchema>;

export interface ReasonOptions {
  signal?: AbortSignal;
}

export interface Reasoner {
  readonly name: string;
  /**
   * Resolves with an unvalidated decision.
   * Rejects with TransientCollaboratorError when a retry may succeed.
   */
  decide(request: ReasoningRequest, options?: ReasonOptions): Promise<unknown>;
}
