/**
 * Static description of each role: what wakes it, what it announces, and how
 * a reasoner should think about its job.
 */

import type { Topic } from '../channel/types';
import type { OperatingMode, Role } from '../domain/types';

export interface RoleProfile {
  role: Role;
  title: string;
  /** Topics delivered to this role's inbound queue */
  subscribes: readonly Topic[];
  /** Topics announced after a successful decision */
  publishes: readonly Topic[];
  /** Observe alone receives external triggers */
  acceptsTriggers: boolean;
  responsibilities: string;
}

export const ROLE_PROFILES: Readonly<Record<Role, RoleProfile>> = {
  observe: {
    role: 'observe',
    title: 'Observer',
    subscribes: [],
    publishes: ['observation.recorded'],
    acceptsTriggers: true,
    responsibilities:
      'Turn each detection in an incoming trigger into one observation record. Do not interpret or filter.',
  },
  orient: {
    role: 'orient',
    title: 'Analyst',
    subscribes: ['observation.recorded', 'task.dispatched'],
    publishes: ['picture.updated'],
    acceptsTriggers: false,
    responsibilities:
      'Fuse new observations into tracked entities, refine confidence, and recompute coverage gaps for areas nobody covers.',
  },
  decide: {
    role: 'decide',
    title: 'Planner',
    subscribes: ['picture.updated', 'asset.alert'],
    publishes: ['plan.revised'],
    acceptsTriggers: false,
    responsibilities:
      'Revise the active plan so every coverage gap has an available asset assigned, keeping existing assignments.',
  },
  act: {
    role: 'act',
    title: 'Executor',
    subscribes: ['plan.revised', 'task.status', 'asset.status'],
    publishes: ['task.dispatched', 'asset.alert'],
    acceptsTriggers: false,
    responsibilities:
      'Create and dispatch a task for every plan assignment whose asset is not yet on it, including one whose task failed. Raise a low_fuel alert for assets reporting fuel below the alert threshold.',
  },
};

/**
 * Tone only. Modes never change what a role is allowed or expected to do.
 */
export const MODE_STYLES: Readonly<Record<OperatingMode, string>> = {
  casual: 'Keep the rationale short and conversational.',
  professional: 'Write the rationale as a brief, formal operations note.',
  relaxed: 'Keep the rationale calm and unhurried; one or two sentences.',
};
