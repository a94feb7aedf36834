/**
 * Static authority table.
 *
 * Loaded once; AuthorityGuard freezes it at construction and nothing mutates
 * it afterwards.
 */

import type { Actor } from '../domain/types';

// ============================================================================
// Configuration
// ============================================================================

export const RESOURCES = [
  'raw_input',
  'observation',
  'tracked_entity',
  'coverage_gap',
  'asset',
  'asset.current_task',
  'plan',
  'task',
] as const;

export type Resource = (typeof RESOURCES)[number];

export const OPERATIONS = ['read', 'create', 'update', 'revise'] as const;

export type Operation = (typeof OPERATIONS)[number];

/**
 * `own` limits a read grant to rows the actor produced itself.
 */
export type GrantScope = 'all' | 'own';

export interface AuthorityGrant {
  resource: Resource;
  operation: Operation;
  scope?: GrantScope;
}

export type GrantTable = Readonly<Record<Actor, readonly AuthorityGrant[]>>;

const grant = (resource: Resource, ...operations: Operation[]): AuthorityGrant[] =>
  operations.map((operation) => ({ resource, operation }));

const everything = (): AuthorityGrant[] =>
  RESOURCES.flatMap((resource) => grant(resource, ...OPERATIONS));

export const DEFAULT_GRANTS: GrantTable = {
  observe: [
    ...grant('raw_input', 'read'),
    ...grant('observation', 'create'),
    { resource: 'observation', operation: 'read', scope: 'own' },
  ],
  orient: [
    ...grant('tracked_entity', 'create', 'update', 'read'),
    ...grant('coverage_gap', 'update', 'read'),
    ...grant('observation', 'read'),
    ...grant('asset', 'read'),
  ],
  decide: [
    ...grant('plan', 'create', 'revise', 'read'),
    ...grant('tracked_entity', 'read'),
    ...grant('coverage_gap', 'read'),
    ...grant('asset', 'read'),
  ],
  act: [
    ...grant('task', 'create', 'update', 'read'),
    ...grant('asset.current_task', 'update'),
    ...grant('plan', 'read'),
    ...grant('asset', 'read'),
  ],
  // Privileged seeding actor
  system: everything(),
};
