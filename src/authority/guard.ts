/**
 * Authority Guard
 *
 * Pure check of (actor, resource, operation) against the static grant table.
 * ContextStore consults it before every mutation and records the outcome in
 * the audit trail whichever way it goes.
 */

import type { Actor } from '../domain/types';
import {
  DEFAULT_GRANTS,
  OPERATIONS,
  RESOURCES,
  type AuthorityGrant,
  type GrantScope,
  type GrantTable,
  type Operation,
  type Resource,
} from './grants';

// ============================================================================
// Types
// ============================================================================

export type AuthorityDecision =
  | { allowed: true }
  | {
      allowed: false;
      resource: Resource;
      operation: Operation;
      reason: string;
    };

export interface GrantRequirement {
  resource: Resource;
  operation: Operation;
}

const keyOf = (resource: Resource, operation: Operation): string => `${resource}:${operation}`;

// ============================================================================
// Guard
// ============================================================================

export class AuthorityGuard {
  private readonly table: ReadonlyMap<string, ReadonlyMap<string, GrantScope>>;

  constructor(grants: GrantTable = DEFAULT_GRANTS) {
    const table = new Map<string, ReadonlyMap<string, GrantScope>>();
    for (const [actor, entries] of Object.entries(grants)) {
      const scoped = new Map<string, GrantScope>();
      for (const entry of entries) {
        scoped.set(keyOf(entry.resource, entry.operation), entry.scope ?? 'all');
      }
      table.set(actor, scoped);
    }
    this.table = table;
  }

  check(actor: Actor, resource: Resource, operation: Operation): AuthorityDecision {
    const grants = this.table.get(actor);
    if (!grants) {
      return { allowed: false, resource, operation, reason: `Unknown actor '${actor}'` };
    }
    if (!grants.has(keyOf(resource, operation))) {
      return {
        allowed: false,
        resource,
        operation,
        reason: `Actor '${actor}' lacks authority: ${resource}:${operation}`,
      };
    }
    return { allowed: true };
  }

  /**
   * All requirements must hold; the first missing grant is reported.
   */
  checkAll(actor: Actor, requirements: readonly GrantRequirement[]): AuthorityDecision {
    for (const { resource, operation } of requirements) {
      const decision = this.check(actor, resource, operation);
      if (!decision.allowed) return decision;
    }
    return { allowed: true };
  }

  /**
   * Read scope for a resource, or null when the actor may not read it.
   */
  readScope(actor: Actor, resource: Resource): GrantScope | null {
    return this.table.get(actor)?.get(keyOf(resource, 'read')) ?? null;
  }

  canRead(actor: Actor, resource: Resource): boolean {
    return this.readScope(actor, resource) !== null;
  }

  grantsFor(actor: Actor): AuthorityGrant[] {
    const grants = this.table.get(actor);
    if (!grants) return [];
    return Array.from(grants.entries()).map(([key, scope]) => {
      const separator = key.lastIndexOf(':');
      return {
        resource: parseResource(key.slice(0, separator)),
        operation: parseOperation(key.slice(separator + 1)),
        scope,
      };
    });
  }
}

function parseResource(value: string): Resource {
  const match = RESOURCE_LOOKUP.get(value);
  if (!match) throw new Error(`Unknown resource in grant table: ${value}`);
  return match;
}

function parseOperation(value: string): Operation {
  const match = OPERATION_LOOKUP.get(value);
  if (!match) throw new Error(`Unknown operation in grant table: ${value}`);
  return match;
}

const RESOURCE_LOOKUP = new Map<string, Resource>(RESOURCES.map((r) => [r, r]));
const OPERATION_LOOKUP = new Map<string, Operation>(OPERATIONS.map((o) => [o, o]));
