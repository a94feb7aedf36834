/**
 * Mutation Planner
 *
 * Pure function from (transaction view, actor, mutation) to the row changes
 * and commit expectations that realize it. Same shape as a reducer: nothing
 * here touches a backend, so the store can re-plan a stale write against a
 * fresher view without side effects.
 */

import type { Resource, Operation } from '../authority/grants';
import type { GrantRequirement } from '../authority/guard';
import { clampConfidence } from '../domain/geo';
import type { Mutation, MutationKind, ValidMutation } from '../domain/schemas';
import type {
  Actor,
  Asset,
  CoverageGap,
  ObservationRecord,
  Plan,
  Task,
  TrackedEntity,
} from '../domain/types';
import { ConflictError, ValidationError } from '../errors';
import { rowOf } from './tables';
import type { ContextTables, Expectation, RowChange } from './types';

// ============================================================================
// Types
// ============================================================================

export interface PlanningContext {
  now: number;
  newId: (prefix: string) => string;
}

export interface MutationPlan {
  resource: Resource;
  target: string | null;
  changes: RowChange[];
  expectations: Expectation[];
  before: string | null;
  after: string | null;
  /** Revision of the target row after commit */
  revision: number | null;
}

// ============================================================================
// Authority requirements
// ============================================================================

const PRIMARY_GRANT: Readonly<Record<MutationKind, GrantRequirement>> = {
  'asset.register': { resource: 'asset', operation: 'create' },
  'asset.telemetry': { resource: 'asset', operation: 'update' },
  'asset.assign': { resource: 'asset.current_task', operation: 'update' },
  'observation.append': { resource: 'observation', operation: 'create' },
  'entity.create': { resource: 'tracked_entity', operation: 'create' },
  'entity.update': { resource: 'tracked_entity', operation: 'update' },
  'coverage.replace': { resource: 'coverage_gap', operation: 'update' },
  'plan.draft': { resource: 'plan', operation: 'create' },
  'plan.revise': { resource: 'plan', operation: 'revise' },
  'task.create': { resource: 'task', operation: 'create' },
  'task.update': { resource: 'task', operation: 'update' },
};

/**
 * Grants an actor needs for a mutation. Evaluated on the unvalidated input,
 * so defaults are resolved here the same way the schema resolves them.
 */
export function requiredGrants(mutation: Mutation): GrantRequirement[] {
  const primary = PRIMARY_GRANT[mutation.kind];
  if (mutation.kind === 'task.create' && mutation.assignAsset !== false) {
    const secondary: { resource: Resource; operation: Operation } = {
      resource: 'asset.current_task',
      operation: 'update',
    };
    return [primary, secondary];
  }
  return [primary];
}

const TARGET_PATHS: Readonly<Record<MutationKind, readonly string[] | null>> = {
  'asset.register': ['asset', 'id'],
  'asset.telemetry': ['assetId'],
  'asset.assign': ['assetId'],
  'observation.append': ['observation', 'id'],
  'entity.create': ['entity', 'id'],
  'entity.update': ['entityId'],
  'coverage.replace': null,
  'plan.draft': ['plan', 'id'],
  'plan.revise': ['plan', 'id'],
  'task.create': ['task', 'id'],
  'task.update': ['taskId'],
};

/**
 * Best-effort target id from the raw mutation, used when a write is rejected
 * before planning. The input may not match its schema, so every step of the
 * path is checked.
 */
export function targetOf(mutation: Mutation): string | null {
  const path = TARGET_PATHS[mutation.kind];
  if (!path) return null;
  let value: unknown = mutation;
  for (const key of path) {
    if (value === null || typeof value !== 'object' || !Object.hasOwn(value, key)) return null;
    value = Reflect.get(value, key);
  }
  return typeof value === 'string' ? value : null;
}

/**
 * True when the caller pinned the write to a revision it read; a stale write
 * is then reported rather than silently re-planned.
 */
export function hasCallerExpectation(mutation: ValidMutation): boolean {
  switch (mutation.kind) {
    case 'plan.revise':
      return true;
    case 'asset.telemetry':
    case 'asset.assign':
    case 'entity.update':
    case 'task.update':
      return mutation.expectedRevision !== undefined;
    default:
      return false;
  }
}

// ============================================================================
// Summaries
// ============================================================================

export function summarizeAsset(asset: Asset): string {
  return `asset ${asset.id} r${asset.revision} status=${asset.status} fuel=${asset.fuelPercent} assignment=${asset.assignment ?? 'none'} task=${asset.currentTask ?? 'none'}`;
}

function summarizeObservation(record: ObservationRecord): string {
  return `observation ${record.id} ${record.detection.type}@${record.area} conf=${record.confidence}`;
}

function summarizeEntity(entity: TrackedEntity): string {
  return `entity ${entity.id} r${entity.revision} ${entity.type}@${entity.area} conf=${entity.confidence}`;
}

function summarizeGaps(gaps: readonly CoverageGap[]): string {
  if (gaps.length === 0) return 'coverage gaps: none';
  return `coverage gaps: ${gaps.map((gap) => `${gap.area}(${gap.priority})`).join(', ')}`;
}

function summarizePlan(plan: Plan): string {
  return `plan ${plan.id} v${plan.version} ${plan.status} assignments=${plan.assignments.length}`;
}

function summarizeTask(task: Task): string {
  return `task ${task.id} r${task.revision} ${task.type} asset=${task.assetId} area=${task.targetArea} status=${task.status}`;
}

// ============================================================================
// Helpers
// ============================================================================

function requireRow<R>(row: R | undefined, what: string, id: string): R {
  if (row === undefined) throw new ValidationError(`Unknown ${what} '${id}'`);
  return row;
}

function checkRevision(
  expected: number | undefined,
  actual: number,
  what: string,
  id: string
): void {
  if (expected !== undefined && expected !== actual) {
    throw new ConflictError(`${what} ${id} is at r${actual}, write expected r${expected}`, id);
  }
}

function absent(table: RowChange['table'], id: string): Expectation {
  return { kind: 'row', table, id, revision: null };
}

function at(table: RowChange['table'], id: string, revision: number): Expectation {
  return { kind: 'row', table, id, revision };
}

function activePlan(view: ContextTables): Plan | null {
  return Object.values(view.plans).find((plan) => plan.status === 'active') ?? null;
}

function gapPriority(peakConfidence: number): CoverageGap['priority'] {
  return peakConfidence >= 0.9 ? 'high' : 'medium';
}

function sameGap(a: CoverageGap, b: Omit<CoverageGap, 'revision' | 'computedAt'>): boolean {
  return (
    a.area === b.area &&
    a.priority === b.priority &&
    a.peakConfidence === b.peakConfidence &&
    a.center.lat === b.center.lat &&
    a.center.lon === b.center.lon &&
    a.entityIds.join(',') === b.entityIds.join(',')
  );
}

function assertAssignableAssets(view: ContextTables, plan: { assignments: { assetId: string }[] }) {
  for (const assignment of plan.assignments) {
    requireRow(rowOf(view.assets, assignment.assetId), 'asset', assignment.assetId);
  }
}

// ============================================================================
// Planner
// ============================================================================

/**
 * @throws ValidationError for references to missing rows or duplicates
 * @throws ConflictError when a caller-supplied revision no longer matches
 */
export function planMutation(
  view: ContextTables,
  actor: Actor,
  mutation: ValidMutation,
  context: PlanningContext
): MutationPlan {
  const { now } = context;

  switch (mutation.kind) {
    case 'asset.register': {
      const input = mutation.asset;
      if (rowOf(view.assets, input.id)) {
        throw new ValidationError(`Asset '${input.id}' is already registered`);
      }
      const asset: Asset = {
        id: input.id,
        position: input.position,
        fuelPercent: input.fuelPercent,
        status: input.status,
        assignment: input.assignment,
        currentTask: null,
        lastUpdated: now,
        revision: 1,
      };
      return {
        resource: 'asset',
        target: asset.id,
        changes: [{ op: 'put', table: 'assets', row: asset }],
        expectations: [absent('assets', asset.id)],
        before: null,
        after: summarizeAsset(asset),
        revision: 1,
      };
    }

    case 'asset.telemetry': {
      const current = requireRow(rowOf(view.assets, mutation.assetId), 'asset', mutation.assetId);
      checkRevision(mutation.expectedRevision, current.revision, 'asset', current.id);
      const asset: Asset = {
        ...current,
        position: mutation.position ?? current.position,
        fuelPercent: mutation.fuelPercent ?? current.fuelPercent,
        status: mutation.status ?? current.status,
        lastUpdated: Math.max(now, current.lastUpdated),
        revision: current.revision + 1,
      };
      return {
        resource: 'asset',
        target: asset.id,
        changes: [{ op: 'put', table: 'assets', row: asset }],
        expectations: [at('assets', asset.id, current.revision)],
        before: summarizeAsset(current),
        after: summarizeAsset(asset),
        revision: asset.revision,
      };
    }

    case 'asset.assign': {
      const current = requireRow(rowOf(view.assets, mutation.assetId), 'asset', mutation.assetId);
      checkRevision(mutation.expectedRevision, current.revision, 'asset', current.id);
      const expectations: Expectation[] = [at('assets', current.id, current.revision)];
      let area = mutation.area ?? null;
      if (mutation.taskId !== null) {
        const task = requireRow(rowOf(view.tasks, mutation.taskId), 'task', mutation.taskId);
        if (task.assetId !== current.id) {
          throw new ValidationError(
            `Task '${task.id}' belongs to asset '${task.assetId}', not '${current.id}'`
          );
        }
        if (mutation.area === undefined) area = task.targetArea;
        expectations.push(at('tasks', task.id, task.revision));
      }
      const asset: Asset = {
        ...current,
        assignment: area,
        currentTask: mutation.taskId,
        lastUpdated: Math.max(now, current.lastUpdated),
        revision: current.revision + 1,
      };
      return {
        resource: 'asset.current_task',
        target: asset.id,
        changes: [{ op: 'put', table: 'assets', row: asset }],
        expectations,
        before: summarizeAsset(current),
        after: summarizeAsset(asset),
        revision: asset.revision,
      };
    }

    case 'observation.append': {
      const input = mutation.observation;
      const id = input.id ?? context.newId('obs');
      if (rowOf(view.observations, id)) {
        throw new ValidationError(`Observation '${id}' already exists; records are append-only`);
      }
      const record: ObservationRecord = {
        id,
        sourceId: input.sourceId,
        payloadRef: input.payloadRef,
        detection: input.detection,
        area: input.area,
        confidence: input.detection.confidence,
        producedBy: actor,
        timestamp: input.timestamp ?? now,
        revision: 1,
      };
      return {
        resource: 'observation',
        target: id,
        changes: [{ op: 'put', table: 'observations', row: record }],
        expectations: [absent('observations', id)],
        before: null,
        after: summarizeObservation(record),
        revision: 1,
      };
    }

    case 'entity.create': {
      const input = mutation.entity;
      const id = input.id ?? context.newId('ent');
      if (rowOf(view.entities, id)) {
        throw new ValidationError(`Tracked entity '${id}' already exists`);
      }
      const expectations: Expectation[] = [absent('entities', id)];
      for (const observationId of input.provenance) {
        const record = requireRow(
          rowOf(view.observations, observationId),
          'observation',
          observationId
        );
        expectations.push(at('observations', record.id, record.revision));
      }
      const entity: TrackedEntity = {
        id,
        type: input.type,
        position: input.position,
        area: input.area,
        confidence: clampConfidence(input.confidence),
        ...(input.description !== undefined ? { description: input.description } : {}),
        provenance: [...input.provenance],
        createdBy: actor,
        createdAt: now,
        updatedAt: now,
        revision: 1,
      };
      return {
        resource: 'tracked_entity',
        target: id,
        changes: [{ op: 'put', table: 'entities', row: entity }],
        expectations,
        before: null,
        after: summarizeEntity(entity),
        revision: 1,
      };
    }

    case 'entity.update': {
      const current = requireRow(
        rowOf(view.entities, mutation.entityId),
        'tracked entity',
        mutation.entityId
      );
      checkRevision(mutation.expectedRevision, current.revision, 'tracked entity', current.id);
      const { patch } = mutation;
      const provenance = [...current.provenance];
      for (const observationId of patch.addProvenance ?? []) {
        requireRow(rowOf(view.observations, observationId), 'observation', observationId);
        if (!provenance.includes(observationId)) provenance.push(observationId);
      }
      const description = patch.description ?? current.description;
      const entity: TrackedEntity = {
        ...current,
        position: patch.position ?? current.position,
        area: patch.area ?? current.area,
        confidence:
          patch.confidence !== undefined ? clampConfidence(patch.confidence) : current.confidence,
        ...(description !== undefined ? { description } : {}),
        provenance,
        updatedAt: Math.max(now, current.updatedAt),
        revision: current.revision + 1,
      };
      return {
        resource: 'tracked_entity',
        target: entity.id,
        changes: [{ op: 'put', table: 'entities', row: entity }],
        expectations: [at('entities', entity.id, current.revision)],
        before: summarizeEntity(current),
        after: summarizeEntity(entity),
        revision: entity.revision,
      };
    }

    case 'coverage.replace': {
      const changes: RowChange[] = [];
      const expectations: Expectation[] = [];
      const next: CoverageGap[] = [];
      const seen = new Set<string>();

      for (const input of mutation.gaps) {
        const id = `gap:${input.area}`;
        if (seen.has(id)) {
          throw new ValidationError(`Coverage gap for area '${input.area}' listed twice`);
        }
        seen.add(id);
        for (const entityId of input.entityIds) {
          requireRow(rowOf(view.entities, entityId), 'tracked entity', entityId);
        }
        const existing = rowOf(view.coverageGaps, id);
        const candidate = {
          id,
          area: input.area,
          center: input.center,
          entityIds: [...input.entityIds].sort(),
          peakConfidence: input.peakConfidence,
          priority: gapPriority(input.peakConfidence),
        };
        if (existing && sameGap(existing, candidate)) {
          next.push(existing);
          continue;
        }
        const gap: CoverageGap = {
          ...candidate,
          computedAt: now,
          revision: existing ? existing.revision + 1 : 1,
        };
        next.push(gap);
        changes.push({ op: 'put', table: 'coverageGaps', row: gap });
        expectations.push(
          existing ? at('coverageGaps', id, existing.revision) : absent('coverageGaps', id)
        );
      }

      const previous = Object.values(view.coverageGaps);
      for (const gap of previous) {
        if (seen.has(gap.id)) continue;
        changes.push({ op: 'delete', table: 'coverageGaps', id: gap.id });
        expectations.push(at('coverageGaps', gap.id, gap.revision));
      }

      return {
        resource: 'coverage_gap',
        target: null,
        changes,
        expectations,
        before: summarizeGaps(previous),
        after: summarizeGaps(next),
        revision: null,
      };
    }

    case 'plan.draft': {
      const input = mutation.plan;
      const id = input.id ?? context.newId('plan');
      if (rowOf(view.plans, id)) throw new ValidationError(`Plan '${id}' already exists`);
      assertAssignableAssets(view, input);
      const plan: Plan = {
        id,
        name: input.name,
        objectives: input.objectives,
        assignments: input.assignments,
        status: 'draft',
        version: 0,
        supersedes: null,
        supersededBy: null,
        createdBy: actor,
        updatedBy: actor,
        createdAt: now,
        updatedAt: now,
        revision: 1,
      };
      return {
        resource: 'plan',
        target: id,
        changes: [{ op: 'put', table: 'plans', row: plan }],
        expectations: [absent('plans', id)],
        before: null,
        after: summarizePlan(plan),
        revision: 1,
      };
    }

    case 'plan.revise': {
      const input = mutation.plan;
      const active = activePlan(view);
      const activeVersion = active ? active.version : null;
      if (activeVersion !== mutation.basedOnVersion) {
        throw new ConflictError(
          `Active plan is ${activeVersion === null ? 'absent' : `v${activeVersion}`}, revision was based on ${
            mutation.basedOnVersion === null ? 'none' : `v${mutation.basedOnVersion}`
          }`,
          active?.id
        );
      }
      const id = input.id ?? context.newId('plan');
      if (rowOf(view.plans, id)) throw new ValidationError(`Plan '${id}' already exists`);
      assertAssignableAssets(view, input);

      const version =
        Object.values(view.plans).reduce((max, plan) => Math.max(max, plan.version), 0) + 1;
      const plan: Plan = {
        id,
        name: input.name,
        objectives: input.objectives,
        assignments: input.assignments,
        status: 'active',
        version,
        supersedes: active ? active.id : null,
        supersededBy: null,
        createdBy: actor,
        updatedBy: actor,
        createdAt: now,
        updatedAt: now,
        revision: 1,
      };
      const changes: RowChange[] = [{ op: 'put', table: 'plans', row: plan }];
      const expectations: Expectation[] = [
        { kind: 'active-plan', planId: active ? active.id : null },
        absent('plans', id),
      ];
      if (active) {
        changes.push({
          op: 'put',
          table: 'plans',
          row: {
            ...active,
            status: 'superseded',
            supersededBy: id,
            updatedBy: actor,
            updatedAt: Math.max(now, active.updatedAt),
            revision: active.revision + 1,
          },
        });
        expectations.push(at('plans', active.id, active.revision));
      }
      return {
        resource: 'plan',
        target: id,
        changes,
        expectations,
        before: active ? summarizePlan(active) : null,
        after: summarizePlan(plan),
        revision: 1,
      };
    }

    case 'task.create': {
      const input = mutation.task;
      const asset = requireRow(rowOf(view.assets, input.assetId), 'asset', input.assetId);
      const plan = requireRow(rowOf(view.plans, input.planId), 'plan', input.planId);
      if (plan.status === 'superseded') {
        throw new ConflictError(`Plan ${plan.id} was superseded by ${plan.supersededBy ?? 'a newer plan'}`, plan.id);
      }
      if (plan.status !== 'active') {
        throw new ValidationError(`Plan '${plan.id}' is a draft; tasks need an active plan`);
      }
      if (asset.status === 'offline') {
        throw new ValidationError(`Asset '${asset.id}' is offline`);
      }
      const id = input.id ?? context.newId('task');
      if (rowOf(view.tasks, id)) throw new ValidationError(`Task '${id}' already exists`);

      const task: Task = {
        id,
        assetId: asset.id,
        planId: plan.id,
        type: input.type,
        targetArea: input.targetArea,
        priority: input.priority,
        status: 'queued',
        createdBy: actor,
        createdAt: now,
        updatedAt: now,
        revision: 1,
      };
      const changes: RowChange[] = [{ op: 'put', table: 'tasks', row: task }];
      const expectations: Expectation[] = [
        absent('tasks', id),
        at('plans', plan.id, plan.revision),
        at('assets', asset.id, asset.revision),
      ];
      let before: string | null = null;
      let after = summarizeTask(task);
      if (mutation.assignAsset) {
        const assigned: Asset = {
          ...asset,
          assignment: task.targetArea,
          currentTask: task.id,
          lastUpdated: Math.max(now, asset.lastUpdated),
          revision: asset.revision + 1,
        };
        changes.push({ op: 'put', table: 'assets', row: assigned });
        before = summarizeAsset(asset);
        after = `${after}; ${summarizeAsset(assigned)}`;
      }
      return {
        resource: 'task',
        target: id,
        changes,
        expectations,
        before,
        after,
        revision: 1,
      };
    }

    case 'task.update': {
      const current = requireRow(rowOf(view.tasks, mutation.taskId), 'task', mutation.taskId);
      checkRevision(mutation.expectedRevision, current.revision, 'task', current.id);
      if (current.status === 'failed' && mutation.status !== 'failed') {
        throw new ValidationError(`Task '${current.id}' has failed and cannot move to ${mutation.status}`);
      }
      const task: Task = {
        ...current,
        status: mutation.status,
        updatedAt: Math.max(now, current.updatedAt),
        revision: current.revision + 1,
      };
      return {
        resource: 'task',
        target: task.id,
        changes: [{ op: 'put', table: 'tasks', row: task }],
        expectations: [at('tasks', task.id, current.revision)],
        before: summarizeTask(current),
        after: summarizeTask(task),
        revision: task.revision,
      };
    }
  }
}
