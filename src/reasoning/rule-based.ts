/**
 * RuleBasedReasoner
 *
 * Deterministic decisions for all four roles. Same excerpt and stimulus in,
 * same decision out; the default provider and the one tests run against.
 */

import type { AnalysisConfig } from '../config/types';
import { computeCoverageGaps, findActivePlan, isOpenTask } from '../context/projections';
import type { ContextSnapshot } from '../context/types';
import { distanceKm, resolveArea } from '../domain/geo';
import type { Mutation } from '../domain/schemas';
import type {
  Area,
  Asset,
  CoverageGap,
  ObservationRecord,
  PlanAssignment,
  Task,
  TaskType,
  TrackedEntity,
} from '../domain/types';
import type { Reasoner, ReasoningDecisionInput, ReasoningRequest } from './types';

export interface RuleBasedReasonerConfig {
  analysis: AnalysisConfig;
  areas: readonly Area[];
}

const EMPTY: ReasoningDecisionInput = { mutations: [], messages: [] };

interface FuelAlert {
  assetId: string;
  alertType: 'low_fuel';
  fuelPercent: number;
}

export class RuleBasedReasoner implements Reasoner {
  readonly name = 'rules';

  constructor(private readonly config: RuleBasedReasonerConfig) {}

  async decide(request: ReasoningRequest): Promise<ReasoningDecisionInput> {
    switch (request.role) {
      case 'observe':
        return this.observe(request);
      case 'orient':
        return this.orient(request.excerpt);
      case 'decide':
        return this.plan(request.excerpt);
      case 'act':
        return this.act(request);
    }
  }

  // ==========================================================================
  // Observe: one record per detection
  // ==========================================================================

  private observe(request: ReasoningRequest): ReasoningDecisionInput {
    if (request.stimulus.kind !== 'trigger') return EMPTY;
    const { trigger } = request.stimulus;

    const mutations = trigger.detections.map(
      (detection, index): Mutation => ({
        kind: 'observation.append',
        observation: {
          id: `obs_${trigger.id}_${index}`,
          sourceId: trigger.sourceAssetId,
          payloadRef: `trigger:${trigger.id}#${index}`,
          detection,
          area: resolveArea(detection.position, this.config.areas),
          timestamp: trigger.timestamp,
        },
      })
    );

    return {
      mutations,
      messages: [
        {
          topic: 'observation.recorded',
          payload: {
            triggerId: trigger.id,
            sourceAssetId: trigger.sourceAssetId,
            observationIds: mutations.map((_, index) => `obs_${trigger.id}_${index}`),
          },
        },
      ],
      rationale: `Recorded ${mutations.length} detection(s) from ${trigger.sourceAssetId}`,
    };
  }

  // ==========================================================================
  // Orient: fuse observations into entities, recompute coverage
  // ==========================================================================

  private orient(excerpt: ContextSnapshot): ReasoningDecisionInput {
    const { entityConfidenceThreshold, coverageConfidenceThreshold, mergeRadiusKm } =
      this.config.analysis;

    const processed = new Set(excerpt.entities.flatMap((entity) => entity.provenance));
    const fresh = excerpt.observations.filter(
      (record) => !processed.has(record.id) && record.confidence >= entityConfidenceThreshold
    );

    // Working copy of the picture as it will look after this decision
    const working = new Map<string, TrackedEntity>(excerpt.entities.map((e) => [e.id, e]));
    const created = new Set<string>();
    const updated = new Set<string>();

    for (const record of fresh) {
      const match = this.findMergeTarget(working, record, mergeRadiusKm);
      if (match) {
        working.set(match.id, {
          ...match,
          position: record.detection.position,
          area: record.area,
          confidence: Math.max(match.confidence, record.confidence),
          provenance: [...match.provenance, record.id],
        });
        if (!created.has(match.id)) updated.add(match.id);
        continue;
      }
      const id = `ent_${record.id}`;
      working.set(id, {
        id,
        type: record.detection.type,
        position: record.detection.position,
        area: record.area,
        confidence: record.confidence,
        ...(record.detection.description !== undefined
          ? { description: record.detection.description }
          : {}),
        provenance: [record.id],
        createdBy: 'orient',
        createdAt: record.timestamp,
        updatedAt: record.timestamp,
        revision: 0,
      });
      created.add(id);
    }

    const mutations: Mutation[] = [];
    for (const id of created) {
      const entity = working.get(id);
      if (!entity) continue;
      mutations.push({
        kind: 'entity.create',
        entity: {
          id,
          type: entity.type,
          position: entity.position,
          area: entity.area,
          confidence: entity.confidence,
          ...(entity.description !== undefined ? { description: entity.description } : {}),
          provenance: entity.provenance,
        },
      });
    }
    for (const id of updated) {
      const entity = working.get(id);
      const previous = excerpt.entities.find((e) => e.id === id);
      if (!entity || !previous) continue;
      mutations.push({
        kind: 'entity.update',
        entityId: id,
        patch: {
          position: entity.position,
          area: entity.area,
          confidence: entity.confidence,
          addProvenance: entity.provenance.filter((p) => !previous.provenance.includes(p)),
        },
      });
    }

    const gaps = computeCoverageGaps(
      Array.from(working.values()),
      excerpt.assets,
      coverageConfidenceThreshold,
      this.config.areas
    );
    const gapsChanged = !sameGaps(excerpt.coverageGaps, gaps);
    if (gapsChanged) {
      mutations.push({
        kind: 'coverage.replace',
        gaps: gaps.map(({ area, center, entityIds, peakConfidence }) => ({
          area,
          center,
          entityIds,
          peakConfidence,
        })),
      });
    }

    if (mutations.length === 0) {
      return { ...EMPTY, rationale: 'No new observations above threshold' };
    }

    return {
      mutations,
      messages: [
        {
          topic: 'picture.updated',
          payload: {
            created: Array.from(created),
            updated: Array.from(updated),
            gapAreas: gaps.map((gap) => gap.area),
          },
        },
      ],
      rationale: `${created.size} new, ${updated.size} refined, ${gaps.length} coverage gap(s)`,
    };
  }

  private findMergeTarget(
    working: ReadonlyMap<string, TrackedEntity>,
    record: ObservationRecord,
    mergeRadiusKm: number
  ): TrackedEntity | null {
    let best: { entity: TrackedEntity; distance: number } | null = null;
    for (const entity of working.values()) {
      if (entity.type !== record.detection.type) continue;
      const distance = distanceKm(entity.position, record.detection.position);
      if (distance <= mergeRadiusKm && (best === null || distance < best.distance)) {
        best = { entity, distance };
      }
    }
    return best ? best.entity : null;
  }

  // ==========================================================================
  // Decide: cover every gap the active plan leaves open
  // ==========================================================================

  private plan(excerpt: ContextSnapshot): ReasoningDecisionInput {
    const active = findActivePlan(excerpt.plans);
    const assignments: PlanAssignment[] = active ? [...active.assignments] : [];
    const coveredAreas = new Set(assignments.map((a) => a.area));
    const committedAssets = new Set(assignments.map((a) => a.assetId));
    const added: PlanAssignment[] = [];
    const uncovered: string[] = [];

    const gaps = [...excerpt.coverageGaps].sort(
      (a, b) => b.peakConfidence - a.peakConfidence || a.area.localeCompare(b.area)
    );
    for (const gap of gaps) {
      if (coveredAreas.has(gap.area)) continue;
      const asset = this.pickAsset(excerpt.assets, gap, committedAssets);
      if (!asset) {
        uncovered.push(gap.area);
        continue;
      }
      const types = Array.from(
        new Set(
          excerpt.entities.filter((e) => gap.entityIds.includes(e.id)).map((e) => e.type)
        )
      );
      const assignment: PlanAssignment = {
        assetId: asset.id,
        area: gap.area,
        objective: `Investigate ${types.length > 0 ? types.join(', ') : 'contact'} in ${gap.area}`,
        priority: gap.priority === 'high' ? 9 : 7,
      };
      added.push(assignment);
      coveredAreas.add(gap.area);
      committedAssets.add(asset.id);
    }

    if (added.length === 0) {
      return {
        ...EMPTY,
        rationale:
          uncovered.length > 0
            ? `No available asset for ${uncovered.join(', ')}`
            : 'Active plan already covers every gap',
      };
    }

    const nextVersion = (active?.version ?? 0) + 1;
    return {
      mutations: [
        {
          kind: 'plan.revise',
          basedOnVersion: active ? active.version : null,
          plan: {
            name: `COP plan v${nextVersion}`,
            objectives: [
              ...(active ? active.objectives : []),
              ...added.map((a) => a.objective),
            ],
            assignments: [...assignments, ...added],
          },
        },
      ],
      messages: [
        {
          topic: 'plan.revised',
          payload: {
            basedOnVersion: active ? active.version : null,
            newAssignments: added.map((a) => ({ assetId: a.assetId, area: a.area })),
          },
        },
      ],
      rationale: `Assigned ${added.map((a) => `${a.assetId} to ${a.area}`).join(', ')}`,
    };
  }

  /**
   * Nearest operational asset with enough fuel that is neither assigned nor
   * committed elsewhere in the plan.
   */
  private pickAsset(
    assets: readonly Asset[],
    gap: CoverageGap,
    committed: ReadonlySet<string>
  ): Asset | null {
    const candidates = assets
      .filter(
        (asset) =>
          asset.status === 'operational' &&
          asset.fuelPercent >= this.config.analysis.minFuelPercent &&
          asset.assignment === null &&
          asset.currentTask === null &&
          !committed.has(asset.id)
      )
      .map((asset) => ({ asset, distance: distanceKm(asset.position, gap.center) }))
      .sort((a, b) => a.distance - b.distance || a.asset.id.localeCompare(b.asset.id));
    return candidates.length > 0 ? candidates[0].asset : null;
  }

  // ==========================================================================
  // Act: dispatch tasks for assignments not yet in motion, watch fuel
  // ==========================================================================

  private act(request: ReasoningRequest): ReasoningDecisionInput {
    const { excerpt, stimulus } = request;
    const alerts =
      stimulus.kind === 'message' && stimulus.message.topic === 'asset.status'
        ? this.fuelAlerts(excerpt.assets)
        : [];
    const alertMessages =
      alerts.length > 0 ? [{ topic: 'asset.alert' as const, payload: { alerts } }] : [];

    const active = findActivePlan(excerpt.plans);
    if (!active) {
      return { mutations: [], messages: alertMessages, rationale: 'No active plan' };
    }

    const mutations: Mutation[] = [];
    const dispatched: string[] = [];
    for (const assignment of active.assignments) {
      const asset = excerpt.assets.find((a) => a.id === assignment.assetId);
      if (!asset || asset.status === 'offline') continue;

      const open = excerpt.tasks.find(
        (task) => task.assetId === asset.id && task.targetArea === assignment.area && isOpenTask(task)
      );
      if (open) {
        if (open.status === 'queued') {
          mutations.push({
            kind: 'task.update',
            taskId: open.id,
            status: 'dispatched',
            expectedRevision: open.revision,
          });
          dispatched.push(asset.id);
        }
        continue;
      }
      if (this.onStation(asset, assignment.area, excerpt.tasks)) continue;

      const attempt =
        excerpt.tasks.filter((task) => task.assetId === asset.id && task.planId === active.id)
          .length + 1;
      const taskId = `task_${active.id}_${asset.id}_${attempt}`;
      mutations.push(
        {
          kind: 'task.create',
          task: {
            id: taskId,
            assetId: asset.id,
            planId: active.id,
            type: taskTypeFor(assignment.objective),
            targetArea: assignment.area,
            priority: assignment.priority,
          },
          assignAsset: true,
        },
        { kind: 'task.update', taskId, status: 'dispatched', expectedRevision: 1 }
      );
      dispatched.push(asset.id);
    }

    const alerted = alerts.map((alert) => alert.assetId);
    if (mutations.length === 0) {
      return {
        mutations: [],
        messages: alertMessages,
        rationale:
          alerted.length > 0
            ? `Low fuel on ${alerted.join(', ')}`
            : 'Every assignment is already in motion',
      };
    }
    const summary = `Dispatched ${dispatched.join(', ')}`;
    return {
      mutations,
      messages: [
        {
          topic: 'task.dispatched',
          payload: { planId: active.id, planVersion: active.version, assetIds: dispatched },
        },
        ...alertMessages,
      ],
      rationale: alerted.length > 0 ? `${summary}; low fuel on ${alerted.join(', ')}` : summary,
    };
  }

  /**
   * Already covering the area: seeded there without a task, or on a task
   * that has not failed.
   */
  private onStation(asset: Asset, area: string, tasks: readonly Task[]): boolean {
    if (asset.assignment !== area) return false;
    if (asset.currentTask === null) return true;
    const current = tasks.find((task) => task.id === asset.currentTask);
    return current === undefined || current.status !== 'failed';
  }

  private fuelAlerts(assets: readonly Asset[]): FuelAlert[] {
    return assets
      .filter(
        (asset) =>
          asset.status !== 'offline' && asset.fuelPercent < this.config.analysis.lowFuelAlertPercent
      )
      .map((asset): FuelAlert => ({
        assetId: asset.id,
        alertType: 'low_fuel',
        fuelPercent: asset.fuelPercent,
      }));
  }
}

export function taskTypeFor(objective: string): TaskType {
  const text = objective.toLowerCase();
  if (text.includes('track')) return 'tracking';
  if (text.includes('investigate') || text.includes('recon')) return 'reconnaissance';
  return 'surveillance';
}

function sameGaps(
  stored: readonly CoverageGap[],
  computed: readonly { area: string; entityIds: string[]; peakConfidence: number }[]
): boolean {
  if (stored.length !== computed.length) return false;
  const byArea = new Map(stored.map((gap) => [gap.area, gap]));
  return computed.every((gap) => {
    const existing = byArea.get(gap.area);
    return (
      existing !== undefined &&
      existing.peakConfidence === gap.peakConfidence &&
      existing.entityIds.join(',') === gap.entityIds.join(',')
    );
  });
}
