import { describe, it, expect } from 'vitest';
import { RuleBasedReasoner, taskTypeFor } from './rule-based';
import { DEFAULT_AREAS, getDefaultConfig } from '../config/types';
import type { ContextSnapshot } from '../context/types';
import type {
  Asset,
  CoverageGap,
  ObservationRecord,
  Plan,
  Role,
  Task,
  TrackedEntity,
  Trigger,
} from '../domain/types';
import type { ReasoningRequest, Stimulus } from './types';

// ============================================================================
// Fixtures
// ============================================================================

const DELTA_CONTACT = { lat: 34.1015, lon: -118.2012 };

function excerpt(overrides: Partial<ContextSnapshot> = {}): ContextSnapshot {
  return {
    scope: [],
    assets: [],
    observations: [],
    entities: [],
    coverageGaps: [],
    plans: [],
    tasks: [],
    ...overrides,
  };
}

function asset(id: string, overrides: Partial<Asset> = {}): Asset {
  return {
    id,
    position: { lat: 34.065, lon: -118.255 },
    fuelPercent: 80,
    status: 'operational',
    assignment: null,
    currentTask: null,
    lastUpdated: 0,
    revision: 1,
    ...overrides,
  };
}

function observation(id: string, overrides: Partial<ObservationRecord> = {}): ObservationRecord {
  return {
    id,
    sourceId: 'UAV-002',
    payloadRef: `trigger:T#${id}`,
    detection: { type: 'truck', position: DELTA_CONTACT, confidence: 0.88 },
    area: 'Area Delta',
    confidence: 0.88,
    producedBy: 'observe',
    timestamp: 500,
    revision: 1,
    ...overrides,
  };
}

function entity(id: string, overrides: Partial<TrackedEntity> = {}): TrackedEntity {
  return {
    id,
    type: 'truck',
    position: DELTA_CONTACT,
    area: 'Area Delta',
    confidence: 0.88,
    provenance: [],
    createdBy: 'orient',
    createdAt: 0,
    updatedAt: 0,
    revision: 1,
    ...overrides,
  };
}

function gap(area: string, entityIds: string[], peakConfidence: number): CoverageGap {
  return {
    id: `gap:${area}`,
    area,
    center: { lat: 34.1, lon: -118.2 },
    entityIds,
    peakConfidence,
    priority: peakConfidence >= 0.9 ? 'high' : 'medium',
    computedAt: 0,
    revision: 1,
  };
}

function plan(overrides: Partial<Plan> = {}): Plan {
  return {
    id: 'P1',
    name: 'COP plan v1',
    objectives: ['Maintain surveillance of Area Alpha'],
    assignments: [
      { assetId: 'UAV-001', area: 'Area Alpha', objective: 'Maintain surveillance of Area Alpha', priority: 5 },
    ],
    status: 'active',
    version: 1,
    supersedes: null,
    supersededBy: null,
    createdBy: 'system',
    updatedBy: 'system',
    createdAt: 0,
    updatedAt: 0,
    revision: 1,
    ...overrides,
  };
}

function task(overrides: Partial<Task> = {}): Task {
  return {
    id: 'T1',
    assetId: 'UAV-003',
    planId: 'P1',
    type: 'reconnaissance',
    targetArea: 'Area Delta',
    priority: 7,
    status: 'queued',
    createdBy: 'act',
    createdAt: 0,
    updatedAt: 0,
    revision: 1,
    ...overrides,
  };
}

const messageStimulus: Stimulus = {
  kind: 'message',
  message: { id: 'msg_1', topic: 'observation.recorded', sender: 'observe', payload: {}, timestamp: 0 },
};

function request(role: Role, snapshot: ContextSnapshot, stimulus: Stimulus = messageStimulus): ReasoningRequest {
  return { role, mode: 'professional', excerpt: snapshot, stimulus, attempt: 1 };
}

const reasoner = new RuleBasedReasoner({ analysis: getDefaultConfig().analysis, areas: DEFAULT_AREAS });

// ============================================================================
// Tests
// ============================================================================

describe('RuleBasedReasoner', () => {
  describe('observe', () => {
    it('records one observation per detection', async () => {
      const trigger: Trigger = {
        id: 'T1',
        sourceAssetId: 'UAV-002',
        timestamp: 500,
        position: { lat: 34.08, lon: -118.3 },
        detections: [
          { type: 'truck', position: DELTA_CONTACT, confidence: 0.88 },
          { type: 'radar', position: { lat: 35.5, lon: -117.25 }, confidence: 0.4 },
        ],
      };

      const decision = await reasoner.decide(request('observe', excerpt(), { kind: 'trigger', trigger }));

      expect(decision).toEqual({
        mutations: [
          {
            kind: 'observation.append',
            observation: {
              id: 'obs_T1_0',
              sourceId: 'UAV-002',
              payloadRef: 'trigger:T1#0',
              detection: trigger.detections[0],
              area: 'Area Delta',
              timestamp: 500,
            },
          },
          {
            kind: 'observation.append',
            observation: {
              id: 'obs_T1_1',
              sourceId: 'UAV-002',
              payloadRef: 'trigger:T1#1',
              detection: trigger.detections[1],
              area: 'Sector 35.50,-117.25',
              timestamp: 500,
            },
          },
        ],
        messages: [
          {
            topic: 'observation.recorded',
            payload: { triggerId: 'T1', sourceAssetId: 'UAV-002', observationIds: ['obs_T1_0', 'obs_T1_1'] },
          },
        ],
        rationale: 'Recorded 2 detection(s) from UAV-002',
      });
    });

    it('ignores anything but triggers', async () => {
      expect(await reasoner.decide(request('observe', excerpt()))).toEqual({ mutations: [], messages: [] });
    });
  });

  describe('orient', () => {
    it('promotes a confident observation to an entity and opens a coverage gap', async () => {
      const decision = await reasoner.decide(request('orient', excerpt({ observations: [observation('O1')] })));

      expect(decision).toEqual({
        mutations: [
          {
            kind: 'entity.create',
            entity: {
              id: 'ent_O1',
              type: 'truck',
              position: DELTA_CONTACT,
              area: 'Area Delta',
              confidence: 0.88,
              provenance: ['O1'],
            },
          },
          {
            kind: 'coverage.replace',
            gaps: [
              {
                area: 'Area Delta',
                center: { lat: 34.1, lon: -118.2 },
                entityIds: ['ent_O1'],
                peakConfidence: 0.88,
              },
            ],
          },
        ],
        messages: [
          {
            topic: 'picture.updated',
            payload: { created: ['ent_O1'], updated: [], gapAreas: ['Area Delta'] },
          },
        ],
        rationale: '1 new, 0 refined, 1 coverage gap(s)',
      });
    });

    it('leaves low-confidence observations alone', async () => {
      const decision = await reasoner.decide(
        request('orient', excerpt({ observations: [observation('O1', { confidence: 0.5 })] }))
      );

      expect(decision).toEqual({
        mutations: [],
        messages: [],
        rationale: 'No new observations above threshold',
      });
    });

    it('closes a gap once a dispatched asset covers the area', async () => {
      const dispatched: Stimulus = {
        kind: 'message',
        message: { id: 'msg_3', topic: 'task.dispatched', sender: 'act', payload: {}, timestamp: 0 },
      };
      const snapshot = excerpt({
        observations: [observation('O1')],
        entities: [entity('E1', { provenance: ['O1'] })],
        coverageGaps: [gap('Area Delta', ['E1'], 0.88)],
        assets: [asset('UAV-003', { assignment: 'Area Delta', currentTask: 'T1' })],
      });

      const decision = await reasoner.decide(request('orient', snapshot, dispatched));

      expect(decision).toEqual({
        mutations: [{ kind: 'coverage.replace', gaps: [] }],
        messages: [{ topic: 'picture.updated', payload: { created: [], updated: [], gapAreas: [] } }],
        rationale: '0 new, 0 refined, 0 coverage gap(s)',
      });
    });

    it('refines a nearby entity of the same type', async () => {
      const nearby = { lat: 34.102, lon: -118.2012 };
      const snapshot = excerpt({
        observations: [
          observation('O0'),
          observation('O1', {
            detection: { type: 'truck', position: nearby, confidence: 0.93 },
            confidence: 0.93,
          }),
        ],
        entities: [entity('E1', { provenance: ['O0'], confidence: 0.85 })],
        coverageGaps: [gap('Area Delta', ['E1'], 0.85)],
      });

      const decision = await reasoner.decide(request('orient', snapshot));

      expect(decision.mutations).toEqual([
        {
          kind: 'entity.update',
          entityId: 'E1',
          patch: { position: nearby, area: 'Area Delta', confidence: 0.93, addProvenance: ['O1'] },
        },
        {
          kind: 'coverage.replace',
          gaps: [
            { area: 'Area Delta', center: { lat: 34.1, lon: -118.2 }, entityIds: ['E1'], peakConfidence: 0.93 },
          ],
        },
      ]);
    });

    it('raises no gap for an area an asset already covers', async () => {
      const decision = await reasoner.decide(
        request(
          'orient',
          excerpt({
            observations: [observation('O1')],
            assets: [asset('UAV-009', { assignment: 'Area Delta' })],
          })
        )
      );

      expect(decision.mutations).toHaveLength(1);
      expect(decision.messages).toEqual([
        { topic: 'picture.updated', payload: { created: ['ent_O1'], updated: [], gapAreas: [] } },
      ]);
    });
  });

  describe('decide', () => {
    const picture = (assets: Asset[], plans: Plan[] = [plan()]): ContextSnapshot =>
      excerpt({
        assets,
        plans,
        entities: [entity('E1')],
        coverageGaps: [gap('Area Delta', ['E1'], 0.88)],
      });

    it('assigns the nearest available asset to an uncovered gap', async () => {
      const decision = await reasoner.decide(
        request(
          'decide',
          picture([
            asset('UAV-001', { assignment: 'Area Alpha' }),
            asset('UAV-003'),
            asset('UAV-004', { position: DELTA_CONTACT, fuelPercent: 20 }),
          ])
        )
      );

      const added = {
        assetId: 'UAV-003',
        area: 'Area Delta',
        objective: 'Investigate truck in Area Delta',
        priority: 7,
      };
      expect(decision).toEqual({
        mutations: [
          {
            kind: 'plan.revise',
            basedOnVersion: 1,
            plan: {
              name: 'COP plan v2',
              objectives: ['Maintain surveillance of Area Alpha', 'Investigate truck in Area Delta'],
              assignments: [...plan().assignments, added],
            },
          },
        ],
        messages: [
          {
            topic: 'plan.revised',
            payload: { basedOnVersion: 1, newAssignments: [{ assetId: 'UAV-003', area: 'Area Delta' }] },
          },
        ],
        rationale: 'Assigned UAV-003 to Area Delta',
      });
    });

    it('starts a lineage when no plan is active', async () => {
      const decision = await reasoner.decide(request('decide', picture([asset('UAV-003')], [])));

      expect(decision.mutations).toEqual([
        {
          kind: 'plan.revise',
          basedOnVersion: null,
          plan: {
            name: 'COP plan v1',
            objectives: ['Investigate truck in Area Delta'],
            assignments: [
              { assetId: 'UAV-003', area: 'Area Delta', objective: 'Investigate truck in Area Delta', priority: 7 },
            ],
          },
        },
      ]);
    });

    it('reports gaps it cannot cover', async () => {
      const decision = await reasoner.decide(
        request('decide', picture([asset('UAV-003', { status: 'offline' })]))
      );

      expect(decision).toEqual({ mutations: [], messages: [], rationale: 'No available asset for Area Delta' });
    });

    it('does nothing when the plan already covers the gap', async () => {
      const covering = plan({
        assignments: [{ assetId: 'UAV-003', area: 'Area Delta', objective: 'watch', priority: 7 }],
      });

      const decision = await reasoner.decide(request('decide', picture([asset('UAV-003')], [covering])));

      expect(decision.rationale).toBe('Active plan already covers every gap');
      expect(decision.mutations).toEqual([]);
    });
  });

  describe('act', () => {
    const revised = plan({
      id: 'P2',
      version: 2,
      assignments: [
        { assetId: 'UAV-001', area: 'Area Alpha', objective: 'Maintain surveillance of Area Alpha', priority: 5 },
        { assetId: 'UAV-003', area: 'Area Delta', objective: 'Investigate truck in Area Delta', priority: 7 },
      ],
    });

    const statusReport: Stimulus = {
      kind: 'message',
      message: {
        id: 'msg_2',
        topic: 'asset.status',
        sender: 'system',
        payload: { assetId: 'UAV-001' },
        timestamp: 0,
      },
    };

    it('creates and dispatches assignments not yet in motion', async () => {
      const decision = await reasoner.decide(
        request(
          'act',
          excerpt({
            plans: [revised],
            assets: [asset('UAV-001', { assignment: 'Area Alpha' }), asset('UAV-003')],
          })
        )
      );

      expect(decision).toEqual({
        mutations: [
          {
            kind: 'task.create',
            task: {
              id: 'task_P2_UAV-003_1',
              assetId: 'UAV-003',
              planId: 'P2',
              type: 'reconnaissance',
              targetArea: 'Area Delta',
              priority: 7,
            },
            assignAsset: true,
          },
          { kind: 'task.update', taskId: 'task_P2_UAV-003_1', status: 'dispatched', expectedRevision: 1 },
        ],
        messages: [
          { topic: 'task.dispatched', payload: { planId: 'P2', planVersion: 2, assetIds: ['UAV-003'] } },
        ],
        rationale: 'Dispatched UAV-003',
      });
    });

    it('dispatches a queued task instead of creating another', async () => {
      const decision = await reasoner.decide(
        request(
          'act',
          excerpt({
            plans: [revised],
            assets: [
              asset('UAV-001', { assignment: 'Area Alpha' }),
              asset('UAV-003', { assignment: 'Area Delta', currentTask: 'T1' }),
            ],
            tasks: [task({ planId: 'P2', revision: 1 })],
          })
        )
      );

      expect(decision.mutations).toEqual([
        { kind: 'task.update', taskId: 'T1', status: 'dispatched', expectedRevision: 1 },
      ]);
      expect(decision.rationale).toBe('Dispatched UAV-003');
    });

    it('skips assignments already in motion', async () => {
      const decision = await reasoner.decide(
        request(
          'act',
          excerpt({
            plans: [revised],
            assets: [
              asset('UAV-001', { assignment: 'Area Alpha' }),
              asset('UAV-003', { assignment: 'Area Delta', currentTask: 'T1' }),
            ],
            tasks: [task({ planId: 'P2', status: 'dispatched', revision: 2 })],
          })
        )
      );

      expect(decision).toEqual({ mutations: [], messages: [], rationale: 'Every assignment is already in motion' });
    });

    it('re-dispatches an asset whose task failed', async () => {
      const decision = await reasoner.decide(
        request(
          'act',
          excerpt({
            plans: [revised],
            assets: [
              asset('UAV-001', { assignment: 'Area Alpha' }),
              asset('UAV-003', { assignment: 'Area Delta', currentTask: 'T1' }),
            ],
            tasks: [task({ planId: 'P2', status: 'failed', revision: 3 })],
          })
        )
      );

      expect(decision.mutations).toEqual([
        {
          kind: 'task.create',
          task: {
            id: 'task_P2_UAV-003_2',
            assetId: 'UAV-003',
            planId: 'P2',
            type: 'reconnaissance',
            targetArea: 'Area Delta',
            priority: 7,
          },
          assignAsset: true,
        },
        { kind: 'task.update', taskId: 'task_P2_UAV-003_2', status: 'dispatched', expectedRevision: 1 },
      ]);
    });

    it('raises a low fuel alert on an asset status report', async () => {
      const decision = await reasoner.decide(
        request(
          'act',
          excerpt({
            plans: [revised],
            assets: [
              asset('UAV-001', { assignment: 'Area Alpha', fuelPercent: 15 }),
              asset('UAV-003', { assignment: 'Area Delta', currentTask: 'T1' }),
              asset('UAV-004', { fuelPercent: 5, status: 'offline' }),
            ],
            tasks: [task({ planId: 'P2', status: 'dispatched', revision: 2 })],
          }),
          statusReport
        )
      );

      expect(decision).toEqual({
        mutations: [],
        messages: [
          {
            topic: 'asset.alert',
            payload: { alerts: [{ assetId: 'UAV-001', alertType: 'low_fuel', fuelPercent: 15 }] },
          },
        ],
        rationale: 'Low fuel on UAV-001',
      });
    });

    it('checks fuel only when an asset reports status', async () => {
      const decision = await reasoner.decide(
        request(
          'act',
          excerpt({
            plans: [revised],
            assets: [asset('UAV-001', { assignment: 'Area Alpha', fuelPercent: 15 })],
          })
        )
      );

      expect(decision.messages).toEqual([]);
    });

    it('alerts even without an active plan', async () => {
      const decision = await reasoner.decide(
        request('act', excerpt({ assets: [asset('UAV-001', { fuelPercent: 19.5 })] }), statusReport)
      );

      expect(decision).toEqual({
        mutations: [],
        messages: [
          {
            topic: 'asset.alert',
            payload: { alerts: [{ assetId: 'UAV-001', alertType: 'low_fuel', fuelPercent: 19.5 }] },
          },
        ],
        rationale: 'No active plan',
      });
    });

    it('waits for an active plan', async () => {
      expect(await reasoner.decide(request('act', excerpt()))).toEqual({
        mutations: [],
        messages: [],
        rationale: 'No active plan',
      });
    });
  });
});

describe('taskTypeFor', () => {
  it.each([
    ['Track the convoy', 'tracking'],
    ['Investigate truck in Area Delta', 'reconnaissance'],
    ['Recon the ridge', 'reconnaissance'],
    ['Maintain surveillance of Area Alpha', 'surveillance'],
  ])('maps %s to %s', (objective, expected) => {
    expect(taskTypeFor(objective)).toBe(expected);
  });
});
