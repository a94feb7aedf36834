/**
 * Baseline scenario: three UAVs over Los Angeles, two known contacts, and a
 * plan covering Areas Alpha and Bravo. Area Delta starts uncovered.
 */

import type { Mutation, TriggerInput } from '../domain/schemas';
import type { Detection, GeoPosition, PlanAssignment } from '../domain/types';

export interface SeedAsset {
  id: string;
  position: GeoPosition;
  fuelPercent: number;
  assignment: string | null;
}

export interface SeedEntity {
  id: string;
  type: string;
  position: GeoPosition;
  area: string;
  confidence: number;
  description?: string;
}

export interface SeedPlan {
  id: string;
  name: string;
  objectives: string[];
  assignments: PlanAssignment[];
}

export interface ScenarioSeed {
  assets: SeedAsset[];
  entities: SeedEntity[];
  /** Activated as the first plan version */
  plan?: SeedPlan;
}

export const BASELINE_SEED: ScenarioSeed = {
  assets: [
    {
      id: 'UAV-001',
      position: { lat: 34.0522, lon: -118.2437, alt: 450 },
      fuelPercent: 85.5,
      assignment: 'Area Alpha',
    },
    {
      id: 'UAV-002',
      position: { lat: 34.08, lon: -118.3, alt: 500 },
      fuelPercent: 82.5,
      assignment: 'Area Bravo',
    },
    {
      id: 'UAV-003',
      position: { lat: 34.065, lon: -118.255, alt: 400 },
      fuelPercent: 68.5,
      assignment: null,
    },
  ],
  entities: [
    {
      id: 'ENT-ALPHA-1',
      type: 'vehicle_convoy',
      position: { lat: 34.0531, lon: -118.2449 },
      area: 'Area Alpha',
      confidence: 0.85,
      description: 'Three vehicles moving east',
    },
    {
      id: 'ENT-BRAVO-1',
      type: 'radar_site',
      position: { lat: 34.0812, lon: -118.3015 },
      area: 'Area Bravo',
      confidence: 0.92,
      description: 'Stationary emitter',
    },
  ],
  plan: {
    id: 'PLAN-INITIAL',
    name: 'COP plan v1',
    objectives: ['Maintain surveillance of Area Alpha', 'Maintain surveillance of Area Bravo'],
    assignments: [
      {
        assetId: 'UAV-001',
        area: 'Area Alpha',
        objective: 'Maintain surveillance of Area Alpha',
        priority: 5,
      },
      {
        assetId: 'UAV-002',
        area: 'Area Bravo',
        objective: 'Maintain surveillance of Area Bravo',
        priority: 5,
      },
    ],
  },
};

export const BASELINE_DETECTION: Detection = {
  type: 'high_value_target',
  position: { lat: 34.1015, lon: -118.2012 },
  confidence: 0.88,
  description: 'Unidentified vehicle parked near a warehouse',
};

export const BASELINE_TRIGGER: TriggerInput = {
  id: 'TRG-BASELINE',
  sourceAssetId: 'UAV-002',
  timestamp: 1_700_000_000_000,
  position: { lat: 34.08, lon: -118.3, alt: 500 },
  detections: [BASELINE_DETECTION],
};

/**
 * Mutations that realize a seed, in write order.
 */
export function seedMutations(seed: ScenarioSeed): Mutation[] {
  const mutations: Mutation[] = [];
  for (const asset of seed.assets) {
    mutations.push({ kind: 'asset.register', asset: { ...asset, status: 'operational' } });
  }
  for (const entity of seed.entities) {
    mutations.push({ kind: 'entity.create', entity: { ...entity, provenance: [] } });
  }
  if (seed.plan) {
    mutations.push({ kind: 'plan.revise', basedOnVersion: null, plan: seed.plan });
  }
  return mutations;
}
