/**
 * Read-side projections over a snapshot. Pure; the coverage gap table Orient
 * writes is the persisted form of `computeCoverageGaps`.
 */

import { areaCenter } from '../domain/geo';
import type { Area, Asset, CoverageGap, GeoPosition, Plan, Task, TrackedEntity } from '../domain/types';

export type CoverageGapProjection = Omit<CoverageGap, 'id' | 'computedAt' | 'revision'>;

const OPEN_TASK_STATUSES: ReadonlySet<Task['status']> = new Set(['queued', 'dispatched', 'acknowledged']);

/**
 * Areas holding an entity at or above `threshold` that no operational asset
 * is assigned to. Sorted by peak confidence, highest first.
 */
export function computeCoverageGaps(
  entities: readonly TrackedEntity[],
  assets: readonly Asset[],
  threshold: number,
  areas: readonly Area[] = []
): CoverageGapProjection[] {
  const covered = new Set(
    assets
      .filter((asset) => asset.status !== 'offline' && asset.assignment !== null)
      .map((asset) => asset.assignment)
  );

  const byArea = new Map<string, TrackedEntity[]>();
  for (const entity of entities) {
    if (entity.confidence < threshold || covered.has(entity.area)) continue;
    const bucket = byArea.get(entity.area) ?? [];
    bucket.push(entity);
    byArea.set(entity.area, bucket);
  }

  const gaps: CoverageGapProjection[] = [];
  for (const [area, members] of byArea) {
    const peak = members.reduce((best, entity) => (entity.confidence > best.confidence ? entity : best));
    gaps.push({
      area,
      center: areaCenter(area, areas) ?? centroid(members.map((entity) => entity.position)),
      entityIds: members.map((entity) => entity.id).sort(),
      peakConfidence: peak.confidence,
      priority: peak.confidence >= 0.9 ? 'high' : 'medium',
    });
  }
  return gaps.sort((a, b) => b.peakConfidence - a.peakConfidence || a.area.localeCompare(b.area));
}

function centroid(positions: readonly GeoPosition[]): GeoPosition {
  const lat = positions.reduce((sum, p) => sum + p.lat, 0) / positions.length;
  const lon = positions.reduce((sum, p) => sum + p.lon, 0) / positions.length;
  return { lat, lon };
}

export function findActivePlan(plans: readonly Plan[]): Plan | null {
  return plans.find((plan) => plan.status === 'active') ?? null;
}

export function isOpenTask(task: Task): boolean {
  return OPEN_TASK_STATUSES.has(task.status);
}
