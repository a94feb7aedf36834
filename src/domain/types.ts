/**
 * Common Operating Picture - Domain Types
 *
 * Rows carry a `revision` counter that starts at 1 and is bumped on every
 * committed change; optimistic writes compare against it.
 */

// ============================================================================
// Roles & Actors
// ============================================================================

export const ROLES = ['observe', 'orient', 'decide', 'act'] as const;

export type Role = (typeof ROLES)[number];

/** Roles plus the privileged seeding actor */
export type Actor = Role | 'system';

export const OPERATING_MODES = ['casual', 'professional', 'relaxed'] as const;

export type OperatingMode = (typeof OPERATING_MODES)[number];

// ============================================================================
// Geography
// ============================================================================

export interface GeoPosition {
  lat: number;
  lon: number;
  /** Metres */
  alt?: number;
}

export interface Area {
  name: string;
  center: GeoPosition;
  radiusKm: number;
}

// ============================================================================
// Entities
// ============================================================================

export type AssetStatus = 'operational' | 'degraded' | 'offline';

export interface Asset {
  id: string;
  position: GeoPosition;
  fuelPercent: number;
  status: AssetStatus;
  /** Area the asset is currently covering, null when unassigned */
  assignment: string | null;
  /** Task id the asset is executing */
  currentTask: string | null;
  lastUpdated: number;
  revision: number;
}

export interface Detection {
  type: string;
  position: GeoPosition;
  confidence: number;
  description?: string;
}

export interface ObservationRecord {
  id: string;
  sourceId: string;
  payloadRef: string;
  detection: Detection;
  area: string;
  confidence: number;
  producedBy: Actor;
  timestamp: number;
  revision: number;
}

export interface TrackedEntity {
  id: string;
  type: string;
  position: GeoPosition;
  area: string;
  confidence: number;
  description?: string;
  /** ObservationRecord ids that produced or refined this entity */
  provenance: string[];
  createdBy: Actor;
  createdAt: number;
  updatedAt: number;
  revision: number;
}

export type GapPriority = 'high' | 'medium';

/**
 * Transient projection: an area holding an unresolved high-confidence entity
 * with no asset assigned.
 */
export interface CoverageGap {
  id: string;
  area: string;
  center: GeoPosition;
  entityIds: string[];
  peakConfidence: number;
  priority: GapPriority;
  computedAt: number;
  revision: number;
}

export type PlanStatus = 'draft' | 'active' | 'superseded';

export interface PlanAssignment {
  assetId: string;
  area: string;
  objective: string;
  priority: number;
}

export interface Plan {
  id: string;
  name: string;
  objectives: string[];
  assignments: PlanAssignment[];
  status: PlanStatus;
  /** Lineage counter; every revision is strictly greater than its predecessor */
  version: number;
  supersedes: string | null;
  supersededBy: string | null;
  createdBy: Actor;
  updatedBy: Actor;
  createdAt: number;
  updatedAt: number;
  revision: number;
}

export const TASK_TYPES = ['surveillance', 'reconnaissance', 'tracking'] as const;

export type TaskType = (typeof TASK_TYPES)[number];

export const TASK_STATUSES = ['queued', 'dispatched', 'acknowledged', 'failed'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface Task {
  id: string;
  assetId: string;
  planId: string;
  type: TaskType;
  targetArea: string;
  priority: number;
  status: TaskStatus;
  createdBy: Actor;
  createdAt: number;
  updatedAt: number;
  revision: number;
}

// ============================================================================
// Audit
// ============================================================================

export type AuditOutcome = 'applied' | 'denied' | 'conflict' | 'invalid';

export interface AuditEntry {
  /** Commit order; the only total order in the system */
  seq: number;
  timestamp: number;
  actor: Actor;
  operation: string;
  resource: string;
  target: string | null;
  authorized: boolean;
  outcome: AuditOutcome;
  reason: string | null;
  before: string | null;
  after: string | null;
}

// ============================================================================
// Triggers
// ============================================================================

/**
 * Normalized external event entering the Observe role.
 */
export interface Trigger {
  id: string;
  sourceAssetId: string;
  timestamp: number;
  position: GeoPosition;
  detections: Detection[];
}
