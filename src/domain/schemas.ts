/**
 * Zod schemas for everything that crosses a boundary: triggers from outside,
 * mutations proposed by reasoners, and rows decoded from storage.
 */

import { z } from 'zod';
import {
  TASK_STATUSES,
  TASK_TYPES,
  type Asset,
  type AuditEntry,
  type CoverageGap,
  type ObservationRecord,
  type Plan,
  type Task,
  type TrackedEntity,
} from './types';

// ============================================================================
// Shared
// ============================================================================

export const ActorSchema = z.enum(['observe', 'orient', 'decide', 'act', 'system']);

export const GeoPositionSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  alt: z.number().optional(),
});

export const AreaSchema = z.object({
  name: z.string().min(1),
  center: GeoPositionSchema,
  radiusKm: z.number().positive(),
});

export const DetectionSchema = z.object({
  type: z.string().min(1),
  position: GeoPositionSchema,
  confidence: z.number().min(0).max(1),
  description: z.string().optional(),
});

export const AssetStatusSchema = z.enum(['operational', 'degraded', 'offline']);
export const TaskTypeSchema = z.enum(TASK_TYPES);
export const TaskStatusSchema = z.enum(TASK_STATUSES);

// ============================================================================
// Triggers
// ============================================================================

export const TriggerInputSchema = z.object({
  id: z.string().min(1).optional(),
  sourceAssetId: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
  position: GeoPositionSchema,
  detections: z.array(DetectionSchema).min(1),
});

export type TriggerInput = z.input<typeof TriggerInputSchema>;

// ============================================================================
// Mutations
// ============================================================================

const expectedRevision = z.number().int().positive().optional();

export const PlanAssignmentSchema = z.object({
  assetId: z.string().min(1),
  area: z.string().min(1),
  objective: z.string().min(1),
  priority: z.number().int().min(1).max(10),
});

const PlanBodySchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  objectives: z.array(z.string()).default([]),
  assignments: z.array(PlanAssignmentSchema),
});

export const AssetRegisterSchema = z.object({
  kind: z.literal('asset.register'),
  asset: z.object({
    id: z.string().min(1),
    position: GeoPositionSchema,
    fuelPercent: z.number().min(0).max(100),
    status: AssetStatusSchema.default('operational'),
    assignment: z.string().min(1).nullable().default(null),
  }),
});

export const AssetTelemetrySchema = z.object({
  kind: z.literal('asset.telemetry'),
  assetId: z.string().min(1),
  position: GeoPositionSchema.optional(),
  fuelPercent: z.number().min(0).max(100).optional(),
  status: AssetStatusSchema.optional(),
  expectedRevision,
});

export const AssetAssignSchema = z.object({
  kind: z.literal('asset.assign'),
  assetId: z.string().min(1),
  taskId: z.string().min(1).nullable(),
  /** Defaults to the task's target area, or null when releasing */
  area: z.string().min(1).nullable().optional(),
  expectedRevision,
});

export const ObservationAppendSchema = z.object({
  kind: z.literal('observation.append'),
  observation: z.object({
    id: z.string().min(1).optional(),
    sourceId: z.string().min(1),
    payloadRef: z.string().min(1),
    detection: DetectionSchema,
    area: z.string().min(1),
    timestamp: z.number().int().nonnegative().optional(),
  }),
});

export const EntityCreateSchema = z.object({
  kind: z.literal('entity.create'),
  entity: z.object({
    id: z.string().min(1).optional(),
    type: z.string().min(1),
    position: GeoPositionSchema,
    area: z.string().min(1),
    // clamped by the store rather than rejected
    confidence: z.number(),
    description: z.string().optional(),
    provenance: z.array(z.string().min(1)).default([]),
  }),
});

export const EntityUpdateSchema = z.object({
  kind: z.literal('entity.update'),
  entityId: z.string().min(1),
  patch: z.object({
    position: GeoPositionSchema.optional(),
    area: z.string().min(1).optional(),
    confidence: z.number().optional(),
    description: z.string().optional(),
    addProvenance: z.array(z.string().min(1)).optional(),
  }),
  expectedRevision,
});

export const CoverageReplaceSchema = z.object({
  kind: z.literal('coverage.replace'),
  gaps: z.array(
    z.object({
      area: z.string().min(1),
      center: GeoPositionSchema,
      entityIds: z.array(z.string().min(1)).min(1),
      peakConfidence: z.number().min(0).max(1),
    })
  ),
});

export const PlanDraftSchema = z.object({
  kind: z.literal('plan.draft'),
  plan: PlanBodySchema,
});

export const PlanReviseSchema = z.object({
  kind: z.literal('plan.revise'),
  /** Version of the active plan this revision was computed from; null when none */
  basedOnVersion: z.number().int().nonnegative().nullable(),
  plan: PlanBodySchema,
});

export const TaskCreateSchema = z.object({
  kind: z.literal('task.create'),
  task: z.object({
    id: z.string().min(1).optional(),
    assetId: z.string().min(1),
    planId: z.string().min(1),
    type: TaskTypeSchema,
    targetArea: z.string().min(1),
    priority: z.number().int().min(1).max(10),
  }),
  assignAsset: z.boolean().default(true),
});

export const TaskUpdateSchema = z.object({
  kind: z.literal('task.update'),
  taskId: z.string().min(1),
  status: TaskStatusSchema,
  expectedRevision,
});

export const MutationSchema = z.discriminatedUnion('kind', [
  AssetRegisterSchema,
  AssetTelemetrySchema,
  AssetAssignSchema,
  ObservationAppendSchema,
  EntityCreateSchema,
  EntityUpdateSchema,
  CoverageReplaceSchema,
  PlanDraftSchema,
  PlanReviseSchema,
  TaskCreateSchema,
  TaskUpdateSchema,
]);

/** What callers hand to ContextStore.write (defaults optional) */
export type Mutation = z.input<typeof MutationSchema>;

/** After validation, defaults applied */
export type ValidMutation = z.output<typeof MutationSchema>;

export type MutationKind = Mutation['kind'];

export const MUTATION_KINDS: readonly MutationKind[] = MutationSchema.options.map(
  (option) => option.shape.kind.value
);

// ============================================================================
// Stored rows
// ============================================================================

export const AssetRowSchema: z.ZodType<Asset> = z.object({
  id: z.string(),
  position: GeoPositionSchema,
  fuelPercent: z.number(),
  status: AssetStatusSchema,
  assignment: z.string().nullable(),
  currentTask: z.string().nullable(),
  lastUpdated: z.number(),
  revision: z.number().int(),
});

export const ObservationRowSchema: z.ZodType<ObservationRecord> = z.object({
  id: z.string(),
  sourceId: z.string(),
  payloadRef: z.string(),
  detection: DetectionSchema,
  area: z.string(),
  confidence: z.number(),
  producedBy: ActorSchema,
  timestamp: z.number(),
  revision: z.number().int(),
});

export const TrackedEntityRowSchema: z.ZodType<TrackedEntity> = z.object({
  id: z.string(),
  type: z.string(),
  position: GeoPositionSchema,
  area: z.string(),
  confidence: z.number(),
  description: z.string().optional(),
  provenance: z.array(z.string()),
  createdBy: ActorSchema,
  createdAt: z.number(),
  updatedAt: z.number(),
  revision: z.number().int(),
});

export const CoverageGapRowSchema: z.ZodType<CoverageGap> = z.object({
  id: z.string(),
  area: z.string(),
  center: GeoPositionSchema,
  entityIds: z.array(z.string()),
  peakConfidence: z.number(),
  priority: z.enum(['high', 'medium']),
  computedAt: z.number(),
  revision: z.number().int(),
});

export const PlanRowSchema: z.ZodType<Plan> = z.object({
  id: z.string(),
  name: z.string(),
  objectives: z.array(z.string()),
  assignments: z.array(PlanAssignmentSchema),
  status: z.enum(['draft', 'active', 'superseded']),
  version: z.number().int(),
  supersedes: z.string().nullable(),
  supersededBy: z.string().nullable(),
  createdBy: ActorSchema,
  updatedBy: ActorSchema,
  createdAt: z.number(),
  updatedAt: z.number(),
  revision: z.number().int(),
});

export const TaskRowSchema: z.ZodType<Task> = z.object({
  id: z.string(),
  assetId: z.string(),
  planId: z.string(),
  type: TaskTypeSchema,
  targetArea: z.string(),
  priority: z.number().int(),
  status: TaskStatusSchema,
  createdBy: ActorSchema,
  createdAt: z.number(),
  updatedAt: z.number(),
  revision: z.number().int(),
});

export const AuditEntryRowSchema: z.ZodType<AuditEntry> = z.object({
  seq: z.number().int(),
  timestamp: z.number(),
  actor: ActorSchema,
  operation: z.string(),
  resource: z.string(),
  target: z.string().nullable(),
  authorized: z.boolean(),
  outcome: z.enum(['applied', 'denied', 'conflict', 'invalid']),
  reason: z.string().nullable(),
  before: z.string().nullable(),
  after: z.string().nullable(),
});
