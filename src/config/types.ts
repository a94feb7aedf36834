/**
 * Coordinator configuration.
 *
 * Every field has a default, so `{}` is a complete configuration.
 * Loaded from ./cop.config.json or the path in COP_CONFIG_PATH.
 */

import { z } from 'zod';
import { AreaSchema } from '../domain/schemas';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Operational areas used to name the location of detections.
 */
export const DEFAULT_AREAS = [
  { name: 'Area Alpha', center: { lat: 34.0522, lon: -118.2437 }, radiusKm: 3 },
  { name: 'Area Bravo', center: { lat: 34.08, lon: -118.3 }, radiusKm: 3 },
  { name: 'Area Charlie', center: { lat: 34.02, lon: -118.28 }, radiusKm: 3 },
  { name: 'Area Delta', center: { lat: 34.1, lon: -118.2 }, radiusKm: 3 },
] as const;

export const StoreConfigSchema = z.object({
  driver: z.enum(['memory', 'libsql']).default('memory'),
  /** libsql only, e.g. `file:.cop/context.db` */
  url: z.string().min(1).default('file:.cop/context.db'),
  authToken: z.string().optional(),
  maxInternalRetries: z.number().int().nonnegative().default(5),
});

export const ChannelConfigSchema = z.object({
  historyLimit: z.number().int().positive().default(1000),
  /** Per-subscriber queue bound; unbounded when omitted */
  queueBound: z.number().int().positive().optional(),
  backpressure: z.enum(['block', 'drop-oldest']).default('block'),
  /** JSONL journal of published messages; disabled when omitted */
  journalPath: z.string().min(1).optional(),
});

export const ReasoningConfigSchema = z.object({
  provider: z.enum(['rules', 'openai-compatible']).default('rules'),
  baseURL: z.string().url().default('http://127.0.0.1:11434/v1'),
  model: z.string().min(1).default('llama3.1'),
  /** Name of the environment variable holding the API key */
  apiKeyEnv: z.string().min(1).default('COP_REASONING_API_KEY'),
  temperature: z.number().min(0).max(2).default(0.2),
  deadlineMs: z.number().int().positive().default(30_000),
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().nonnegative().default(250),
  maxDelayMs: z.number().int().nonnegative().default(4_000),
});

export const WorkerConfigSchema = z.object({
  maxConflictRetries: z.number().int().nonnegative().default(3),
});

export const OrchestratorConfigSchema = z.object({
  quiescenceGraceMs: z.number().int().nonnegative().default(50),
  runTimeoutMs: z.number().int().positive().default(60_000),
  shutdownTimeoutMs: z.number().int().positive().default(5_000),
});

export const AnalysisConfigSchema = z.object({
  /** Detections below this never become tracked entities */
  entityConfidenceThreshold: z.number().min(0).max(1).default(0.7),
  /** Entities at or above this in an unassigned area form a coverage gap */
  coverageConfidenceThreshold: z.number().min(0).max(1).default(0.8),
  minFuelPercent: z.number().min(0).max(100).default(30),
  /** Act raises a low_fuel alert for any asset reporting less */
  lowFuelAlertPercent: z.number().min(0).max(100).default(20),
  /** Same-type detections closer than this refine an existing entity */
  mergeRadiusKm: z.number().nonnegative().default(0.5),
});

export const CoordinatorConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('info'),
  mode: z.enum(['casual', 'professional', 'relaxed']).default('professional'),
  store: StoreConfigSchema.default({}),
  channel: ChannelConfigSchema.default({}),
  reasoning: ReasoningConfigSchema.default({}),
  workers: WorkerConfigSchema.default({}),
  orchestrator: OrchestratorConfigSchema.default({}),
  analysis: AnalysisConfigSchema.default({}),
  areas: z.array(AreaSchema).default(() => DEFAULT_AREAS.map((area) => ({ ...area, center: { ...area.center } }))),
});

export type CoordinatorConfig = z.output<typeof CoordinatorConfigSchema>;
export type CoordinatorConfigInput = z.input<typeof CoordinatorConfigSchema>;
export type AnalysisConfig = z.output<typeof AnalysisConfigSchema>;
export type ReasoningConfig = z.output<typeof ReasoningConfigSchema>;

/**
 * Validation result for configuration
 */
export interface ConfigValidationResult {
  valid: boolean;
  /** Empty when valid */
  errors: string[];
}

/**
 * Parse configuration from a JSON string, applying defaults.
 *
 * @throws Error if the JSON is invalid or a field is out of range
 */
export function parseConfig(jsonStr: string): CoordinatorConfig {
  let parsed: unknown;

  try {
    parsed = JSON.parse(jsonStr);
  } catch (error) {
    const message = error instanceof Error ? error.toString() : String(error);
    throw new Error(`Failed to parse config JSON: ${message}`);
  }

  const result = CoordinatorConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config: ${formatIssues(result.error).join('; ')}`);
  }
  return result.data;
}

/**
 * Cross-field checks the schema can't express on its own.
 */
export function validateConfig(config: CoordinatorConfig): ConfigValidationResult {
  const errors: string[] = [];

  const schemaResult = CoordinatorConfigSchema.safeParse(config);
  if (!schemaResult.success) {
    errors.push(...formatIssues(schemaResult.error));
  }

  if (config.reasoning.maxDelayMs < config.reasoning.baseDelayMs) {
    errors.push('reasoning.maxDelayMs must be >= reasoning.baseDelayMs');
  }

  if (config.analysis.coverageConfidenceThreshold < config.analysis.entityConfidenceThreshold) {
    errors.push('analysis.coverageConfidenceThreshold must be >= analysis.entityConfidenceThreshold');
  }

  const names = new Set<string>();
  for (const area of config.areas) {
    if (names.has(area.name)) errors.push(`areas: duplicate name '${area.name}'`);
    names.add(area.name);
  }

  if (config.store.driver === 'libsql' && !config.store.url.startsWith('file:') && !config.store.authToken) {
    errors.push('store.authToken is required for a remote libsql url');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

export function getDefaultConfig(): CoordinatorConfig {
  return CoordinatorConfigSchema.parse({});
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
