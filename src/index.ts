/**
 * OODA coordination core
 *
 * Shared operating picture, authority-gated writes, ordered role messaging
 * and the workers that tie them together.
 */

export { AuthorityGuard, type AuthorityDecision, type GrantRequirement } from './authority/guard';
export {
  DEFAULT_GRANTS,
  OPERATIONS,
  RESOURCES,
  type AuthorityGrant,
  type GrantTable,
  type Operation,
  type Resource,
} from './authority/grants';

export { ContextStore, type ContextStoreOptions } from './context/store';
export { MemoryBackend } from './context/memory-backend';
export { LibsqlBackend, type LibsqlBackendConfig } from './context/libsql-backend';
export { computeCoverageGaps, findActivePlan } from './context/projections';
export type {
  AuditFilter,
  ContextBackend,
  ContextQuery,
  ContextSnapshot,
  ContextTransaction,
  TableName,
  WriteReceipt,
  WriteResult,
} from './context/types';

export { MessageChannel, type MessageChannelConfig } from './channel/message-channel';
export { MessageJournal, type MessageJournalConfig } from './channel/journal';
export { InboundQueue } from './channel/queue';
export { TOPICS, type Message, type PublishInput, type Topic } from './channel/types';

export { RuleBasedReasoner } from './reasoning/rule-based';
export { AiReasoner, createAiReasoner } from './reasoning/ai-reasoner';
export {
  ReasoningDecisionSchema,
  type Reasoner,
  type ReasoningDecision,
  type ReasoningRequest,
  type Stimulus,
} from './reasoning/types';

export { RoleWorker, type WorkerEvent, type WorkerEventType, type WorkerPhase } from './roles/worker';
export { ROLE_PROFILES } from './roles/profiles';

export { Orchestrator, type RunOutcome, type TelemetryReport } from './orchestrator/orchestrator';
export { createOrchestrator, type OrchestratorOverrides } from './orchestrator/factory';
export { CopObserver } from './orchestrator/observer';
export { BASELINE_SEED, BASELINE_TRIGGER, type ScenarioSeed } from './orchestrator/scenario';

export * from './config';
export * from './errors';
export * from './domain/types';
export { MutationSchema, TriggerInputSchema, type Mutation, type TriggerInput } from './domain/schemas';
