/**
 * Builds a ready-to-run Orchestrator from configuration. Anything passed in
 * `overrides` replaces the component the config would have built.
 */

import { AuthorityGuard } from '../authority/guard';
import { MessageJournal } from '../channel/journal';
import { MessageChannel } from '../channel/message-channel';
import { CoordinatorConfigSchema, type CoordinatorConfig, type CoordinatorConfigInput } from '../config/types';
import { LibsqlBackend } from '../context/libsql-backend';
import { MemoryBackend } from '../context/memory-backend';
import { ContextStore } from '../context/store';
import type { ContextBackend } from '../context/types';
import { createAiReasoner } from '../reasoning/ai-reasoner';
import { RuleBasedReasoner } from '../reasoning/rule-based';
import type { Reasoner } from '../reasoning/types';
import type { Role } from '../domain/types';
import { createModuleLogger, setLogLevel } from '../utils/logger';
import { Orchestrator } from './orchestrator';

const log = createModuleLogger('orchestrator');

export interface OrchestratorOverrides {
  backend?: ContextBackend;
  guard?: AuthorityGuard;
  reasoner?: Reasoner;
  reasoners?: Partial<Record<Role, Reasoner>>;
  clock?: () => number;
}

export function buildReasoner(config: CoordinatorConfig): Reasoner {
  if (config.reasoning.provider === 'openai-compatible') {
    return createAiReasoner(config.reasoning);
  }
  return new RuleBasedReasoner({ analysis: config.analysis, areas: config.areas });
}

export async function buildBackend(config: CoordinatorConfig): Promise<ContextBackend> {
  if (config.store.driver === 'libsql') {
    const backend = new LibsqlBackend({ url: config.store.url, authToken: config.store.authToken });
    await backend.initialize();
    return backend;
  }
  return new MemoryBackend();
}

export async function createOrchestrator(
  input: CoordinatorConfigInput = {},
  overrides: OrchestratorOverrides = {}
): Promise<Orchestrator> {
  const config = CoordinatorConfigSchema.parse(input);
  setLogLevel(config.logLevel);

  const backend = overrides.backend ?? (await buildBackend(config));
  const store = new ContextStore(backend, overrides.guard ?? new AuthorityGuard(), {
    clock: overrides.clock,
    maxInternalRetries: config.store.maxInternalRetries,
  });

  const journal = config.channel.journalPath
    ? new MessageJournal({ path: config.channel.journalPath })
    : undefined;
  if (journal) await journal.initialize();

  const channel = new MessageChannel({
    historyLimit: config.channel.historyLimit,
    defaultSubscribeOptions: {
      ...(config.channel.queueBound !== undefined ? { bound: config.channel.queueBound } : {}),
      policy: config.channel.backpressure,
    },
    journal,
    clock: overrides.clock,
  });

  const reasoner = overrides.reasoner ?? buildReasoner(config);
  log.info(
    { store: backend.name, reasoner: reasoner.name, journal: journal?.path ?? null },
    'Orchestrator assembled'
  );

  return new Orchestrator({
    store,
    channel,
    reasoner,
    reasoners: overrides.reasoners,
    mode: config.mode,
    reasoning: {
      deadlineMs: config.reasoning.deadlineMs,
      maxAttempts: config.reasoning.maxAttempts,
      baseDelayMs: config.reasoning.baseDelayMs,
      maxDelayMs: config.reasoning.maxDelayMs,
    },
    maxConflictRetries: config.workers.maxConflictRetries,
    quiescenceGraceMs: config.orchestrator.quiescenceGraceMs,
    runTimeoutMs: config.orchestrator.runTimeoutMs,
    shutdownTimeoutMs: config.orchestrator.shutdownTimeoutMs,
  });
}
