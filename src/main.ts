/**
 * Runs the baseline scenario end to end and logs the resulting picture.
 *
 *   npm start [trigger.json]
 */

import fs from 'node:fs';
import { loadConfig } from './config';
import { BASELINE_SEED, BASELINE_TRIGGER } from './orchestrator/scenario';
import { createOrchestrator } from './orchestrator/factory';
import { describeError } from './errors';
import { createModuleLogger, logError } from './utils/logger';

const log = createModuleLogger('main');

async function main(): Promise<number> {
  const config = loadConfig();
  const orchestrator = await createOrchestrator(config);

  try {
    await orchestrator.seed(BASELINE_SEED);
    const triggerPath = process.argv[2];
    const raw: unknown = triggerPath
      ? JSON.parse(fs.readFileSync(triggerPath, 'utf-8'))
      : BASELINE_TRIGGER;
    await orchestrator.injectTrigger(raw);

    const outcome = await orchestrator.runUntilQuiescent();
    const { observer } = orchestrator;
    const plan = await observer.getActivePlan();
    const tasks = await observer.getTasks();
    const assets = await observer.getAssets();

    log.info(
      {
        outcome,
        plan: plan ? { id: plan.id, version: plan.version, assignments: plan.assignments } : null,
        tasks: tasks.map((t) => ({ id: t.id, asset: t.assetId, area: t.targetArea, status: t.status })),
        assets: assets.map((a) => ({ id: a.id, assignment: a.assignment, task: a.currentTask })),
        auditEntries: await observer.getAuditCount(),
        workerEvents: observer.getWorkerEvents().length,
      },
      'Run finished'
    );
    return outcome === 'quiescent' ? 0 : 1;
  } finally {
    await orchestrator.shutdown();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logError(`Run failed: ${describeError(error)}`, error);
    process.exitCode = 1;
  }
);
