import { randomUUID } from 'node:crypto';
import { loadEnvFiles, readPipelineConfig } from '../lib/config';
import { closePool } from '../lib/db';
import { createLogger, errorMessage } from '../lib/log';
import { createLocalMediaStore } from '../lib/media';
import { createPgEpisodeStore } from '../lib/repos/episodes';
import { createPgGenerationLogStore } from '../lib/repos/generationLogs';
import { createPgTemplateStore } from '../lib/repos/templates';
import { createRetryPolicy } from '../lib/retryPolicy';
import { ensureSchema } from '../lib/schema';
import { createHttpCollaborators, createStageExecutors } from './pipeline';
import { recoverOrphanedEpisodes } from './recovery';
import { Scheduler } from './scheduler';

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

async function run() {
  const envFiles = await loadEnvFiles();
  const config = readPipelineConfig();
  const workerId = process.env.PIPELINE_WORKER_ID?.trim() || `${process.pid}-${randomUUID().slice(0, 8)}`;
  const logger = createLogger({ level: config.logLevel, base: { workerId } });
  await ensureSchema();

  const store = createPgEpisodeStore();
  const logs = createPgGenerationLogStore();
  const templates = createPgTemplateStore();
  const collaborators = createHttpCollaborators(config);
  const stages = createStageExecutors(config, {
    ...collaborators,
    templates,
    media: createLocalMediaStore(config.collaborators.dataPath),
  });

  if (config.recoverOrphans) {
    await recoverOrphanedEpisodes({ store, logs, logger });
  }

  const scheduler = new Scheduler({
    store,
    logs,
    stages,
    retryPolicy: createRetryPolicy({
      maxAttempts: config.defaultMaxAttempts,
      backoffBaseMs: config.backoffBaseMs,
      backoffMaxMs: config.backoffMaxMs,
      overloadBackoffBaseMs: config.overloadBackoffBaseMs,
    }),
    maxAttempts: config.maxAttempts,
    logger,
    sleep,
    maxConcurrentJobs: config.maxConcurrentJobs,
    refillBatchSize: config.refillBatchSize,
  });

  const once = process.argv.includes('--once');
  if (once) {
    let handled = 0;
    while (true) {
      const submitted = await scheduler.refill();
      if (submitted === 0) break;
      handled += submitted;
      await scheduler.drain();
    }
    logger.info('worker.once_finished', { handled, concurrency: config.maxConcurrentJobs });
    await closePool();
    return;
  }

  let stopped = false;
  const stop = () => {
    if (stopped) return;
    stopped = true;
    logger.info('worker.stopping', { active: scheduler.snapshot().active.length });
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  logger.info('worker.started', {
    envFiles,
    maxConcurrentJobs: config.maxConcurrentJobs,
    pollIntervalMs: config.pollIntervalMs,
    refillBatchSize: config.refillBatchSize,
    maxAttempts: config.maxAttempts,
    stageTimeoutMs: config.stageTimeoutMs,
    backoffBaseMs: config.backoffBaseMs,
    backoffMaxMs: config.backoffMaxMs,
    overloadBackoffBaseMs: config.overloadBackoffBaseMs,
  });

  while (!stopped) {
    try {
      const submitted = await scheduler.refill();
      if (submitted > 0) logger.debug('worker.refilled', { submitted, ...scheduler.snapshot() });
    } catch (error) {
      logger.error('worker.refill_error', { message: errorMessage(error) });
    }
    await sleep(config.pollIntervalMs);
  }

  await scheduler.stop();
  await closePool();
  logger.info('worker.stopped', { concurrency: config.maxConcurrentJobs });
}

run().catch((error) => {
  console.error(
    JSON.stringify({ ts: new Date().toISOString(), level: 'error', event: 'worker.fatal', message: errorMessage(error) }),
  );
  process.exitCode = 1;
});
