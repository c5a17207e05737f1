import { assertTransition, isGeneratingStatus, stageForStatus } from '../lib/episodeStatus';
import { errorMessage, type Logger } from '../lib/log';
import type { EpisodePatch, EpisodeRecord, EpisodeStatus, GenerationLogInput } from '../lib/models';
import { internalInconsistency, PipelineError, toPipelineError } from '../lib/pipelineErrors';
import type { RetryPolicy } from '../lib/retryPolicy';
import type { EpisodeStore, GenerationLogStore } from '../lib/stores';
import type { Stage, StageExecutor, StageOutcome } from './stages/types';

export type EpisodeRunDeps = {
  store: EpisodeStore;
  logs: GenerationLogStore;
  /** Ordered; the first stage's status is the admission status. */
  stages: readonly StageExecutor[];
  retryPolicy: RetryPolicy;
  maxAttempts: Record<Stage, number>;
  logger: Logger;
  sleep: (ms: number) => Promise<void>;
  now?: () => Date;
};

export type EpisodeRunOutcome = 'completed' | 'failed' | 'cancelled' | 'skipped' | 'inconsistent';

export type EpisodeRunResult = {
  episodeId: string;
  outcome: EpisodeRunOutcome;
  status: EpisodeStatus | null;
};

const INTERRUPTED_BY_CANCEL = 'Cancelled at stage boundary';
const FAIL_WRITE_BACKOFF_BASE_MS = 1_000;
const FAIL_WRITE_BACKOFF_MAX_MS = 30_000;

/**
 * Drives one episode from admission to a terminal status. Every status change
 * is a conditional write against the status this run last observed; a failed
 * write means another actor moved the row and surfaces as an inconsistency.
 */
export async function runEpisode(deps: EpisodeRunDeps, episodeId: string): Promise<EpisodeRunResult> {
  const now = deps.now ?? (() => new Date());
  const firstStage = deps.stages[0];
  if (!firstStage) throw new Error('runEpisode requires at least one stage');

  const audit = (input: Omit<GenerationLogInput, 'episodeId'>) => deps.logs.appendLog({ episodeId, ...input });

  const transition = async (from: EpisodeStatus, to: EpisodeStatus, patch?: EpisodePatch): Promise<EpisodeRecord> => {
    assertTransition(from, to, episodeId);
    const updated = await deps.store.transitionEpisode(episodeId, { from, to, patch });
    if (!updated) internalInconsistency(`Episode left ${from} before the ${to} write`, { episodeId, from, to });
    return updated;
  };

  const pending = await deps.store.getEpisode(episodeId);
  if (!pending) {
    deps.logger.warn('episode.missing', { episodeId });
    return { episodeId, outcome: 'skipped', status: null };
  }
  if (pending.status !== 'draft') {
    await audit({ step: 'pipeline', status: 'skipped', message: `Episode is ${pending.status}; not admitted` });
    deps.logger.info('episode.skipped', { episodeId, status: pending.status });
    return { episodeId, outcome: 'skipped', status: pending.status };
  }

  const admitted = await deps.store.transitionEpisode(episodeId, {
    from: 'draft',
    to: firstStage.status,
    patch: { generation_started_at: now(), retry_count: 0, error_message: null },
  });
  if (!admitted) {
    const latest = await deps.store.getEpisode(episodeId);
    const status = latest?.status ?? null;
    if (latest) {
      await audit({ step: 'pipeline', status: 'skipped', message: `Episode is ${latest.status}; not admitted` });
    }
    deps.logger.info('episode.skipped', { episodeId, status });
    return { episodeId, outcome: 'skipped', status };
  }

  const pipelineStartedAt = Date.now();
  deps.logger.info('episode.admitted', { episodeId, title: admitted.title });

  try {
    await audit({ step: 'pipeline', status: 'started', message: 'Generation started' });
    for (let index = 0; index < deps.stages.length; index += 1) {
      const stage = deps.stages[index];
      const nextStatus: EpisodeStatus = deps.stages.at(index + 1)?.status ?? 'completed';

      for (;;) {
        const current = await deps.store.getEpisode(episodeId);
        if (!current) internalInconsistency('Episode disappeared during generation', { episodeId });
        if (current.status !== stage.status) {
          internalInconsistency(`Expected ${stage.status} but found ${current.status}`, {
            episodeId,
            expected: stage.status,
            actual: current.status,
          });
        }

        if (current.cancel_requested_at) {
          await transition(stage.status, 'cancelled');
          await audit({
            step: 'pipeline',
            status: 'cancelled',
            message: INTERRUPTED_BY_CANCEL,
            metadata: { stage: stage.stage },
          });
          deps.logger.info('episode.cancelled', { episodeId, stage: stage.stage });
          return { episodeId, outcome: 'cancelled', status: 'cancelled' };
        }

        const attempt = current.retry_count + 1;
        const startedAt = Date.now();
        const result = await executeStage(stage, current);
        const elapsed = Date.now() - startedAt;

        if (result.ok) {
          await audit({
            step: stage.step,
            status: 'succeeded',
            message: `${stage.stage} stage succeeded`,
            executionTimeMs: elapsed,
            metadata: { attempt, retryCount: current.retry_count, ...result.outcome.metadata },
          });
          deps.logger.info('stage.succeeded', { episodeId, stage: stage.stage, attempt, elapsedMs: elapsed });

          const patch: EpisodePatch = { ...result.outcome.patch, retry_count: 0 };
          if (nextStatus === 'completed') {
            const completedAt = now();
            const startedAtRow = current.generation_started_at;
            patch.generation_completed_at =
              startedAtRow && startedAtRow.getTime() > completedAt.getTime() ? startedAtRow : completedAt;
          }
          await transition(stage.status, nextStatus, patch);
          break;
        }

        const failure = result.failure;
        await audit({
          step: stage.step,
          status: 'failed',
          message: failure.message,
          executionTimeMs: elapsed,
          metadata: { attempt, retryCount: current.retry_count, kind: failure.kind, ...failure.context },
        });
        deps.logger.warn('stage.failed', {
          episodeId,
          stage: stage.stage,
          attempt,
          kind: failure.kind,
          message: failure.message,
        });

        const decision = deps.retryPolicy.decide({
          kind: failure.kind,
          retryCount: current.retry_count,
          maxAttempts: deps.maxAttempts[stage.stage],
        });

        if (decision.action === 'retry') {
          await transition(stage.status, stage.status, { retry_count: decision.nextRetryCount });
          await audit({
            step: stage.step,
            status: 'retrying',
            message: `Retrying ${stage.stage} stage in ${decision.backoffMs}ms`,
            metadata: { backoffMs: decision.backoffMs, nextAttempt: decision.nextRetryCount + 1, kind: failure.kind },
          });
          deps.logger.info('stage.retry_scheduled', {
            episodeId,
            stage: stage.stage,
            backoffMs: decision.backoffMs,
            retryCount: decision.nextRetryCount,
          });
          await deps.sleep(decision.backoffMs);
          continue;
        }

        await transition(stage.status, 'failed', { error_message: failure.message });
        await audit({
          step: stage.step,
          status: 'terminal',
          message: failure.message,
          metadata: { reason: decision.reason, kind: failure.kind, attempts: attempt },
        });
        deps.logger.error('episode.failed', {
          episodeId,
          stage: stage.stage,
          kind: failure.kind,
          reason: decision.reason,
          message: failure.message,
        });
        return { episodeId, outcome: 'failed', status: 'failed' };
      }
    }
  } catch (error) {
    if (error instanceof PipelineError && error.kind === 'internal-inconsistency') {
      return surfaceInconsistency(deps, episodeId, error);
    }
    return failAfterUnexpectedError(deps, episodeId, error);
  }

  await audit({
    step: 'pipeline',
    status: 'completed',
    message: 'Generation completed',
    executionTimeMs: Date.now() - pipelineStartedAt,
  });
  deps.logger.info('episode.completed', { episodeId, elapsedMs: Date.now() - pipelineStartedAt });
  return { episodeId, outcome: 'completed', status: 'completed' };
}

type StageAttempt = { ok: true; outcome: StageOutcome } | { ok: false; failure: PipelineError };

async function executeStage(stage: StageExecutor, episode: EpisodeRecord): Promise<StageAttempt> {
  try {
    return { ok: true, outcome: await stage.execute(episode) };
  } catch (error) {
    return { ok: false, failure: toPipelineError(error, `${stage.stage} stage failed`, { stage: stage.stage }) };
  }
}

async function surfaceInconsistency(
  deps: EpisodeRunDeps,
  episodeId: string,
  error: PipelineError,
): Promise<EpisodeRunResult> {
  deps.logger.error('episode.inconsistent', { episodeId, message: error.message, ...error.context });
  const latest = await deps.store.getEpisode(episodeId);
  if (latest) {
    await deps.logs.appendLog({
      episodeId,
      step: 'pipeline',
      status: 'inconsistent',
      message: error.message,
      metadata: { observedStatus: latest.status, ...error.context },
    });
  }
  return { episodeId, outcome: 'inconsistent', status: latest?.status ?? null };
}

function outcomeForStatus(status: EpisodeStatus | null): EpisodeRunOutcome {
  if (status === 'completed' || status === 'failed' || status === 'cancelled') return status;
  return 'inconsistent';
}

type FailWrite =
  | { kind: 'settled'; status: EpisodeStatus | null }
  | { kind: 'written'; previousStatus: EpisodeStatus }
  | { kind: 'raced' };

async function writeFailedStatus(deps: EpisodeRunDeps, episodeId: string, message: string): Promise<FailWrite> {
  const latest = await deps.store.getEpisode(episodeId);
  if (!latest || !isGeneratingStatus(latest.status)) return { kind: 'settled', status: latest?.status ?? null };
  const failed = await deps.store.transitionEpisode(episodeId, {
    from: latest.status,
    to: 'failed',
    patch: { error_message: message },
  });
  return failed ? { kind: 'written', previousStatus: latest.status } : { kind: 'raced' };
}

/**
 * A store or audit write threw mid-run. The row is still generating and must
 * not outlive this run's slot, so the `failed` write is retried until the row
 * is terminal.
 */
async function failAfterUnexpectedError(
  deps: EpisodeRunDeps,
  episodeId: string,
  error: unknown,
): Promise<EpisodeRunResult> {
  const message = `Generation stopped by an unexpected error: ${errorMessage(error)}`;
  deps.logger.error('episode.unexpected_error', { episodeId, message: errorMessage(error) });

  for (let attempt = 0; ; attempt += 1) {
    const step = await writeFailedStatus(deps, episodeId, message).catch((writeError: unknown) => {
      deps.logger.error('episode.fail_write_error', { episodeId, attempt, message: errorMessage(writeError) });
      return null;
    });
    if (!step) {
      await deps.sleep(Math.min(FAIL_WRITE_BACKOFF_MAX_MS, FAIL_WRITE_BACKOFF_BASE_MS * 2 ** Math.min(attempt, 5)));
      continue;
    }
    if (step.kind === 'raced') continue;
    if (step.kind === 'settled') return { episodeId, outcome: outcomeForStatus(step.status), status: step.status };

    try {
      await deps.logs.appendLog({
        episodeId,
        step: 'pipeline',
        status: 'terminal',
        message,
        metadata: {
          reason: 'unexpected_error',
          previousStatus: step.previousStatus,
          stage: stageForStatus(step.previousStatus),
        },
      });
    } catch (auditError) {
      deps.logger.error('episode.audit_write_error', { episodeId, message: errorMessage(auditError) });
    }
    return { episodeId, outcome: 'failed', status: 'failed' };
  }
}
