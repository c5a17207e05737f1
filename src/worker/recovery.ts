import { stageForStatus } from '../lib/episodeStatus';
import { errorMessage, type Logger } from '../lib/log';
import type { EpisodeStore, GenerationLogStore } from '../lib/stores';

export const INTERRUPTED_MESSAGE = 'Generation interrupted before completion';

export type RecoveryResult = {
  processed: number;
  failed: number;
  stale: number;
};

/**
 * Fails episodes a dead worker left in a generating status. Only safe when
 * this process is the sole worker against the database.
 */
export async function recoverOrphanedEpisodes(deps: {
  store: EpisodeStore;
  logs: GenerationLogStore;
  logger: Logger;
}): Promise<RecoveryResult> {
  const orphans = await deps.store.listGeneratingEpisodes();
  const result: RecoveryResult = { processed: orphans.length, failed: 0, stale: 0 };

  for (const episode of orphans) {
    try {
      const failed = await deps.store.transitionEpisode(episode.id, {
        from: episode.status,
        to: 'failed',
        patch: { error_message: INTERRUPTED_MESSAGE },
      });
      if (!failed) {
        result.stale += 1;
        continue;
      }
      await deps.logs.appendLog({
        episodeId: episode.id,
        step: 'pipeline',
        status: 'terminal',
        message: INTERRUPTED_MESSAGE,
        metadata: {
          reason: 'orphaned',
          previousStatus: episode.status,
          stage: stageForStatus(episode.status),
          retryCount: episode.retry_count,
        },
      });
      result.failed += 1;
    } catch (error) {
      deps.logger.error('recovery.episode_error', { episodeId: episode.id, message: errorMessage(error) });
    }
  }

  if (result.processed > 0) deps.logger.warn('recovery.finished', { ...result });
  return result;
}
