import { isGeneratingStatus, isTerminalStatus } from './episodeStatus';
import type { EpisodeRecord } from './models';
import { internalInconsistency } from './pipelineErrors';
import type { EpisodeStore, GenerationLogStore } from './stores';

export type CancelOutcome = 'cancelled' | 'cancel_requested' | 'already_terminal' | 'not_found';

export type CancelResult = {
  outcome: CancelOutcome;
  episode: EpisodeRecord | null;
};

/**
 * A draft is cancelled outright. A generating episode only gets a request
 * flag; the worker driving it stops at its next stage boundary.
 */
export async function cancelEpisode(
  deps: { store: EpisodeStore; logs: GenerationLogStore },
  episodeId: string,
): Promise<CancelResult> {
  // draft -> generating -> terminal is the longest race, so three reads settle it.
  for (let pass = 0; pass < 3; pass += 1) {
    const episode = await deps.store.getEpisode(episodeId);
    if (!episode) return { outcome: 'not_found', episode: null };
    if (isTerminalStatus(episode.status)) return { outcome: 'already_terminal', episode };

    if (episode.status === 'draft') {
      const cancelled = await deps.store.transitionEpisode(episodeId, { from: 'draft', to: 'cancelled' });
      if (!cancelled) continue;
      await deps.logs.appendLog({
        episodeId,
        step: 'pipeline',
        status: 'cancelled',
        message: 'Cancelled before admission',
      });
      return { outcome: 'cancelled', episode: cancelled };
    }

    if (isGeneratingStatus(episode.status)) {
      const flagged = await deps.store.requestCancellation(episodeId);
      if (!flagged) continue;
      return { outcome: 'cancel_requested', episode: flagged };
    }
  }

  internalInconsistency('Episode status kept changing while cancelling', { episodeId });
}
