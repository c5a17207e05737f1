import type { EpisodePatch, EpisodeRecord, GeneratingStatus, GenerationStep } from '../../lib/models';

export type Stage = 'script' | 'audio' | 'video';

export type StageOutcome = {
  patch: EpisodePatch;
  /** Diagnostic fields copied into the attempt's audit entry. */
  metadata: Record<string, unknown>;
};

/**
 * One production step. `execute` performs exactly one collaborator call and
 * either resolves with the artifact patch or throws; it never retries.
 */
export type StageExecutor = {
  readonly stage: Stage;
  readonly step: GenerationStep;
  readonly status: GeneratingStatus;
  readonly timeoutMs: number;
  execute(episode: EpisodeRecord): Promise<StageOutcome>;
};
