import type { EpisodeStatus, GeneratingStatus, TerminalStatus } from './models';
import { internalInconsistency } from './pipelineErrors';
import type { Stage } from '../worker/stages/types';

const TRANSITIONS: Record<EpisodeStatus, readonly EpisodeStatus[]> = {
  draft: ['generating_script', 'cancelled'],
  generating_script: ['generating_script', 'generating_audio', 'failed', 'cancelled'],
  generating_audio: ['generating_audio', 'generating_video', 'failed', 'cancelled'],
  generating_video: ['generating_video', 'completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminalStatus(status: EpisodeStatus): status is TerminalStatus {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

export function isGeneratingStatus(status: EpisodeStatus): status is GeneratingStatus {
  return status === 'generating_script' || status === 'generating_audio' || status === 'generating_video';
}

export function canTransition(from: EpisodeStatus, to: EpisodeStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: EpisodeStatus, to: EpisodeStatus, episodeId?: string): void {
  if (canTransition(from, to)) return;
  if (isTerminalStatus(from)) {
    internalInconsistency(`Episode is already ${from}; cannot move to ${to}`, { episodeId, from, to });
  }
  internalInconsistency(`Invalid status transition ${from} -> ${to}`, { episodeId, from, to });
}

/** True when `path` walks the graph from `draft` without skipping or reversing a stage. */
export function isValidStatusPath(path: readonly EpisodeStatus[]): boolean {
  if (path.length === 0 || path[0] !== 'draft') return false;
  for (let i = 1; i < path.length; i += 1) {
    if (!canTransition(path[i - 1], path[i])) return false;
  }
  return true;
}

const STAGE_BY_STATUS: Record<GeneratingStatus, Stage> = {
  generating_script: 'script',
  generating_audio: 'audio',
  generating_video: 'video',
};

export function stageForStatus(status: EpisodeStatus): Stage | null {
  return isGeneratingStatus(status) ? STAGE_BY_STATUS[status] : null;
}
