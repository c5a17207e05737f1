import { z } from 'zod';
import { cancelEpisode, type CancelResult } from './cancellation';
import { isGeneratingStatus } from './episodeStatus';
import { silentLogger, type Logger } from './log';
import {
  CONTENT_STYLES,
  EPISODE_STATUSES,
  type ContentTemplateRecord,
  type EpisodeRecord,
  type EpisodeStatsRow,
  type GenerationLogRecord,
  type RecentActivityRow,
} from './models';
import type { EpisodeStore, GenerationLogStore, TemplateStore } from './stores';

export const createEpisodeInputSchema = z.object({
  title: z.string().trim().min(1, 'Title cannot be empty').max(500, 'Title must be at most 500 characters'),
  description: z.string().trim().max(2000, 'Description must be at most 2000 characters').nullish(),
  targetDurationMinutes: z.number().int().min(5).max(60).optional(),
  contentStyle: z.enum(CONTENT_STYLES).optional(),
  voiceSpeed: z.number().min(0.5).max(2).optional(),
  tags: z.array(z.string().trim().min(1).max(64)).max(32).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type CreateEpisodeInput = z.infer<typeof createEpisodeInputSchema>;

export const listEpisodesQuerySchema = z.object({
  status: z.enum(EPISODE_STATUSES).optional(),
  contentStyle: z.enum(CONTENT_STYLES).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export type ListEpisodesQuery = z.infer<typeof listEpisodesQuerySchema>;

/** Anything that can queue an episode for generation, such as an in-process scheduler. */
export type EpisodeDispatcher = {
  submit(episodeId: string): boolean;
};

export type EpisodeServiceDeps = {
  store: EpisodeStore;
  logs: GenerationLogStore;
  templates: TemplateStore;
  dispatcher?: EpisodeDispatcher;
  defaults: {
    targetDurationMinutes: number;
    voiceSpeed: number;
  };
  logger?: Logger;
};

export type DeleteOutcome = 'deleted' | 'not_found' | 'in_flight';

export type PipelineStats = {
  byStyleAndStatus: EpisodeStatsRow[];
  recentActivity: RecentActivityRow[];
};

export type EpisodeService = ReturnType<typeof createEpisodeService>;

function uniqueTags(tags: readonly string[]): string[] {
  return [...new Set(tags)];
}

export function createEpisodeService(deps: EpisodeServiceDeps) {
  const logger = deps.logger ?? silentLogger;

  return {
    async createEpisode(input: CreateEpisodeInput): Promise<EpisodeRecord> {
      const episode = await deps.store.insertEpisode({
        title: input.title,
        description: input.description || null,
        targetDurationMinutes: input.targetDurationMinutes ?? deps.defaults.targetDurationMinutes,
        contentStyle: input.contentStyle ?? 'educational',
        metadata: { ...input.metadata, voiceSpeed: input.voiceSpeed ?? deps.defaults.voiceSpeed },
        tags: uniqueTags(input.tags ?? []),
      });
      logger.info('episode.created', { episodeId: episode.id, contentStyle: episode.content_style });
      deps.dispatcher?.submit(episode.id);
      return episode;
    },

    getEpisode(episodeId: string): Promise<EpisodeRecord | null> {
      return deps.store.getEpisode(episodeId);
    },

    async cancelEpisode(episodeId: string): Promise<CancelResult> {
      const result = await cancelEpisode({ store: deps.store, logs: deps.logs }, episodeId);
      logger.info('episode.cancel', { episodeId, outcome: result.outcome });
      return result;
    },

    listEpisodes(query: ListEpisodesQuery = {}): Promise<EpisodeRecord[]> {
      return deps.store.listEpisodes(query);
    },

    async getEpisodeLogs(episodeId: string): Promise<GenerationLogRecord[] | null> {
      const episode = await deps.store.getEpisode(episodeId);
      if (!episode) return null;
      return deps.logs.listLogs(episodeId);
    },

    async getStats(recentLimit = 50): Promise<PipelineStats> {
      const [byStyleAndStatus, recentActivity] = await Promise.all([
        deps.store.getStats(),
        deps.store.listRecentActivity(recentLimit),
      ]);
      return { byStyleAndStatus, recentActivity };
    },

    listTemplates(): Promise<ContentTemplateRecord[]> {
      return deps.templates.listTemplates({ activeOnly: true });
    },

    /** Drafts and terminal episodes only; their audit rows go with them. */
    async deleteEpisode(episodeId: string): Promise<DeleteOutcome> {
      const episode = await deps.store.getEpisode(episodeId);
      if (!episode) return 'not_found';
      if (isGeneratingStatus(episode.status)) return 'in_flight';
      const deleted = await deps.store.deleteEpisode(episodeId);
      if (deleted) {
        logger.info('episode.deleted', { episodeId, status: episode.status });
        return 'deleted';
      }
      const latest = await deps.store.getEpisode(episodeId);
      return latest ? 'in_flight' : 'not_found';
    },
  };
}
