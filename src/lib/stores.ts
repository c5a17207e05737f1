import type {
  ContentStyle,
  ContentTemplateRecord,
  EpisodePatch,
  EpisodeRecord,
  EpisodeStatsRow,
  EpisodeStatus,
  GenerationLogInput,
  GenerationLogRecord,
  NewEpisodeInput,
  RecentActivityRow,
} from './models';

export type TransitionInput = {
  from: EpisodeStatus;
  to: EpisodeStatus;
  patch?: EpisodePatch;
};

export type EpisodeListFilters = {
  status?: EpisodeStatus;
  contentStyle?: ContentStyle;
  limit?: number;
};

/**
 * Durable owner of episode rows. Every mutating call touches `updated_at`.
 * `transitionEpisode` writes only when the row is still in `from` and returns
 * null otherwise, so a caller never overwrites a state it did not observe.
 */
export type EpisodeStore = {
  insertEpisode(input: NewEpisodeInput): Promise<EpisodeRecord>;
  getEpisode(episodeId: string): Promise<EpisodeRecord | null>;
  listEpisodes(filters: EpisodeListFilters): Promise<EpisodeRecord[]>;
  /** Oldest first. */
  listDraftEpisodes(limit: number): Promise<EpisodeRecord[]>;
  listGeneratingEpisodes(): Promise<EpisodeRecord[]>;
  transitionEpisode(episodeId: string, input: TransitionInput): Promise<EpisodeRecord | null>;
  /** Marks an in-flight episode for cooperative cancellation. Null when it is not generating. */
  requestCancellation(episodeId: string): Promise<EpisodeRecord | null>;
  deleteEpisode(episodeId: string): Promise<boolean>;
  getStats(): Promise<EpisodeStatsRow[]>;
  listRecentActivity(limit: number): Promise<RecentActivityRow[]>;
};

export type GenerationLogStore = {
  appendLog(input: GenerationLogInput): Promise<GenerationLogRecord>;
  listLogs(episodeId: string): Promise<GenerationLogRecord[]>;
};

export type TemplateStore = {
  findActiveTemplate(style: ContentStyle): Promise<ContentTemplateRecord | null>;
  listTemplates(filters: { contentStyle?: ContentStyle; activeOnly?: boolean }): Promise<ContentTemplateRecord[]>;
};
