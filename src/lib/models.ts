export const EPISODE_STATUSES = [
  'draft',
  'generating_script',
  'generating_audio',
  'generating_video',
  'completed',
  'failed',
  'cancelled',
] as const;

export type EpisodeStatus = (typeof EPISODE_STATUSES)[number];

export type GeneratingStatus = Extract<EpisodeStatus, `generating_${string}`>;

export type TerminalStatus = Extract<EpisodeStatus, 'completed' | 'failed' | 'cancelled'>;

export const CONTENT_STYLES = ['educational', 'news', 'entertainment', 'podcast', 'tutorial', 'interview'] as const;

export type ContentStyle = (typeof CONTENT_STYLES)[number];

export type ScriptSection = {
  id: string;
  type: string;
  content: string;
  duration_seconds: number;
  metadata?: Record<string, unknown>;
};

export type ScriptDocument = {
  title: string;
  total_duration_seconds: number;
  sections: ScriptSection[];
  metadata: Record<string, unknown>;
};

export type EpisodeRecord = {
  id: string;
  title: string;
  description: string | null;
  script: ScriptDocument | null;
  status: EpisodeStatus;
  content_style: ContentStyle;
  audio_path: string | null;
  video_path: string | null;
  thumbnail_path: string | null;
  script_path: string | null;
  duration_seconds: number | null;
  file_size_mb: number | null;
  target_duration_minutes: number;
  generation_started_at: Date | null;
  generation_completed_at: Date | null;
  cancel_requested_at: Date | null;
  error_message: string | null;
  retry_count: number;
  metadata: Record<string, unknown>;
  tags: string[];
  created_at: Date;
  updated_at: Date;
};

/** Columns a stage or lifecycle write may set alongside a status transition. */
export type EpisodePatch = Partial<
  Pick<
    EpisodeRecord,
    | 'script'
    | 'script_path'
    | 'audio_path'
    | 'video_path'
    | 'thumbnail_path'
    | 'duration_seconds'
    | 'file_size_mb'
    | 'generation_started_at'
    | 'generation_completed_at'
    | 'error_message'
    | 'retry_count'
  >
>;

export type NewEpisodeInput = {
  title: string;
  description: string | null;
  targetDurationMinutes: number;
  contentStyle: ContentStyle;
  metadata: Record<string, unknown>;
  tags: string[];
};

export type GenerationStep = 'pipeline' | 'script_generation' | 'audio_synthesis' | 'video_assembly';

export type GenerationLogStatus =
  | 'started'
  | 'succeeded'
  | 'failed'
  | 'retrying'
  | 'terminal'
  | 'cancelled'
  | 'completed'
  | 'skipped'
  | 'inconsistent';

export type GenerationLogRecord = {
  id: number;
  episode_id: string;
  step: GenerationStep;
  status: GenerationLogStatus;
  message: string;
  execution_time_ms: number | null;
  metadata: Record<string, unknown>;
  created_at: Date;
};

export type GenerationLogInput = {
  episodeId: string;
  step: GenerationStep;
  status: GenerationLogStatus;
  message: string;
  executionTimeMs?: number | null;
  metadata?: Record<string, unknown>;
};

export type TemplateSection = {
  type: string;
  duration: number;
  template: string;
};

export type TemplateData = {
  sections: TemplateSection[];
  total_duration?: number;
  voice_settings?: Record<string, unknown>;
};

export type ContentTemplateRecord = {
  id: string;
  name: string;
  description: string | null;
  content_style: ContentStyle;
  template_data: TemplateData;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

export type EpisodeStatsRow = {
  content_style: ContentStyle;
  status: EpisodeStatus;
  count: number;
  avg_duration_seconds: number | null;
  avg_file_size_mb: number | null;
  first_created: Date;
  last_created: Date;
};

export type RecentActivityRow = {
  id: string;
  title: string;
  status: EpisodeStatus;
  created_at: Date;
  updated_at: Date;
  generation_time_seconds: number | null;
};
