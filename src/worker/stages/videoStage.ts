import type { MediaAssembler } from '../../lib/collaborators/types';
import type { EpisodeRecord } from '../../lib/models';
import { invalidInput } from '../../lib/pipelineErrors';
import { withStageTimeout } from './timeout';
import type { StageExecutor, StageOutcome } from './types';

export type VideoStageConfig = {
  resolution: string;
  fps: number;
  codec: string;
  quality: string;
  timeoutMs: number;
};

const BYTES_PER_MB = 1024 * 1024;

export class VideoStage implements StageExecutor {
  readonly stage = 'video';
  readonly step = 'video_assembly';
  readonly status = 'generating_video';
  readonly timeoutMs: number;

  constructor(
    private readonly deps: { assembler: MediaAssembler },
    private readonly config: VideoStageConfig,
  ) {
    this.timeoutMs = config.timeoutMs;
  }

  async execute(episode: EpisodeRecord): Promise<StageOutcome> {
    if (!episode.script) invalidInput('Episode has no script to assemble', { episodeId: episode.id });
    if (!episode.audio_path) invalidInput('Episode has no narration audio', { episodeId: episode.id });
    const script = episode.script;
    const audioPath = episode.audio_path;

    const result = await withStageTimeout(this.stage, this.timeoutMs, (signal) =>
      this.deps.assembler.assembleVideo(
        {
          episodeId: episode.id,
          title: episode.title,
          audioPath,
          script,
          resolution: this.config.resolution,
          fps: this.config.fps,
          codec: this.config.codec,
          quality: this.config.quality,
        },
        signal,
      ),
    );

    return {
      patch: {
        video_path: result.filePath,
        thumbnail_path: result.thumbnailPath,
        duration_seconds: Math.round(result.durationSeconds),
        file_size_mb: Math.round(result.fileSizeBytes / BYTES_PER_MB),
      },
      metadata: {
        resolution: result.resolution,
        fps: result.fps,
        codec: result.codec,
        fileSizeBytes: result.fileSizeBytes,
      },
    };
  }
}
