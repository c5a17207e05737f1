import type { SpeechSynthesizer } from '../../lib/collaborators/types';
import type { EpisodeRecord } from '../../lib/models';
import { invalidInput } from '../../lib/pipelineErrors';
import { scriptToNarration } from '../../lib/scriptDocument';
import { withStageTimeout } from './timeout';
import type { StageExecutor, StageOutcome } from './types';

export type AudioStageConfig = {
  model: string;
  voiceSpeed: number;
  sampleRate: number;
  format: string;
  bitrate: string;
  timeoutMs: number;
};

/** Per-episode `metadata.voiceSpeed` wins over the configured speed when it is in range. */
export function resolveVoiceSpeed(metadata: Record<string, unknown>, fallback: number): number {
  const value = metadata.voiceSpeed;
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0.5 && value <= 2) return value;
  return fallback;
}

export class AudioStage implements StageExecutor {
  readonly stage = 'audio';
  readonly step = 'audio_synthesis';
  readonly status = 'generating_audio';
  readonly timeoutMs: number;

  constructor(
    private readonly deps: { synthesizer: SpeechSynthesizer },
    private readonly config: AudioStageConfig,
  ) {
    this.timeoutMs = config.timeoutMs;
  }

  async execute(episode: EpisodeRecord): Promise<StageOutcome> {
    if (!episode.script) invalidInput('Episode has no script to narrate', { episodeId: episode.id });
    const text = scriptToNarration(episode.script);
    if (!text.trim()) invalidInput('Script has no narratable content', { episodeId: episode.id });

    const voiceSpeed = resolveVoiceSpeed(episode.metadata, this.config.voiceSpeed);
    const result = await withStageTimeout(this.stage, this.timeoutMs, (signal) =>
      this.deps.synthesizer.synthesizeAudio(
        {
          episodeId: episode.id,
          text,
          model: this.config.model,
          voiceSpeed,
          sampleRate: this.config.sampleRate,
          format: this.config.format,
          bitrate: this.config.bitrate,
        },
        signal,
      ),
    );

    return {
      patch: {
        audio_path: result.filePath,
        duration_seconds: Math.round(result.durationSeconds),
      },
      metadata: {
        voiceSpeed,
        durationSeconds: result.durationSeconds,
        fileSizeBytes: result.fileSizeBytes,
        sampleRate: result.sampleRate,
        format: result.format,
      },
    };
  }
}
