import { z } from 'zod';
import { joinUrl, probeHealth, requestJson } from './http';
import type { CollaboratorHealth, HealthProbe, SpeechRequest, SpeechResult, SpeechSynthesizer } from './types';

const synthesizeResponseSchema = z.object({
  file_path: z.string().min(1),
  duration_seconds: z.number().nonnegative(),
  file_size_bytes: z.number().int().nonnegative(),
  sample_rate: z.number().int().positive(),
  format: z.string().min(1),
});

export class HttpSpeechSynthesizer implements SpeechSynthesizer, HealthProbe {
  readonly name = 'tts';

  constructor(private readonly baseUrl: string) {}

  async synthesizeAudio(request: SpeechRequest, signal: AbortSignal): Promise<SpeechResult> {
    const result = await requestJson({
      service: this.name,
      url: joinUrl(this.baseUrl, '/synthesize'),
      body: {
        episode_id: request.episodeId,
        text: request.text,
        model: request.model,
        voice_speed: request.voiceSpeed,
        sample_rate: request.sampleRate,
        format: request.format,
        bitrate: request.bitrate,
      },
      schema: synthesizeResponseSchema,
      signal,
    });
    return {
      filePath: result.file_path,
      durationSeconds: result.duration_seconds,
      fileSizeBytes: result.file_size_bytes,
      sampleRate: result.sample_rate,
      format: result.format,
    };
  }

  checkHealth(signal?: AbortSignal): Promise<CollaboratorHealth> {
    return probeHealth(this.name, joinUrl(this.baseUrl, '/health'), signal);
  }
}
