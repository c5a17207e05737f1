import { z } from 'zod';
import { joinUrl, probeHealth, requestJson } from './http';
import type { CollaboratorHealth, HealthProbe, MediaAssembler, VideoRequest, VideoResult } from './types';

const assembleResponseSchema = z.object({
  file_path: z.string().min(1),
  duration_seconds: z.number().nonnegative(),
  file_size_bytes: z.number().int().nonnegative(),
  resolution: z.string().min(1),
  fps: z.number().positive(),
  codec: z.string().min(1),
  thumbnail_path: z.string().min(1).nullable().optional(),
});

export class HttpMediaAssembler implements MediaAssembler, HealthProbe {
  readonly name = 'media-pipeline';

  constructor(private readonly baseUrl: string) {}

  async assembleVideo(request: VideoRequest, signal: AbortSignal): Promise<VideoResult> {
    const result = await requestJson({
      service: this.name,
      url: joinUrl(this.baseUrl, '/assemble'),
      body: {
        episode_id: request.episodeId,
        title: request.title,
        audio_path: request.audioPath,
        sections: request.script.sections.map((section) => ({
          id: section.id,
          type: section.type,
          content: section.content,
          duration_seconds: section.duration_seconds,
        })),
        resolution: request.resolution,
        fps: request.fps,
        codec: request.codec,
        quality: request.quality,
      },
      schema: assembleResponseSchema,
      signal,
    });
    return {
      filePath: result.file_path,
      durationSeconds: result.duration_seconds,
      fileSizeBytes: result.file_size_bytes,
      resolution: result.resolution,
      fps: result.fps,
      codec: result.codec,
      thumbnailPath: result.thumbnail_path ?? null,
    };
  }

  checkHealth(signal?: AbortSignal): Promise<CollaboratorHealth> {
    return probeHealth(this.name, joinUrl(this.baseUrl, '/health'), signal);
  }
}
