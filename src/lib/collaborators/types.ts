import type { ContentStyle, ScriptDocument, TemplateData } from '../models';

export type ScriptRequest = {
  episodeId: string;
  title: string;
  description: string;
  durationMinutes: number;
  style: ContentStyle;
  template: TemplateData | null;
  model: string;
};

export type ScriptGenerator = {
  generateScript(request: ScriptRequest, signal: AbortSignal): Promise<ScriptDocument>;
};

export type SpeechRequest = {
  episodeId: string;
  text: string;
  model: string;
  voiceSpeed: number;
  sampleRate: number;
  format: string;
  bitrate: string;
};

export type SpeechResult = {
  filePath: string;
  durationSeconds: number;
  fileSizeBytes: number;
  sampleRate: number;
  format: string;
};

export type SpeechSynthesizer = {
  synthesizeAudio(request: SpeechRequest, signal: AbortSignal): Promise<SpeechResult>;
};

export type VideoRequest = {
  episodeId: string;
  title: string;
  audioPath: string;
  script: ScriptDocument;
  resolution: string;
  fps: number;
  codec: string;
  quality: string;
};

export type VideoResult = {
  filePath: string;
  durationSeconds: number;
  fileSizeBytes: number;
  resolution: string;
  fps: number;
  codec: string;
  thumbnailPath: string | null;
};

export type MediaAssembler = {
  assembleVideo(request: VideoRequest, signal: AbortSignal): Promise<VideoResult>;
};

export type CollaboratorHealth = {
  name: string;
  ok: boolean;
  detail?: string;
};

export type HealthProbe = {
  readonly name: string;
  checkHealth(signal?: AbortSignal): Promise<CollaboratorHealth>;
};
