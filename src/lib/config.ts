import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Stage } from '../worker/stages/types';

type Env = Record<string, string | undefined>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type CollaboratorConfig = {
  ollamaHost: string;
  ollamaModel: string;
  ollamaTimeoutMs: number;
  ttsServiceUrl: string;
  ttsModel: string;
  ttsVoiceSpeed: number;
  ttsSampleRate: number;
  mediaPipelineUrl: string;
  videoResolution: string;
  videoFps: number;
  videoCodec: string;
  videoQuality: string;
  audioSampleRate: number;
  audioBitrate: string;
  audioFormat: string;
  dataPath: string;
};

export type PipelineConfig = {
  maxConcurrentJobs: number;
  pollIntervalMs: number;
  refillBatchSize: number;
  recoverOrphans: boolean;
  defaultMaxAttempts: number;
  maxAttempts: Record<Stage, number>;
  stageTimeoutMs: Record<Stage, number>;
  backoffBaseMs: number;
  backoffMaxMs: number;
  overloadBackoffBaseMs: number;
  defaultTargetDurationMinutes: number;
  logLevel: LogLevel;
  collaborators: CollaboratorConfig;
};

const STAGES: Stage[] = ['script', 'audio', 'video'];

export function clampInt(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, Math.round(value)));
}

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return clampInt(fallback, min, max);
  return clampInt(Number(raw), min, max);
}

function readFloat(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  const value = raw ? Number(raw) : fallback;
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

function readString(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = (env[name] || '').trim().toLowerCase();
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  return fallback;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const trimmed = (value || '').trim().toLowerCase();
  if (trimmed === 'debug' || trimmed === 'warn' || trimmed === 'error') return trimmed;
  return 'info';
}

export function parseIntMapEnv(value: string | undefined, min: number, max: number): Record<string, number> {
  if (!value || !value.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
    const result: Record<string, number> = {};
    for (const [rawKey, rawValue] of Object.entries(parsed)) {
      const key = rawKey.trim();
      if (!key) continue;
      if (typeof rawValue !== 'number' || !Number.isFinite(rawValue)) continue;
      result[key] = clampInt(rawValue, min, max);
    }
    return result;
  } catch {
    return {};
  }
}

function perStage(overrides: Record<string, number>, defaults: Record<Stage, number>): Record<Stage, number> {
  const result = { ...defaults };
  for (const stage of STAGES) {
    const override = overrides[stage];
    if (override !== undefined) result[stage] = override;
  }
  return result;
}

export function readCollaboratorConfig(env: Env = process.env): CollaboratorConfig {
  return {
    ollamaHost: readString(env, 'OLLAMA_HOST', 'http://ollama:11434'),
    ollamaModel: readString(env, 'OLLAMA_MODEL', 'mistral:7b'),
    ollamaTimeoutMs: readInt(env, 'OLLAMA_TIMEOUT', 300, 1, 86_400) * 1000,
    ttsServiceUrl: readString(env, 'TTS_SERVICE_URL', 'http://tts:5002'),
    ttsModel: readString(env, 'TTS_MODEL', 'ja_JP-takumi-medium'),
    ttsVoiceSpeed: readFloat(env, 'TTS_VOICE_SPEED', 1, 0.5, 2),
    ttsSampleRate: readInt(env, 'TTS_SAMPLE_RATE', 22_050, 8_000, 192_000),
    mediaPipelineUrl: readString(env, 'MEDIA_PIPELINE_URL', 'http://media:8080'),
    videoResolution: readString(env, 'VIDEO_RESOLUTION', '1920x1080'),
    videoFps: readInt(env, 'VIDEO_FPS', 30, 1, 120),
    videoCodec: readString(env, 'VIDEO_CODEC', 'libx264'),
    videoQuality: readString(env, 'VIDEO_QUALITY', 'high'),
    audioSampleRate: readInt(env, 'AUDIO_SAMPLE_RATE', 44_100, 8_000, 192_000),
    audioBitrate: readString(env, 'AUDIO_BITRATE', '192k'),
    audioFormat: readString(env, 'AUDIO_FORMAT', 'mp3'),
    dataPath: readString(env, 'DATA_PATH', '/data'),
  };
}

export function readPipelineConfig(env: Env = process.env): PipelineConfig {
  const collaborators = readCollaboratorConfig(env);
  const defaultMaxAttempts = readInt(env, 'STAGE_MAX_ATTEMPTS', 3, 1, 10);
  const backoffBaseMs = readInt(env, 'RETRY_BACKOFF_BASE_MS', 2_000, 0, 60_000);
  return {
    maxConcurrentJobs: readInt(env, 'MAX_CONCURRENT_JOBS', 3, 1, 32),
    pollIntervalMs: readInt(env, 'SCHEDULER_POLL_INTERVAL_MS', 1_500, 50, 60_000),
    refillBatchSize: readInt(env, 'SCHEDULER_REFILL_BATCH_SIZE', 50, 1, 500),
    recoverOrphans: readBool(env, 'SCHEDULER_RECOVER_ORPHANS', true),
    defaultMaxAttempts,
    maxAttempts: perStage(parseIntMapEnv(env.STAGE_MAX_ATTEMPTS_BY_STAGE, 1, 10), {
      script: defaultMaxAttempts,
      audio: defaultMaxAttempts,
      video: defaultMaxAttempts,
    }),
    stageTimeoutMs: perStage(parseIntMapEnv(env.STAGE_TIMEOUT_MS_BY_STAGE, 1_000, 7_200_000), {
      script: collaborators.ollamaTimeoutMs,
      audio: 600_000,
      video: 1_800_000,
    }),
    backoffBaseMs,
    backoffMaxMs: readInt(env, 'RETRY_BACKOFF_MAX_MS', 60_000, backoffBaseMs, 3_600_000),
    overloadBackoffBaseMs: readInt(env, 'OVERLOAD_BACKOFF_BASE_MS', 10_000, 0, 600_000),
    defaultTargetDurationMinutes: readInt(env, 'DEFAULT_TARGET_DURATION_MINUTES', 15, 5, 60),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    collaborators,
  };
}

function applyEnvText(text: string, env: Env): void {
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (!(key in env)) env[key] = value;
  }
}

/** Loads `.env.local` then `.env` from the working directory without overriding variables already set. */
export async function loadEnvFiles(cwd: string = process.cwd(), env: Env = process.env): Promise<string[]> {
  const loaded: string[] = [];
  for (const name of ['.env.local', '.env']) {
    const envPath = path.join(cwd, name);
    let text: string;
    try {
      text = await fs.readFile(envPath, 'utf8');
    } catch {
      continue;
    }
    applyEnvText(text, env);
    loaded.push(envPath);
  }
  return loaded;
}
