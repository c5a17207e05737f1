import { randomUUID } from 'node:crypto';
import type {
  EpisodePatch,
  EpisodeRecord,
  EpisodeStatsRow,
  NewEpisodeInput,
  RecentActivityRow,
} from '../models';
import type { EpisodeListFilters, EpisodeStore, TransitionInput } from '../stores';
import { queryRows } from '../db';

const PATCH_COLUMNS: ReadonlyArray<keyof EpisodePatch> = [
  'script',
  'script_path',
  'audio_path',
  'video_path',
  'thumbnail_path',
  'duration_seconds',
  'file_size_mb',
  'generation_started_at',
  'generation_completed_at',
  'error_message',
  'retry_count',
];

function normalizeLimit(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(min, Math.min(max, Math.round(value)));
}

function buildPatchAssignments(patch: EpisodePatch, params: unknown[]): string[] {
  const assignments: string[] = [];
  for (const column of PATCH_COLUMNS) {
    const value = patch[column];
    if (value === undefined) continue;
    if (column === 'script') {
      params.push(value === null ? null : JSON.stringify(value));
      assignments.push(`script = $${params.length}::jsonb`);
      continue;
    }
    params.push(value);
    assignments.push(`${column} = $${params.length}`);
  }
  return assignments;
}

export async function insertEpisode(input: NewEpisodeInput): Promise<EpisodeRecord> {
  const rows = await queryRows<EpisodeRecord>(
    `
      INSERT INTO episodes (
        id,
        title,
        description,
        status,
        content_style,
        target_duration_minutes,
        retry_count,
        metadata,
        tags,
        created_at,
        updated_at
      )
      VALUES ($1, $2, $3, 'draft', $4::content_style, $5, 0, $6::jsonb, $7::text[], NOW(), NOW())
      RETURNING *
    `,
    [
      randomUUID(),
      input.title,
      input.description,
      input.contentStyle,
      input.targetDurationMinutes,
      JSON.stringify(input.metadata),
      input.tags,
    ],
  );
  const episode = rows[0];
  if (!episode) throw new Error('Episode insert returned no row');
  return episode;
}

export async function getEpisodeById(episodeId: string): Promise<EpisodeRecord | null> {
  const rows = await queryRows<EpisodeRecord>(
    `
      SELECT *
      FROM episodes
      WHERE id = $1
      LIMIT 1
    `,
    [episodeId],
  );
  return rows[0] || null;
}

export async function listEpisodes(filters: EpisodeListFilters): Promise<EpisodeRecord[]> {
  const where: string[] = [];
  const params: unknown[] = [];
  if (filters.status) {
    params.push(filters.status);
    where.push(`status = $${params.length}::episode_status`);
  }
  if (filters.contentStyle) {
    params.push(filters.contentStyle);
    where.push(`content_style = $${params.length}::content_style`);
  }
  params.push(normalizeLimit(filters.limit, 50, 1, 500));
  return queryRows<EpisodeRecord>(
    `
      SELECT *
      FROM episodes
      ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
      ORDER BY updated_at DESC
      LIMIT $${params.length}
    `,
    params,
  );
}

export async function listDraftEpisodes(limit: number): Promise<EpisodeRecord[]> {
  return queryRows<EpisodeRecord>(
    `
      SELECT *
      FROM episodes
      WHERE status = 'draft'
      ORDER BY created_at ASC, id ASC
      LIMIT $1
    `,
    [normalizeLimit(limit, 50, 1, 500)],
  );
}

export async function listGeneratingEpisodes(): Promise<EpisodeRecord[]> {
  return queryRows<EpisodeRecord>(
    `
      SELECT *
      FROM episodes
      WHERE status IN ('generating_script', 'generating_audio', 'generating_video')
      ORDER BY generation_started_at ASC NULLS LAST, created_at ASC
    `,
  );
}

export async function transitionEpisode(episodeId: string, input: TransitionInput): Promise<EpisodeRecord | null> {
  const params: unknown[] = [episodeId, input.from, input.to];
  const assignments = buildPatchAssignments(input.patch || {}, params);
  const rows = await queryRows<EpisodeRecord>(
    `
      UPDATE episodes
      SET
        status = $3::episode_status,
        ${assignments.map((assignment) => `${assignment},`).join('\n        ')}
        updated_at = NOW()
      WHERE id = $1 AND status = $2::episode_status
      RETURNING *
    `,
    params,
  );
  return rows[0] || null;
}

export async function requestEpisodeCancellation(episodeId: string): Promise<EpisodeRecord | null> {
  const rows = await queryRows<EpisodeRecord>(
    `
      UPDATE episodes
      SET
        cancel_requested_at = COALESCE(cancel_requested_at, NOW()),
        updated_at = NOW()
      WHERE id = $1 AND status IN ('generating_script', 'generating_audio', 'generating_video')
      RETURNING *
    `,
    [episodeId],
  );
  return rows[0] || null;
}

export async function deleteEpisode(episodeId: string): Promise<boolean> {
  const rows = await queryRows<{ id: string }>(
    `
      DELETE FROM episodes
      WHERE id = $1 AND status IN ('draft', 'completed', 'failed', 'cancelled')
      RETURNING id
    `,
    [episodeId],
  );
  return rows.length > 0;
}

export async function getEpisodeStats(): Promise<EpisodeStatsRow[]> {
  return queryRows<EpisodeStatsRow>(
    `
      SELECT
        content_style,
        status,
        count::int AS count,
        avg_duration_seconds::float8 AS avg_duration_seconds,
        avg_file_size_mb::float8 AS avg_file_size_mb,
        first_created,
        last_created
      FROM episode_stats
      ORDER BY content_style, status
    `,
  );
}

export async function listRecentActivity(limit: number): Promise<RecentActivityRow[]> {
  return queryRows<RecentActivityRow>(
    `
      SELECT
        id,
        title,
        status,
        created_at,
        updated_at,
        generation_time_seconds::float8 AS generation_time_seconds
      FROM recent_activity
      LIMIT $1
    `,
    [normalizeLimit(limit, 50, 1, 50)],
  );
}

export function createPgEpisodeStore(): EpisodeStore {
  return {
    insertEpisode,
    getEpisode: getEpisodeById,
    listEpisodes,
    listDraftEpisodes,
    listGeneratingEpisodes,
    transitionEpisode,
    requestCancellation: requestEpisodeCancellation,
    deleteEpisode,
    getStats: getEpisodeStats,
    listRecentActivity,
  };
}
