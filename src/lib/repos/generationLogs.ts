import type { GenerationLogInput, GenerationLogRecord } from '../models';
import type { GenerationLogStore } from '../stores';
import { queryRows } from '../db';

export async function appendGenerationLog(input: GenerationLogInput): Promise<GenerationLogRecord> {
  const rows = await queryRows<GenerationLogRecord>(
    `
      INSERT INTO generation_logs (
        episode_id,
        step,
        status,
        message,
        execution_time_ms,
        metadata,
        created_at
      )
      VALUES ($1, $2, $3, $4, $5, $6::jsonb, NOW())
      RETURNING *
    `,
    [
      input.episodeId,
      input.step,
      input.status,
      input.message,
      input.executionTimeMs ?? null,
      JSON.stringify(input.metadata || {}),
    ],
  );
  const entry = rows[0];
  if (!entry) throw new Error('Generation log insert returned no row');
  return entry;
}

export async function listGenerationLogs(episodeId: string): Promise<GenerationLogRecord[]> {
  return queryRows<GenerationLogRecord>(
    `
      SELECT *
      FROM generation_logs
      WHERE episode_id = $1
      ORDER BY created_at ASC, id ASC
    `,
    [episodeId],
  );
}

export function createPgGenerationLogStore(): GenerationLogStore {
  return {
    appendLog: appendGenerationLog,
    listLogs: listGenerationLogs,
  };
}
