import type { NextRequest } from 'next/server';
import { NextResponse } from 'next/server';
import { z } from 'zod';
import { jsonError } from './errors';
import { createLogger, errorMessage } from './log';
import { isPipelineError } from './pipelineErrors';

export type ApiHandler = () => Promise<NextResponse>;

export type EpisodeIdContext = {
  params: Promise<{ episodeId: string }>;
};

export class ApiHttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = 'ApiHttpError';
    this.status = status;
    this.code = code;
  }
}

const apiLogger = createLogger({ base: { component: 'api' } });

export async function runApi(handler: ApiHandler): Promise<NextResponse> {
  try {
    return await handler();
  } catch (error) {
    if (error instanceof ApiHttpError) {
      return jsonError(error.status, error.code, error.message);
    }
    if (isPipelineError(error) && error.kind === 'invalid-input') {
      return jsonError(400, 'INVALID_INPUT', error.message);
    }
    if (isPipelineError(error) && error.kind === 'internal-inconsistency') {
      return jsonError(409, 'STATE_CONFLICT', error.message);
    }
    apiLogger.error('api.handler_failed', { message: errorMessage(error) });
    return jsonError(500, 'INTERNAL_ERROR', 'Internal server error');
  }
}

export async function readJsonBody(request: NextRequest): Promise<unknown> {
  const text = await request.text();
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ApiHttpError(400, 'INVALID_JSON', 'Malformed JSON body');
  }
}

const episodeIdSchema = z.string().uuid();

/** Ids that cannot exist are reported as missing rather than passed to the database. */
export async function readEpisodeId(context: EpisodeIdContext): Promise<string> {
  const { episodeId } = await context.params;
  const parsed = episodeIdSchema.safeParse(episodeId);
  if (!parsed.success) {
    throw new ApiHttpError(404, 'EPISODE_NOT_FOUND', `Episode not found: ${episodeId}`);
  }
  return parsed.data;
}
