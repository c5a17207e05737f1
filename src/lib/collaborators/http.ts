import type { z } from 'zod';
import { errorMessage } from '../log';
import { isPipelineError, PipelineError, type FailureKind } from '../pipelineErrors';
import type { CollaboratorHealth } from './types';

export function classifyHttpStatus(status: number): FailureKind {
  if (status === 429 || status === 503) return 'resource-exhaustion';
  if (status >= 500) return 'transient-unavailable';
  if (status === 408) return 'timeout';
  if (status >= 400) return 'invalid-input';
  return 'transient-unavailable';
}

export function joinUrl(base: string, pathname: string): string {
  return `${base.replace(/\/+$/, '')}/${pathname.replace(/^\/+/, '')}`;
}

export type JsonRequest<T> = {
  service: string;
  url: string;
  method?: 'GET' | 'POST';
  body?: unknown;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  signal?: AbortSignal;
};

/**
 * Single JSON round trip to a collaborator. Every failure leaves here as a
 * classified PipelineError carrying the service name and, when known, the
 * response status code.
 */
export async function requestJson<T>(input: JsonRequest<T>): Promise<T> {
  const { service, url, signal } = input;
  let res: Response;
  try {
    res = await fetch(url, {
      method: input.method || 'POST',
      headers: input.body === undefined ? undefined : { 'content-type': 'application/json' },
      body: input.body === undefined ? undefined : JSON.stringify(input.body),
      signal,
    });
  } catch (error) {
    if (isPipelineError(error)) throw error;
    if (signal?.aborted) {
      throw new PipelineError('timeout', `${service} request aborted`, { service, url });
    }
    throw new PipelineError('transient-unavailable', `${service} unreachable: ${errorMessage(error)}`, { service, url });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new PipelineError(classifyHttpStatus(res.status), `${service} responded ${res.status}: ${text.slice(0, 300)}`, {
      service,
      url,
      statusCode: res.status,
    });
  }

  let payload: unknown;
  try {
    payload = await res.json();
  } catch (error) {
    throw new PipelineError('transient-unavailable', `${service} returned malformed JSON: ${errorMessage(error)}`, {
      service,
      url,
      statusCode: res.status,
    });
  }

  const parsed = input.schema.safeParse(payload);
  if (!parsed.success) {
    throw new PipelineError(
      'transient-unavailable',
      `${service} returned an unexpected payload: ${parsed.error.issues[0]?.message || 'invalid shape'}`,
      { service, url, statusCode: res.status },
    );
  }
  return parsed.data;
}

export async function probeHealth(name: string, url: string, signal?: AbortSignal): Promise<CollaboratorHealth> {
  try {
    const res = await fetch(url, { method: 'GET', signal });
    if (!res.ok) return { name, ok: false, detail: `HTTP ${res.status}` };
    return { name, ok: true };
  } catch (error) {
    return { name, ok: false, detail: errorMessage(error) };
  }
}
