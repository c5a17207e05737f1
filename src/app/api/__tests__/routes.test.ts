import { NextRequest } from 'next/server';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { queryRows } from '@/lib/db';
import { createEpisodeService } from '@/lib/episodeService';
import { getEpisodeService, getHealthProbes } from '@/lib/services';
import { MemoryEpisodeStore, MemoryGenerationLogStore, MemoryTemplateStore } from '../../../testing/memoryStores';
import { GET as getEpisode, DELETE as deleteEpisode } from '../episodes/[episodeId]/route';
import { POST as cancelEpisode } from '../episodes/[episodeId]/cancel/route';
import { GET as getLogs } from '../episodes/[episodeId]/logs/route';
import { GET as listEpisodes, POST as createEpisode } from '../episodes/route';
import { GET as getHealth } from '../health/route';
import { GET as getStats } from '../stats/route';

vi.mock('@/lib/services', () => ({ getEpisodeService: vi.fn(), getHealthProbes: vi.fn() }));
vi.mock('@/lib/schema', () => ({ ensureSchema: vi.fn() }));
vi.mock('@/lib/db', () => ({ queryRows: vi.fn() }));

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

let store: MemoryEpisodeStore;

function context(episodeId: string) {
  return { params: Promise.resolve({ episodeId }) };
}

function request(path: string, init: { method?: string; body?: string; headers?: Record<string, string> } = {}) {
  return new NextRequest(`http://localhost${path}`, init);
}

beforeEach(() => {
  store = new MemoryEpisodeStore();
  const logs = new MemoryGenerationLogStore(store);
  vi.mocked(getEpisodeService).mockReturnValue(
    createEpisodeService({
      store,
      logs,
      templates: new MemoryTemplateStore(),
      defaults: { targetDurationMinutes: 15, voiceSpeed: 1 },
    }),
  );
  vi.stubEnv('PIPELINE_AUTH_MODE', 'disabled');
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('POST /api/episodes', () => {
  it('creates a draft episode', async () => {
    const res = await createEpisode(
      request('/api/episodes', { method: 'POST', body: JSON.stringify({ title: ' Deep Sea ', contentStyle: 'podcast' }) }),
    );

    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body.episode).toMatchObject({ title: 'Deep Sea', status: 'draft', content_style: 'podcast' });
    expect(store.rows.size).toBe(1);
  });

  it('names the invalid field', async () => {
    const res = await createEpisode(request('/api/episodes', { method: 'POST', body: JSON.stringify({ title: '' }) }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_INPUT', message: 'Title cannot be empty', field: 'title' },
    });
  });

  it('rejects malformed JSON', async () => {
    const res = await createEpisode(request('/api/episodes', { method: 'POST', body: '{"title":' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: { code: 'INVALID_JSON', message: 'Malformed JSON body' } });
  });

  it('requires an editor under dev headers auth', async () => {
    vi.stubEnv('PIPELINE_AUTH_MODE', 'dev_headers');
    const body = JSON.stringify({ title: 'Locked' });

    const anonymous = await createEpisode(request('/api/episodes', { method: 'POST', body }));
    expect(anonymous.status).toBe(401);

    const viewer = await createEpisode(
      request('/api/episodes', { method: 'POST', body, headers: { 'x-dev-user': 'sam', 'x-dev-role': 'viewer' } }),
    );
    expect(viewer.status).toBe(403);
    expect(await viewer.json()).toEqual({ error: { code: 'FORBIDDEN', message: 'Requires role editor' } });

    const editor = await createEpisode(
      request('/api/episodes', { method: 'POST', body, headers: { 'x-dev-user': 'sam', 'x-dev-role': 'editor' } }),
    );
    expect(editor.status).toBe(201);
  });
});

describe('GET /api/episodes', () => {
  it('filters by status', async () => {
    await store.seed({ title: 'Done', status: 'completed' });
    await store.seed({ title: 'Waiting' });

    const res = await listEpisodes(request('/api/episodes?status=completed'));

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.episodes.map((episode: { title: string }) => episode.title)).toEqual(['Done']);
  });

  it('rejects unknown statuses', async () => {
    const res = await listEpisodes(request('/api/episodes?status=bogus'));

    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error.code).toBe('INVALID_INPUT');
    expect(body.error.field).toBe('status');
  });
});

describe('/api/episodes/:episodeId', () => {
  it('returns an episode', async () => {
    const episode = await store.seed({ title: 'Found' });

    const res = await getEpisode(request(`/api/episodes/${episode.id}`), context(episode.id));

    expect(res.status).toBe(200);
    expect((await res.json()).episode.id).toBe(episode.id);
  });

  it('treats malformed and unknown ids as missing', async () => {
    const malformed = await getEpisode(request('/api/episodes/not-a-uuid'), context('not-a-uuid'));
    expect(malformed.status).toBe(404);
    expect(await malformed.json()).toEqual({
      error: { code: 'EPISODE_NOT_FOUND', message: 'Episode not found: not-a-uuid' },
    });

    const unknown = await getEpisode(request(`/api/episodes/${MISSING_ID}`), context(MISSING_ID));
    expect(unknown.status).toBe(404);
  });

  it('refuses to delete an episode that is generating', async () => {
    const episode = await store.seed({ title: 'Busy', status: 'generating_video' });

    const res = await deleteEpisode(request(`/api/episodes/${episode.id}`, { method: 'DELETE' }), context(episode.id));

    expect(res.status).toBe(409);
    expect((await res.json()).error.code).toBe('EPISODE_IN_FLIGHT');
  });

  it('deletes a finished episode', async () => {
    const episode = await store.seed({ title: 'Old', status: 'failed' });

    const res = await deleteEpisode(request(`/api/episodes/${episode.id}`, { method: 'DELETE' }), context(episode.id));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ deleted: true, episodeId: episode.id });
    expect(store.rows.has(episode.id)).toBe(false);
  });
});

describe('POST /api/episodes/:episodeId/cancel', () => {
  it('cancels drafts and reports terminal episodes', async () => {
    const draft = await store.seed({ title: 'Draft' });
    const done = await store.seed({ title: 'Done', status: 'completed' });

    const cancelled = await cancelEpisode(request(`/api/episodes/${draft.id}/cancel`, { method: 'POST' }), context(draft.id));
    expect(cancelled.status).toBe(200);
    expect((await cancelled.json()).outcome).toBe('cancelled');

    const terminal = await cancelEpisode(request(`/api/episodes/${done.id}/cancel`, { method: 'POST' }), context(done.id));
    expect(terminal.status).toBe(200);
    expect((await terminal.json()).outcome).toBe('already_terminal');

    const logs = await getLogs(request(`/api/episodes/${draft.id}/logs`), context(draft.id));
    const body = await logs.json();
    expect(body.logs.map((entry: { step: string; status: string }) => `${entry.step}:${entry.status}`)).toEqual([
      'pipeline:cancelled',
    ]);
  });

  it('returns 404 for unknown episodes', async () => {
    const res = await cancelEpisode(request(`/api/episodes/${MISSING_ID}/cancel`, { method: 'POST' }), context(MISSING_ID));
    expect(res.status).toBe(404);
  });
});

describe('GET /api/stats', () => {
  it('returns aggregates and recent activity', async () => {
    await store.seed({ title: 'One', status: 'completed', duration_seconds: 100 });

    const res = await getStats();

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.byStyleAndStatus).toHaveLength(1);
    expect(body.byStyleAndStatus[0]).toMatchObject({ content_style: 'educational', status: 'completed', count: 1 });
    expect(body.recentActivity[0].title).toBe('One');
  });
});

describe('GET /api/health', () => {
  it('reports degraded when a collaborator is down', async () => {
    vi.mocked(queryRows).mockResolvedValue([]);
    vi.mocked(getHealthProbes).mockReturnValue([
      { name: 'ollama', checkHealth: async () => ({ name: 'ollama', ok: true }) },
      { name: 'tts', checkHealth: async () => ({ name: 'tts', ok: false, detail: 'HTTP 500' }) },
    ]);

    const res = await getHealth();

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.status).toBe('degraded');
    expect(body.services.postgres).toEqual({ ok: true });
    expect(body.services.collaborators).toEqual([
      { name: 'ollama', ok: true },
      { name: 'tts', ok: false, detail: 'HTTP 500' },
    ]);
  });

  it('returns 503 when the database is unreachable', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.mocked(queryRows).mockRejectedValue(new Error('connection refused'));
    vi.mocked(getHealthProbes).mockReturnValue([]);

    const res = await getHealth();

    expect(res.status).toBe(503);
    const body = await res.json();
    expect(body.status).toBe('unavailable');
    expect(body.services.postgres).toEqual({ ok: false, detail: 'connection refused' });
  });
});
