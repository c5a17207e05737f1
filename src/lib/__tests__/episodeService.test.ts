import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryEpisodeStore, MemoryGenerationLogStore, MemoryTemplateStore } from '../../testing/memoryStores';
import { createEpisodeInputSchema, createEpisodeService, listEpisodesQuerySchema } from '../episodeService';
import type { ContentTemplateRecord } from '../models';

const template: ContentTemplateRecord = {
  id: '6f1c2a54-3f0e-4d7a-9b1e-0c5d8a2e7b01',
  name: 'Educational Standard',
  description: null,
  content_style: 'educational',
  template_data: { sections: [{ type: 'intro', duration: 30, template: 'Welcome to {topic}' }] },
  is_active: true,
  created_at: new Date('2026-01-01T00:00:00Z'),
  updated_at: new Date('2026-01-01T00:00:00Z'),
};

describe('episode service', () => {
  let store: MemoryEpisodeStore;
  let logs: MemoryGenerationLogStore;
  let templates: MemoryTemplateStore;
  const dispatcher = { submit: vi.fn((_episodeId: string) => true) };

  const build = (withDispatcher = false) =>
    createEpisodeService({
      store,
      logs,
      templates,
      dispatcher: withDispatcher ? dispatcher : undefined,
      defaults: { targetDurationMinutes: 15, voiceSpeed: 1 },
    });

  beforeEach(() => {
    store = new MemoryEpisodeStore();
    logs = new MemoryGenerationLogStore(store);
    templates = new MemoryTemplateStore([template, { ...template, id: 'inactive', is_active: false }]);
    dispatcher.submit.mockClear();
  });

  describe('createEpisode', () => {
    it('creates a draft with defaults applied', async () => {
      const input = createEpisodeInputSchema.parse({ title: '  Deep Sea Vents  ', tags: ['ocean', 'science', 'ocean'] });
      const episode = await build().createEpisode(input);

      expect(episode).toMatchObject({
        title: 'Deep Sea Vents',
        description: null,
        status: 'draft',
        content_style: 'educational',
        target_duration_minutes: 15,
        retry_count: 0,
        metadata: { voiceSpeed: 1 },
        tags: ['ocean', 'science'],
        script: null,
        generation_started_at: null,
      });
      expect(await store.getEpisode(episode.id)).toEqual(episode);
    });

    it('keeps caller metadata and stores the requested voice speed', async () => {
      const input = createEpisodeInputSchema.parse({
        title: 'Markets',
        contentStyle: 'news',
        targetDurationMinutes: 30,
        voiceSpeed: 1.5,
        metadata: { source: 'desk' },
      });
      const episode = await build().createEpisode(input);
      expect(episode.content_style).toBe('news');
      expect(episode.target_duration_minutes).toBe(30);
      expect(episode.metadata).toEqual({ source: 'desk', voiceSpeed: 1.5 });
    });

    it('hands the new episode to an attached dispatcher', async () => {
      const episode = await build(true).createEpisode(createEpisodeInputSchema.parse({ title: 'Queued' }));
      expect(dispatcher.submit).toHaveBeenCalledWith(episode.id);
    });

    it('rejects invalid input before anything is stored', () => {
      const blank = createEpisodeInputSchema.safeParse({ title: '   ' });
      expect(blank.success).toBe(false);
      if (!blank.success) expect(blank.error.issues[0]?.message).toBe('Title cannot be empty');

      expect(createEpisodeInputSchema.safeParse({ title: 'x'.repeat(501) }).success).toBe(false);
      expect(createEpisodeInputSchema.safeParse({ title: 'ok', targetDurationMinutes: 4 }).success).toBe(false);
      expect(createEpisodeInputSchema.safeParse({ title: 'ok', targetDurationMinutes: 61 }).success).toBe(false);
      expect(createEpisodeInputSchema.safeParse({ title: 'ok', targetDurationMinutes: 7.5 }).success).toBe(false);
      expect(createEpisodeInputSchema.safeParse({ title: 'ok', contentStyle: 'documentary' }).success).toBe(false);
      expect(createEpisodeInputSchema.safeParse({ title: 'ok', voiceSpeed: 2.5 }).success).toBe(false);
      expect(store.rows.size).toBe(0);
    });
  });

  describe('cancelEpisode', () => {
    it('cancels a draft immediately and records it', async () => {
      const episode = await build().createEpisode(createEpisodeInputSchema.parse({ title: 'Draft' }));
      const result = await build().cancelEpisode(episode.id);

      expect(result.outcome).toBe('cancelled');
      expect(result.episode?.status).toBe('cancelled');
      expect(logs.trail(episode.id)).toEqual(['pipeline:cancelled']);
    });

    it('flags an in-flight episode without changing its status', async () => {
      const episode = await store.seed({ title: 'Running', status: 'generating_audio' });
      const result = await build().cancelEpisode(episode.id);

      expect(result.outcome).toBe('cancel_requested');
      expect(result.episode?.status).toBe('generating_audio');
      expect(result.episode?.cancel_requested_at).toBeInstanceOf(Date);
      expect(logs.entries).toEqual([]);
    });

    it('leaves terminal episodes untouched', async () => {
      const episode = await store.seed({ title: 'Done', status: 'completed' });
      const result = await build().cancelEpisode(episode.id);

      expect(result.outcome).toBe('already_terminal');
      expect(await store.getEpisode(episode.id)).toEqual(episode);
      expect(logs.entries).toEqual([]);
    });

    it('reports unknown episodes', async () => {
      expect(await build().cancelEpisode('00000000-0000-4000-8000-000000000000')).toEqual({
        outcome: 'not_found',
        episode: null,
      });
    });
  });

  describe('deleteEpisode', () => {
    it('deletes drafts and terminal episodes but not in-flight ones', async () => {
      const draft = await store.seed({ title: 'Draft' });
      const failed = await store.seed({ title: 'Failed', status: 'failed' });
      const running = await store.seed({ title: 'Running', status: 'generating_script' });
      const service = build();

      expect(await service.deleteEpisode(draft.id)).toBe('deleted');
      expect(await service.deleteEpisode(failed.id)).toBe('deleted');
      expect(await service.deleteEpisode(running.id)).toBe('in_flight');
      expect(await service.deleteEpisode(draft.id)).toBe('not_found');
      expect([...store.rows.keys()]).toEqual([running.id]);
    });
  });

  describe('queries', () => {
    it('returns logs only for known episodes', async () => {
      const episode = await store.seed({ title: 'Logged' });
      await logs.appendLog({ episodeId: episode.id, step: 'pipeline', status: 'started', message: 'Generation started' });
      const service = build();

      const entries = await service.getEpisodeLogs(episode.id);
      expect(entries?.map((entry) => entry.message)).toEqual(['Generation started']);
      expect(await service.getEpisodeLogs('00000000-0000-4000-8000-000000000000')).toBeNull();
    });

    it('filters episode listings', async () => {
      await store.seed({ title: 'A', status: 'completed', content_style: 'news' });
      await store.seed({ title: 'B', status: 'completed', content_style: 'educational' });
      await store.seed({ title: 'C', status: 'draft', content_style: 'news' });

      const query = listEpisodesQuerySchema.parse({ status: 'completed', contentStyle: 'news', limit: '10' });
      expect(query.limit).toBe(10);
      const episodes = await build().listEpisodes(query);
      expect(episodes.map((episode) => episode.title)).toEqual(['A']);
    });

    it('lists only active templates', async () => {
      const listed = await build().listTemplates();
      expect(listed.map((entry) => entry.id)).toEqual([template.id]);
    });

    it('summarises episodes by style and status', async () => {
      await store.seed({ title: 'A', status: 'completed', duration_seconds: 60, file_size_mb: 4 });
      await store.seed({ title: 'B', status: 'completed', duration_seconds: 120, file_size_mb: 8 });
      await store.seed({ title: 'C' });

      const stats = await build().getStats();
      const completed = stats.byStyleAndStatus.find((row) => row.status === 'completed');
      expect(completed).toMatchObject({ content_style: 'educational', count: 2, avg_duration_seconds: 90, avg_file_size_mb: 6 });
      expect(stats.recentActivity.map((row) => row.title)).toEqual(['C', 'B', 'A']);
    });
  });
});
