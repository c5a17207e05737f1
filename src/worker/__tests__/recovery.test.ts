import { describe, expect, it } from 'vitest';
import { silentLogger } from '../../lib/log';
import { MemoryEpisodeStore, MemoryGenerationLogStore } from '../../testing/memoryStores';
import { INTERRUPTED_MESSAGE, recoverOrphanedEpisodes } from '../recovery';

describe('recoverOrphanedEpisodes', () => {
  it('fails episodes left generating and leaves the rest alone', async () => {
    const store = new MemoryEpisodeStore();
    const logs = new MemoryGenerationLogStore(store);
    const script = await store.seed({ title: 'Script', status: 'generating_script' });
    const audio = await store.seed({ title: 'Audio', status: 'generating_audio', retry_count: 1 });
    const pending = await store.seed({ title: 'Pending' });

    const result = await recoverOrphanedEpisodes({ store, logs, logger: silentLogger });

    expect(result).toEqual({ processed: 2, failed: 2, stale: 0 });
    expect(await store.getEpisode(script.id)).toMatchObject({ status: 'failed', error_message: INTERRUPTED_MESSAGE });
    expect(await store.getEpisode(audio.id)).toMatchObject({ status: 'failed', error_message: INTERRUPTED_MESSAGE });
    expect((await store.getEpisode(pending.id))?.status).toBe('draft');
    expect(logs.trail(audio.id)).toEqual(['pipeline:terminal']);
    expect((await logs.listLogs(audio.id))[0]?.metadata).toEqual({
      reason: 'orphaned',
      previousStatus: 'generating_audio',
      stage: 'audio',
      retryCount: 1,
    });
  });

  it('does nothing when no episode is generating', async () => {
    const store = new MemoryEpisodeStore();
    const logs = new MemoryGenerationLogStore(store);
    await store.seed({ title: 'Done', status: 'completed' });

    expect(await recoverOrphanedEpisodes({ store, logs, logger: silentLogger })).toEqual({
      processed: 0,
      failed: 0,
      stale: 0,
    });
    expect(logs.entries).toEqual([]);
  });
});
