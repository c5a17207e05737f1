import { cancelEpisode, type CancelResult } from '../lib/cancellation';
import { clampInt } from '../lib/config';
import { errorMessage } from '../lib/log';
import { runEpisode, type EpisodeRunDeps, type EpisodeRunResult } from './runEpisode';
import { createSlotPool, type SlotPool } from './slotPool';

export type SchedulerOptions = EpisodeRunDeps & {
  maxConcurrentJobs: number;
  refillBatchSize?: number;
  onSettled?: (result: EpisodeRunResult) => void;
};

export type SchedulerSnapshot = {
  queued: string[];
  active: string[];
  capacity: number;
  stopped: boolean;
};

/**
 * FIFO admission into a bounded slot pool. Each admitted episode holds one
 * slot for its whole stage sequence; the queue and slot assignments are the
 * only state kept here, everything else lives in the store.
 */
export class Scheduler {
  private readonly queue: string[] = [];
  private readonly active = new Map<string, Promise<void>>();
  private readonly pool: SlotPool;
  private readonly refillBatchSize: number;
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(private readonly options: SchedulerOptions) {
    this.pool = createSlotPool(options.maxConcurrentJobs);
    this.refillBatchSize = clampInt(options.refillBatchSize ?? 50, 1, 500);
  }

  /** False when the id is already queued or running, or the scheduler is stopped. */
  submit(episodeId: string): boolean {
    if (this.stopped) return false;
    if (this.active.has(episodeId) || this.queue.includes(episodeId)) return false;
    this.queue.push(episodeId);
    this.options.logger.debug('scheduler.submitted', { episodeId, queued: this.queue.length });
    this.pump();
    return true;
  }

  async cancel(episodeId: string): Promise<CancelResult> {
    const result = await cancelEpisode({ store: this.options.store, logs: this.options.logs }, episodeId);
    if (result.outcome === 'cancelled' || result.outcome === 'already_terminal' || result.outcome === 'not_found') {
      this.dropQueued(episodeId);
    }
    this.options.logger.info('scheduler.cancel', { episodeId, outcome: result.outcome });
    return result;
  }

  /** Submits stored drafts, oldest first. Returns how many were newly queued. */
  async refill(): Promise<number> {
    if (this.stopped) return 0;
    const drafts = await this.options.store.listDraftEpisodes(this.refillBatchSize);
    let submitted = 0;
    for (const episode of drafts) {
      if (this.submit(episode.id)) submitted += 1;
    }
    return submitted;
  }

  setMaxConcurrentJobs(maxConcurrentJobs: number): void {
    this.pool.resize(maxConcurrentJobs);
    this.options.logger.info('scheduler.capacity_changed', { capacity: this.pool.capacity });
    this.pump();
  }

  /** Resolves once nothing is queued and no slot is held. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stops admitting; queued episodes stay `draft` for a later run. */
  async stop(): Promise<void> {
    this.stopped = true;
    this.queue.length = 0;
    await Promise.all(this.active.values());
    this.notifyIdle();
  }

  snapshot(): SchedulerSnapshot {
    return {
      queued: [...this.queue],
      active: [...this.active.keys()],
      capacity: this.pool.capacity,
      stopped: this.stopped,
    };
  }

  private pump(): void {
    while (!this.stopped && this.queue.length > 0 && this.pool.tryAcquire()) {
      const episodeId = this.queue.shift();
      if (episodeId === undefined) {
        this.pool.release();
        break;
      }
      const job = this.runJob(episodeId).finally(() => {
        this.active.delete(episodeId);
        this.pool.release();
        this.pump();
        this.notifyIdle();
      });
      this.active.set(episodeId, job);
    }
  }

  private async runJob(episodeId: string): Promise<void> {
    try {
      const result = await runEpisode(this.options, episodeId);
      this.options.logger.info('scheduler.settled', { ...result });
      this.options.onSettled?.(result);
    } catch (error) {
      this.options.logger.error('scheduler.job_error', { episodeId, message: errorMessage(error) });
    }
  }

  private dropQueued(episodeId: string): void {
    const index = this.queue.indexOf(episodeId);
    if (index >= 0) this.queue.splice(index, 1);
    this.notifyIdle();
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.active.size === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
