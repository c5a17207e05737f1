import { PipelineError } from '../../lib/pipelineErrors';
import type { Stage } from './types';

/**
 * Runs `task` with a hard deadline. On expiry the signal handed to the task is
 * aborted and the returned promise rejects with a `timeout` failure, whether or
 * not the task honours the signal.
 */
export async function withStageTimeout<T>(
  stage: Stage,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new PipelineError('timeout', `${stage} stage exceeded ${timeoutMs}ms`, { stage, timeoutMs });
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
