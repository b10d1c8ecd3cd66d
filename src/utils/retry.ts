import { setTimeout as sleep } from 'node:timers/promises';
import { isConflict } from './errors';

export interface Backoff {
  steps: number;
  durationMs: number;
  factor: number;
  jitter: number;
}

// 5 attempts, 10ms apart, +/- up to 10% jitter
export const DEFAULT_RETRY: Backoff = { steps: 5, durationMs: 10, factor: 1.0, jitter: 0.1 };

function jittered(durationMs: number, jitter: number): number {
  return jitter > 0 ? durationMs + Math.random() * jitter * durationMs : durationMs;
}

// Run `fn` again while it fails with a 409 Conflict, up to `backoff.steps` attempts.
// Any other error, or the last conflict, is rethrown.
export async function retryOnConflict<T>(fn: () => Promise<T>, backoff: Backoff = DEFAULT_RETRY): Promise<T> {
  let delay = backoff.durationMs;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (!isConflict(error) || attempt >= backoff.steps) throw error;
    }
    await sleep(jittered(delay, backoff.jitter));
    delay *= backoff.factor;
  }
}

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
}

// Check `condition` right away, then every `intervalMs`, until it returns true.
// Errors from `condition` stop the polling.
export async function pollUntil(condition: () => Promise<boolean>, options: PollOptions): Promise<void> {
  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    if (await condition()) return;
    if (Date.now() + options.intervalMs > deadline) {
      throw new Error(`Timed out after ${options.timeoutMs}ms waiting for the condition`);
    }
    await sleep(options.intervalMs);
  }
}
