import type { TelegramApi } from './telegram.js';
import type { TelegramUpdate } from '../types/telegram.js';

const ERROR_PAUSE_MS = 5000;

export interface PollingOptions {
  signal: AbortSignal;
  /** Wait after a failed getUpdates call */
  errorPauseMs?: number;
}

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Fetch updates by long polling until the signal aborts.
 * Updates are dispatched without waiting for each other, so a slow
 * translation never holds up the next batch.
 */
export async function startPolling(
  api: Pick<TelegramApi, 'getUpdates'>,
  onUpdate: (update: TelegramUpdate) => Promise<void>,
  { signal, errorPauseMs = ERROR_PAUSE_MS }: PollingOptions
): Promise<void> {
  let offset = 0;

  console.log('[Polling] Started');

  while (!signal.aborted) {
    let updates: TelegramUpdate[];
    try {
      updates = await api.getUpdates(offset, signal);
    } catch (error) {
      if (signal.aborted) break;
      console.error('[Polling] getUpdates failed:', error instanceof Error ? error.message : error);
      await pause(errorPauseMs, signal);
      continue;
    }

    for (const update of updates) {
      offset = Math.max(offset, update.update_id + 1);
      onUpdate(update).catch(error => {
        console.error(`[Polling] Update ${update.update_id} failed:`, error);
      });
    }
  }

  console.log('[Polling] Stopped');
}
