import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { isRetryableUpdateError } from '@devicefleet/ota-client';
import type { AgentUpdater } from './updater';

export type PollResult = 'idle' | 'updated' | 'failed';

export interface PollerStats {
  polls: number;
  updates: number;
  failures: number;
}

export interface PollerOptions {
  updater: AgentUpdater;
  firmwareDir: string;
  intervalMs: number;
  logger: Logger;
  signal?: AbortSignal;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

async function waitFor(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

export async function pollOnce(updater: AgentUpdater, firmwareDir: string, logger: Logger): Promise<PollResult> {
  try {
    if (!(await updater.isUpdateAvailable())) {
      return 'idle';
    }
    logger.info({ firmwareDir }, 'New firmware available');
    const outcome = await updater.downloadAndApplyUpdate(firmwareDir);
    return outcome.status === 'updated' ? 'updated' : 'idle';
  } catch (err) {
    if (isRetryableUpdateError(err)) {
      logger.warn({ err }, 'Backend or repository unreachable; retrying on the next poll');
    } else {
      logger.error({ err }, 'Firmware update failed');
    }
    return 'failed';
  }
}

/**
 * Polls until `signal` aborts. Errors from a single poll are logged and never stop the loop.
 */
export async function runPoller(options: PollerOptions): Promise<PollerStats> {
  const { updater, firmwareDir, intervalMs, logger, signal } = options;
  const wait = options.wait ?? waitFor;
  const stats: PollerStats = { polls: 0, updates: 0, failures: 0 };

  logger.info({ firmwareDir, intervalMs }, 'Starting firmware poller');
  while (!signal?.aborted) {
    stats.polls += 1;
    const result = await pollOnce(updater, firmwareDir, logger);
    if (result === 'updated') {
      stats.updates += 1;
    } else if (result === 'failed') {
      stats.failures += 1;
    }
    if (signal?.aborted) {
      break;
    }
    try {
      await wait(intervalMs, signal);
    } catch (err) {
      if (signal?.aborted) {
        break;
      }
      throw err;
    }
  }
  logger.info({ ...stats }, 'Firmware poller stopped');
  return stats;
}
