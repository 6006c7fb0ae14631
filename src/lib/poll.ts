/**
 * Bounded readiness polling.
 */

import type { Logger } from 'pino';
import { PollTimeoutError, RemoteCommandError } from './errors';

export interface PollSettings {
  intervalMs: number;
  sleep: (ms: number) => Promise<void>;
}

export interface PollObservation {
  ready: boolean;
  /** What was seen on this attempt, reported on timeout */
  observed: string;
}

/**
 * Calls `check` up to `attempts` times, `intervalMs` apart, until it reports
 * ready. A nonzero exit inside `check` counts as "not ready yet".
 */
export async function pollUntil(
  what: string,
  attempts: number,
  settings: PollSettings,
  check: () => Promise<PollObservation>,
  logger?: Logger,
): Promise<string> {
  let lastObserved: string | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const observation = await check();
      if (observation.ready) return observation.observed;
      lastObserved = observation.observed;
    } catch (error) {
      if (!(error instanceof RemoteCommandError)) throw error;
      lastObserved = error.stderr.trim() || error.message;
    }
    logger?.debug({ what, attempt, attempts, observed: lastObserved }, 'Not ready yet');
    if (attempt < attempts) await settings.sleep(settings.intervalMs);
  }

  throw new PollTimeoutError(what, attempts, lastObserved);
}
