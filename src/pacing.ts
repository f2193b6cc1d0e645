/**
 * Pacing between consecutive API requests.
 */

import type { ResolutionOutcome } from "./types.js";

/** Delay between requests when an API key is configured (ms) */
export const KEYED_DELAY_MS = 1500;

/** Delay between requests without an API key (ms) */
export const ANONYMOUS_DELAY_MS = 3000;

/**
 * Decides how long to wait before the next request.
 * Called once between two items, never after the last one.
 */
export interface Pacer {
  pause(previous: ResolutionOutcome): Promise<void>;
}

export type Sleep = (ms: number) => Promise<void>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Wait a fixed interval regardless of the previous outcome. */
export function fixedIntervalPacer(ms: number, wait: Sleep = sleep): Pacer {
  return {
    pause: () => wait(ms),
  };
}

/** No wait at all. */
export const immediatePacer: Pacer = {
  pause: () => Promise.resolve(),
};

/**
 * Fixed interval chosen by whether a key is present.
 * Does not back off further after a 429.
 */
export function defaultPacer(apiKey: string | undefined, wait: Sleep = sleep): Pacer {
  return fixedIntervalPacer(apiKey ? KEYED_DELAY_MS : ANONYMOUS_DELAY_MS, wait);
}
