/**
 * Loadout Core — Retry Backoff
 *
 * Delay before retry n (1-based attempt that just failed):
 *
 *   base × 2^n × (1 + jitter × r),   r ∈ [0, 1)
 *
 * With jitter < 1 the delays are strictly increasing: the largest delay for
 * attempt n is below base × 2^n × 2, which is the smallest delay for n + 1.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Sleeper } from './ports.js';

export interface BackoffPolicy {
  /** Time unit multiplied by 2^attempt. */
  readonly baseMs: number;
  /** Jitter fraction in [0, 1). Values outside are clamped. */
  readonly jitter: number;
  /** Source of r in [0, 1). */
  readonly random: () => number;
}

/** Largest jitter fraction that still keeps delays strictly increasing. */
const MAX_JITTER = 0.999;

export function backoffDelayMs(attempt: number, policy: BackoffPolicy): number {
  const jitter = Math.min(Math.max(policy.jitter, 0), MAX_JITTER);
  const r = Math.min(Math.max(policy.random(), 0), MAX_JITTER);
  const nominal = policy.baseMs * 2 ** attempt;
  return nominal * (1 + jitter * r);
}

/**
 * Timer-based Sleeper. Resolves false as soon as the signal aborts.
 */
export const sleep: Sleeper = async (ms, signal) => {
  if (signal?.aborted === true) return false;
  try {
    await delay(ms, undefined, signal !== undefined ? { signal } : {});
    return true;
  } catch (err: unknown) {
    if (err instanceof Error && err.name === 'AbortError') return false;
    throw err;
  }
};
