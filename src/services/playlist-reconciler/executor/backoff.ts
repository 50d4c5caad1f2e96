export interface BackoffOptions {
  baseDelayMs: number
  maxDelayMs: number
  jitter: boolean
}

/** Fraction of the delay that jitter may add or subtract */
export const JITTER_RATIO = 0.1

/** Longest delay a Node.js timer accepts (2^31 - 1 ms) */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

/**
 * Computes the wait before retry `attempt` (0-based).
 *
 * A `Retry-After` hint is used verbatim; otherwise the delay grows as
 * `baseDelayMs * 2^attempt`, capped at `maxDelayMs`. With jitter enabled
 * the result moves uniformly by up to ±10%. The result never drops below
 * zero and never exceeds the longest delay a timer can wait.
 *
 * @param random - Source of uniform values in [0, 1)
 */
export function computeBackoffDelay(
  attempt: number,
  retryAfterSeconds: number | null,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  let delay =
    retryAfterSeconds !== null
      ? retryAfterSeconds * 1000
      : Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs)

  if (options.jitter) {
    const jitterRange = delay * JITTER_RATIO
    delay += random() * jitterRange * 2 - jitterRange
  }

  return Math.min(Math.max(0, delay), MAX_TIMER_DELAY_MS)
}
