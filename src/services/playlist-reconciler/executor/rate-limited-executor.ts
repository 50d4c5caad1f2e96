import { setTimeout as delay } from 'node:timers/promises'
import {
  RemoteCallError,
  RetriesExhaustedError,
} from '@utils/remote-errors.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit, { type LimitFunction } from 'p-limit'
import { type BackoffOptions, computeBackoffDelay } from './backoff.js'

export interface ExecutorOptions extends BackoffOptions {
  /** Minimum gap between the end of one request and the start of the next */
  minIntervalMs: number
  /** Retries allowed after the first attempt */
  maxRetries: number
}

export interface ExecutorDependencies {
  log: FastifyBaseLogger
  sleep?: (ms: number) => Promise<void>
  now?: () => number
  random?: () => number
}

export const DEFAULT_EXECUTOR_OPTIONS: ExecutorOptions = {
  minIntervalMs: 333, // ~3 requests per second
  maxRetries: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitter: true,
}

type RetryDecision =
  | { retry: true; retryAfterSeconds: number | null }
  | { retry: false }

/**
 * Decides whether a failed remote call is worth retrying. Rate limits and
 * server errors are; client rejections and network failures are not.
 */
export function classifyForRetry(error: RemoteCallError): RetryDecision {
  switch (error.failure.kind) {
    case 'rate-limited':
      return { retry: true, retryAfterSeconds: error.failure.retryAfterSeconds }
    case 'server-unavailable':
      return { retry: true, retryAfterSeconds: null }
    case 'client-rejected':
    case 'network-unreachable':
      return { retry: false }
  }
}

/**
 * Gatekeeper for every outbound call to the remote collection service.
 *
 * One instance is meant to be shared by all callers in the process: the
 * throttle timestamp lives here, and a concurrency-1 queue makes sure two
 * concurrent reconciliation runs never both fire inside the same interval.
 * Backoff waits happen outside the queue so other callers keep moving
 * while one of them waits to retry.
 */
export class RateLimitedExecutor {
  private readonly queue: LimitFunction = pLimit(1)
  private lastRequestEnd: number | null = null
  private readonly log: FastifyBaseLogger
  private readonly sleep: (ms: number) => Promise<void>
  private readonly now: () => number
  private readonly random: () => number

  constructor(
    private readonly options: ExecutorOptions,
    deps: ExecutorDependencies,
  ) {
    this.log = deps.log
    this.sleep = deps.sleep ?? ((ms) => delay(ms))
    this.now = deps.now ?? Date.now
    this.random = deps.random ?? Math.random
  }

  /**
   * Runs a remote call with throttling and retries.
   *
   * @param label - Short description of the call, used in log lines and errors
   * @throws {RemoteCallError} For failures that are not retryable
   * @throws {RetriesExhaustedError} When every retry failed with a retryable error
   */
  async execute<T>(label: string, operation: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        const result = await this.queue(() => this.runThrottled(operation))
        if (attempt > 0) {
          this.log.info(`${label} succeeded after ${attempt} retries`)
        }
        return result
      } catch (error) {
        if (!(error instanceof RemoteCallError)) {
          this.log.error({ error }, `Unexpected error during ${label}`)
          throw error
        }

        const decision = classifyForRetry(error)
        if (!decision.retry) {
          this.log.error(
            { error, kind: error.kind, status: error.status },
            `${label} failed with a non-retryable error`,
          )
          throw error
        }

        if (attempt >= this.options.maxRetries) {
          const exhausted = new RetriesExhaustedError(label, attempt + 1, error)
          this.log.error(
            { error: exhausted, kind: error.kind, attempts: attempt + 1 },
            `${label} failed after ${attempt + 1} attempts`,
          )
          throw exhausted
        }

        const delayMs = computeBackoffDelay(
          attempt,
          decision.retryAfterSeconds,
          this.options,
          this.random,
        )
        this.log.warn(
          {
            kind: error.kind,
            status: error.status,
            retryAfterSeconds: decision.retryAfterSeconds,
            delayMs,
          },
          `Retrying ${label} in ${(delayMs / 1000).toFixed(2)}s (attempt ${attempt + 1}/${this.options.maxRetries})`,
        )
        await this.sleep(delayMs)
      }
    }
  }

  private async runThrottled<T>(operation: () => Promise<T>): Promise<T> {
    if (this.lastRequestEnd !== null) {
      const elapsed = this.now() - this.lastRequestEnd
      if (elapsed < this.options.minIntervalMs) {
        const waitMs = this.options.minIntervalMs - elapsed
        this.log.debug(`Throttling request: sleeping ${waitMs}ms`)
        await this.sleep(waitMs)
      }
    }

    try {
      return await operation()
    } finally {
      this.lastRequestEnd = this.now()
    }
  }
}
