import type { SenderConfig } from '../config/types.js';
import type { Clock, SenderOutcome } from '../faults/types.js';
import type { SenderMetricsSink } from '../metrics/sender.js';
import { InMemorySemaphore, Semaphore } from '../concurrency/semaphore.js';
import { MAX_TIMER_DELAY_MS, sleep } from '../concurrency/sleep.js';
import { logger, errorMessage } from '../observability/logger.js';
import { classifyError, classifyStatus } from './classify.js';

/** The part of a fetch Response the generator reads. */
export interface FetchResponse {
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<FetchResponse>;

export interface GeneratorOptions {
  fetch?: FetchLike;
  now?: Clock;
  semaphore?: Semaphore;
}

export function computeIntervalMs(requestsPerSecond: number): number {
  if (!(requestsPerSecond > 0)) {
    throw new Error(`requestsPerSecond must be > 0, got ${requestsPerSecond}`);
  }
  return 1000 / requestsPerSecond;
}

export function inboxUrl(config: Pick<SenderConfig, 'receiverHost' | 'receiverPort'>): string {
  return `http://${config.receiverHost}:${config.receiverPort}/inbox`;
}

/**
 * Sends POST /inbox at a fixed rate. Every tick dispatches a send without
 * waiting on earlier ones; the timer is never held back by slow requests.
 */
export class RequestGenerator {
  private readonly fetch: FetchLike;
  private readonly now: Clock;
  private readonly semaphore?: Semaphore;
  private readonly intervalMs: number;
  private readonly target: string;
  private readonly pending = new Set<Promise<SenderOutcome>>();
  private dispatched = 0;

  constructor(
    private readonly config: SenderConfig,
    private readonly metrics: SenderMetricsSink,
    options: GeneratorOptions = {}
  ) {
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? (() => Date.now());
    this.semaphore = options.semaphore ??
      (config.maxInflight > 0 ? new InMemorySemaphore(config.maxInflight) : undefined);
    this.intervalMs = computeIntervalMs(config.requestsPerSecond);
    this.target = inboxUrl(config);
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }

  getDispatchedCount(): number {
    return this.dispatched;
  }

  /** Sends that have been dispatched and not yet classified. */
  getPending(): Promise<SenderOutcome>[] {
    return [...this.pending];
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this.config.startDelayMs > 0) {
      logger.info('generator_start_delay', 'Waiting before starting', {
        delayMs: this.config.startDelayMs,
      });
      if (!(await sleep(this.config.startDelayMs, signal))) {
        logger.info('generator_stopped', 'Stopped during start delay');
        return;
      }
    }

    if (signal.aborted) return;

    logger.info('generator_started', 'Starting request generation', {
      target: this.target,
      rps: this.config.requestsPerSecond,
      intervalMs: this.intervalMs,
      maxInflight: this.config.maxInflight,
    });

    await this.tickUntilAborted(signal);

    logger.info('generator_stopped', 'Stopping request generation', {
      dispatched: this.dispatched,
      pending: this.pending.size,
    });
  }

  /**
   * Ticks are scheduled on absolute deadlines (start + n * interval), so
   * timer lateness does not erode the long-run rate. A late wake-up fires
   * every tick that has come due.
   */
  private tickUntilAborted(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const startedAt = this.now();
      let ticks = 0;
      let timer: NodeJS.Timeout | undefined;

      const arm = () => {
        const nextDeadline = startedAt + (ticks + 1) * this.intervalMs;
        const wait = Math.max(1, Math.ceil(nextDeadline - this.now()));
        timer = setTimeout(fire, Math.min(wait, MAX_TIMER_DELAY_MS));
      };

      const fire = () => {
        const due = Math.floor((this.now() - startedAt) / this.intervalMs);
        while (ticks < due) {
          ticks++;
          this.track(this.dispatch());
        }
        arm();
      };

      signal.addEventListener('abort', () => {
        clearTimeout(timer);
        resolve();
      }, { once: true });

      arm();
    });
  }

  private track(send: Promise<SenderOutcome>): void {
    this.pending.add(send);
    send
      .finally(() => this.pending.delete(send))
      .catch((error: unknown) => {
        logger.error('dispatch_error', 'Dispatch failed unexpectedly', {
          error: errorMessage(error),
        });
      });
  }

  /**
   * Sends one request and classifies it. Never rejects. A send queued
   * behind the semaphore already counts as in flight.
   */
  async dispatch(): Promise<SenderOutcome> {
    this.dispatched++;
    this.metrics.inflightInc();

    if (this.semaphore) {
      await this.semaphore.acquire();
    }

    const started = this.now();
    const controller = new AbortController();
    let timedOut = false;

    const timeout = this.config.requestTimeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, this.config.requestTimeoutMs)
      : undefined;

    let outcome: SenderOutcome;
    let status: number | undefined;

    try {
      const response = await this.fetch(this.target, {
        method: 'POST',
        signal: controller.signal,
      });
      status = response.status;
      await response.arrayBuffer();
      outcome = classifyStatus(response.status);
    } catch (error) {
      outcome = classifyError(error, timedOut);
      logger.debug('request_failed', 'Request failed', {
        target: this.target,
        outcome,
        error: errorMessage(error),
      });
    } finally {
      clearTimeout(timeout);
      this.metrics.observeResponseTime((this.now() - started) / 1000);
      this.metrics.inflightDec();
      this.semaphore?.release();
    }

    this.metrics.recordOutcome(outcome);
    logger.debug('request_completed', 'Request completed', {
      target: this.target,
      outcome,
      status,
    });

    return outcome;
  }
}
