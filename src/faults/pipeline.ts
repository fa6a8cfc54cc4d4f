import type { OutageReader } from '../outage/state.js';
import type { ReceiverMetricsSink } from '../metrics/receiver.js';
import { sleep } from '../concurrency/sleep.js';
import { logger } from '../observability/logger.js';
import { Clock, FaultConfig, RandomSource, ReceiverOutcome } from './types.js';

/**
 * One inbound request as seen by the pipeline. `closed` resolves when the
 * underlying connection is torn down, and is the only thing that ends a
 * hung or outage-blocked request.
 */
export interface InboxExchange {
  respond(status: 200 | 500, body: string): void;
  readonly closed: Promise<void>;
}

export interface PipelineOptions {
  random?: RandomSource;
  now?: Clock;
  /** Process shutdown; cuts the response delay short. */
  signal?: AbortSignal;
}

export type FaultRules = Pick<FaultConfig, 'responseDelayMs' | 'responseJitterMs' | 'hangRate' | 'errorRate'>;

export class FaultInjectionPipeline {
  private readonly random: RandomSource;
  private readonly now: Clock;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly rules: FaultRules,
    private readonly outage: OutageReader,
    private readonly metrics: ReceiverMetricsSink,
    options: PipelineOptions = {}
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => Date.now());
    this.signal = options.signal;
  }

  async handle(exchange: InboxExchange): Promise<ReceiverOutcome> {
    const start = this.now();

    if (this.outage.isActive()) {
      this.metrics.recordRequest('outage');
      await exchange.closed;
      return 'outage';
    }

    if (this.random() < this.rules.hangRate) {
      this.metrics.recordRequest('hang');
      logger.debug('request_hang', 'Request hanging');
      await exchange.closed;
      return 'hang';
    }

    const delayMs = this.computeDelay();
    if (delayMs > 0) {
      await sleep(delayMs, this.signal);
    }

    if (this.random() < this.rules.errorRate) {
      this.complete(exchange, 'server_error', start);
      return 'server_error';
    }

    this.complete(exchange, 'success', start);
    return 'success';
  }

  computeDelay(): number {
    let delayMs = this.rules.responseDelayMs;
    if (this.rules.responseJitterMs > 0) {
      delayMs += this.random() * this.rules.responseJitterMs;
    }
    return delayMs;
  }

  private complete(exchange: InboxExchange, outcome: 'success' | 'server_error', start: number): void {
    this.metrics.recordRequest(outcome);
    this.metrics.observeHandlerTime((this.now() - start) / 1000);

    if (outcome === 'server_error') {
      logger.debug('request_error', 'Returning injected error');
      exchange.respond(500, 'error');
    } else {
      logger.debug('request_ok', 'Request successful');
      exchange.respond(200, 'ok');
    }
  }
}
