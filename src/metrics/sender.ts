import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { SenderOutcome } from '../faults/types.js';

export interface SenderMetricsSink {
  recordOutcome(outcome: SenderOutcome): void;
  observeResponseTime(seconds: number): void;
  inflightInc(): void;
  inflightDec(): void;
}

type ErrorClass = 'timeout' | 'http_500' | 'conn' | 'other';

const ERROR_CLASSES: Record<Exclude<SenderOutcome, 'success'>, ErrorClass> = {
  server_error: 'http_500',
  timeout: 'timeout',
  connection_error: 'conn',
  other_error: 'other',
};

export class SenderMetrics implements SenderMetricsSink {
  private readonly requestsOk: Counter;
  private readonly requestsErr: Counter<'class'>;
  private readonly responseTime: Histogram;
  private readonly inflight: Gauge;

  constructor(register: Registry) {
    this.requestsOk = new Counter({
      name: 'tct_sender_requests_ok_total',
      help: 'Total number of successful requests (HTTP 200)',
      registers: [register],
    });

    this.requestsErr = new Counter({
      name: 'tct_sender_requests_err_total',
      help: 'Total number of failed requests by error class',
      labelNames: ['class'],
      registers: [register],
    });

    this.responseTime = new Histogram({
      name: 'tct_sender_response_time_seconds',
      help: 'HTTP request latency distribution',
      registers: [register],
    });

    this.inflight = new Gauge({
      name: 'tct_sender_inflight',
      help: 'Number of currently in-flight requests',
      registers: [register],
    });
  }

  recordOutcome(outcome: SenderOutcome): void {
    if (outcome === 'success') {
      this.requestsOk.inc();
      return;
    }
    this.requestsErr.inc({ class: ERROR_CLASSES[outcome] });
  }

  observeResponseTime(seconds: number): void {
    this.responseTime.observe(seconds);
  }

  inflightInc(): void {
    this.inflight.inc();
  }

  inflightDec(): void {
    this.inflight.dec();
  }
}
