import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { ReceiverOutcome } from '../faults/types.js';

export interface ReceiverMetricsSink {
  recordRequest(outcome: ReceiverOutcome): void;
  observeHandlerTime(seconds: number): void;
  setOutageState(active: boolean): void;
}

const OUTCOME_LABELS: Record<ReceiverOutcome, string> = {
  success: 'ok',
  server_error: 'error',
  hang: 'hang',
  outage: 'outage',
};

export class ReceiverMetrics implements ReceiverMetricsSink {
  private readonly requestsTotal: Counter<'outcome'>;
  private readonly handlerTime: Histogram;
  private readonly outageState: Gauge;

  constructor(register: Registry) {
    this.requestsTotal = new Counter({
      name: 'tct_receiver_requests_total',
      help: 'Total number of received requests by outcome',
      labelNames: ['outcome'],
      registers: [register],
    });

    this.handlerTime = new Histogram({
      name: 'tct_receiver_handler_time_seconds',
      help: 'Handler execution time distribution',
      registers: [register],
    });

    this.outageState = new Gauge({
      name: 'tct_receiver_outage_state',
      help: 'Current outage state (0=normal, 1=outage)',
      registers: [register],
    });
  }

  recordRequest(outcome: ReceiverOutcome): void {
    this.requestsTotal.inc({ outcome: OUTCOME_LABELS[outcome] });
  }

  observeHandlerTime(seconds: number): void {
    this.handlerTime.observe(seconds);
  }

  setOutageState(active: boolean): void {
    this.outageState.set(active ? 1 : 0);
  }
}
