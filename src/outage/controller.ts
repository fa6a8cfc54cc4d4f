import type { FaultConfig } from '../faults/types.js';
import { sleep } from '../concurrency/sleep.js';
import { logger } from '../observability/logger.js';
import { OutageState } from './state.js';

export type OutageSchedule = Pick<FaultConfig, 'outageAfterMs' | 'outageForMs' | 'outageRepeat'>;

export type ControllerExit = 'disabled' | 'completed' | 'cancelled';

/**
 * Drives the NORMAL → OUTAGE → NORMAL cycle on a fixed schedule. It is the
 * only writer of the outage state and never looks at request traffic.
 */
export class OutageController {
  private cycles = 0;

  constructor(
    private readonly schedule: OutageSchedule,
    private readonly state: OutageState
  ) {}

  isEnabled(): boolean {
    return this.schedule.outageAfterMs > 0 && this.schedule.outageForMs > 0;
  }

  getCompletedCycles(): number {
    return this.cycles;
  }

  async run(signal: AbortSignal): Promise<ControllerExit> {
    if (!this.isEnabled()) {
      logger.debug('outage_controller', 'Outage schedule not configured, controller inert');
      return 'disabled';
    }

    logger.info('outage_controller', 'Outage schedule armed', {
      outageAfterMs: this.schedule.outageAfterMs,
      outageForMs: this.schedule.outageForMs,
      repeat: this.schedule.outageRepeat,
    });

    for (;;) {
      if (!(await sleep(this.schedule.outageAfterMs, signal))) {
        return 'cancelled';
      }

      this.state.transition('OUTAGE', 'outage window opened');
      logger.info('outage_started', 'Outage started', {
        durationMs: this.schedule.outageForMs,
        cycle: this.cycles + 1,
      });

      if (!(await sleep(this.schedule.outageForMs, signal))) {
        return 'cancelled';
      }

      this.state.transition('NORMAL', 'outage window closed');
      this.cycles++;
      logger.info('outage_ended', 'Outage ended', { cycle: this.cycles });

      if (!this.schedule.outageRepeat) {
        return 'completed';
      }
    }
  }
}
