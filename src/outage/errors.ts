import type { OutagePhase } from './phases.js';

export class IllegalPhaseTransitionError extends Error {
  constructor(
    public readonly from: OutagePhase,
    public readonly to: OutagePhase,
    public readonly reason: string
  ) {
    super(`Illegal outage transition: ${from} → ${to}: ${reason}`);
    this.name = 'IllegalPhaseTransitionError';
  }
}
