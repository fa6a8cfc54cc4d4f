import { OutagePhase, INITIAL_PHASE, isActivePhase } from './phases.js';
import { PhaseTransition, createTransition, validateTransition } from './transitions.js';
import { IllegalPhaseTransitionError } from './errors.js';
import { logger } from '../observability/logger.js';

const MAX_HISTORY = 100;

/** Read side of the outage flag, handed to request handlers. */
export interface OutageReader {
  isActive(): boolean;
}

export type PhaseListener = (transition: PhaseTransition) => void;

/**
 * Holds the outage phase. The event loop runs every read and write to
 * completion, so a handler never observes a half-applied transition.
 */
export class OutageState implements OutageReader {
  private phase: OutagePhase = INITIAL_PHASE;
  private transitions: PhaseTransition[] = [];
  private listeners: PhaseListener[] = [];

  isActive(): boolean {
    return isActivePhase(this.phase);
  }

  getPhase(): OutagePhase {
    return this.phase;
  }

  getTransitionHistory(): PhaseTransition[] {
    return [...this.transitions];
  }

  onTransition(listener: PhaseListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  transition(target: OutagePhase, reason?: string): PhaseTransition {
    const result = validateTransition(this.phase, target);

    if (!result.allowed) {
      logger.error('illegal_outage_transition', 'Illegal outage transition attempted', {
        from: this.phase,
        to: target,
        reason: result.reason,
      });
      throw new IllegalPhaseTransitionError(this.phase, target, result.reason ?? 'not allowed');
    }

    const transition = createTransition(this.phase, target, reason);
    this.phase = target;

    this.transitions.push(transition);
    if (this.transitions.length > MAX_HISTORY) {
      this.transitions.shift();
    }

    for (const listener of this.listeners) {
      listener(transition);
    }

    return transition;
  }
}
