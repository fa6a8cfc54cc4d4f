import { OutagePhase, canTransition } from './phases.js';

export interface PhaseTransition {
  from: OutagePhase;
  to: OutagePhase;
  timestamp: string;
  reason?: string;
}

export interface TransitionResult {
  allowed: boolean;
  reason?: string;
}

export function validateTransition(from: OutagePhase, to: OutagePhase): TransitionResult {
  if (!canTransition(from, to)) {
    return {
      allowed: false,
      reason: `Invalid transition from ${from} to ${to}`,
    };
  }

  return { allowed: true };
}

export function createTransition(from: OutagePhase, to: OutagePhase, reason?: string): PhaseTransition {
  return {
    from,
    to,
    timestamp: new Date().toISOString(),
    reason,
  };
}
