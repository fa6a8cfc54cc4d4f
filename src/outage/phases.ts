export type OutagePhase = 'NORMAL' | 'OUTAGE';

export interface PhaseMetadata {
  phase: OutagePhase;
  active: boolean;
  canTransitionTo: OutagePhase[];
  description: string;
}

const PHASE_DEFINITIONS: Record<OutagePhase, Omit<PhaseMetadata, 'phase'>> = {
  NORMAL: {
    active: false,
    canTransitionTo: ['OUTAGE'],
    description: 'Requests are handled by the normal fault rules',
  },

  OUTAGE: {
    active: true,
    canTransitionTo: ['NORMAL'],
    description: 'Every inbound request is left without a response',
  },
};

export const INITIAL_PHASE: OutagePhase = 'NORMAL';

export function getPhaseMetadata(phase: OutagePhase): PhaseMetadata {
  return {
    phase,
    ...PHASE_DEFINITIONS[phase],
  };
}

export function isActivePhase(phase: OutagePhase): boolean {
  return PHASE_DEFINITIONS[phase].active;
}

export function canTransition(from: OutagePhase, to: OutagePhase): boolean {
  return PHASE_DEFINITIONS[from].canTransitionTo.includes(to);
}
