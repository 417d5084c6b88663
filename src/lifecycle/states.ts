export type LifecycleState = 'CONSTRUCTING' | 'READY';

export interface LifecycleStateMetadata {
  state: LifecycleState;
  acceptsUpdates: boolean;
  canTransitionTo: LifecycleState[];
  description: string;
}

const STATE_DEFINITIONS: Record<LifecycleState, Omit<LifecycleStateMetadata, 'state'>> = {
  CONSTRUCTING: {
    acceptsUpdates: false,
    canTransitionTo: ['READY'],
    description: 'Initial and default values are being written; no update hooks fire',
  },

  READY: {
    acceptsUpdates: true,
    canTransitionTo: [],
    description: 'Construction hooks passed; every write is governed',
  },
};

export function getLifecycleStateMetadata(state: LifecycleState): LifecycleStateMetadata {
  return {
    state,
    ...STATE_DEFINITIONS[state],
  };
}

export function acceptsUpdates(state: LifecycleState): boolean {
  return STATE_DEFINITIONS[state].acceptsUpdates;
}

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return STATE_DEFINITIONS[from].canTransitionTo.includes(to);
}
