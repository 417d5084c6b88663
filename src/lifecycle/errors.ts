import type { LifecycleState } from './states.js';

export class IllegalLifecycleTransitionError extends Error {
  constructor(
    public readonly from: LifecycleState,
    public readonly to: LifecycleState
  ) {
    super(`Illegal lifecycle transition: ${from} → ${to}`);
    this.name = 'IllegalLifecycleTransitionError';
  }
}

export class LifecycleStateError extends Error {
  constructor(
    public readonly expectedState: LifecycleState,
    public readonly actualState: LifecycleState
  ) {
    super(`Expected lifecycle state ${expectedState}, but was ${actualState}`);
    this.name = 'LifecycleStateError';
  }
}

export class AsyncHookError extends Error {
  constructor(public readonly hookId: string) {
    super(`Hook "${hookId}" returned a promise; hook actions must complete synchronously`);
    this.name = 'AsyncHookError';
  }
}
