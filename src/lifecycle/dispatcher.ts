import type { FieldRegistry } from '../hooks/registry.js';
import type {
  DispatchReport,
  FieldName,
  FieldReader,
  HookDefinition,
  HookEventType,
  HookScope,
} from '../hooks/types.js';
import { logger } from '../observability/logger.js';
import { AsyncHookError, IllegalLifecycleTransitionError, LifecycleStateError } from './errors.js';
import { type LifecycleState, acceptsUpdates, canTransition } from './states.js';

export interface LifecycleTransition {
  from: LifecycleState;
  to: LifecycleState;
  timestamp: string;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

function readerOf<TFields extends object>(scope: HookScope<TFields>): FieldReader<TFields> {
  return { entityName: scope.entityName, get: scope.get };
}

/**
 * Drives one entity instance from CONSTRUCTING to READY and fires the
 * registry's hooks at each trigger point. Holds no field values itself;
 * the owning entity passes a scope and handles rollback.
 */
export class LifecycleDispatcher<TFields extends object> {
  private state: LifecycleState = 'CONSTRUCTING';
  private readonly transitions: LifecycleTransition[] = [];

  constructor(
    private readonly registry: FieldRegistry<TFields>,
    private readonly label: () => string
  ) {}

  getState(): LifecycleState {
    return this.state;
  }

  getTransitionHistory(): LifecycleTransition[] {
    return [...this.transitions];
  }

  isReady(): boolean {
    return acceptsUpdates(this.state);
  }

  requireReady(): void {
    if (!this.isReady()) {
      throw new LifecycleStateError('READY', this.state);
    }
  }

  /**
   * Fires POST_INIT hooks field by field in declaration order, then moves
   * to READY. A hook bound to several fields runs once, at its first field.
   * Throws whatever the first failing hook throws; the state stays CONSTRUCTING.
   */
  completeConstruction(scope: HookScope<TFields>): DispatchReport[] {
    if (!canTransition(this.state, 'READY')) {
      throw new IllegalLifecycleTransitionError(this.state, 'READY');
    }

    const seen = new Set<HookDefinition<TFields>>();
    const reports: DispatchReport[] = [];

    for (const field of this.registry.getFieldNames()) {
      const hooks = this.registry
        .getHooksFor(field, 'POST_INIT')
        .filter(hook => !seen.has(hook));
      if (hooks.length === 0) continue;

      hooks.forEach(hook => seen.add(hook));
      reports.push(this.runHooks(field, 'POST_INIT', hooks, scope));
    }

    this.transition('READY');
    return reports;
  }

  /** Fires POST_UPDATE hooks bound to `field` against the post-write state. */
  dispatchUpdate(field: FieldName<TFields>, scope: HookScope<TFields>): DispatchReport {
    this.requireReady();
    return this.runHooks(field, 'POST_UPDATE', this.registry.getHooksFor(field, 'POST_UPDATE'), scope);
  }

  private runHooks(
    field: FieldName<TFields>,
    trigger: HookEventType,
    hooks: HookDefinition<TFields>[],
    scope: HookScope<TFields>
  ): DispatchReport {
    const report: DispatchReport = { field, trigger, evaluated: [], fired: [] };
    const reader = readerOf(scope);

    for (const hook of hooks) {
      report.evaluated.push(hook.id);
      if (!hook.condition(reader)) continue;

      try {
        this.invoke(hook, scope);
      } catch (error) {
        logger.error('hook_failed', 'Hook rejected entity state', {
          entity: this.registry.entityName,
          instance: this.label(),
          field,
          trigger,
          hookId: hook.id,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
        throw error;
      }
      report.fired.push(hook.id);
    }

    if (report.fired.length > 0) {
      logger.debug('hooks_dispatched', 'Entity hooks fired', {
        entity: this.registry.entityName,
        instance: this.label(),
        field,
        trigger,
        fired: report.fired,
      });
    }

    return report;
  }

  private invoke(hook: HookDefinition<TFields>, scope: HookScope<TFields>): void {
    const outcome: unknown = hook.action(scope);
    if (!isThenable(outcome)) return;

    Promise.resolve(outcome).catch((error: unknown) => {
      logger.error('async_hook_rejected', 'Asynchronous hook settled with an error after being refused', {
        hookId: hook.id,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    });
    throw new AsyncHookError(hook.id);
  }

  private transition(to: LifecycleState): void {
    const from = this.state;
    this.transitions.push({ from, to, timestamp: new Date().toISOString() });
    this.state = to;

    logger.debug('lifecycle_transition', 'Entity lifecycle state changed', {
      entity: this.registry.entityName,
      instance: this.label(),
      from,
      to,
    });
  }
}
