import {
  ConstructionFailure,
  MissingFieldError,
  UnknownFieldError,
} from '../hooks/errors.js';
import type { FieldRegistry } from '../hooks/registry.js';
import type { DispatchReport, FieldName, HookScope, WriteOrigin } from '../hooks/types.js';
import { LifecycleDispatcher, type LifecycleTransition } from '../lifecycle/dispatcher.js';
import type { LifecycleState } from '../lifecycle/states.js';
import { MutabilityEnforcer } from '../mutability/enforcer.js';
import { logger } from '../observability/logger.js';

export type SetResult =
  | { ok: true; report: DispatchReport }
  | { ok: false; error: Error };

/**
 * A config entity whose fields are governed by a FieldRegistry.
 *
 * The entity owns its values, a MutabilityEnforcer and a LifecycleDispatcher.
 * Construction either returns a READY instance or throws ConstructionFailure.
 * A rejected update is rolled back completely: the field write and every
 * derived write made by hooks during that call.
 *
 * Values are copied on the way in and on the way out, so callers never hold
 * a reference into entity state.
 */
export class GovernedEntity<TFields extends object> {
  private values: Partial<TFields> = {};
  private readonly enforcer: MutabilityEnforcer<TFields>;
  private readonly dispatcher: LifecycleDispatcher<TFields>;
  private readonly scope: HookScope<TFields>;

  constructor(
    protected readonly registry: FieldRegistry<TFields>,
    init: Partial<TFields>
  ) {
    registry.seal();
    this.enforcer = new MutabilityEnforcer(registry);
    this.dispatcher = new LifecycleDispatcher(registry, () => this.label());
    this.scope = {
      entityName: registry.entityName,
      get: <K extends FieldName<TFields>>(field: K): TFields[K] => this.get(field),
      assign: <K extends FieldName<TFields>>(field: K, value: TFields[K]): void => this.write(field, value, 'hook'),
    };

    try {
      this.populate(init);
      this.dispatcher.completeConstruction(this.scope);
    } catch (error) {
      const violation = error instanceof Error ? error : new Error(String(error));
      logger.error('entity_construction_failed', 'Entity construction rejected', {
        entity: registry.entityName,
        instance: this.label(),
        error: violation.message,
      });
      throw new ConstructionFailure(registry.entityName, violation);
    }

    logger.info('entity_constructed', 'Entity ready', {
      entity: registry.entityName,
      instance: this.label(),
    });
  }

  get entityName(): string {
    return this.registry.entityName;
  }

  get lifecycleState(): LifecycleState {
    return this.dispatcher.getState();
  }

  getLifecycleHistory(): LifecycleTransition[] {
    return this.dispatcher.getTransitionHistory();
  }

  get<K extends FieldName<TFields>>(field: K): TFields[K] {
    if (!this.registry.isDeclared(field)) {
      throw new UnknownFieldError(this.registry.entityName, field);
    }
    const value = this.values[field];
    if (value === undefined) {
      throw new MissingFieldError(this.registry.entityName, field);
    }
    return structuredClone(value);
  }

  /**
   * Governed write: mutability check, apply, then POST_UPDATE hooks for
   * `field`. Throws ImmutableFieldViolation, DerivedFieldViolation,
   * InvariantViolation or UnknownFieldError; on any hook failure the entity is left exactly as it
   * was before the call.
   */
  set<K extends FieldName<TFields>>(field: K, value: TFields[K]): DispatchReport {
    this.dispatcher.requireReady();
    this.enforcer.assertWritable(this.values, field, value, 'caller');

    const before = structuredClone(this.values);
    this.values[field] = structuredClone(value);

    try {
      return this.dispatcher.dispatchUpdate(field, this.scope);
    } catch (error) {
      this.values = before;
      logger.warn('entity_update_rolled_back', 'Update rejected by hook; previous state restored', {
        entity: this.registry.entityName,
        instance: this.label(),
        field,
      });
      throw error;
    }
  }

  safeSet<K extends FieldName<TFields>>(field: K, value: TFields[K]): SetResult {
    try {
      return { ok: true, report: this.set(field, value) };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  isWritable(field: FieldName<TFields>): boolean {
    return this.enforcer.canWrite(this.values, field);
  }

  /** Copy of every field value. */
  snapshot(): Partial<TFields> {
    return structuredClone(this.values);
  }

  private populate(init: Partial<TFields>): void {
    for (const key of Object.keys(init)) {
      if (!this.registry.isDeclared(key)) {
        throw new UnknownFieldError(this.registry.entityName, key);
      }
    }

    for (const field of this.registry.getFieldNames()) {
      const supplied = init[field];
      if (supplied !== undefined) {
        this.write(field, supplied, 'init');
        continue;
      }

      const fallback = this.registry.resolveDefault(field);
      if (!fallback.found) {
        throw new MissingFieldError(this.registry.entityName, field);
      }
      this.write(field, fallback.value, 'init');
    }
  }

  private write<K extends FieldName<TFields>>(field: K, value: TFields[K], origin: WriteOrigin): void {
    this.enforcer.assertWritable(this.values, field, value, origin);
    this.values[field] = structuredClone(value);
  }

  private label(): string {
    const identity = this.registry.options.identityField;
    if (!identity) return 'unknown';
    const value = this.values[identity];
    return typeof value === 'string' ? value : 'unknown';
  }
}
