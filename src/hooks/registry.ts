import { HookRegistrationError, UnknownFieldError } from './errors.js';
import { hasTrigger } from './hook.js';
import type { FieldMutability, FieldName, HookDefinition, HookEventType } from './types.js';

export interface FieldOptions<V> {
  mutability?: FieldMutability;
  /** Shared default. Use `defaultFactory` for arrays and objects. */
  default?: V;
  defaultFactory?: () => V;
}

export interface RegistryOptions<TFields extends object> {
  /** Field whose value labels log entries for an instance. */
  identityField?: FieldName<TFields>;
}

type DefaultFactories<TFields extends object> = {
  [K in keyof TFields]?: () => TFields[K];
};

export type DefaultResolution<V> = { found: true; value: V } | { found: false };

/**
 * Per-entity-type field metadata: declaration order, mutability, defaults
 * and the ordered hooks bound to each field. Built once at module load,
 * then sealed; entity instances only read from it.
 */
export class FieldRegistry<TFields extends object> {
  private readonly mutability = new Map<FieldName<TFields>, FieldMutability>();
  private readonly hooks = new Map<FieldName<TFields>, HookDefinition<TFields>[]>();
  private readonly defaults: DefaultFactories<TFields> = {};
  private sealed = false;

  constructor(
    public readonly entityName: string,
    public readonly options: RegistryOptions<TFields> = {}
  ) {}

  defineField<K extends FieldName<TFields>>(field: K, options: FieldOptions<TFields[K]> = {}): this {
    this.assertOpen();

    if (this.mutability.has(field)) {
      throw new HookRegistrationError(this.entityName, `field "${field}" is declared twice`);
    }
    if (options.default !== undefined && options.defaultFactory !== undefined) {
      throw new HookRegistrationError(
        this.entityName,
        `field "${field}" cannot have both default and defaultFactory`
      );
    }

    this.mutability.set(field, options.mutability ?? 'MUTABLE');
    this.hooks.set(field, []);

    const { defaultFactory } = options;
    if (defaultFactory) {
      this.defaults[field] = defaultFactory;
    } else if (options.default !== undefined) {
      const value = options.default;
      this.defaults[field] = () => value;
    }

    return this;
  }

  registerHook(field: FieldName<TFields>, hook: HookDefinition<TFields>): this {
    this.assertOpen();

    const bound = this.hooks.get(field);
    if (!bound) {
      throw new UnknownFieldError(this.entityName, field);
    }

    const duplicate = bound.find(
      existing => existing.id === hook.id && hook.triggers.some(t => hasTrigger(existing, t))
    );
    if (duplicate) {
      throw new HookRegistrationError(
        this.entityName,
        `hook "${hook.id}" is already registered on "${field}" for ${hook.triggers.join(', ')}`
      );
    }

    bound.push(hook);
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  isDeclared(field: string): field is FieldName<TFields> {
    for (const name of this.mutability.keys()) {
      if (name === field) return true;
    }
    return false;
  }

  /** Field names in declaration order. */
  getFieldNames(): FieldName<TFields>[] {
    return Array.from(this.mutability.keys());
  }

  getMutability(field: FieldName<TFields>): FieldMutability {
    const mutability = this.mutability.get(field);
    if (!mutability) {
      throw new UnknownFieldError(this.entityName, field);
    }
    return mutability;
  }

  getHooksFor(field: FieldName<TFields>, trigger: HookEventType): HookDefinition<TFields>[] {
    const bound = this.hooks.get(field);
    if (!bound) {
      throw new UnknownFieldError(this.entityName, field);
    }
    return bound.filter(hook => hasTrigger(hook, trigger));
  }

  resolveDefault<K extends FieldName<TFields>>(field: K): DefaultResolution<TFields[K]> {
    const factory = this.defaults[field];
    if (!factory) return { found: false };
    return { found: true, value: factory() };
  }

  getImmutableFields(): FieldName<TFields>[] {
    return this.getFieldNames().filter(field => this.mutability.get(field) === 'IMMUTABLE_AFTER_INIT');
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new HookRegistrationError(this.entityName, 'registry is sealed; declare fields and hooks at load time');
    }
  }
}
