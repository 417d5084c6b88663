export type HookEventType = 'POST_INIT' | 'POST_UPDATE';

export const HOOK_EVENT_TYPES: readonly HookEventType[] = ['POST_INIT', 'POST_UPDATE'];

export type HookKind = 'generic' | 'update';

/**
 * `DERIVED` fields are owned by hooks: they take an initial value at
 * construction, after which only hook scopes may write them.
 */
export type FieldMutability = 'MUTABLE' | 'IMMUTABLE_AFTER_INIT' | 'DERIVED';

/** Who is writing: construction, an entity caller, or a hook scope. */
export type WriteOrigin = 'init' | 'caller' | 'hook';

/** String keys of an entity's field map. */
export type FieldName<TFields extends object> = Extract<keyof TFields, string>;

/**
 * Read-only view handed to hook conditions and validation hooks.
 * Every read returns a copy, so a condition cannot change entity state.
 */
export interface FieldReader<TFields extends object> {
  readonly entityName: string;
  get<K extends FieldName<TFields>>(field: K): TFields[K];
}

/**
 * View handed to derived-state hooks. `assign` goes through mutability
 * enforcement but never triggers another POST_UPDATE dispatch.
 */
export interface HookScope<TFields extends object> extends FieldReader<TFields> {
  assign<K extends FieldName<TFields>>(field: K, value: TFields[K]): void;
}

export type HookCondition<TFields extends object> = (reader: FieldReader<TFields>) => boolean;

export type HookAction<TFields extends object> = (scope: HookScope<TFields>) => void;

export interface HookDefinition<TFields extends object> {
  readonly id: string;
  readonly kind: HookKind;
  readonly triggers: readonly HookEventType[];
  readonly condition: HookCondition<TFields>;
  readonly action: HookAction<TFields>;
  readonly description?: string;
}

export interface DispatchReport {
  field: string;
  trigger: HookEventType;
  evaluated: string[];
  fired: string[];
}
