import { HookRegistrationError } from './errors.js';
import {
  HOOK_EVENT_TYPES,
  type FieldReader,
  type HookCondition,
  type HookDefinition,
  type HookEventType,
  type HookScope,
} from './types.js';

export interface GenericHookOptions<TFields extends object> {
  id: string;
  triggers: readonly HookEventType[];
  /** Validation only: receives a read-only view and throws to reject. */
  hookFunction: (reader: FieldReader<TFields>) => void;
  hookCondition?: HookCondition<TFields>;
  description?: string;
}

export interface UpdateHookOptions<TFields extends object> {
  id: string;
  triggers: readonly HookEventType[];
  /** Derived-state update: may write other fields through the scope. */
  updateFunction: (scope: HookScope<TFields>) => void;
  updateCondition?: HookCondition<TFields>;
  description?: string;
}

const always = (): boolean => true;

function normalizeTriggers(id: string, triggers: readonly HookEventType[]): readonly HookEventType[] {
  if (triggers.length === 0) {
    throw new HookRegistrationError(`hook "${id}"`, 'at least one trigger is required');
  }

  const unique: HookEventType[] = [];
  for (const trigger of triggers) {
    if (!HOOK_EVENT_TYPES.includes(trigger)) {
      throw new HookRegistrationError(`hook "${id}"`, `unknown trigger "${String(trigger)}"`);
    }
    if (!unique.includes(trigger)) unique.push(trigger);
  }
  return Object.freeze(unique);
}

function requireId(id: string): void {
  if (typeof id !== 'string' || id.trim().length === 0) {
    throw new HookRegistrationError('hook', 'id must be a non-empty string');
  }
}

function requireFunction(id: string, name: string, fn: unknown): void {
  if (typeof fn !== 'function') {
    throw new HookRegistrationError(`hook "${id}"`, `${name} must be a function`);
  }
}

export function createGenericHook<TFields extends object>(
  options: GenericHookOptions<TFields>
): HookDefinition<TFields> {
  requireId(options.id);
  requireFunction(options.id, 'hookFunction', options.hookFunction);
  if (options.hookCondition !== undefined) {
    requireFunction(options.id, 'hookCondition', options.hookCondition);
  }

  const validate = options.hookFunction;
  const hook: HookDefinition<TFields> = {
    id: options.id,
    kind: 'generic',
    triggers: normalizeTriggers(options.id, options.triggers),
    condition: options.hookCondition ?? always,
    action: (scope: HookScope<TFields>) => validate({ entityName: scope.entityName, get: scope.get }),
    description: options.description,
  };
  return Object.freeze(hook);
}

export function createUpdateHook<TFields extends object>(
  options: UpdateHookOptions<TFields>
): HookDefinition<TFields> {
  requireId(options.id);
  requireFunction(options.id, 'updateFunction', options.updateFunction);
  if (options.updateCondition !== undefined) {
    requireFunction(options.id, 'updateCondition', options.updateCondition);
  }

  const hook: HookDefinition<TFields> = {
    id: options.id,
    kind: 'update',
    triggers: normalizeTriggers(options.id, options.triggers),
    condition: options.updateCondition ?? always,
    action: options.updateFunction,
    description: options.description,
  };
  return Object.freeze(hook);
}

export function hasTrigger<TFields extends object>(
  hook: HookDefinition<TFields>,
  trigger: HookEventType
): boolean {
  return hook.triggers.includes(trigger);
}
