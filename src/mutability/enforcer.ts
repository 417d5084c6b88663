import { DerivedFieldViolation, ImmutableFieldViolation, UnknownFieldError } from '../hooks/errors.js';
import type { FieldRegistry } from '../hooks/registry.js';
import type { FieldName, WriteOrigin } from '../hooks/types.js';
import { logger } from '../observability/logger.js';

/** A field counts as present once it holds anything other than undefined or null. */
export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

export class MutabilityEnforcer<TFields extends object> {
  constructor(private readonly registry: FieldRegistry<TFields>) {}

  canWrite<K extends FieldName<TFields>>(
    values: Partial<TFields>,
    field: K,
    origin: WriteOrigin = 'caller'
  ): boolean {
    switch (this.registry.getMutability(field)) {
      case 'MUTABLE':
        return true;
      case 'DERIVED':
        return origin !== 'caller';
      case 'IMMUTABLE_AFTER_INIT':
        return !isPresent(values[field]);
    }
  }

  /**
   * Throws before anything is written. Immutable fields take one value;
   * derived fields take writes from construction and hooks only.
   */
  assertWritable<K extends FieldName<TFields>>(
    values: Partial<TFields>,
    field: K,
    attempted: TFields[K],
    origin: WriteOrigin = 'caller'
  ): void {
    if (!this.registry.isDeclared(field)) {
      throw new UnknownFieldError(this.registry.entityName, field);
    }
    if (this.canWrite(values, field, origin)) return;

    const current = values[field];
    if (this.registry.getMutability(field) === 'DERIVED') {
      logger.warn('derived_field_violation', 'Rejected direct write to hook-owned field', {
        entity: this.registry.entityName,
        field,
      });
      throw new DerivedFieldViolation(field);
    }

    logger.warn('immutable_field_violation', 'Rejected write to immutable field', {
      entity: this.registry.entityName,
      field,
      current,
      attempted,
    });
    throw new ImmutableFieldViolation(field, current, attempted);
  }
}
