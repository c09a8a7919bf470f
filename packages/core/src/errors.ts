import type { JsonValue } from './types';

export type ErrorCode =
  | 'INVALID_SEARCH_MODIFIER'
  | 'UNKNOWN_FIELD'
  | 'NOT_A_RELATED_FIELD'
  | 'FIELD_DEPTH_ERROR'
  | 'INVALID_COMMAND_ERROR'
  | 'UNKNOWN';

export const UNKNOWN_ERROR_MESSAGE = 'An unknown error occurred, please contact the administrator.';

/**
 * Base of every error a query can fail with. Each subclass maps 1:1 onto a
 * failure envelope: `code`, `message` and the fields returned by `details()`.
 */
export abstract class QueryError extends Error {
  override readonly name: string = 'QueryError';
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  abstract details(): Record<string, JsonValue>;
}

export class InvalidSearchModifierError extends QueryError {
  override readonly name = 'InvalidSearchModifierError';
  readonly code = 'INVALID_SEARCH_MODIFIER';

  constructor(
    readonly modifier: string,
    readonly value: string,
    readonly type: string,
  ) {
    super(`Modifier '${modifier}' cannot be applied to value '${value}' of type '${type}'`);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  details(): Record<string, JsonValue> {
    return { modifier: this.modifier, value: this.value, type: this.type };
  }
}

export class UnknownFieldError extends QueryError {
  override readonly name = 'UnknownFieldError';
  readonly code = 'UNKNOWN_FIELD';

  constructor(
    readonly unknown: string,
    readonly table: string,
    readonly validFields: string[],
  ) {
    super(`Unknown field '${unknown}' in table '${table}'`);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  details(): Record<string, JsonValue> {
    return { unknown: this.unknown, table: this.table, valid_fields: this.validFields };
  }
}

export class NotARelatedFieldError extends QueryError {
  override readonly name = 'NotARelatedFieldError';
  readonly code = 'NOT_A_RELATED_FIELD';

  constructor(
    readonly field: string,
    readonly table: string,
    readonly relatedFields: string[],
  ) {
    super(`Field '${field}' in table '${table}' is neither a foreign key nor a related field`);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  details(): Record<string, JsonValue> {
    return { field: this.field, table: this.table, related_fields: this.relatedFields };
  }
}

export class FieldDepthError extends QueryError {
  override readonly name = 'FieldDepthError';
  readonly code = 'FIELD_DEPTH_ERROR';

  constructor(
    readonly field: string,
    readonly maxDepth: number,
  ) {
    super(`Field '${field}' exceeds the maximum depth of ${maxDepth}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  details(): Record<string, JsonValue> {
    return { field: this.field, max_depth: this.maxDepth };
  }
}

export class InvalidCommandError extends QueryError {
  override readonly name = 'InvalidCommandError';
  readonly code = 'INVALID_COMMAND_ERROR';

  constructor(
    readonly command: string,
    readonly reason: string,
  ) {
    super(`Invalid command '${command}': ${reason}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  details(): Record<string, JsonValue> {
    return { command: this.command };
  }
}

export function isQueryError(e: unknown): e is QueryError {
  return e instanceof QueryError;
}
