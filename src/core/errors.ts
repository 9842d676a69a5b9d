// Programmer/contract error types for formwork
//
// Bad data is never raised: it ends up in element errors and sentinels.
// These classes cover misuse of the API and failures of the outer surfaces.

/**
 * Base error class for all formwork errors
 */
export abstract class FormworkError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * A key that is not present in a mapping was indexed, popped or deleted
 */
export class KeyNotFoundError extends FormworkError {
  readonly code = 'KEY_NOT_FOUND';
  readonly exitCode = 4;

  constructor(public readonly key: unknown) {
    super(`Key not found: ${describeKey(key)}`, { key: describeKey(key) });
  }
}

/**
 * A sequence position outside the sequence was addressed
 */
export class IndexOutOfRangeError extends FormworkError {
  readonly code = 'INDEX_OUT_OF_RANGE';
  readonly exitCode = 4;

  constructor(public readonly index: number, size: number) {
    super(`Index ${index} out of range for sequence of ${size}`, { index, size });
  }
}

/**
 * An entry was requested from a mapping that has none
 */
export class EmptyContainerError extends FormworkError {
  readonly code = 'EMPTY_CONTAINER';
  readonly exitCode = 4;

  constructor(containerType: string) {
    super(`${containerType} is empty`, { containerType });
  }
}

/**
 * A method was called with arguments it does not accept
 */
export class InvalidArgumentError extends FormworkError {
  readonly code = 'INVALID_ARGUMENT';
  readonly exitCode = 2;

  constructor(message: string, public readonly argument?: string, context?: Record<string, unknown>) {
    super(message, { ...context, argument });
  }
}

/**
 * A derived value was assigned to
 */
export class ReadOnlyValueError extends FormworkError {
  readonly code = 'READ_ONLY_VALUE';
  readonly exitCode = 2;

  constructor(typeName: string) {
    super(`The value of ${typeName} is derived from its entries and cannot be set`, { typeName });
  }
}

/**
 * Definition documents that do not describe a valid element tree
 */
export class DefinitionError extends FormworkError {
  readonly code = 'DEFINITION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly issues: string[] = []) {
    super(message, { issues });
  }
}

/**
 * Configuration file errors
 */
export class ConfigError extends FormworkError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = 3;
}

/**
 * Input documents that cannot be read or parsed
 */
export class InputError extends FormworkError {
  readonly code = 'INPUT_ERROR';
  readonly exitCode = 3;

  constructor(message: string, public readonly source?: string) {
    super(message, { source });
  }
}

/**
 * Renders a mapping key for error messages
 */
export function describeKey(key: unknown): string {
  if (typeof key === 'string') {
    return JSON.stringify(key);
  }
  if (typeof key === 'symbol') {
    return key.toString();
  }
  return String(key);
}
