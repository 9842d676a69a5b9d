// Library of concrete validators

import { isDeepStrictEqual } from 'util';
import { InvalidArgumentError } from '../core/errors.js';
import { isUnspecified } from '../core/sentinels.js';
import { Container, type Element } from '../schema/core.js';
import { isPlainObject } from '../schema/raw.js';
import { Validator, type ValidatorOptions } from './validator.js';
import type { ValidationContext } from '../models/types.js';

export type Bound = number | bigint | string | Date;

/**
 * Length of strings, arrays, bytes, maps, sets and plain objects
 */
function lengthOf(value: unknown): number | undefined {
  if (typeof value === 'string' || Array.isArray(value) || value instanceof Uint8Array) {
    return value.length;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size;
  }
  if (isPlainObject(value)) {
    return Object.keys(value).length;
  }
  return undefined;
}

/**
 * Orders two values of the same kind; `undefined` when they are not
 * comparable.
 */
function compare(a: unknown, b: Bound): number | undefined {
  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  return undefined;
}

function isTruthy(value: unknown): boolean {
  const length = lengthOf(value);
  return length === undefined ? Boolean(value) : length > 0;
}

function itemOf(container: unknown, key: unknown): { found: boolean; item?: unknown } {
  if (container instanceof Map) {
    return { found: container.has(key), item: container.get(key) };
  }
  if (Array.isArray(container) && typeof key === 'number') {
    return { found: key >= 0 && key < container.length, item: container[key] };
  }
  if (isPlainObject(container) && typeof key === 'string') {
    return { found: Object.prototype.hasOwnProperty.call(container, key), item: container[key] };
  }
  return { found: false };
}

/**
 * Fails with {@link Present.defaultMessage} if no value was supplied.
 */
export class Present extends Validator {
  static readonly defaultMessage = 'May not be blank.';

  validate(element: Element, context: ValidationContext): boolean {
    if (isUnspecified(element.value)) {
      this.noteError(element, this.message, context);
      return this.invalid;
    }
    return this.valid;
  }
}

/**
 * Fails if the value is missing or could not be coerced.
 */
export class Converted extends Validator {
  static readonly defaultMessage = 'Not a valid value.';

  validate(element: Element, context: ValidationContext): boolean {
    if (this.isUnusable(element)) {
      this.noteError(element, this.message, context);
      return this.invalid;
    }
    return this.valid;
  }
}

/**
 * Fails if the value is false-ish. Empty strings and collections are
 * false-ish.
 */
export class IsTrue extends Validator {
  static readonly defaultMessage = 'Must be true.';

  validate(element: Element, context: ValidationContext): boolean {
    if (this.isUnusable(element) || !isTruthy(element.value)) {
      this.noteError(element, this.message, context);
      return this.invalid;
    }
    return this.valid;
  }
}

export class IsFalse extends Validator {
  static readonly defaultMessage = 'Must be false.';

  validate(element: Element, context: ValidationContext): boolean {
    if (this.isUnusable(element) || isTruthy(element.value)) {
      this.noteError(element, this.message, context);
      return this.invalid;
    }
    return this.valid;
  }
}

/**
 * Fails if the length of the value is equal to or greater than `upperbound`.
 * `{upperbound}` is substituted in the message.
 */
export class ShorterThan extends Validator {
  static readonly defaultMessage = 'Must be shorter than {upperbound}.';

  constructor(readonly upperbound: number, options?: ValidatorOptions) {
    super(options);
  }

  validate(element: Element, context: ValidationContext): boolean {
    const length = this.isUnusable(element) ? undefined : lengthOf(element.value);
    if (length === undefined || length >= this.upperbound) {
      this.noteError(element, this.message, context, { upperbound: this.upperbound });
      return this.invalid;
    }
    return this.valid;
  }
}

/**
 * Fails if the length of the value is equal to or less than `lowerbound`.
 * `{lowerbound}` is substituted in the message.
 */
export class LongerThan extends Validator {
  static readonly defaultMessage = 'Must be longer than {lowerbound}.';

  constructor(readonly lowerbound: number, options?: ValidatorOptions) {
    super(options);
  }

  validate(element: Element, context: ValidationContext): boolean {
    const length = this.isUnusable(element) ? undefined : lengthOf(element.value);
    if (length === undefined || length <= this.lowerbound) {
      this.noteError(element, this.message, context, { lowerbound: this.lowerbound });
      return this.invalid;
    }
    return this.valid;
  }
}

/**
 * Passes only if `start < length < end`. `{start}` and `{end}` are
 * substituted in the message.
 */
export class LengthWithinRange extends Validator {
  static readonly defaultMessage = 'Must be longer than {start} and shorter than {end}.';

  constructor(readonly start: number, readonly end: number, options?: ValidatorOptions) {
    super(options);
  }

  validate(element: Element, context: ValidationContext): boolean {
    const length = this.isUnusable(element) ? undefined : lengthOf(element.value);
    if (length !== undefined && this.start < length && length < this.end) {
      return this.valid;
    }
    this.noteError(element, this.message, context, { start: this.start, end: this.end });
    return this.invalid;
  }
}

/**
 * Fails if the value is not one of `options`. Options are compared
 * structurally, so lists, maps and bytes match equal options. Missing and
 * unconverted values are reported with the same message, since neither is
 * among the options.
 */
export class ContainedIn extends Validator {
  static readonly defaultMessage = 'Not a valid value.';

  readonly options: readonly unknown[];

  constructor(options: Iterable<unknown>, validatorOptions?: ValidatorOptions) {
    super(validatorOptions);
    this.options = Object.freeze([...options]);
  }

  validate(element: Element, context: ValidationContext): boolean {
    const value = element.value;
    if (!this.options.some((option) => isDeepStrictEqual(option, value))) {
      this.noteError(element, this.message, context);
      return this.invalid;
    }
    return this.valid;
  }
}

/**
 * Fails if the value is greater than or equal to `upperbound`.
 */
export class LessThan extends Validator {
  static readonly defaultMessage = 'Must be less than {upperbound}.';

  constructor(readonly upperbound: Bound, options?: ValidatorOptions) {
    super(options);
  }

  validate(element: Element, context: ValidationContext): boolean {
    const order = this.isUnusable(element) ? undefined : compare(element.value, this.upperbound);
    if (order === undefined || order >= 0) {
      this.noteError(element, this.message, context, { upperbound: this.upperbound });
      return this.invalid;
    }
    return this.valid;
  }
}

/**
 * Fails if the value is less than or equal to `lowerbound`.
 */
export class GreaterThan extends Validator {
  static readonly defaultMessage = 'Must be greater than {lowerbound}.';

  constructor(readonly lowerbound: Bound, options?: ValidatorOptions) {
    super(options);
  }

  validate(element: Element, context: ValidationContext): boolean {
    const order = this.isUnusable(element) ? undefined : compare(element.value, this.lowerbound);
    if (order === undefined || order <= 0) {
      this.noteError(element, this.message, context, { lowerbound: this.lowerbound });
      return this.invalid;
    }
    return this.valid;
  }
}

/**
 * Passes only if `start < value < end`.
 */
export class WithinRange extends Validator {
  static readonly defaultMessage = 'Must be greater than {start} and shorter than {end}.';

  constructor(readonly start: Bound, readonly end: Bound, options?: ValidatorOptions) {
    super(options);
  }

  validate(element: Element, context: ValidationContext): boolean {
    if (!this.isUnusable(element)) {
      const afterStart = compare(element.value, this.start);
      const beforeEnd = compare(element.value, this.end);
      if (afterStart !== undefined && beforeEnd !== undefined && afterStart > 0 && beforeEnd < 0) {
        return this.valid;
      }
    }
    this.noteError(element, this.message, context, { start: this.start, end: this.end });
    return this.invalid;
  }
}

/**
 * A labelled position: `label` is substituted in messages, `key` selects the
 * item (map key, array index or object property) or the child element.
 */
export type LabelledKey = readonly [label: string, key: unknown];

/**
 * Fails unless two items of the value are present and equal.
 */
export class ItemsEqual extends Validator {
  static readonly defaultMessage = '{a} and {b} must be equal.';

  constructor(readonly a: LabelledKey, readonly b: LabelledKey, options?: ValidatorOptions) {
    super(options);
  }

  validate(element: Element, context: ValidationContext): boolean {
    if (!this.isUnusable(element)) {
      const first = itemOf(element.value, this.a[1]);
      const second = itemOf(element.value, this.b[1]);
      if (first.found && second.found && isDeepStrictEqual(first.item, second.item)) {
        return this.valid;
      }
    }
    this.noteError(element, this.message, context, { a: this.a[0], b: this.b[0] });
    return this.invalid;
  }
}

/**
 * Fails unless two named child elements of a container have equal values.
 */
export class AttributesEqual extends Validator {
  static readonly defaultMessage = '{a} and {b} must be equal.';

  constructor(readonly a: LabelledKey, readonly b: LabelledKey, options?: ValidatorOptions) {
    super(options);
  }

  validate(element: Element, context: ValidationContext): boolean {
    if (!this.isUnusable(element) && element instanceof Container) {
      const first = element.child(this.a[1]);
      const second = element.child(this.b[1]);
      if (first && second && isDeepStrictEqual(first.value, second.value)) {
        return this.valid;
      }
    }
    this.noteError(element, this.message, context, { a: this.a[0], b: this.b[0] });
    return this.invalid;
  }
}

/**
 * Fails if the value does not look like an e-mail address: it needs an `@`
 * followed by a host containing a dot. Addresses that pass may still be
 * undeliverable.
 */
export class ProbablyAnEmailAddress extends Validator {
  static readonly defaultMessage = 'Must be a valid e-mail address.';

  validate(element: Element, context: ValidationContext): boolean {
    const value = element.value;
    if (!this.isUnusable(element) && typeof value === 'string' && value.includes('@')) {
      const host = value.slice(value.indexOf('@') + 1);
      if (host.includes('.')) {
        return this.valid;
      }
    }
    this.noteError(element, this.message, context);
    return this.invalid;
  }
}

// Sticky patterns only match at lastIndex, i.e. at the start of the input
function compileSticky(source: RegExp | string): RegExp {
  try {
    if (typeof source === 'string') {
      return new RegExp(source, 'y');
    }
    return new RegExp(source.source, `${source.flags.replace(/[gy]/g, '')}y`);
  } catch (error) {
    throw new InvalidArgumentError(
      `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
      'regex'
    );
  }
}

/**
 * Fails unless the value matches `regex` at its start. The match is not
 * anchored at the end; add `$` to the pattern for a full match.
 */
export class MatchesRegex extends Validator {
  static readonly defaultMessage = 'Must be a valid value.';
  static readonly defaultPattern: string = '';

  readonly regex: RegExp;

  constructor(regex?: RegExp | string, options?: ValidatorOptions) {
    super(options);
    this.regex = compileSticky(regex ?? MatchesRegex.defaultPattern);
  }

  validate(element: Element, context: ValidationContext): boolean {
    const value = element.value;
    if (!this.isUnusable(element) && typeof value === 'string') {
      this.regex.lastIndex = 0;
      if (this.regex.test(value)) {
        return this.valid;
      }
    }
    this.noteError(element, this.message, context);
    return this.invalid;
  }
}

// the host must follow `//`: `http:example.com` also parses with a host
const AUTHORITY_PATTERN = /^[a-z][a-z\d+.-]*:\/\//i;

function isAbsoluteUrl(value: string): boolean {
  if (!AUTHORITY_PATTERN.test(value)) {
    return false;
  }
  try {
    const url = new URL(value);
    return url.protocol.length > 1 && url.host.length > 0;
  } catch {
    return false;
  }
}

/**
 * Fails unless the value is an absolute URL with a scheme and a host
 * (`scheme://host...`).
 */
export class IsURL extends Validator {
  static readonly defaultMessage = 'Must be a URL.';

  validate(element: Element, context: ValidationContext): boolean {
    const value = element.value;
    if (!this.isUnusable(element) && typeof value === 'string' && isAbsoluteUrl(value)) {
      return this.valid;
    }
    this.noteError(element, this.message, context);
    return this.invalid;
  }
}
