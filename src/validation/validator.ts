// Validator protocol: stateless pass/fail checks against one element

import { isNotUnserializable, isUnspecified } from '../core/sentinels.js';
import { logger } from '../core/logger.js';
import type { Element } from '../schema/core.js';
import type { ValidationContext } from '../models/types.js';

export type Substitutions = Readonly<Record<string, unknown>>;

/**
 * A plain function can stand in for a {@link Validator} anywhere one is
 * accepted.
 */
export type ValidatorFn = (element: Element, context: ValidationContext) => boolean;

export type ValidatorLike = Validator | ValidatorFn;

export interface ValidatorOptions {
  /** Replaces the validator's default message template */
  message?: string;
}

const log = logger.child({ scope: 'validation' });

/**
 * Substitutes `{placeholder}` names in a message template. Placeholders
 * without a substitution are left as they are.
 */
export function formatMessage(template: string, substitutions: Substitutions = {}): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(substitutions, name)
      ? String(substitutions[name])
      : placeholder
  );
}

/**
 * Base class of all validators.
 *
 * `validate` never throws for bad data; it records a message on the
 * element and returns `false`. The base implementation always fails.
 */
export class Validator {
  /** Default message template, overridden per subclass */
  static readonly defaultMessage: string = 'Not a valid value.';

  readonly message: string;

  constructor(options: ValidatorOptions = {}) {
    this.message = options.message ?? this.resolveDefaultMessage();
  }

  get name(): string {
    return this.constructor.name;
  }

  get valid(): boolean {
    return true;
  }

  get invalid(): boolean {
    return false;
  }

  validate(_element: Element, _context: ValidationContext): boolean {
    return this.invalid;
  }

  /**
   * Appends `template`, with its placeholders substituted, to the element's
   * errors. Messages are not de-duplicated.
   */
  noteError(
    element: Element,
    template: string,
    _context: ValidationContext,
    substitutions: Substitutions = {}
  ): void {
    element.errors.push(formatMessage(template, substitutions));
  }

  /**
   * True when the element holds no usable value: nothing was supplied or
   * the supplied input could not be coerced.
   */
  isUnusable(element: Element): boolean {
    const value = element.value;
    return isUnspecified(value) || isNotUnserializable(value);
  }

  call(element: Element, context: ValidationContext): boolean {
    const result = this.validate(element, context);
    notify(this.name, element, context, result);
    return result;
  }

  private resolveDefaultMessage(): string {
    const ctor: unknown = this.constructor;
    if (typeof ctor === 'function' && 'defaultMessage' in ctor && typeof ctor.defaultMessage === 'string') {
      return ctor.defaultMessage;
    }
    return Validator.defaultMessage;
  }
}

function notify(name: string, element: Element, context: ValidationContext, result: boolean): void {
  log.debug('validate', {
    element: element.typeName,
    name: context.name ?? 'unnamed',
    validator: name,
    result,
    errors: result ? undefined : element.errors
  });
  context.observer?.({ validator: name, element, result, context });
}

/**
 * Runs a validator or validator function against an element
 */
export function runValidator(validator: ValidatorLike, element: Element, context: ValidationContext): boolean {
  if (validator instanceof Validator) {
    return validator.call(element, context);
  }
  const result = validator(element, context);
  notify(validator.name || 'anonymous', element, context, result);
  return result;
}
