// Element substrate: tree nodes, containers and immutable element schemas

import { Unspecified, type Coerced } from '../core/sentinels.js';
import { runValidator, type ValidatorLike } from '../validation/validator.js';
import type { TraversalPath, TraversedElement, ValidationContext } from '../models/types.js';

/**
 * A schema-typed node holding raw input, a coerced value and validation
 * state.
 *
 * Elements are created through an {@link ElementSchema} and owned by exactly
 * one parent container (or by the caller, for the root).
 */
export abstract class Element<T = unknown> {
  rawValue: unknown = Unspecified;
  errors: string[] = [];
  /** `undefined` until {@link validate} runs */
  isValid: boolean | undefined = undefined;

  constructor(
    readonly typeName: string,
    readonly validators: readonly ValidatorLike[] = []
  ) {}

  abstract get value(): Coerced<T>;

  /**
   * Records `raw` and coerces it. Coercion failures surface through
   * {@link value}, never as exceptions.
   */
  abstract set(raw: unknown): void;

  /**
   * Runs every attached validator (no short-circuit) and stores the result.
   * Errors noted by earlier runs are kept; see {@link clearErrors}.
   */
  validate(context: ValidationContext = {}): boolean {
    this.isValid = this.runValidators(context);
    return this.isValid;
  }

  protected runValidators(context: ValidationContext): boolean {
    let valid = true;
    for (const validator of this.validators) {
      valid = runValidator(validator, this, context) && valid;
    }
    return valid;
  }

  clearErrors(): void {
    this.errors = [];
  }

  /**
   * Leaf elements yield themselves.
   */
  *traverse(prefix: TraversalPath = []): Generator<TraversedElement, void, undefined> {
    yield { path: prefix, element: this };
  }

  /**
   * Yields every node of the tree, containers included, parents first.
   */
  *walk(prefix: TraversalPath = []): Generator<TraversedElement, void, undefined> {
    yield { path: prefix, element: this };
  }
}

/**
 * An element with child elements.
 */
export abstract class Container<T = unknown> extends Element<T> {
  abstract has(key: unknown): boolean;

  /**
   * The child element addressed by `key`, if any
   */
  abstract child(key: unknown): Element | undefined;

  /**
   * Children in iteration order, each with the path segments that address
   * it relative to this container
   */
  protected abstract childPaths(): Iterable<readonly [TraversalPath, Element]>;

  /**
   * Validates every child, then the container's own validators.
   */
  validate(context: ValidationContext = {}): boolean {
    let valid = true;
    for (const [, child] of this.childPaths()) {
      valid = child.validate(context) && valid;
    }
    valid = this.runValidators(context) && valid;
    this.isValid = valid;
    return valid;
  }

  clearErrors(): void {
    super.clearErrors();
    for (const [, child] of this.childPaths()) {
      child.clearErrors();
    }
  }

  *traverse(prefix: TraversalPath = []): Generator<TraversedElement, void, undefined> {
    for (const [segments, child] of this.childPaths()) {
      yield* child.traverse([...prefix, ...segments]);
    }
  }

  *walk(prefix: TraversalPath = []): Generator<TraversedElement, void, undefined> {
    yield { path: prefix, element: this };
    for (const [segments, child] of this.childPaths()) {
      yield* child.walk([...prefix, ...segments]);
    }
  }
}

export type ElementFactory<E> = (validators: readonly ValidatorLike[]) => E;

/**
 * Immutable descriptor of an element type.
 *
 * Schemas are declared once and shared; `validatedBy` returns a new schema
 * and leaves the receiver untouched.
 *
 * @typeParam T - the coerced value type
 * @typeParam E - the element class instances are created as
 */
export class ElementSchema<T, E extends Element<T> = Element<T>> {
  readonly validators: readonly ValidatorLike[];

  constructor(
    readonly typeName: string,
    private readonly factory: ElementFactory<E>,
    validators: readonly ValidatorLike[] = []
  ) {
    this.validators = Object.freeze([...validators]);
    Object.freeze(this);
  }

  create(raw: unknown = Unspecified): E {
    const element = this.factory(this.validators);
    element.set(raw);
    return element;
  }

  /**
   * Shorthand for `create(raw).value`
   */
  coerce(raw: unknown): Coerced<T> {
    return this.create(raw).value;
  }

  validatedBy(...validators: ValidatorLike[]): ElementSchema<T, E> {
    return new ElementSchema(this.typeName, this.factory, [...this.validators, ...validators]);
  }
}

/**
 * Any element schema, for places that hold schemas of mixed types
 */
export type AnyElementSchema = ElementSchema<unknown, Element<unknown>>;
