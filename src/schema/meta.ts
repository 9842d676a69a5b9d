// Maybe: optional wrapper around another element type

import { Unspecified, isUnspecified, type Coerced } from '../core/sentinels.js';
import { Container, Element, ElementSchema } from './core.js';
import type { ValidatorLike } from '../validation/validator.js';
import type { TraversalPath, TraversedElement } from '../models/types.js';

function isAbsent(raw: unknown): boolean {
  return raw === null || raw === undefined || isUnspecified(raw);
}

/**
 * Wraps an element so that absent input (`null`, `undefined` or
 * `Unspecified`) is a valid `null` value. Present input is handed to the
 * wrapped element, which keeps the wrapper's path.
 */
export class MaybeElement<T, E extends Element<T> = Element<T>> extends Container<T | null> {
  readonly inner: E;

  constructor(
    typeName: string,
    readonly wrapped: ElementSchema<T, E>,
    validators: readonly ValidatorLike[] = []
  ) {
    super(typeName, validators);
    this.inner = wrapped.create();
  }

  get present(): boolean {
    return !isAbsent(this.rawValue);
  }

  get value(): Coerced<T | null> {
    return this.present ? this.inner.value : null;
  }

  set(raw: unknown): void {
    this.rawValue = raw;
    this.inner.set(isAbsent(raw) ? Unspecified : raw);
  }

  has(key: unknown): boolean {
    return this.inner instanceof Container && this.inner.has(key);
  }

  child(key: unknown): Element | undefined {
    return this.inner instanceof Container ? this.inner.child(key) : undefined;
  }

  *traverse(prefix: TraversalPath = []): Generator<TraversedElement, void, undefined> {
    if (this.present) {
      yield* this.inner.traverse(prefix);
      return;
    }
    yield { path: prefix, element: this };
  }

  protected *childPaths(): Generator<readonly [TraversalPath, Element], void, undefined> {
    if (this.present) {
      yield [[], this.inner];
    }
  }
}

export function Maybe<T, E extends Element<T>>(
  wrapped: ElementSchema<T, E>
): ElementSchema<T | null, MaybeElement<T, E>> {
  const typeName = `Maybe<${wrapped.typeName}>`;
  return new ElementSchema<T | null, MaybeElement<T, E>>(
    typeName,
    (validators) => new MaybeElement(typeName, wrapped, validators)
  );
}
