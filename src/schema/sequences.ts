// Sequence elements: homogeneous lists and fixed-arity tuples

import { IndexOutOfRangeError } from '../core/errors.js';
import {
  NotUnserializable,
  Unspecified,
  isNotUnserializable,
  isUnspecified,
  type Coerced,
  type Projected
} from '../core/sentinels.js';
import { Container, Element, ElementSchema, type AnyElementSchema } from './core.js';
import { isIterable, isPlainObject } from './raw.js';
import type { ValidatorLike } from '../validation/validator.js';
import type { TraversalPath } from '../models/types.js';

type SequenceShape = 'unspecified' | 'unserializable' | 'sequence';

/**
 * Raw items of array-like input. Strings and plain objects are not
 * sequences.
 */
function itemsOf(raw: unknown): unknown[] | NotUnserializable {
  if (Array.isArray(raw)) {
    return [...raw];
  }
  if (typeof raw === 'string' || isPlainObject(raw) || !isIterable(raw)) {
    return NotUnserializable;
  }
  return [...raw];
}

/**
 * Collects child values, or a sentinel when the sequence as a whole has
 * none. Children that are `Unspecified` keep their position.
 */
function collect<T>(shape: SequenceShape, children: readonly Element<T>[]): Coerced<Projected<T>[]> {
  if (shape === 'unspecified') {
    return Unspecified;
  }
  if (shape === 'unserializable') {
    return NotUnserializable;
  }
  const result: Projected<T>[] = [];
  for (const child of children) {
    const value = child.value;
    if (isNotUnserializable(value)) {
      return NotUnserializable;
    }
    result.push(value);
  }
  return result;
}

/**
 * A homogeneous, growable sequence. Item `i` is addressed by path
 * segment `[i]`.
 */
export class ListElement<T, E extends Element<T> = Element<T>> extends Container<Projected<T>[]> {
  private items: E[] = [];
  private shape: SequenceShape = 'unspecified';

  constructor(
    typeName: string,
    readonly member: ElementSchema<T, E>,
    validators: readonly ValidatorLike[] = []
  ) {
    super(typeName, validators);
  }

  get value(): Coerced<Projected<T>[]> {
    return collect(this.shape, this.items);
  }

  get size(): number {
    return this.items.length;
  }

  set(raw: unknown): void {
    this.rawValue = raw;
    this.items = [];
    this.shape = 'unspecified';
    if (isUnspecified(raw)) {
      return;
    }
    const items = itemsOf(raw);
    if (isNotUnserializable(items)) {
      this.shape = 'unserializable';
      return;
    }
    this.extend(items);
  }

  has(key: unknown): boolean {
    return typeof key === 'number' && Number.isInteger(key) && key >= 0 && key < this.items.length;
  }

  child(key: unknown): E | undefined {
    return this.has(key) ? this.items[Number(key)] : undefined;
  }

  /**
   * @throws IndexOutOfRangeError
   */
  at(index: number): E {
    const item = this.child(index);
    if (!item) {
      throw new IndexOutOfRangeError(index, this.items.length);
    }
    return item;
  }

  append(raw: unknown): E {
    const item = this.member.create(raw);
    this.items.push(item);
    this.shape = 'sequence';
    return item;
  }

  extend(raws: Iterable<unknown>): void {
    for (const raw of raws) {
      this.append(raw);
    }
    this.shape = 'sequence';
  }

  /**
   * @throws IndexOutOfRangeError
   */
  setItem(index: number, raw: unknown): E {
    this.at(index);
    const item = this.member.create(raw);
    this.items[index] = item;
    return item;
  }

  /**
   * @throws IndexOutOfRangeError
   */
  delete(index: number): E {
    const item = this.at(index);
    this.items.splice(index, 1);
    return item;
  }

  clear(): void {
    this.items = [];
  }

  [Symbol.iterator](): IterableIterator<E> {
    return this.items[Symbol.iterator]();
  }

  protected *childPaths(): Generator<readonly [TraversalPath, Element], void, undefined> {
    for (let index = 0; index < this.items.length; index++) {
      yield [[index], this.items[index]];
    }
  }
}

/**
 * A fixed-arity sequence with one element type per position. Input of the
 * wrong length is `NotUnserializable`; the positions are still present (as
 * `Unspecified` elements) so they can be traversed.
 */
export class TupleElement extends Container<unknown[]> {
  private items: Element[] = [];
  private shape: SequenceShape = 'unspecified';

  constructor(
    typeName: string,
    readonly members: readonly AnyElementSchema[],
    validators: readonly ValidatorLike[] = []
  ) {
    super(typeName, validators);
  }

  get value(): Coerced<unknown[]> {
    return collect(this.shape, this.items);
  }

  get size(): number {
    return this.members.length;
  }

  set(raw: unknown): void {
    this.rawValue = raw;
    this.shape = 'unspecified';
    let items: unknown[] | NotUnserializable = [];
    if (!isUnspecified(raw)) {
      items = itemsOf(raw);
      if (isNotUnserializable(items) || items.length !== this.members.length) {
        this.shape = 'unserializable';
        items = [];
      } else {
        this.shape = 'sequence';
      }
    }
    const rawItems = items;
    this.items = this.members.map((schema, index) =>
      schema.create(index < rawItems.length ? rawItems[index] : Unspecified)
    );
  }

  has(key: unknown): boolean {
    return typeof key === 'number' && Number.isInteger(key) && key >= 0 && key < this.items.length;
  }

  child(key: unknown): Element | undefined {
    return this.has(key) ? this.items[Number(key)] : undefined;
  }

  [Symbol.iterator](): IterableIterator<Element> {
    return this.items[Symbol.iterator]();
  }

  protected *childPaths(): Generator<readonly [TraversalPath, Element], void, undefined> {
    for (let index = 0; index < this.items.length; index++) {
      yield [[index], this.items[index]];
    }
  }
}

export const List = {
  of<T, E extends Element<T>>(member: ElementSchema<T, E>): ElementSchema<Projected<T>[], ListElement<T, E>> {
    const typeName = `List<${member.typeName}>`;
    return new ElementSchema<Projected<T>[], ListElement<T, E>>(
      typeName,
      (validators) => new ListElement(typeName, member, validators)
    );
  }
};

export const Tuple = {
  of(...members: AnyElementSchema[]): ElementSchema<unknown[], TupleElement> {
    const frozen = Object.freeze([...members]);
    const typeName = `Tuple<${frozen.map((member) => member.typeName).join(', ')}>`;
    return new ElementSchema<unknown[], TupleElement>(
      typeName,
      (validators) => new TupleElement(typeName, frozen, validators)
    );
  }
};
