// Key/value container elements: Dict and OrderedDict

import {
  EmptyContainerError,
  InvalidArgumentError,
  KeyNotFoundError,
  ReadOnlyValueError
} from '../core/errors.js';
import {
  NotUnserializable,
  Unspecified,
  isNotUnserializable,
  isSentinel,
  isUnspecified,
  type Coerced,
  type Projected
} from '../core/sentinels.js';
import { logger } from '../core/logger.js';
import { Container, Element, ElementSchema } from './core.js';
import { isIterable, isPlainObject, plainObjectOf } from './raw.js';
import type { ValidatorLike } from '../validation/validator.js';
import type { TraversalPath } from '../models/types.js';

const log = logger.child({ scope: 'mappings' });

/**
 * One mapping entry. Keys are elements too, so they can fail coercion and
 * validation just like values.
 */
interface Pair<K, V> {
  readonly key: K;
  readonly value: V;
}

/**
 * The key and value element types a mapping is declared over
 */
export interface MemberSchema<KT, VT, K extends Element<KT> = Element<KT>, V extends Element<VT> = Element<VT>> {
  readonly key: ElementSchema<KT, K>;
  readonly value: ElementSchema<VT, V>;
}

export function memberSchema<KT, VT, K extends Element<KT>, V extends Element<VT>>(
  key: ElementSchema<KT, K>,
  value: ElementSchema<VT, V>
): MemberSchema<KT, VT, K, V> {
  return Object.freeze({ key, value });
}

/**
 * Anything `update` accepts as its positional source: a `Map`, a plain
 * object, or an iterable of `[key, value]` pairs.
 */
export type UpdateSource =
  | ReadonlyMap<unknown, unknown>
  | Readonly<Record<string, unknown>>
  | Iterable<readonly [unknown, unknown]>;

/**
 * Named overrides applied after the positional source
 */
export type UpdateOverrides = Readonly<Record<string, unknown>>;

type MappingShape = 'unspecified' | 'unserializable' | 'mapping';

/**
 * Read semantics shared by all mappings.
 *
 * Entries are addressed by the raw key they were stored under (SameValueZero
 * equality, as for `Map`). Iteration yields key elements.
 */
export abstract class Mapping<
  KT,
  VT,
  K extends Element<KT> = Element<KT>,
  V extends Element<VT> = Element<VT>
> extends Container<Map<Projected<KT>, Projected<VT>>> {
  protected readonly entries = new Map<unknown, Pair<K, V>>();

  constructor(
    typeName: string,
    readonly members: MemberSchema<KT, VT, K, V>,
    validators: readonly ValidatorLike[] = []
  ) {
    super(typeName, validators);
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: unknown): boolean {
    return this.entries.has(key);
  }

  /**
   * The value element stored under `key`
   *
   * @throws KeyNotFoundError when there is no such entry
   */
  getItem(key: unknown): V {
    const pair = this.entries.get(key);
    if (!pair) {
      throw new KeyNotFoundError(key);
    }
    return pair.value;
  }

  /**
   * The value element stored under `key`, or a fresh element of the value
   * schema created from `fallback`. Never throws.
   */
  get(key: unknown, fallback: unknown = Unspecified): V {
    return this.entries.get(key)?.value ?? this.members.value.create(fallback);
  }

  child(key: unknown): V | undefined {
    return this.entries.get(key)?.value;
  }

  *keys(): Generator<K, void, undefined> {
    for (const pair of this.entries.values()) {
      yield pair.key;
    }
  }

  *values(): Generator<V, void, undefined> {
    for (const pair of this.entries.values()) {
      yield pair.value;
    }
  }

  *items(): Generator<[K, V], void, undefined> {
    for (const pair of this.entries.values()) {
      yield [pair.key, pair.value];
    }
  }

  [Symbol.iterator](): Generator<K, void, undefined> {
    return this.keys();
  }

  // Entry i: key element at [i, 0], value element at [i, 1]
  protected *childPaths(): Generator<readonly [TraversalPath, Element], void, undefined> {
    let index = 0;
    for (const pair of this.entries.values()) {
      yield [[index, 0], pair.key];
      yield [[index, 1], pair.value];
      index++;
    }
  }
}

/**
 * Write semantics. Every write coerces through the member schema; coercion
 * failures land in the new elements, never in an exception.
 */
export abstract class MutableMapping<
  KT,
  VT,
  K extends Element<KT> = Element<KT>,
  V extends Element<VT> = Element<VT>
> extends Mapping<KT, VT, K, V> {
  protected shape: MappingShape = 'unspecified';

  /**
   * Stores `value` under `key`. An existing entry for the same key is
   * replaced in place.
   */
  setItem(key: unknown, value: unknown): void {
    this.entries.set(key, {
      key: this.members.key.create(key),
      value: this.members.value.create(value)
    });
    this.shape = 'mapping';
  }

  setdefault(key: unknown, fallback: unknown = Unspecified): V {
    const existing = this.entries.get(key);
    if (existing) {
      return existing.value;
    }
    this.setItem(key, fallback);
    return this.getItem(key);
  }

  /**
   * @throws KeyNotFoundError when there is no such entry
   */
  delete(key: unknown): V {
    const pair = this.entries.get(key);
    if (!pair) {
      throw new KeyNotFoundError(key);
    }
    this.entries.delete(key);
    return pair.value;
  }

  /**
   * Removes the entry for `key` and returns its value element. When the key
   * is absent, returns the value schema's coercion of the fallback, or
   * throws `KeyNotFoundError` if none was given.
   */
  pop(key: unknown, ...fallback: [] | [unknown]): V {
    const pair = this.entries.get(key);
    if (pair) {
      this.entries.delete(key);
      return pair.value;
    }
    if (fallback.length === 0) {
      throw new KeyNotFoundError(key);
    }
    return this.members.value.create(fallback[0]);
  }

  /**
   * Removes and returns some entry.
   *
   * @throws EmptyContainerError when there are no entries
   */
  popitem(): [K, V] {
    if (this.entries.size === 0) {
      throw new EmptyContainerError(this.typeName);
    }
    let last: unknown = undefined;
    for (const key of this.entries.keys()) {
      last = key;
    }
    return this.take(last);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Applies every entry of `source`, then every entry of `overrides`, as
   * individual {@link setItem} calls. Later entries win.
   *
   * @throws InvalidArgumentError for more than one positional source or a
   *   malformed pair
   */
  update(source?: UpdateSource, overrides?: UpdateOverrides, ...extra: UpdateSource[]): void {
    if (extra.length > 0) {
      throw new InvalidArgumentError(
        `update expected at most 2 arguments, got ${extra.length + 2}`,
        'source'
      );
    }
    if (overrides !== undefined && !isPlainObject(overrides)) {
      throw new InvalidArgumentError(
        'update expected at most 1 positional source; named overrides must be a plain object',
        'overrides'
      );
    }
    const batches: Iterable<readonly [unknown, unknown]>[] = [];
    if (source !== undefined) {
      batches.push(entriesOf(source));
    }
    if (overrides !== undefined) {
      batches.push(Object.entries(overrides));
    }
    for (const batch of batches) {
      for (const [key, value] of batch) {
        this.setItem(key, value);
      }
    }
  }

  protected take(key: unknown): [K, V] {
    const pair = this.entries.get(key);
    if (!pair) {
      throw new KeyNotFoundError(key);
    }
    this.entries.delete(key);
    return [pair.key, pair.value];
  }
}

function entriesOf(source: UpdateSource): Iterable<readonly [unknown, unknown]> {
  if (source instanceof Map) {
    return source.entries();
  }
  if (isPlainObject(source)) {
    return Object.entries(source);
  }
  if (isIterable(source)) {
    return pairsOf(source);
  }
  throw new InvalidArgumentError(
    'update source must be a mapping or an iterable of key/value pairs',
    'source'
  );
}

function* pairsOf(items: Iterable<unknown>): Generator<readonly [unknown, unknown], void, undefined> {
  let index = 0;
  for (const item of items) {
    if (!Array.isArray(item) || item.length !== 2) {
      throw new InvalidArgumentError(
        `update sequence element #${index} is not a key/value pair`,
        'source'
      );
    }
    yield [item[0], item[1]];
    index++;
  }
}

/**
 * A mapping element with no ordering guarantee.
 *
 * Declare the key and value element types with {@link Dict.of}:
 *
 * ```ts
 * const Scores = Dict.of(Unicode, Integer);
 * const scores = Scores.create({ alice: '3', bob: 4 });
 * scores.value; // Map { 'alice' => 3, 'bob' => 4 }
 * ```
 *
 * Anything that can be read as a mapping is accepted as raw input.
 */
export class DictElement<
  KT,
  VT,
  K extends Element<KT> = Element<KT>,
  V extends Element<VT> = Element<VT>
> extends MutableMapping<KT, VT, K, V> {
  /**
   * Interprets raw input as a map of raw keys to raw values: a `Map`, a
   * plain object or an iterable of `[key, value]` pairs.
   */
  unserialize(raw: unknown): Map<unknown, unknown> | NotUnserializable {
    if (raw instanceof Map) {
      return new Map(raw);
    }
    if (isPlainObject(raw)) {
      return new Map(Object.entries(raw));
    }
    if (!isIterable(raw)) {
      return NotUnserializable;
    }
    const result = new Map<unknown, unknown>();
    for (const item of raw) {
      if (!Array.isArray(item) || item.length !== 2) {
        return NotUnserializable;
      }
      result.set(item[0], item[1]);
    }
    return result;
  }

  /**
   * A fresh map of every key's value to its value's value, or a sentinel.
   * One entry that failed coercion makes the whole mapping
   * `NotUnserializable`. Every stored entry is kept, so a key or value
   * that never received input shows up as `Unspecified`.
   */
  get value(): Coerced<Map<Projected<KT>, Projected<VT>>> {
    if (this.shape === 'unspecified') {
      return Unspecified;
    }
    if (this.shape === 'unserializable') {
      return NotUnserializable;
    }
    const result = new Map<Projected<KT>, Projected<VT>>();
    for (const pair of this.entries.values()) {
      const key = pair.key.value;
      const value = pair.value.value;
      if (isNotUnserializable(key) || isNotUnserializable(value)) {
        return NotUnserializable;
      }
      result.set(key, value);
    }
    return result;
  }

  /**
   * Only `Unspecified` may be assigned; it resets the mapping.
   */
  set value(next: unknown) {
    if (!isUnspecified(next)) {
      throw new ReadOnlyValueError(this.typeName);
    }
    this.set(Unspecified);
  }

  set(raw: unknown): void {
    this.rawValue = raw;
    this.clear();
    this.shape = 'unspecified';
    if (isUnspecified(raw)) {
      return;
    }
    const unserialized = this.unserialize(raw);
    if (isNotUnserializable(unserialized)) {
      this.shape = 'unserializable';
      log.debug('raw value is not a mapping', { type: this.typeName });
      return;
    }
    this.shape = 'mapping';
    this.update(unserialized);
  }

  /**
   * {@link value} as a plain object with stringified keys, for JSON output.
   * `Unspecified` keys are left out and `Unspecified` values become `undefined`.
   */
  toObject(): Coerced<Record<string, unknown>> {
    const value = this.value;
    if (isSentinel(value)) {
      return value;
    }
    return plainObjectOf(value);
  }
}

/**
 * A mapping element that iterates in insertion order. Re-assigning an
 * existing key keeps its position; deleting and re-inserting moves it to the
 * end.
 */
export class OrderedDictElement<
  KT,
  VT,
  K extends Element<KT> = Element<KT>,
  V extends Element<VT> = Element<VT>
> extends DictElement<KT, VT, K, V> {
  *reversed(): Generator<K, void, undefined> {
    const pairs = [...this.entries.values()];
    for (let index = pairs.length - 1; index >= 0; index--) {
      yield pairs[index].key;
    }
  }

  /**
   * Removes the newest entry, or the oldest when `last` is false.
   *
   * @throws EmptyContainerError when there are no entries
   */
  popitem(last = true): [K, V] {
    if (this.entries.size === 0) {
      throw new EmptyContainerError(this.typeName);
    }
    if (last) {
      return super.popitem();
    }
    const first = this.entries.keys().next();
    return this.take(first.value);
  }
}

export const Dict = {
  /**
   * Declares a {@link DictElement} schema over the given key and value
   * element types.
   */
  of<KT, VT, K extends Element<KT>, V extends Element<VT>>(
    key: ElementSchema<KT, K>,
    value: ElementSchema<VT, V>
  ): ElementSchema<Map<Projected<KT>, Projected<VT>>, DictElement<KT, VT, K, V>> {
    const members = memberSchema(key, value);
    const typeName = `Dict<${key.typeName}, ${value.typeName}>`;
    return new ElementSchema<Map<Projected<KT>, Projected<VT>>, DictElement<KT, VT, K, V>>(
      typeName,
      (validators) => new DictElement(typeName, members, validators)
    );
  }
};

export const OrderedDict = {
  /**
   * Declares an {@link OrderedDictElement} schema over the given key and
   * value element types.
   */
  of<KT, VT, K extends Element<KT>, V extends Element<VT>>(
    key: ElementSchema<KT, K>,
    value: ElementSchema<VT, V>
  ): ElementSchema<Map<Projected<KT>, Projected<VT>>, OrderedDictElement<KT, VT, K, V>> {
    const members = memberSchema(key, value);
    const typeName = `OrderedDict<${key.typeName}, ${value.typeName}>`;
    return new ElementSchema<Map<Projected<KT>, Projected<VT>>, OrderedDictElement<KT, VT, K, V>>(
      typeName,
      (validators) => new OrderedDictElement(typeName, members, validators)
    );
  }
};
