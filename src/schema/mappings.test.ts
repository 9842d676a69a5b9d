// Tests for Dict and OrderedDict elements

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Dict, OrderedDict } from './mappings.js';
import { Integer, Unicode } from './scalars.js';
import { List } from './sequences.js';
import type { Element } from './core.js';
import { NotUnserializable, Unspecified, isSentinel, type Coerced } from '../core/sentinels.js';
import {
  EmptyContainerError,
  InvalidArgumentError,
  KeyNotFoundError,
  ReadOnlyValueError
} from '../core/errors.js';
import { Converted, Present, ShorterThan } from '../validation/validators.js';
import type { ValidationContext } from '../models/types.js';

const Scores = Dict.of(Unicode, Integer);
const Ranking = OrderedDict.of(Unicode, Integer);

function keysOf(mapping: { keys(): Iterable<Element> }): unknown[] {
  return [...mapping.keys()].map((key) => key.value);
}

function entriesOf<K, V>(value: Coerced<Map<K, V>>): [K, V][] {
  if (isSentinel(value)) {
    throw new Error('expected a coerced map');
  }
  return [...value.entries()];
}

describe('Dict', () => {
  describe('value', () => {
    it('should be Unspecified without input', () => {
      const scores = Scores.create();
      expect(scores.value).toBe(Unspecified);
      expect(scores.size).toBe(0);
    });

    it('should coerce every key and value', () => {
      const scores = Scores.create({ alice: '3', bob: 4 });
      expect(scores.value).toEqual(new Map([['alice', 3], ['bob', 4]]));
    });

    it('should accept maps and iterables of pairs', () => {
      expect(Scores.create(new Map([['a', 1]])).value).toEqual(new Map([['a', 1]]));
      expect(Scores.create([['a', 1], ['b', '2']]).value).toEqual(new Map([['a', 1], ['b', 2]]));
    });

    it('should be NotUnserializable for input that is not a mapping', () => {
      for (const raw of ['abc', 42, null, [['a']], [1, 2]]) {
        const scores = Scores.create(raw);
        expect(scores.value).toBe(NotUnserializable);
        expect(scores.size).toBe(0);
        expect(scores.rawValue).toBe(raw);
      }
    });

    it('should be NotUnserializable when one value fails coercion', () => {
      const scores = Scores.create({ a: 1, b: 'two', c: 3 });
      expect(scores.value).toBe(NotUnserializable);
      expect(scores.getItem('a').value).toBe(1);
      expect(scores.getItem('b').value).toBe(NotUnserializable);
      expect(scores.getItem('c').value).toBe(3);
    });

    it('should be NotUnserializable when one key fails coercion', () => {
      const Names = Dict.of(Integer, Unicode);
      expect(Names.create({ 1: 'one', x: 'ex' }).value).toBe(NotUnserializable);
      expect(Names.create({ 1: 'one', 2: 'two' }).value).toEqual(new Map([[1, 'one'], [2, 'two']]));
    });

    it('should only accept Unspecified as an assignment', () => {
      const scores = Scores.create({ a: 1 });
      expect(() => {
        scores.value = new Map();
      }).toThrow(ReadOnlyValueError);

      scores.value = Unspecified;
      expect(scores.value).toBe(Unspecified);
      expect(scores.size).toBe(0);
    });

    it('should replace all entries when set again', () => {
      const scores = Scores.create({ a: 1, b: 2 });
      scores.set({ c: 3 });
      expect(keysOf(scores)).toEqual(['c']);
      expect(scores.rawValue).toEqual({ c: 3 });
    });

    it('should render as a plain object', () => {
      expect(Dict.of(Integer, Unicode).create({ 1: 'one' }).toObject()).toEqual({ '1': 'one' });
      expect(Scores.create('nope').toObject()).toBe(NotUnserializable);
    });
  });

  describe('read access', () => {
    it('should return the value element for a key', () => {
      const item = Scores.create({ a: '1' }).getItem('a');
      expect(item.value).toBe(1);
      expect(item.rawValue).toBe('1');
    });

    it('should throw KeyNotFoundError for a missing key', () => {
      expect(() => Scores.create({}).getItem('missing')).toThrow(KeyNotFoundError);
    });

    it('should fall back to a fresh value element in get', () => {
      const scores = Scores.create({ a: 1 });
      expect(scores.get('a').value).toBe(1);
      expect(scores.get('missing').value).toBe(Unspecified);
      expect(scores.get('missing', '5').value).toBe(5);
      expect(scores.has('missing')).toBe(false);
    });

    it('should expose keys, values and items as elements', () => {
      const scores = Scores.create({ a: 1, b: 2 });
      expect(keysOf(scores)).toEqual(['a', 'b']);
      expect([...scores.values()].map((value) => value.value)).toEqual([1, 2]);
      expect([...scores.items()].map(([key, value]) => [key.value, value.value])).toEqual([['a', 1], ['b', 2]]);
      expect([...scores].map((key) => key.value)).toEqual(['a', 'b']);
    });

    it('should expose values as children', () => {
      const scores = Scores.create({ a: 1 });
      expect(scores.child('a')?.value).toBe(1);
      expect(scores.child('b')).toBeUndefined();
    });
  });

  describe('write access', () => {
    it('should replace an existing entry in place', () => {
      const ranking = Ranking.create({ a: 1, b: 2 });
      ranking.setItem('a', 9);
      expect(keysOf(ranking)).toEqual(['a', 'b']);
      expect(ranking.getItem('a').value).toBe(9);
    });

    it('should record coercion failures instead of throwing', () => {
      const scores = Scores.create({});
      expect(() => scores.setItem('x', 'nope')).not.toThrow();
      expect(scores.getItem('x').value).toBe(NotUnserializable);
      expect(scores.value).toBe(NotUnserializable);
    });

    it('should make an unspecified mapping specified', () => {
      const scores = Scores.create();
      scores.setItem('x', '1');
      expect(scores.value).toEqual(new Map([['x', 1]]));
    });

    it('should return the existing value from setdefault', () => {
      const scores = Scores.create({ a: 1 });
      expect(scores.setdefault('a', 5).value).toBe(1);
      expect(scores.setdefault('b', '7').value).toBe(7);
      expect(scores.getItem('b').value).toBe(7);
    });

    it('should keep unspecified entries in the value', () => {
      const scores = Scores.create({ a: 1 });
      expect(scores.setdefault('z').value).toBe(Unspecified);
      expect(scores.has('z')).toBe(true);

      const entries = entriesOf(scores.value);
      expect(entries).toHaveLength(2);
      expect(entries[0]).toEqual(['a', 1]);
      expect(entries[1][0]).toBe('z');
      expect(entries[1][1]).toBe(Unspecified);
    });

    it('should keep an entry stored under an unspecified key', () => {
      const ranking = Ranking.create({});
      ranking.setItem(Unspecified, 1);
      expect(ranking.size).toBe(1);

      const entries = entriesOf(ranking.value);
      expect(entries).toHaveLength(1);
      expect(entries[0][0]).toBe(Unspecified);
      expect(entries[0][1]).toBe(1);
      expect(ranking.toObject()).toEqual({});
    });

    it('should delete entries and return their value', () => {
      const scores = Scores.create({ a: 1 });
      expect(scores.delete('a').value).toBe(1);
      expect(scores.has('a')).toBe(false);
      expect(() => scores.delete('a')).toThrow(KeyNotFoundError);
    });

    it('should pop entries, with or without a fallback', () => {
      const scores = Scores.create({});
      expect(() => scores.pop('missing')).toThrow(KeyNotFoundError);
      expect(scores.pop('missing', 7).value).toBe(7);
      expect(scores.pop('missing', 'x').value).toBe(NotUnserializable);

      scores.setItem('a', 1);
      expect(scores.pop('a').value).toBe(1);
      expect(scores.size).toBe(0);
    });

    it('should popitem until empty', () => {
      const scores = Scores.create({ a: 1 });
      const [key, value] = scores.popitem();
      expect(key.value).toBe('a');
      expect(value.value).toBe(1);
      expect(() => scores.popitem()).toThrow(EmptyContainerError);
    });

    it('should clear entries', () => {
      const scores = Scores.create({ a: 1, b: 2 });
      scores.clear();
      expect(scores.size).toBe(0);
      expect(scores.value).toEqual(new Map());
    });
  });

  describe('update', () => {
    it('should apply a source and named overrides', () => {
      const scores = Scores.create({});
      scores.update({ x: 1 }, { y: 2 });
      expect(scores.value).toEqual(new Map([['x', 1], ['y', 2]]));
    });

    it('should let later entries win', () => {
      const scores = Scores.create({});
      scores.update([['x', 1], ['x', 2]], { x: 3 });
      expect(scores.getItem('x').value).toBe(3);
      expect(scores.size).toBe(1);
    });

    it('should accept maps and no arguments', () => {
      const scores = Scores.create({});
      scores.update(new Map([['a', '4']]));
      scores.update();
      expect(scores.value).toEqual(new Map([['a', 4]]));
    });

    it('should reject more than one positional source', () => {
      const scores = Scores.create({});
      expect(() => scores.update({ x: 1 }, { y: 2 }, { z: 3 })).toThrow(InvalidArgumentError);
      expect(scores.size).toBe(0);
    });
  });

  describe('validate', () => {
    it('should leave isValid undefined until validate runs', () => {
      expect(Scores.create({ a: 1 }).isValid).toBeUndefined();
    });

    it('should combine keys, values and its own validators', () => {
      const Checked = Dict.of(Unicode.validatedBy(new ShorterThan(3)), Integer.validatedBy(new Converted()));

      const ok = Checked.create({ ab: 1 });
      expect(ok.validate()).toBe(true);
      expect(ok.isValid).toBe(true);

      const bad = Checked.create({ abcd: 1, ok: 'x' });
      expect(bad.validate()).toBe(false);
      expect(bad.isValid).toBe(false);
      const [longKey] = bad.keys();
      expect(longKey.errors).toEqual(['Must be shorter than 3.']);
      expect(bad.getItem('abcd').isValid).toBe(true);
      expect(bad.getItem('ok').errors).toEqual(['Not a valid value.']);
    });

    it('should report only its own validators without input', () => {
      expect(Scores.create().validate()).toBe(true);

      const Required = Scores.validatedBy(new Present());
      const missing = Required.create();
      expect(missing.validate()).toBe(false);
      expect(missing.errors).toEqual(['May not be blank.']);
      expect(Required.create({}).validate()).toBe(true);
    });

    it('should recompute validity on every run', () => {
      const scores = Dict.of(Unicode, Integer.validatedBy(new Converted())).create({ a: 'x' });
      expect(scores.validate()).toBe(false);
      scores.setItem('a', 1);
      expect(scores.validate()).toBe(true);
    });

    it('should thread the same context to every validator', () => {
      const seen: ValidationContext[] = [];
      const record = (_element: Element, context: ValidationContext) => {
        seen.push(context);
        return true;
      };
      const Schema = Dict.of(Unicode.validatedBy(record), Integer.validatedBy(record)).validatedBy(record);
      const context = { name: 'scores' };

      Schema.create({ a: 1, b: 2 }).validate(context);
      expect(seen).toHaveLength(5);
      expect(seen.every((item) => item === context)).toBe(true);
    });

    it('should clear errors recursively', () => {
      const scores = Dict.of(Unicode, Integer.validatedBy(new Converted())).create({ a: 'x' });
      scores.validate();
      scores.validate();
      expect(scores.getItem('a').errors).toEqual(['Not a valid value.', 'Not a valid value.']);
      scores.clearErrors();
      expect(scores.getItem('a').errors).toEqual([]);
    });
  });

  describe('traverse', () => {
    it('should address keys at [i, 0] and values at [i, 1]', () => {
      const scores = Scores.create({});
      scores.setItem('a', 1);
      scores.setItem('b', 2);

      const leaves = [...scores.traverse()].map(({ path, element }) => [path, element.value]);
      expect(leaves).toEqual([
        [[0, 0], 'a'],
        [[0, 1], 1],
        [[1, 0], 'b'],
        [[1, 1], 2]
      ]);
    });

    it('should extend a given prefix', () => {
      const paths = [...Scores.create({ a: 1 }).traverse([3])].map(({ path }) => path);
      expect(paths).toEqual([[3, 0, 0], [3, 0, 1]]);
    });

    it('should recurse into nested containers', () => {
      const nested = Dict.of(Unicode, List.of(Integer)).create({ xs: [1, 2] });
      const leaves = [...nested.traverse()].map(({ path, element }) => [path, element.value]);
      expect(leaves).toEqual([
        [[0, 0], 'xs'],
        [[0, 1, 0], 1],
        [[0, 1, 1], 2]
      ]);
    });

    it('should yield nothing for an empty mapping', () => {
      expect([...Scores.create({}).traverse()]).toEqual([]);
    });

    it('should include containers when walking', () => {
      const nested = Dict.of(Unicode, List.of(Integer)).create({ xs: [1] });
      const paths = [...nested.walk()].map(({ path }) => path);
      expect(paths).toEqual([[], [0, 0], [0, 1], [0, 1, 0]]);
    });
  });

  describe('properties', () => {
    const keys = fc.stringMatching(/^[a-z]{1,8}$/);

    it('should reproduce well-formed input', () => {
      fc.assert(
        fc.property(fc.dictionary(keys, fc.integer()), (raw) => {
          expect(Scores.create(raw).value).toEqual(new Map(Object.entries(raw)));
        })
      );
    });

    it('should be NotUnserializable with any single malformed value', () => {
      fc.assert(
        fc.property(fc.dictionary(keys, fc.integer(), { minKeys: 1 }), fc.nat(), (raw, pick) => {
          const names = Object.keys(raw);
          const broken = { ...raw, [names[pick % names.length]]: 'not a number' };
          expect(Scores.create(broken).value).toBe(NotUnserializable);
        })
      );
    });
  });
});

describe('OrderedDict', () => {
  it('should iterate in insertion order', () => {
    const ranking = Ranking.create([['b', 1], ['a', 2]]);
    expect(keysOf(ranking)).toEqual(['b', 'a']);
    expect(entriesOf(ranking.value)).toEqual([['b', 1], ['a', 2]]);
  });

  it('should move re-inserted keys to the end', () => {
    const ranking = Ranking.create([['b', 1], ['a', 2]]);
    ranking.setItem('b', 5);
    expect(keysOf(ranking)).toEqual(['b', 'a']);

    ranking.delete('b');
    ranking.setItem('b', 6);
    expect(keysOf(ranking)).toEqual(['a', 'b']);
  });

  it('should iterate in reverse', () => {
    const ranking = Ranking.create([['x', 1], ['y', 2], ['z', 3]]);
    expect([...ranking.reversed()].map((key) => key.value)).toEqual(['z', 'y', 'x']);
  });

  it('should popitem from either end', () => {
    const ranking = Ranking.create([['x', 1], ['y', 2], ['z', 3]]);

    const [lastKey, lastValue] = ranking.popitem();
    expect([lastKey.value, lastValue.value]).toEqual(['z', 3]);

    const [firstKey, firstValue] = ranking.popitem(false);
    expect([firstKey.value, firstValue.value]).toEqual(['x', 1]);

    expect(keysOf(ranking)).toEqual(['y']);
  });

  it('should throw EmptyContainerError from popitem when empty', () => {
    const ranking = Ranking.create({});
    expect(() => ranking.popitem()).toThrow(EmptyContainerError);
    expect(() => ranking.popitem(false)).toThrow(EmptyContainerError);
  });

  it('should keep the order of the remaining entries on pop', () => {
    const ranking = Ranking.create([['a', 1], ['b', 2], ['c', 3]]);
    expect(ranking.pop('b').value).toBe(2);
    expect(keysOf(ranking)).toEqual(['a', 'c']);
    expect(ranking.pop('b', 0).value).toBe(0);
  });

  it('should traverse in insertion order', () => {
    const ranking = Ranking.create([['b', 2], ['a', 1]]);
    const leaves = [...ranking.traverse()].map(({ path, element }) => [path, element.value]);
    expect(leaves).toEqual([
      [[0, 0], 'b'],
      [[0, 1], 2],
      [[1, 0], 'a'],
      [[1, 1], 1]
    ]);
  });

  it('should keep surviving insertion order through any sequence of writes', () => {
    const operation = fc.tuple(fc.constantFrom('set', 'delete'), fc.constantFrom('a', 'b', 'c', 'd'), fc.integer());
    fc.assert(
      fc.property(fc.array(operation), (operations) => {
        const ranking = Ranking.create({});
        const model = new Map<string, number>();
        for (const [kind, key, value] of operations) {
          if (kind === 'set') {
            ranking.setItem(key, value);
            model.set(key, value);
          } else if (model.has(key)) {
            ranking.delete(key);
            model.delete(key);
          }
        }
        expect(keysOf(ranking)).toEqual([...model.keys()]);
        expect(entriesOf(ranking.value)).toEqual([...model.entries()]);
      })
    );
  });
});
