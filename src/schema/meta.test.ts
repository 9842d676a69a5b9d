import { describe, it, expect } from 'vitest';
import { Maybe } from './meta.js';
import { Dict } from './mappings.js';
import { Integer, Unicode } from './scalars.js';
import { NotUnserializable, Unspecified } from '../core/sentinels.js';
import { Converted } from '../validation/validators.js';

describe('Maybe', () => {
  const Count = Maybe(Integer.validatedBy(new Converted()));

  it('should be null for absent input', () => {
    for (const raw of [null, undefined, Unspecified]) {
      const count = Count.create(raw);
      expect(count.present).toBe(false);
      expect(count.value).toBeNull();
    }
  });

  it('should hand present input to the wrapped element', () => {
    expect(Count.coerce('4')).toBe(4);
    expect(Count.coerce('four')).toBe(NotUnserializable);
  });

  it('should skip wrapped validators when absent', () => {
    expect(Count.create(null).validate()).toBe(true);

    const broken = Count.create('four');
    expect(broken.validate()).toBe(false);
    expect(broken.inner.errors).toEqual(['Not a valid value.']);
  });

  it('should keep its own path for the wrapped element', () => {
    const Scores = Dict.of(Unicode, Maybe(Integer));
    const scores = Scores.create({ a: 1, b: null });
    const leaves = [...scores.traverse()].map(({ path, element }) => [path, element.value]);
    expect(leaves).toEqual([
      [[0, 0], 'a'],
      [[0, 1], 1],
      [[1, 0], 'b'],
      [[1, 1], null]
    ]);
    expect(scores.value).toEqual(new Map([['a', 1], ['b', null]]));
  });

  it('should name the wrapped type', () => {
    expect(Maybe(Unicode).typeName).toBe('Maybe<Unicode>');
  });
});
