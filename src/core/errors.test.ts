import { describe, it, expect } from 'vitest';
import {
  DefinitionError,
  EmptyContainerError,
  FormworkError,
  IndexOutOfRangeError,
  InvalidArgumentError,
  KeyNotFoundError,
  describeKey
} from './errors.js';

describe('errors', () => {
  it('should describe missing keys', () => {
    const error = new KeyNotFoundError('missing');
    expect(error).toBeInstanceOf(FormworkError);
    expect(error.message).toBe('Key not found: "missing"');
    expect(error.name).toBe('KeyNotFoundError');
    expect(error.key).toBe('missing');
  });

  it('should serialise to JSON with code and context', () => {
    const error = new IndexOutOfRangeError(3, 2);
    expect(error.toJSON()).toEqual({
      name: 'IndexOutOfRangeError',
      code: 'INDEX_OUT_OF_RANGE',
      message: 'Index 3 out of range for sequence of 2',
      context: { index: 3, size: 2 }
    });
  });

  it('should carry exit codes', () => {
    expect(new EmptyContainerError('Dict<Unicode, Integer>').exitCode).toBe(4);
    expect(new InvalidArgumentError('bad', 'source').exitCode).toBe(2);
    expect(new DefinitionError('bad', ['type: Required']).issues).toEqual(['type: Required']);
  });

  it('should render keys of any type', () => {
    expect(describeKey('a')).toBe('"a"');
    expect(describeKey(1)).toBe('1');
    expect(describeKey(Symbol('k'))).toBe('Symbol(k)');
  });
});
