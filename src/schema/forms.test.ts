import { describe, it, expect } from 'vitest';
import { Form } from './forms.js';
import { Integer, Unicode } from './scalars.js';
import { NotUnserializable, Unspecified, isSentinel } from '../core/sentinels.js';
import { AttributesEqual, Present } from '../validation/validators.js';

const Signup = Form.of({ email: Unicode, age: Integer });

describe('Form', () => {
  it('should coerce declared fields and ignore the rest', () => {
    const signup = Signup.create({ email: 'a@example.com', age: '30', extra: true });
    expect(signup.value).toEqual({ email: 'a@example.com', age: 30 });
    expect(signup.has('extra')).toBe(false);
  });

  it('should leave missing fields Unspecified', () => {
    const signup = Signup.create(new Map([['age', 5]]));
    expect(signup.field('email')?.value).toBe(Unspecified);
    const value = signup.value;
    expect(isSentinel(value)).toBe(false);
    if (!isSentinel(value)) {
      expect(Object.keys(value)).toEqual(['email', 'age']);
      expect(value.email).toBe(Unspecified);
      expect(value.age).toBe(5);
    }
  });

  it('should be NotUnserializable for non-mapping input or a failed field', () => {
    expect(Signup.coerce(['a@example.com', 30])).toBe(NotUnserializable);
    expect(Signup.coerce({ email: 'a@example.com', age: 'old' })).toBe(NotUnserializable);
  });

  it('should create every field even without input', () => {
    const signup = Signup.create();
    expect(signup.value).toBe(Unspecified);
    expect(signup.fieldNames).toEqual(['email', 'age']);
    expect(signup.child('age')?.value).toBe(Unspecified);
  });

  it('should address fields in declaration order', () => {
    const leaves = [...Signup.create({ age: 1, email: 'x' }).traverse()].map(({ path, element }) => [
      path,
      element.value
    ]);
    expect(leaves).toEqual([
      [[0], 'x'],
      [[1], 1]
    ]);
  });

  it('should validate fields and then itself', () => {
    const Passwords = Form.of({
      password: Unicode.validatedBy(new Present()),
      confirm: Unicode
    }).validatedBy(new AttributesEqual(['password', 'password'], ['confirmation', 'confirm']));

    const mismatch = Passwords.create({ password: 'test-secret', confirm: 'other' });
    expect(mismatch.validate()).toBe(false);
    expect(mismatch.errors).toEqual(['password and confirmation must be equal.']);

    const missing = Passwords.create({});
    expect(missing.validate()).toBe(false);
    expect(missing.field('password')?.errors).toEqual(['May not be blank.']);

    expect(Passwords.create({ password: 'test-secret', confirm: 'test-secret' }).validate()).toBe(true);
  });

  it('should name its fields', () => {
    expect(Signup.typeName).toBe('Form<email, age>');
  });
});
