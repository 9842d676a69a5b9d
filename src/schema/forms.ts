// Form: a mapping with a fixed set of named fields

import {
  NotUnserializable,
  Unspecified,
  isNotUnserializable,
  isUnspecified,
  type Coerced
} from '../core/sentinels.js';
import { Container, Element, ElementSchema, type AnyElementSchema } from './core.js';
import { isPlainObject } from './raw.js';
import type { ValidatorLike } from '../validation/validator.js';
import type { TraversalPath } from '../models/types.js';

export type FormFields = Readonly<Record<string, AnyElementSchema>>;
export type FormValue = Readonly<Record<string, unknown>>;

/**
 * Named fields declared up front. Raw input is a plain object or a `Map`;
 * undeclared keys are ignored and missing ones leave their field
 * `Unspecified`, in the value as well. Field `i`, in declaration order, is
 * addressed by path segment `[i]`.
 */
export class FormElement extends Container<FormValue> {
  private fields = new Map<string, Element>();
  private shape: 'unspecified' | 'unserializable' | 'mapping' = 'unspecified';

  constructor(
    typeName: string,
    readonly schema: FormFields,
    validators: readonly ValidatorLike[] = []
  ) {
    super(typeName, validators);
  }

  get value(): Coerced<FormValue> {
    if (this.shape === 'unspecified') {
      return Unspecified;
    }
    if (this.shape === 'unserializable') {
      return NotUnserializable;
    }
    const result: Record<string, unknown> = {};
    for (const [name, field] of this.fields) {
      const value = field.value;
      if (isNotUnserializable(value)) {
        return NotUnserializable;
      }
      result[name] = value;
    }
    return result;
  }

  get fieldNames(): string[] {
    return Object.keys(this.schema);
  }

  set(raw: unknown): void {
    this.rawValue = raw;
    let lookup: (name: string) => unknown = () => Unspecified;
    if (isUnspecified(raw)) {
      this.shape = 'unspecified';
    } else if (raw instanceof Map) {
      const source = raw;
      this.shape = 'mapping';
      lookup = (name) => (source.has(name) ? source.get(name) : Unspecified);
    } else if (isPlainObject(raw)) {
      const source = raw;
      this.shape = 'mapping';
      lookup = (name) => (Object.prototype.hasOwnProperty.call(source, name) ? source[name] : Unspecified);
    } else {
      this.shape = 'unserializable';
    }
    this.fields = new Map(
      Object.entries(this.schema).map(([name, schema]): [string, Element] => [name, schema.create(lookup(name))])
    );
  }

  has(key: unknown): boolean {
    return typeof key === 'string' && this.fields.has(key);
  }

  child(key: unknown): Element | undefined {
    return typeof key === 'string' ? this.fields.get(key) : undefined;
  }

  field(name: string): Element | undefined {
    return this.fields.get(name);
  }

  protected *childPaths(): Generator<readonly [TraversalPath, Element], void, undefined> {
    let index = 0;
    for (const field of this.fields.values()) {
      yield [[index], field];
      index++;
    }
  }
}

export const Form = {
  of(fields: FormFields): ElementSchema<FormValue, FormElement> {
    const frozen = Object.freeze({ ...fields });
    const typeName = `Form<${Object.keys(frozen).join(', ')}>`;
    return new ElementSchema<FormValue, FormElement>(
      typeName,
      (validators) => new FormElement(typeName, frozen, validators)
    );
  }
};
