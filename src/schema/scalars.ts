// Scalar elements: booleans, numbers, text and binary data

import { NotUnserializable, Unspecified, isUnspecified, type Coerced } from '../core/sentinels.js';
import { logger } from '../core/logger.js';
import { Element, ElementSchema } from './core.js';

const log = logger.child({ scope: 'scalars' });

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * A leaf element whose value is computed from its raw input once, on `set`.
 */
export abstract class ScalarElement<T> extends Element<T> {
  private coerced: Coerced<T> = Unspecified;

  get value(): Coerced<T> {
    return this.coerced;
  }

  set(raw: unknown): void {
    this.rawValue = raw;
    if (isUnspecified(raw)) {
      this.coerced = Unspecified;
      return;
    }
    this.coerced = this.unserialize(raw);
    if (this.coerced === NotUnserializable) {
      log.debug('raw value not coercible', { type: this.typeName, raw: describeRaw(raw) });
    }
  }

  /**
   * Converts raw input into the element's value type
   */
  abstract unserialize(raw: unknown): T | NotUnserializable;
}

export class BooleanElement extends ScalarElement<boolean> {
  unserialize(raw: unknown): boolean | NotUnserializable {
    if (typeof raw === 'boolean') {
      return raw;
    }
    if (typeof raw === 'string') {
      const normalized = raw.trim().toLowerCase();
      if (normalized === 'true') return true;
      if (normalized === 'false') return false;
    }
    return NotUnserializable;
  }
}

export class IntegerElement extends ScalarElement<number> {
  unserialize(raw: unknown): number | NotUnserializable {
    if (typeof raw === 'number') {
      return Number.isSafeInteger(raw) ? raw : NotUnserializable;
    }
    if (typeof raw === 'string' && INTEGER_PATTERN.test(raw.trim())) {
      const parsed = Number.parseInt(raw.trim(), 10);
      return Number.isSafeInteger(parsed) ? parsed : NotUnserializable;
    }
    return NotUnserializable;
  }
}

export class FloatElement extends ScalarElement<number> {
  unserialize(raw: unknown): number | NotUnserializable {
    if (typeof raw === 'number') {
      return Number.isFinite(raw) ? raw : NotUnserializable;
    }
    if (typeof raw === 'string' && raw.trim() !== '') {
      const parsed = Number(raw);
      return Number.isFinite(parsed) ? parsed : NotUnserializable;
    }
    return NotUnserializable;
  }
}

export class UnicodeElement extends ScalarElement<string> {
  unserialize(raw: unknown): string | NotUnserializable {
    return typeof raw === 'string' ? raw : NotUnserializable;
  }
}

export class BytesElement extends ScalarElement<Uint8Array> {
  unserialize(raw: unknown): Uint8Array | NotUnserializable {
    if (raw instanceof Uint8Array) {
      return raw;
    }
    if (typeof raw === 'string') {
      return new TextEncoder().encode(raw);
    }
    return NotUnserializable;
  }
}

export const Bool = new ElementSchema<boolean, BooleanElement>('Boolean', (validators) => new BooleanElement('Boolean', validators));
export const Integer = new ElementSchema<number, IntegerElement>('Integer', (validators) => new IntegerElement('Integer', validators));
export const Float = new ElementSchema<number, FloatElement>('Float', (validators) => new FloatElement('Float', validators));
export const Unicode = new ElementSchema<string, UnicodeElement>('Unicode', (validators) => new UnicodeElement('Unicode', validators));
export const Bytes = new ElementSchema<Uint8Array, BytesElement>('Bytes', (validators) => new BytesElement('Bytes', validators));

function describeRaw(raw: unknown): string {
  if (typeof raw === 'string') return JSON.stringify(raw);
  if (raw === null) return 'null';
  if (typeof raw === 'object') return raw.constructor?.name ?? 'object';
  return String(raw);
}
