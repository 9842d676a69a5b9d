// Markers for "no input" and "input that could not be coerced"

const SENTINEL_TAG = '@@formwork/sentinel';

/**
 * No raw input was ever supplied for an element.
 */
export const Unspecified = Object.freeze({ [SENTINEL_TAG]: 'Unspecified' as const });
export type Unspecified = typeof Unspecified;

/**
 * Raw input was supplied but could not be converted into the element's
 * target shape.
 */
export const NotUnserializable = Object.freeze({ [SENTINEL_TAG]: 'NotUnserializable' as const });
export type NotUnserializable = typeof NotUnserializable;

export type Sentinel = Unspecified | NotUnserializable;

/**
 * The value of an element: the coerced value or one of the sentinels.
 */
export type Coerced<T> = T | Sentinel;

/**
 * A child's value as it appears inside its container's value: children that
 * never received input stay `Unspecified`.
 */
export type Projected<T> = T | Unspecified;

function tagOf(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || !(SENTINEL_TAG in value)) {
    return undefined;
  }
  return value[SENTINEL_TAG];
}

export function isUnspecified(value: unknown): value is Unspecified {
  return tagOf(value) === 'Unspecified';
}

export function isNotUnserializable(value: unknown): value is NotUnserializable {
  return tagOf(value) === 'NotUnserializable';
}

export function isSentinel(value: unknown): value is Sentinel {
  return isUnspecified(value) || isNotUnserializable(value);
}

/**
 * Replaces sentinels with `undefined`, for output that leaves the engine.
 */
export function unwrap<T>(value: Coerced<T>): T | undefined {
  return isSentinel(value) ? undefined : value;
}
