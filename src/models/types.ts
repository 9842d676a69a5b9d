// Core type definitions shared by elements, validators and services

import type { Element } from '../schema/core.js';

/**
 * Integer indices locating a node below the root of an element tree.
 *
 * Mapping entries contribute two segments (entry index, then 0 for the key
 * element or 1 for the value element); sequence items and form fields
 * contribute one.
 */
export type TraversalPath = readonly number[];

/**
 * A node yielded by `traverse` or `walk`
 */
export interface TraversedElement {
  readonly path: TraversalPath;
  readonly element: Element;
}

/**
 * Outcome of a single validator call, as reported to observers
 */
export interface ValidatorCall {
  readonly validator: string;
  readonly element: Element;
  readonly result: boolean;
  readonly context: ValidationContext;
}

export type ValidatorObserver = (call: ValidatorCall) => void;

/**
 * Caller-supplied bag threaded unchanged through every validator call
 */
export interface ValidationContext {
  /** Display name of the element under validation, used in diagnostics */
  readonly name?: string;
  /** Invoked after every validator call */
  readonly observer?: ValidatorObserver;
  readonly [key: string]: unknown;
}
