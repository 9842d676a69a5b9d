// Error reports: collects element errors and renders their paths

import { isSentinel, isUnspecified } from '../../core/sentinels.js';
import type { Element } from '../../schema/core.js';
import { Mapping } from '../../schema/mappings.js';
import { FormElement } from '../../schema/forms.js';
import { ListElement, TupleElement } from '../../schema/sequences.js';
import { MaybeElement } from '../../schema/meta.js';
import { toPlain } from '../../schema/raw.js';
import type { TraversalPath } from '../../models/types.js';

/**
 * Errors recorded on one node of the tree
 */
export interface ReportIssue {
  path: TraversalPath;
  label: string;
  errors: string[];
}

export interface ValidationReport {
  valid: boolean;
  /** Coerced value of the root, JSON-friendly; undefined for sentinels */
  value: unknown;
  issues: ReportIssue[];
}

function formatKey(raw: unknown): string {
  if (isUnspecified(raw)) {
    return '?';
  }
  return typeof raw === 'string' ? JSON.stringify(raw) : String(raw);
}

/**
 * Renders a traversal path against the tree it addresses.
 *
 * `$` is the root; `["a"]` the value stored under mapping key "a" and
 * `<key "a">` that key element itself; `[2]` a sequence item; `.email` a
 * form field. Segments that do not resolve are rendered as raw indices.
 */
export function describePath(root: Element, path: TraversalPath): string {
  let label = '$';
  let node: Element | undefined = root;
  let index = 0;

  while (index < path.length && node) {
    if (node instanceof MaybeElement) {
      node = node.inner;
      continue;
    }

    const segment = path[index];

    if (node instanceof Mapping) {
      const entry = [...node.items()][segment];
      const side = path[index + 1];
      if (!entry || (side !== 0 && side !== 1)) {
        break;
      }
      const [key, value] = entry;
      const keyLabel = formatKey(key.rawValue);
      label += side === 0 ? `<key ${keyLabel}>` : `[${keyLabel}]`;
      node = side === 0 ? key : value;
      index += 2;
      continue;
    }

    if (node instanceof FormElement) {
      const name = node.fieldNames[segment];
      if (name === undefined) {
        break;
      }
      label += `.${name}`;
      node = node.field(name);
      index += 1;
      continue;
    }

    if (node instanceof ListElement || node instanceof TupleElement) {
      label += `[${segment}]`;
      node = node.child(segment);
      index += 1;
      continue;
    }

    break;
  }

  for (const segment of path.slice(index)) {
    label += `[${segment}]`;
  }
  return label;
}

/**
 * Collects the errors of every node under `root`. Run `validate` first;
 * a root that was never validated is reported as invalid.
 */
export function buildReport(root: Element): ValidationReport {
  const issues: ReportIssue[] = [];
  for (const { path, element } of root.walk()) {
    if (element.errors.length > 0) {
      issues.push({ path, label: describePath(root, path), errors: [...element.errors] });
    }
  }
  const value = root.value;
  return {
    valid: root.isValid === true,
    value: isSentinel(value) ? undefined : toPlain(value),
    issues
  };
}

/**
 * Human-readable rendering of a report, one line per error
 */
export function formatReport(report: ValidationReport): string {
  if (report.issues.length === 0) {
    return report.valid ? '✓ valid' : '✗ invalid';
  }
  const lines = [report.valid ? '✓ valid' : '✗ invalid'];
  for (const issue of report.issues) {
    for (const error of issue.errors) {
      lines.push(`  ${issue.label}: ${error}`);
    }
  }
  return lines.join('\n');
}
