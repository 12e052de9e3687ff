// packages/core/src/catalog/field-tree.ts — Path queries over record field trees

import type { FieldNode, FieldValue, Identity } from '../types/catalog.js';
import type { FieldPath } from './paths.js';

export function isFieldNode(value: FieldValue | undefined): value is FieldNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Expand nested arrays; a lone value is a one-item list. */
export function flatten(value: FieldValue): FieldValue[] {
  if (!Array.isArray(value)) return [value];
  return value.flatMap(flatten);
}

/**
 * Return every value reached by `path`, in document order. Arrays are crossed
 * transparently at every step, so a list stored as an array and a single item
 * stored as an object match the same path. Zero matches is an empty array.
 */
export function queryPath(root: FieldNode, path: FieldPath): FieldValue[] {
  let current: FieldValue[] = [root];
  for (const segment of path.split('/')) {
    const next: FieldValue[] = [];
    for (const value of current) {
      for (const item of flatten(value)) {
        if (isFieldNode(item) && segment in item) {
          next.push(item[segment]);
        }
      }
    }
    current = next;
  }
  return current.flatMap(flatten);
}

/** Text content of a leaf, or the `name` of a node. Empty strings count as absent. */
export function textOf(value: FieldValue | undefined): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isFieldNode(value)) return textOf(value.name);
  return undefined;
}

export function firstText(root: FieldNode, path: FieldPath): string | undefined {
  for (const value of queryPath(root, path)) {
    const text = textOf(value);
    if (text !== undefined) return text;
  }
  return undefined;
}

export function numberOf(value: FieldValue | undefined): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number.parseInt(value, 10);
  return undefined;
}

/** Platform flags arrive as booleans or as "true"/"false" strings. */
export function isTrue(value: FieldValue | undefined): boolean {
  return value === true || (typeof value === 'string' && value.trim().toLowerCase() === 'true');
}

export function isFalse(value: FieldValue | undefined): boolean {
  return value === false || (typeof value === 'string' && value.trim().toLowerCase() === 'false');
}

/** A reference node yields an identity only when it carries an integer id. */
export function identityOf(value: FieldValue): Identity | undefined {
  if (!isFieldNode(value)) return undefined;
  const id = numberOf(value.id);
  if (id === undefined) return undefined;
  return { id, name: textOf(value.name) ?? '' };
}
