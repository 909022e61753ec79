/**
 * Structure filter: derives trimmed copies of a document tree for output.
 *
 * Both operations return a new JSON tree and never touch their input.
 */

import type { DocumentNode } from './nodes';

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/**
 * Copy the tree with every key in `exclude` removed from every node at every
 * depth, list items included.
 */
export function filterProperties(tree: DocumentNode | JsonObject, exclude: Iterable<string>): JsonObject {
  const excluded = new Set(exclude);
  return toObject(copyValue(tree, (key) => !excluded.has(key)));
}

/**
 * Copy the tree dropping the `elements` key wherever it holds an empty array.
 */
export function filterEmptyElements(tree: DocumentNode | JsonObject): JsonObject {
  return toObject(
    copyValue(tree, (key, value) => !(key === 'elements' && Array.isArray(value) && value.length === 0)),
  );
}

/**
 * The persisted form of a structure tree: empty `elements` dropped, then the
 * requested properties removed.
 */
export function prepareStructureForOutput(tree: DocumentNode, omitProperties: readonly string[] = []): JsonObject {
  const compact = filterEmptyElements(tree);
  return omitProperties.length > 0 ? filterProperties(compact, omitProperties) : compact;
}

/**
 * Parse a comma-separated property list such as "items, size".
 */
export function parsePropertyList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

// ── Helpers ──────────────────────────────────────────────────────────────────

type KeepKey = (key: string, value: unknown) => boolean;

function copyValue(value: unknown, keep: KeepKey): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => copyValue(item, keep));
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
      if (child === undefined || !keep(key, child)) continue;
      result[key] = copyValue(child, keep);
    }
    return result;
  }
  throw new Error(`Cannot copy non-JSON value of type ${typeof value}`);
}

function toObject(value: JsonValue): JsonObject {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error('Structure tree must be a JSON object');
  }
  return value;
}
