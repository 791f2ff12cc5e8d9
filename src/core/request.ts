import { BOX_KINDS } from '../types/index.js';
import type { BoxKind, DialogRequest } from '../types/index.js';
import { UnknownBoxKindError, InvalidGeometryError, DuplicateKeyError } from '../utils/errors.js';

export function isBoxKind(value: string): value is BoxKind {
  return BOX_KINDS.some(kind => kind === value);
}

/**
 * Build an immutable request. Geometry must already be resolved.
 */
export function createRequest(
  box: string,
  text: string,
  height: number,
  width: number,
  trailing: readonly string[] = []
): DialogRequest {
  if (!isBoxKind(box)) throw new UnknownBoxKindError(box);
  if (!Number.isInteger(height) || height <= 0) throw new InvalidGeometryError('height', height);
  if (!Number.isInteger(width) || width <= 0) throw new InvalidGeometryError('width', width);

  return Object.freeze({
    box,
    text,
    height,
    width,
    trailing: Object.freeze([...trailing]),
  });
}

/**
 * Throws on the first key that appears twice.
 */
export function assertUniqueKeys(items: ReadonlyArray<{ key: string }>): void {
  const seen = new Set<string>();
  for (const { key } of items) {
    if (seen.has(key)) throw new DuplicateKeyError(key);
    seen.add(key);
  }
}
