import { describe, it, expect } from 'vitest';
import { createRequest, assertUniqueKeys, isBoxKind } from '../src/core/request.js';
import { parseQuotedTags, parseSeparatedTags } from '../src/core/payload.js';
import { resolveGeometry, defaultListHeight, resolveListHeight } from '../src/core/geometry.js';
import { DuplicateKeyError, InvalidGeometryError, UnknownBoxKindError } from '../src/utils/errors.js';

describe('createRequest', () => {
  it('builds a frozen request', () => {
    const request = createRequest('menu', 'text', 20, 60, ['5', 'a', 'A']);
    expect(request).toEqual({ box: 'menu', text: 'text', height: 20, width: 60, trailing: ['5', 'a', 'A'] });
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.trailing)).toBe(true);
  });

  it('rejects unknown box kinds', () => {
    expect(() => createRequest('combobox', 'text', 10, 40)).toThrow(UnknownBoxKindError);
    expect(isBoxKind('gauge')).toBe(true);
    expect(isBoxKind('form')).toBe(false);
  });

  it('rejects non-positive geometry', () => {
    expect(() => createRequest('msgbox', 'text', 0, 40)).toThrow(InvalidGeometryError);
    expect(() => createRequest('msgbox', 'text', 10, 2.5)).toThrow(InvalidGeometryError);
  });
});

describe('assertUniqueKeys', () => {
  it('accepts distinct keys', () => {
    expect(() => assertUniqueKeys([{ key: 'a' }, { key: 'b' }])).not.toThrow();
  });

  it('rejects a repeated key', () => {
    expect(() => assertUniqueKeys([{ key: 'a' }, { key: 'a' }])).toThrow(DuplicateKeyError);
  });
});

describe('parseQuotedTags', () => {
  it('extracts quoted tags in order', () => {
    expect(parseQuotedTags('"item1" "item3"')).toEqual(['item1', 'item3']);
  });

  it('returns nothing when there are no quoted segments', () => {
    expect(parseQuotedTags('')).toEqual([]);
    expect(parseQuotedTags('item1 item3')).toEqual([]);
  });

  it('keeps spaces inside quotes', () => {
    expect(parseQuotedTags('"two words" "x"')).toEqual(['two words', 'x']);
  });
});

describe('parseSeparatedTags', () => {
  it('splits one tag per line and drops blank lines', () => {
    expect(parseSeparatedTags('item1\nitem3\n')).toEqual(['item1', 'item3']);
    expect(parseSeparatedTags('')).toEqual([]);
  });
});

describe('geometry', () => {
  it('derives size from the terminal with a margin, rounded down to a multiple of 5', () => {
    expect(resolveGeometry(undefined, undefined, () => ({ columns: 80, rows: 24 }))).toEqual({ height: 20, width: 75 });
    expect(resolveGeometry(undefined, undefined, () => ({ columns: 132, rows: 43 }))).toEqual({ height: 40, width: 130 });
  });

  it('keeps explicit dimensions', () => {
    expect(resolveGeometry(12, undefined, () => ({ columns: 101, rows: 50 }))).toEqual({ height: 12, width: 95 });
  });

  it('rejects a terminal too small to fit a box', () => {
    expect(() => resolveGeometry(undefined, 40, () => ({ columns: 80, rows: 6 }))).toThrow(InvalidGeometryError);
  });

  it('leaves ten rows of chrome around a list', () => {
    expect(defaultListHeight(20)).toBe(10);
    expect(defaultListHeight(8)).toBe(1);
    expect(resolveListHeight(3, 20)).toBe(3);
  });
});
