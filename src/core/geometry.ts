import { InvalidGeometryError } from '../utils/errors.js';
import type { TerminalSize } from '../types/index.js';

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };
const MARGIN = 2;
const STEP = 5;
const LIST_CHROME_ROWS = 10;

export type TerminalSizeProvider = () => TerminalSize;

/**
 * Current terminal size, 80x24 when stdout is not a TTY.
 */
export const getTerminalSize: TerminalSizeProvider = () => ({
  columns: process.stdout.columns || FALLBACK_SIZE.columns,
  rows: process.stdout.rows || FALLBACK_SIZE.rows,
});

function fitToTerminal(extent: number): number {
  const available = extent - MARGIN;
  return available - (available % STEP);
}

export function defaultHeight(size: TerminalSize): number {
  return fitToTerminal(size.rows);
}

export function defaultWidth(size: TerminalSize): number {
  return fitToTerminal(size.columns);
}

function checkPositive(dimension: 'height' | 'width' | 'list height', value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidGeometryError(dimension, value);
  }
  return value;
}

/**
 * Fill in unspecified dimensions from the terminal size.
 */
export function resolveGeometry(
  height: number | undefined,
  width: number | undefined,
  size: TerminalSizeProvider = getTerminalSize
): { height: number; width: number } {
  const needsTerminal = height === undefined || width === undefined;
  const terminal = needsTerminal ? size() : FALLBACK_SIZE;
  return {
    height: checkPositive('height', height ?? defaultHeight(terminal)),
    width: checkPositive('width', width ?? defaultWidth(terminal)),
  };
}

/**
 * List rows inside a menu-style box: whatever the box chrome leaves, at least one.
 */
export function defaultListHeight(boxHeight: number): number {
  return Math.max(1, boxHeight - LIST_CHROME_ROWS);
}

export function resolveListHeight(listHeight: number | undefined, boxHeight: number): number {
  return checkPositive('list height', listHeight ?? defaultListHeight(boxHeight));
}
