import type { DialogOptions } from '../types/index.js';

type FlagOption = 'clear' | 'defaultNo' | 'fullButtons' | 'noCancel' | 'noItem' | 'noTags'
  | 'separateOutput' | 'scrollText' | 'topLeft';

type ValueOption = 'defaultItem' | 'yesButton' | 'noButton' | 'okButton' | 'cancelButton'
  | 'title' | 'backTitle';

// Emission order is part of the command-line contract.
const FLAGS: ReadonlyArray<readonly [FlagOption, string]> = [
  ['clear', '--clear'],
  ['defaultNo', '--defaultno'],
  ['fullButtons', '--fullbuttons'],
  ['noCancel', '--nocancel'],
  ['noItem', '--noitem'],
  ['noTags', '--notags'],
  ['separateOutput', '--separate-output'],
  ['scrollText', '--scrolltext'],
  ['topLeft', '--topleft'],
];

const VALUES: ReadonlyArray<readonly [ValueOption, string]> = [
  ['defaultItem', '--default-item'],
  ['yesButton', '--yes-button'],
  ['noButton', '--no-button'],
  ['okButton', '--ok-button'],
  ['cancelButton', '--cancel-button'],
  ['title', '--title'],
  ['backTitle', '--backtitle'],
];

/**
 * Map common dialog options to whiptail flags: set booleans first, then
 * value-bearing options with their values passed through verbatim.
 */
export function buildOptionArgs(options: DialogOptions): string[] {
  const args: string[] = [];
  for (const [key, flag] of FLAGS) {
    if (options[key] === true) args.push(flag);
  }
  for (const [key, flag] of VALUES) {
    const value = options[key];
    if (value !== undefined) args.push(flag, value);
  }
  return args;
}

/**
 * Snapshot options into a frozen value so later mutation of the caller's
 * object cannot change a widget's command line.
 */
export function freezeOptions(options: DialogOptions = {}): Readonly<DialogOptions> {
  return Object.freeze({ ...options });
}
