import { Command, InvalidArgumentError } from 'commander';
import { DialogInvoker } from '../core/invoker.js';
import { resolveConfig } from '../core/config-store.js';
import type { DialogWidget } from '../widgets/base.js';
import type { CommonCliOptions, DialogOptions, DialogOutcome } from '../types/index.js';

/**
 * Options every dialog sub-command shares.
 */
export function withCommonOptions(command: Command): Command {
  return command
    .option('--height <rows>', 'Box height (default: fit the terminal)', parseDimension)
    .option('--width <cols>', 'Box width (default: fit the terminal)', parseDimension)
    .option('--title <text>', 'Title shown on the box border')
    .option('--backtitle <text>', 'Title shown on the screen background')
    .option('--term <name>', 'TERM value for the renderer')
    .option('--yes-button <text>', 'Label of the Yes button')
    .option('--no-button <text>', 'Label of the No button')
    .option('--ok-button <text>', 'Label of the OK button')
    .option('--cancel-button <text>', 'Label of the Cancel button')
    .option('--default-item <tag>', 'Initially highlighted list entry')
    .option('--clear', 'Clear the screen on exit')
    .option('--defaultno', 'Make No the default button')
    .option('--fullbuttons', 'Use full-width buttons')
    .option('--nocancel', 'Hide the Cancel button')
    .option('--notags', 'Hide list tags')
    .option('--scrolltext', 'Force a vertical scrollbar')
    .option('--topleft', 'Put the box in the top-left corner')
    .option('--dry-run', 'Print the renderer command line instead of running it');
}

export function parseDimension(value: string): string {
  if (!/^[1-9]\d*$/.test(value)) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return value;
}

export function parsePercent(value: string): string {
  if (!/^\d+$/.test(value) || Number(value) > 100) {
    throw new InvalidArgumentError('Must be an integer between 0 and 100.');
  }
  return value;
}

export function toDialogOptions(opts: CommonCliOptions): DialogOptions {
  return {
    clear: opts.clear,
    defaultNo: opts.defaultno,
    fullButtons: opts.fullbuttons,
    noCancel: opts.nocancel,
    noTags: opts.notags,
    scrollText: opts.scrolltext,
    topLeft: opts.topleft,
    defaultItem: opts.defaultItem,
    yesButton: opts.yesButton,
    noButton: opts.noButton,
    okButton: opts.okButton,
    cancelButton: opts.cancelButton,
    title: opts.title,
    backTitle: opts.backtitle,
  };
}

export function toGeometry(opts: CommonCliOptions): { height?: number; width?: number } {
  return {
    height: opts.height === undefined ? undefined : Number(opts.height),
    width: opts.width === undefined ? undefined : Number(opts.width),
  };
}

/**
 * Invoker from ~/.wtui/config.json, WTUI_* variables and --term.
 */
export async function createInvoker(opts: CommonCliOptions): Promise<DialogInvoker> {
  const config = await resolveConfig();
  return DialogInvoker.fromConfig({ ...config, ...(opts.term ? { term: opts.term } : {}) });
}

/**
 * The renderer prints its result on stderr so stdout can stay on the
 * terminal; the CLI keeps that contract.
 */
export function writeResult(value: string): void {
  process.stderr.write(value + '\n');
}

export function noop(): void {
  // ESC and cancel are reported through the exit code only
}

/**
 * Show a widget, or print its command line with --dry-run. The process
 * exit code mirrors the renderer's.
 */
export async function runWidget(widget: DialogWidget, opts: CommonCliOptions): Promise<void> {
  if (opts.dryRun) {
    console.log(widget.describe());
    return;
  }
  const outcome = await widget.show();
  setExitCode(outcome);
}

export function setExitCode(outcome: DialogOutcome): void {
  process.exitCode = outcome.code ?? 1;
}
