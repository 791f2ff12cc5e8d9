import { Command } from 'commander';
import { MenuWidget } from '../widgets/menu.js';
import { ChecklistWidget, RadiolistWidget } from '../widgets/select-list.js';
import { handleError } from '../utils/errors.js';
import { createInvoker, noop, parseDimension, runWidget, toDialogOptions, toGeometry, withCommonOptions, writeResult } from './common.js';
import type { ListCliOptions, SelectItem } from '../types/index.js';

/**
 * `key=description`, optionally suffixed with `:on` to preselect the entry.
 * A bare word is used as both key and description.
 */
export function parseItemArg(arg: string): SelectItem {
  const eq = arg.indexOf('=');
  const key = eq === -1 ? arg : arg.slice(0, eq);
  let description = eq === -1 ? arg : arg.slice(eq + 1);
  let selected = false;
  if (/:on$/i.test(description)) {
    description = description.slice(0, -3);
    selected = true;
  }
  return { key, description, selected };
}

function withListOptions(command: Command): Command {
  return withCommonOptions(command)
    .option('--list-height <rows>', 'Visible list rows', parseDimension)
    .option('--prefix <text>', 'Prefix for every description');
}

function listHeightOf(opts: ListCliOptions): number | undefined {
  return opts.listHeight === undefined ? undefined : Number(opts.listHeight);
}

export function registerListCommands(program: Command): void {
  withListOptions(
    program
      .command('menu <text> <items...>')
      .description('Pick one entry; the selected key is printed on stderr')
  ).action(async (text: string, entries: string[], opts: ListCliOptions) => {
    try {
      const widget = new MenuWidget<string>({
        message: text,
        items: entries.map(parseItemArg).map(({ key, description }) => ({
          key,
          description,
          payload: key,
          onSelected: writeResult,
        })),
        listHeight: listHeightOf(opts),
        prefix: opts.prefix,
        ...toGeometry(opts),
        options: toDialogOptions(opts),
        invoker: await createInvoker(opts),
        onCancel: noop,
        onEscape: noop,
      });
      await runWidget(widget, opts);
    } catch (err) {
      handleError(err);
    }
  });

  withListOptions(
    program
      .command('checklist <text> <items...>')
      .description('Pick any number of entries; selected keys are printed one per line')
      .option('--separate-output', 'Ask the renderer for one key per line')
  ).action(async (text: string, entries: string[], opts: ListCliOptions) => {
    try {
      const widget = new ChecklistWidget({
        message: text,
        items: entries.map(parseItemArg),
        listHeight: listHeightOf(opts),
        prefix: opts.prefix,
        ...toGeometry(opts),
        options: { ...toDialogOptions(opts), separateOutput: opts.separateOutput },
        invoker: await createInvoker(opts),
        onSubmit: (keys) => {
          for (const key of keys) writeResult(key);
        },
        onCancel: noop,
        onEscape: noop,
      });
      await runWidget(widget, opts);
    } catch (err) {
      handleError(err);
    }
  });

  withListOptions(
    program
      .command('radiolist <text> <items...>')
      .description('Pick exactly one entry; the selected key is printed on stderr')
  ).action(async (text: string, entries: string[], opts: ListCliOptions) => {
    try {
      const widget = new RadiolistWidget({
        message: text,
        items: entries.map(parseItemArg),
        listHeight: listHeightOf(opts),
        prefix: opts.prefix,
        ...toGeometry(opts),
        options: toDialogOptions(opts),
        invoker: await createInvoker(opts),
        onSubmit: writeResult,
        onCancel: noop,
        onEscape: noop,
      });
      await runWidget(widget, opts);
    } catch (err) {
      handleError(err);
    }
  });
}
