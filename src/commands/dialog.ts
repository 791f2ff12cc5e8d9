import { Command } from 'commander';
import { MessageWidget } from '../widgets/message.js';
import { ConfirmWidget } from '../widgets/confirm.js';
import { InfoWidget } from '../widgets/info.js';
import { TextViewerWidget } from '../widgets/text-viewer.js';
import { handleError } from '../utils/errors.js';
import { error } from '../utils/display.js';
import { createInvoker, noop, runWidget, toDialogOptions, toGeometry, withCommonOptions } from './common.js';
import type { CommonCliOptions } from '../types/index.js';

export function registerDialogCommands(program: Command): void {
  withCommonOptions(
    program
      .command('msgbox <text>')
      .description('Show a message with an OK button')
  ).action(async (text: string, opts: CommonCliOptions) => {
    try {
      const widget = new MessageWidget({
        message: text,
        ...toGeometry(opts),
        options: toDialogOptions(opts),
        invoker: await createInvoker(opts),
        onOk: noop,
        onEscape: noop,
      });
      await runWidget(widget, opts);
    } catch (err) {
      handleError(err);
    }
  });

  withCommonOptions(
    program
      .command('yesno <text>')
      .description('Ask a yes/no question (exit 0 = yes, 1 = no)')
  ).action(async (text: string, opts: CommonCliOptions) => {
    try {
      const widget = new ConfirmWidget({
        message: text,
        ...toGeometry(opts),
        options: toDialogOptions(opts),
        invoker: await createInvoker(opts),
        onYes: noop,
        onNo: noop,
        onEscape: noop,
      });
      await runWidget(widget, opts);
    } catch (err) {
      handleError(err);
    }
  });

  withCommonOptions(
    program
      .command('infobox <text>')
      .description('Draw a message and return immediately')
  ).action(async (text: string, opts: CommonCliOptions) => {
    try {
      const widget = new InfoWidget({
        message: text,
        ...toGeometry(opts),
        options: toDialogOptions(opts),
        invoker: await createInvoker(opts),
      });
      await runWidget(widget, opts);
    } catch (err) {
      handleError(err);
    }
  });

  withCommonOptions(
    program
      .command('textbox <file>')
      .description('Display the contents of a file')
  ).action(async (file: string, opts: CommonCliOptions) => {
    try {
      const widget = new TextViewerWidget({
        file,
        ...toGeometry(opts),
        options: toDialogOptions(opts),
        invoker: await createInvoker(opts),
        onOk: noop,
        onFailed: () => {
          error(`Could not display ${file}`);
        },
      });
      await runWidget(widget, opts);
    } catch (err) {
      handleError(err);
    }
  });
}
