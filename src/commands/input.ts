import { Command } from 'commander';
import { LineInputWidget } from '../widgets/line-input.js';
import { handleError } from '../utils/errors.js';
import { createInvoker, noop, runWidget, toDialogOptions, toGeometry, withCommonOptions, writeResult } from './common.js';
import type { InputCliOptions } from '../types/index.js';

export function registerInputCommand(program: Command): void {
  withCommonOptions(
    program
      .command('inputbox <text>')
      .description('Read a line of text (printed on stderr)')
      .option('-i, --init <text>', 'Initial text')
      .option('-p, --password', 'Mask the typed text')
      .option('--pattern <regex>', 'Re-prompt until the input matches this regular expression')
      .option('--error <text>', 'Message shown when the input does not match --pattern')
  ).action(async (text: string, opts: InputCliOptions) => {
    try {
      const pattern = opts.pattern !== undefined ? new RegExp(opts.pattern) : undefined;
      const widget = new LineInputWidget({
        message: text,
        placeholder: opts.init,
        password: opts.password,
        validator: pattern ? (value) => pattern.test(value) : undefined,
        errorMessage: opts.error,
        ...toGeometry(opts),
        options: toDialogOptions(opts),
        invoker: await createInvoker(opts),
        onSubmit: (value, valid) => {
          if (valid) writeResult(value);
        },
        onCancel: noop,
        onEscape: noop,
      });
      await runWidget(widget, opts);
    } catch (err) {
      handleError(err);
    }
  });
}
