import { Command } from 'commander';
import * as readline from 'node:readline';
import { GaugeWidget } from '../widgets/gauge.js';
import { handleError } from '../utils/errors.js';
import { debug } from '../utils/display.js';
import { createInvoker, parsePercent, setExitCode, toDialogOptions, toGeometry, withCommonOptions } from './common.js';
import type { GaugeCliOptions } from '../types/index.js';

export function registerGaugeCommand(program: Command): void {
  withCommonOptions(
    program
      .command('gauge <text>')
      .description('Show a progress bar fed by integer percent lines on stdin')
      .option('--percent <n>', 'Initial percent', parsePercent, '0')
  ).action(async (text: string, opts: GaugeCliOptions) => {
    try {
      const widget = new GaugeWidget({
        message: text,
        percent: Number(opts.percent ?? '0'),
        ...toGeometry(opts),
        options: toDialogOptions(opts),
        invoker: await createInvoker(opts),
      });

      if (opts.dryRun) {
        console.log(widget.describe());
        return;
      }

      const session = widget.listen();
      const rl = readline.createInterface({ input: process.stdin, terminal: false });
      const stopReading = () => rl.close();
      void session.done.then(stopReading, stopReading);

      for await (const line of rl) {
        if (!session.isRunning) break;
        const trimmed = line.trim();
        if (!/^\d+$/.test(trimmed) || Number(trimmed) > 100) {
          debug(`gauge: ignoring input line ${JSON.stringify(line)}`);
          continue;
        }
        try {
          await session.updatePercent(Number(trimmed));
        } catch (err) {
          // A write racing the renderer's exit; `done` carries the real outcome.
          if (session.isRunning) throw err;
          break;
        }
      }
      await session.terminate();
      setExitCode(await session.done);
    } catch (err) {
      handleError(err);
    }
  });
}
