import { Command } from 'commander';
import { setTimeout as sleep } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import { DialogInvoker } from '../core/invoker.js';
import { MessageWidget } from '../widgets/message.js';
import { ConfirmWidget } from '../widgets/confirm.js';
import { InfoWidget } from '../widgets/info.js';
import { TextViewerWidget } from '../widgets/text-viewer.js';
import { MenuWidget } from '../widgets/menu.js';
import { ChecklistWidget, RadiolistWidget } from '../widgets/select-list.js';
import { LineInputWidget } from '../widgets/line-input.js';
import { FormWidget } from '../widgets/form.js';
import { GaugeWidget } from '../widgets/gauge.js';
import { handleError } from '../utils/errors.js';
import { info, warn, success } from '../utils/display.js';
import { createInvoker } from './common.js';

export function isIPv4(text: string): boolean {
  const match = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/.exec(text);
  if (!match) return false;
  return match.slice(1).every(octet => Number(octet) <= 255);
}

const SAMPLE_ITEMS = [
  { key: 'item1', description: 'description1' },
  { key: 'item2', description: 'description2' },
  { key: 'item3', description: 'description3' },
];

async function runDemo(invoker: DialogInvoker, stepDelayMs: number): Promise<void> {
  const size = { height: 10, width: 40, invoker };
  const listSize = { height: 20, width: 40, invoker };

  await new MessageWidget({ message: 'message box content', ...size, onOk: () => info('ok pushed') }).show();

  await new ConfirmWidget({
    message: 'choose yes or no',
    ...size,
    options: { yesButton: 'Sure', noButton: 'Nope', defaultNo: true },
    onYes: () => info('you chose yes'),
    onNo: () => info('you chose no'),
  }).show();

  await new InfoWidget({ message: 'info box content', ...size }).show();

  await new TextViewerWidget({
    file: fileURLToPath(import.meta.url),
    ...size,
    onOk: () => info('ok pushed'),
    onFailed: () => warn('open file failed'),
  }).show();

  await new MenuWidget({
    message: 'menu box message',
    ...listSize,
    prefix: '-',
    items: SAMPLE_ITEMS.map(item => ({
      ...item,
      payload: { text: 'hello world' },
      onSelected: (payload: { text: string }) => info(`selected ${item.key}: ${payload.text}`),
    })),
    onCancel: () => info('menu canceled'),
  }).show();

  await new ChecklistWidget({
    message: 'check list',
    ...listSize,
    prefix: '-',
    items: SAMPLE_ITEMS,
    onSubmit: (keys) => info(`checklist selected: ${keys.join(', ') || '(none)'}`),
    onCancel: () => info('checklist canceled'),
  }).show();

  await new RadiolistWidget({
    message: 'radio list',
    ...listSize,
    prefix: '-',
    items: SAMPLE_ITEMS.map((item, i) => ({ ...item, selected: i === 0 })),
    onSubmit: (key) => info(`radiolist selected: ${key}`),
    onCancel: () => info('radiolist canceled'),
  }).show();

  await new LineInputWidget({
    message: 'input an ip address',
    ...size,
    placeholder: '192.168.',
    validator: isIPv4,
    errorMessage: 'invalid ip address!',
    onSubmit: (value, valid) => (valid ? info(`input: ${value}`) : warn(`rejected: ${value}`)),
    onCancel: () => info('input canceled'),
  }).show();

  await new FormWidget({
    message: 'input your login info',
    ...listSize,
    submitLabel: ' LOGIN ',
    items: [
      {
        key: 'username',
        name: 'user',
        value: 'guest',
        validator: (text) => text.length < 10,
        errorMessage: 'username too long',
      },
      { key: 'password', name: 'passwd', password: true },
    ],
    onSubmit: (entries) => info(`form data: ${entries.map(e => e.name).join(', ')}`),
    onCancel: () => info('form canceled'),
  }).show();

  const session = new GaugeWidget({ message: 'progress bar', ...size }).listen();
  for (let percent = 1; percent <= 100 && session.isRunning; percent++) {
    await session.updatePercent(percent);
    await sleep(stepDelayMs);
  }
  await session.terminate();
  await session.done;
}

export function registerDemoCommand(program: Command): void {
  program
    .command('demo')
    .description('Walk through every dialog type')
    .option('--term <name>', 'TERM value for the renderer')
    .option('--delay <ms>', 'Delay between gauge steps', '50')
    .action(async (opts: { term?: string; delay: string }) => {
      try {
        const invoker = await createInvoker(opts);
        await runDemo(invoker, Number(opts.delay) || 0);
        success('Demo finished.');
      } catch (err) {
        handleError(err);
      }
    });
}
