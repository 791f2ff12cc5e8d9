import { describe, it, expect, vi } from 'vitest';
import { DialogWidget } from '../src/widgets/base.js';
import { MessageWidget } from '../src/widgets/message.js';
import { ConfirmWidget } from '../src/widgets/confirm.js';
import { InfoWidget } from '../src/widgets/info.js';
import { TextViewerWidget } from '../src/widgets/text-viewer.js';
import { MenuWidget } from '../src/widgets/menu.js';
import { ChecklistWidget, RadiolistWidget } from '../src/widgets/select-list.js';
import { LineInputWidget } from '../src/widgets/line-input.js';
import type { DialogInvoker } from '../src/core/invoker.js';
import {
  DuplicateKeyError,
  MissingReactionError,
  UnexpectedExitError,
  UnhandledOutcomeError,
  UnknownKeyError,
} from '../src/utils/errors.js';
import { FakeRenderer } from './helpers/fake-renderer.js';

describe('ConfirmWidget', () => {
  it('fires onNo and never onYes when the renderer exits with 1', async () => {
    const renderer = new FakeRenderer([{ code: 1 }]);
    const onYes = vi.fn();
    const onNo = vi.fn();

    const outcome = await new ConfirmWidget({
      message: 'Proceed?',
      height: 10,
      width: 40,
      invoker: renderer.invoker(),
      onYes,
      onNo,
    }).show();

    expect(outcome.kind).toBe('negative');
    expect(onNo).toHaveBeenCalledTimes(1);
    expect(onYes).not.toHaveBeenCalled();
    expect(renderer.calls[0]?.args).toEqual(['--yesno', '--', 'Proceed?', '10', '40']);
  });

  it('fires onYes on exit 0 and passes button labels', async () => {
    const renderer = new FakeRenderer([{ code: 0 }]);
    const onYes = vi.fn();

    await new ConfirmWidget({
      message: 'Proceed?',
      height: 10,
      width: 40,
      options: { yesButton: 'Sure', noButton: 'Nope', defaultNo: true },
      invoker: renderer.invoker(),
      onYes,
      onNo: vi.fn(),
    }).show();

    expect(onYes).toHaveBeenCalledTimes(1);
    expect(renderer.calls[0]?.args).toEqual([
      '--defaultno', '--yes-button', 'Sure', '--no-button', 'Nope', '--yesno', '--', 'Proceed?', '10', '40',
    ]);
  });
});

describe('MessageWidget', () => {
  it('fires onOk and sizes itself from the terminal', async () => {
    const renderer = new FakeRenderer([{ code: 0 }]);
    const onOk = vi.fn();

    await new MessageWidget({ message: 'hi', invoker: renderer.invoker(), onOk }).show();

    expect(onOk).toHaveBeenCalledTimes(1);
    expect(renderer.calls[0]?.args).toEqual(['--msgbox', '--', 'hi', '20', '75']);
  });

  it('fails on ESC when no escape hook is given', async () => {
    const renderer = new FakeRenderer([{ code: 255 }]);
    const widget = new MessageWidget({ message: 'hi', invoker: renderer.invoker(), onOk: vi.fn() });
    await expect(widget.show()).rejects.toBeInstanceOf(UnhandledOutcomeError);
  });

  it('routes ESC to onEscape when given', async () => {
    const renderer = new FakeRenderer([{ code: 255 }]);
    const onOk = vi.fn();
    const onEscape = vi.fn();

    await new MessageWidget({ message: 'hi', invoker: renderer.invoker(), onOk, onEscape }).show();

    expect(onEscape).toHaveBeenCalledTimes(1);
    expect(onOk).not.toHaveBeenCalled();
  });

  it('surfaces an unexpected exit code', async () => {
    const renderer = new FakeRenderer([{ code: 3, stderr: 'bad option' }]);
    const widget = new MessageWidget({ message: 'hi', invoker: renderer.invoker(), onOk: vi.fn() });

    const failure = widget.show();
    await expect(failure).rejects.toBeInstanceOf(UnexpectedExitError);
    await expect(failure).rejects.toMatchObject({ code: 3 });
  });
});

describe('InfoWidget', () => {
  it('waits for the renderer and returns its outcome', async () => {
    const renderer = new FakeRenderer([{ code: 0 }]);
    const outcome = await new InfoWidget({ message: 'working', height: 8, width: 30, invoker: renderer.invoker() }).show();

    expect(outcome.kind).toBe('positive');
    expect(renderer.calls[0]?.args).toEqual(['--infobox', '--', 'working', '8', '30']);
  });
});

describe('TextViewerWidget', () => {
  it('fires onFailed when the renderer cannot open the file', async () => {
    const renderer = new FakeRenderer([{ code: 255 }]);
    const onOk = vi.fn();
    const onFailed = vi.fn();

    await new TextViewerWidget({ file: '/tmp/missing.txt', height: 10, width: 40, invoker: renderer.invoker(), onOk, onFailed }).show();

    expect(onFailed).toHaveBeenCalledTimes(1);
    expect(onOk).not.toHaveBeenCalled();
    expect(renderer.calls[0]?.args).toEqual(['--textbox', '--', '/tmp/missing.txt', '10', '40']);
  });
});

describe('MenuWidget', () => {
  function makeMenu(invoker: DialogInvoker, onSelected = vi.fn(), onCancel = vi.fn()) {
    return new MenuWidget<number>({
      message: 'Pick',
      height: 20,
      width: 40,
      prefix: '-',
      invoker,
      items: [
        { key: 'a', description: 'Alpha', payload: 1, onSelected },
        { key: 'b', description: 'Beta', payload: 2, onSelected },
      ],
      onCancel,
    });
  }

  it('renders keys and prefixed descriptions after the list height', async () => {
    const renderer = new FakeRenderer([{ code: 0, stderr: 'a' }]);
    await makeMenu(renderer.invoker()).show();
    expect(renderer.trailing(0)).toEqual(['10', 'a', '- Alpha', 'b', '- Beta']);
  });

  it('fires the selected item with its payload', async () => {
    const renderer = new FakeRenderer([{ code: 0, stderr: 'b' }]);
    const onSelected = vi.fn();

    await makeMenu(renderer.invoker(), onSelected).show();

    expect(onSelected).toHaveBeenCalledTimes(1);
    expect(onSelected).toHaveBeenCalledWith(2);
  });

  it('fires onCancel on exit 1', async () => {
    const renderer = new FakeRenderer([{ code: 1 }]);
    const onSelected = vi.fn();
    const onCancel = vi.fn();

    await makeMenu(renderer.invoker(), onSelected, onCancel).show();

    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(onSelected).not.toHaveBeenCalled();
  });

  it('fails when the selected key matches no item', async () => {
    const renderer = new FakeRenderer([{ code: 0, stderr: 'zzz' }]);
    await expect(makeMenu(renderer.invoker()).show()).rejects.toBeInstanceOf(UnknownKeyError);
  });

  it('hides descriptions when asked', async () => {
    const renderer = new FakeRenderer([{ code: 1 }]);
    await new MenuWidget({
      message: 'Pick',
      height: 15,
      width: 40,
      showDescription: false,
      invoker: renderer.invoker(),
      items: [{ key: 'a', description: 'Alpha', payload: null, onSelected: vi.fn() }],
      onCancel: vi.fn(),
    }).show();

    expect(renderer.trailing(0)).toEqual(['5', 'a', '']);
  });

  it('rejects duplicate keys at construction', () => {
    const invoker = new FakeRenderer().invoker();
    const build = (keys: string[]) =>
      new MenuWidget({
        message: 'Pick',
        invoker,
        items: keys.map(key => ({ key, description: key, payload: key, onSelected: vi.fn() })),
        onCancel: vi.fn(),
      });

    expect(() => build(['a', 'a'])).toThrow(DuplicateKeyError);
    expect(() => build(['a', 'b'])).not.toThrow();
  });
});

describe('ChecklistWidget', () => {
  const items = [
    { key: 'item1', description: 'one', selected: true },
    { key: 'item2', description: 'two' },
    { key: 'item3', description: 'three' },
  ];

  it('renders ON/OFF status and parses quoted tags', async () => {
    const renderer = new FakeRenderer([{ code: 0, stderr: '"item1" "item3"' }]);
    const onSubmit = vi.fn();

    await new ChecklistWidget({
      message: 'Choose',
      height: 20,
      width: 40,
      listHeight: 3,
      invoker: renderer.invoker(),
      items,
      onSubmit,
      onCancel: vi.fn(),
    }).show();

    expect(renderer.trailing(0)).toEqual(['3', 'item1', 'one', 'ON', 'item2', 'two', 'OFF', 'item3', 'three', 'OFF']);
    expect(onSubmit).toHaveBeenCalledWith(['item1', 'item3']);
  });

  it('submits an empty selection', async () => {
    const renderer = new FakeRenderer([{ code: 0, stderr: '' }]);
    const onSubmit = vi.fn();

    await new ChecklistWidget({ message: 'Choose', invoker: renderer.invoker(), items, onSubmit, onCancel: vi.fn() }).show();

    expect(onSubmit).toHaveBeenCalledWith([]);
  });

  it('reads one tag per line with separateOutput', async () => {
    const renderer = new FakeRenderer([{ code: 0, stderr: 'item2\nitem3\n' }]);
    const onSubmit = vi.fn();

    await new ChecklistWidget({
      message: 'Choose',
      options: { separateOutput: true },
      invoker: renderer.invoker(),
      items,
      onSubmit,
      onCancel: vi.fn(),
    }).show();

    expect(renderer.calls[0]?.args[0]).toBe('--separate-output');
    expect(onSubmit).toHaveBeenCalledWith(['item2', 'item3']);
  });

  it('does not write the submitted selection back to the items', async () => {
    const renderer = new FakeRenderer([{ code: 0, stderr: '"item2"' }]);
    const widget = new ChecklistWidget({ message: 'Choose', invoker: renderer.invoker(), items, onSubmit: vi.fn(), onCancel: vi.fn() });

    await widget.show();

    expect(widget.items.map(item => item.selected ?? false)).toEqual([true, false, false]);
  });
});

describe('RadiolistWidget', () => {
  it('passes the selected key through', async () => {
    const renderer = new FakeRenderer([{ code: 0, stderr: 'item2' }]);
    const onSubmit = vi.fn();

    await new RadiolistWidget({
      message: 'Choose one',
      height: 20,
      width: 40,
      invoker: renderer.invoker(),
      items: [
        { key: 'item1', description: 'one', selected: true },
        { key: 'item2', description: 'two' },
      ],
      onSubmit,
      onCancel: vi.fn(),
    }).show();

    expect(renderer.boxes()).toEqual(['--radiolist']);
    expect(renderer.trailing(0)).toEqual(['10', 'item1', 'one', 'ON', 'item2', 'two', 'OFF']);
    expect(onSubmit).toHaveBeenCalledWith('item2');
  });

  it('rejects duplicate keys at construction', () => {
    expect(
      () =>
        new RadiolistWidget({
          message: 'x',
          invoker: new FakeRenderer().invoker(),
          items: [{ key: 'a', description: '1' }, { key: 'a', description: '2' }],
          onSubmit: vi.fn(),
          onCancel: vi.fn(),
        })
    ).toThrow(DuplicateKeyError);
  });
});

describe('LineInputWidget', () => {
  it('submits a valid value once', async () => {
    const renderer = new FakeRenderer([{ code: 0, stderr: '10.0.0.1' }]);
    const onSubmit = vi.fn();

    await new LineInputWidget({
      message: 'Address',
      height: 10,
      width: 40,
      placeholder: '10.',
      validator: (value) => /^\d+(\.\d+){3}$/.test(value),
      invoker: renderer.invoker(),
      onSubmit,
      onCancel: vi.fn(),
    }).show();

    expect(renderer.calls[0]?.args).toEqual(['--inputbox', '--', 'Address', '10', '40', '10.']);
    expect(onSubmit.mock.calls).toEqual([['10.0.0.1', true]]);
  });

  it('shows the error message and re-prompts on invalid input', async () => {
    const renderer = new FakeRenderer([
      { code: 0, stderr: 'abc' },
      { code: 0 },
      { code: 0, stderr: '1.2.3.4' },
    ]);
    const onSubmit = vi.fn();

    await new LineInputWidget({
      message: 'Address',
      height: 10,
      width: 40,
      validator: (value) => /^\d+(\.\d+){3}$/.test(value),
      errorMessage: 'invalid ip address!',
      invoker: renderer.invoker(),
      onSubmit,
      onCancel: vi.fn(),
    }).show();

    expect(renderer.boxes()).toEqual(['--inputbox', '--msgbox', '--inputbox']);
    expect(renderer.calls[1]?.args).toEqual(['--msgbox', '--', 'invalid ip address!', '10', '40']);
    expect(onSubmit.mock.calls).toEqual([
      ['abc', false],
      ['1.2.3.4', true],
    ]);
  });

  it('uses a password box when masked', async () => {
    const renderer = new FakeRenderer([{ code: 1 }]);
    const onSubmit = vi.fn();
    const onCancel = vi.fn();

    await new LineInputWidget({
      message: 'Password',
      height: 10,
      width: 40,
      password: true,
      invoker: renderer.invoker(),
      onSubmit,
      onCancel,
    }).show();

    expect(renderer.calls[0]?.args).toEqual(['--passwordbox', '--', 'Password', '10', '40', '']);
    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(onSubmit).not.toHaveBeenCalled();
  });
});

describe('reaction table', () => {
  class HalfConfirm extends DialogWidget {
    constructor(invoker: DialogInvoker) {
      super(
        {
          box: 'yesno',
          text: 'half',
          reachable: ['positive', 'negative'],
          reactions: { positive: () => 'done' },
        },
        { invoker }
      );
    }
  }

  it('rejects a widget missing a reaction for a reachable outcome', () => {
    expect(() => new HalfConfirm(new FakeRenderer().invoker())).toThrow(MissingReactionError);
  });
});
