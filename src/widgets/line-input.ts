import { DialogInvoker } from '../core/invoker.js';
import { DialogWidget, finish, type Callback, type Flow, type WidgetOptions } from './base.js';
import { MessageWidget } from './message.js';

export interface LineInputOptions extends WidgetOptions {
  message: string;
  placeholder?: string;
  /** Uses `passwordbox`, which echoes `*` instead of the typed text. */
  password?: boolean;
  validator?: (value: string) => boolean;
  errorMessage?: string;
  /**
   * Fires for every submitted value. A value that fails validation is also
   * reported, with `valid` false, before the prompt is shown again.
   */
  onSubmit: Callback<[value: string, valid: boolean]>;
  onCancel: Callback;
}

const acceptAll = (): boolean => true;

/**
 * `inputbox` / `passwordbox`. Invalid input shows `errorMessage` in a
 * message box and re-prompts until the value validates or the user cancels.
 */
export class LineInputWidget extends DialogWidget {
  readonly placeholder: string;

  constructor({
    message,
    placeholder,
    password,
    validator = acceptAll,
    errorMessage = 'Invalid input.',
    onSubmit,
    onCancel,
    ...widget
  }: LineInputOptions) {
    const invoker = widget.invoker ?? new DialogInvoker();
    const { height, width, options } = widget;

    const rejectValue = async (value: string): Promise<Flow> => {
      await new MessageWidget({
        message: errorMessage,
        height,
        width,
        options: { title: options?.title, backTitle: options?.backTitle },
        invoker,
        onOk: () => undefined,
        onEscape: () => undefined,
      }).show();
      await onSubmit(value, false);
      return 'repeat';
    };

    super(
      {
        box: password ? 'passwordbox' : 'inputbox',
        text: message,
        reachable: ['positive', 'negative'],
        reactions: {
          positive: (value) => (validator(value) ? finish(onSubmit, value, true) : rejectValue(value)),
          negative: () => finish(onCancel),
        },
      },
      { ...widget, invoker }
    );

    this.placeholder = placeholder ?? '';
  }

  protected override trailingArgs(): string[] {
    return [this.placeholder];
  }
}
