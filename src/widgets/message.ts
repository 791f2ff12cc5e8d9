import { DialogWidget, finish, type Callback, type WidgetOptions } from './base.js';

export interface MessageOptions extends WidgetOptions {
  message: string;
  onOk: Callback;
}

/**
 * `msgbox`: text and a single OK button.
 */
export class MessageWidget extends DialogWidget {
  constructor({ message, onOk, ...widget }: MessageOptions) {
    super(
      {
        box: 'msgbox',
        text: message,
        reachable: ['positive'],
        reactions: { positive: () => finish(onOk) },
      },
      widget
    );
  }
}
