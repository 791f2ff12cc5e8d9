import { DialogWidget, finish, type Callback, type WidgetOptions } from './base.js';

// ESC and a failed open share exit code 255; onFailed owns that outcome.
export interface TextViewerOptions extends Omit<WidgetOptions, 'onEscape'> {
  /** Path of the file whiptail displays. */
  file: string;
  onOk: Callback;
  onFailed: Callback;
}

export class TextViewerWidget extends DialogWidget {
  constructor({ file, onOk, onFailed, ...widget }: TextViewerOptions) {
    super(
      {
        box: 'textbox',
        text: file,
        reachable: ['positive', 'escape'],
        reactions: {
          positive: () => finish(onOk),
          escape: () => finish(onFailed),
        },
      },
      widget
    );
  }
}
