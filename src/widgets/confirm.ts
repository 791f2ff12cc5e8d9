import { DialogWidget, finish, type Callback, type WidgetOptions } from './base.js';

export interface ConfirmOptions extends WidgetOptions {
  message: string;
  onYes: Callback;
  onNo: Callback;
}

/**
 * `yesno`: Yes is the positive outcome, No the negative one.
 */
export class ConfirmWidget extends DialogWidget {
  constructor({ message, onYes, onNo, ...widget }: ConfirmOptions) {
    super(
      {
        box: 'yesno',
        text: message,
        reachable: ['positive', 'negative'],
        reactions: {
          positive: () => finish(onYes),
          negative: () => finish(onNo),
        },
      },
      widget
    );
  }
}
