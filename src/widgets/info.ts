import { DialogWidget, type WidgetOptions } from './base.js';

export interface InfoOptions extends WidgetOptions {
  message: string;
}

/**
 * `infobox`: draws and returns at once. The child is still awaited so its
 * exit status is checked.
 */
export class InfoWidget extends DialogWidget {
  constructor({ message, ...widget }: InfoOptions) {
    super(
      {
        box: 'infobox',
        text: message,
        reachable: ['positive'],
        reactions: { positive: () => 'done' },
      },
      widget
    );
  }
}
