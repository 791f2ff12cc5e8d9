import type { SelectItem } from '../types/index.js';
import { assertUniqueKeys } from '../core/request.js';
import { resolveListHeight } from '../core/geometry.js';
import { parseQuotedTags, parseSeparatedTags } from '../core/payload.js';
import { formatDescription } from './menu.js';
import { DialogWidget, finish, type Callback, type Reaction, type WidgetOptions } from './base.js';

export interface SelectListOptions extends WidgetOptions {
  message: string;
  items: readonly SelectItem[];
  listHeight?: number;
  prefix?: string;
  showDescription?: boolean;
  onCancel: Callback;
}

export interface ChecklistOptions extends SelectListOptions {
  /** Receives the selected keys in the order whiptail reports them. */
  onSubmit: Callback<[string[]]>;
}

export interface RadiolistOptions extends SelectListOptions {
  onSubmit: Callback<[string]>;
}

/**
 * Shared shape of checklist and radiolist: `tag item ON|OFF` triples.
 * `selected` is only read when rendering; submits never write it back.
 */
export abstract class SelectListWidget extends DialogWidget {
  readonly items: readonly SelectItem[];
  readonly listHeight: number;
  private readonly prefix: string;
  private readonly showDescription: boolean;

  protected constructor(
    box: 'checklist' | 'radiolist',
    { message, items, listHeight, prefix, showDescription, onCancel, ...widget }: SelectListOptions,
    onPositive: Reaction
  ) {
    assertUniqueKeys(items);

    super(
      {
        box,
        text: message,
        reachable: ['positive', 'negative'],
        reactions: {
          positive: onPositive,
          negative: () => finish(onCancel),
        },
      },
      widget
    );

    this.items = Object.freeze(items.map(item => ({ ...item })));
    this.listHeight = resolveListHeight(listHeight, this.height);
    this.prefix = prefix ?? '';
    this.showDescription = showDescription ?? true;
  }

  protected override trailingArgs(): string[] {
    return [
      String(this.listHeight),
      ...this.items.flatMap(item => [
        item.key,
        formatDescription(item.description, this.prefix, this.showDescription),
        item.selected ? 'ON' : 'OFF',
      ]),
    ];
  }
}

export class ChecklistWidget extends SelectListWidget {
  constructor({ onSubmit, ...list }: ChecklistOptions) {
    const separated = list.options?.separateOutput === true;
    super('checklist', list, (payload) =>
      finish(onSubmit, separated ? parseSeparatedTags(payload) : parseQuotedTags(payload))
    );
  }
}

export class RadiolistWidget extends SelectListWidget {
  constructor({ onSubmit, ...list }: RadiolistOptions) {
    super('radiolist', list, (payload) => finish(onSubmit, payload));
  }
}
