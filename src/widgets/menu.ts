import type { MenuItem } from '../types/index.js';
import { assertUniqueKeys } from '../core/request.js';
import { resolveListHeight } from '../core/geometry.js';
import { UnknownKeyError } from '../utils/errors.js';
import { DialogWidget, finish, type Callback, type WidgetOptions } from './base.js';

export interface MenuEntry {
  tag: string;
  item: string;
}

export interface MenuOptions<T> extends WidgetOptions {
  message: string;
  items: ReadonlyArray<MenuItem<T>>;
  listHeight?: number;
  /** Put in front of every description, e.g. '-'. */
  prefix?: string;
  /** When false, descriptions render empty and only keys show. Default true. */
  showDescription?: boolean;
  onCancel: Callback;
}

export function formatDescription(description: string, prefix = '', showDescription = true): string {
  if (!showDescription) return '';
  return prefix ? `${prefix} ${description}` : description;
}

/**
 * `<list-height> tag item tag item ...`
 */
export function menuTrailingArgs(listHeight: number, entries: readonly MenuEntry[]): string[] {
  return [String(listHeight), ...entries.flatMap(({ tag, item }) => [tag, item])];
}

/**
 * `menu`: pick one item. The selected key fires that item's onSelected
 * with its payload.
 */
export class MenuWidget<T = unknown> extends DialogWidget {
  readonly items: ReadonlyArray<MenuItem<T>>;
  readonly listHeight: number;
  private readonly prefix: string;
  private readonly showDescription: boolean;

  constructor({ message, items, listHeight, prefix, showDescription, onCancel, ...widget }: MenuOptions<T>) {
    assertUniqueKeys(items);
    const entries = [...items];

    super(
      {
        box: 'menu',
        text: message,
        reachable: ['positive', 'negative'],
        reactions: {
          positive: (key) => {
            const selected = entries.find(item => item.key === key);
            if (!selected) throw new UnknownKeyError(key);
            return finish(selected.onSelected, selected.payload);
          },
          negative: () => finish(onCancel),
        },
      },
      widget
    );

    this.items = Object.freeze(entries);
    this.listHeight = resolveListHeight(listHeight, this.height);
    this.prefix = prefix ?? '';
    this.showDescription = showDescription ?? true;
  }

  protected override trailingArgs(): string[] {
    return menuTrailingArgs(
      this.listHeight,
      this.items.map(item => ({
        tag: item.key,
        item: formatDescription(item.description, this.prefix, this.showDescription),
      }))
    );
  }
}
