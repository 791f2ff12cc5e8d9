import type { FormEntry, FormItem } from '../types/index.js';
import { assertUniqueKeys } from '../core/request.js';
import { resolveListHeight } from '../core/geometry.js';
import { DialogInvoker } from '../core/invoker.js';
import { ReservedKeyError, UnknownKeyError } from '../utils/errors.js';
import { DialogWidget, finish, type Callback, type Flow, type WidgetOptions } from './base.js';
import { LineInputWidget } from './line-input.js';
import { menuTrailingArgs, type MenuEntry } from './menu.js';

/** Menu tag of the submit entry. */
export const SUBMIT_KEY = '';

export interface FormOptions extends WidgetOptions {
  message: string;
  items: readonly FormItem[];
  /** Shown in brackets as the last menu entry. */
  submitLabel?: string;
  listHeight?: number;
  onSubmit: Callback<[FormEntry[]]>;
  onCancel: Callback;
}

interface FormField {
  readonly key: string;
  readonly name: string;
  readonly password: boolean;
  readonly validator: ((value: string) => boolean) | undefined;
  readonly errorMessage: string | undefined;
  value: string;
}

export function maskValue(value: string): string {
  return '*'.repeat(value.length);
}

/**
 * A form drawn as a menu of its fields plus a submit entry. Picking a field
 * opens a line input seeded with its value; the menu is then redrawn from
 * the updated fields. Picking submit hands every trimmed value to onSubmit.
 */
export class FormWidget extends DialogWidget {
  readonly submitLabel: string;
  readonly listHeight: number;
  private readonly fields: readonly FormField[];

  constructor({ message, items, submitLabel, listHeight, onSubmit, onCancel, ...widget }: FormOptions) {
    assertUniqueKeys(items);
    if (items.some(item => item.key === SUBMIT_KEY)) throw new ReservedKeyError();

    const invoker = widget.invoker ?? new DialogInvoker();
    const fields: FormField[] = items.map(item => ({
      key: item.key,
      name: item.name,
      password: item.password ?? false,
      validator: item.validator,
      errorMessage: item.errorMessage,
      value: item.value ?? '',
    }));

    const editField = async (field: FormField): Promise<Flow> => {
      await new LineInputWidget({
        message: field.name,
        placeholder: field.value,
        password: field.password,
        validator: field.validator,
        errorMessage: field.errorMessage,
        height: widget.height,
        width: widget.width,
        options: { title: widget.options?.title, backTitle: widget.options?.backTitle },
        invoker,
        onSubmit: (value, valid) => {
          if (valid) field.value = value;
        },
        onCancel: () => undefined,
        onEscape: () => undefined,
      }).show();
      return 'repeat';
    };

    super(
      {
        box: 'menu',
        text: message,
        reachable: ['positive', 'negative'],
        reactions: {
          positive: (key) => {
            if (key === SUBMIT_KEY) {
              return finish(onSubmit, fields.map(field => ({ name: field.name, value: field.value.trim() })));
            }
            const field = fields.find(candidate => candidate.key === key);
            if (!field) throw new UnknownKeyError(key);
            return editField(field);
          },
          negative: () => finish(onCancel),
        },
      },
      { ...widget, invoker }
    );

    this.fields = fields;
    this.submitLabel = submitLabel ?? 'Submit';
    this.listHeight = resolveListHeight(listHeight, this.height);
  }

  /**
   * Current value of a field, as edited so far.
   */
  valueOf(key: string): string | undefined {
    return this.fields.find(field => field.key === key)?.value;
  }

  protected override trailingArgs(): string[] {
    const entries: MenuEntry[] = this.fields.map(field => ({
      tag: field.key,
      item: `${field.name}: ${field.password ? maskValue(field.value) : field.value}`,
    }));
    entries.push({ tag: SUBMIT_KEY, item: `[${this.submitLabel}]` });
    return menuTrailingArgs(this.listHeight, entries);
  }
}
