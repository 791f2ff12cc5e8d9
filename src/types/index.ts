// ============================================================
// Renderer contract
// ============================================================

export const BOX_KINDS = [
  'msgbox',
  'yesno',
  'infobox',
  'inputbox',
  'passwordbox',
  'textbox',
  'menu',
  'checklist',
  'radiolist',
  'gauge',
] as const;

export type BoxKind = (typeof BOX_KINDS)[number];

export const POSITIVE_EXIT_CODE = 0;
export const NEGATIVE_EXIT_CODE = 1;
export const ESCAPE_EXIT_CODE = 255;

export type OutcomeKind = 'positive' | 'negative' | 'escape' | 'unexpected';

/** Outcome kinds a widget can react to; `unexpected` is always fatal. */
export type SettledKind = Exclude<OutcomeKind, 'unexpected'>;

export interface DialogOutcome {
  kind: OutcomeKind;
  /** Raw exit code, null when the child was killed by a signal. */
  code: number | null;
  payload: string;
}

/**
 * Common whiptail options. Booleans default to false and strings to absent;
 * neither shows up on the command line in that state.
 */
export interface DialogOptions {
  readonly clear?: boolean;
  readonly defaultNo?: boolean;
  readonly fullButtons?: boolean;
  readonly noCancel?: boolean;
  readonly noItem?: boolean;
  readonly noTags?: boolean;
  readonly separateOutput?: boolean;
  readonly scrollText?: boolean;
  readonly topLeft?: boolean;
  readonly defaultItem?: string;
  readonly yesButton?: string;
  readonly noButton?: string;
  readonly okButton?: string;
  readonly cancelButton?: string;
  readonly title?: string;
  readonly backTitle?: string;
}

export interface DialogRequest {
  readonly box: BoxKind;
  readonly text: string;
  readonly height: number;
  readonly width: number;
  readonly trailing: readonly string[];
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

// ============================================================
// Items
// ============================================================

export interface MenuItem<T = unknown> {
  key: string;
  description: string;
  payload: T;
  onSelected: (payload: T) => void | Promise<void>;
}

export interface SelectItem {
  key: string;
  description: string;
  selected?: boolean;
}

export interface FormItem {
  key: string;
  name: string;
  password?: boolean;
  value?: string;
  validator?: (value: string) => boolean;
  errorMessage?: string;
}

export interface FormEntry {
  name: string;
  value: string;
}

// ============================================================
// Config
// ============================================================

export interface WtuiConfig {
  renderer_path?: string;
  term?: string;
}

export const CONFIG_KEYS = ['renderer_path', 'term'] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

// ============================================================
// Command Option Types
// ============================================================

export interface CommonCliOptions {
  height?: string;
  width?: string;
  title?: string;
  backtitle?: string;
  term?: string;
  yesButton?: string;
  noButton?: string;
  okButton?: string;
  cancelButton?: string;
  defaultItem?: string;
  clear?: boolean;
  defaultno?: boolean;
  fullbuttons?: boolean;
  nocancel?: boolean;
  notags?: boolean;
  scrolltext?: boolean;
  topleft?: boolean;
  dryRun?: boolean;
}

export interface InputCliOptions extends CommonCliOptions {
  init?: string;
  password?: boolean;
  pattern?: string;
  error?: string;
}

export interface ListCliOptions extends CommonCliOptions {
  listHeight?: string;
  prefix?: string;
  separateOutput?: boolean;
}

export interface GaugeCliOptions extends CommonCliOptions {
  percent?: string;
}

export interface ConfigCliOptions {
  unset?: boolean;
}
