export { DialogWidget, finish } from './base.js';
export type { Callback, Flow, Reaction, ReactionTable, WidgetDefinition, WidgetOptions } from './base.js';
export { MessageWidget } from './message.js';
export type { MessageOptions } from './message.js';
export { ConfirmWidget } from './confirm.js';
export type { ConfirmOptions } from './confirm.js';
export { InfoWidget } from './info.js';
export type { InfoOptions } from './info.js';
export { TextViewerWidget } from './text-viewer.js';
export type { TextViewerOptions } from './text-viewer.js';
export { MenuWidget, formatDescription, menuTrailingArgs } from './menu.js';
export type { MenuEntry, MenuOptions } from './menu.js';
export { ChecklistWidget, RadiolistWidget, SelectListWidget } from './select-list.js';
export type { ChecklistOptions, RadiolistOptions, SelectListOptions } from './select-list.js';
export { LineInputWidget } from './line-input.js';
export type { LineInputOptions } from './line-input.js';
export { FormWidget, SUBMIT_KEY, maskValue } from './form.js';
export type { FormOptions } from './form.js';
export { GaugeWidget, GaugeSession, assertPercent } from './gauge.js';
export type { GaugeOptions } from './gauge.js';
