export * from './types/index.js';
export * from './widgets/index.js';
export { DialogInvoker, classifyExit } from './core/invoker.js';
export type { CommandLine, InvokerConfig, StreamingDialog } from './core/invoker.js';
export { buildOptionArgs, freezeOptions } from './core/argument-builder.js';
export { createRequest, isBoxKind } from './core/request.js';
export { parseQuotedTags, parseSeparatedTags } from './core/payload.js';
export { resolveGeometry, defaultListHeight, getTerminalSize } from './core/geometry.js';
export type { TerminalSizeProvider } from './core/geometry.js';
export { readConfig, writeConfig, resolveConfig } from './core/config-store.js';
export { getRendererPath, spawnRenderer } from './utils/process.js';
export type { RendererChild, RendererSpawner, SpawnRendererOptions } from './utils/process.js';
export {
  WtuiError,
  UnknownBoxKindError,
  InvalidGeometryError,
  DuplicateKeyError,
  ReservedKeyError,
  PercentOutOfRangeError,
  GaugeClosedError,
  MissingReactionError,
  UnhandledOutcomeError,
  UnexpectedExitError,
  UnknownKeyError,
  RendererNotFoundError,
  ConfigError,
} from './utils/errors.js';
