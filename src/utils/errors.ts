import { error as displayError } from './display.js';

export class WtuiError extends Error {
  constructor(
    public userMessage: string,
    message?: string
  ) {
    super(message || userMessage);
    this.name = 'WtuiError';
  }
}

export class UnknownBoxKindError extends WtuiError {
  constructor(box: string) {
    super(`Unknown dialog box "${box}".`, `Invalid whiptail box name: ${box}`);
    this.name = 'UnknownBoxKindError';
  }
}

export class InvalidGeometryError extends WtuiError {
  constructor(dimension: 'height' | 'width' | 'list height', value: number) {
    super(
      `Dialog ${dimension} must be a positive integer (got ${value}).`,
      `Invalid ${dimension}: ${value}`
    );
    this.name = 'InvalidGeometryError';
  }
}

export class DuplicateKeyError extends WtuiError {
  constructor(public readonly key: string) {
    super(`Duplicate item key "${key}".`, `Duplicate key in item list: ${key}`);
    this.name = 'DuplicateKeyError';
  }
}

export class ReservedKeyError extends WtuiError {
  constructor() {
    super(
      'Form field keys must not be empty; the empty key is reserved for the submit entry.',
      'Form item uses the reserved submit key ""'
    );
    this.name = 'ReservedKeyError';
  }
}

export class PercentOutOfRangeError extends WtuiError {
  constructor(public readonly percent: number) {
    super(`Gauge percent must be an integer between 0 and 100 (got ${percent}).`, `Percent out of range: ${percent}`);
    this.name = 'PercentOutOfRangeError';
  }
}

export class GaugeClosedError extends WtuiError {
  constructor() {
    super('The gauge input stream is already closed.', 'Write to a terminated gauge session');
    this.name = 'GaugeClosedError';
  }
}

export class MissingReactionError extends WtuiError {
  constructor(box: string, kind: string) {
    super(
      `The ${box} dialog has no reaction for its ${kind} outcome.`,
      `Missing ${kind} reaction for ${box}`
    );
    this.name = 'MissingReactionError';
  }
}

export class UnhandledOutcomeError extends WtuiError {
  constructor(box: string, kind: string) {
    super(`The ${box} dialog returned an outcome it cannot handle (${kind}).`, `Unhandled ${kind} outcome for ${box}`);
    this.name = 'UnhandledOutcomeError';
  }
}

export class UnexpectedExitError extends WtuiError {
  constructor(
    public readonly code: number | null,
    public readonly payload: string
  ) {
    const detail = payload.trim();
    super(
      code === null
        ? 'The dialog renderer was terminated by a signal.'
        : `The dialog renderer failed with exit code ${code}${detail ? `: ${detail}` : '.'}`,
      `Unexpected renderer exit code: ${code}`
    );
    this.name = 'UnexpectedExitError';
  }
}

export class UnknownKeyError extends WtuiError {
  constructor(public readonly key: string) {
    super(`The renderer returned "${key}", which matches no item.`, `Unknown selected key: ${key}`);
    this.name = 'UnknownKeyError';
  }
}

export class RendererNotFoundError extends WtuiError {
  constructor(command: string) {
    super(
      `Dialog renderer "${command}" not found. Install whiptail or set its path with: wtui config renderer_path <path>`,
      `Renderer not found: ${command}`
    );
    this.name = 'RendererNotFoundError';
  }
}

export class ConfigError extends WtuiError {
  constructor(detail: string) {
    super(`Invalid configuration: ${detail}`);
    this.name = 'ConfigError';
  }
}

/**
 * Global error handler for CLI commands.
 * Shows userMessage to user; full stack only with WTUI_DEBUG=1.
 */
export function handleError(err: unknown): never {
  if (err instanceof WtuiError) {
    displayError(err.userMessage);
  } else if (err instanceof Error) {
    displayError(err.message);
  } else {
    displayError(String(err));
  }

  if (process.env['WTUI_DEBUG'] === '1' && err instanceof Error) {
    console.error('\nDebug stack trace:');
    console.error(err.stack);
  }

  process.exit(1);
}
