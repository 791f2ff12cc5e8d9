import {
  POSITIVE_EXIT_CODE,
  NEGATIVE_EXIT_CODE,
  ESCAPE_EXIT_CODE,
} from '../types/index.js';
import type { DialogOptions, DialogOutcome, DialogRequest, WtuiConfig } from '../types/index.js';
import { buildOptionArgs } from './argument-builder.js';
import { getTerminalSize, type TerminalSizeProvider } from './geometry.js';
import { spawnRenderer, getRendererPath, type RendererChild, type RendererSpawner } from '../utils/process.js';
import { RendererNotFoundError, WtuiError } from '../utils/errors.js';
import { debug, formatCommand } from '../utils/display.js';

export interface InvokerConfig {
  /** Renderer executable; resolved from PATH when omitted. */
  renderer?: string;
  /** TERM override for terminals whose capability strings whiptail mishandles. */
  term?: string;
  terminalSize?: TerminalSizeProvider;
  spawn?: RendererSpawner;
  env?: NodeJS.ProcessEnv;
}

export interface CommandLine {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  /** The full vector as a shell would see it, TERM prefix included. */
  display: string[];
}

export interface StreamingDialog {
  child: RendererChild;
  done: Promise<DialogOutcome>;
}

/**
 * Classify a renderer exit. Signal deaths (null code) count as unexpected.
 */
export function classifyExit(code: number | null, payload: string): DialogOutcome {
  switch (code) {
    case POSITIVE_EXIT_CODE:
      return { kind: 'positive', code, payload };
    case NEGATIVE_EXIT_CODE:
      return { kind: 'negative', code, payload };
    case ESCAPE_EXIT_CODE:
      return { kind: 'escape', code, payload };
    default:
      return { kind: 'unexpected', code, payload };
  }
}

export class DialogInvoker {
  readonly terminalSize: TerminalSizeProvider;
  private readonly spawner: RendererSpawner;
  private readonly term: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private rendererPath: string | undefined;

  constructor(config: InvokerConfig = {}) {
    this.rendererPath = config.renderer;
    this.term = config.term;
    this.terminalSize = config.terminalSize ?? getTerminalSize;
    this.spawner = config.spawn ?? spawnRenderer;
    this.env = config.env ?? process.env;
  }

  /**
   * Invoker configured from ~/.wtui/config.json and the WTUI_* environment.
   */
  static fromConfig(config: WtuiConfig, overrides: InvokerConfig = {}): DialogInvoker {
    return new DialogInvoker({
      renderer: config.renderer_path,
      term: config.term,
      ...overrides,
    });
  }

  get renderer(): string {
    if (this.rendererPath === undefined) this.rendererPath = getRendererPath();
    return this.rendererPath;
  }

  /**
   * `[TERM=..] renderer [options..] --<box> -- <text> <height> <width> [trailing..]`
   */
  buildCommandLine(request: DialogRequest, options: DialogOptions): CommandLine {
    const command = this.renderer;
    const args = [
      ...buildOptionArgs(options),
      `--${request.box}`,
      '--',
      request.text,
      String(request.height),
      String(request.width),
      ...request.trailing,
    ];
    const env = this.term !== undefined ? { ...this.env, TERM: this.term } : this.env;
    const display = [...(this.term !== undefined ? [`TERM=${this.term}`] : []), command, ...args];
    return { command, args, env, display };
  }

  describeCommand(request: DialogRequest, options: DialogOptions): string {
    return formatCommand(this.buildCommandLine(request, options).display);
  }

  /**
   * Run the renderer to completion. The terminal stays attached to the
   * child; only stderr, where whiptail writes its result, is captured.
   */
  invoke(request: DialogRequest, options: DialogOptions): Promise<DialogOutcome> {
    return this.launch(request, options, ['inherit', 'inherit', 'pipe']).done;
  }

  /**
   * Start the renderer with a piped stdin and return without waiting.
   */
  spawnStreaming(request: DialogRequest, options: DialogOptions): StreamingDialog {
    return this.launch(request, options, ['pipe', 'inherit', 'pipe']);
  }

  private launch(
    request: DialogRequest,
    options: DialogOptions,
    stdio: ['inherit' | 'pipe', 'inherit', 'pipe']
  ): StreamingDialog {
    const line = this.buildCommandLine(request, options);
    debug(`exec ${formatCommand(line.display)}`);

    const child = this.spawner(line.command, line.args, { env: line.env, stdio });
    const done = new Promise<DialogOutcome>((resolve, reject) => {
      const chunks: Buffer[] = [];
      child.stderr?.on('data', (chunk: unknown) => {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf-8'));
      });
      child.once('error', (err) => {
        reject(toLaunchError(err, line.command));
      });
      child.once('close', (code) => {
        const outcome = classifyExit(code, Buffer.concat(chunks).toString('utf-8'));
        debug(`exit ${code === null ? 'signal' : code} → ${outcome.kind}`);
        resolve(outcome);
      });
    });
    return { child, done };
  }
}

function toLaunchError(err: Error, command: string): Error {
  if ('code' in err && err.code === 'ENOENT') {
    return new RendererNotFoundError(command);
  }
  return new WtuiError(`Failed to start ${command}: ${err.message}`);
}
