import { finished, type Writable } from 'node:stream';
import type { DialogOutcome } from '../types/index.js';
import type { RendererChild } from '../utils/process.js';
import { AsyncFifoMutex } from '../utils/mutex.js';
import { GaugeClosedError, PercentOutOfRangeError, WtuiError } from '../utils/errors.js';
import { debug } from '../utils/display.js';
import { DialogWidget, finish, type Callback, type WidgetOptions } from './base.js';

export interface GaugeOptions extends WidgetOptions {
  message: string;
  /** Initial percent, 0 by default. */
  percent?: number;
  /** Fires once the renderer exits normally. */
  onExit?: Callback<[DialogOutcome]>;
}

export function assertPercent(percent: number): number {
  if (!Number.isInteger(percent) || percent < 0 || percent > 100) {
    throw new PercentOutOfRangeError(percent);
  }
  return percent;
}

/**
 * A running gauge. Percent updates go to the renderer's stdin one line at a
 * time; `done` settles when the renderer exits.
 */
export class GaugeSession {
  /** Settles with the renderer's outcome; rejects on an unexpected exit. */
  readonly done: Promise<DialogOutcome>;
  private percent: number;
  private readonly writer: Writable;
  private readonly mutex = new AsyncFifoMutex();
  private exited = false;

  constructor(child: RendererChild, done: Promise<DialogOutcome>, initialPercent: number) {
    if (!child.stdin) {
      throw new WtuiError('The gauge renderer was started without a writable stdin.');
    }
    this.writer = child.stdin;
    this.percent = initialPercent;

    // EPIPE after the renderer exits arrives here; pending writes see it through their callbacks.
    this.writer.on('error', (err: Error) => {
      debug(`gauge stdin: ${err.message}`);
    });

    this.done = done.finally(() => {
      this.exited = true;
    });
    // Callers may still be sending updates when the renderer fails; the
    // rejection stays on `done` for whoever awaits it.
    this.done.catch((err: unknown) => {
      debug(`gauge exited with: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  get currentPercent(): number {
    return this.percent;
  }

  get isRunning(): boolean {
    return !this.exited;
  }

  get isClosed(): boolean {
    return this.writer.writableEnded || this.writer.destroyed;
  }

  /**
   * Send a new percent. Resolves once the line has been handed to the
   * stream; concurrent calls are written in call order.
   */
  async updatePercent(percent: number): Promise<void> {
    assertPercent(percent);
    await this.mutex.runExclusive(() => this.writeLine(`${percent}\n`));
    this.percent = percent;
  }

  /**
   * Close the renderer's stdin. The renderer exits on EOF by itself; it is
   * never killed. Safe to call after the renderer has exited.
   */
  terminate(): Promise<void> {
    return this.mutex.runExclusive(
      () =>
        new Promise<void>((resolve) => {
          if (this.isClosed) {
            resolve();
            return;
          }
          finished(this.writer, (err) => {
            if (err) debug(`gauge stdin closed with: ${err.message}`);
            resolve();
          });
          this.writer.end();
        })
    );
  }

  private writeLine(line: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.isClosed) {
        reject(new GaugeClosedError());
        return;
      }
      this.writer.write(line, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

/**
 * `gauge`: a progress bar fed from a long-lived renderer process.
 */
export class GaugeWidget extends DialogWidget {
  readonly percent: number;
  private readonly onExit: Callback<[DialogOutcome]> | undefined;

  constructor({ message, percent = 0, onExit, ...widget }: GaugeOptions) {
    assertPercent(percent);

    super(
      {
        box: 'gauge',
        text: message,
        reachable: ['positive'],
        reactions: {
          positive: () => 'done',
        },
      },
      widget
    );

    this.percent = percent;
    this.onExit = onExit;
  }

  protected override trailingArgs(): string[] {
    return [String(this.percent)];
  }

  /**
   * Start the renderer and return at once with a session handle.
   */
  listen(): GaugeSession {
    const { child, done } = this.invoker.spawnStreaming(this.request(), this.options);
    const settled = done.then(async (outcome) => {
      await this.dispatch(outcome);
      if (this.onExit) await finish(this.onExit, outcome);
      return outcome;
    });
    return new GaugeSession(child, settled, this.percent);
  }

  /**
   * Draw the gauge at its initial percent, close its input and wait for the
   * renderer to exit.
   */
  override async show(): Promise<DialogOutcome> {
    const session = this.listen();
    await session.terminate();
    return session.done;
  }
}
