import type { BoxKind, DialogOptions, DialogOutcome, DialogRequest, SettledKind } from '../types/index.js';
import { DialogInvoker } from '../core/invoker.js';
import { freezeOptions } from '../core/argument-builder.js';
import { resolveGeometry } from '../core/geometry.js';
import { createRequest } from '../core/request.js';
import { MissingReactionError, UnexpectedExitError, UnhandledOutcomeError } from '../utils/errors.js';

/** What the show loop does after a reaction: stop, or run the same dialog again. */
export type Flow = 'done' | 'repeat';

export type Reaction = (payload: string) => Flow | Promise<Flow>;

export type ReactionTable = Partial<Record<SettledKind, Reaction>>;

export type Callback<A extends unknown[] = []> = (...args: A) => void | Promise<void>;

/**
 * Options every widget accepts.
 */
export interface WidgetOptions {
  height?: number;
  width?: number;
  options?: DialogOptions;
  invoker?: DialogInvoker;
  /** Handles ESC on boxes that otherwise have no escape path. */
  onEscape?: Callback;
}

export interface WidgetDefinition {
  box: BoxKind;
  text: string;
  /** Outcomes the box can produce; each needs a reaction. */
  reachable: readonly SettledKind[];
  reactions: ReactionTable;
}

/**
 * Wraps a user callback as a reaction that ends the show loop.
 */
export function finish<A extends unknown[]>(callback: Callback<A>, ...args: A): Promise<Flow> {
  return Promise.resolve(callback(...args)).then(() => 'done' as const);
}

export abstract class DialogWidget {
  readonly box: BoxKind;
  readonly text: string;
  readonly height: number;
  readonly width: number;
  readonly options: Readonly<DialogOptions>;
  protected readonly invoker: DialogInvoker;
  private readonly reactions: Readonly<ReactionTable>;

  protected constructor(definition: WidgetDefinition, widget: WidgetOptions) {
    this.box = definition.box;
    this.text = definition.text;
    this.invoker = widget.invoker ?? new DialogInvoker();
    this.options = freezeOptions(widget.options);

    const { height, width } = resolveGeometry(widget.height, widget.width, this.invoker.terminalSize);
    this.height = height;
    this.width = width;

    const onEscape = widget.onEscape;
    const reactions: ReactionTable = { ...definition.reactions };
    if (onEscape) reactions.escape = () => finish(onEscape);

    for (const kind of definition.reachable) {
      if (!reactions[kind]) throw new MissingReactionError(this.box, kind);
    }
    this.reactions = Object.freeze(reactions);
  }

  /**
   * Box-specific arguments after `<text> <height> <width>`, built from
   * current state on every run.
   */
  protected trailingArgs(): string[] {
    return [];
  }

  request(): DialogRequest {
    return createRequest(this.box, this.text, this.height, this.width, this.trailingArgs());
  }

  describe(): string {
    return this.invoker.describeCommand(this.request(), this.options);
  }

  /**
   * Invoke the renderer once without dispatching.
   */
  run(): Promise<DialogOutcome> {
    return this.invoker.invoke(this.request(), this.options);
  }

  /**
   * Show the dialog and fire the reaction for its outcome. Reactions that
   * ask to repeat (invalid input, form edits) re-run the dialog in this loop.
   * Resolves with the final outcome.
   */
  async show(): Promise<DialogOutcome> {
    for (;;) {
      const outcome = await this.run();
      const flow = await this.dispatch(outcome);
      if (flow === 'done') return outcome;
    }
  }

  protected dispatch(outcome: DialogOutcome): Flow | Promise<Flow> {
    if (outcome.kind === 'unexpected') {
      throw new UnexpectedExitError(outcome.code, outcome.payload);
    }
    const reaction = this.reactions[outcome.kind];
    if (!reaction) {
      throw new UnhandledOutcomeError(this.box, outcome.kind);
    }
    return reaction(outcome.payload);
  }
}
