/**
 * PresenterController - the navigation state machine.
 *
 * Owns the only mutable state of a presentation: which slide is current,
 * how far it is scrolled, and which view mode is showing. Each accepted
 * command mutates that state and then renders exactly one frame, so the
 * frame handed back always matches the state.
 */

import {
  CommandType,
  ViewMode,
  isOverlayMode,
  isSlideChangingCommand,
  isToggleCommand,
  type Command,
  type Frame,
  type HorizontalAlign,
  type Viewport,
} from '@termslides/shared';
import type { Deck } from './deck.js';
import { HELP_LINES } from './help.js';
import { clampScroll, followCursor } from './layout.js';
import { notesLines, renderFrame, type OverlayState, type RenderRequest, type Renderer } from './renderer.js';

const TOGGLE_TARGETS = {
  [CommandType.TOGGLE_NOTES]: ViewMode.NOTES,
  [CommandType.TOGGLE_INDEX]: ViewMode.INDEX,
  [CommandType.TOGGLE_HELP]: ViewMode.HELP,
} as const;

export type DispatchOutcome = 'ok' | 'invalid-target' | 'quit' | 'ignored';

export interface DispatchResult {
  outcome: DispatchOutcome;
  frame: Frame;
  /** Set for invalid-target: what went wrong, as shown in the status line */
  message?: string;
}

/** Snapshot of the controller's state, for tests and logging. */
export interface ViewState {
  currentIndex: number | null;
  scrollOffset: number;
  mode: ViewMode;
  overlay: OverlayState;
  status?: string;
  closed: boolean;
}

export interface ControllerOptions {
  /** Lines moved per scroll command */
  scrollStep?: number;
  align?: HorizontalAlign;
  /** Replaces the default renderer (tests count calls through this) */
  renderer?: Renderer;
}

/** What the controller needs from the session: the deck, read-only. */
export interface DeckSource {
  readonly deck: Deck;
}

export class PresenterController {
  private readonly deck: Deck;
  private readonly render: Renderer;
  private readonly scrollStep: number;
  private readonly align: HorizontalAlign;

  private viewport: Viewport;
  private currentIndex: number | null;
  private scrollOffset = 0;
  private mode: ViewMode = ViewMode.NORMAL;
  private overlay: OverlayState = { scroll: 0, cursor: 0 };
  private status: string | undefined;
  private closed = false;
  private frame: Frame;

  constructor(session: DeckSource, viewport: Viewport, options: ControllerOptions = {}) {
    this.deck = session.deck;
    this.viewport = { ...viewport };
    this.render = options.renderer ?? renderFrame;
    this.scrollStep = Math.max(1, options.scrollStep ?? 1);
    this.align = options.align ?? 'center';
    this.currentIndex = this.deck.count > 0 ? 0 : null;
    this.frame = this.redraw();
  }

  /**
   * The most recently rendered frame.
   */
  get currentFrame(): Frame {
    return this.frame;
  }

  get state(): ViewState {
    const snapshot: ViewState = {
      currentIndex: this.currentIndex,
      scrollOffset: this.scrollOffset,
      mode: this.mode,
      overlay: { ...this.overlay },
      closed: this.closed,
    };
    if (this.status !== undefined) snapshot.status = this.status;
    return snapshot;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Apply one command and render the resulting frame.
   * After `quit`, commands are ignored and nothing is rendered.
   */
  dispatch(command: Command): DispatchResult {
    if (this.closed) {
      return { outcome: 'ignored', frame: this.frame };
    }

    // Status messages last until the next command
    this.status = undefined;

    let outcome: DispatchOutcome = 'ok';
    let message: string | undefined;

    if (this.currentIndex === null && isSlideChangingCommand(command)) {
      if (command.type === CommandType.GOTO) {
        message = `No slide ${command.target} (deck is empty)`;
        outcome = 'invalid-target';
        this.status = message;
      }
    } else {
      switch (command.type) {
        case CommandType.NEXT:
          this.step(1);
          break;
        case CommandType.PREV:
          this.step(-1);
          break;
        case CommandType.SCROLL_DOWN:
          this.scroll(this.scrollStep);
          break;
        case CommandType.SCROLL_UP:
          this.scroll(-this.scrollStep);
          break;
        case CommandType.GOTO:
          if (this.isValidTarget(command.target)) {
            this.moveTo(command.target - 1);
            this.setMode(ViewMode.NORMAL);
          } else {
            message = `No slide ${command.target} (1-${this.deck.count})`;
            outcome = 'invalid-target';
            this.status = message;
          }
          break;
        case CommandType.FIRST:
          this.jump(0);
          break;
        case CommandType.LAST:
          this.jump(this.deck.count - 1);
          break;
        case CommandType.TOGGLE_NOTES:
        case CommandType.TOGGLE_INDEX:
        case CommandType.TOGGLE_HELP:
          this.toggle(command);
          break;
        case CommandType.RESIZE:
          this.resize({ width: command.width, height: command.height });
          break;
        case CommandType.REFRESH:
          break;
        case CommandType.QUIT:
          this.closed = true;
          outcome = 'quit';
          break;
        case CommandType.SELECT:
          if (this.mode === ViewMode.INDEX) {
            this.moveTo(this.overlay.cursor);
            this.setMode(ViewMode.NORMAL);
          }
          break;
        case CommandType.CANCEL:
          if (isOverlayMode(this.mode)) this.setMode(ViewMode.NORMAL);
          break;
        case CommandType.PROMPT:
          this.status = command.text ?? undefined;
          break;
      }
    }

    this.frame = this.redraw();
    const result: DispatchResult = { outcome, frame: this.frame };
    if (message !== undefined) result.message = message;
    return result;
  }

  private isValidTarget(target: number): boolean {
    return Number.isInteger(target) && target >= 1 && target <= this.deck.count;
  }

  private lastIndex(): number {
    return this.deck.count - 1;
  }

  /**
   * Change the current slide. Scroll always restarts at the top; so does the
   * notes overlay, which belongs to the slide it was opened on.
   */
  private moveTo(index: number): void {
    const target = Math.min(Math.max(0, index), this.lastIndex());
    if (target !== this.currentIndex) {
      this.currentIndex = target;
      this.scrollOffset = 0;
      if (this.mode === ViewMode.NOTES) this.overlay.scroll = 0;
    }
  }

  private step(delta: number): void {
    switch (this.mode) {
      case ViewMode.NORMAL:
      case ViewMode.NOTES:
        if (this.currentIndex !== null) this.moveTo(this.currentIndex + delta);
        break;
      case ViewMode.INDEX:
        this.moveCursor(this.overlay.cursor + delta);
        break;
      case ViewMode.HELP:
        break;
    }
  }

  private jump(index: number): void {
    this.moveTo(index);
    if (this.mode === ViewMode.INDEX) this.moveCursor(index);
  }

  private scroll(delta: number): void {
    switch (this.mode) {
      case ViewMode.NORMAL:
        this.scrollOffset = clampScroll(this.scrollOffset + delta, this.bodyLineCount(), this.viewport);
        break;
      case ViewMode.NOTES:
      case ViewMode.HELP:
        this.overlay.scroll = clampScroll(this.overlay.scroll + delta, this.overlayLineCount(), this.viewport);
        break;
      case ViewMode.INDEX:
        this.moveCursor(this.overlay.cursor + Math.sign(delta));
        break;
    }
  }

  private moveCursor(cursor: number): void {
    const count = this.deck.count;
    if (count === 0) return;
    this.overlay.cursor = Math.min(Math.max(0, cursor), count - 1);
    this.overlay.scroll = followCursor(this.overlay.cursor, this.overlay.scroll, count, this.viewport);
  }

  private toggle(command: Command): void {
    if (!isToggleCommand(command)) return;
    const target = TOGGLE_TARGETS[command.type];
    this.setMode(this.mode === target ? ViewMode.NORMAL : target);
  }

  /**
   * Switch view mode. The overlay state starts fresh on every switch; the
   * index overlay opens with the current slide highlighted.
   */
  private setMode(mode: ViewMode): void {
    if (mode === this.mode) return;
    this.mode = mode;
    this.overlay = { scroll: 0, cursor: 0 };
    if (mode === ViewMode.INDEX && this.currentIndex !== null) {
      this.moveCursor(this.currentIndex);
    }
  }

  private resize(viewport: Viewport): void {
    this.viewport = { width: Math.max(0, viewport.width), height: Math.max(0, viewport.height) };
    this.scrollOffset = clampScroll(this.scrollOffset, this.bodyLineCount(), this.viewport);
    if (this.mode === ViewMode.INDEX) {
      this.overlay.scroll = followCursor(this.overlay.cursor, this.overlay.scroll, this.deck.count, this.viewport);
    } else {
      this.overlay.scroll = clampScroll(this.overlay.scroll, this.overlayLineCount(), this.viewport);
    }
  }

  private bodyLineCount(): number {
    return this.currentIndex === null ? 0 : this.deck.slideAt(this.currentIndex).bodyLines.length;
  }

  private overlayLineCount(): number {
    switch (this.mode) {
      case ViewMode.NOTES:
        return this.currentIndex === null ? 0 : notesLines(this.deck.slideAt(this.currentIndex)).length;
      case ViewMode.HELP:
        return HELP_LINES.length;
      case ViewMode.INDEX:
        return this.deck.count;
      case ViewMode.NORMAL:
        return 0;
    }
  }

  private redraw(): Frame {
    const request: RenderRequest = {
      deck: this.deck,
      currentIndex: this.currentIndex,
      viewport: this.viewport,
      scrollOffset: this.scrollOffset,
      mode: this.mode,
      overlay: { ...this.overlay },
      align: this.align,
    };
    if (this.status !== undefined) request.status = this.status;
    return this.render(request);
  }
}
