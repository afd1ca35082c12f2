/**
 * Terminal screen - writes frames to a TTY.
 *
 * Uses the alternate screen buffer and a hidden cursor for the lifetime of
 * the presentation, and addresses every row absolutely so a frame never
 * depends on what was drawn before it.
 */

import type { Frame, LineRole, Viewport } from '@termslides/shared';

const ESC = '\x1b';
const CSI = `${ESC}[`;

export const ANSI = {
  clear: `${CSI}2J`,
  home: `${CSI}H`,
  pos: (row: number, col: number) => `${CSI}${row};${col}H`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  altOn: `${CSI}?1049h`,
  altOff: `${CSI}?1049l`,
  reset: `${CSI}0m`,
  dim: `${CSI}2m`,
  inverse: `${CSI}7m`,
} as const;

const ROLE_STYLE: Record<LineRole, string> = {
  header: ANSI.inverse,
  footer: ANSI.inverse,
  highlight: ANSI.inverse,
  notes: ANSI.dim,
  body: '',
  blank: '',
};

/** Fallback when the output is not a TTY or reports no size. */
export const DEFAULT_VIEWPORT: Viewport = { width: 80, height: 24 };

/** The slice of a WriteStream the screen needs. */
export interface ScreenOutput {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
}

/** Where the presenter loop draws frames. */
export interface Screen {
  size(): Viewport;
  draw(frame: Frame): void;
}

/**
 * Serialize a frame into one write: each row positioned absolutely, styled
 * by its role.
 */
export function encodeFrame(frame: Frame): string {
  let out = '';
  frame.lines.forEach((line, row) => {
    const style = ROLE_STYLE[frame.roles[row] ?? 'body'];
    out += ANSI.pos(row + 1, 1) + (style ? style + line + ANSI.reset : line);
  });
  return out;
}

export class TerminalScreen implements Screen {
  private opened = false;

  constructor(private readonly output: ScreenOutput) {}

  size(): Viewport {
    const { columns, rows } = this.output;
    return {
      width: columns && columns > 0 ? columns : DEFAULT_VIEWPORT.width,
      height: rows && rows > 0 ? rows : DEFAULT_VIEWPORT.height,
    };
  }

  open(): void {
    if (this.opened) return;
    this.opened = true;
    this.output.write(ANSI.altOn + ANSI.hideCursor + ANSI.clear);
  }

  draw(frame: Frame): void {
    this.output.write(encodeFrame(frame));
  }

  /**
   * Restore the terminal. Safe to call more than once.
   */
  close(): void {
    if (!this.opened) return;
    this.opened = false;
    this.output.write(ANSI.reset + ANSI.showCursor + ANSI.altOff);
  }
}
