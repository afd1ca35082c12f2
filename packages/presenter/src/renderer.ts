/**
 * Viewport renderer - turns presenter state into the exact lines to draw.
 *
 * Pure: the same request always yields the same frame. Every frame has
 * exactly `viewport.height` lines, each exactly `viewport.width` columns,
 * laid out as header / body window / footer so the footer stays on the last
 * row whatever the slide's length.
 */

import {
  ViewMode,
  displayWidth,
  fitToWidth,
  padToWidth,
  truncateToWidth,
  type Frame,
  type HorizontalAlign,
  type LineRole,
  type Slide,
  type Viewport,
} from '@termslides/shared';
import type { Deck } from './deck.js';
import { HELP_LINES } from './help.js';
import { bodyRows, clampScroll, isTooSmall, maxScroll } from './layout.js';

/** Per-overlay state: its own scroll baseline, and the index highlight. */
export interface OverlayState {
  scroll: number;
  cursor: number;
}

export interface RenderRequest {
  deck: Deck;
  /** 0-based, or null when the deck is empty */
  currentIndex: number | null;
  viewport: Viewport;
  scrollOffset: number;
  mode: ViewMode;
  overlay: OverlayState;
  /** Transient status text; replaces the left side of the footer */
  status?: string;
  align?: HorizontalAlign;
}

export type Renderer = (request: RenderRequest) => Frame;

export const MORE_ABOVE = '▲ more above';
export const MORE_BELOW = '▼ more below';

const HINTS = {
  normal: '[n]ext [p]rev [s]notes [i]ndex [h]elp [q]uit',
  scroll: '[j/k]scroll [n]ext [p]rev [s]notes [q]uit',
  notes: '[j/k]scroll [n/p]slide [s]back',
  index: '[j/k]move [enter]open [esc]back',
  help: '[h/esc]back',
  empty: '[h]elp [q]uit',
} as const;

class FrameBuilder {
  readonly lines: string[] = [];
  readonly roles: LineRole[] = [];

  constructor(private readonly width: number) {}

  push(text: string, role: LineRole): void {
    this.lines.push(fitToWidth(text, this.width));
    this.roles.push(role);
  }

  bar(left: string, right: string, role: LineRole): void {
    this.lines.push(composeBar(left, right, this.width));
    this.roles.push(role);
  }

  padTo(rows: number): void {
    while (this.lines.length < rows) {
      this.push('', 'blank');
    }
  }

  build(): Frame {
    return { lines: this.lines, roles: this.roles };
  }
}

/**
 * Left text, right text flush against the right edge. The right side wins
 * when space runs out; the left side is cut with a marker.
 */
export function composeBar(left: string, right: string, width: number): string {
  if (!right) return fitToWidth(left, width);
  const rightWidth = displayWidth(right);
  const room = width - rightWidth - 1;
  if (room < 4) return fitToWidth(left, width);
  return padToWidth(truncateToWidth(left, room), width - rightWidth) + right;
}

/**
 * Left padding that centres a block of lines by its widest line. Zero when
 * the block is as wide as the viewport or wider.
 */
export function centerIndent(lines: readonly string[], width: number): number {
  let widest = 0;
  for (const line of lines) {
    widest = Math.max(widest, displayWidth(line));
  }
  return widest >= width ? 0 : Math.floor((width - widest) / 2);
}

/** Notes split into display rows; empty notes have no rows. */
export function notesLines(slide: Slide): string[] {
  return slide.notes ? slide.notes.split('\n') : [];
}

function scrollMark(offset: number, lineCount: number, viewport: Viewport): string {
  return lineCount > bodyRows(viewport) ? ` ↕${offset + 1}/${maxScroll(lineCount, viewport) + 1}` : '';
}

function pushWindow(
  frame: FrameBuilder,
  lines: readonly string[],
  offset: number,
  viewport: Viewport,
  indent: number,
  role: LineRole
): void {
  const margin = ' '.repeat(indent);
  for (const line of lines.slice(offset, offset + bodyRows(viewport))) {
    frame.push(margin + truncateToWidth(line, viewport.width - indent), role);
  }
}

function renderTooSmall(viewport: Viewport): Frame {
  const frame = new FrameBuilder(Math.max(0, viewport.width));
  if (viewport.height <= 0) return frame.build();
  frame.push('Terminal too small', 'body');
  frame.padTo(viewport.height);
  return frame.build();
}

function renderEmpty(request: RenderRequest): Frame {
  const { viewport } = request;
  const frame = new FrameBuilder(viewport.width);
  frame.bar(' No slides loaded', '', 'header');
  frame.push(' Add .md slide files to the slides directory.', 'body');
  frame.padTo(viewport.height - 1);
  frame.bar(request.status !== undefined ? ` ${request.status}` : ' 0/0', `${HINTS.empty} `, 'footer');
  return frame.build();
}

function renderSlide(request: RenderRequest, slide: Slide): Frame {
  const { deck, viewport } = request;
  const frame = new FrameBuilder(viewport.width);
  const total = slide.bodyLines.length;
  const offset = clampScroll(request.scrollOffset, total, viewport);
  const scrollable = total > bodyRows(viewport);
  const moreBelow = offset + bodyRows(viewport) < total;
  const position = `${slide.index}/${deck.count}`;

  frame.bar(` [${position}] ${slide.title}`, offset > 0 ? `${MORE_ABOVE} ` : '', 'header');

  const indent = request.align === 'left' ? 0 : centerIndent(slide.bodyLines, viewport.width);
  pushWindow(frame, slide.bodyLines, offset, viewport, indent, 'body');
  frame.padTo(viewport.height - 1);

  const left = request.status !== undefined
    ? ` ${request.status}`
    : ` ${position}${scrollMark(offset, total, viewport)}${moreBelow ? `  ${MORE_BELOW}` : ''}`;
  frame.bar(left, `${scrollable ? HINTS.scroll : HINTS.normal} `, 'footer');
  return frame.build();
}

function renderNotes(request: RenderRequest, slide: Slide): Frame {
  const { deck, viewport } = request;
  const frame = new FrameBuilder(viewport.width);
  const lines = notesLines(slide);
  const offset = clampScroll(request.overlay.scroll, lines.length, viewport);
  const moreBelow = offset + bodyRows(viewport) < lines.length;
  const position = `${slide.index}/${deck.count}`;

  frame.bar(` [${position}] ${slide.title}`, 'SPEAKER NOTES ', 'header');
  if (lines.length === 0) {
    frame.push(' (No speaker notes)', 'notes');
  } else {
    pushWindow(frame, lines, offset, viewport, 1, 'notes');
  }
  frame.padTo(viewport.height - 1);

  const left = request.status !== undefined
    ? ` ${request.status}`
    : ` ${position} notes${scrollMark(offset, lines.length, viewport)}${moreBelow ? `  ${MORE_BELOW}` : ''}`;
  frame.bar(left, `${HINTS.notes} `, 'footer');
  return frame.build();
}

function renderIndex(request: RenderRequest): Frame {
  const { deck, viewport } = request;
  const frame = new FrameBuilder(viewport.width);
  const count = deck.count;
  const cursor = Math.min(Math.max(0, request.overlay.cursor), Math.max(0, count - 1));
  const offset = clampScroll(request.overlay.scroll, count, viewport);
  const numberWidth = Math.max(2, String(count).length);

  frame.bar(' SLIDE INDEX', `${count} slide${count === 1 ? '' : 's'} `, 'header');
  if (count === 0) {
    frame.push(' (no slides)', 'body');
  }

  let row = 0;
  for (const entry of request.deck.entries()) {
    const position = entry.index - 1;
    if (position < offset) continue;
    if (row >= bodyRows(viewport)) break;
    const selected = position === cursor;
    const marker = selected ? '▶' : ' ';
    frame.push(` ${marker} ${String(entry.index).padStart(numberWidth)}. ${entry.title}`, selected ? 'highlight' : 'body');
    row++;
  }
  frame.padTo(viewport.height - 1);

  const left = request.status !== undefined
    ? ` ${request.status}`
    : ` ${count === 0 ? 0 : cursor + 1}/${count}`;
  frame.bar(left, `${HINTS.index} `, 'footer');
  return frame.build();
}

function renderHelp(request: RenderRequest): Frame {
  const { viewport } = request;
  const frame = new FrameBuilder(viewport.width);
  const offset = clampScroll(request.overlay.scroll, HELP_LINES.length, viewport);

  frame.bar(' HELP', '', 'header');
  pushWindow(frame, HELP_LINES, offset, viewport, centerIndent(HELP_LINES, viewport.width), 'body');
  frame.padTo(viewport.height - 1);

  const left = request.status !== undefined
    ? ` ${request.status}`
    : scrollMark(offset, HELP_LINES.length, viewport);
  frame.bar(left, `${HINTS.help} `, 'footer');
  return frame.build();
}

/**
 * Render one frame for the given presenter state.
 */
export function renderFrame(request: RenderRequest): Frame {
  const { viewport } = request;
  if (isTooSmall(viewport)) return renderTooSmall(viewport);

  switch (request.mode) {
    case ViewMode.HELP:
      return renderHelp(request);
    case ViewMode.INDEX:
      return renderIndex(request);
    case ViewMode.NOTES:
      if (request.currentIndex === null) return renderEmpty(request);
      return renderNotes(request, request.deck.slideAt(request.currentIndex));
    case ViewMode.NORMAL:
      if (request.currentIndex === null) return renderEmpty(request);
      return renderSlide(request, request.deck.slideAt(request.currentIndex));
  }
}
