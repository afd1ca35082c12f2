/**
 * Frame geometry shared by the renderer and the controller, so both agree
 * on how many rows the body gets and how far a list may scroll.
 */

import type { Viewport } from '@termslides/shared';

export const HEADER_ROWS = 1;
export const FOOTER_ROWS = 1;
export const CHROME_ROWS = HEADER_ROWS + FOOTER_ROWS;

/** Below this the renderer shows a "too small" frame instead of a slide. */
export const MIN_WIDTH = 16;
export const MIN_HEIGHT = CHROME_ROWS + 1;

/**
 * Rows between header and footer.
 */
export function bodyRows(viewport: Viewport): number {
  return Math.max(0, viewport.height - CHROME_ROWS);
}

export function maxScroll(lineCount: number, viewport: Viewport): number {
  return Math.max(0, lineCount - bodyRows(viewport));
}

export function clampScroll(offset: number, lineCount: number, viewport: Viewport): number {
  return Math.min(Math.max(0, offset), maxScroll(lineCount, viewport));
}

/**
 * Scroll a list window just enough to keep `cursor` visible.
 */
export function followCursor(cursor: number, scroll: number, itemCount: number, viewport: Viewport): number {
  const rows = bodyRows(viewport);
  let next = scroll;
  if (cursor < next) next = cursor;
  if (rows > 0 && cursor >= next + rows) next = cursor - rows + 1;
  return clampScroll(next, itemCount, viewport);
}

export function isTooSmall(viewport: Viewport): boolean {
  return viewport.width < MIN_WIDTH || viewport.height < MIN_HEIGHT;
}
