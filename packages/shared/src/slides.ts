/**
 * Slide model and rendered frame types shared by the presenter packages.
 */

/**
 * One parsed slide. `bodyLines` holds pre-formatted terminal rows and is
 * frozen once parsed.
 */
export interface Slide {
  /** 1-based position in the deck */
  index: number;
  title: string;
  bodyLines: readonly string[];
  /** Speaker-only text; empty string when the slide has none */
  notes: string;
  /** Identifying name of the source document (usually the file name) */
  source: string;
  /** Number written in the title heading, if any. Informational only. */
  declaredNumber?: number;
}

/** `(index, title)` pair listed by the index overlay. */
export interface DeckEntry {
  index: number;
  title: string;
}

export const ViewMode = {
  NORMAL: 'normal',
  NOTES: 'notes',
  INDEX: 'index',
  HELP: 'help',
} as const;

export type ViewMode = (typeof ViewMode)[keyof typeof ViewMode];

/** Overlay modes sit on top of the current slide without replacing it. */
export function isOverlayMode(mode: ViewMode): mode is Exclude<ViewMode, 'normal'> {
  return mode !== ViewMode.NORMAL;
}

export interface Viewport {
  width: number;
  height: number;
}

export type HorizontalAlign = 'left' | 'center';

/**
 * What a frame line is, so the terminal writer can style it without
 * parsing the text.
 */
export type LineRole = 'header' | 'body' | 'footer' | 'highlight' | 'notes' | 'blank';

/**
 * A rendered frame: exactly `height` lines, each exactly `width` display
 * columns wide, with one role per line.
 */
export interface Frame {
  lines: string[];
  roles: LineRole[];
}
