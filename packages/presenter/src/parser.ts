/**
 * Slide parser - turns one Markdown slide document into a Slide.
 *
 * A slide document looks like:
 *
 *   # 03. Architecture
 *   ```
 *   ┌──────────┐
 *   │  boxes   │
 *   └──────────┘
 *   ```
 *   ## Speaker Notes
 *   Talk about the boxes.
 *
 * Only three regions matter: the first heading (title), the first fenced
 * block (body) and everything after the speaker-notes heading (notes).
 * Anything else is commentary and ignored.
 */

import { SlideParseError, expandTabs, type Slide } from '@termslides/shared';

export const DEFAULT_NOTES_HEADING = 'Speaker Notes';

export interface ParseOptions {
  /** Name of the document, used in errors and kept on the slide */
  source?: string;
  /** Heading text that starts the notes section (case-insensitive) */
  notesHeading?: string;
}

const HEADING_RE = /^#{1,6}\s+(.*?)\s*$/;
const FENCE_OPEN_RE = /^\s*(`{3,}|~{3,})/;
// "03. Title", "3) Title", "Slide 3: Title", "Slide 3 - Title"; not "404: Not Found"
const NUMBER_LABEL_RE = /^(?:slide\s+(\d+)(?:\s*[.:)]|\s+[-–—])|(\d+)[.)])\s+(.+)$/i;

interface Fence {
  char: string;
  length: number;
}

function splitLines(text: string): string[] {
  const lines = text
    .split('\n')
    .map((line) => expandTabs(line.endsWith('\r') ? line.slice(0, -1) : line));
  // A trailing terminator does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === '' && text.endsWith('\n')) {
    lines.pop();
  }
  return lines;
}

function isNotesHeading(line: string, notesHeading: string): boolean {
  const match = HEADING_RE.exec(line);
  return match !== null && match[1].toLowerCase() === notesHeading.toLowerCase();
}

function closesFence(line: string, fence: Fence): boolean {
  const trimmed = line.trim();
  if (trimmed.length < fence.length) return false;
  for (const ch of trimmed) {
    if (ch !== fence.char) return false;
  }
  return true;
}

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end);
}

/**
 * Split a leading slide number off a heading: "03. Intro" -> (3, "Intro").
 */
export function splitTitleLabel(heading: string): { title: string; declaredNumber?: number } {
  const match = NUMBER_LABEL_RE.exec(heading);
  if (!match) return { title: heading };
  return { title: match[3].trim(), declaredNumber: parseInt(match[1] ?? match[2], 10) };
}

/** Raw regions of a slide document, before they become a Slide. */
export interface SlideScan {
  heading?: string;
  body: string[] | null;
  /** 1-based line number of the first body line in the document */
  bodyStartLine: number;
  notes: string;
}

/**
 * Locate the title heading, first fenced block and notes of a document.
 * Only a notes heading outside fences starts the notes, so an unclosed
 * fence runs to the end of the document.
 */
export function scanSlide(text: string, notesHeading: string = DEFAULT_NOTES_HEADING): SlideScan {
  const lines = splitLines(text);

  let heading: string | undefined;
  let body: string[] | null = null;
  let bodyStartLine = 0;
  let notes = '';
  let fence: Fence | null = null;
  let collecting = false;

  for (const [i, line] of lines.entries()) {
    if (fence) {
      if (closesFence(line, fence)) {
        fence = null;
        collecting = false;
      } else if (collecting && body) {
        body.push(line);
      }
      continue;
    }

    if (isNotesHeading(line, notesHeading)) {
      notes = trimBlankLines(lines.slice(i + 1)).join('\n');
      break;
    }

    const open = FENCE_OPEN_RE.exec(line);
    if (open) {
      fence = { char: open[1][0], length: open[1].length };
      if (body === null) {
        body = [];
        bodyStartLine = i + 2;
        collecting = true;
      }
      continue;
    }

    if (heading === undefined) {
      const match = HEADING_RE.exec(line);
      if (match && match[1] !== '') heading = match[1];
    }
  }

  return { heading, body, bodyStartLine, notes };
}

/**
 * Parse a slide document. `expectedIndex` (the document's 1-based position
 * in load order) always wins over any number written in the heading.
 *
 * @throws SlideParseError when no title heading is found
 */
export function parseSlide(text: string, expectedIndex: number, options: ParseOptions = {}): Slide {
  const source = options.source ?? `slide ${expectedIndex}`;
  const scan = scanSlide(text, options.notesHeading);

  if (scan.heading === undefined) {
    throw new SlideParseError(source, 'missing title heading');
  }

  const { title, declaredNumber } = splitTitleLabel(scan.heading);
  const slide: Slide = {
    index: expectedIndex,
    title,
    bodyLines: Object.freeze(scan.body ?? []),
    notes: scan.notes,
    source,
  };
  if (declaredNumber !== undefined) slide.declaredNumber = declaredNumber;
  return Object.freeze(slide);
}
