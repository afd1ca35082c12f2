/**
 * Deck - the ordered, read-only collection of slides for one presentation.
 */

import {
  DeckError,
  SlideIndexError,
  SlideParseError,
  type DeckEntry,
  type Slide,
} from '@termslides/shared';
import { parseSlide } from './parser.js';

/** A slide source document; `name` is its sort key (the file name). */
export interface SlideDocument {
  name: string;
  text: string;
}

/** What to do with a document that fails to parse. */
export type InvalidSlidePolicy = 'skip' | 'abort';

export interface BuildDeckOptions {
  invalidSlides?: InvalidSlidePolicy;
  /** Fail with DeckError instead of returning an empty deck */
  requireSlides?: boolean;
  notesHeading?: string;
}

export interface SkippedDocument {
  source: string;
  reason: string;
}

export interface DeckBuildResult {
  deck: Deck;
  skipped: SkippedDocument[];
}

export class Deck {
  private readonly items: readonly Slide[];

  constructor(slides: readonly Slide[]) {
    slides.forEach((slide, i) => {
      if (slide.index !== i + 1) {
        throw new DeckError(`Slide "${slide.title}" has index ${slide.index}, expected ${i + 1}`);
      }
    });
    this.items = Object.freeze([...slides]);
  }

  static empty(): Deck {
    return new Deck([]);
  }

  get count(): number {
    return this.items.length;
  }

  get slides(): readonly Slide[] {
    return this.items;
  }

  /**
   * Slide at a 0-based position.
   *
   * @throws SlideIndexError when `i` is outside `[0, count - 1]`
   */
  slideAt(i: number): Slide {
    if (!Number.isInteger(i) || i < 0 || i >= this.items.length) {
      throw new SlideIndexError(i, this.items.length);
    }
    return this.items[i];
  }

  /**
   * Lazily yield `(index, title)` pairs in deck order.
   */
  *entries(): Generator<DeckEntry> {
    for (const slide of this.items) {
      yield { index: slide.index, title: slide.title };
    }
  }
}

/**
 * Build a deck from documents already sorted by name.
 *
 * Under the `skip` policy, unparseable documents are reported in `skipped`
 * and the remaining slides are numbered contiguously. Under `abort`, the
 * first SlideParseError propagates.
 */
export function buildDeck(documents: readonly SlideDocument[], options: BuildDeckOptions = {}): DeckBuildResult {
  const policy = options.invalidSlides ?? 'skip';
  const slides: Slide[] = [];
  const skipped: SkippedDocument[] = [];

  for (const doc of documents) {
    try {
      slides.push(parseSlide(doc.text, slides.length + 1, { source: doc.name, notesHeading: options.notesHeading }));
    } catch (err) {
      if (policy === 'abort' || !(err instanceof SlideParseError)) {
        throw err;
      }
      skipped.push({ source: doc.name, reason: err.message });
    }
  }

  for (const slide of slides) {
    if (slide.declaredNumber !== undefined && slide.declaredNumber !== slide.index) {
      console.warn(
        `[Deck] ${slide.source}: heading says slide ${slide.declaredNumber}, presenting as slide ${slide.index}`
      );
    }
  }

  if (slides.length === 0 && options.requireSlides) {
    const detail = documents.length === 0
      ? 'no slide documents found'
      : `none of ${documents.length} slide document(s) could be parsed`;
    throw new DeckError(`Cannot start presentation: ${detail}`);
  }

  return { deck: new Deck(slides), skipped };
}
