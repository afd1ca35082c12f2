/**
 * Error types raised while loading and addressing a deck.
 */

/** A slide document that cannot be turned into a slide (no title heading). */
export class SlideParseError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'SlideParseError';
    this.source = source;
  }
}

/** The deck cannot be built at all, e.g. no usable slides when some are required. */
export class DeckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeckError';
  }
}

/** Out-of-range slide access. Navigation clamps, so only direct misuse reaches this. */
export class SlideIndexError extends RangeError {
  readonly index: number;
  readonly count: number;

  constructor(index: number, count: number) {
    super(
      count === 0
        ? `Slide index ${index} out of range (deck is empty)`
        : `Slide index ${index} out of range [0, ${count - 1}]`
    );
    this.name = 'SlideIndexError';
    this.index = index;
    this.count = count;
  }
}

/** Configuration file or flags failed validation. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
