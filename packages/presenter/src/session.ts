/**
 * Presenter session and run loop.
 *
 * A session is built once at startup and passed explicitly to everything
 * that needs the deck. The run loop is a plain read-decode-apply-render
 * cycle: wait for the next input event, decode it, dispatch each command,
 * draw each frame.
 */

import { Commands, type Command } from '@termslides/shared';
import type { PresenterConfig } from './config.js';
import { PresenterController, type DispatchResult } from './controller.js';
import { buildDeck, type Deck, type SkippedDocument, type SlideDocument } from './deck.js';
import type { InputEvent } from './terminal/input.js';
import { KeyDecoder, tokenizeKeys } from './terminal/key-decoder.js';
import type { Screen } from './terminal/screen.js';

export interface PresenterSession {
  readonly deck: Deck;
  readonly config: PresenterConfig;
  /** Documents left out under the skip policy */
  readonly skipped: readonly SkippedDocument[];
}

/**
 * Build the session's deck from documents sorted by name.
 *
 * @throws DeckError / SlideParseError according to the config's policies
 */
export function createSession(documents: readonly SlideDocument[], config: PresenterConfig): PresenterSession {
  const { deck, skipped } = buildDeck(documents, {
    invalidSlides: config.invalidSlides,
    requireSlides: config.requireSlides,
    notesHeading: config.notesHeading,
  });
  return { deck, config, skipped };
}

export interface RunOptions {
  /** Called after every dispatch; the CLI leaves it unset */
  onDispatch?: (command: Command, result: DispatchResult) => void;
}

export interface RunSummary {
  /** Commands dispatched, including the final quit */
  commands: number;
  /** 1-based slide showing when the loop ended, or null for an empty deck */
  lastSlide: number | null;
  quit: boolean;
}

/**
 * Present the session on `screen`, reading input from `events` until a quit
 * command or the end of the event stream.
 */
export async function runPresenter(
  session: PresenterSession,
  events: AsyncIterable<InputEvent>,
  screen: Screen,
  options: RunOptions = {}
): Promise<RunSummary> {
  const controller = new PresenterController(session, screen.size(), {
    scrollStep: session.config.scrollStep,
    align: session.config.align,
  });
  const decoder = new KeyDecoder();
  let dispatched = 0;

  const apply = (command: Command) => {
    const result = controller.dispatch(command);
    dispatched++;
    screen.draw(result.frame);
    options.onDispatch?.(command, result);
  };

  screen.draw(controller.currentFrame);

  for await (const event of events) {
    if (event.kind === 'resize') {
      apply(Commands.resize(event.width, event.height));
    } else {
      // Decode key by key: a key can change the mode the next one is read in
      for (const key of tokenizeKeys(event.data)) {
        const command = decoder.decodeKey(key, controller.state.mode);
        if (command) apply(command);
        if (controller.isClosed) break;
      }
    }

    if (controller.isClosed) break;
  }

  const { currentIndex } = controller.state;
  return {
    commands: dispatched,
    lastSlide: currentIndex === null ? null : currentIndex + 1,
    quit: controller.isClosed,
  };
}
