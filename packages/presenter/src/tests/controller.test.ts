/**
 * Tests for the navigation state machine: clamping, scroll reset, modes,
 * and exactly one render per accepted command.
 */
import { describe, it, expect, vi } from 'vitest';
import { Commands, ViewMode } from '@termslides/shared';
import { PresenterController } from '../controller.js';
import { Deck } from '../deck.js';
import { parseSlide } from '../parser.js';
import { renderFrame } from '../renderer.js';

const TALL = Array.from({ length: 10 }, (_, i) => `line ${i}`).join('\n');

function makeDeck(): Deck {
  return new Deck([
    parseSlide('# One\n```\na\n```', 1),
    parseSlide(`# Two\n\`\`\`\n${TALL}\n\`\`\``, 2),
    parseSlide('# Three\n## Speaker Notes\nfinal words', 3),
  ]);
}

const VIEWPORT = { width: 40, height: 6 };

function makeController(options: { scrollStep?: number } = {}) {
  const renderer = vi.fn(renderFrame);
  const controller = new PresenterController({ deck: makeDeck() }, VIEWPORT, { ...options, renderer });
  return { controller, renderer };
}

describe('PresenterController', () => {
  describe('navigation', () => {
    it('starts on the first slide in normal mode', () => {
      const { controller } = makeController();
      expect(controller.state).toEqual({
        currentIndex: 0,
        scrollOffset: 0,
        mode: ViewMode.NORMAL,
        overlay: { scroll: 0, cursor: 0 },
        closed: false,
      });
    });

    it('clamps next at the last slide and prev at the first', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.prev());
      expect(controller.state.currentIndex).toBe(0);

      controller.dispatch(Commands.next());
      controller.dispatch(Commands.next());
      const result = controller.dispatch(Commands.next());
      expect(result.outcome).toBe('ok');
      expect(controller.state.currentIndex).toBe(2);
    });

    it('jumps to first and last', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.last());
      expect(controller.state.currentIndex).toBe(2);
      controller.dispatch(Commands.first());
      expect(controller.state.currentIndex).toBe(0);
    });

    it('goes to a 1-based slide number', () => {
      const { controller } = makeController();
      const result = controller.dispatch(Commands.goto(3));
      expect(result.outcome).toBe('ok');
      expect(controller.state.currentIndex).toBe(2);
    });

    it('rejects an out-of-range goto without moving and shows why', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.next());

      const result = controller.dispatch(Commands.goto(0));
      expect(result.outcome).toBe('invalid-target');
      expect(result.message).toBe('No slide 0 (1-3)');
      expect(controller.state.currentIndex).toBe(1);
      expect(controller.state.status).toBe('No slide 0 (1-3)');

      expect(controller.dispatch(Commands.goto(4)).outcome).toBe('invalid-target');
      expect(controller.dispatch(Commands.goto(2.5)).outcome).toBe('invalid-target');
    });

    it('clears the status on the next command', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.goto(9));
      controller.dispatch(Commands.refresh());
      expect(controller.state.status).toBeUndefined();
    });

    it('lands goto(n) on the same slide as first plus n-1 nexts', () => {
      for (let n = 1; n <= 3; n++) {
        const { controller: direct } = makeController();
        direct.dispatch(Commands.goto(n));

        const { controller: stepped } = makeController();
        stepped.dispatch(Commands.first());
        for (let i = 1; i < n; i++) stepped.dispatch(Commands.next());

        expect(direct.state.currentIndex).toBe(n - 1);
        expect(stepped.state.currentIndex).toBe(direct.state.currentIndex);
      }
    });
  });

  describe('scrolling', () => {
    it('scrolls within bounds and resets on slide change', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.goto(2));

      controller.dispatch(Commands.scrollDown());
      controller.dispatch(Commands.scrollDown());
      controller.dispatch(Commands.scrollDown());
      expect(controller.state.scrollOffset).toBe(3);

      for (let i = 0; i < 10; i++) controller.dispatch(Commands.scrollDown());
      expect(controller.state.scrollOffset).toBe(6);

      for (let i = 0; i < 10; i++) controller.dispatch(Commands.scrollUp());
      expect(controller.state.scrollOffset).toBe(0);

      controller.dispatch(Commands.scrollDown());
      controller.dispatch(Commands.next());
      expect(controller.state.scrollOffset).toBe(0);
    });

    it('does not scroll a slide that fits', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.scrollDown());
      expect(controller.state.scrollOffset).toBe(0);
    });

    it('moves by the configured scroll step', () => {
      const { controller } = makeController({ scrollStep: 3 });
      controller.dispatch(Commands.goto(2));
      controller.dispatch(Commands.scrollDown());
      expect(controller.state.scrollOffset).toBe(3);
    });

    it('re-clamps the scroll offset when the viewport grows', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.goto(2));
      for (let i = 0; i < 6; i++) controller.dispatch(Commands.scrollDown());
      expect(controller.state.scrollOffset).toBe(6);

      const result = controller.dispatch(Commands.resize(40, 20));
      expect(controller.state.scrollOffset).toBe(0);
      expect(result.frame.lines).toHaveLength(20);
    });
  });

  describe('modes', () => {
    it('toggles notes, index and help on and off', () => {
      const { controller } = makeController();

      controller.dispatch(Commands.toggleNotes());
      expect(controller.state.mode).toBe(ViewMode.NOTES);
      controller.dispatch(Commands.toggleNotes());
      expect(controller.state.mode).toBe(ViewMode.NORMAL);

      controller.dispatch(Commands.toggleHelp());
      expect(controller.state.mode).toBe(ViewMode.HELP);
      controller.dispatch(Commands.toggleIndex());
      expect(controller.state.mode).toBe(ViewMode.INDEX);
      controller.dispatch(Commands.cancel());
      expect(controller.state.mode).toBe(ViewMode.NORMAL);
    });

    it('keeps the slide scroll offset across a mode toggled twice', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.goto(2));
      controller.dispatch(Commands.scrollDown());
      controller.dispatch(Commands.scrollDown());

      for (const toggle of [Commands.toggleNotes, Commands.toggleIndex, Commands.toggleHelp]) {
        controller.dispatch(toggle());
        controller.dispatch(toggle());
        expect(controller.state.mode).toBe(ViewMode.NORMAL);
        expect(controller.state.scrollOffset).toBe(2);
      }
    });

    it('changes slides from the notes view and stays in it', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.toggleNotes());
      controller.dispatch(Commands.last());

      expect(controller.state.mode).toBe(ViewMode.NOTES);
      expect(controller.state.currentIndex).toBe(2);
      expect(controller.currentFrame.lines[1]).toBe(` final words${' '.repeat(28)}`);
    });

    it('opens the index on the current slide and selects with the cursor', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.next());
      controller.dispatch(Commands.toggleIndex());
      expect(controller.state.overlay.cursor).toBe(1);

      controller.dispatch(Commands.next());
      expect(controller.state.overlay.cursor).toBe(2);
      expect(controller.state.currentIndex).toBe(1);

      controller.dispatch(Commands.scrollUp());
      controller.dispatch(Commands.scrollUp());
      expect(controller.state.overlay.cursor).toBe(0);

      controller.dispatch(Commands.select());
      expect(controller.state.mode).toBe(ViewMode.NORMAL);
      expect(controller.state.currentIndex).toBe(0);
    });

    it('moves the index highlight along with first and last', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.toggleIndex());
      controller.dispatch(Commands.last());
      expect(controller.state.currentIndex).toBe(2);
      expect(controller.state.overlay.cursor).toBe(2);
    });

    it('returns to normal mode after a goto', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.toggleHelp());
      controller.dispatch(Commands.goto(2));
      expect(controller.state.mode).toBe(ViewMode.NORMAL);
    });

    it('ignores select outside the index', () => {
      const { controller } = makeController();
      controller.dispatch(Commands.select());
      expect(controller.state.currentIndex).toBe(0);
    });

    it('shows prompt text in the status line until cleared', () => {
      const { controller } = makeController();
      const result = controller.dispatch(Commands.prompt('Go to slide: 2'));
      expect(controller.state.status).toBe('Go to slide: 2');
      expect(result.frame.lines[5].trimEnd()).toBe(' Go to slide: 2');

      controller.dispatch(Commands.prompt(null));
      expect(controller.state.status).toBeUndefined();
    });
  });

  describe('rendering', () => {
    it('renders once at construction and once per command', () => {
      const { controller, renderer } = makeController();
      expect(renderer).toHaveBeenCalledTimes(1);

      controller.dispatch(Commands.next());
      controller.dispatch(Commands.goto(99));
      controller.dispatch(Commands.toggleIndex());
      expect(renderer).toHaveBeenCalledTimes(4);
    });

    it('returns the frame matching the new state', () => {
      const { controller } = makeController();
      const result = controller.dispatch(Commands.next());
      expect(result.frame).toBe(controller.currentFrame);
      expect(result.frame.lines[0].trimEnd()).toBe(' [2/3] Two');
    });

    it('stops rendering after quit', () => {
      const { controller, renderer } = makeController();
      expect(controller.dispatch(Commands.quit()).outcome).toBe('quit');
      expect(controller.isClosed).toBe(true);
      expect(renderer).toHaveBeenCalledTimes(2);

      expect(controller.dispatch(Commands.next()).outcome).toBe('ignored');
      expect(renderer).toHaveBeenCalledTimes(2);
      expect(controller.state.currentIndex).toBe(0);
    });
  });

  describe('empty deck', () => {
    it('treats slide changes as no-ops and rejects goto', () => {
      const controller = new PresenterController({ deck: Deck.empty() }, VIEWPORT);

      expect(controller.dispatch(Commands.next()).outcome).toBe('ok');
      expect(controller.state.currentIndex).toBeNull();

      const result = controller.dispatch(Commands.goto(1));
      expect(result.outcome).toBe('invalid-target');
      expect(result.message).toBe('No slide 1 (deck is empty)');
    });

    it('still opens help', () => {
      const controller = new PresenterController({ deck: Deck.empty() }, VIEWPORT);
      controller.dispatch(Commands.toggleHelp());
      expect(controller.state.mode).toBe(ViewMode.HELP);
    });
  });
});
