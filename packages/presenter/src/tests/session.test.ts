/**
 * Tests for the presenter run loop, replaying scripted input against a
 * screen that records frames.
 */
import { describe, it, expect, vi } from 'vitest';
import { CommandType, type Command, type Frame, type Viewport } from '@termslides/shared';
import { AsyncQueue } from '../async-queue.js';
import { parseConfig } from '../config.js';
import type { DispatchResult } from '../controller.js';
import type { SlideDocument } from '../deck.js';
import { createSession, runPresenter } from '../session.js';
import type { InputEvent } from '../terminal/input.js';
import type { Screen } from '../terminal/screen.js';

const DOCS: SlideDocument[] = [
  { name: '01.md', text: '# One\n```\na\n```' },
  { name: '02.md', text: '# Two\n```\nb\n```' },
  { name: '03.md', text: '# Three\n```\nc\n```' },
];

class RecordingScreen implements Screen {
  readonly frames: Frame[] = [];

  constructor(private readonly viewport: Viewport = { width: 40, height: 6 }) {}

  size(): Viewport {
    return this.viewport;
  }

  draw(frame: Frame): void {
    this.frames.push(frame);
  }
}

function script(...events: InputEvent[]): AsyncQueue<InputEvent> {
  const queue = new AsyncQueue<InputEvent>();
  for (const event of events) queue.push(event);
  queue.close();
  return queue;
}

const keys = (data: string): InputEvent => ({ kind: 'keys', data });

describe('createSession', () => {
  it('builds the deck with the configured policies', () => {
    const session = createSession([...DOCS, { name: '04.md', text: 'untitled' }], parseConfig({}));
    expect(session.deck.count).toBe(3);
    expect(session.skipped).toEqual([{ source: '04.md', reason: '04.md: missing title heading' }]);
  });

  it('aborts on an invalid document when configured to', () => {
    const config = parseConfig({ invalidSlides: 'abort' });
    expect(() => createSession([{ name: 'bad.md', text: 'untitled' }], config)).toThrow('bad.md: missing title heading');
  });
});

describe('runPresenter', () => {
  const session = createSession(DOCS, parseConfig({}));

  it('draws the initial frame and one frame per command', async () => {
    const screen = new RecordingScreen();
    const summary = await runPresenter(
      session,
      script(keys('nn'), { kind: 'resize', width: 50, height: 10 }, keys('q')),
      screen
    );

    expect(summary).toEqual({ commands: 4, lastSlide: 3, quit: true });
    expect(screen.frames).toHaveLength(5);
    expect(screen.frames[0].lines[0].trimEnd()).toBe(' [1/3] One');
    expect(screen.frames[3].lines).toHaveLength(10);
  });

  it('stops reading at quit, even mid-chunk', async () => {
    const onDispatch = vi.fn<(command: Command, result: DispatchResult) => void>();
    const summary = await runPresenter(session, script(keys('nqn'), keys('n')), new RecordingScreen(), { onDispatch });

    expect(summary).toEqual({ commands: 2, lastSlide: 2, quit: true });
    const types = onDispatch.mock.calls.map(([command]) => command.type);
    expect(types).toEqual([CommandType.NEXT, CommandType.QUIT]);
  });

  it('decodes each key in the mode the previous key left behind', async () => {
    const summary = await runPresenter(session, script(keys('ij\r')), new RecordingScreen());
    expect(summary).toEqual({ commands: 3, lastSlide: 2, quit: false });
  });

  it('ends without quitting when input runs out', async () => {
    const summary = await runPresenter(session, script(), new RecordingScreen());
    expect(summary).toEqual({ commands: 0, lastSlide: 1, quit: false });
  });

  it('navigates through the go-to prompt', async () => {
    const screen = new RecordingScreen();
    const summary = await runPresenter(session, script(keys('3'), keys('\r')), screen);

    expect(summary.lastSlide).toBe(3);
    expect(screen.frames[1].lines[5].trimEnd()).toBe(' Go to slide: 3');
  });
});
