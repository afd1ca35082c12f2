/**
 * Terminal input - raw-mode stdin and resize notifications, merged into a
 * single queue of input events for the presenter loop.
 */

import { AsyncQueue } from '../async-queue.js';

export type InputEvent =
  | { kind: 'keys'; data: string }
  | { kind: 'resize'; width: number; height: number };

/** The parts of process.stdin used here. */
export interface KeyInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (chunk: string) => void): unknown;
  off(event: 'data', listener: (chunk: string) => void): unknown;
}

/** The parts of process.stdout used here. */
export interface ResizeSource {
  columns?: number;
  rows?: number;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

export interface TerminalInput {
  events: AsyncQueue<InputEvent>;
  /** Stop listening, leave raw mode and end the event stream. */
  detach(): void;
}

export function attachTerminalInput(stdin: KeyInput, stdout: ResizeSource): TerminalInput {
  const events = new AsyncQueue<InputEvent>();

  const onData = (chunk: string) => {
    events.push({ kind: 'keys', data: chunk });
  };
  const onResize = () => {
    if (stdout.columns && stdout.rows) {
      events.push({ kind: 'resize', width: stdout.columns, height: stdout.rows });
    }
  };

  if (stdin.isTTY && stdin.setRawMode) stdin.setRawMode(true);
  stdin.setEncoding('utf8');
  stdin.on('data', onData);
  stdout.on('resize', onResize);
  stdin.resume();

  let detached = false;
  return {
    events,
    detach() {
      if (detached) return;
      detached = true;
      stdin.off('data', onData);
      stdout.off('resize', onResize);
      if (stdin.isTTY && stdin.setRawMode) stdin.setRawMode(false);
      stdin.pause();
      events.close();
    },
  };
}
