/**
 * Key decoder - maps raw terminal input to presenter commands.
 *
 * A single stdin chunk can carry several keys (fast typing, paste, key
 * repeat), so chunks are first split into key tokens. The decoder keeps
 * one piece of state of its own: the digits typed into the "go to slide"
 * prompt.
 */

import { Commands, ViewMode, type Command } from '@termslides/shared';

export type KeyName =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'home'
  | 'end'
  | 'pageup'
  | 'pagedown'
  | 'enter'
  | 'backspace'
  | 'escape'
  | 'ctrl-c'
  | 'tab';

/** A named key, or the literal character typed. */
export type Key = { name: KeyName } | { char: string } | { unknown: string };

const ESC = '\x1b';

const SEQUENCES: Record<string, KeyName> = {
  '[A': 'up',
  '[B': 'down',
  '[C': 'right',
  '[D': 'left',
  '[H': 'home',
  '[F': 'end',
  '[1~': 'home',
  '[4~': 'end',
  '[7~': 'home',
  '[8~': 'end',
  '[5~': 'pageup',
  '[6~': 'pagedown',
  OA: 'up',
  OB: 'down',
  OC: 'right',
  OD: 'left',
  OH: 'home',
  OF: 'end',
};

const CONTROL: Record<string, KeyName> = {
  '\r': 'enter',
  '\n': 'enter',
  '\x7f': 'backspace',
  '\b': 'backspace',
  '\x03': 'ctrl-c',
  '\t': 'tab',
};

/**
 * Split a raw input chunk into keys. A lone ESC (not followed by `[` or `O`)
 * is the escape key.
 */
export function tokenizeKeys(data: string): Key[] {
  const keys: Key[] = [];
  const chars = Array.from(data);
  let i = 0;

  while (i < chars.length) {
    const ch = chars[i];

    if (ch === ESC) {
      const intro = chars[i + 1];
      if (intro !== '[' && intro !== 'O') {
        keys.push({ name: 'escape' });
        i++;
        continue;
      }
      // CSI / SS3: parameters, then a final byte in @..~
      let j = i + 2;
      while (j < chars.length && !/[@-~]/.test(chars[j])) j++;
      const body = chars.slice(i + 1, j + 1).join('');
      const name = SEQUENCES[body];
      keys.push(name ? { name } : { unknown: ESC + body });
      i = j + 1;
      continue;
    }

    // \r\n from some terminals is one Enter
    if (ch === '\r' && chars[i + 1] === '\n') {
      keys.push({ name: 'enter' });
      i += 2;
      continue;
    }

    const control = CONTROL[ch];
    keys.push(control ? { name: control } : { char: ch });
    i++;
  }

  return keys;
}

const PROMPT_LABEL = 'Go to slide: ';

function keyId(key: Key): string {
  if ('name' in key) return key.name;
  if ('char' in key) return key.char;
  return key.unknown;
}

export class KeyDecoder {
  private promptBuffer: string | null = null;

  /**
   * Digits typed so far into the go-to prompt, or null when no prompt is open.
   */
  get prompt(): string | null {
    return this.promptBuffer;
  }

  /**
   * Decode a raw chunk given the mode the controller is in. Enter opens the
   * highlighted entry in the index and advances everywhere else.
   */
  decode(data: string, mode: ViewMode): Command[] {
    const commands: Command[] = [];
    for (const key of tokenizeKeys(data)) {
      const command = this.decodeKey(key, mode);
      if (command) commands.push(command);
    }
    return commands;
  }

  /**
   * Decode one key. Returns null for keys with no meaning in the current state.
   */
  decodeKey(key: Key, mode: ViewMode): Command | null {
    return this.promptBuffer !== null ? this.decodePrompt(key) : this.mapKey(key, mode);
  }

  private openPrompt(initial: string): Command {
    this.promptBuffer = initial;
    return Commands.prompt(PROMPT_LABEL + initial);
  }

  private decodePrompt(key: Key): Command | null {
    const buffer = this.promptBuffer ?? '';
    const id = keyId(key);

    if (id === 'ctrl-c') {
      this.promptBuffer = null;
      return Commands.quit();
    }
    if (id === 'escape') {
      this.promptBuffer = null;
      return Commands.prompt(null);
    }
    if (id === 'enter') {
      this.promptBuffer = null;
      return buffer ? Commands.goto(parseInt(buffer, 10)) : Commands.prompt(null);
    }
    if (id === 'backspace') {
      this.promptBuffer = buffer.slice(0, -1);
      return Commands.prompt(PROMPT_LABEL + this.promptBuffer);
    }
    if ('char' in key && /^[0-9]$/.test(key.char)) {
      // Six digits is far beyond any real deck
      if (buffer.length >= 6) return null;
      this.promptBuffer = buffer + key.char;
      return Commands.prompt(PROMPT_LABEL + this.promptBuffer);
    }
    return null;
  }

  private mapKey(key: Key, mode: ViewMode): Command | null {
    const id = keyId(key);
    const inList = mode === ViewMode.INDEX || mode === ViewMode.HELP;

    if ('char' in key && /^[0-9]$/.test(key.char)) {
      return this.openPrompt(key.char);
    }

    switch (id) {
      case 'enter':
        return mode === ViewMode.INDEX ? Commands.select() : Commands.next();
      case 'n':
      case ' ':
      case 'right':
      case 'pagedown':
        return Commands.next();
      case 'p':
      case 'left':
      case 'backspace':
      case 'pageup':
        return Commands.prev();
      case 'j':
      case 'down':
        return Commands.scrollDown();
      case 'k':
      case 'up':
        return Commands.scrollUp();
      case 'f':
      case 'home':
        return Commands.first();
      case 'l':
      case 'end':
        return Commands.last();
      case 'g':
        return this.openPrompt('');
      case 's':
        return Commands.toggleNotes();
      case 'i':
        return Commands.toggleIndex();
      case 'h':
      case '?':
        return Commands.toggleHelp();
      case 'r':
        return Commands.refresh();
      case 'escape':
        return Commands.cancel();
      case 'q':
        // In the index and help lists q backs out instead of ending the talk
        return inList ? Commands.cancel() : Commands.quit();
      case 'x':
      case 'ctrl-c':
        return Commands.quit();
      default:
        return null;
    }
  }
}
