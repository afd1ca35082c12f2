/**
 * Static command reference shown by the help overlay.
 */

interface HelpSection {
  title: string;
  keys: Array<[keys: string, description: string]>;
}

const SECTIONS: HelpSection[] = [
  {
    title: 'NAVIGATION',
    keys: [
      ['n, SPACE, →, ENTER', 'Next slide'],
      ['p, ←, BACKSPACE', 'Previous slide'],
      ['f, HOME', 'First slide'],
      ['l, END', 'Last slide'],
      ['g', 'Go to slide number'],
    ],
  },
  {
    title: 'SCROLLING (tall slides)',
    keys: [
      ['j, ↓', 'Scroll down'],
      ['k, ↑', 'Scroll up'],
    ],
  },
  {
    title: 'VIEWS',
    keys: [
      ['s', 'Toggle speaker notes'],
      ['i', 'Toggle slide index'],
      ['h, ?', 'Toggle this help'],
      ['r', 'Redraw screen'],
      ['ESC', 'Back to slide'],
    ],
  },
  {
    title: 'SLIDE INDEX',
    keys: [
      ['j, k, ↑, ↓', 'Move selection'],
      ['ENTER', 'Open selected slide'],
    ],
  },
];

const INNER_WIDTH = 61;
const KEY_COLUMN = 24;

function row(text: string): string {
  return `║ ${text.padEnd(INNER_WIDTH - 2)} ║`;
}

function buildHelpLines(): string[] {
  const rule = '═'.repeat(INNER_WIDTH);
  const heading = 'TERMSLIDES CONTROLS';
  const left = Math.floor((INNER_WIDTH - 2 - heading.length) / 2);

  const lines = [`╔${rule}╗`, row(' '.repeat(left) + heading), `╠${rule}╣`];
  for (const section of SECTIONS) {
    lines.push(row(''));
    lines.push(row(`  ${section.title}`));
    lines.push(row(`  ${'─'.repeat(section.title.length)}`));
    for (const [keys, description] of section.keys) {
      lines.push(row(`  ${keys.padEnd(KEY_COLUMN)}${description}`));
    }
  }
  lines.push(row(''));
  lines.push(row('  q, x, CTRL-C            Quit'));
  lines.push(row(''));
  lines.push(`╚${rule}╝`);
  return lines;
}

export const HELP_LINES: readonly string[] = Object.freeze(buildHelpLines());
