/**
 * termslides command line.
 *
 *   termslides [dir]        present the slides in dir
 *   termslides lint [dir]   check slide titles and content line widths
 */

import { parseArgs } from 'util';
import { ConfigError, DeckError, SlideParseError } from '@termslides/shared';
import { loadConfig, type PresenterConfig } from './config.js';
import { formatIssue, lintDocuments } from './lint.js';
import { createSession, runPresenter, type RunSummary } from './session.js';
import { isDirectory, loadSlideDocuments } from './slide-loader.js';
import { attachTerminalInput, type KeyInput, type ResizeSource } from './terminal/input.js';
import { TerminalScreen, type ScreenOutput } from './terminal/screen.js';

export const USAGE = `Usage: termslides [options] [dir]
       termslides lint [options] [dir]

Options:
  -c, --config <file>    config file (default: ./termslides.yaml if present)
      --align <mode>     left | center
      --line-width <n>   expected content line width (lint)
      --strict           abort on the first slide that fails to parse
      --allow-empty      start even when no slides are found
  -h, --help             show this help`;

export interface CliIO {
  stdin: KeyInput;
  stdout: ScreenOutput & ResizeSource;
}

const OPTIONS = {
  config: { type: 'string', short: 'c' },
  align: { type: 'string' },
  'line-width': { type: 'string' },
  strict: { type: 'boolean' },
  'allow-empty': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

interface CliFlags {
  config?: string;
  align?: string;
  'line-width'?: string;
  strict?: boolean;
  'allow-empty'?: boolean;
  help?: boolean;
}

/**
 * Only flags actually given become overrides, so unset flags never mask
 * values from the config file.
 */
export function flagOverrides(flags: CliFlags, dir: string | undefined): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (dir !== undefined) overrides.slidesDir = dir;
  if (flags.align !== undefined) overrides.align = flags.align;
  if (flags['line-width'] !== undefined) {
    const width = Number(flags['line-width']);
    overrides.lineWidth = Number.isNaN(width) ? flags['line-width'] : width;
  }
  if (flags.strict) overrides.invalidSlides = 'abort';
  if (flags['allow-empty']) overrides.requireSlides = false;
  return overrides;
}

async function lint(config: PresenterConfig): Promise<number> {
  if (!(await isDirectory(config.slidesDir))) {
    console.error(`Error: Slides directory not found: ${config.slidesDir}`);
    return 1;
  }
  const documents = await loadSlideDocuments(config.slidesDir, config.extension);
  const issues = lintDocuments(documents, { lineWidth: config.lineWidth, notesHeading: config.notesHeading });

  for (const issue of issues) {
    console.log(formatIssue(issue));
  }
  const errors = issues.filter((issue) => issue.severity === 'error').length;
  const warnings = issues.length - errors;
  console.log(`[Lint] ${documents.length} file(s) checked: ${errors} error(s), ${warnings} warning(s)`);
  return errors > 0 ? 1 : 0;
}

async function present(config: PresenterConfig, io: CliIO): Promise<number> {
  if (!(await isDirectory(config.slidesDir))) {
    console.error(`Error: Slides directory not found: ${config.slidesDir}`);
    return 1;
  }
  const documents = await loadSlideDocuments(config.slidesDir, config.extension);
  const session = createSession(documents, config);
  for (const skipped of session.skipped) {
    console.warn(`[SlideLoader] Skipped ${skipped.source}: ${skipped.reason}`);
  }

  if (!io.stdin.isTTY) {
    console.error('Error: termslides needs an interactive terminal');
    return 1;
  }

  console.log(`Loading ${session.deck.count} slides...`);
  const screen = new TerminalScreen(io.stdout);
  const input = attachTerminalInput(io.stdin, io.stdout);
  const stop = () => input.detach();
  process.once('SIGTERM', stop);

  screen.open();
  let summary: RunSummary;
  try {
    summary = await runPresenter(session, input.events, screen);
  } finally {
    input.detach();
    screen.close();
    process.off('SIGTERM', stop);
  }
  console.log(`Slideshow ended on slide ${summary.lastSlide ?? 0} of ${session.deck.count}.`);
  return 0;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function main(argv: string[], io: CliIO = { stdin: process.stdin, stdout: process.stdout }): Promise<number> {
  let flags: CliFlags;
  let positionals: string[];
  try {
    ({ values: flags, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true }));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return 2;
  }

  if (flags.help) {
    console.log(USAGE);
    return 0;
  }

  const [first, ...rest] = positionals;
  const command = first === 'lint' ? 'lint' : 'present';
  const dir = command === 'lint' ? rest[0] : first;

  try {
    const config = await loadConfig({ configPath: flags.config, overrides: flagOverrides(flags, dir) });
    return command === 'lint' ? await lint(config) : await present(config, io);
  } catch (err) {
    if (err instanceof ConfigError || err instanceof DeckError || err instanceof SlideParseError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
