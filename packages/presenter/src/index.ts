export { parseSlide, scanSlide, splitTitleLabel, DEFAULT_NOTES_HEADING } from './parser.js';
export type { ParseOptions, SlideScan } from './parser.js';
export { Deck, buildDeck } from './deck.js';
export type { BuildDeckOptions, DeckBuildResult, InvalidSlidePolicy, SkippedDocument, SlideDocument } from './deck.js';
export { renderFrame, composeBar, centerIndent, notesLines, MORE_ABOVE, MORE_BELOW } from './renderer.js';
export type { OverlayState, RenderRequest, Renderer } from './renderer.js';
export { bodyRows, maxScroll, clampScroll, followCursor, CHROME_ROWS } from './layout.js';
export { HELP_LINES } from './help.js';
export { PresenterController } from './controller.js';
export type { ControllerOptions, DispatchOutcome, DispatchResult, ViewState } from './controller.js';
export { createSession, runPresenter } from './session.js';
export type { PresenterSession, RunOptions, RunSummary } from './session.js';
export { AsyncQueue } from './async-queue.js';
export { KeyDecoder, tokenizeKeys } from './terminal/key-decoder.js';
export type { Key, KeyName } from './terminal/key-decoder.js';
export { TerminalScreen, encodeFrame, ANSI } from './terminal/screen.js';
export type { Screen, ScreenOutput } from './terminal/screen.js';
export { attachTerminalInput } from './terminal/input.js';
export type { InputEvent, TerminalInput } from './terminal/input.js';
export { loadConfig, parseConfig, presenterConfigSchema, CONFIG_FILE } from './config.js';
export type { PresenterConfig, LoadConfigOptions } from './config.js';
export { loadSlideDocuments, listSlideFiles } from './slide-loader.js';
export { lintDocument, lintDocuments, formatIssue } from './lint.js';
export type { LintIssue, LintOptions, LintSeverity } from './lint.js';
export { main } from './cli.js';
