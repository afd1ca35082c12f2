/**
 * Presenter commands - the closed set of discrete input events the
 * navigation controller understands.
 *
 * Raw key bytes are decoded into these by the input adapter; the controller
 * never sees terminal input directly.
 */

// ============ Command Type Constants ============

export const CommandType = {
  NEXT: 'next',
  PREV: 'prev',
  SCROLL_DOWN: 'scroll-down',
  SCROLL_UP: 'scroll-up',
  GOTO: 'goto',
  FIRST: 'first',
  LAST: 'last',
  TOGGLE_NOTES: 'toggle-notes',
  TOGGLE_INDEX: 'toggle-index',
  TOGGLE_HELP: 'toggle-help',
  RESIZE: 'resize',
  REFRESH: 'refresh',
  QUIT: 'quit',
  SELECT: 'select',
  CANCEL: 'cancel',
  PROMPT: 'prompt',
} as const;

// ============ Commands ============

export interface NextCommand {
  type: typeof CommandType.NEXT;
}

export interface PrevCommand {
  type: typeof CommandType.PREV;
}

export interface ScrollDownCommand {
  type: typeof CommandType.SCROLL_DOWN;
}

export interface ScrollUpCommand {
  type: typeof CommandType.SCROLL_UP;
}

export interface GotoCommand {
  type: typeof CommandType.GOTO;
  target: number; // 1-based slide number
}

export interface FirstCommand {
  type: typeof CommandType.FIRST;
}

export interface LastCommand {
  type: typeof CommandType.LAST;
}

export interface ToggleNotesCommand {
  type: typeof CommandType.TOGGLE_NOTES;
}

export interface ToggleIndexCommand {
  type: typeof CommandType.TOGGLE_INDEX;
}

export interface ToggleHelpCommand {
  type: typeof CommandType.TOGGLE_HELP;
}

export interface ResizeCommand {
  type: typeof CommandType.RESIZE;
  width: number;
  height: number;
}

export interface RefreshCommand {
  type: typeof CommandType.REFRESH;
}

export interface QuitCommand {
  type: typeof CommandType.QUIT;
}

/** Open the slide highlighted in the index overlay. */
export interface SelectCommand {
  type: typeof CommandType.SELECT;
}

/** Leave whatever overlay is showing. */
export interface CancelCommand {
  type: typeof CommandType.CANCEL;
}

/**
 * Show (or clear, with `null`) the text of an in-progress prompt, such as
 * the "go to slide" number entry, in the status line.
 */
export interface PromptCommand {
  type: typeof CommandType.PROMPT;
  text: string | null;
}

export type Command =
  | NextCommand
  | PrevCommand
  | ScrollDownCommand
  | ScrollUpCommand
  | GotoCommand
  | FirstCommand
  | LastCommand
  | ToggleNotesCommand
  | ToggleIndexCommand
  | ToggleHelpCommand
  | ResizeCommand
  | RefreshCommand
  | QuitCommand
  | SelectCommand
  | CancelCommand
  | PromptCommand;

// ============ Constructors ============

export const Commands = {
  next: (): NextCommand => ({ type: CommandType.NEXT }),
  prev: (): PrevCommand => ({ type: CommandType.PREV }),
  scrollDown: (): ScrollDownCommand => ({ type: CommandType.SCROLL_DOWN }),
  scrollUp: (): ScrollUpCommand => ({ type: CommandType.SCROLL_UP }),
  goto: (target: number): GotoCommand => ({ type: CommandType.GOTO, target }),
  first: (): FirstCommand => ({ type: CommandType.FIRST }),
  last: (): LastCommand => ({ type: CommandType.LAST }),
  toggleNotes: (): ToggleNotesCommand => ({ type: CommandType.TOGGLE_NOTES }),
  toggleIndex: (): ToggleIndexCommand => ({ type: CommandType.TOGGLE_INDEX }),
  toggleHelp: (): ToggleHelpCommand => ({ type: CommandType.TOGGLE_HELP }),
  resize: (width: number, height: number): ResizeCommand => ({ type: CommandType.RESIZE, width, height }),
  refresh: (): RefreshCommand => ({ type: CommandType.REFRESH }),
  quit: (): QuitCommand => ({ type: CommandType.QUIT }),
  select: (): SelectCommand => ({ type: CommandType.SELECT }),
  cancel: (): CancelCommand => ({ type: CommandType.CANCEL }),
  prompt: (text: string | null): PromptCommand => ({ type: CommandType.PROMPT, text }),
};

// ============ Type Guards ============

const SLIDE_CHANGING: ReadonlySet<Command['type']> = new Set([
  CommandType.NEXT,
  CommandType.PREV,
  CommandType.GOTO,
  CommandType.FIRST,
  CommandType.LAST,
  CommandType.SELECT,
]);

/**
 * Commands that may move the current slide. These are the ones an empty
 * deck turns into no-ops.
 */
export function isSlideChangingCommand(command: Command): boolean {
  return SLIDE_CHANGING.has(command.type);
}

export function isToggleCommand(
  command: Command
): command is ToggleNotesCommand | ToggleIndexCommand | ToggleHelpCommand {
  return (
    command.type === CommandType.TOGGLE_NOTES ||
    command.type === CommandType.TOGGLE_INDEX ||
    command.type === CommandType.TOGGLE_HELP
  );
}
