import { Command } from './Command.js';
import { KeyMatcher, KeyPress } from './types.js';

const ctrl = (letter: string): KeyMatcher => (key: KeyPress, inputChar?: string) =>
  key.ctrl === true && inputChar === letter;

/**
 * Key matcher object
 * Usage: if (keyMatchers[Command.SAVE](key, input)) { save(); }
 */
export const keyMatchers: Record<Command, KeyMatcher> = {
  [Command.ACCEPT]: (key: KeyPress) => key.tab === true,

  [Command.TOGGLE_AI]: ctrl('g'),

  [Command.SUBMIT]: (key: KeyPress) => key.return === true,

  [Command.PASTE]: (key: KeyPress, inputChar?: string) => {
    // Detect paste by multi-character input
    return Boolean(inputChar && !key.ctrl && !key.meta && inputChar.length > 1);
  },

  [Command.CURSOR_UP]: (key: KeyPress) => key.upArrow === true,

  [Command.CURSOR_DOWN]: (key: KeyPress) => key.downArrow === true,

  [Command.CURSOR_LEFT]: (key: KeyPress) => key.leftArrow === true,

  [Command.CURSOR_RIGHT]: (key: KeyPress) => key.rightArrow === true,

  // Ctrl+A (standard terminal shortcut for Home)
  [Command.HOME]: ctrl('a'),

  // Ctrl+E (standard terminal shortcut for End)
  [Command.END]: ctrl('e'),

  [Command.BACKSPACE]: (key: KeyPress) => key.backspace === true || key.delete === true,

  [Command.INSERT_CHAR]: (key: KeyPress, inputChar?: string) => {
    // Regular character input (not a control key)
    return Boolean(inputChar && !key.ctrl && !key.meta && inputChar.length === 1);
  },

  [Command.SAVE]: ctrl('s'),

  [Command.OPEN]: ctrl('o'),

  // Ctrl+X, and Ctrl+C since ink is told not to exit on it
  [Command.EXIT]: (key: KeyPress, inputChar?: string) =>
    key.ctrl === true && (inputChar === 'x' || inputChar === 'c'),

  [Command.ESCAPE]: (key: KeyPress) => key.escape === true,
};

/**
 * Order in which matchers are tried. Tab and Enter also arrive as
 * characters, so they must be recognised before plain input.
 */
const PRIORITY: Command[] = [
  Command.EXIT,
  Command.SAVE,
  Command.OPEN,
  Command.TOGGLE_AI,
  Command.HOME,
  Command.END,
  Command.ESCAPE,
  Command.ACCEPT,
  Command.SUBMIT,
  Command.BACKSPACE,
  Command.CURSOR_UP,
  Command.CURSOR_DOWN,
  Command.CURSOR_LEFT,
  Command.CURSOR_RIGHT,
  Command.PASTE,
  Command.INSERT_CHAR,
];

/**
 * Helper to match a command against a key press
 */
export function matchCommand(command: Command, key: KeyPress, inputChar?: string): boolean {
  return keyMatchers[command](key, inputChar);
}

/**
 * Resolve a key press to the first matching command, if any
 */
export function resolveCommand(key: KeyPress, inputChar?: string): Command | null {
  return PRIORITY.find((command) => matchCommand(command, key, inputChar)) ?? null;
}
