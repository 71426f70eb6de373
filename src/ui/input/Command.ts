/**
 * Command enum for standardized keyboard actions
 */
export enum Command {
  // Suggestions
  ACCEPT = 'accept',
  TOGGLE_AI = 'toggleAi',

  // Newline, or run the command line
  SUBMIT = 'submit',

  // Paste operations
  PASTE = 'paste',

  // Cursor movement
  CURSOR_UP = 'cursorUp',
  CURSOR_DOWN = 'cursorDown',
  CURSOR_LEFT = 'cursorLeft',
  CURSOR_RIGHT = 'cursorRight',
  HOME = 'home',
  END = 'end',

  // Text editing
  BACKSPACE = 'backspace',
  INSERT_CHAR = 'insertChar',

  // Files and session
  SAVE = 'save',
  OPEN = 'open',
  EXIT = 'exit',
  ESCAPE = 'escape',
}
