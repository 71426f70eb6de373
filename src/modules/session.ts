import path from 'path';
import { EDITOR, SUGGESTION } from './constants.js';
import { EditorCommand, parseCommand } from './commandHandler.js';
import { FileStore, fileStore as defaultFileStore } from './fileStore.js';
import { ContextSnapshot, SuggestionEngine } from './suggestionEngine.js';
import { Command } from '../ui/input/Command.js';
import { BufferState } from '../ui/input/types.js';
import {
  contextBeforeCursor,
  createBuffer,
  currentLine,
  handleBackspace,
  handleInsertChar,
  handleInsertText,
  handleNewline,
} from '../ui/input/handlers/handleEdit.js';
import {
  handleCursorDown,
  handleCursorLeft,
  handleCursorRight,
  handleCursorUp,
  handleEnd,
  handleHome,
} from '../ui/input/handlers/handleCursor.js';
import { logger } from '../lib/utils/logger.js';
import { formatErrorMessage } from '../utils/errors.js';
import { StatusMessage, StatusTone } from '../types/index.js';

export type ExitState = { kind: 'clean' } | { kind: 'confirmPending'; requestedAt: number };

export type CommandLineState = { kind: 'normal' } | { kind: 'command'; text: string };

export interface EditorSessionOptions {
  engine: SuggestionEngine;
  files?: FileStore;
  /** Terminal width; lines wrap one column short of it */
  columns?: number;
  /** Directory relative file names resolve against */
  cwd?: string;
}

/**
 * One editing session: buffer, document metadata and the small state
 * machines around them. All input goes through here; the UI only reads.
 */
export class EditorSession {
  private engine: SuggestionEngine;
  private files: FileStore;
  private cwd: string;
  private columns: number;

  private state: BufferState = createBuffer();
  private name: string | null = null;
  private dirty = false;
  private exit: ExitState = { kind: 'clean' };
  private commandLine: CommandLineState = { kind: 'normal' };
  private status: StatusMessage | null = null;
  private done = false;

  constructor(options: EditorSessionOptions) {
    this.engine = options.engine;
    this.files = options.files ?? defaultFileStore;
    this.cwd = options.cwd ?? process.cwd();
    this.columns = options.columns ?? 80;
  }

  get buffer(): BufferState {
    return this.state;
  }

  get filename(): string | null {
    return this.name;
  }

  get modified(): boolean {
    return this.dirty;
  }

  get exitState(): ExitState {
    return this.exit;
  }

  get commandState(): CommandLineState {
    return this.commandLine;
  }

  get terminated(): boolean {
    return this.done;
  }

  get suggestions(): SuggestionEngine {
    return this.engine;
  }

  get wrapWidth(): number {
    return this.columns - 1;
  }

  setColumns(columns: number): void {
    this.columns = Math.max(2, columns);
  }

  /**
   * Status message, if one was set within the display window
   */
  statusAt(now: number): StatusMessage | null {
    if (this.status === null || now - this.status.shownAt >= EDITOR.STATUS_MESSAGE_MS) {
      return null;
    }
    return this.status;
  }

  setStatus(text: string, now: number, tone: StatusTone = 'info'): void {
    this.status = { text, tone, shownAt: now };
  }

  snapshot(): ContextSnapshot {
    return {
      position: { line: this.state.cursorLine, col: this.state.cursorCol },
      context: contextBeforeCursor(this.state, SUGGESTION.CONTEXT_MAX_CHARS, SUGGESTION.CONTEXT_MAX_LINES),
    };
  }

  /**
   * One iteration of the main loop: expire the exit window, consume a
   * finished request, and start a new one if the user has paused
   */
  tick(now: number): void {
    if (this.exit.kind === 'confirmPending' && now - this.exit.requestedAt > EDITOR.EXIT_CONFIRM_MS) {
      this.exit = { kind: 'clean' };
    }

    const outcome = this.engine.poll(this.snapshot());
    if (outcome.kind === 'failed' && outcome.result.reason === 'auth') {
      this.setStatus('AI: authentication failed, check api_key', now, 'error');
    }

    if (this.commandLine.kind === 'normal') {
      this.engine.maybeDispatch(now, this.snapshot());
    }
  }

  /**
   * Route a resolved key press
   */
  handleCommand(command: Command, input: string, now: number): void {
    if (this.commandLine.kind === 'command') {
      this.handleCommandLineKey(command, input, now);
      return;
    }

    switch (command) {
      case Command.INSERT_CHAR:
        this.insertChar(input, now);
        break;
      case Command.PASTE:
        this.insertText(input, now);
        break;
      case Command.SUBMIT:
        this.newline(now);
        break;
      case Command.BACKSPACE:
        this.backspace(now);
        break;
      case Command.ACCEPT:
        this.acceptSuggestion(now);
        break;
      case Command.CURSOR_RIGHT:
        // Secondary accept key: only moves when there is nothing to accept
        if (!this.acceptSuggestion(now)) {
          this.move(handleCursorRight);
        }
        break;
      case Command.CURSOR_LEFT:
        this.move(handleCursorLeft);
        break;
      case Command.CURSOR_UP:
        this.move(handleCursorUp);
        break;
      case Command.CURSOR_DOWN:
        this.move(handleCursorDown);
        break;
      case Command.HOME:
        this.move(handleHome);
        break;
      case Command.END:
        this.move(handleEnd);
        break;
      case Command.SAVE:
        this.save(now);
        break;
      case Command.OPEN:
        this.engine.invalidate();
        this.commandLine = { kind: 'command', text: 'e ' };
        break;
      case Command.EXIT:
        this.requestExit(now);
        break;
      case Command.TOGGLE_AI:
        this.toggleAi(now);
        break;
      case Command.ESCAPE:
        this.engine.invalidate();
        break;
    }
  }

  private handleCommandLineKey(command: Command, input: string, now: number): void {
    if (this.commandLine.kind !== 'command') return;
    const { text } = this.commandLine;

    switch (command) {
      case Command.INSERT_CHAR:
      case Command.PASTE:
        this.commandLine = { kind: 'command', text: text + input.replace(/[\r\n]/g, '') };
        break;
      case Command.BACKSPACE:
        this.commandLine = text === '' ? { kind: 'normal' } : { kind: 'command', text: text.slice(0, -1) };
        break;
      case Command.ESCAPE:
        this.cancelCommandLine();
        break;
      case Command.SUBMIT:
        this.runCommandLine(now);
        break;
      case Command.EXIT:
        this.cancelCommandLine();
        this.requestExit(now);
        break;
    }
  }

  insertChar(char: string, now: number): void {
    if (this.commandLine.kind === 'command') {
      this.commandLine = { kind: 'command', text: this.commandLine.text + char };
      return;
    }

    if (char === EDITOR.COMMAND_TRIGGER && this.state.cursorCol === 0 && currentLine(this.state) === '') {
      this.engine.invalidate();
      this.commandLine = { kind: 'command', text: '' };
      return;
    }

    const before = { line: this.state.cursorLine, col: this.state.cursorCol };
    this.state = handleInsertChar(this.state, char, this.wrapWidth);
    const after = { line: this.state.cursorLine, col: this.state.cursorCol };

    this.engine.onCharInserted(char, before, after);
    this.markEdited(now);
  }

  insertText(text: string, now: number): void {
    if (text.length === 1 && text !== '\n') {
      this.insertChar(text, now);
      return;
    }

    this.engine.invalidate();
    this.state = handleInsertText(this.state, text, this.wrapWidth);
    this.markEdited(now);
  }

  backspace(now: number): void {
    const next = handleBackspace(this.state);
    this.engine.invalidate();
    if (next !== this.state) {
      this.state = next;
      this.markEdited(now);
    }
  }

  newline(now: number): void {
    this.engine.invalidate();
    this.state = handleNewline(this.state);
    this.markEdited(now);
  }

  /**
   * Insert what is left of the suggestion at the cursor. Returns false when
   * there was nothing to accept.
   */
  acceptSuggestion(now: number): boolean {
    const remaining = this.engine.accept();
    if (remaining === null) {
      return false;
    }

    this.state = handleInsertText(this.state, remaining, this.wrapWidth);
    this.markEdited(now);
    return true;
  }

  private move(handler: (state: BufferState) => BufferState): void {
    this.engine.invalidate();
    this.state = handler(this.state);
  }

  private markEdited(now: number): void {
    this.dirty = true;
    this.engine.recordKeystroke(now);
  }

  toggleAi(now: number): void {
    if (!this.engine.isAvailable) {
      this.setStatus('AI autocomplete not configured (no api_key)', now, 'warning');
      return;
    }
    const enabled = this.engine.toggle();
    this.setStatus(`AI autocomplete ${enabled ? 'enabled' : 'disabled'}`, now);
  }

  /**
   * Exit request (Ctrl+X). With unsaved changes the first request only
   * warns; a second one inside the confirmation window exits.
   */
  requestExit(now: number): void {
    if (!this.dirty) {
      this.done = true;
      return;
    }

    if (this.exit.kind === 'confirmPending' && now - this.exit.requestedAt <= EDITOR.EXIT_CONFIRM_MS) {
      logger.info('Exiting with unsaved changes', { filename: this.name });
      this.done = true;
      return;
    }

    this.exit = { kind: 'confirmPending', requestedAt: now };
    const seconds = Math.round(EDITOR.EXIT_CONFIRM_MS / 1000);
    this.setStatus(`Unsaved changes! ^S to save, ^X again within ${seconds}s to exit`, now, 'warning');
  }

  /**
   * Write the buffer. Without a name the default file name is used.
   */
  save(now: number, target?: string): boolean {
    const filename = target ?? this.name ?? EDITOR.DEFAULT_FILENAME;

    try {
      this.files.write(path.resolve(this.cwd, filename), this.state.lines);
    } catch (error) {
      logger.error('Save failed', error);
      this.setStatus(formatErrorMessage(error), now, 'error');
      return false;
    }

    this.name = filename;
    this.dirty = false;
    this.exit = { kind: 'clean' };
    this.setStatus(`Saved to ${filename}`, now);
    return true;
  }

  /**
   * Replace the buffer with a file's contents. A file that does not exist
   * yet opens as an empty buffer under that name.
   */
  open(filename: string, now: number): boolean {
    let lines: string[] | null;
    try {
      lines = this.files.read(path.resolve(this.cwd, filename));
    } catch (error) {
      logger.error('Load failed', error);
      this.setStatus(formatErrorMessage(error), now, 'error');
      return false;
    }

    this.engine.invalidate();
    this.state = createBuffer(lines ?? ['']);
    this.name = filename;
    this.dirty = false;
    this.exit = { kind: 'clean' };
    this.setStatus(lines === null ? `New file: ${filename}` : `Loaded ${filename}`, now);
    return true;
  }

  private cancelCommandLine(): void {
    this.commandLine = { kind: 'normal' };
  }

  private runCommandLine(now: number): void {
    if (this.commandLine.kind !== 'command') return;
    const text = this.commandLine.text;
    this.commandLine = { kind: 'normal' };

    let command: EditorCommand;
    try {
      command = parseCommand(text);
    } catch (error) {
      this.setStatus(formatErrorMessage(error), now, 'warning');
      return;
    }

    this.executeCommand(command, now);
  }

  /**
   * Run a command-line command. Always leaves command mode.
   */
  executeCommand(command: EditorCommand, now: number): void {
    this.commandLine = { kind: 'normal' };

    switch (command.type) {
      case 'none':
        break;
      case 'save':
        this.save(now, command.path);
        break;
      case 'quit':
        if (command.force || !this.dirty) {
          this.done = true;
        } else {
          this.setStatus('No write since last change (add ! to override)', now, 'warning');
        }
        break;
      case 'saveQuit':
        if (this.save(now)) {
          this.done = true;
        }
        break;
      case 'open':
        if (this.dirty && !command.force) {
          this.setStatus('No write since last change (use :e! to discard)', now, 'warning');
        } else {
          this.open(command.path, now);
        }
        break;
    }
  }
}
