import { CommandError } from '../lib/utils/errors.js';

/**
 * Parsed form of a command-line entry (the text typed after `:`)
 */
export type EditorCommand =
  | { type: 'none' }
  | { type: 'save'; path?: string }
  | { type: 'quit'; force: boolean }
  | { type: 'saveQuit' }
  | { type: 'open'; path: string; force: boolean };

/**
 * Parses a command line. Throws CommandError for anything unrecognised.
 */
export function parseCommand(text: string): EditorCommand {
  const trimmed = text.trim();
  if (trimmed === '') {
    return { type: 'none' };
  }

  const spaceAt = trimmed.search(/\s/);
  const name = spaceAt === -1 ? trimmed : trimmed.slice(0, spaceAt);
  const argument = spaceAt === -1 ? '' : trimmed.slice(spaceAt).trim();

  switch (name) {
    case 'w':
      return argument ? { type: 'save', path: argument } : { type: 'save' };
    case 'q':
    case 'q!':
      if (argument) break;
      return { type: 'quit', force: name === 'q!' };
    case 'wq':
    case 'x':
      if (argument) break;
      return { type: 'saveQuit' };
    case 'e':
    case 'e!':
      if (!argument) {
        throw new CommandError('Open: file name required');
      }
      return { type: 'open', path: argument, force: name === 'e!' };
  }

  throw new CommandError(`Unknown command: :${trimmed}`);
}
