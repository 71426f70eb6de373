import { FileStore } from '../fileStore.js';
import { FileError } from '../../lib/utils/errors.js';
import { CompletionProvider, CompletionResult } from '../../types/index.js';

/**
 * In-process stand-in for the completion endpoint
 */
export class FakeProvider implements CompletionProvider {
  contexts: string[] = [];

  constructor(private respond: (context: string) => Promise<CompletionResult>) {}

  complete(context: string): Promise<CompletionResult> {
    this.contexts.push(context);
    return this.respond(context);
  }
}

export const replyWith = (text: string) => new FakeProvider(async () => ({ ok: true, text }));

export class MemoryFileStore implements FileStore {
  files = new Map<string, string[]>();
  failWrites = false;

  read(filePath: string): string[] | null {
    return this.files.get(filePath) ?? null;
  }

  write(filePath: string, lines: string[]): void {
    if (this.failWrites) {
      throw new FileError(filePath, 'Error saving file: disk full');
    }
    this.files.set(filePath, [...lines]);
  }
}

/** Let a resolved fetch reach the result slot */
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
