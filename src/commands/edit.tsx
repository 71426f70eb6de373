import React from 'react';
import { render } from 'ink';
import { ConfigManager, resolveConfigPath } from '../modules/config.js';
import { EditorSession } from '../modules/session.js';
import { SuggestionEngine } from '../modules/suggestionEngine.js';
import { createCompletionProvider } from '../lib/api/completionClient.js';
import { GhostpadError } from '../lib/utils/errors.js';
import { createFileSink, logger, LogLevel } from '../lib/utils/logger.js';
import { EditorApp } from '../ui/EditorApp.js';

const ENTER_ALT_SCREEN = '\u001B[?1049h\u001B[H';
const LEAVE_ALT_SCREEN = '\u001B[?1049l';

export interface EditCommandOptions {
  file?: string;
  config?: string;
  ai: boolean;
  logFile?: string;
  debug: boolean;
}

export async function editCommand(options: EditCommandOptions): Promise<void> {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new GhostpadError('ghostpad needs an interactive terminal');
  }

  // The editor owns the screen, so logs go to a file or nowhere
  const logFile = options.logFile ?? process.env.GHOSTPAD_LOG_FILE;
  const previousLevel = logger.getLevel();
  if (logFile) {
    logger.setSink(createFileSink(logFile));
    logger.setLevel(options.debug ? LogLevel.DEBUG : LogLevel.INFO);
  } else {
    logger.setLevel(LogLevel.SILENT);
  }

  const configManager = new ConfigManager(resolveConfigPath(options.config));
  const { settings, source, path } = configManager.load();
  logger.info('Starting editor', { config: path, source, model: settings.model });

  const engine = new SuggestionEngine({
    provider: createCompletionProvider(settings),
    enabled: options.ai,
    pauseDelayMs: settings.pauseDelayMs,
  });
  const session = new EditorSession({ engine, columns: process.stdout.columns || 80 });

  if (options.file) {
    session.open(options.file, Date.now());
  }

  process.stdout.write(ENTER_ALT_SCREEN);
  try {
    const instance = render(<EditorApp session={session} />, { exitOnCtrlC: false });
    await instance.waitUntilExit();
  } finally {
    process.stdout.write(LEAVE_ALT_SCREEN);
    logger.info('Editor closed', { filename: session.filename, modified: session.modified });
    logger.setSink(null);
    logger.setLevel(previousLevel);
  }
}
