#!/usr/bin/env node

// Load environment variables from .env before any other modules run
import 'dotenv/config';

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { editCommand } from './commands/edit.js';
import { initCommand } from './commands/init.js';
import { configCommand } from './commands/config.js';
import { handleError } from './utils/errors.js';
import { CLI_VERSION } from './modules/constants.js';
import { logger, LogLevel } from './lib/utils/logger.js';

yargs(hideBin(process.argv))
  .scriptName('ghostpad')
  .version(CLI_VERSION)
  .usage('$0 [file] [options]')
  .option('config', {
    alias: 'c',
    type: 'string',
    description: 'Path to the config file',
  })
  .option('debug', {
    type: 'boolean',
    default: false,
    description: 'Verbose logging',
  })
  .middleware((argv) => {
    if (argv.debug) {
      logger.setLevel(LogLevel.DEBUG);
    }
  })
  .command(
    '$0 [file]',
    'Edit a file with inline AI suggestions',
    (yargs) => {
      return yargs
        .positional('file', {
          type: 'string',
          describe: 'File to open (created on first save)',
        })
        .option('ai', {
          type: 'boolean',
          default: true,
          description: 'Start with suggestions enabled (use --no-ai to start with them off)',
        })
        .option('log-file', {
          type: 'string',
          description: 'Write logs to this file while the editor is open',
        });
    },
    async (argv) => {
      try {
        await editCommand({
          file: argv.file,
          config: argv.config,
          ai: argv.ai,
          logFile: argv['log-file'],
          debug: argv.debug,
        });
      } catch (error) {
        handleError(error);
      }
    }
  )
  .command(
    'init',
    'Create a config file interactively',
    () => {},
    async (argv) => {
      try {
        await initCommand({ config: argv.config });
      } catch (error) {
        handleError(error);
      }
    }
  )
  .command(
    'config',
    'Show the effective configuration',
    (yargs) => {
      return yargs.option('check', {
        type: 'boolean',
        default: false,
        description: 'Send a test completion request',
      });
    },
    async (argv) => {
      try {
        await configCommand({ config: argv.config, check: argv.check });
      } catch (error) {
        handleError(error);
      }
    }
  )
  .strict()
  .help()
  .alias('help', 'h')
  .alias('version', 'v')
  .parseAsync()
  .catch(handleError);
