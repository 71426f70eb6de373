import ora from 'ora';
import chalk from 'chalk';
import { ConfigManager, resolveConfigPath } from '../modules/config.js';
import { SUGGESTION } from '../modules/constants.js';
import { createCompletionProvider } from '../lib/api/completionClient.js';
import { CompletionError } from '../lib/utils/errors.js';
import { EditorSettings } from '../types/index.js';

export function maskKey(key: string): string {
  if (!key) return '(not set)';
  if (key.length <= 8) return '*'.repeat(key.length);
  return `${key.slice(0, 3)}${'*'.repeat(key.length - 7)}${key.slice(-4)}`;
}

export function describeSettings(settings: EditorSettings): string[] {
  return [
    `API Endpoint: ${settings.apiEndpoint}`,
    `API Key:      ${maskKey(settings.apiKey)}`,
    `Model:        ${settings.model}`,
    `Max Tokens:   ${settings.maxTokens}`,
    `Temperature:  ${settings.temperature}`,
    `Pause Delay:  ${settings.pauseDelayMs}ms`,
  ];
}

export async function configCommand(options: { config?: string; check: boolean }): Promise<void> {
  const configManager = new ConfigManager(resolveConfigPath(options.config));
  const { settings, source, path } = configManager.load();

  console.log(chalk.bold('\nCurrent configuration'));
  console.log(
    chalk.dim(`  ${source === 'file' ? path : `${path} (not found, using defaults)`}\n`)
  );
  for (const line of describeSettings(settings)) {
    console.log(`  ${line}`);
  }
  console.log();

  if (!options.check) {
    return;
  }

  const provider = createCompletionProvider(settings);
  if (provider === null) {
    console.log(chalk.yellow('⚠ No API key configured: nothing to check.\n'));
    return;
  }

  const spinner = ora('Requesting a test completion...').start();
  const result = await provider.complete('The quick brown fox', SUGGESTION.FETCH_TIMEOUT_MS);

  if (!result.ok) {
    spinner.fail(`Completion failed (${result.reason})`);
    throw new CompletionError(result.reason, result.message);
  }

  spinner.succeed('Completion endpoint is reachable');
  console.log(chalk.dim('  The quick brown fox') + chalk.cyan(result.text) + '\n');
}
