import prompts from 'prompts';
import chalk from 'chalk';
import { ConfigManager, DEFAULT_SETTINGS, resolveConfigPath } from '../modules/config.js';
import { hasApiKey } from '../lib/api/completionClient.js';
import { EditorSettings } from '../types/index.js';

export async function initCommand(options: { config?: string }): Promise<void> {
  const configManager = new ConfigManager(resolveConfigPath(options.config));

  console.log(chalk.bold.blue('\nghostpad configuration\n'));

  if (configManager.exists()) {
    console.log(chalk.yellow(`⚠ A config file already exists at ${configManager.getPath()}`));
    const { overwrite } = await prompts({
      type: 'confirm',
      name: 'overwrite',
      message: 'Do you want to overwrite it?',
      initial: false,
    });

    if (!overwrite) {
      console.log(chalk.dim('\nInitialization cancelled.\n'));
      return;
    }
  }

  const answers = await prompts([
    {
      type: 'text',
      name: 'apiEndpoint',
      message: 'Completion endpoint (OpenAI-compatible):',
      initial: DEFAULT_SETTINGS.apiEndpoint,
    },
    {
      type: 'password',
      name: 'apiKey',
      message: 'API key (leave empty to run without AI):',
    },
    {
      type: 'text',
      name: 'model',
      message: 'Model:',
      initial: DEFAULT_SETTINGS.model,
    },
    {
      type: 'number',
      name: 'pauseDelayMs',
      message: 'Pause before requesting a suggestion (ms):',
      initial: DEFAULT_SETTINGS.pauseDelayMs,
      min: 1,
    },
  ]);

  // prompts resolves with missing answers when the user aborts
  if (typeof answers.apiEndpoint !== 'string' || typeof answers.model !== 'string') {
    console.log(chalk.dim('\nInitialization cancelled.\n'));
    return;
  }

  const settings: EditorSettings = {
    ...DEFAULT_SETTINGS,
    apiEndpoint: answers.apiEndpoint.trim() || DEFAULT_SETTINGS.apiEndpoint,
    apiKey: typeof answers.apiKey === 'string' ? answers.apiKey.trim() : '',
    model: answers.model.trim() || DEFAULT_SETTINGS.model,
    pauseDelayMs:
      typeof answers.pauseDelayMs === 'number' && answers.pauseDelayMs > 0
        ? Math.round(answers.pauseDelayMs)
        : DEFAULT_SETTINGS.pauseDelayMs,
  };

  configManager.save(settings);

  console.log(chalk.green(`\n✓ Saved ${configManager.getPath()}`));
  if (!hasApiKey(settings)) {
    console.log(chalk.yellow('⚠ No API key set: suggestions stay off until you add one.'));
  }
  console.log(chalk.dim('\nStart editing with: ') + chalk.white('ghostpad <file>\n'));
}
