/**
 * Config commands for CLI
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  CONFIG_KEYS,
  loadConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  getConfigPath,
  configExists,
  isConfigKey,
  type CliConfigKey,
} from '../lib/config.js';
import { runAction } from '../lib/context.js';

function maskKey(key: string | undefined): string {
  if (!key) {
    return chalk.dim('(not set)');
  }
  return key.length <= 8 ? '********' : `${key.slice(0, 4)}…${key.slice(-2)}`;
}

function toConfigKey(key: string): CliConfigKey {
  if (!isConfigKey(key)) {
    throw new Error(`Invalid key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  return key;
}

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Manage CLI configuration');

  // List all configuration
  configCmd
    .command('list')
    .description('Show current configuration')
    .action(() => {
      const config = loadConfig();
      const configPath = getConfigPath();

      console.log(`\n${chalk.bold('Lazarus CLI Configuration')}\n`);

      if (configExists()) {
        console.log(`  ${chalk.gray('Config File:')} ${chalk.cyan(configPath)}`);
      } else {
        console.log(`  ${chalk.gray('Config File:')} ${chalk.yellow('(not found, using defaults)')}`);
        console.log(`  ${chalk.gray('Expected at:')} ${chalk.cyan(configPath)}`);
      }

      console.log('');
      console.log(`  ${chalk.gray('API Endpoint:')}    ${chalk.cyan(config.apiEndpoint)}`);
      console.log(`  ${chalk.gray('API Key:')}         ${maskKey(config.apiKey)}`);
      console.log(`  ${chalk.gray('Output Format:')}   ${chalk.cyan(config.outputFormat)}`);
      console.log('');
    });

  // Get a specific config value
  configCmd
    .command('get <key>')
    .description('Get a configuration value')
    .action(runAction(async (key: string) => {
      console.log(getConfigValue(toConfigKey(key)) ?? '');
    }));

  // Set a configuration value
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value')
    .action(runAction(async (key: string, value: string) => {
      const configKey = toConfigKey(key);
      setConfigValue(configKey, value);
      const shown = configKey === 'apiKey' ? maskKey(value) : chalk.cyan(value);
      console.log(`${chalk.green('✓')} Set ${chalk.cyan(configKey)} = ${shown}`);
      console.log(`  Config saved to ${chalk.gray(getConfigPath())}`);
    }));

  // Reset to defaults
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Reset without confirmation')
    .action(runAction(async (options: { force?: boolean }) => {
      if (!options.force) {
        console.log(`${chalk.yellow('This will reset your configuration to defaults.')}`);
        console.log(`${chalk.yellow('Use --force to confirm.')}`);
        return;
      }

      resetConfig();
      console.log(`${chalk.green('✓')} Configuration reset to defaults`);
      console.log(`  Config saved to ${chalk.gray(getConfigPath())}`);
    }));

  // Show config file path
  configCmd
    .command('path')
    .description('Show configuration file path')
    .action(() => {
      console.log(getConfigPath());

      if (configExists()) {
        console.error(chalk.gray('(file exists)'));
      } else {
        console.error(chalk.yellow('(file does not exist)'));
      }
    });
}
