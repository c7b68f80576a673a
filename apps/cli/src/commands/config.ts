import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import Table from 'cli-table3';
import { DEFAULT_GOVERNANCE_CONFIG, GOVERNANCE_ENV_VARIABLES, isGovernanceKey } from '@profile-pulse/shared';
import { configService } from '../services/config.js';
import { printError } from '../services/errors.js';

export function registerConfigCommands(program: Command) {
  const config = program
    .command('config')
    .description('Manage rate limiting and analysis settings');

  config
    .command('show')
    .description('Show effective configuration')
    .action(async () => {
      try {
        const stored = await configService.load();
        const effective = await configService.resolveGovernance();
        const keys = Object.keys(DEFAULT_GOVERNANCE_CONFIG).filter(isGovernanceKey);

        const table = new Table({
          head: ['Setting', 'Value', 'Default', 'Environment'],
          style: { head: ['cyan'] },
        });
        for (const key of keys) {
          const value = effective[key];
          const changed = value !== DEFAULT_GOVERNANCE_CONFIG[key];
          table.push([
            key,
            changed ? chalk.yellow(String(value)) : String(value),
            chalk.gray(String(DEFAULT_GOVERNANCE_CONFIG[key])),
            chalk.gray(GOVERNANCE_ENV_VARIABLES[key]),
          ]);
        }

        console.log(chalk.blue('\nCurrent Configuration:'));
        console.log(table.toString());
        console.log(chalk.white('Output directory:'), stored.outputDir ?? 'reports');
        console.log(chalk.gray(`Stored in ${configService.path}`));
      } catch (error) {
        printError('Failed to show configuration', error);
        process.exitCode = 1;
      }
    });

  config
    .command('set <key> <value>')
    .description('Persist a setting, e.g. "config set maxRequestsPerWindow 120"')
    .action(async (key: string, value: string) => {
      try {
        await configService.set(key, value);
        console.log(chalk.green(`✓ ${key} set to ${value}`));
      } catch (error) {
        printError('Failed to set configuration', error);
        process.exitCode = 1;
      }
    });

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (options: { yes?: boolean }) => {
      try {
        const { confirm } = options.yes
          ? { confirm: true }
          : await inquirer.prompt<{ confirm: boolean }>([
              {
                type: 'confirm',
                name: 'confirm',
                message: 'Are you sure you want to reset all configuration?',
                default: false,
              },
            ]);

        if (!confirm) {
          console.log(chalk.gray('Reset cancelled'));
          return;
        }

        const removed = await configService.reset();
        console.log(removed ? chalk.green('✓ Configuration reset to defaults') : chalk.gray('Nothing to reset'));
      } catch (error) {
        printError('Failed to reset configuration', error);
        process.exitCode = 1;
      }
    });
}
