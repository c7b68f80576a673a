import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { credentialStore, maskToken } from '../services/auth.js';
import { printError } from '../services/errors.js';

interface LoginAnswers {
  accessToken: string;
  igUserId: string;
}

export function registerAuthCommands(program: Command) {
  const auth = program
    .command('auth')
    .description('Manage Graph API credentials');

  auth
    .command('login')
    .description('Store an access token and the Instagram user id it belongs to')
    .option('--token <token>', 'Graph API access token')
    .option('--user-id <id>', 'Instagram user id of your professional account')
    .option('--api-version <version>', 'Graph API version, e.g. v19.0')
    .action(async (options: { token?: string; userId?: string; apiVersion?: string }) => {
      try {
        const answers = await inquirer.prompt<LoginAnswers>([
          {
            type: 'password',
            name: 'accessToken',
            message: 'Access token:',
            mask: '*',
            when: !options.token,
            validate: (input: string) => input.trim().length > 0 || 'Access token is required',
          },
          {
            type: 'input',
            name: 'igUserId',
            message: 'Instagram user id:',
            when: !options.userId,
            validate: (input: string) => /^\d+$/.test(input.trim()) || 'User id is numeric',
          },
        ]);

        await credentialStore.save({
          accessToken: (options.token ?? answers.accessToken).trim(),
          igUserId: (options.userId ?? answers.igUserId).trim(),
          apiVersion: options.apiVersion,
        });
        console.log(chalk.green(`✓ Credentials saved to ${credentialStore.path}`));
      } catch (error) {
        printError('Failed to save credentials', error);
        process.exitCode = 1;
      }
    });

  auth
    .command('status')
    .description('Show which credentials will be used')
    .action(async () => {
      try {
        const resolved = await credentialStore.resolve();
        if (!resolved) {
          console.log(chalk.yellow('Not logged in'));
          console.log(chalk.gray('Run "profile-pulse auth login" or set IG_ACCESS_TOKEN and IG_USER_ID.'));
          return;
        }

        const { credentials, source } = resolved;
        console.log(chalk.green('✓ Credentials found'));
        console.log(chalk.gray('  Source:'), source === 'environment' ? 'environment variables' : credentialStore.path);
        console.log(chalk.gray('  User id:'), credentials.igUserId);
        console.log(chalk.gray('  Token:'), maskToken(credentials.accessToken));
        console.log(chalk.gray('  API version:'), credentials.apiVersion ?? 'default');
      } catch (error) {
        printError('Failed to read credentials', error);
        process.exitCode = 1;
      }
    });

  auth
    .command('logout')
    .description('Remove stored credentials')
    .action(async () => {
      try {
        const removed = await credentialStore.clear();
        console.log(removed ? chalk.green('✓ Stored credentials removed') : chalk.gray('No stored credentials'));
        if (process.env.IG_ACCESS_TOKEN) {
          console.log(chalk.yellow('IG_ACCESS_TOKEN is still set in the environment'));
        }
      } catch (error) {
        printError('Failed to remove credentials', error);
        process.exitCode = 1;
      }
    });
}
