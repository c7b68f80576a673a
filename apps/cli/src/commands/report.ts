import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { analyzeEngagement, readJsonReport } from '@profile-pulse/shared';
import { configService } from '../services/config.js';
import { printEngagement, printProfile } from '../services/renderer.js';
import { printError } from '../services/errors.js';
import { parsePositiveInt } from './analyze.js';

type ReportFormat = 'table' | 'json';

function parseReportFormat(value: string): ReportFormat {
  if (value === 'table' || value === 'json') {
    return value;
  }
  throw new InvalidArgumentError('Must be one of: table, json.');
}

interface ReportOptions {
  top?: number;
  format: ReportFormat;
}

export const reportCommand = new Command('report')
  .description('Re-analyze a saved JSON report without calling the API')
  .argument('<file>', 'JSON report written by "analyze"')
  .option('-t, --top <n>', 'Length of hashtag and location rankings', parsePositiveInt)
  .option('--format <type>', 'Output format: table, json', parseReportFormat, 'table')
  .action(async (file: string, options: ReportOptions) => {
    const spinner = options.format === 'table' ? ora(`Loading ${file}...`).start() : null;

    try {
      const saved = await readJsonReport(file);
      const config = await configService.resolveGovernance(options.top ? { topN: options.top } : {});
      const engagement = analyzeEngagement(saved.posts, saved.profile.followersCount, { topN: config.topN });
      spinner?.succeed(`Loaded ${saved.posts.length} posts of @${saved.username}`);

      if (options.format === 'json') {
        console.log(JSON.stringify(engagement, null, 2));
        return;
      }

      if (saved.generatedAt) {
        console.log(chalk.gray(`Collected ${saved.generatedAt}`));
      }
      printProfile(saved.profile);
      printEngagement(engagement);
    } catch (error) {
      spinner?.fail('Could not analyze report');
      printError('Report failed', error);
      process.exitCode = 1;
    }
  });
