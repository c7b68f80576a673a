import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import path from 'path';
import {
  ExponentialBackoffPolicy,
  GraphApiClient,
  IReportExporter,
  JsonReportExporter,
  MarkdownReportExporter,
  ProfileCollector,
  RequestGovernor,
  RollingWindowLimiter,
  buildInsightReport,
  isCancellation,
  systemClock,
} from '@profile-pulse/shared';
import { configService } from '../services/config.js';
import { credentialStore } from '../services/auth.js';
import { OraProgressReporter } from '../services/progress.js';
import { createCliLogger } from '../services/logging.js';
import { printDisclaimer, printRateLimit, printSummary } from '../services/renderer.js';
import { exitCodeFor, printError } from '../services/errors.js';

export type ExportFormat = 'json' | 'markdown' | 'both';

const USERNAME_PATTERN = /^[A-Za-z0-9._]{1,30}$/;

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseFormat(value: string): ExportFormat {
  if (value === 'json' || value === 'markdown' || value === 'both') {
    return value;
  }
  throw new InvalidArgumentError('Must be one of: json, markdown, both.');
}

export function normalizeUsername(value: string): string {
  const username = value.trim().replace(/^@/, '');
  if (!USERNAME_PATTERN.test(username)) {
    throw new InvalidArgumentError('Not a valid Instagram username.');
  }
  return username;
}

interface AnalyzeOptions {
  maxPosts: number;
  format: ExportFormat;
  output?: string;
  top?: number;
  verbose?: boolean;
}

export const analyzeCommand = new Command('analyze')
  .description('Fetch a public professional profile and analyze its recent posts')
  .argument('<username>', 'Instagram username (with or without @)', normalizeUsername)
  .option('-m, --max-posts <n>', 'Number of recent posts to analyze', parsePositiveInt, 50)
  .option('-f, --format <type>', 'Export format: json, markdown, both', parseFormat, 'both')
  .option('-o, --output <dir>', 'Directory for exported reports')
  .option('-t, --top <n>', 'Length of hashtag and location rankings', parsePositiveInt)
  .option('-v, --verbose', 'Print debug logging')
  .action(async (username: string, options: AnalyzeOptions) => {
    const logger = createCliLogger(options.verbose ?? false);
    const controller = new AbortController();
    const onInterrupt = () => {
      console.log(chalk.yellow('\nInterrupted, cancelling...'));
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    const progress = new OraProgressReporter();

    try {
      const resolved = await credentialStore.resolve();
      if (!resolved) {
        console.error(chalk.red('No Graph API credentials. Run "profile-pulse auth login" or set IG_ACCESS_TOKEN and IG_USER_ID.'));
        process.exitCode = 1;
        return;
      }

      const appConfig = await configService.load();
      const config = await configService.resolveGovernance(options.top ? { topN: options.top } : {});
      logger.debug('Effective configuration', { config });

      const limiter = new RollingWindowLimiter(config, logger);
      const governor = new RequestGovernor({
        limiter,
        backoff: new ExponentialBackoffPolicy(config),
        clock: systemClock,
        logger,
        onTransition: ({ state, label, waitMs }) => {
          if (waitMs === undefined) return;
          if (state === 'waiting-for-admission') progress.waiting(`Rate limited before ${label}`, waitMs);
          if (state === 'backing-off') progress.waiting(`Retrying ${label}`, waitMs);
        },
      });
      const collector = new ProfileCollector({
        source: new GraphApiClient({ ...resolved.credentials, logger }),
        governor,
        progressReporter: progress,
        logger,
      });

      const startedAt = new Date();
      const snapshot = await collector.collect(username, { maxPosts: options.maxPosts, signal: controller.signal });
      const report = buildInsightReport(username, snapshot, {
        startedAt,
        finishedAt: new Date(),
        maxPosts: options.maxPosts,
        rateLimit: limiter.getStats(systemClock.now()),
        topN: config.topN,
      });

      printSummary(report);

      const outputDir = path.resolve(options.output ?? appConfig.outputDir ?? 'reports');
      const exporters: IReportExporter[] = [];
      if (options.format !== 'markdown') exporters.push(new JsonReportExporter(logger));
      if (options.format !== 'json') exporters.push(new MarkdownReportExporter(logger));

      console.log(chalk.bold('Exports:'));
      for (const exporter of exporters) {
        const filePath = await exporter.export(report, outputDir);
        console.log(`  ${chalk.green('✓')} ${exporter.extension.toUpperCase()}: ${chalk.cyan(filePath)}`);
      }

      printRateLimit(report.metadata.rateLimit);
      printDisclaimer();
    } catch (error) {
      progress.stop();
      if (isCancellation(error)) {
        console.log(chalk.yellow('Analysis cancelled'));
      } else {
        printError('Analysis failed', error);
        logger.error('Analysis failed', { error });
      }
      process.exitCode = exitCodeFor(error);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  });
