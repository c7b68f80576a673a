#!/usr/bin/env node

import { Command } from 'commander';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import fs from 'fs';
import { analyzeCommand } from './commands/analyze.js';
import { reportCommand } from './commands/report.js';
import { registerAuthCommands } from './commands/auth.js';
import { registerConfigCommands } from './commands/config.js';
import { printBanner } from './services/renderer.js';

// Load environment variables: the app's own .env, then the working directory's
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const envPath = join(__dirname, '..', '.env');

if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
}
dotenv.config();

const program = new Command();

program
  .name('profile-pulse')
  .description('Rate-governed engagement analytics for public Instagram professional profiles')
  .version('1.0.0');

printBanner();

program.addCommand(analyzeCommand);
program.addCommand(reportCommand);

registerAuthCommands(program);
registerConfigCommands(program);

program.on('--help', () => {
  console.log('');
  console.log('Examples:');
  console.log('');
  console.log('  # Analyze the 50 most recent posts, export JSON and Markdown');
  console.log('  $ profile-pulse analyze natgeo');
  console.log('');
  console.log('  # Analyze 200 posts, JSON only, into ./out');
  console.log('  $ profile-pulse analyze natgeo --max-posts 200 --format json -o out');
  console.log('');
  console.log('  # Re-analyze a saved report offline');
  console.log('  $ profile-pulse report reports/instagram_natgeo_20240501_120000.json --top 5');
  console.log('');
  console.log('  # Store credentials');
  console.log('  $ profile-pulse auth login');
  console.log('');
  console.log('  # Slow down: at most 100 calls per hour');
  console.log('  $ profile-pulse config set maxRequestsPerWindow 100');
});

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync(process.argv);
}
