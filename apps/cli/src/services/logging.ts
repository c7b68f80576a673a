import path from 'path';
import { mkdirSync } from 'fs';
import { ILogger, createLogger } from '@profile-pulse/shared';
import { defaultConfigDir } from './config.js';

function logFileFor(date: Date, configDir: string): string {
  const stamp = `${date.getFullYear()}${String(date.getMonth() + 1).padStart(2, '0')}${String(date.getDate()).padStart(2, '0')}`;
  return path.join(configDir, 'logs', `profile-pulse_${stamp}.log`);
}

export function createCliLogger(verbose: boolean, configDir: string = defaultConfigDir()): ILogger {
  const logFile = logFileFor(new Date(), configDir);
  mkdirSync(path.dirname(logFile), { recursive: true });

  return createLogger({
    service: 'profile-pulse-cli',
    level: 'debug',
    consoleLevel: verbose ? 'debug' : 'warn',
    logFile,
  });
}
