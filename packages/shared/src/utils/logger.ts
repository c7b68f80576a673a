import winston from 'winston';

export interface LoggerOptions {
  service: string;
  level?: string;
  /** Level of the console transport; defaults to the logger level. */
  consoleLevel?: string;
  /** Also write JSON lines to this file. */
  logFile?: string;
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const production = process.env.NODE_ENV === 'production';
  const level = options.level ?? (production ? 'info' : 'debug');

  const logger = winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: options.service },
    transports: [
      new winston.transports.Console({
        level: options.consoleLevel ?? level,
        // Console output goes to stderr so report output on stdout stays clean.
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
        format: production
          ? winston.format.json()
          : winston.format.combine(winston.format.colorize(), winston.format.simple()),
      }),
    ],
  });

  if (options.logFile) {
    logger.add(
      new winston.transports.File({
        filename: options.logFile,
        format: winston.format.json(),
      })
    );
  }

  return logger;
}
