import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config/env';

const { combine, timestamp, printf, errors } = winston.format;

type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'debug';

// Color definitions for different log levels
const levelColors: Record<LogLevel, chalk.Chalk> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  http: chalk.magenta,
  debug: chalk.cyan,
};

const levelBrightColors: Record<LogLevel, chalk.Chalk> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  http: chalk.magentaBright,
  debug: chalk.cyanBright,
};

function isKnownLevel(level: string): level is LogLevel {
  return level in levelColors;
}

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const color = isKnownLevel(level) ? levelColors[level] : chalk.white;
  const brightColor = isKnownLevel(level) ? levelBrightColors[level] : chalk.whiteBright;

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);

  const formattedMessage = typeof message === 'string' ? brightColor(message) : String(message);

  // Include stack trace for errors
  return typeof stack === 'string'
    ? `${timestampStr} ${levelStr} ${formattedMessage}\n${chalk.red(stack)}`
    : `${timestampStr} ${levelStr} ${formattedMessage}`;
});

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL === 'silent' ? 'error' : env.LOG_LEVEL,
  silent: env.LOG_LEVEL === 'silent',
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'extraction-accuracy-engine' },
  transports: [
    new winston.transports.Console({
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

function toMessage(args: unknown): string {
  return typeof args === 'string' ? args : JSON.stringify(args, null, 2);
}

export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(toMessage(args));
  };

  public static error = (args: unknown, error?: unknown): void => {
    if (error instanceof Error) {
      logger.error(toMessage(args), { stack: error.stack });
      return;
    }
    logger.error(toMessage(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(toMessage(args));
  };
}

export default logger;
