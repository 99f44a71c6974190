import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type Level = 'error' | 'warn' | 'info' | 'http' | 'debug';

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

const palette: Record<Level, { tag: chalk.Chalk; text: chalk.Chalk }> = {
  error: { tag: chalk.red, text: chalk.redBright },
  warn: { tag: chalk.yellow, text: chalk.yellowBright },
  info: { tag: chalk.blue, text: chalk.blueBright },
  http: { tag: chalk.magenta, text: chalk.magentaBright },
  debug: { tag: chalk.cyan, text: chalk.cyanBright },
};

const isLevel = (level: string): level is Level => level in palette;

// Console output: grey timestamp, coloured level tag, stack traces in red
const consoleFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const colours = isLevel(level) ? palette[level] : { tag: chalk.white, text: chalk.whiteBright };
  const head = `${chalk.gray(`[${String(ts)}]`)} ${colours.tag(`[${level.toUpperCase()}]`)}`;

  if (typeof stack === 'string') {
    return `${head} ${String(message)}\n${chalk.red(stack)}`;
  }

  return `${head} ${typeof message === 'string' ? colours.text(message) : String(message)}`;
});

// Plain output for log files
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${typeof stack === 'string' ? stack : String(message)}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true })),
  defaultMeta: { service: 'recurring-reconciliation' },
  transports: [
    new winston.transports.Console({
      silent: env.NODE_ENV === 'test' && env.LOG_LEVEL === 'error',
      format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), consoleFormat),
    }),
  ],
});

if (env.NODE_ENV === 'production') {
  const fileTransportFormat = combine(
    timestamp({ format: TIMESTAMP_FORMAT }),
    errors({ stack: true }),
    fileFormat
  );
  logger.add(
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: fileTransportFormat })
  );
  logger.add(new winston.transports.File({ filename: 'logs/combined.log', format: fileTransportFormat }));
}

const stringify = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

/**
 * Static logging facade. Objects are pretty-printed as JSON.
 */
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(stringify(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(stringify(args));
  };

  public static error = (args: unknown): void => {
    logger.error(stringify(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(stringify(args));
  };

  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), chalk.green('[SUCCESS]'), chalk.greenBright(stringify(args)));
  };

  // Framed banner used once at start-up
  public static box = (title: string, message: string): void => {
    const width = Math.max(title.length, message.length) + 2;
    const line = '═'.repeat(width);
    // eslint-disable-next-line no-console
    console.log(
      [
        chalk.cyan(`╔${line}╗`),
        chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(width - 1)}`) + chalk.cyan('║'),
        chalk.cyan(`╠${line}╣`),
        chalk.cyan('║') + chalk.white(` ${message.padEnd(width - 1)}`) + chalk.cyan('║'),
        chalk.cyan(`╚${line}╝`),
      ].join('\n')
    );
  };
}

export default logger;
