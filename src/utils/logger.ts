import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type Paint = typeof chalk.red;

interface LevelStyle {
  color: Paint;
  bright: Paint;
  icon: string;
}

const levelStyles: Record<string, LevelStyle> = {
  error: { color: chalk.red, bright: chalk.redBright, icon: '❌' },
  warn: { color: chalk.yellow, bright: chalk.yellowBright, icon: '⚠️ ' },
  info: { color: chalk.blue, bright: chalk.blueBright, icon: 'ℹ️ ' },
  http: { color: chalk.magenta, bright: chalk.magentaBright, icon: '🌐' },
  debug: { color: chalk.cyan, bright: chalk.cyanBright, icon: '🔍' },
};

const fallbackStyle: LevelStyle = { color: chalk.white, bright: chalk.whiteBright, icon: '📝' };

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const style = levelStyles[level] ?? fallbackStyle;

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = style.color(`[${level.toUpperCase()}]`);
  const formattedMessage = typeof message === 'string' ? style.bright(message) : String(message);

  // Include stack trace for errors
  return stack
    ? `${timestampStr} ${style.icon} ${levelStr}\n${chalk.red(String(stack))}`
    : `${timestampStr} ${style.icon} ${levelStr} ${formattedMessage}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${String(stack ?? message)}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'invoice-reconciliation-backend' },
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

// Add file transports in production
if (env.NODE_ENV === 'production') {
  const filePipeline = combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    errors({ stack: true }),
    fileFormat
  );
  logger.add(new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: filePipeline }));
  logger.add(new winston.transports.File({ filename: 'logs/combined.log', format: filePipeline }));
}

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

/**
 * Static logging facade used by the server bootstrap and long-running jobs.
 * Plain levels go through winston; `success` and `box` print banners directly.
 */
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(toMessage(args));
  };

  public static error = (args: unknown): void => {
    logger.error(toMessage(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(toMessage(args));
  };

  public static http = (args: unknown): void => {
    logger.http(toMessage(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(toMessage(args)));
  };

  // Box-styled important message
  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    const rows = [
      chalk.cyan(`╔${line}╗`),
      chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╠${line}╣`),
      chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╚${line}╝`),
    ];
    // eslint-disable-next-line no-console
    console.log(rows.join('\n'));
  };
}

export default logger;
