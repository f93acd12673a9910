import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const isTest = process.env.NODE_ENV === 'test';
const logDir = process.env.LOG_DIR || 'logs';

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      silent: isTest,
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (!isTest && process.env.LOG_TO_FILE !== 'false') {
    transports.push(
      new winston.transports.File({ filename: `${logDir}/error.log`, level: 'error' }),
      new DailyRotateFile({
        filename: `${logDir}/combined-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '14d',
        zippedArchive: false,
      }),
    );
  }

  return transports;
}

// One winston instance shared by every context; Logger just tags the context.
let root: winston.Logger | null = null;

function rootLogger(): winston.Logger {
  if (!root) {
    root = winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      ),
      transports: buildTransports(),
    });
  }
  return root;
}

export class Logger {
  private readonly logger: winston.Logger;

  constructor(private readonly context: string) {
    this.logger = rootLogger().child({ context });
  }

  info(message: string, meta?: unknown): void {
    this.logger.info(message, toMeta(meta));
  }

  error(message: string, meta?: unknown): void {
    this.logger.error(message, toMeta(meta));
  }

  warn(message: string, meta?: unknown): void {
    this.logger.warn(message, toMeta(meta));
  }

  debug(message: string, meta?: unknown): void {
    this.logger.debug(message, toMeta(meta));
  }
}

function toMeta(meta: unknown): object | undefined {
  if (meta === undefined) return undefined;
  if (meta instanceof Error) return { error: meta.message, stack: meta.stack };
  if (typeof meta === 'object' && meta !== null) return meta;
  return { detail: meta };
}

export async function closeLoggers(): Promise<void> {
  if (!root) return;
  const logger = root;
  root = null;
  await new Promise<void>((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}
