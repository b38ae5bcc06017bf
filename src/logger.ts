import { pino, destination, type Logger as PinoLogger } from 'pino';
import pretty from 'pino-pretty';
import { IS_PRODUCTION } from './config.js';

export class Logger {
  private readonly logger: PinoLogger;

  constructor(namespace: string, level?: string) {
    const logLevel = level || process.env.LOG_LEVEL || 'info';

    this.logger = IS_PRODUCTION
      ? pino({
          name: namespace,
          level: logLevel,
        })
      : pino(
          { name: namespace },
          pretty({
            colorize: true,
            ignore: 'pid,hostname',
            messageFormat: '[{name}] {msg}',
            destination: destination({
              sync: true,
            }),
            sync: true,
          }),
        );

    // Apply log level to pretty logger too
    if (!IS_PRODUCTION) {
      this.logger.level = logLevel;
    }
  }

  error(message: string, data?: unknown) {
    this.logger.error(data, message);
  }

  warn(message: string, data?: unknown) {
    this.logger.warn(data, message);
  }

  info(message: string, data?: unknown) {
    this.logger.info(data, message);
  }

  debug(message: string, data?: unknown) {
    this.logger.debug(data, message);
  }

  /** Flush pending log lines before the process exits */
  async flush(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.flush(() => resolve());
    });
  }
}
