import { pino, destination, type Logger as PinoLogger } from 'pino';
import pretty from 'pino-pretty';
import { IS_PRODUCTION } from './config.js';
import { maskAddress } from './notifications/notification.message.js';

/** Structured fields that may carry a phone number or Slack id. */
const ADDRESS_PATHS = ['address', 'recipientAddress', 'primaryAddress', 'secondaryAddress', '*.address'];

function createRoot(): PinoLogger {
  const options = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: ADDRESS_PATHS,
      censor: (value: unknown) => (typeof value === 'string' ? maskAddress(value) : value),
    },
  };

  if (IS_PRODUCTION) {
    return pino(options);
  }
  return pino(
    options,
    pretty({
      colorize: true,
      ignore: 'pid,hostname,module',
      messageFormat: '[{module}] {msg}',
      destination: destination({ sync: true }),
      sync: true,
    }),
  );
}

const root = createRoot();
const instances = new Set<Logger>();

/** Namespaced logger; every instance writes through one shared pino root. */
export class Logger {
  private readonly logger: PinoLogger;

  constructor(namespace: string) {
    this.logger = root.child({ module: namespace });
    instances.add(this);
  }

  /** Applies a level (e.g. from the validated configuration) to every logger, existing and future. */
  static setLevel(level: string) {
    root.level = level;
    for (const instance of instances) {
      instance.logger.level = level;
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

  trace(message: string, data?: unknown) {
    this.logger.trace(data, message);
  }

  /** Writes out anything buffered; call before the process exits. */
  async flush(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.flush(() => resolve());
    });
  }
}
