export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_COLORS = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function thresholdFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(raw)) return raw;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

class Logger {
  private context: string;

  constructor(context: string = 'Engine') {
    this.context = context;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[thresholdFromEnv()];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const color = LOG_COLORS[level];
    const reset = LOG_COLORS.reset;
    const prefix = `${color}[${timestamp}] [${level.toUpperCase()}] [${this.context}]${reset}`;

    let output = `${prefix} ${message}`;
    if (data instanceof Error) {
      output += ` ${data.name}: ${data.message}`;
    } else if (data !== undefined) {
      output += ` ${JSON.stringify(data, null, 2)}`;
    }
    return output;
  }

  debug(message: string, data?: unknown) {
    if (this.enabled('debug')) {
      console.log(this.formatMessage('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.enabled('info')) {
      console.log(this.formatMessage('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('warn', message, data));
    }
  }

  error(message: string, data?: unknown) {
    console.error(this.formatMessage('error', message, data));
  }

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`);
  }
}

export type { Logger };
export const createLogger = (context: string) => new Logger(context);
