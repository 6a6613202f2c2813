/**
 * Structured Logger
 *
 * Leveled, categorized logging. Every line goes to stderr so stdout stays
 * reserved for the run result.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  context?: LogContext;
}

export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  minLevel: LogLevel;
  /** Whether to include timestamps (default: false) */
  includeTimestamp: boolean;
  /** Whether to use colors in console output (default: true) */
  useColors: boolean;
  /** Whether to output as JSON lines (default: false) */
  jsonOutput: boolean;
  /** Fields attached to every entry from this logger */
  boundContext?: LogContext;
  /** Custom log handler */
  customHandler?: (entry: LogEntry) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // Gray
  info: '\x1b[36m', // Cyan
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const CATEGORY_COLORS: Record<string, string> = {
  Session: '\x1b[35m', // Magenta
  Navigator: '\x1b[34m', // Blue
  Extractor: '\x1b[32m', // Green
  Retry: '\x1b[33m', // Yellow
  Sink: '\x1b[36m', // Cyan
  Runner: '\x1b[37m', // White
  Shutdown: '\x1b[31m', // Red
  Config: '\x1b[33m', // Yellow
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  includeTimestamp: false,
  useColors: true,
  jsonOutput: false,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Errors do not survive JSON.stringify; keep their kind and message instead.
 */
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const kind = 'kind' in value && typeof value.kind === 'string' ? value.kind : value.name;
    return `${kind}: ${value.message}`;
  }
  return value;
}

function mergeContext(bound?: LogContext, context?: LogContext): LogContext | undefined {
  if (!bound && !context) {
    return undefined;
  }
  const merged: LogContext = {};
  for (const [key, value] of Object.entries({ ...bound, ...context })) {
    merged[key] = serializeValue(value);
  }
  return merged;
}

/**
 * Structured logger with levels and categories.
 */
export class Logger {
  private config: LoggerConfig;
  private category: string;

  constructor(category: string, config: Partial<LoggerConfig> = {}) {
    this.category = category;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category: this.category,
      message,
      context: mergeContext(this.config.boundContext, context),
    };

    if (this.config.customHandler) {
      this.config.customHandler(entry);
      return;
    }

    if (this.config.jsonOutput) {
      // eslint-disable-next-line no-console
      console.error(JSON.stringify(entry));
    } else {
      this.outputText(entry);
    }
  }

  private outputText(entry: LogEntry): void {
    const parts: string[] = [];
    const colors = this.config.useColors;

    if (this.config.includeTimestamp) {
      const time = entry.timestamp.slice(11, 19);
      parts.push(colors ? `${DIM}${time}${RESET}` : time);
    }

    const categoryColor = CATEGORY_COLORS[entry.category.split(':')[0]] ?? '\x1b[37m';
    parts.push(colors ? `${categoryColor}[${entry.category}]${RESET}` : `[${entry.category}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      const contextStr = Object.entries(entry.context)
        .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
        .join(' ');
      parts.push(colors ? `${DIM}(${contextStr})${RESET}` : `(${contextStr})`);
    }

    const output = parts.join(' ');
    const line = colors && entry.level !== 'info' ? `${LOG_COLORS[entry.level]}${output}${RESET}` : output;

    if (entry.level === 'warn') {
      // eslint-disable-next-line no-console
      console.warn(line);
    } else {
      // eslint-disable-next-line no-console
      console.error(line);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Create a child logger with a sub-category.
   */
  child(subCategory: string): Logger {
    return new Logger(`${this.category}:${subCategory}`, this.config);
  }

  /**
   * Same category, with `context` added to every entry.
   */
  withContext(context: LogContext): Logger {
    return new Logger(this.category, {
      ...this.config,
      boundContext: { ...this.config.boundContext, ...context },
    });
  }
}

/**
 * Global logger configuration.
 */
let globalConfig: Partial<LoggerConfig> = {};

export function setGlobalLoggerConfig(config: Partial<LoggerConfig>): void {
  globalConfig = config;
}

/**
 * Get a logger for a category. Picks up the global configuration at call time.
 */
export function getLogger(category: string): Logger {
  return new Logger(category, globalConfig);
}
