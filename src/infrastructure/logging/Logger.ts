/**
 * Structured Logger
 *
 * Levelled, categorised logging for the scraper. Each entry becomes one line,
 * either `[Category] message (key=value ...)` or a JSON object. Warnings and
 * errors go to stderr, everything else to stdout.
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
  /** Colour text lines (default: false) */
  useColors: boolean;
  /** One JSON object per line instead of text (default: false) */
  jsonOutput: boolean;
  /** Receives entries instead of the console */
  customHandler?: (entry: LogEntry) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // Gray
  info: '\x1b[36m', // Cyan
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const CATEGORY_COLORS: Record<string, string> = {
  Main: '\x1b[37m', // White
  Config: '\x1b[36m', // Cyan
  Browser: '\x1b[34m', // Blue
  Console: '\x1b[31m', // Red
  Consent: '\x1b[35m', // Magenta
  Report: '\x1b[32m', // Green
  Scraper: '\x1b[33m', // Yellow
  Shutdown: '\x1b[90m', // Gray
};

const DEFAULT_CATEGORY_COLOR = '\x1b[37m';
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  useColors: false,
  jsonOutput: false,
};

function formatContext(context: LogContext | undefined): string | undefined {
  if (!context) {
    return undefined;
  }
  const pairs = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return pairs.length > 0 ? pairs.join(' ') : undefined;
}

/**
 * Renders an entry as a single text line.
 */
export function formatText(entry: LogEntry, useColors: boolean): string {
  const context = formatContext(entry.context);

  if (!useColors) {
    return [`[${entry.category}]`, entry.message, context && `(${context})`]
      .filter(Boolean)
      .join(' ');
  }

  const categoryColor = CATEGORY_COLORS[entry.category] ?? DEFAULT_CATEGORY_COLOR;
  const parts = [
    `${categoryColor}[${entry.category}]${RESET}`,
    `${LEVEL_COLORS[entry.level]}${entry.message}${RESET}`,
  ];
  if (context) {
    parts.push(`${DIM}(${context})${RESET}`);
  }
  return parts.join(' ');
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(
    private readonly category: string,
    config: Partial<LoggerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
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

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category: this.category,
      message,
      context,
    };

    if (this.config.customHandler) {
      this.config.customHandler(entry);
      return;
    }

    const line = this.config.jsonOutput
      ? JSON.stringify(entry)
      : formatText(entry, this.config.useColors);

    if (level === 'warn' || level === 'error') {
      // eslint-disable-next-line no-console
      console.error(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  }
}

let globalConfig: Partial<LoggerConfig> = {};

/**
 * Set global logger configuration. Applies to loggers created afterwards.
 */
export function setGlobalLoggerConfig(config: Partial<LoggerConfig>): void {
  globalConfig = config;
}

export function getLogger(category: string): Logger {
  return new Logger(category, globalConfig);
}
