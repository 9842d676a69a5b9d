// Centralized logging for formwork

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Resolves a configuration level name
 */
export function levelFromName(name: LogLevelName): LogLevel {
  return LEVEL_NAMES[name];
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  /** Context merged into every entry written by this logger */
  bindings?: Record<string, unknown>;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[formwork]',
  timestamps: false
};

/**
 * Logger with structured output
 *
 * Child loggers share their parent's level, so `Logger.configure` and
 * `setLevel` on the root reach every scope created from it.
 */
export class Logger {
  private config: LoggerConfig;
  private readonly parent: Logger | null;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}, parent: Logger | null = null) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.parent = parent;
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the singleton logger in place
   */
  static configure(config: Partial<LoggerConfig>): void {
    const instance = Logger.getInstance();
    instance.config = { ...instance.config, ...config };
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.config.level = level;
  }

  get level(): LogLevel {
    return this.parent ? this.parent.level : this.config.level;
  }

  /**
   * Create a logger that tags every entry with `bindings`
   */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger(
      { ...this.config, bindings: { ...this.config.bindings, ...bindings } },
      this.parent ?? this
    );
  }

  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];
    const root = this.parent ?? this;

    if (root.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (root.config.prefix) {
      parts.push(root.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    const merged = { ...this.config.bindings, ...context };
    if (Object.keys(merged).length > 0) {
      parts.push(JSON.stringify(merged, jsonReplacer));
    }

    return parts.join(' ');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(this.format('DEBUG', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      console.info(this.format('INFO', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(this.format('WARN', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(this.format('ERROR', message, context));
    }
  }

  /**
   * Log an error with stack trace
   */
  exception(error: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = {
        ...context,
        name: error.name,
        stack: error.stack
      };
      console.error(this.format('ERROR', error.message, errorContext));
    }
  }
}

// Raw input routinely contains values JSON.stringify rejects
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return `${value}n`;
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (typeof value === 'symbol') {
    return value.toString();
  }
  return value;
}

export const logger = Logger.getInstance();
