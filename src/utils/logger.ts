/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  HIGHLIGHT = 'HIGHLIGHT',
}

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
};

/**
 * Minimal writable used for the single-line progress display
 */
export type ProgressStream = {
  write(chunk: string): unknown;
};

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

const LEVEL_ORDER = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.SUCCESS,
  LogLevel.WARNING,
  LogLevel.ERROR,
  LogLevel.HIGHLIGHT,
];

const EMOJI: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🔍',
  [LogLevel.INFO]: 'ℹ️',
  [LogLevel.SUCCESS]: '✅',
  [LogLevel.WARNING]: '⚠️',
  [LogLevel.ERROR]: '❌',
  [LogLevel.HIGHLIGHT]: '🌟',
};

/**
 * Logger class with colored console output and a single-line progress display
 */
export class Logger {
  private config: LoggerConfig;
  private lastProgressLength = 0;

  constructor(
    config: Partial<LoggerConfig> = {},
    private readonly progressStream: ProgressStream = process.stdout,
  ) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? !process.env.NO_COLOR,
    };
  }

  /**
   * Format date to human readable string (MM-DD HH:mm:ss)
   */
  private formatDate(date: Date): string {
    const month = (date.getMonth() + 1).toString().padStart(2, '0');
    const day = date.getDate().toString().padStart(2, '0');
    const hour = date.getHours().toString().padStart(2, '0');
    const min = date.getMinutes().toString().padStart(2, '0');
    const sec = date.getSeconds().toString().padStart(2, '0');
    return `${month}-${day} ${hour}:${min}:${sec}`;
  }

  private format(level: LogLevel, message: string): string {
    return `${this.formatDate(new Date())} ${EMOJI[level]} ${message}`;
  }

  private colorize(text: string, color: string): string {
    if (!this.config.useColors) return text;
    return `${color}${text}${colors.reset}`;
  }

  private write(level: LogLevel, message: string, color: string): void {
    if (!this.shouldLog(level)) return;

    // A pending progress line would otherwise be glued to the log line
    this.clearProgress();

    const line = this.format(level, this.colorize(message, color));
    if (level === LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message, colors.dim);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message, colors.blue);
  }

  success(message: string): void {
    this.write(LogLevel.SUCCESS, message, colors.green);
  }

  warning(message: string): void {
    this.write(LogLevel.WARNING, message, colors.yellow);
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message, colors.red);
  }

  highlight(message: string): void {
    this.write(LogLevel.HIGHLIGHT, message, colors.bright + colors.magenta);
  }

  /**
   * Update progress on the same line (overwrites previous output)
   */
  progress(message: string): void {
    this.clearProgress();
    this.progressStream.write(`\r${message}`);
    this.lastProgressLength = message.length;
  }

  /**
   * Finalize progress (add newline after last progress update)
   */
  endProgress(): void {
    if (this.lastProgressLength > 0) {
      this.progressStream.write('\n');
      this.lastProgressLength = 0;
    }
  }

  private clearProgress(): void {
    if (this.lastProgressLength > 0) {
      this.progressStream.write(`\r${' '.repeat(this.lastProgressLength)}\r`);
      this.lastProgressLength = 0;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }
}

// Default logger instance
export const logger: Logger = new Logger();
