import fs from 'fs';
import path from 'path';
import config from './config';

// Log levels
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Options overriding the configured logging behaviour
 */
export interface LoggerOptions {
  minLevel?: LogLevel;
  logToFile?: boolean;
}

/**
 * Statistics written into a workload report
 */
export interface WorkloadReportStats {
  startTime: Date;
  endTime: Date;
  entryUrl: string;
  attempted: number;
  completed: number;
  failed: number;
  skipped: number;
  questionsAnswered: number;
  cancelled: boolean;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

function toLogLevel(name: string): LogLevel {
  return LEVEL_ORDER.find(level => level === name) || LogLevel.INFO;
}

/**
 * Logger class for tracking agent progress
 */
export class Logger {
  private logDir: string;
  private logFile: string;
  private sessionId: string;
  private minLevel: LogLevel;
  private logToFile: boolean;

  /**
   * Create a new logger instance
   * @param sessionId Session ID for this run
   * @param logDir Directory to store log files
   * @param options Overrides for level and file output
   */
  constructor(sessionId?: string, logDir?: string, options: LoggerOptions = {}) {
    this.minLevel = options.minLevel || toLogLevel(config.logging.logLevel);
    this.logToFile = options.logToFile ?? config.logging.logToFile;
    this.logDir = logDir || config.logging.logDir || './logs';
    this.sessionId = sessionId || `session_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
    this.logFile = path.join(this.logDir, `${this.sessionId}.log`);

    // Create log directory only when something will be written there
    if (this.logToFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    this.debug(`Session ${this.sessionId} started`);
  }

  /**
   * Get the current session ID
   * @returns Session ID
   */
  getSessionId(): string {
    return this.sessionId;
  }

  /**
   * Get the log file path, even when file output is disabled
   */
  getLogFile(): string {
    return this.logFile;
  }

  /**
   * Change the minimum level at runtime (used by the CLI's --debug flag)
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Log a debug message
   * @param message Message to log
   * @param data Optional data to include
   */
  debug(message: string, data?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.log(LogLevel.DEBUG, message, data);
    }
  }

  /**
   * Log an info message
   * @param message Message to log
   * @param data Optional data to include
   */
  info(message: string, data?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.log(LogLevel.INFO, message, data);
    }
  }

  /**
   * Log a warning message
   * @param message Message to log
   * @param data Optional data to include
   */
  warn(message: string, data?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.log(LogLevel.WARN, message, data);
    }
  }

  /**
   * Log an error message
   * @param message Message to log
   * @param error Error object or data to include
   */
  error(message: string, error?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.log(LogLevel.ERROR, message, error);
    }
  }

  /**
   * Generate a summary report of a workload run
   * @param stats Statistics about the run
   * @returns Path to the report file
   */
  generateReport(stats: WorkloadReportStats): string {
    const reportDir = path.join(this.logDir, 'reports');
    if (!fs.existsSync(reportDir)) {
      fs.mkdirSync(reportDir, { recursive: true });
    }

    const reportFile = path.join(reportDir, `${this.sessionId}_report.json`);

    // Calculate duration
    const durationMs = stats.endTime.getTime() - stats.startTime.getTime();
    const durationMinutes = Math.floor(durationMs / 60000);
    const durationSeconds = Math.floor((durationMs % 60000) / 1000);

    const report = {
      sessionId: this.sessionId,
      entryUrl: stats.entryUrl,
      startTime: stats.startTime.toISOString(),
      endTime: stats.endTime.toISOString(),
      duration: `${durationMinutes}m ${durationSeconds}s`,
      attempted: stats.attempted,
      completed: stats.completed,
      failed: stats.failed,
      skipped: stats.skipped,
      questionsAnswered: stats.questionsAnswered,
      cancelled: stats.cancelled,
    };

    fs.writeFileSync(reportFile, JSON.stringify(report, null, 2));

    this.info(`Generated report at ${reportFile}`);
    return reportFile;
  }

  /**
   * Check if a log level should be logged based on the minimum level
   * @param level Log level to check
   * @returns True if the level should be logged
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }

  /**
   * Log a message to the log file and console
   * @param level Log level
   * @param message Message to log
   * @param data Optional data to include
   */
  private log(level: LogLevel, message: string, data?: unknown): void {
    const timestamp = new Date().toISOString();

    if (this.logToFile) {
      let fileOutput = `${timestamp} [${level.toUpperCase()}] ${message}`;
      if (data !== undefined) {
        if (data instanceof Error) {
          fileOutput += `\n${data.stack || data.message}`;
        } else if (typeof data === 'object') {
          fileOutput += `\n${JSON.stringify(data, null, 2)}`;
        } else {
          fileOutput += `\n${String(data)}`;
        }
      }
      fs.appendFileSync(this.logFile, fileOutput + '\n');
    }

    const consoleOutput = `[${level.toUpperCase()}] ${message}`;

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(consoleOutput);
        break;
      case LogLevel.INFO:
        console.info(consoleOutput);
        break;
      case LogLevel.WARN:
        console.warn(consoleOutput);
        break;
      case LogLevel.ERROR:
        console.error(consoleOutput);
        if (data instanceof Error) {
          console.error(data.stack || data.message);
        } else if (data !== undefined) {
          console.error(data);
        }
        break;
    }
  }
}

// Create and export a default logger instance
export const logger = new Logger();

// Export default
export default logger;
