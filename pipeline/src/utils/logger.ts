import { ExtractCategory } from '@optionlens/shared';

interface LogLevel {
  ERROR: 'error';
  WARN: 'warn';
  INFO: 'info';
  DEBUG: 'debug';
}

export type LogLevelName = keyof LogLevel;

interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  message: string;
  service: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string | undefined;
  };
}

export class Logger {
  private serviceName: string;
  private logLevel: LogLevelName = 'INFO';

  constructor(serviceName: string, logLevel: LogLevelName = 'INFO') {
    this.serviceName = serviceName;
    this.logLevel = logLevel;
  }

  private shouldLog(level: LogLevelName): boolean {
    const levels: Record<LogLevelName, number> = {
      ERROR: 0,
      WARN: 1,
      INFO: 2,
      DEBUG: 3,
    };

    return levels[level] <= levels[this.logLevel];
  }

  private formatLog(level: LogLevelName, message: string, data?: Record<string, unknown>, error?: Error): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.serviceName,
    };

    if (data) {
      logEntry.data = data;
    }

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack || undefined,
      };
    }

    return logEntry;
  }

  private output(level: LogLevelName, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEntry = this.formatLog(level, message, data, error);

    // Use different console methods based on level
    switch (level) {
      case 'ERROR':
        console.error(JSON.stringify(logEntry));
        break;
      case 'WARN':
        console.warn(JSON.stringify(logEntry));
        break;
      case 'INFO':
        console.log(JSON.stringify(logEntry));
        break;
      case 'DEBUG':
        console.debug(JSON.stringify(logEntry));
        break;
    }
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.output('ERROR', message, data, error);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.output('WARN', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.output('INFO', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.output('DEBUG', message, data);
  }

  // Specialized logging methods for pipeline stages
  categoryLoaded(category: ExtractCategory, files: string[], rows: number): void {
    this.info('Extract category loaded', { category, fileCount: files.length, files, rows });
  }

  stageCompleted(stage: string, rows: number, details?: Record<string, unknown>): void {
    this.debug(`Stage ${stage} completed`, { stage, rows, ...details });
  }

  identityViolations(violations: number, contractIds: string[]): void {
    if (violations === 0) {
      this.debug('Contract descriptions are stable across observations');
      return;
    }
    this.warn('Contract ids seen with more than one description', {
      violations,
      sample: contractIds.slice(0, 10),
    });
  }

  performanceMetric(metric: string, value: number, unit: string = 'ms'): void {
    this.info('Performance metric', { metric, value, unit });
  }
}

export function parseLogLevel(value: string): LogLevelName | null {
  switch (value.trim().toLowerCase()) {
    case 'error':
      return 'ERROR';
    case 'warn':
      return 'WARN';
    case 'info':
      return 'INFO';
    case 'debug':
      return 'DEBUG';
    default:
      return null;
  }
}

const envLevel = parseLogLevel(process.env.LOG_LEVEL || 'info') ?? 'INFO';

// Create logger instances for the pipeline stages
export const loaderLogger = new Logger('loader', envLevel);
export const pipelineLogger = new Logger('pipeline', envLevel);
