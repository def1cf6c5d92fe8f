type LogLevel = 'log' | 'error' | 'warn' | 'debug';

export interface Logger {
  log(message: unknown, context?: string): void;
  error(message: unknown, trace?: string, context?: string): void;
  warn(message: unknown, context?: string): void;
  debug(message: unknown, context?: string): void;
}

export class StructuredLogger implements Logger {
  constructor(private readonly debugEnabled = process.env.LOG_LEVEL === 'debug') {}

  log(message: unknown, context?: string): void {
    this.write('log', message, context);
  }

  error(message: unknown, trace?: string, context?: string): void {
    this.write('error', message, context, trace);
  }

  warn(message: unknown, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: unknown, context?: string): void {
    if (!this.debugEnabled) {
      return;
    }
    this.write('debug', message, context);
  }

  private write(level: LogLevel, message: unknown, context?: string, trace?: string): void {
    const payload = {
      ts: new Date().toISOString(),
      level,
      context: context ?? 'worker',
      message,
      trace
    };

    if (level === 'error') {
      console.error(JSON.stringify(payload));
      return;
    }

    console.log(JSON.stringify(payload));
  }
}

export const silentLogger: Logger = {
  log: () => undefined,
  error: () => undefined,
  warn: () => undefined,
  debug: () => undefined
};
