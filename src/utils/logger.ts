// Structured console logging for pipeline stages and provider calls

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  sceneId?: number;
  model?: string;
  provider?: string;
  attempt?: number;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export class Logger {
  private prefix: string;

  constructor(prefix: string = '') {
    this.prefix = prefix;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
  }

  private formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? JSON.stringify(context) : '';
    const prefix = this.prefix ? `[${this.prefix}]` : '';
    return `${timestamp} ${prefix} [${level}] ${message} ${contextStr}`.trimEnd();
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled('info')) return;
    console.log(this.formatMessage('INFO', message, context));
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;
    const errorDetails = error instanceof Error
      ? { message: error.message, stack: error.stack, name: error.name }
      : { error: String(error) };

    console.error(this.formatMessage('ERROR', message, { ...context, ...errorDetails }));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled('warn')) return;
    console.warn(this.formatMessage('WARN', message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled('debug')) return;
    console.log(this.formatMessage('DEBUG', message, context));
  }

  // Log provider calls with timing
  async logApiCall<T>(
    name: string,
    fn: () => Promise<T>,
    context?: LogContext
  ): Promise<T> {
    const startTime = Date.now();
    this.debug(`API Call Started: ${name}`, context);

    try {
      const result = await fn();
      const duration = Date.now() - startTime;
      this.info(`API Call Success: ${name}`, { ...context, duration: `${duration}ms` });
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      this.error(`API Call Failed: ${name}`, error, { ...context, duration: `${duration}ms` });
      throw error;
    }
  }
}

export const pipelineLogger = new Logger('Pipeline');
export const imageLogger = new Logger('Image');
export const audioLogger = new Logger('Audio');
export const llmLogger = new Logger('LLM');
export const apiLogger = new Logger('API');
