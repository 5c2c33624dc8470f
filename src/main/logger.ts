import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

class Logger {
  constructor(private readonly threshold: LogLevel) {}

  debug(message: unknown, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: unknown, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: unknown, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: unknown, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  private write(level: LogLevel, message: unknown, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) {
      return;
    }
    const line = `[${new Date().toISOString()}] [${level}] ${format(message, ...args)}`;
    if (level === 'error') {
      console.error(line);
      return;
    }
    console.log(line);
  }
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();

const log = new Logger(isLogLevel(envLevel) ? envLevel : 'info');

export default log;
