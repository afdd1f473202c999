import chalk from 'chalk';
import dayjs from 'dayjs';
import { HttpStatusError, HttpTransportError } from '../types/errors.js';

type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function timestamp(): string {
  // Local time in a readable format
  return dayjs().format('YYYY-MM-DD HH:mm:ss');
}

function threshold(): number {
  const ll = (process.env.LOG_LEVEL || '').toLowerCase();
  const dbg = (process.env.DEBUG || '').toLowerCase();
  if (dbg === '1' || dbg === 'true' || dbg === 'yes' || dbg === 'on') return LEVEL_ORDER.debug;
  if (ll === 'debug' || ll === 'info' || ll === 'warn' || ll === 'error') return LEVEL_ORDER[ll];
  return LEVEL_ORDER.info;
}

function enabled(level: Level): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

export class Logger {
  static info(message: string): void {
    if (!enabled('info')) return;
    console.log(`${timestamp()} ${chalk.blueBright('[INFO]')} ${message}`);
  }

  static warn(message: string): void {
    if (!enabled('warn')) return;
    console.warn(`${timestamp()} ${chalk.yellow('[WARN]')} ${message}`);
  }

  static error(message: string, err?: unknown): void {
    if (!enabled('error')) return;
    let detail = '';
    if (err instanceof Error) {
      detail = `\n${err.name}: ${err.message}`;

      if (err instanceof HttpStatusError) {
        detail += `\nHTTP Status: ${err.status}\nURL: ${err.url}`;
      }
      if (err instanceof HttpTransportError) {
        detail += `\nURL: ${err.url}`;
        if (err.cause instanceof Error) {
          detail += `\nCause: ${err.cause.name}: ${err.cause.message}`;
        }
      }

      if (err.stack) {
        detail += `\n${err.stack}`;
      }
    } else if (err) {
      try {
        detail = `\n${JSON.stringify(err, null, 2)}`;
      } catch {
        detail = `\n${String(err)}`;
      }
    }
    console.error(`${timestamp()} ${chalk.red('[ERROR]')} ${message}${detail}`);
  }

  static debug(message: string): void {
    if (!enabled('debug')) return;
    // Print debug without the noisy [DEBUG] label
    console.debug(`${timestamp()} ${message}`);
  }
}
