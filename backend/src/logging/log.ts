/**
 * Logger
 *
 * One `Log` per service. Lines at or above `LOG_LEVEL` go to the console
 * (debug | info | warn | error | silent); every line is appended as JSON to
 * `LOG_FILE_PATH`, which defaults to logs/forgeloop.log and is disabled by
 * an empty value. Both variables are read on each call.
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  /** ISO-8601 */
  time: string;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function consoleThreshold(): number {
  const key = (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  for (const [level, order] of Object.entries(LEVEL_ORDER)) {
    if (level === key) return order;
  }
  return LEVEL_ORDER.info;
}

function logFilePath(): string {
  const configured = process.env.LOG_FILE_PATH;
  return configured !== undefined ? configured.trim() : path.join(process.cwd(), 'logs', 'forgeloop.log');
}

/** Errors do not survive JSON.stringify; keep their name and message. */
function serializable(data: unknown): unknown {
  return data instanceof Error ? { name: data.name, message: data.message } : data;
}

export class Log {
  private static instances = new Map<string, Log>();
  private static readyDirs = new Set<string>();

  private constructor(readonly service: string) {}

  static create(config: { service: string }): Log {
    const existing = Log.instances.get(config.service);
    if (existing) {
      return existing;
    }
    const created = new Log(config.service);
    Log.instances.set(config.service, created);
    return created;
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const entry: LogEntry = { level, service: this.service, message, time: new Date().toISOString() };
    if (data !== undefined) entry.data = serializable(data);

    if (LEVEL_ORDER[level] >= consoleThreshold()) {
      const line = `[${entry.time}] [${this.service}] [${level.toUpperCase()}] ${message}`;
      const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      if (data === undefined) {
        write(line);
      } else {
        write(line, data);
      }
    }

    this.append(entry);
  }

  private append(entry: LogEntry): void {
    const file = logFilePath();
    if (!file) {
      return;
    }
    try {
      const dir = path.dirname(file);
      if (!Log.readyDirs.has(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        Log.readyDirs.add(dir);
      }
      fs.appendFileSync(file, `${JSON.stringify(entry)}\n`, 'utf8');
    } catch (error) {
      console.warn('[Log] could not append to log file:', error);
    }
  }
}

export function createLogger(service: string): Log {
  return Log.create({ service });
}
