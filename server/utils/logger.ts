import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']).catch('info');

let currentLogLevel: LogLevel = logLevelSchema.parse(process.env.LOG_LEVEL);
let logDir: string | null = null;

export interface LogMeta {
  correlationId?: string;
  channel?: string;
  userId?: string;
  conversationId?: string;
  stage?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

/**
 * Configure logging at startup. File output is enabled only when a
 * directory is given; console output is always on.
 */
export function configureLogger(options: { level?: LogLevel; dir?: string }): void {
  if (options.level) currentLogLevel = options.level;
  if (options.dir) {
    fs.mkdirSync(options.dir, { recursive: true });
    logDir = options.dir;
  }
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

export function writeLog(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel]) return;

  if (logDir) {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...meta,
    };
    const dateStr = new Date().toISOString().split('T')[0];
    const logFile = path.join(logDir, `relay-${dateStr}.log`);

    try {
      fs.appendFileSync(logFile, JSON.stringify(logEntry) + '\n');
    } catch (err) {
      console.error('[Logger] Failed to write to log file:', err);
    }
  }

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  writeLog('info', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  writeLog('error', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  writeLog('warn', message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  writeLog('debug', message, meta);
}

/**
 * Per-turn logger: every line carries the same correlation id, channel and
 * user so one chat turn can be followed across the orchestrator and handler.
 */
export class RequestLogger {
  private correlationId: string;
  private startTime: number;
  private channel?: string;
  private userId?: string;
  private stages: Map<string, number> = new Map();

  constructor(channel?: string, userId?: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.channel = channel;
    this.userId = userId;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      channel: this.channel,
      userId: this.userId,
      duration: Date.now() - this.startTime,
      ...extra,
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    const errorMeta: Partial<LogMeta> = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err) {
      errorMeta.error = String(err);
    }
    logError(message, this.getMeta({ ...errorMeta, ...extra }));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    logWarn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }

  getCorrelationId(): string {
    return this.correlationId;
  }

  getDuration(): number {
    return Date.now() - this.startTime;
  }
}
