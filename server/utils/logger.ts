import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

const LOG_DIR = path.join(process.cwd(), 'logs');

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

let currentLogLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';
const FILE_LOGGING = process.env.LOG_TO_FILE !== 'false';

let logDirReady = false;

export interface LogMeta {
  correlationId?: string;
  chatId?: string;
  messageId?: string;
  senderId?: string;
  stage?: string;
  tier?: string;
  model?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

/** Overrides the level read from LOG_LEVEL at import time. */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

function appendToFile(entry: Record<string, unknown>): void {
  if (!FILE_LOGGING) return;
  try {
    if (!logDirReady) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
      logDirReady = true;
    }
    const dateStr = new Date().toISOString().split('T')[0];
    fs.appendFileSync(path.join(LOG_DIR, `bot-${dateStr}.log`), JSON.stringify(entry) + '\n');
  } catch (err) {
    console.error('[Logger] Failed to write to log file:', err);
  }
}

export function writeLog(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel]) return;

  appendToFile({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta
  });

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
 * Logger scoped to one inbound message. Every line carries the same
 * correlation id so a single pipeline run can be followed across tiers.
 */
export class RequestLogger {
  private correlationId: string;
  private startTime: number;
  private chatId?: string;
  private messageId?: string;
  private senderId?: string;
  private stages: Map<string, number> = new Map();

  constructor(chatId?: string, messageId?: string, senderId?: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.chatId = chatId;
    this.messageId = messageId;
    this.senderId = senderId;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      chatId: this.chatId,
      messageId: this.messageId,
      senderId: this.senderId,
      duration: Date.now() - this.startTime,
      ...extra
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
    } else if (err !== undefined) {
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
