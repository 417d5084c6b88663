import { getSettings, type LogLevel } from '../config/settings.js';

export interface LogContext {
  instanceId: string;
  entity?: string;
}

type EntryLevel = Exclude<LogLevel, 'silent'>;

interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  instanceId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  entity?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

class Logger {
  private context: LogContext | null = null;
  private level: LogLevel | null = null;

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  setLevel(level: LogLevel | null): void {
    this.level = level;
  }

  private threshold(): LogLevel {
    return this.level ?? getSettings().logLevel;
  }

  private log(level: EntryLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold()]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      instanceId: this.context?.instanceId || 'unknown',
      phase,
      message,
      data,
    };

    if (this.context?.entity) entry.entity = this.context.entity;

    console.log(JSON.stringify(entry));
  }

  debug(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', phase, message, data);
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();
