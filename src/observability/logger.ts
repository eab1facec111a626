import crypto from 'crypto';

export interface LogContext {
  reviewId: string;
  owner?: string;
  repo?: string;
  pullNumber?: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  reviewId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  owner?: string;
  repo?: string;
  pullNumber?: number;
}

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(name: string): name is keyof typeof LEVEL_RANK {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, name);
}

function resolveThreshold(raw: string | undefined): number {
  const name = (raw || 'info').toLowerCase();
  if (name === 'warning') return LEVEL_RANK.warn;
  return isLevelName(name) ? LEVEL_RANK[name] : LEVEL_RANK.info;
}

class Logger {
  private context: LogContext | null = null;

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  // Read per call so LOG_LEVEL set after import (dotenv, tests) still applies.
  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= resolveThreshold(process.env.LOG_LEVEL);
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      reviewId: this.context?.reviewId || 'unknown',
      phase,
      message,
      data,
    };

    if (this.context?.owner) entry.owner = this.context.owner;
    if (this.context?.repo) entry.repo = this.context.repo;
    if (this.context?.pullNumber) entry.pullNumber = this.context.pullNumber;

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

export function generateReviewId(): string {
  return crypto.randomBytes(8).toString('hex');
}
