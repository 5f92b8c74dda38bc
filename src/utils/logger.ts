/**
 * Structured logging for the font pipeline.
 *
 * Entries are kept in memory so callers can report warnings (for example the
 * cells that failed to trace). Console output goes to stderr because stdout
 * carries the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  scope: string;
  action: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function levelFromEnv(): LogLevel | 'silent' {
  const value = process.env.FONTGEN_LOG_LEVEL;
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error' || value === 'silent') {
    return value;
  }
  return 'info';
}

const MAX_ENTRIES = 2000;

export class PipelineLogger {
  private entries: LogEntry[] = [];

  constructor(private readonly threshold: LogLevel | 'silent' = levelFromEnv()) {}

  debug(scope: string, action: string, metadata?: Record<string, unknown>): void {
    this.log('debug', scope, action, metadata);
  }

  info(scope: string, action: string, metadata?: Record<string, unknown>): void {
    this.log('info', scope, action, metadata);
  }

  warn(scope: string, action: string, metadata?: Record<string, unknown>): void {
    this.log('warn', scope, action, metadata);
  }

  error(scope: string, action: string, metadata?: Record<string, unknown>): void {
    this.log('error', scope, action, metadata);
  }

  /**
   * Log with the elapsed time since `startTime` as `duration`.
   */
  timed(level: LogLevel, scope: string, action: string, startTime: number, metadata?: Record<string, unknown>): void {
    this.log(level, scope, action, { ...metadata, duration: Date.now() - startTime });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }

  private log(level: LogLevel, scope: string, action: string, metadata?: Record<string, unknown>): void {
    this.entries.push({ ...metadata, timestamp: Date.now(), level, scope, action });
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.splice(0, this.entries.length - MAX_ENTRIES);
    }

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;

    const message = `[${scope}] ${action}`;
    if (metadata) {
      console.error(message, metadata);
    } else {
      console.error(message);
    }
  }
}

export const logger = new PipelineLogger();
