/**
 * Core activity log - in-memory ring buffer mirrored to stderr
 *
 * Detection recoveries and per-block parse failures are recorded here so a
 * host can surface them without the core ever failing a whole document.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type CoreLogComponent = 'detector' | 'registry' | 'manager' | 'document';

export interface LogEntry<C extends string = string> {
  ts: number;
  component: C;
  message: string;
  level: LogLevel;
}

export type CoreLogEntry = LogEntry<CoreLogComponent>;

export interface LogQuery {
  since?: number;
  component?: string;
  level?: LogLevel;
  limit?: number;
}

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

function isThreshold(value: string): value is LogLevel | 'silent' {
  return value === 'info' || value === 'warn' || value === 'error' || value === 'silent';
}

/**
 * Whether a message at `level` should be mirrored to stderr, per
 * HYBRIDNOTE_LOG_LEVEL (info | warn | error | silent, default info)
 */
export function shouldMirror(level: LogLevel, env: NodeJS.ProcessEnv = process.env): boolean {
  const configured = env.HYBRIDNOTE_LOG_LEVEL?.trim().toLowerCase() ?? '';
  const threshold = isThreshold(configured) ? LEVEL_RANK[configured] : LEVEL_RANK.info;
  return LEVEL_RANK[level] >= threshold;
}

/**
 * Fixed-size ring buffer of log entries, mirrored to stderr per
 * HYBRIDNOTE_LOG_LEVEL. The core and the server each keep one.
 */
export class LogBuffer<C extends string> {
  private readonly entries: LogEntry<C>[] = [];

  constructor(private readonly capacity = 200) {}

  log(component: C, message: string, level: LogLevel = 'info'): void {
    this.entries.push({ ts: Date.now(), component, message, level });
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }

    if (shouldMirror(level)) {
      const prefix = level === 'error' ? '[HybridNote] ERROR' : level === 'warn' ? '[HybridNote] WARN' : '[HybridNote]';
      console.error(`${prefix} [${component}] ${message}`);
    }
  }

  /** Most recent matching entries, oldest first */
  query(options: LogQuery = {}): LogEntry<C>[] {
    const { since, component, level, limit = 100 } = options;

    let entries = this.entries;
    if (since) {
      entries = entries.filter(e => e.ts > since);
    }
    if (component) {
      entries = entries.filter(e => e.component === component);
    }
    if (level) {
      entries = entries.filter(e => e.level === level);
    }

    return entries.slice(-limit);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

const coreBuffer = new LogBuffer<CoreLogComponent>();

export function coreLog(component: CoreLogComponent, message: string, level: LogLevel = 'info'): void {
  coreBuffer.log(component, message, level);
}

export function getCoreLog(options: {
  component?: CoreLogComponent;
  level?: LogLevel;
  limit?: number;
} = {}): CoreLogEntry[] {
  return coreBuffer.query(options);
}

export function clearCoreLog(): void {
  coreBuffer.clear();
}
