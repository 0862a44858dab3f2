import type { LogLevel, LogMeta, Logger } from '../../src/utils/logger';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  meta: Record<string, unknown>;
}

/** Logger that keeps entries in memory so tests can assert on events. */
export function recordingLogger(entries: LogEntry[] = [], context: Record<string, unknown> = {}): Logger & {
  entries: LogEntry[];
  events(msg: string): LogEntry[];
} {
  const push = (level: LogLevel) => (msg: string, meta?: LogMeta) => {
    entries.push({ level, msg, meta: { ...context, ...(meta ?? {}) } });
  };
  return {
    entries,
    events(msg: string) {
      return entries.filter((entry) => entry.msg === msg);
    },
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    child(extra) {
      return recordingLogger(entries, { ...context, ...extra });
    },
  };
}
