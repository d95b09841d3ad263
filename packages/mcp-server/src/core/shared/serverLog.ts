/**
 * Server activity log for startup/runtime diagnostics
 *
 * Backed by a core LogBuffer, so entries also reach stderr (stdout belongs
 * to the MCP stdio transport). Queryable via the `server_log` tool.
 */

import { LogBuffer, type LogEntry as BufferedEntry, type LogLevel } from '@hybridnote/core';

export type { LogLevel };

export type LogComponent =
  | 'server' | 'vault' | 'workspace'
  | 'index' | 'tools' | 'config' | 'watcher';

export type LogEntry = BufferedEntry<LogComponent>;

const buffer = new LogBuffer<LogComponent>();
const serverStartTs = Date.now();

export function serverLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  buffer.log(component, message, level);
}

export function getServerLog(options: {
  since?: number;
  component?: string;
  limit?: number;
} = {}): { entries: LogEntry[]; server_uptime_ms: number } {
  return {
    entries: buffer.query(options),
    server_uptime_ms: Date.now() - serverStartTs,
  };
}
