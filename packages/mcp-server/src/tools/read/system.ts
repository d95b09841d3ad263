/**
 * System tools
 * Tools: server_log
 */

import { z } from 'zod';
import { getCoreLog } from '@hybridnote/core';
import type { McpServer, RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getServerLog } from '../../core/shared/serverLog.js';
import { formatMcpResult, successResult } from '../../core/write/mutation-helpers.js';

export function registerSystemTools(server: McpServer): Record<string, RegisteredTool> {
  const server_log = server.registerTool(
    'server_log',
    {
      title: 'Server Log',
      description:
        'Recent server activity (startup, vault scans, opens, saves, index builds) and, optionally, core parser activity such as recovered unterminated blocks and parse failures.',
      inputSchema: {
        since: z.number().optional().describe('Only entries after this epoch-ms timestamp'),
        component: z.string().optional().describe('Only this component (server, vault, workspace, index, tools, config, watcher)'),
        limit: z.number().int().positive().optional().describe('Maximum entries (default: 100)'),
        include_core: z.boolean().optional().describe('Also return the core parser log (default: false)'),
      },
    },
    async ({ since, component, limit, include_core }) => {
      const log = getServerLog({ since, component, limit });
      const core = include_core ? getCoreLog({ limit: limit ?? 100 }) : undefined;

      return formatMcpResult(successResult('', `${log.entries.length} log entries`, {
        server_uptime_ms: log.server_uptime_ms,
        entries: log.entries,
        ...(core ? { core } : {}),
      }));
    }
  );

  return { server_log };
}
