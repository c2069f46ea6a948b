/**
 * Boundary Extractor MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes extraction, hierarchy browsing, and database tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import './load-env.js';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './server/register-tools.js';
import { validateStartupDependencies } from './server/startup.js';

// =============================================================================
// SERVER INITIALIZATION
// =============================================================================

const server = new McpServer({
  name: 'boundary-extractor-mcp',
  version: '1.0.0',
});

const toolCount = registerAllTools(server);

// =============================================================================
// SERVER STARTUP
// =============================================================================

async function main(): Promise<void> {
  validateStartupDependencies();

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Boundary Extractor MCP Server running on stdio`);
  console.error(`Tools registered: ${toolCount}`);
}

function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => {
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error(`[Shutdown] Error closing server: ${String(err)}`);
      process.exit(1);
    });
  // Force exit after 5s if graceful shutdown hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
