/**
 * Pathwise MCP Server
 * Serves the LongestPath tool over stdio
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { bootstrap } from './bootstrap.js';
import { MCPAdapter } from './adapters/mcp-adapter.js';
import { readVersion } from './version.js';
import { toPathwiseError } from './core/errors.js';

export async function startServer(): Promise<void> {
  const servicesResult = bootstrap();
  if (!servicesResult.ok) {
    throw servicesResult.error;
  }
  const { logger, pathService } = servicesResult.value;

  // All logs go to stderr to keep stdout clean for MCP protocol
  logger.info(`Starting pathwise MCP server v${readVersion()}`);

  const adapter = new MCPAdapter(pathService, logger.child({ module: 'mcp' }));
  const server = adapter.getServer();
  await server.connect(new StdioServerTransport());
  logger.info('MCP server connected');

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    await server.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', toPathwiseError(error));
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer().catch((error) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
