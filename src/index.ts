#!/usr/bin/env node

/**
 * UI String Translator MCP Server - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';
import { TranslatorError, describeRemediation } from './core/errors/TranslatorErrors.js';

async function main() {
  let mcpServer: McpServer | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    // Create and start MCP server
    mcpServer = new McpServer(config);
    await mcpServer.start();

    // Setup graceful shutdown
    const shutdown = async (signal: string) => {
      console.error(`\nReceived ${signal}, shutting down...`);

      if (mcpServer) {
        await mcpServer.shutdown();
      }

      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      console.error('Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      console.error('Unhandled Rejection, reason:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    console.error('Fatal error in main():', error instanceof Error ? error.message : error);
    if (error instanceof TranslatorError) {
      console.error(describeRemediation(error.kind));
    }

    if (mcpServer) {
      await mcpServer.shutdown();
    }

    process.exit(1);
  }
}

// Start the server
void main();
