#!/usr/bin/env node

/**
 * Meeting Summarizer - Entry Point
 */

import { z } from 'zod';
import { getConfig, printConfigErrors, printConfigInfo } from './config.js';
import { SummarizerServer } from './presentation/SummarizerServer.js';

/**
 * Stop the server on signals and on uncaught errors
 */
function setupGracefulShutdown(server: SummarizerServer): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);
    await server.shutdown();
    console.error('👋 Goodbye!\n');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error('💥 Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('💥 Uncaught Exception:', error);
    onSignal('UNCAUGHT_EXCEPTION');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('💥 Unhandled Rejection:', reason);
    onSignal('UNHANDLED_REJECTION');
  });
}

async function main() {
  try {
    const config = getConfig();
    printConfigInfo(config);

    const server = new SummarizerServer(config);
    await server.start();
    setupGracefulShutdown(server);

    console.error('\n🚀 Server is running. Press Ctrl+C to stop.\n');
  } catch (error) {
    if (error instanceof z.ZodError) {
      printConfigErrors(error);
    } else {
      console.error('💥 Fatal error in main():', error);
    }
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
