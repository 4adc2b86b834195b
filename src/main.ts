#!/usr/bin/env node
import { parseArgs } from 'util';
import { startServer } from './api/server.js';
import { config } from './config/index.js';
import { createPipelineServices } from './core/pipeline/index.js';
import { logger } from './shared/utils/logger.js';

const USAGE = `Usage:
  inquiry-quote process <inbox> [--config <dir>] [--data <dir>]
  inquiry-quote serve [--config <dir>] [--data <dir>]`;

async function processCommand(inbox: string, configDir: string, dataDir: string) {
  const { pipeline } = await createPipelineServices({ configDir, dataDir });
  const results = await pipeline.processInbox(inbox);

  console.log('\nWorkflow Results:');
  console.log(`  Processed: ${results.processed}`);
  console.log(`  Failed: ${results.failed}`);
  console.log(`  Skipped: ${results.skipped}`);
  console.log(`  Total: ${results.total}`);

  return results.failed > 0 ? 1 : 0;
}

async function serveCommand(configDir: string, dataDir: string) {
  logger.info('Starting Inquiry Quote API Server...');

  const services = await createPipelineServices({ configDir, dataDir });
  const server = await startServer(services);

  // Handle graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');

    await server.close();
    logger.info('Server closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      config: { type: 'string', default: config.workflow.configDir },
      data: { type: 'string', default: config.workflow.dataDir },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [command, inbox] = positionals;
  const configDir = values.config ?? config.workflow.configDir;
  const dataDir = values.data ?? config.workflow.dataDir;

  if (values.help) {
    console.log(USAGE);
    return;
  }

  switch (command) {
    case 'process':
      if (!inbox) {
        console.error(USAGE);
        process.exitCode = 1;
        return;
      }
      process.exitCode = await processCommand(inbox, configDir, dataDir);
      return;

    case 'serve':
      await serveCommand(configDir, dataDir);
      return;

    default:
      console.error(USAGE);
      process.exitCode = 1;
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ error }, 'Command failed');
  console.error(`Error: ${message}`);
  process.exit(1);
});
