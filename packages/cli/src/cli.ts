#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   connect-migrator --config ./migrator.config.json --input ./connectors.json
 *
 * The translated connectors are printed to stdout as a JSON array; logs
 * and the run summary go to stderr.
 */

import { Logger, TranslationError } from '@connect-migrator/core';
import { formatBatchSummary } from '@connect-migrator/mapping-engine';
import { loadConfig } from './config.js';
import { runTranslation } from './run.js';

/** Exit code when at least one connector has mapping errors */
const EXIT_MAPPING_ERRORS = 2;

function argValue(args: readonly string[], flag: string): string | null {
  const index = args.indexOf(flag);
  return index !== -1 ? (args[index + 1] ?? null) : null;
}

function printUsage(): void {
  console.error('Usage: connect-migrator --config <config.json> --input <connectors.json>');
  console.error('');
  console.error('Example config.json:');
  console.error(
    JSON.stringify(
      {
        templatesDir: './templates',
        transformsFallbackFile: './transforms-fallback.json',
        semantic: { enabled: true, threshold: 0.7 },
        logging: { level: 'info', format: 'text' },
      },
      null,
      2
    )
  );
}

async function main(): Promise<void> {
  let logger = new Logger();
  const args = process.argv.slice(2);
  const configPath = argValue(args, '--config');
  const inputPath = argValue(args, '--input');

  if (!configPath || !inputPath) {
    printUsage();
    process.exit(1);
  }

  try {
    const config = await loadConfig(configPath);
    logger = new Logger(config.logging);

    const batch = await runTranslation({ config, inputPath, logger });

    process.stdout.write(`${JSON.stringify(batch.results.map((entry) => entry.result), null, 2)}\n`);
    logger.info(formatBatchSummary(batch));

    process.exitCode = batch.failed > 0 ? EXIT_MAPPING_ERRORS : 0;
  } catch (error) {
    const message =
      TranslationError.is(error)
        ? error.describe()
        : `Translation run failed: ${error instanceof Error ? error.message : String(error)}`;
    logger.error(message, { error });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
