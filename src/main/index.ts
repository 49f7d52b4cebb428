#!/usr/bin/env node
/**
 * songbridge - CLI entry point
 *
 * Loads settings, wires the download engine and runs it for one URL,
 * printing a line as each item finishes.
 * The first Ctrl+C cancels pending items; a second one exits immediately.
 */

import * as path from 'path';
import { Logger } from './services/logger';
import { SettingsManager } from './services/settingsManager';
import { SourceUnavailableError } from './services/errors';
import { createDownloadEngine } from './engine';
import {
  EXIT_FAILED,
  EXIT_INTERRUPTED,
  EXIT_OK,
  EXIT_USAGE,
  USAGE,
  applyCliOverrides,
  describeOutcome,
  exitCodeFor,
  formatProgress,
  formatSummary,
  parseCliArgs,
} from './cli';

async function main(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv);
  if (command.kind === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (command.kind === 'usage-error') {
    console.error(`songbridge: ${command.message}\n`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  const { options } = command;

  const settingsManager = options.configPath
    ? new SettingsManager({
        settingsDir: path.dirname(path.resolve(options.configPath)),
        fileName: path.basename(options.configPath),
      })
    : new SettingsManager();
  await settingsManager.initialize();
  const settings = applyCliOverrides(settingsManager.get(), options);

  const logger = new Logger({ minLevel: settings.logLevel, echoToConsole: true });
  await logger.initialize();

  const loadWarning = settingsManager.getLoadWarning();
  if (loadWarning) {
    logger.warn(loadWarning);
  }

  let reportedItems = 0;
  const engine = createDownloadEngine({
    settings,
    logger,
    onProgress: (update) => {
      if (update.finishedItems > reportedItems) {
        reportedItems = update.finishedItems;
        logger.info(formatProgress(update));
      }
    },
  });

  let interrupts = 0;
  const onSigint = (): void => {
    interrupts++;
    if (interrupts === 1) {
      logger.warn('Interrupted: finishing in-flight downloads (press Ctrl+C again to quit)');
      engine.cancel();
    } else {
      process.exit(EXIT_INTERRUPTED);
    }
  };
  process.on('SIGINT', onSigint);

  try {
    const summary = await engine.run(options.sourceUrl, settings.outputFolder, settings.concurrency);
    for (const outcome of summary.outcomes) {
      console.log(describeOutcome(outcome));
    }
    logger.info(formatSummary(summary));
    return exitCodeFor(summary);
  } catch (error: unknown) {
    if (error instanceof SourceUnavailableError) {
      return EXIT_FAILED;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
    process.exitCode = EXIT_FAILED;
  });
