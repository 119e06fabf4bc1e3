#!/usr/bin/env node

/**
 * release-fetcher entry point
 *
 * Usage:
 *   release-fetcher -v 0.0.1.7 -d lol
 */

import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { SilentProgressReporter } from '../../infrastructure/progress/ConsoleProgressReporter';
import { createApp } from './app';
import { EXIT_CODES, ProgramOptions, buildProgram, exitCodeFor, toSettings } from './program';

async function main(argv: string[]): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const settings = toSettings(program.opts<ProgramOptions>());

  const logger = new CompositeLogger({ verbose: settings.verbose, logDir: settings.logDir });
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`\nReceived ${signal}, stopping...`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    // Carriage-return redraws only make sense on a terminal
    const reporter = process.stdout.isTTY ? undefined : new SilentProgressReporter();
    const result = await createApp({ logger, reporter }).execute({ options: settings.run, signal: controller.signal });
    return exitCodeFor(result);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await logger.close();
  }
}

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Failed to run release-fetcher:', error);
    process.exitCode = EXIT_CODES.FATAL;
  });
