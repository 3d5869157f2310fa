#!/usr/bin/env node
import { CompositionRoot } from './infrastructure/di/CompositionRoot';
import { CLIInputParser } from './infrastructure/cli/CLIInputParser';
import { initGracefulShutdown } from './infrastructure/shutdown/GracefulShutdown';
import { getLogger } from './infrastructure/logging';
import { describeError } from './domain/errors/AppErrors';

/**
 * Main entry point for the console error scraper.
 * Exits 0 once the report is written, 1 on any fatal error.
 */
async function main(): Promise<number> {
  const options = CLIInputParser.parse(process.argv.slice(2));

  if (options.help) {
    // eslint-disable-next-line no-console
    console.log(CLIInputParser.getHelpText());
    return 0;
  }

  if (options.unknown.length > 0) {
    getLogger('Main').warn(`Ignoring unknown arguments: ${options.unknown.join(' ')}`);
  }

  try {
    const { config, scrapeService } = CompositionRoot.initialize({ envFile: options.envFile });
    initGracefulShutdown();

    await scrapeService.run(config.site.url);
    return 0;
  } catch (error) {
    // Created here so it picks up the configured log format
    getLogger('Main').error(`Error during execution: ${describeError(error)}`);
    return 1;
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    // eslint-disable-next-line no-console
    console.error('Fatal:', error);
    process.exitCode = 1;
  });
