#!/usr/bin/env node
import { logger } from './lib/logger';
import { getConfig } from './config';
import { isAppError } from './utils/app-error';
import { USAGE, parseCliArgs, verbosityToLogLevel } from './utils/cli-args';
import { processDocxFile } from './services/docx/docx-crossref.service';

/**
 * Run the command line and resolve to the process exit code.
 */
export async function run(argv: string[]): Promise<number> {
  try {
    const config = getConfig();
    const command = parseCliArgs(argv);

    if (command.kind === 'help') {
      console.log(USAGE);
      return 0;
    }
    if (command.kind === 'version') {
      console.log(config.version);
      return 0;
    }

    const { input, output, verbose } = command.options;
    logger.setLevel(verbosityToLogLevel(verbose));
    logger.debug('Logger setup.', { version: config.version });

    const result = await processDocxFile(input, output, { logger, missingReference: config.missingReference });
    logger.info(`Added ${result.stats.bookmarksAdded} bookmarks to ${result.outputPath}`);
    return 0;
  } catch (error) {
    if (isAppError(error)) {
      console.error(`Application error: ${error.message}`);
      logger.debug(error.stack ?? error.message, { code: error.code });
      return error.exitCode;
    }
    logger.error('Unexpected failure', error instanceof Error ? error : undefined);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
