#!/usr/bin/env node
/**
 * Puzzle import job - one run per invocation
 *
 * Exit codes: 0 run finished (uploaded, duplicate or skipped), 2 configuration,
 * 3 puzzle source unavailable, 4 malformed game record, 5 store unavailable,
 * 6 invalid payload, 1 anything else.
 */

// Load environment variables FIRST, before any other imports
import 'dotenv/config';

import { config, validateConfig } from './config/index.js';
import { createServices } from './container.js';
import { ConfigError, ExitCode, exitCodeFor, type ExitCodeValue } from './utils/errors.js';
import { logger } from './utils/logger.js';

const jobLogger = logger.child({ job: 'puzzle-import' });

async function main(): Promise<ExitCodeValue> {
  const missing = validateConfig();
  if (missing.length > 0) {
    throw new ConfigError(`Missing configuration: ${missing.join(', ')}`, { missing });
  }

  jobLogger.info({ sourceMode: config.sourceMode, plyConvention: config.plyConvention }, 'Starting puzzle import');

  const { importService } = createServices();
  const { outcome, retention, theme } = await importService.run();

  jobLogger.info(
    {
      status: outcome?.status ?? 'none',
      puzzleId: outcome?.puzzleId,
      theme,
      retired: retention.retired.length,
      retentionFailures: retention.failures.length,
    },
    'Puzzle import finished'
  );

  return ExitCode.SUCCESS;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const code = exitCodeFor(error);
    jobLogger.fatal(
      { error: error instanceof Error ? error.message : String(error), exitCode: code },
      'Puzzle import failed'
    );
    process.exitCode = code;
  });
