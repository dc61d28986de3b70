#!/usr/bin/env node
import { resolve } from 'node:path';
import process from 'node:process';
import meow from 'meow';
import { config as dotenvConfig } from 'dotenv';
import { formatError, isTrackmarkError, type Logger } from '@trackmark/core';
import { runClassify } from './commands/classify.js';
import { runProcess } from './commands/process.js';
import { runScan } from './commands/scan.js';
import { getConfigPath, resolveCliConfig } from './lib/cli-config.js';
import { createCliLogger, resolveLogLevel } from './lib/logger.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const cli = meow(
  `\nUsage\n  $ trackmark <command> [options]\n\nCommands\n  process <dir>           Merge every recording group in <dir> and export its annotated spans\n  scan <dir>              List the recording groups in <dir> without changing anything\n  classify <marker-file>  Print the annotated spans of one marker file\n\nOptions\n  --output=<dir>          Root directory for exported spans (default: <dir>)\n  --gap=<seconds>         Largest gap a burst of marks may span (default: 30)\n  --concurrency=<n>       Recording groups processed at once (default: 1)\n  --retain-merged         Keep merged recordings after export\n  --config=<file>         YAML config file (default: $TRACKMARK_CONFIG)\n  --log-level=<level>     info or debug\n\nExamples\n  $ trackmark process ~/Recorder\n  $ trackmark process ~/Recorder --output=~/Notes --concurrency=2\n  $ trackmark scan ~/Recorder\n  $ trackmark classify ~/Recorder/sessA_1_x.tmk --log-level=debug\n`,
  {
    importMeta: import.meta,
    flags: {
      output: { type: 'string' },
      gap: { type: 'number' },
      concurrency: { type: 'number' },
      retainMerged: { type: 'boolean' },
      config: { type: 'string' },
      logLevel: { type: 'string' },
    },
  },
);

async function main(): Promise<void> {
  const [command, target] = cli.input;
  const { flags } = cli;
  const fallback = globalThis.console;

  let logger: Logger;
  try {
    logger = createCliLogger({ level: resolveLogLevel(flags.logLevel) });
  } catch (error) {
    fallback.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
    return;
  }

  if (command !== 'process' && command !== 'scan' && command !== 'classify') {
    cli.showHelp(command === undefined ? 0 : 1);
    return;
  }
  if (!target) {
    logger.error(`Error: ${command === 'classify' ? 'a marker file' : 'a directory'} is required for ${command}.`);
    process.exitCode = 1;
    return;
  }

  try {
    const config = await resolveCliConfig({
      configPath: getConfigPath(flags.config),
      flags: {
        output: flags.output,
        gap: flags.gap,
        concurrency: flags.concurrency,
        retainMerged: flags.retainMerged,
      },
    });

    switch (command) {
      case 'process': {
        const result = await runProcess({ directory: target, config, logger });
        if (result.status === 'failed') {
          process.exitCode = 1;
        }
        return;
      }
      case 'scan':
        await runScan({ directory: target, config, logger });
        return;
      case 'classify':
        await runClassify({ markerPath: target, config, logger });
        return;
    }
  } catch (error) {
    logger.error(isTrackmarkError(error) ? formatError(error) : `Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}

void main();
