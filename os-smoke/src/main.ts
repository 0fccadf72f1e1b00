#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { ShellCommandRunner } from './commandRunner.js';
import { logger } from './logger.js';
import { DEFAULT_SMOKE_CONFIG, type SmokeConfig } from './smokeConfig.js';
import { runSmoke, type ExitCode, type SmokeIo } from './smokeRunner.js';

function defaultIo(): SmokeIo {
  return {
    // eslint-disable-next-line no-console
    print: line => console.log(line),
    runner: new ShellCommandRunner()
  };
}

export interface MainOptions {
  readonly io?: SmokeIo;
  readonly config?: SmokeConfig;
}

/**
 * Commander-based CLI entrypoint.
 *
 * The smoke run takes no input: positional arguments and unknown options
 * are accepted and ignored.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<ExitCode> {
  const { io = defaultIo(), config = DEFAULT_SMOKE_CONFIG } = options;
  let code: ExitCode = 0;
  const program = new Command();

  program
    .name('os-smoke')
    .description('Print status lines, write a probe file and run a nested shell command')
    .version('0.1.0')
    .allowUnknownOption()
    .allowExcessArguments()
    .action(async () => {
      logger.debug({ filePath: config.filePath, command: config.command }, 'Starting smoke run');
      code = await runSmoke(config, io);
    });

  await program.parseAsync(['node', 'os-smoke', ...argv]);
  return code;
}

// Resolve symlinks so the guard also holds when started through the npm bin link.
function isEntrypoint(): boolean {
  const script = process.argv[1];
  if (script === undefined || !existsSync(script)) {
    return false;
  }
  return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntrypoint()) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error({ error }, 'Smoke run aborted');
      process.exitCode = 1;
    }
  );
}
