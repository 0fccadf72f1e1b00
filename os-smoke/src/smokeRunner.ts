import type { CommandRunner } from './commandRunner.js';
import { probeFile } from './fileProbe.js';
import { logger } from './logger.js';
import type { SmokeConfig } from './smokeConfig.js';

export type ExitCode = 0;

export interface SmokeIo {
  /** Sink for the fixed status lines, one call per line. */
  readonly print: (line: string) => void;
  readonly runner: CommandRunner;
}

/**
 * Run the smoke sequence: startup line, file probe, shell command,
 * completion line. Always reports success.
 */
export async function runSmoke(config: SmokeConfig, io: SmokeIo): Promise<ExitCode> {
  io.print(config.startMessage);

  const probe = await probeFile(config);
  if (probe.opened) {
    io.print(config.fileWrittenMessage);
  }

  // The exit status only reaches the debug log.
  const outcome = await io.runner.run(config.command);
  logger.debug({ command: config.command, exitCode: outcome.exitCode }, 'Nested command finished');

  io.print(config.completeMessage);
  return 0;
}
