import { spawn } from 'node:child_process';
import { logger } from './logger.js';

/**
 * What is known about a finished command. `exitCode` is null when the
 * command could not be spawned or was killed by a signal.
 */
export interface CommandOutcome {
  readonly exitCode: number | null;
}

/**
 * Abstract base class for running a command line.
 *
 * Concrete subclasses:
 *   - ShellCommandRunner (below)
 *   - test fakes that record the command instead of running it
 */
export abstract class CommandRunner {
  /**
   * Run the command to completion. Implementations must resolve, never
   * reject, whatever happens to the command.
   */
  public abstract run(command: string): Promise<CommandOutcome>;
}

/**
 * Runs a command line through the platform command interpreter with the
 * parent's stdio, so its output lands between the caller's own lines.
 */
export class ShellCommandRunner extends CommandRunner {
  public run(command: string): Promise<CommandOutcome> {
    return new Promise<CommandOutcome>(resolve => {
      const child = spawn(command, { shell: true, stdio: 'inherit' });

      child.once('error', error => {
        logger.debug({ error, command }, 'Command could not be started');
        resolve({ exitCode: null });
      });

      child.once('close', (code, signal) => {
        if (code === null) {
          logger.debug({ command, signal }, 'Command terminated by signal');
        } else if (code !== 0) {
          logger.debug({ command, exitCode: code }, 'Command exited non-zero');
        }
        resolve({ exitCode: code });
      });
    });
  }
}
