/**
 * Fixed literals used by a smoke run.
 *
 * Nothing here is read from disk, flags or the environment: every run uses
 * the same values. Overrides exist only so tests can redirect the file probe
 * and the shell command.
 */
export interface SmokeConfig {
  readonly startMessage: string;
  readonly filePath: string;
  readonly fileMode: number;
  readonly filePayload: string;
  readonly fileWrittenMessage: string;
  readonly command: string;
  readonly completeMessage: string;
}

export const DEFAULT_SMOKE_CONFIG: SmokeConfig = Object.freeze({
  startMessage: 'Test program starting',
  filePath: '/tmp/test_file.txt',
  fileMode: 0o644,
  filePayload: 'Hello from test program\n',
  fileWrittenMessage: 'File created and written',
  command: "echo 'Nested command via system()'",
  completeMessage: 'Test program complete'
});

export function resolveSmokeConfig(overrides: Partial<SmokeConfig> = {}): SmokeConfig {
  return Object.freeze({ ...DEFAULT_SMOKE_CONFIG, ...overrides });
}
