import { describe, expect, it } from 'vitest';
import { DEFAULT_SMOKE_CONFIG, resolveSmokeConfig } from './smokeConfig.js';

describe('DEFAULT_SMOKE_CONFIG', () => {
  it('holds the fixed literals', () => {
    expect(DEFAULT_SMOKE_CONFIG).toEqual({
      startMessage: 'Test program starting',
      filePath: '/tmp/test_file.txt',
      fileMode: 0o644,
      filePayload: 'Hello from test program\n',
      fileWrittenMessage: 'File created and written',
      command: "echo 'Nested command via system()'",
      completeMessage: 'Test program complete'
    });
  });

  it('has a 24-byte payload', () => {
    expect(Buffer.byteLength(DEFAULT_SMOKE_CONFIG.filePayload, 'utf8')).toBe(24);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_SMOKE_CONFIG)).toBe(true);
  });
});

describe('resolveSmokeConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveSmokeConfig()).toEqual(DEFAULT_SMOKE_CONFIG);
  });

  it('replaces only the overridden fields', () => {
    const config = resolveSmokeConfig({ filePath: '/var/tmp/other.txt', command: 'true' });

    expect(config.filePath).toBe('/var/tmp/other.txt');
    expect(config.command).toBe('true');
    expect(config.filePayload).toBe(DEFAULT_SMOKE_CONFIG.filePayload);
    expect(DEFAULT_SMOKE_CONFIG.filePath).toBe('/tmp/test_file.txt');
  });
});
