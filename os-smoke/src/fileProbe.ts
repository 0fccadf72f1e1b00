import { open, type FileHandle } from 'node:fs/promises';
import { logger } from './logger.js';
import type { SmokeConfig } from './smokeConfig.js';

export interface FileProbeResult {
  readonly opened: boolean;
}

/**
 * Open a file for writing, but never throw. Returns null if the open fails.
 */
async function openLenient(path: string, mode: number): Promise<FileHandle | null> {
  try {
    // 'w' is O_CREAT | O_WRONLY | O_TRUNC
    return await open(path, 'w', mode);
  } catch (error) {
    logger.debug({ error, path }, 'Could not open probe file, skipping write');
    return null;
  }
}

/**
 * Create (or truncate) the probe file and write the fixed payload.
 *
 * Fails open: an open failure yields `{ opened: false }` and nothing else.
 * Once the handle is open it is always closed; a failed write or close is
 * logged and otherwise ignored.
 */
export async function probeFile(
  config: Pick<SmokeConfig, 'filePath' | 'fileMode' | 'filePayload'>
): Promise<FileProbeResult> {
  const handle = await openLenient(config.filePath, config.fileMode);
  if (!handle) {
    return { opened: false };
  }

  try {
    await handle.writeFile(config.filePayload, 'utf8');
  } catch (error) {
    logger.debug({ error, path: config.filePath }, 'Write to probe file failed');
  } finally {
    await handle.close().catch((error: unknown) => {
      logger.debug({ error, path: config.filePath }, 'Closing probe file failed');
    });
  }

  return { opened: true };
}
