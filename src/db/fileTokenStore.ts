import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';

import {
  Credential,
  parsePersistedCredential,
  toPersistedCredential,
} from '../models/credential';
import { corruptStateError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { TokenStore } from './tokenStore';

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * JSON file store. Writes go to a sibling temp file that is fsynced and then
 * renamed over the target, so readers see either the old or the new file.
 */
export class FileTokenStore implements TokenStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  describe(): string {
    return `file:${this.filePath}`;
  }

  async load(): Promise<Credential | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        logger.info({ path: this.filePath }, 'no persisted credential found');
        return null;
      }

      logger.error(
        { path: this.filePath, err: corruptStateError(describeError(error)) },
        'persisted credential unreadable; treating as absent',
      );
      return null;
    }

    if (raw.trim().length === 0) {
      logger.info({ path: this.filePath }, 'persisted credential file is empty');
      return null;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      logger.warn(
        { path: this.filePath, err: corruptStateError(describeError(error)) },
        'persisted credential is not valid JSON; treating as absent',
      );
      return null;
    }

    const parsed = parsePersistedCredential(document);
    if (!parsed.ok) {
      logger.warn(
        {
          path: this.filePath,
          err: corruptStateError('persisted credential failed validation', parsed.issues),
        },
        'persisted credential is malformed; treating as absent',
      );
      return null;
    }

    return parsed.credential;
  }

  async save(credential: Credential): Promise<void> {
    const directory = path.dirname(this.filePath);
    await fs.promises.mkdir(directory, { recursive: true });

    const tempPath = path.join(
      directory,
      `.${path.basename(this.filePath)}.${process.pid}.${randomUUID()}.tmp`,
    );
    const contents = `${JSON.stringify(toPersistedCredential(credential), null, 2)}\n`;

    try {
      const handle = await fs.promises.open(tempPath, 'w', 0o600);
      try {
        await handle.writeFile(contents, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }

    logger.debug({ path: this.filePath }, 'credential persisted');
  }

  async clear(): Promise<void> {
    await fs.promises.rm(this.filePath, { force: true });
    logger.info({ path: this.filePath }, 'persisted credential cleared');
  }
}
