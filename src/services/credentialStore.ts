import fs from 'fs/promises';
import path from 'path';

import { createLogger } from '../utils/logger';

const logger = createLogger('CredentialStore');

export interface CredentialStore {
  read(): Promise<string | undefined>;
  write(value: string): Promise<void>;
}

/** Keeps the map API key as a single line of plain text. */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  async read(): Promise<string | undefined> {
    try {
      const raw = await fs.readFile(this.filePath, 'utf-8');
      const value = raw.trim();
      return value || undefined;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.debug('No stored API key', { filePath: this.filePath });
        return undefined;
      }
      throw error;
    }
  }

  async write(value: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${value.trim()}\n`, { encoding: 'utf-8', mode: 0o600 });
    logger.info('Stored API key', { filePath: this.filePath });
  }
}

export class InMemoryCredentialStore implements CredentialStore {
  constructor(private value?: string) {}

  async read(): Promise<string | undefined> {
    return this.value;
  }

  async write(value: string): Promise<void> {
    this.value = value.trim();
  }
}
