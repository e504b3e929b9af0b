import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileCredentialStore, InMemoryCredentialStore } from './credentialStore';

describe('FileCredentialStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'civiceye-credentials-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns undefined when no key was stored', async () => {
    await expect(new FileCredentialStore(path.join(dir, 'missing', 'api_key')).read()).resolves.toBeUndefined();
  });

  it('writes the key as trimmed plain text and reads it back', async () => {
    const filePath = path.join(dir, 'nested', 'api_key');
    const store = new FileCredentialStore(filePath);

    await store.write('  test-key  ');

    await expect(fs.readFile(filePath, 'utf-8')).resolves.toBe('test-key\n');
    await expect(store.read()).resolves.toBe('test-key');
  });

  it('treats a blank file as no key', async () => {
    const filePath = path.join(dir, 'api_key');
    await fs.writeFile(filePath, '\n\n');
    await expect(new FileCredentialStore(filePath).read()).resolves.toBeUndefined();
  });
});

describe('InMemoryCredentialStore', () => {
  it('keeps the last written key', async () => {
    const store = new InMemoryCredentialStore();
    await expect(store.read()).resolves.toBeUndefined();
    await store.write(' test-key ');
    await expect(store.read()).resolves.toBe('test-key');
  });
});
