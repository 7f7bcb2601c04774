import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileTokenStore } from '../../src/db/fileTokenStore';
import type { Credential } from '../../src/models/credential';

const credential: Credential = {
  accessToken: 'access-1',
  refreshToken: 'refresh-1',
  expiresAt: 1_700_000_000_000,
  scope: ['mb:vehicle:mbdata:evstatus', 'offline_access'],
};

describe('FileTokenStore', () => {
  let directory: string;
  let statePath: string;
  let store: FileTokenStore;

  beforeEach(async () => {
    directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'mb-token-store-'));
    statePath = path.join(directory, 'state', 'credentials.json');
    store = new FileTokenStore(statePath);
  });

  afterEach(async () => {
    await fs.promises.rm(directory, { recursive: true, force: true });
  });

  it('loads what it saved', async () => {
    await store.save(credential);

    await expect(store.load()).resolves.toEqual(credential);
    expect(JSON.parse(await fs.promises.readFile(statePath, 'utf-8'))).toEqual({
      access_token: 'access-1',
      refresh_token: 'refresh-1',
      expires_at: '2023-11-14T22:13:20.000Z',
      scope: ['mb:vehicle:mbdata:evstatus', 'offline_access'],
    });
  });

  it('replaces the file without leaving temp files behind', async () => {
    await store.save(credential);
    await store.save({ ...credential, accessToken: 'access-2' });

    expect(await fs.promises.readdir(path.dirname(statePath))).toEqual(['credentials.json']);
    await expect(store.load()).resolves.toMatchObject({ accessToken: 'access-2' });
  });

  it('restricts the file to its owner', async () => {
    await store.save(credential);

    const stats = await fs.promises.stat(statePath);
    expect(stats.mode & 0o777).toBe(0o600);
  });

  it('treats a missing file as no credential', async () => {
    await expect(store.load()).resolves.toBeNull();
  });

  it.each([
    ['empty', ''],
    ['not JSON', '{"access_token": '],
    ['missing fields', JSON.stringify({ access_token: 'access-1' })],
    [
      'out-of-range expiry',
      JSON.stringify({ access_token: 'access-1', refresh_token: 'refresh-1', expires_at: 1e13 }),
    ],
  ])('treats a %s file as no credential', async (_label, contents) => {
    await fs.promises.mkdir(path.dirname(statePath), { recursive: true });
    await fs.promises.writeFile(statePath, contents);

    await expect(store.load()).resolves.toBeNull();
  });

  it('clears idempotently', async () => {
    await store.save(credential);

    await store.clear();
    await store.clear();

    await expect(store.load()).resolves.toBeNull();
    expect(fs.existsSync(statePath)).toBe(false);
  });
});
