/**
 * Tests for the serve app, bound to an ephemeral loopback port
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { join } from 'path';
import { tmpdir } from 'os';
import { createServerApp, startServer } from './server.js';
import type { SignupSink } from './store.js';
import { SignupStore } from './store.js';
import { resetLogger } from '../utils/logger.js';

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

describe('createServerApp', () => {
  let testDir: string;
  let server: Server;
  let baseUrl: string;
  let signupsFile: string;

  async function start(store: SignupSink): Promise<void> {
    server = await startServer(createServerApp({ siteDir: join(testDir, 'site'), store }), 0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    const { port }: AddressInfo = address;
    baseUrl = `http://127.0.0.1:${port}`;
  }

  beforeEach(async () => {
    resetLogger();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    testDir = await mkdtemp(join(tmpdir(), 'sitekiln-serve-'));
    signupsFile = join(testDir, 'data', 'signups.csv');
    await mkdir(join(testDir, 'site', 'about'), { recursive: true });
    await writeFile(join(testDir, 'site', 'index.html'), '<h1>Home</h1>');
    await writeFile(join(testDir, 'site', 'about', 'index.html'), '<h1>About</h1>');
  });

  afterEach(async () => {
    await close(server);
    jest.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should serve the built site', async () => {
    await start(new SignupStore(signupsFile));

    const home = await fetch(`${baseUrl}/`);
    expect(home.status).toBe(200);
    expect(await home.text()).toBe('<h1>Home</h1>');

    const about = await fetch(`${baseUrl}/about/`);
    expect(await about.text()).toBe('<h1>About</h1>');
  });

  it('should store a form-encoded signup', async () => {
    await start(new SignupStore(signupsFile, () => new Date('2024-05-01T00:00:00.000Z')));

    const response = await fetch(`${baseUrl}/subscribe`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ email: 'someone@example.org' }).toString(),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true });
    expect(await readFile(signupsFile, 'utf-8')).toBe('2024-05-01T00:00:00.000Z,someone@example.org\n');
  });

  it('should accept a JSON body', async () => {
    await start(new SignupStore(signupsFile));

    const response = await fetch(`${baseUrl}/subscribe`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ email: 'someone@example.org' }),
    });

    expect(response.status).toBe(200);
  });

  it('should reject other methods with 405', async () => {
    await start(new SignupStore(signupsFile));

    const response = await fetch(`${baseUrl}/subscribe`);

    expect(response.status).toBe(405);
    expect(await response.json()).toEqual({ ok: false, error: 'method_not_allowed' });
  });

  it('should reject an invalid address with 400', async () => {
    await start(new SignupStore(signupsFile));

    const response = await fetch(`${baseUrl}/subscribe`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'email=nope',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ ok: false, error: 'invalid_email' });
  });

  it('should reject a malformed JSON body with 400', async () => {
    await start(new SignupStore(signupsFile));

    const response = await fetch(`${baseUrl}/subscribe`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"email":',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ ok: false, error: 'invalid_email' });
  });

  it('should answer 500 when the store fails', async () => {
    await start({
      append: () => Promise.reject(new Error('disk full')),
    });

    const response = await fetch(`${baseUrl}/subscribe`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'email=someone%40example.org',
    });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ ok: false, error: 'storage_unavailable' });
  });
});
