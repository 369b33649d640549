import type { AddressInfo } from 'net';
import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import App from '../App.js';

const LOG = [
  '0:00 InitGame: \\sv_hostname\\Upload Test',
  '0:01 ClientUserinfoChanged: 2 n\\Isgalamido\\t\\0',
  '0:02 Kill: 1 2 3: Isgalamido killed Mocinha by MOD_ROCKET',
  '0:03 ShutdownGame:',
].join('\n');

describe('App', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = new App({ uploadLimitBytes: 1024 }).express;
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected the test server to listen on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  it('answers the health route', async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: 'fraglog is running' });
  });

  it('parses an uploaded log', async () => {
    const form = new FormData();
    form.append('log', new Blob([LOG], { type: 'text/plain' }), 'games.log');

    const res = await fetch(`${baseUrl}/parseLog`, { method: 'POST', body: form });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: {
        game_count: 1,
        games: [{
          id: 1,
          completed: true,
          init_details: '\\sv_hostname\\Upload Test',
          event_count: 4,
          kill_count: 1,
          players: [{ id: 2, name: 'Isgalamido' }],
          kills_by_means: { MOD_ROCKET: 1 },
          killers: { Isgalamido: 1 },
        }],
        kills_by_means: { MOD_ROCKET: 1 },
        killers: { Isgalamido: 1 },
      },
    });
  });

  it('rejects a request without a log file', async () => {
    const res = await fetch(`${baseUrl}/parseLog`, { method: 'POST' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      failure: { error_reason: 'PARSING_FAILURE', message: 'expected one log file in `log`' },
    });
  });

  it('rejects uploads over the size limit', async () => {
    const form = new FormData();
    form.append('log', new Blob(['0:00 Exit: '.padEnd(2048, 'x')]), 'big.log');

    const res = await fetch(`${baseUrl}/parseLog`, { method: 'POST', body: form });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      failure: { error_reason: 'PARSING_FAILURE', message: 'File too large' },
    });
  });
});
