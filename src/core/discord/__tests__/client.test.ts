// src/core/discord/__tests__/client.test.ts
import { describe, it, expect, jest } from '@jest/globals';
import { z } from 'zod';
import { DiscordClient, type FetchLike } from '../client.js';
import { createdIdSchema } from '../schemas.js';
import type { Sleep } from '../retry.js';

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

function clientWith(responses: Array<Response | Error>) {
  const queue = [...responses];
  const fetchMock = jest.fn<FetchLike>(async () => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error('no more responses');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
  const sleep = jest.fn<Sleep>(async () => {});
  const client = new DiscordClient({
    token: 'test-token',
    apiBase: 'https://discord.test/api/',
    fetch: fetchMock,
    sleep,
    random: () => 0,
  });
  return { client, fetchMock, sleep };
}

const pingSchema = z.object({ ok: z.boolean() });

describe('DiscordClient', () => {
  it('sends the bot token and user agent to the joined URL', async () => {
    const { client, fetchMock } = clientWith([json({ ok: true })]);

    await expect(client.get('/ping', pingSchema)).resolves.toEqual({ ok: true });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://discord.test/api/ping');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toMatchObject({ Authorization: 'Bot test-token', 'User-Agent': 'DiscordBot (link-digest, 0.1.0)' });
  });

  it('waits out a 429 for the advertised retry_after and then succeeds', async () => {
    const { client, fetchMock, sleep } = clientWith([
      json({ message: 'You are being rate limited.', retry_after: 0.01, global: false }, 429),
      json({ ok: true }),
    ]);

    await expect(client.get('/ping', pingSchema)).resolves.toEqual({ ok: true });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(10);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('falls back to the default wait when a 429 carries no retry_after', async () => {
    const { client, sleep } = clientWith([json({}, 429), json({ ok: true })]);

    await client.get('/ping', pingSchema);

    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('resolves GET failures to null', async () => {
    const { client } = clientWith([json({ message: 'Missing Access' }, 403)]);
    await expect(client.get('/ping', pingSchema)).resolves.toBeNull();
  });

  it('resolves bodies of the wrong shape to null', async () => {
    const { client } = clientWith([json({ unexpected: 1 })]);
    await expect(client.get('/ping', pingSchema)).resolves.toBeNull();
  });

  it('resolves network errors on GET to null without retrying', async () => {
    const { client, fetchMock } = clientWith([new Error('ECONNRESET')]);
    await expect(client.get('/ping', pingSchema)).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries a POST after a server error', async () => {
    const { client, fetchMock, sleep } = clientWith([json({ message: 'oops' }, 502), json({ id: '42' })]);

    await expect(client.post('/channels/1/messages', { content: 'hi' }, createdIdSchema)).resolves.toEqual({ id: '42' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(fetchMock.mock.calls[0][1]?.body).toBe(JSON.stringify({ content: 'hi' }));
  });

  it('does not retry a POST rejected with a client error', async () => {
    const { client, fetchMock } = clientWith([json({ message: 'Missing Permissions' }, 403)]);

    await expect(client.post('/channels/1/messages', { content: 'hi' }, createdIdSchema)).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up on a POST after the maximum attempts', async () => {
    const { client, fetchMock } = clientWith([json({}, 500), json({}, 500), json({}, 500), json({ id: 'late' })]);

    await expect(client.post('/channels/1/messages', { content: 'hi' }, createdIdSchema)).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('stops after too many consecutive rate limits', async () => {
    const fetchMock = jest.fn<FetchLike>(async () => json({ retry_after: 0 }, 429));
    const client = new DiscordClient({
      token: 'test-token',
      fetch: fetchMock,
      sleep: async () => {},
      maxRateLimitRetries: 2,
    });

    await expect(client.get('/ping', pingSchema)).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});
