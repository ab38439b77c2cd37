import { describe, expect, it } from 'vitest';
import { MUTATE_URL } from './constants.js';
import { createCredentials } from './credentials.js';
import { createHttpClient } from './http.js';
import { createFakePhotosService, mutationReply } from './testing/fake-photos-service.js';

describe('createHttpClient', () => {
  it('sends the session cookies to the photos site only', async () => {
    const credentials = await createCredentials([{ name: 'SID', value: 'test-sid' }], 'test-at', 'user-1');
    const service = createFakePhotosService();
    const client = createHttpClient(credentials, { adapter: service.adapter, userAgent: 'test-agent' });

    await client.post(MUTATE_URL, 'f.req=%5B%5D');
    await client.post('https://upload.photos.test/put/1', 'bytes');

    expect(service.calls[0].config.headers.get('Cookie')).toBe('SID=test-sid');
    expect(service.calls[0].config.headers.get('User-Agent')).toBe('test-agent');
    expect(service.calls[1].config.headers.has('Cookie')).toBe(false);
  });

  it('stores cookies set by the service', async () => {
    const credentials = await createCredentials([{ name: 'SID', value: 'test-sid' }], 'test-at', 'user-1');
    const service = createFakePhotosService({
      move: { ...mutationReply(1, []), headers: { 'set-cookie': ['NID=fresh; Domain=.google.com; Path=/; Secure'] } },
    });
    const client = createHttpClient(credentials, { adapter: service.adapter });

    await client.post(MUTATE_URL, 'f.req=%5B%5D');

    expect(await credentials.jar.getCookieString('https://photos.google.com/')).toBe('SID=test-sid; NID=fresh');
  });

  it('stores cookies set on an error reply before rejecting', async () => {
    const credentials = await createCredentials([{ name: 'SID', value: 'test-sid' }], 'test-at', 'user-1');
    const service = createFakePhotosService({
      move: { status: 500, data: '', headers: { 'set-cookie': ['NID=fresh; Domain=.google.com; Path=/; Secure'] } },
    });
    const client = createHttpClient(credentials, { adapter: service.adapter });

    await expect(client.post(MUTATE_URL, 'f.req=%5B%5D')).rejects.toThrow('Request failed with status code 500');

    expect(await credentials.jar.getCookieString('https://photos.google.com/')).toBe('SID=test-sid; NID=fresh');
  });
});
