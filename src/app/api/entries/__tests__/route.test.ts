import { NextRequest } from 'next/server';
import { Guestbook } from '@/lib/guestbook';
import { StoreLogger } from '@/lib/logger';
import { resetLocalRateLimits } from '@/lib/rateLimit';
import { InMemoryEntryStore, InMemoryListStore } from '@/lib/storage';
import { GET } from '../route';

function listRequest(ip = '203.0.113.5'): NextRequest {
  return new NextRequest('http://localhost/api/entries', { headers: { 'x-forwarded-for': ip } });
}

describe('GET /api/entries', () => {
  const savedEnv = { ...process.env };
  let store: InMemoryEntryStore;

  beforeEach(() => {
    delete process.env.UPSTASH_REDIS_REST_URL;
    delete process.env.UPSTASH_REDIS_REST_TOKEN;
    resetLocalRateLimits();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new InMemoryEntryStore({ now: () => new Date('2024-05-01T12:00:00.000Z') });
    globalThis.__guestbook = new Guestbook({
      store,
      config: { pollIntervalSeconds: 10, enablePoller: false, useCache: false },
      logger: new StoreLogger({ console: false, store: new InMemoryListStore('logs') }),
    });
  });

  afterEach(() => {
    globalThis.__guestbook = undefined;
    process.env = { ...savedEnv };
    jest.restoreAllMocks();
  });

  test('lists entries newest first', async () => {
    await store.insert({ name: 'Ada', message: 'one' });
    await store.insert({ name: 'Bob', message: 'two' });
    const res = await GET(listRequest());
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.ok).toBe(true);
    expect(body.entries).toEqual([
      { id: 2, name: 'Bob', message: 'two', createdAt: '2024-05-01T12:00:00.000Z' },
      { id: 1, name: 'Ada', message: 'one', createdAt: '2024-05-01T12:00:00.000Z' },
    ]);
  });

  test('answers 429 once the hourly limit for an address is spent', async () => {
    process.env.GUESTBOOK_RATE_PER_HOUR = '2';
    expect((await GET(listRequest())).status).toBe(200);
    expect((await GET(listRequest())).status).toBe(200);
    const res = await GET(listRequest());
    expect(res.status).toBe(429);
    expect(Number(res.headers.get('retry-after'))).toBeGreaterThan(3_500);
    expect(await res.json()).toEqual({ ok: false, requestId: expect.any(String), error: 'Too many requests' });
    expect((await GET(listRequest('198.51.100.8'))).status).toBe(200);
  });

  test('answers 500 when the store fails', async () => {
    store.failQueries = true;
    const res = await GET(listRequest());
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ ok: false, requestId: expect.any(String), error: 'Failed to load entries' });
  });
});
