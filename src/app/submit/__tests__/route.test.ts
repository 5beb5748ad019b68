import { NextRequest } from 'next/server';
import { Guestbook } from '@/lib/guestbook';
import { logger, StoreLogger } from '@/lib/logger';
import { resetLocalRateLimits } from '@/lib/rateLimit';
import { InMemoryEntryStore, InMemoryListStore } from '@/lib/storage';
import { POST } from '../route';

function formRequest(body: string, headers: Record<string, string> = {}): NextRequest {
  return new NextRequest('http://localhost/submit', {
    method: 'POST',
    body,
    headers: { 'content-type': 'application/x-www-form-urlencoded', 'x-forwarded-for': '203.0.113.5', ...headers },
  });
}

describe('POST /submit', () => {
  const savedEnv = { ...process.env };
  let store: InMemoryEntryStore;

  beforeEach(() => {
    delete process.env.UPSTASH_REDIS_REST_URL;
    delete process.env.UPSTASH_REDIS_REST_TOKEN;
    resetLocalRateLimits();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new InMemoryEntryStore();
    globalThis.__guestbook = new Guestbook({
      store,
      config: { pollIntervalSeconds: 10, enablePoller: false, useCache: true },
      logger: new StoreLogger({ console: false, store: new InMemoryListStore('logs') }),
    });
  });

  afterEach(() => {
    globalThis.__guestbook = undefined;
    process.env = { ...savedEnv };
    jest.restoreAllMocks();
  });

  test('stores the entry and redirects with a success notice', async () => {
    const res = await POST(formRequest('name=Ada&message=hello+there'));
    expect(res.status).toBe(303);
    expect(res.headers.get('location')).toBe('http://localhost/?notice=posted');
    expect(await store.newest(1)).toMatchObject([{ id: 1, name: 'Ada', message: 'hello there' }]);
  });

  test('redirects with the validation code when the message is blank', async () => {
    const res = await POST(formRequest('name=Ada&message=+++'));
    expect(res.headers.get('location')).toBe('http://localhost/?notice=message_required');
    expect(await store.count()).toBe(0);
  });

  test('rejects a body over 8 KB even without a content-length header', async () => {
    const req = formRequest(`name=a&message=${'x'.repeat(9 * 1024)}`);
    expect(req.headers.get('content-length')).toBeNull();
    const res = await POST(req);
    expect(res.status).toBe(303);
    expect(res.headers.get('location')).toBe('http://localhost/?notice=too_large');
    expect(await store.count()).toBe(0);
  });

  test('redirects with a failure notice when the store throws', async () => {
    const error = jest.spyOn(logger, 'error');
    store.failQueries = true;
    const res = await POST(formRequest('name=Ada&message=hello'));
    expect(res.status).toBe(303);
    expect(res.headers.get('location')).toBe('http://localhost/?notice=failed');
    expect(error).toHaveBeenCalledWith(
      'submit.error',
      expect.objectContaining({ endpoint: '/submit', error: 'entry store unavailable', errorName: 'Error' }),
    );
  });

  test('redirects with a failure notice when configuration is malformed', async () => {
    process.env.GUESTBOOK_SUBMIT_RATE_MAX = 'lots';
    const res = await POST(formRequest('name=Ada&message=hello'));
    expect(res.headers.get('location')).toBe('http://localhost/?notice=failed');
    expect(await store.count()).toBe(0);
  });

  test('limits submissions per address', async () => {
    process.env.GUESTBOOK_SUBMIT_RATE_MAX = '2';
    await POST(formRequest('message=one'));
    await POST(formRequest('message=two'));
    const res = await POST(formRequest('message=three'));
    expect(res.headers.get('location')).toBe('http://localhost/?notice=rate_limited');
    expect(Number(res.headers.get('retry-after'))).toBeGreaterThan(0);
    expect(await store.count()).toBe(2);

    const other = await POST(formRequest('message=elsewhere', { 'x-forwarded-for': '198.51.100.8' }));
    expect(other.headers.get('location')).toBe('http://localhost/?notice=posted');
  });
});
