import path from 'node:path';
import { ZodError } from 'zod';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  test('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      pollIntervalSeconds: 10,
      enablePoller: true,
      useCache: true,
      dbPath: path.join(process.cwd(), 'data', 'guestbook.db'),
      submitRateMax: 10,
      submitRateWindowSeconds: 60,
      ratePerDay: 200,
      ratePerHour: 50,
    });
  });

  test('reads every recognised variable', () => {
    const config = loadConfig({
      GUESTBOOK_POLL_INTERVAL: '3',
      GUESTBOOK_ENABLE_POLLER: '0',
      GUESTBOOK_USE_CACHE: 'No',
      GUESTBOOK_DB_PATH: '/var/lib/guestbook/book.db',
      GUESTBOOK_SUBMIT_RATE_MAX: '5',
      GUESTBOOK_SUBMIT_RATE_WINDOW_SECONDS: '30',
      GUESTBOOK_RATE_PER_DAY: '500',
      GUESTBOOK_RATE_PER_HOUR: '100',
    });
    expect(config).toEqual({
      pollIntervalSeconds: 3,
      enablePoller: false,
      useCache: false,
      dbPath: '/var/lib/guestbook/book.db',
      submitRateMax: 5,
      submitRateWindowSeconds: 30,
      ratePerDay: 500,
      ratePerHour: 100,
    });
  });

  test('accepts the usual spellings of true', () => {
    for (const value of ['1', 'true', 'YES', 'on']) {
      expect(loadConfig({ GUESTBOOK_USE_CACHE: value }).useCache).toBe(true);
    }
  });

  test('treats blank values as unset', () => {
    const config = loadConfig({ GUESTBOOK_POLL_INTERVAL: ' ', GUESTBOOK_ENABLE_POLLER: '', GUESTBOOK_DB_PATH: '  ' });
    expect(config.pollIntervalSeconds).toBe(10);
    expect(config.enablePoller).toBe(true);
    expect(config.dbPath).toBe(path.join(process.cwd(), 'data', 'guestbook.db'));
  });

  test('rejects malformed values', () => {
    expect(() => loadConfig({ GUESTBOOK_POLL_INTERVAL: 'soon' })).toThrow(ZodError);
    expect(() => loadConfig({ GUESTBOOK_POLL_INTERVAL: '0' })).toThrow(ZodError);
    expect(() => loadConfig({ GUESTBOOK_USE_CACHE: 'maybe' })).toThrow(ZodError);
  });
});
