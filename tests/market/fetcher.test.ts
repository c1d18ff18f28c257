import { describe, expect, it, vi } from 'vitest';

import {
  HttpError,
  PriceUnavailableError,
  ProviderRateLimitedError,
  RequestCancelledError,
} from '../../src/utils/errors.js';
import { FmpProvider } from '../../src/api/providers/fmp.js';
import { Clock, FakeProvider, makeFetcher } from '../helpers.js';

const DEMO = {
  prices: { AAA: { price: 50, currency: 'USD' }, 'DDD.PA': { price: 20, currency: 'EUR' } },
  fx: { 'EUR/USD': 1.25 },
};

describe('MarketDataFetcher.snapshot', () => {
  it('returns the first provider that answers and skips the rest', async () => {
    const fmp = new FakeProvider('fmp', { AAA: 100 });
    const yahoo = new FakeProvider('yahoo', { AAA: 101 });
    const fetcher = makeFetcher([fmp, yahoo]);

    const snap = await fetcher.snapshot('AAA');

    expect(snap.price).toBe(100);
    expect(snap.source).toBe('fmp');
    expect(snap.degraded).toBe(false);
    expect(snap.sixMonthReturn).toBe(100);
    expect(yahoo.calls).toEqual([]);
  });

  it('falls through to the next provider on failure', async () => {
    const fmp = new FakeProvider('fmp', { AAA: new HttpError(500, 'boom') });
    const yahoo = new FakeProvider('yahoo', { AAA: 101 });
    const fetcher = makeFetcher([fmp, yahoo]);

    const snap = await fetcher.snapshot('AAA');

    expect(snap.source).toBe('yahoo');
    expect(snap.price).toBe(101);
    expect(fmp.calls).toEqual(['AAA']);
  });

  it('treats a zero price as a failed provider', async () => {
    const fmp = new FakeProvider('fmp', { AAA: 0 });
    const yahoo = new FakeProvider('yahoo', { AAA: 99 });
    const fetcher = makeFetcher([fmp, yahoo]);

    expect((await fetcher.snapshot('AAA')).source).toBe('yahoo');
  });

  it('serves repeated lookups from the cache until the TTL lapses', async () => {
    const clock = new Clock();
    const fmp = new FakeProvider('fmp', { AAA: 100 });
    const fetcher = makeFetcher([fmp], { clock });

    await fetcher.snapshot('AAA');
    const cached = await fetcher.snapshot('AAA');
    expect(cached.source).toBe('cache');
    expect(cached.origin).toBe('fmp');
    expect(fmp.calls).toHaveLength(1);

    clock.advance(120_000);
    const fresh = await fetcher.snapshot('AAA');
    expect(fresh.source).toBe('fmp');
    expect(fmp.calls).toHaveLength(2);
  });

  it('quotes the venue symbol and keeps the canonical ticker', async () => {
    const yahoo = new FakeProvider('yahoo', { 'DDD.PA': { price: 20, currency: 'EUR' } });
    const fetcher = makeFetcher([yahoo]);

    const snap = await fetcher.snapshot('DDD', { symbol: 'DDD.PA' });

    expect(snap.ticker).toBe('DDD');
    expect(snap.symbol).toBe('DDD.PA');
    expect(snap.currency).toBe('EUR');
  });

  it('does not call a rate-limited provider again within its cooldown', async () => {
    const clock = new Clock();
    const fmp = new FakeProvider('fmp', {
      AAA: new ProviderRateLimitedError('fmp'),
      BBB: new ProviderRateLimitedError('fmp'),
    });
    const yahoo = new FakeProvider('yahoo', { AAA: 10, BBB: 20 });
    const fetcher = makeFetcher([fmp, yahoo], { clock, cooldown: { baseMs: 5000, maxMs: 60_000 } });

    await fetcher.snapshot('AAA');
    clock.advance(4999);
    await fetcher.snapshot('BBB');
    expect(fmp.calls).toEqual(['AAA']);
    expect(yahoo.calls).toEqual(['AAA', 'BBB']);

    clock.advance(1);
    await fetcher.snapshot('CCC');
    expect(fmp.calls).toEqual(['AAA', 'CCC']);
  });

  it('honours a longer Retry-After on HTTP 429', async () => {
    const clock = new Clock(10_000);
    const fmp = new FakeProvider('fmp', { AAA: new HttpError(429, 'slow down', 60_000) });
    const yahoo = new FakeProvider('yahoo', { AAA: 10 });
    const fetcher = makeFetcher([fmp, yahoo], { clock, cooldown: { baseMs: 5000, maxMs: 300_000 } });

    await fetcher.snapshot('AAA');

    const [status] = fetcher.providerStatus();
    expect(status.coolingDown).toBe(true);
    expect(status.cooldown).toEqual({ until: 70_000, strikes: 1 });
  });

  it('cools FMP down when its ratios call is rate limited after a good quote', async () => {
    const clock = new Clock(10_000);
    const fetchImpl = vi.fn(async (input: string) => {
      const { pathname } = new URL(input);
      if (pathname.endsWith('/quote')) return Response.json([{ symbol: 'AAA', price: 10 }]);
      if (pathname.endsWith('/ratios-ttm')) {
        return Response.json({ message: 'too many requests' }, { status: 429, headers: { 'Retry-After': '60' } });
      }
      return Response.json({ message: 'not found' }, { status: 404 });
    });
    const fmp = new FmpProvider({ apiKey: 'test-key', fetchImpl });
    const yahoo = new FakeProvider('yahoo', { AAA: 11, BBB: 20 });
    const fetcher = makeFetcher([fmp, yahoo], { clock, cooldown: { baseMs: 5000, maxMs: 300_000 } });

    const snap = await fetcher.snapshot('AAA');
    const callsAfterFirst = fetchImpl.mock.calls.length;
    await fetcher.snapshot('BBB');

    expect(snap).toMatchObject({ price: 11, source: 'yahoo' });
    const [status] = fetcher.providerStatus();
    expect(status.coolingDown).toBe(true);
    expect(status.cooldown).toEqual({ until: 70_000, strikes: 1 });
    expect(fetchImpl.mock.calls.length).toBe(callsAfterFirst);
    expect(yahoo.calls).toEqual(['AAA', 'BBB']);
  });

  it('falls back to a synthetic snapshot when every provider is down', async () => {
    const fmp = new FakeProvider('fmp', { AAA: new Error('down') });
    const yahoo = new FakeProvider('yahoo', { AAA: new Error('down') });
    const fetcher = makeFetcher([fmp, yahoo], { demo: DEMO });

    const snap = await fetcher.snapshot('AAA');

    expect(snap.source).toBe('synthetic');
    expect(snap.degraded).toBe(true);
    expect(snap.price).toBe(50);
    expect(snap.sixMonthReturn).toBe(0);
  });

  it('throws PriceUnavailableError when synthetic fallback is off', async () => {
    const fetcher = makeFetcher([new FakeProvider('fmp')], { syntheticFallback: false });

    await expect(fetcher.snapshot('AAA')).rejects.toBeInstanceOf(PriceUnavailableError);
  });

  it('moves on when a provider exceeds its deadline', async () => {
    const fmp = new FakeProvider('fmp', { AAA: 'hang' });
    const yahoo = new FakeProvider('yahoo', { AAA: 42 });
    const fetcher = makeFetcher([fmp, yahoo], { timeoutMs: 20 });

    const snap = await fetcher.snapshot('AAA');

    expect(snap.source).toBe('yahoo');
    expect(snap.price).toBe(42);
  });

  it('propagates caller cancellation to the in-flight provider call', async () => {
    const fmp = new FakeProvider('fmp', { AAA: 'hang' });
    const yahoo = new FakeProvider('yahoo', { AAA: 42 });
    const fetcher = makeFetcher([fmp, yahoo], { timeoutMs: 10_000 });
    const controller = new AbortController();

    const pending = fetcher.snapshot('AAA', { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
    expect(yahoo.calls).toEqual([]);
  });
});

describe('MarketDataFetcher.snapshots', () => {
  it('keeps results aligned with the requests and yields null for exhausted tickers', async () => {
    const yahoo = new FakeProvider('yahoo', { AAA: 1, CCC: 3 });
    const fetcher = makeFetcher([yahoo], { syntheticFallback: false, concurrency: 2 });

    const result = await fetcher.snapshots([{ ticker: 'AAA' }, { ticker: 'BBB' }, { ticker: 'CCC' }]);

    expect(result.map(s => s?.price ?? null)).toEqual([1, null, 3]);
  });
});

describe('MarketDataFetcher.fxRate', () => {
  it('returns 1 for identical currencies without a provider call', async () => {
    const yahoo = new FakeProvider('yahoo');
    const fetcher = makeFetcher([yahoo]);

    const quote = await fetcher.fxRate('USD', 'USD');

    expect(quote?.rate).toBe(1);
    expect(yahoo.fxCalls).toEqual([]);
  });

  it('caches provider rates', async () => {
    const yahoo = new FakeProvider('yahoo', {}, { 'EUR/USD': 1.1 });
    const fetcher = makeFetcher([yahoo]);

    const first = await fetcher.fxRate('EUR', 'USD');
    const second = await fetcher.fxRate('EUR', 'USD');

    expect(first).toMatchObject({ rate: 1.1, source: 'yahoo', degraded: false });
    expect(second).toMatchObject({ rate: 1.1, source: 'cache' });
    expect(yahoo.fxCalls).toEqual(['EUR/USD']);
  });

  it('uses the inverse of a demo rate when providers fail', async () => {
    const fetcher = makeFetcher([new FakeProvider('yahoo')], { demo: DEMO });

    const quote = await fetcher.fxRate('USD', 'EUR');

    expect(quote?.rate).toBeCloseTo(0.8, 10);
    expect(quote?.degraded).toBe(true);
  });

  it('returns null for an unknown pair', async () => {
    const fetcher = makeFetcher([new FakeProvider('yahoo')], { demo: DEMO });

    expect(await fetcher.fxRate('JPY', 'CHF')).toBeNull();
  });
});
