import { describe, expect, it } from 'vitest';
import { TradierClient, toList } from '@/providers/tradier/client';
import { mapTradierOption, TradierProvider } from '@/providers/tradier/provider';
import { ProviderError } from '@/providers/types';
import { stubFetch, type StubResponse } from '../helpers/fetch';

const BASE_URL = 'https://sandbox.tradier.com/v1/';

function makeClient(responses: StubResponse[], maxRetries = 0) {
  const fetchImpl = stubFetch(responses);
  const client = new TradierClient({
    token: 'test-secret',
    baseUrl: BASE_URL,
    fetchImpl,
    maxRetries,
    initialBackoffMs: 1,
  });
  return { client, fetchImpl };
}

describe('TradierClient', () => {
  it('sends the bearer token and unwraps a single quote object', async () => {
    const { client, fetchImpl } = makeClient([{ body: { quotes: { quote: { symbol: 'AAPL', last: 201.5 } } } }]);

    const quote = await client.fetchQuote('AAPL');

    expect(quote).toEqual({ symbol: 'AAPL', last: 201.5 });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe('https://sandbox.tradier.com/v1/markets/quotes?symbols=AAPL&greeks=false');
    expect(fetchImpl.mock.calls[0][1]).toEqual({
      headers: { Accept: 'application/json', Authorization: 'Bearer test-secret' },
    });
    expect(client.isLive).toBe(false);
  });

  it('returns empty lists for missing collections', async () => {
    const { client } = makeClient([{ body: { expirations: null } }, { body: { options: { option: [] } } }]);

    expect(await client.fetchExpirations('AAPL')).toEqual([]);
    expect(await client.fetchChain('AAPL', '2099-01-16')).toEqual([]);
  });

  it('fails fast on a client error', async () => {
    const { client, fetchImpl } = makeClient([{ status: 401, body: {} }], 2);

    const result = client.fetchQuote('AAPL');

    await expect(result).rejects.toBeInstanceOf(ProviderError);
    await expect(result).rejects.toThrow(/^tradier quote failed: HTTP 401/);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('retries server errors and network failures', async () => {
    const { client } = makeClient(
      [{ status: 503 }, { networkError: 'socket hang up' }, { body: { quotes: { quote: { last: 10 } } } }],
      2
    );

    expect(await client.fetchQuote('AAPL')).toEqual({ last: 10 });
    expect(client.getRequestCount()).toBe(2);
  });

  it('gives up after the last retry', async () => {
    const { client } = makeClient([{ status: 500 }]);

    await expect(client.fetchQuote('AAPL')).rejects.toThrow('tradier quote failed after retries');
  });
});

describe('toList', () => {
  it('normalizes one-or-many values', () => {
    expect(toList(undefined)).toEqual([]);
    expect(toList('2099-01-16')).toEqual(['2099-01-16']);
    expect(toList(['a', 'b'])).toEqual(['a', 'b']);
  });
});

describe('mapTradierOption', () => {
  it('maps a call with Greeks and mid IV', () => {
    const row = mapTradierOption({
      symbol: 'AAPL990116C00180000',
      option_type: 'call',
      strike: 180,
      expiration_date: '2099-01-16',
      bid: 39,
      ask: 41,
      last: 40,
      volume: 25,
      open_interest: 1200,
      greeks: { delta: 0.78, gamma: 0.004, theta: -0.03, vega: 0.5, mid_iv: 0.28, smv_vol: 0.3 },
    });

    expect(row).toEqual({
      contractSymbol: 'AAPL990116C00180000',
      optionType: 'CALL',
      strike: 180,
      expiration: '2099-01-16',
      bid: 39,
      ask: 41,
      last: 40,
      volume: 25,
      openInterest: 1200,
      impliedVolatility: 0.28,
      greeks: { delta: 0.78, gamma: 0.004, theta: -0.03, vega: 0.5 },
    });
  });

  it('falls back to the surface IV and leaves missing fields null', () => {
    const row = mapTradierOption({
      symbol: 'AAPL990116P00150000',
      option_type: 'put',
      strike: 150,
      expiration_date: '2099-01-16',
      bid: null,
      greeks: { delta: -0.2, mid_iv: 0, smv_vol: 0.31 },
    });

    expect(row.optionType).toBe('PUT');
    expect(row.bid).toBeNull();
    expect(row.ask).toBeNull();
    expect(row.impliedVolatility).toBe(0.31);
    expect(row.greeks).toEqual({ delta: -0.2, gamma: null, theta: null, vega: null });
    expect(mapTradierOption({ symbol: 'X', strike: 1, expiration_date: '2099-01-16' }).greeks).toBeNull();
  });
});

describe('TradierProvider', () => {
  it('is unavailable without a client', async () => {
    const provider = new TradierProvider(null);

    expect(provider.isAvailable()).toBe(false);
    await expect(provider.fetchLivePrice('AAPL')).rejects.toThrow(
      'Tradier client not configured (TRADIER_TOKEN missing)'
    );
  });

  it('prices from the last trade, then the bid/ask mid', async () => {
    const { client } = makeClient([
      { body: { quotes: { quote: { last: 201.25, bid: 201, ask: 202 } } } },
      { body: { quotes: { quote: { last: 0, bid: 10, ask: 11 } } } },
      { body: { quotes: { quote: { last: null, bid: 0, ask: 11 } } } },
      { body: { quotes: null } },
    ]);
    const provider = new TradierProvider(client);

    expect(await provider.fetchLivePrice('AAPL')).toBe(201.25);
    expect(await provider.fetchLivePrice('AAPL')).toBe(10.5);
    expect(await provider.fetchLivePrice('AAPL')).toBeNull();
    expect(await provider.fetchLivePrice('AAPL')).toBeNull();
  });

  it('quotes a contract with Greeks', async () => {
    const { client, fetchImpl } = makeClient([
      {
        body: {
          quotes: {
            quote: {
              symbol: 'AAPL990116C00180000',
              type: 'option',
              bid: 39,
              ask: 41,
              last: 40,
              volume: 5,
              open_interest: 900,
              greeks: { delta: 0.8, gamma: 0.003, theta: -0.02, vega: 0.45, mid_iv: 0.27 },
            },
          },
        },
      },
    ]);
    const provider = new TradierProvider(client);

    expect(await provider.fetchOptionQuote('AAPL990116C00180000')).toEqual({
      bid: 39,
      ask: 41,
      last: 40,
      volume: 5,
      openInterest: 900,
      iv: 0.27,
      greeks: { delta: 0.8, gamma: 0.003, theta: -0.02, vega: 0.45 },
      source: 'tradier_live',
    });
    expect(fetchImpl.mock.calls[0][0]).toBe(
      'https://sandbox.tradier.com/v1/markets/quotes?symbols=AAPL990116C00180000&greeks=true'
    );
  });

  it('classifies the asset type, checking the ETF list first', async () => {
    const { client, fetchImpl } = makeClient([
      { body: { quotes: { quote: { type: 'stock' } } } },
      { body: { quotes: { quote: { type: 'etf' } } } },
      { body: { quotes: { quote: { type: 'index' } } } },
    ]);
    const provider = new TradierProvider(client, new Set(['SPY']));

    expect(await provider.fetchAssetType('spy')).toBe('ETF');
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(await provider.fetchAssetType('aapl')).toBe('STOCK');
    expect(await provider.fetchAssetType('QQQ')).toBe('ETF');
    expect(await provider.fetchAssetType('SPX')).toBe('UNKNOWN');
  });

  it('loads chains for LEAPS expirations only and skips a failing expiry', async () => {
    const option = { symbol: 'AAPL990116C00180000', option_type: 'call', strike: 180, expiration_date: '2099-01-16' };
    const { client, fetchImpl } = makeClient([
      { body: { expirations: { date: ['2020-01-17', '2099-01-16', '2099-06-19'] } } },
      { body: { options: { option } } },
      { status: 404 },
    ]);
    const provider = new TradierProvider(client);

    const rows = await provider.fetchOptionsChain('AAPL', 300);

    expect(rows.map((r) => r.contractSymbol)).toEqual(['AAPL990116C00180000']);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(fetchImpl.mock.calls[1][0]).toBe(
      'https://sandbox.tradier.com/v1/markets/options/chains?symbol=AAPL&expiration=2099-01-16&greeks=true'
    );
  });

  it('returns no chain when no expiration is far enough out', async () => {
    const { client, fetchImpl } = makeClient([{ body: { expirations: { date: '2020-01-17' } } }]);

    expect(await new TradierProvider(client).fetchOptionsChain('AAPL', 300)).toEqual([]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('picks the nearest upcoming earnings event', async () => {
    const { client } = makeClient([
      {
        body: [
          {
            results: [
              {
                tables: {
                  corporate_calendars: [
                    { event: 'Q4 2019 Earnings Release', begin_date_time: '2020-01-28' },
                    { event: 'Q2 2099 Earnings Release', begin_date_time: '2099-07-30' },
                    { event: 'Dividend', begin_date_time: '2099-02-01' },
                    { event: 'Q1 2099 Earnings Call', begin_date_time: '2099-04-30' },
                  ],
                },
              },
              { tables: null },
            ],
          },
        ],
      },
    ]);

    expect(await new TradierProvider(client).fetchEarningsDate('AAPL')).toBe('2099-04-30');
  });
});
