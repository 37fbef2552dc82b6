import { describe, it, expect, vi, beforeEach } from 'vitest';

const hoisted = vi.hoisted(() => {
  const getMock = vi.fn();
  return { getMock, createHttp: vi.fn(() => ({ get: getMock })) };
});
vi.mock('../src/lib/http', () => ({ createHttp: hoisted.createHttp }));

import { SolscanClient, extractSolscanPrice } from '../src/clients/solscan';

const MINT = 'TestMint' + '1'.repeat(34);

function respond(statusCode: number, body: unknown) {
  hoisted.getMock.mockResolvedValueOnce({
    statusCode,
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

describe('solscan price extraction', () => {
  it.each([
    [{ price: 1.2 }, 1.2],
    [{ data: { price: '3.4' } }, 3.4],
    [{ data: [{ price: 5 }] }, 5],
    [{ data: [{ value: 6 }] }, 6],
    [{ data: [{ price: 7, value: 8 }] }, 7],
    [{ success: true, data: [{ value: '0.5' }, { value: 9 }] }, 0.5],
  ])('extracts %j', (body, expected) => {
    expect(extractSolscanPrice(body)).toBe(expected);
  });

  it.each([{}, { data: {} }, { data: [] }, { data: [{ price: 'n/a' }] }, null, 'text'])(
    'finds nothing in %j',
    (body) => {
      expect(extractSolscanPrice(body)).toBeUndefined();
    }
  );
});

describe('SolscanClient', () => {
  let client: SolscanClient;

  beforeEach(() => {
    hoisted.getMock.mockReset();
    client = new SolscanClient('test-token', { requestsPerMinute: 60_000 });
  });

  it('sends the api token header', () => {
    expect(hoisted.createHttp).toHaveBeenCalledWith(
      expect.objectContaining({ baseUrl: 'https://pro-api.solscan.io/v2.0', headers: { token: 'test-token' } })
    );
  });

  it('queries a one-second range by default', async () => {
    respond(200, { data: [{ price: 0.0042 }] });

    const res = await client.fetchPriceAt(MINT, 1700000000);

    expect(res).toEqual({ success: true, value: 0.0042, updatedAt: 1700000000 });
    expect(hoisted.getMock).toHaveBeenCalledWith('token/price', {
      searchParams: { address: MINT, from_time: 1700000000, to_time: 1700000001 },
      timeout: 15000,
    });
  });

  it('honours an explicit end of range', async () => {
    respond(200, { price: 1 });

    await client.fetchPriceAt(MINT, 1700000000000, false, 1700000060000);

    expect(hoisted.getMock.mock.calls[0][1].searchParams).toEqual({
      address: MINT,
      from_time: 1700000000,
      to_time: 1700000060,
    });
  });

  it('caches explicit ranges apart from the one-second point', async () => {
    respond(200, { price: 1 });
    respond(200, { price: 99 });

    const point = await client.fetchPriceAt(MINT, 1700000000);
    const range = await client.fetchPriceAt(MINT, 1700000000, true, 1700003600);
    const again = await client.fetchPriceAt(MINT, 1700000000000, true, 1700003600000);

    expect(point).toMatchObject({ success: true, value: 1 });
    expect(range).toMatchObject({ success: true, value: 99 });
    expect(again).toEqual(range);
    expect(hoisted.getMock).toHaveBeenCalledTimes(2);
    expect(hoisted.getMock.mock.calls[1][1].searchParams).toEqual({
      address: MINT,
      from_time: 1700000000,
      to_time: 1700003600,
    });
  });

  it('fails when no tolerated shape carries a price', async () => {
    respond(200, { data: {} });
    expect(await client.fetchPriceAt(MINT, 1700000000)).toEqual({
      success: false,
      reason: 'empty',
      error: 'price not found in response',
    });
  });

  it('classifies 403 as a rejected credential', async () => {
    respond(403, 'forbidden');
    expect(await client.fetchPriceAt(MINT, 1700000000)).toEqual({
      success: false,
      reason: 'credential',
      error: 'credential rejected',
    });
  });

  it('memoizes successful point lookups', async () => {
    respond(200, { price: 2 });

    await client.fetchPriceAt(MINT, 1700000000);
    await client.fetchPriceAt(MINT, 1700000000);

    expect(hoisted.getMock).toHaveBeenCalledTimes(1);
    expect(client.getStatistics()).toMatchObject({ totalRequests: 1, cacheHits: 1 });
  });
});
