/**
 * Fear & Greed client tests
 *
 * Upstream is an axios instance with a stub adapter; nothing leaves the process.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { MalformedResponseError, UpstreamUnavailableError } from '../../../common/errors.js';
import { FearGreedClient } from '../fear-greed.client.js';

const DAY = 86_400_000;
const T0 = Date.UTC(2024, 0, 1);
const URL = 'https://upstream.test/graphdata';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

function graphData(): Record<string, unknown> {
  return {
    fear_and_greed: {
      score: 62,
      rating: 'greed',
      timestamp: '2024-01-03T00:00:00+00:00',
      previous_close: 60.1,
      previous_1_week: 55,
      previous_1_month: 40,
      previous_1_year: 70,
    },
    fear_and_greed_historical: {
      score: 62,
      rating: 'greed',
      data: [
        { x: T0 + 2 * DAY, y: 62, rating: 'greed' },
        { x: T0, y: 50, rating: 'neutral' },
        { x: T0 + DAY, y: 58, rating: 'greed' },
      ],
    },
    market_momentum_sp500: {
      score: 70,
      rating: 'greed',
      data: [
        { x: T0, y: 4700 },
        { x: T0 + DAY, y: 4720 },
      ],
    },
    junk_bond_demand: {
      score: 20,
      rating: 'extreme fear',
      data: [
        { x: T0, y: 1.2 },
        { x: T0 + DAY, y: 1.1 },
      ],
    },
  };
}

type Responder = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

function reply(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

function makeClient(responder: Responder, retries = 1) {
  const adapter = vi.fn(responder);
  const client = new FearGreedClient({
    url: URL,
    timeoutMs: 50,
    retries,
    retryDelayMs: 0,
    logger: mockLogger,
    http: axios.create({ adapter }),
  });
  return { client, adapter };
}

describe('FearGreedClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('fetchIndex', () => {
    it('parses the current reading, comparisons and sorted history', async () => {
      const { client } = makeClient(async config => reply(config, 200, graphData()));

      const index = await client.fetchIndex();

      expect(index.current).toEqual({ timestamp: T0 + 2 * DAY, score: 62, label: 'Greed' });
      expect(index.upstreamRating).toBe('Greed');
      expect(index.previous).toEqual({ close: 60.1, week: 55, month: 40, year: 70 });
      expect(index.history.map(r => r.timestamp)).toEqual([T0, T0 + DAY, T0 + 2 * DAY]);
      expect(index.history.map(r => r.label)).toEqual(['Neutral', 'Greed', 'Greed']);
    });

    it('sends browser-like headers to the configured URL', async () => {
      const { client, adapter } = makeClient(async config => reply(config, 200, graphData()));

      await client.fetchIndex();

      const config = adapter.mock.calls[0]?.[0];
      expect(config?.url).toBe(URL);
      expect(config?.method).toBe('get');
      expect(config?.headers.get('Origin')).toBe('https://edition.cnn.com');
      expect(String(config?.headers.get('User-Agent'))).toMatch(/^Mozilla\/5\.0/);
    });

    it('fails with MalformedResponse when the score is missing', async () => {
      const body = graphData();
      body.fear_and_greed = { rating: 'greed' };
      const { client } = makeClient(async config => reply(config, 200, body));

      const result = client.fetchIndex();

      await expect(result).rejects.toBeInstanceOf(MalformedResponseError);
      await expect(result).rejects.toThrow(/fear_and_greed\.score: score is required/);
    });

    it('fails with MalformedResponse when the score is out of range', async () => {
      const body = graphData();
      body.fear_and_greed = { score: 120, rating: 'greed' };
      const { client } = makeClient(async config => reply(config, 200, body));

      await expect(client.fetchIndex()).rejects.toThrow('Fear & Greed score out of range [0, 100]: 120');
    });

    it('fails with MalformedResponse on a body that is not JSON, without retrying', async () => {
      const { client, adapter } = makeClient(async config => reply(config, 200, '<html>blocked</html>'));

      await expect(client.fetchIndex()).rejects.toBeInstanceOf(MalformedResponseError);
      expect(adapter).toHaveBeenCalledTimes(1);
    });

    it('skips history points with an unexpected shape', async () => {
      const body = graphData();
      body.fear_and_greed_historical = {
        data: [{ x: T0, y: 40 }, { x: 'yesterday', y: 41 }, { x: T0 + DAY, y: 140 }, { x: T0 + 2 * DAY, y: 45 }],
      };
      const { client } = makeClient(async config => reply(config, 200, body));

      const index = await client.fetchIndex();

      expect(index.history.map(r => r.score)).toEqual([40, 45]);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { source: 'fear_and_greed_historical', skipped: 2, kept: 2 },
        'Skipped history points with unexpected shape'
      );
    });

    it('keeps history points whose rating is null', async () => {
      const body = graphData();
      body.fear_and_greed_historical = {
        data: [
          { x: T0, y: 40, rating: null },
          { x: T0 + DAY, y: 45, rating: null },
        ],
      };
      const { client } = makeClient(async config => reply(config, 200, body));

      const index = await client.fetchIndex();

      expect(index.history.map(r => r.score)).toEqual([40, 45]);
    });

    it('treats a missing history block as empty history', async () => {
      const body = graphData();
      delete body.fear_and_greed_historical;
      const { client } = makeClient(async config => reply(config, 200, body));

      const index = await client.fetchIndex();

      expect(index.current.score).toBe(62);
      expect(index.history).toEqual([]);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { source: 'fear_and_greed_historical', issues: 'body: Required' },
        'Index history missing or malformed'
      );
    });
  });

  describe('transport', () => {
    it('reports a timeout as UpstreamUnavailable after one retry', async () => {
      const { client, adapter } = makeClient(async config => {
        throw new AxiosError('timeout of 50ms exceeded', 'ECONNABORTED', config);
      });

      const result = client.fetchIndex();

      await expect(result).rejects.toBeInstanceOf(UpstreamUnavailableError);
      await expect(result).rejects.toThrow('Fear & Greed API request failed: timed out after 50ms');
      expect(adapter).toHaveBeenCalledTimes(2);
    });

    it('retries a 503 and succeeds on the second attempt', async () => {
      let attempts = 0;
      const { client, adapter } = makeClient(async config => {
        attempts++;
        return attempts === 1 ? reply(config, 503, 'unavailable') : reply(config, 200, graphData());
      });

      const index = await client.fetchIndex();

      expect(index.current.score).toBe(62);
      expect(adapter).toHaveBeenCalledTimes(2);
    });

    it('does not retry a 404', async () => {
      const { client, adapter } = makeClient(async config => reply(config, 404, 'not found'));

      const error = await client.fetchIndex().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      expect(error).toMatchObject({ status: 404, retryable: false, code: 'UPSTREAM_UNAVAILABLE' });
      expect(adapter).toHaveBeenCalledTimes(1);
    });

    it('gives up after the configured number of retries', async () => {
      const { client, adapter } = makeClient(async config => reply(config, 500, 'boom'), 0);

      await expect(client.fetchIndex()).rejects.toThrow('Fear & Greed API answered HTTP 500');
      expect(adapter).toHaveBeenCalledTimes(1);
    });
  });

  describe('fetchComponents', () => {
    it('returns present components in display order and lists the missing ones', async () => {
      const { client } = makeClient(async config => reply(config, 200, graphData()));

      const set = await client.fetchComponents();

      expect(set.series.map(s => s.key)).toEqual(['market_momentum_sp500', 'junk_bond_demand']);
      expect(set.series[1]).toMatchObject({
        title: 'Junk Bond Demand',
        score: 20,
        rating: 'Extreme Fear',
        points: [
          { timestamp: T0, value: 1.2 },
          { timestamp: T0 + DAY, value: 1.1 },
        ],
      });
      expect(set.missing).toEqual([
        'stock_price_strength',
        'stock_price_breadth',
        'put_call_options',
        'market_volatility_vix',
        'safe_haven_demand',
      ]);
    });

    it('treats a component without usable points as missing', async () => {
      const body = graphData();
      body.junk_bond_demand = { score: 20, rating: 'fear', data: [{ x: 'a', y: 'b' }] };
      const { client } = makeClient(async config => reply(config, 200, body));

      const set = await client.fetchComponents();

      expect(set.series.map(s => s.key)).toEqual(['market_momentum_sp500']);
      expect(set.missing).toContain('junk_bond_demand');
    });

    it('fails with MalformedResponse when no component is present', async () => {
      const { client } = makeClient(async config =>
        reply(config, 200, { fear_and_greed: { score: 50 }, fear_and_greed_historical: { data: [] } })
      );

      await expect(client.fetchComponents()).rejects.toThrow(
        'Fear & Greed payload contains none of the component series'
      );
    });
  });
});
