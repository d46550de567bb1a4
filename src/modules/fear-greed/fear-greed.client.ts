/**
 * FEAR & GREED — HTTP client
 *
 * Single GET against CNN's graphdata endpoint. CNN rejects requests that do
 * not look like they come from a browser, so the request carries browser-like
 * headers. Transport errors, timeouts, 429 and 5xx are retried `retries`
 * times; anything else fails straight away.
 *
 * @example
 * const client = new FearGreedClient({ url, timeoutMs: 15000, retries: 1, retryDelayMs: 1000, logger });
 * const index = await client.fetchIndex();
 * // { current: { score: 62.3, label: 'Greed', ... }, history: [...] }
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { MalformedResponseError, UpstreamUnavailableError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { parseComponentsPayload, parseIndexPayload } from './fear-greed.schema.js';
import type { ComponentSet, FearGreedFetcher, FearGreedIndex } from './fear-greed.types.js';

export const UPSTREAM_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
  Origin: 'https://edition.cnn.com',
  Referer: 'https://edition.cnn.com/',
};

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface FearGreedClientConfig {
  url: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  logger: Logger;
  /** Pre-built axios instance (tests pass one with a stub adapter) */
  http?: AxiosInstance;
  now?: () => number;
}

export class FearGreedClient implements FearGreedFetcher {
  private readonly http: AxiosInstance;
  private readonly config: FearGreedClientConfig;

  constructor(config: FearGreedClientConfig) {
    this.config = config;
    this.http = config.http ?? axios.create({ timeout: config.timeoutMs });
  }

  async fetchIndex(): Promise<FearGreedIndex> {
    const body = await this.getGraphData();
    const index = parseIndexPayload(body, this.config.logger, this.config.now);

    this.config.logger.info(
      { score: index.current.score, label: index.current.label, points: index.history.length },
      'Fear & Greed index fetched'
    );
    return index;
  }

  async fetchComponents(): Promise<ComponentSet> {
    const body = await this.getGraphData();
    const set = parseComponentsPayload(body, this.config.logger);

    this.config.logger.info(
      { components: set.series.length, missing: set.missing },
      'Fear & Greed components fetched'
    );
    return set;
  }

  // ═══════════════════════════════════════════════════════════════
  // TRANSPORT
  // ═══════════════════════════════════════════════════════════════

  private async getGraphData(): Promise<unknown> {
    const { retries, retryDelayMs, logger } = this.config;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.requestOnce();
      } catch (err) {
        const retryable = err instanceof UpstreamUnavailableError && err.retryable;
        if (!retryable || attempt >= retries) throw err;

        logger.warn({ attempt: attempt + 1, delayMs: retryDelayMs, error: errorMessage(err) }, 'Upstream request failed, retrying');
        await sleep(retryDelayMs);
      }
    }
  }

  private async requestOnce(): Promise<unknown> {
    const { url, timeoutMs } = this.config;
    let res: AxiosResponse<unknown>;

    try {
      res = await this.http.get<unknown>(url, {
        timeout: timeoutMs,
        headers: { ...UPSTREAM_HEADERS },
        responseType: 'json',
        validateStatus: () => true,
      });
    } catch (err) {
      const reason =
        axios.isAxiosError(err) && err.code && TIMEOUT_CODES.has(err.code)
          ? `timed out after ${timeoutMs}ms`
          : errorMessage(err);
      throw new UpstreamUnavailableError(`Fear & Greed API request failed: ${reason}`, { cause: err });
    }

    if (res.status < 200 || res.status >= 300) {
      throw new UpstreamUnavailableError(`Fear & Greed API answered HTTP ${res.status}`, {
        status: res.status,
        retryable: res.status === 429 || res.status >= 500,
      });
    }

    // axios hands back the raw text when the body is not valid JSON
    if (typeof res.data === 'string') {
      try {
        return JSON.parse(res.data);
      } catch {
        throw new MalformedResponseError('Fear & Greed API returned a body that is not JSON');
      }
    }

    return res.data;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
