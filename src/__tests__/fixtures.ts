/**
 * Shared test doubles: config, sample data and a PipelineContext whose
 * collaborators are vi.fn spies.
 */

import { vi } from 'vitest';
import { type BotConfig, loadConfig } from '../config/env.js';
import type { RenderedChart } from '../modules/chart/chart.types.js';
import { classifyScore, makeReading } from '../modules/fear-greed/fear-greed.labels.js';
import type { ComponentSet, FearGreedIndex, IndexReading } from '../modules/fear-greed/fear-greed.types.js';
import type { PipelineContext } from '../modules/pipeline/pipeline.types.js';
import type { ChatAction, ChatId, SentMessage } from '../modules/telegram/telegram.types.js';

export const DAY = 86_400_000;
export const T0 = Date.UTC(2024, 0, 1);
export const DEFAULT_CHAT = '-100123';
export const PNG = Buffer.from('89504e470d0a1a0a', 'hex');

export function testConfig(overrides: Record<string, string> = {}): BotConfig {
  return loadConfig({
    TELEGRAM_BOT_TOKEN: 'test-token',
    TELEGRAM_CHAT_ID: DEFAULT_CHAT,
    ...overrides,
  });
}

export function mockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function sampleIndex(score = 62): FearGreedIndex {
  return {
    current: makeReading(T0 + 2 * DAY, score),
    upstreamRating: classifyScore(score),
    previous: { close: 60.1, week: 55 },
    history: [makeReading(T0, 50), makeReading(T0 + DAY, 58), makeReading(T0 + 2 * DAY, score)],
  };
}

export function sampleComponents(): ComponentSet {
  return {
    series: [
      {
        key: 'market_momentum_sp500',
        title: 'Market Momentum (S&P 500)',
        rating: 'Greed',
        score: 70,
        points: [
          { timestamp: T0, value: 4700 },
          { timestamp: T0 + DAY, value: 4720 },
        ],
      },
      {
        key: 'put_call_options',
        title: 'Put/Call Options',
        rating: 'Fear',
        points: [
          { timestamp: T0, value: 0.91 },
          { timestamp: T0 + DAY, value: 0.87 },
        ],
      },
    ],
    missing: [
      'stock_price_strength',
      'stock_price_breadth',
      'market_volatility_vix',
      'junk_bond_demand',
      'safe_haven_demand',
    ],
  };
}

export function fakeContext(config: BotConfig = testConfig()) {
  const fetcher = {
    fetchIndex: vi.fn(async (): Promise<FearGreedIndex> => sampleIndex()),
    fetchComponents: vi.fn(async (): Promise<ComponentSet> => sampleComponents()),
  };
  const renderer = {
    renderTrend: vi.fn(
      async (_series: readonly IndexReading[], _windowDays: number): Promise<RenderedChart> => ({
        png: PNG,
        width: 1200,
        height: 600,
      })
    ),
    renderComponents: vi.fn(
      async (_set: ComponentSet, _windowDays: number): Promise<RenderedChart> => ({
        png: PNG,
        width: 1560,
        height: 904,
      })
    ),
  };
  const dispatcher = {
    sendText: vi.fn(async (chatId: ChatId, _text: string): Promise<SentMessage> => ({ messageId: 1, chatId })),
    sendPhoto: vi.fn(
      async (chatId: ChatId, _image: Buffer, _caption: string): Promise<SentMessage> => ({ messageId: 2, chatId })
    ),
    sendChatAction: vi.fn(async (_chatId: ChatId, _action: ChatAction): Promise<boolean> => true),
  };
  const logger = mockLogger();

  const ctx: PipelineContext = { config, fetcher, renderer, dispatcher, logger };
  return { ctx, fetcher, renderer, dispatcher, logger };
}
