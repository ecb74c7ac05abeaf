import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { AxiosError, AxiosHeaders } from 'axios';
import { GeminiSignalExtractor, HttpClient, responseText } from '../../services/signals/GeminiSignalExtractor';
import { RegexSignalExtractor } from '../../services/signals/RegexSignalExtractor';
import {
  ExtractionResult,
  IncomingMessage,
  candidateFromJson,
  extractJsonBlock,
  normalizeSymbol,
} from '../../services/signals/SignalExtractor';
import { RateLimiter } from '../../services/resilience/RateLimiter';
import { RetryPolicy } from '../../services/resilience/RetryPolicy';
import { CandidateSignal } from '../../types/trading';
import { ManualClock } from '../utils/fakes';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn()
  }
}));

const RECEIVED_AT = Date.UTC(2024, 0, 15, 12);

function message(text: string, extra: Partial<IncomingMessage> = {}): IncomingMessage {
  return { text, channelId: 'alerts', messageId: 'msg-1', ...extra };
}

function signalOf(result: ExtractionResult): CandidateSignal {
  if (result.kind !== 'signal') {
    throw new Error(`expected a signal, got ${result.kind}`);
  }
  return result.signal;
}

function geminiBody(text: string): { data: unknown } {
  return { data: { candidates: [{ content: { parts: [{ text }] } }] } };
}

describe('RegexSignalExtractor', () => {
  const extractor = new RegexSignalExtractor();

  it('reads a well-formatted futures alert', async () => {
    const signal = signalOf(await extractor.extract(
      message('#BTCUSDT LONG Entry: 50000 SL: 49000 TP1: 50500 TP2: 51000 Leverage: 10x'),
      RECEIVED_AT
    ));

    expect(signal).toEqual({
      symbol: 'BTCUSDT',
      direction: 'long',
      marketType: 'futures',
      entry: { kind: 'limit', price: 50000 },
      stopLoss: 49000,
      takeProfits: [50500, 51000],
      leverage: 10,
      confidence: 0.5,
      sourceMessageId: 'msg-1',
      channelId: 'alerts',
      receivedAt: RECEIVED_AT,
    });
    expect(Object.isFrozen(signal)).toBe(true);
  });

  it('marks market entries', async () => {
    const signal = signalOf(await extractor.extract(message('ETH/USDT short market SL 3100 TP 2900'), RECEIVED_AT));

    expect(signal.symbol).toBe('ETHUSDT');
    expect(signal.direction).toBe('short');
    expect(signal.entry).toEqual({ kind: 'market' });
    expect(signal.stopLoss).toBe(3100);
    expect(signal.takeProfits).toEqual([2900]);
    expect(signal.leverage).toBeUndefined();
  });

  it('ignores chatter', async () => {
    expect(await extractor.extract(message('good morning everyone'), RECEIVED_AT))
      .toEqual({ kind: 'not_a_signal', detail: 'no symbol found' });
    expect(await extractor.extract(message('#BTCUSDT looks interesting'), RECEIVED_AT))
      .toEqual({ kind: 'not_a_signal', detail: 'no direction found' });
  });

  it('fails a signal without an entry', async () => {
    expect(await extractor.extract(message('#BTCUSDT LONG SL 49000'), RECEIVED_AT))
      .toEqual({ kind: 'parse_failed', error: 'no entry price found' });
  });
});

describe('candidateFromJson', () => {
  it('accepts alternate field names and percentage confidence', () => {
    const signal = signalOf(candidateFromJson({
      signal: {
        symbol: 'btc',
        action: 'BUY',
        entry_price: '50,000',
        stop_loss: '49000',
        take_profit: 51000,
        confidence: 85,
        trade_type: 'spot',
      },
    }, message('raw'), RECEIVED_AT));

    expect(signal.symbol).toBe('BTCUSDT');
    expect(signal.direction).toBe('long');
    expect(signal.entry).toEqual({ kind: 'limit', price: 50000 });
    expect(signal.stopLoss).toBe(49000);
    expect(signal.takeProfits).toEqual([51000]);
    expect(signal.marketType).toBe('spot');
    expect(signal.confidence).toBe(0.85);
    expect(signal.leverage).toBeUndefined();
  });

  it('separates "no signal" from unreadable output', () => {
    expect(candidateFromJson({ signal: null }, message('raw'), RECEIVED_AT).kind).toBe('not_a_signal');
    expect(candidateFromJson('text', message('raw'), RECEIVED_AT).kind).toBe('parse_failed');
    expect(candidateFromJson({ signal: { symbol: 'BTC' } }, message('raw'), RECEIVED_AT))
      .toEqual({ kind: 'parse_failed', error: 'symbol, direction and entry are required' });
  });

  it('pulls JSON out of fenced model output', () => {
    expect(extractJsonBlock('```json\n{"signal": null}\n```')).toEqual({ signal: null });
    expect(() => extractJsonBlock('no json here')).toThrow(SyntaxError);
  });

  it('normalizes symbols', () => {
    expect(normalizeSymbol('#btc-usdt')).toBe('BTCUSDT');
    expect(normalizeSymbol('SOL/USDT')).toBe('SOLUSDT');
    expect(normalizeSymbol('eth')).toBe('ETHUSDT');
  });
});

describe('GeminiSignalExtractor', () => {
  const settings = {
    apiKey: 'test-key',
    model: 'gemini-1.5-flash',
    endpoint: 'https://gemini.invalid/v1beta',
    timeoutMs: 1000,
  };

  let http: { post: jest.Mock<HttpClient['post']>; get: jest.Mock<HttpClient['get']> };
  let rateLimiter: RateLimiter;
  let retryPolicy: RetryPolicy;

  beforeEach(() => {
    const clock = new ManualClock();
    http = { post: jest.fn<HttpClient['post']>(), get: jest.fn<HttpClient['get']>() };
    rateLimiter = new RateLimiter({ clock: clock.clock, sleep: clock.sleep });
    retryPolicy = new RetryPolicy({ clock: clock.clock, sleep: clock.sleep, random: () => 0 });
  });

  function extractor(withFallback: boolean = false): GeminiSignalExtractor {
    return new GeminiSignalExtractor(
      settings,
      rateLimiter,
      retryPolicy,
      60,
      withFallback ? new RegexSignalExtractor() : undefined,
      http
    );
  }

  it('parses the model answer into a candidate', async () => {
    http.post.mockResolvedValue(geminiBody(
      '```json\n{"signal": {"symbol": "BTCUSDT", "direction": "long", "market_type": "futures", ' +
      '"entry": 50000, "stop_loss": 49000, "take_profits": [50500, 51000], "leverage": 10, "confidence": 0.9}}\n```'
    ));

    const signal = signalOf(await extractor().extract(message('BTC long 50000'), RECEIVED_AT));

    expect(signal.symbol).toBe('BTCUSDT');
    expect(signal.entry).toEqual({ kind: 'limit', price: 50000 });
    expect(signal.takeProfits).toEqual([50500, 51000]);
    expect(signal.confidence).toBe(0.9);
    expect(http.post).toHaveBeenCalledWith(
      '/models/gemini-1.5-flash:generateContent',
      expect.anything(),
      { params: { key: 'test-key' } }
    );
  });

  it('reports a model answer without candidates', async () => {
    http.post.mockResolvedValue({ data: { candidates: [] } });

    expect(await extractor().extract(message('x'), RECEIVED_AT))
      .toEqual({ kind: 'parse_failed', error: 'Gemini returned no candidates' });
  });

  it('reports unreadable model text', async () => {
    http.post.mockResolvedValue(geminiBody('I cannot help with that'));

    const result = await extractor().extract(message('x'), RECEIVED_AT);

    expect(result.kind).toBe('parse_failed');
  });

  it('retries network failures, then falls back to the pattern matcher', async () => {
    http.post.mockRejectedValue(new AxiosError('socket hang up', 'ECONNRESET'));

    const signal = signalOf(await extractor(true).extract(
      message('#BTCUSDT LONG Entry: 50000 SL: 49000 TP1: 50500'),
      RECEIVED_AT
    ));

    expect(http.post).toHaveBeenCalledTimes(3);
    expect(signal.confidence).toBe(0.5);
  });

  it('does not retry a client error', async () => {
    http.post.mockRejectedValue(new AxiosError('Bad Request', 'ERR_BAD_REQUEST', undefined, undefined, {
      status: 400,
      statusText: 'Bad Request',
      headers: {},
      config: { headers: new AxiosHeaders() },
      data: {},
    }));

    const result = await extractor().extract(message('x'), RECEIVED_AT);

    expect(http.post).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ kind: 'parse_failed', error: 'Gemini request failed: HTTP 400: Bad Request' });
  });

  it('sends an attached image inline', async () => {
    http.get.mockResolvedValue({ data: Buffer.from('img') });
    http.post.mockResolvedValue(geminiBody('{"signal": null}'));

    const result = await extractor().extract(message('chart', { imageUrl: 'https://cdn.invalid/chart.jpg' }), RECEIVED_AT);

    expect(result.kind).toBe('not_a_signal');
    expect(http.post).toHaveBeenCalledWith(
      expect.any(String),
      expect.objectContaining({
        contents: [{ parts: expect.arrayContaining([{ inline_data: { mime_type: 'image/jpeg', data: 'aW1n' } }]) }],
      }),
      expect.anything()
    );
  });

  it('extracts from text alone when the image download fails', async () => {
    http.get.mockRejectedValue(new Error('404'));
    http.post.mockResolvedValue(geminiBody('{"signal": null}'));

    const result = await extractor().extract(message('chart', { imageUrl: 'https://cdn.invalid/missing.jpg' }), RECEIVED_AT);

    expect(result.kind).toBe('not_a_signal');
    expect(http.post).toHaveBeenCalledTimes(1);
  });
});

describe('responseText', () => {
  it('returns the first text part', () => {
    expect(responseText({ candidates: [{ content: { parts: [{ inline_data: {} }, { text: 'hi' }] } }] })).toBe('hi');
    expect(responseText({})).toBeUndefined();
  });
});
