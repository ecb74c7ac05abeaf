import axios, { AxiosRequestConfig, isAxiosError } from 'axios';
import logger from '../../utils/logger';
import { GeminiSettings } from '../../config/secrets';
import { RateLimiter } from '../resilience/RateLimiter';
import { RetryPolicy } from '../resilience/RetryPolicy';
import { TradingError, errorMessage } from '../trading/errors';
import {
  ExtractionResult,
  IncomingMessage,
  SignalExtractor,
  candidateFromJson,
  extractJsonBlock,
} from './SignalExtractor';

const SERVICE = 'gemini';

const EXTRACTION_PROMPT = `
You are a cryptocurrency trading signal parser. Extract trading information from the provided text and/or image.

Return ONLY valid JSON in this exact format:
{
  "signal": {
    "symbol": "BTCUSDT",
    "direction": "long",
    "market_type": "futures",
    "entry": 45000.0,
    "stop_loss": 44000.0,
    "take_profits": [45500.0, 46000.0, 46500.0],
    "leverage": 10,
    "confidence": 0.85
  }
}

Rules:
- symbol: the traded pair, add USDT when no quote currency is given
- direction: "long" for buy/long signals, "short" for sell/short signals
- market_type: "futures" for leveraged trades, "spot" otherwise
- entry: the entry price as a number, or "market" when the alert says to enter at market
- stop_loss: the stop loss price as a number
- take_profits: every take-profit level in the order given
- leverage: the leverage multiplier if stated, otherwise omit it
- confidence: 0 to 1, how clearly the message states a complete signal

If the content is not a trading signal, return {"signal": null}
`.trim();

/** The part of an axios instance the extractor uses. */
export interface HttpClient {
  post(url: string, data: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

interface GeminiPart {
  text?: string;
  inline_data?: { mime_type: string; data: string };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** First text part of the first candidate in a generateContent response. */
export function responseText(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.candidates)) return undefined;
  const [candidate] = body.candidates;
  if (!isRecord(candidate) || !isRecord(candidate.content) || !Array.isArray(candidate.content.parts)) {
    return undefined;
  }
  for (const part of candidate.content.parts) {
    if (isRecord(part) && typeof part.text === 'string') return part.text;
  }
  return undefined;
}

/** Network failures, 429 and 5xx are worth another attempt; anything else is not. */
export function toTransportError(error: unknown): TradingError {
  if (error instanceof TradingError) return error;
  if (isAxiosError(error)) {
    const status = error.response?.status;
    const retryable = status === undefined || status === 429 || status >= 500;
    const detail = status === undefined ? error.message : `HTTP ${status}: ${error.message}`;
    return new TradingError(retryable ? 'TRANSIENT_TRANSPORT' : 'UPSTREAM_FAILED', `Gemini request failed: ${detail}`, retryable);
  }
  return new TradingError('UPSTREAM_FAILED', `Gemini request failed: ${errorMessage(error)}`);
}

/**
 * Extracts candidate signals with Gemini's generateContent endpoint.
 * Calls share a fixed requests-per-minute budget and queue when it is spent.
 * When the model cannot be reached the optional fallback extractor is used.
 */
export class GeminiSignalExtractor implements SignalExtractor {
  readonly name = 'gemini';
  private readonly http: HttpClient;

  constructor(
    private readonly settings: GeminiSettings,
    private readonly rateLimiter: RateLimiter,
    private readonly retryPolicy: RetryPolicy,
    requestsPerMinute: number,
    private readonly fallback?: SignalExtractor,
    http?: HttpClient
  ) {
    this.http = http ?? axios.create({
      baseURL: settings.endpoint,
      timeout: settings.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
    this.rateLimiter.addPerMinuteLimit(SERVICE, requestsPerMinute);
  }

  async extract(message: IncomingMessage, receivedAt: number): Promise<ExtractionResult> {
    const payload = await this.buildPayload(message);
    let text: string | undefined;
    try {
      text = await this.retryPolicy.execute(async () => {
        await this.rateLimiter.waitForToken(SERVICE);
        try {
          const response = await this.http.post(
            `/models/${this.settings.model}:generateContent`,
            payload,
            { params: { key: this.settings.apiKey } }
          );
          return responseText(response.data);
        } catch (error) {
          throw toTransportError(error);
        }
      }, { service: SERVICE, method: 'generateContent' });
    } catch (error) {
      logger.error(`Gemini extraction failed for message ${message.messageId}: ${errorMessage(error)}`);
      if (this.fallback) {
        logger.info(`Falling back to ${this.fallback.name} extraction`);
        return this.fallback.extract(message, receivedAt);
      }
      return { kind: 'parse_failed', error: errorMessage(error) };
    }

    if (text === undefined) {
      return { kind: 'parse_failed', error: 'Gemini returned no candidates' };
    }

    try {
      return candidateFromJson(extractJsonBlock(text), message, receivedAt);
    } catch (error) {
      return { kind: 'parse_failed', error: `Unreadable model response: ${errorMessage(error)}` };
    }
  }

  private async buildPayload(message: IncomingMessage): Promise<object> {
    const parts: GeminiPart[] = [
      { text: EXTRACTION_PROMPT },
      { text: `Signal content: ${message.text}` },
    ];

    if (message.imageUrl) {
      const image = await this.downloadImage(message.imageUrl);
      if (image) parts.push({ inline_data: image });
    }

    return {
      contents: [{ parts }],
      generationConfig: {
        temperature: 0.1,
        topK: 1,
        topP: 0.8,
        maxOutputTokens: 1024,
      },
    };
  }

  private async downloadImage(url: string): Promise<GeminiPart['inline_data'] | undefined> {
    try {
      const { data } = await this.http.get(url, { responseType: 'arraybuffer', baseURL: '' });
      const bytes = Buffer.isBuffer(data) ? data : data instanceof ArrayBuffer ? Buffer.from(data) : undefined;
      if (!bytes) {
        logger.warn(`Image ${url} returned no binary body, extracting from text only`);
        return undefined;
      }
      return { mime_type: 'image/jpeg', data: bytes.toString('base64') };
    } catch (error) {
      logger.warn(`Image ${url} could not be downloaded, extracting from text only: ${errorMessage(error)}`);
      return undefined;
    }
  }
}

export default GeminiSignalExtractor;
