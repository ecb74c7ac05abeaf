import { CandidateSignal, Direction, EntryInstruction, MarketType } from '../../types/trading';

/** A chat message as delivered by the ingestion layer. */
export interface IncomingMessage {
  text: string;
  imageUrl?: string;
  channelId: string;
  messageId: string;
  /** Epoch ms; defaults to the time the pipeline received it. */
  receivedAt?: number;
}

export type ExtractionResult =
  | { kind: 'signal'; signal: CandidateSignal }
  | { kind: 'not_a_signal'; detail: string }
  | { kind: 'parse_failed'; error: string };

export interface SignalExtractor {
  readonly name: string;
  extract(message: IncomingMessage, receivedAt: number): Promise<ExtractionResult>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** BTC, BTC/USDT, #btc-usdt -> BTCUSDT */
export function normalizeSymbol(raw: string): string {
  const cleaned = raw.toUpperCase().replace(/[#/\-_\s]/g, '');
  return cleaned.endsWith('USDT') ? cleaned : `${cleaned}USDT`;
}

function parseDirection(value: unknown): Direction | undefined {
  if (typeof value !== 'string') return undefined;
  const lowered = value.toLowerCase();
  if (lowered === 'long' || lowered === 'buy') return 'long';
  if (lowered === 'short' || lowered === 'sell') return 'short';
  return undefined;
}

function parseEntry(value: unknown): EntryInstruction | undefined {
  if (typeof value === 'string' && value.toLowerCase() === 'market') {
    return { kind: 'market' };
  }
  const price = toNumber(value);
  return price !== undefined && price > 0 ? { kind: 'limit', price } : undefined;
}

/**
 * Build a CandidateSignal from the JSON object the model returns:
 * `{ "signal": { symbol, direction, market_type, entry, stop_loss, take_profits, leverage, confidence } }`
 * or `{ "signal": null }`.
 */
export function candidateFromJson(
  data: unknown,
  message: IncomingMessage,
  receivedAt: number
): ExtractionResult {
  if (!isRecord(data)) {
    return { kind: 'parse_failed', error: 'response is not a JSON object' };
  }
  const body = data.signal;
  if (body === null || body === undefined) {
    return { kind: 'not_a_signal', detail: 'model found no trading signal' };
  }
  if (!isRecord(body)) {
    return { kind: 'parse_failed', error: '"signal" is not an object' };
  }

  const symbol = typeof body.symbol === 'string' && body.symbol.trim() !== '' ? normalizeSymbol(body.symbol) : undefined;
  const direction = parseDirection(body.direction ?? body.action);
  const entry = parseEntry(body.entry ?? body.entry_price);
  if (!symbol || !direction || !entry) {
    return { kind: 'parse_failed', error: 'symbol, direction and entry are required' };
  }

  const rawTargets = Array.isArray(body.take_profits) ? body.take_profits : [body.take_profit];
  const takeProfits = rawTargets
    .map(toNumber)
    .filter((price): price is number => price !== undefined && price > 0);

  const marketType: MarketType = body.market_type === 'spot' || body.trade_type === 'spot' ? 'spot' : 'futures';
  const rawConfidence = toNumber(body.confidence ?? body.confidence_score) ?? 0;
  const confidence = rawConfidence > 1 ? rawConfidence / 100 : rawConfidence;
  const leverage = toNumber(body.leverage);

  return {
    kind: 'signal',
    signal: Object.freeze({
      symbol,
      direction,
      marketType,
      entry,
      stopLoss: toNumber(body.stop_loss),
      takeProfits: Object.freeze(takeProfits),
      leverage: leverage !== undefined && leverage > 0 ? leverage : undefined,
      confidence: Math.min(1, Math.max(0, confidence)),
      sourceMessageId: message.messageId,
      channelId: message.channelId,
      receivedAt,
    }),
  };
}

/** Pull the first {...} block out of free model text. */
export function extractJsonBlock(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new SyntaxError('no JSON object in model response');
  }
  return JSON.parse(text.slice(start, end + 1));
}
