import { CandidateSignal, Direction } from '../../types/trading';
import { ExtractionResult, IncomingMessage, SignalExtractor, normalizeSymbol } from './SignalExtractor';

/** Confidence assigned to pattern-matched signals. */
export const REGEX_CONFIDENCE = 0.5;

const SYMBOL_PATTERNS = [/#([A-Z]{2,10})USDT/, /\b([A-Z]{2,10})\/?USDT\b/, /#([A-Z]{2,10})\b/];
const NUMBER = '(\\d+(?:\\.\\d+)?)';

function firstNumber(text: string, labels: string): number | undefined {
  const match = new RegExp(`(?:${labels})\\s*[:=]?\\s*${NUMBER}`).exec(text);
  return match ? Number(match[1]) : undefined;
}

/**
 * Pattern-based fallback for well-formatted alerts such as
 * "#BTCUSDT LONG Entry: 50000 SL: 49000 TP1: 50500 TP2: 51000 Leverage: 10x".
 */
export class RegexSignalExtractor implements SignalExtractor {
  readonly name = 'regex';

  async extract(message: IncomingMessage, receivedAt: number): Promise<ExtractionResult> {
    const text = message.text.toUpperCase();

    let base: string | undefined;
    for (const pattern of SYMBOL_PATTERNS) {
      const match = pattern.exec(text);
      if (match) {
        base = match[1];
        break;
      }
    }
    if (!base) {
      return { kind: 'not_a_signal', detail: 'no symbol found' };
    }

    let direction: Direction | undefined;
    if (/\b(SHORT|SELL)\b/.test(text)) direction = 'short';
    else if (/\b(LONG|BUY)\b/.test(text)) direction = 'long';
    if (!direction) {
      return { kind: 'not_a_signal', detail: 'no direction found' };
    }

    const entryPrice = firstNumber(text, 'ENTRY|ENTER|BUY|SELL|PRICE');
    const marketEntry = /\b(MARKET|CMP)\b/.test(text);
    if (entryPrice === undefined && !marketEntry) {
      return { kind: 'parse_failed', error: 'no entry price found' };
    }

    const takeProfits: number[] = [];
    const targetPattern = new RegExp(`(?:TP\\d*|TARGET\\s*\\d*|TAKE\\s*PROFIT\\s*\\d*)\\s*[:=]?\\s*${NUMBER}`, 'g');
    for (const match of text.matchAll(targetPattern)) {
      takeProfits.push(Number(match[1]));
    }

    const leverageMatch = /(\d+)\s*X\b|LEVERAGE\s*[:=]?\s*(\d+)/.exec(text);
    const leverage = leverageMatch ? Number(leverageMatch[1] ?? leverageMatch[2]) : undefined;

    const signal: CandidateSignal = {
      symbol: normalizeSymbol(base),
      direction,
      marketType: /\bSPOT\b/.test(text) ? 'spot' : 'futures',
      entry: entryPrice !== undefined ? { kind: 'limit', price: entryPrice } : { kind: 'market' },
      stopLoss: firstNumber(text, 'SL|STOP\\s*LOSS|STOP'),
      takeProfits,
      leverage,
      confidence: REGEX_CONFIDENCE,
      sourceMessageId: message.messageId,
      channelId: message.channelId,
      receivedAt,
    };
    return { kind: 'signal', signal: Object.freeze(signal) };
  }
}

export default RegexSignalExtractor;
