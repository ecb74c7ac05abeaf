import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import logger from '../utils/logger';
import {
  ConfigSnapshot,
  RawTradingConfig,
  buildConfigSnapshot,
  defaultSnapshot,
  toRawConfig,
} from './TradingConfig';
import { errorMessage } from '../services/trading/errors';

/**
 * Holds the current config snapshot behind a single reference.
 * Readers take one snapshot per decision with `get()`; `publish()` swaps the
 * reference atomically, so a decision already running keeps its snapshot.
 */
export class ConfigStore extends EventEmitter {
  private current: ConfigSnapshot;

  constructor(initial: ConfigSnapshot = defaultSnapshot(), private readonly filePath?: string) {
    super();
    this.current = initial;
  }

  static async fromFile(filePath: string): Promise<ConfigStore> {
    const store = new ConfigStore(defaultSnapshot(), filePath);
    await store.reload();
    return store;
  }

  get(): ConfigSnapshot {
    return this.current;
  }

  publish(next: ConfigSnapshot): ConfigSnapshot {
    const previous = this.current;
    this.current = next;
    this.emit('configChanged', next, previous);
    logger.info('Trading configuration published', {
      mode: next.mode,
      tradingEnabled: next.tradingEnabled,
      blacklist: [...next.blacklist],
    });
    return next;
  }

  /** Apply a partial change on top of the current snapshot. */
  update(patch: RawTradingConfig): ConfigSnapshot {
    return this.publish(buildConfigSnapshot(patch, this.current));
  }

  async reload(): Promise<ConfigSnapshot> {
    if (!this.filePath) {
      return this.current;
    }

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      logger.warn(`Config file ${this.filePath} not readable, using current snapshot: ${errorMessage(error)}`);
      return this.current;
    }

    const parsed: unknown = JSON.parse(content);
    return this.publish(buildConfigSnapshot(parsed, defaultSnapshot()));
  }

  async persist(): Promise<void> {
    if (!this.filePath) return;
    await fs.writeFile(this.filePath, JSON.stringify(toRawConfig(this.current), null, 2), 'utf8');
  }
}

export default ConfigStore;
