/**
 * Secrets Configuration
 * Exchange keys, AI credentials and connection settings read from the environment
 */

import * as dotenv from 'dotenv';
import logger from '../utils/logger';

dotenv.config();

export interface ExchangeCredentials {
  apiKey: string;
  secretKey: string;
  baseUrl?: string;
}

export interface RedisSettings {
  host: string;
  port: number;
  password?: string;
  keyPrefix: string;
}

export interface GeminiSettings {
  apiKey: string;
  model: string;
  endpoint: string;
  timeoutMs: number;
}

export interface RuntimeSettings {
  port: number;
  configPath: string;
  apiToken?: string;
}

export class SecretsManager {
  private static instance: SecretsManager;
  private readonly exchange: ExchangeCredentials | null;
  private readonly redis: RedisSettings;
  private readonly gemini: GeminiSettings | null;
  private readonly runtime: RuntimeSettings;

  private constructor(env: NodeJS.ProcessEnv = process.env) {
    this.exchange = SecretsManager.loadExchange(env);
    this.gemini = SecretsManager.loadGemini(env);

    this.redis = {
      host: env.REDIS_HOST || 'localhost',
      port: parseInt(env.REDIS_PORT || '6379', 10),
      password: env.REDIS_PASSWORD || undefined,
      keyPrefix: env.REDIS_KEY_PREFIX || 'signals:',
    };

    this.runtime = {
      port: parseInt(env.PORT || '3001', 10),
      configPath: env.TRADING_CONFIG_PATH || 'config/trading.json',
      apiToken: env.OPS_API_TOKEN || undefined,
    };

    logger.info('Secrets loaded from environment');
  }

  static getInstance(): SecretsManager {
    if (!SecretsManager.instance) {
      SecretsManager.instance = new SecretsManager();
    }
    return SecretsManager.instance;
  }

  /** Build a manager from an explicit environment, bypassing the singleton. */
  static fromEnv(env: NodeJS.ProcessEnv): SecretsManager {
    return new SecretsManager(env);
  }

  private static loadExchange(env: NodeJS.ProcessEnv): ExchangeCredentials | null {
    if (env.BINANCE_API_KEY && env.BINANCE_SECRET_KEY) {
      logger.info('Exchange credentials loaded');
      return {
        apiKey: env.BINANCE_API_KEY,
        secretKey: env.BINANCE_SECRET_KEY,
        baseUrl: env.BINANCE_FUTURES_BASE_URL,
      };
    }
    logger.warn('Exchange credentials not found in environment');
    return null;
  }

  private static loadGemini(env: NodeJS.ProcessEnv): GeminiSettings | null {
    if (!env.GEMINI_API_KEY) {
      logger.warn('GEMINI_API_KEY not found in environment');
      return null;
    }
    return {
      apiKey: env.GEMINI_API_KEY,
      model: env.GEMINI_MODEL || 'gemini-1.5-flash',
      endpoint: env.GEMINI_ENDPOINT || 'https://generativelanguage.googleapis.com/v1beta',
      timeoutMs: parseInt(env.GEMINI_TIMEOUT_MS || '30000', 10),
    };
  }

  getExchangeCredentials(): ExchangeCredentials | null {
    return this.exchange;
  }

  getRedisConfig(): RedisSettings {
    return this.redis;
  }

  getGeminiConfig(): GeminiSettings | null {
    return this.gemini;
  }

  getRuntimeConfig(): RuntimeSettings {
    return this.runtime;
  }

  /**
   * Validate all required secrets are present
   */
  validateSecrets(): boolean {
    const missing: string[] = [];
    if (!this.exchange) missing.push('exchange');
    if (!this.gemini) missing.push('gemini');

    if (missing.length > 0) {
      logger.warn(`Missing secrets: ${missing.join(', ')}`);
      return false;
    }

    return true;
  }
}

// Export singleton instance
export const secretsManager = SecretsManager.getInstance();
