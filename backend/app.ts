import express from 'express';
import cors from 'cors';
import { createServer, Server } from 'http';
import { config } from 'dotenv';

// Load environment variables
config();

import { TradingController } from './src/controllers/TradingController';
import { authenticate } from './src/middleware/auth';
import { SecretsManager, secretsManager } from './src/config/secrets';
import { ConfigStore } from './src/config/ConfigStore';
import { SignalPipeline } from './src/services/trading/SignalPipeline';
import { RiskState } from './src/services/trading/RiskState';
import { PositionTracker } from './src/services/trading/PositionTracker';
import { ProcessedSignalCache } from './src/services/trading/ProcessedSignalCache';
import { SignalValidator } from './src/services/trading/SignalValidator';
import { ExecutionEngine } from './src/services/trading/ExecutionEngine';
import { ReconciliationLoop } from './src/services/trading/ReconciliationLoop';
import { StateManager } from './src/services/trading/StateManager';
import { MemoryPersistenceAdapter, PersistenceAdapter } from './src/services/persistence/PersistenceAdapter';
import { NotificationService, WebhookNotificationSink } from './src/services/notifications/NotificationService';
import { BinanceFuturesBroker } from './src/services/brokers/BinanceFuturesBroker';
import { GuardedExchange } from './src/services/brokers/GuardedExchange';
import { ExchangeCapability } from './src/services/brokers/ExchangeCapability';
import { RateLimiter } from './src/services/resilience/RateLimiter';
import { RetryPolicy } from './src/services/resilience/RetryPolicy';
import { GeminiSignalExtractor } from './src/services/signals/GeminiSignalExtractor';
import { RegexSignalExtractor } from './src/services/signals/RegexSignalExtractor';
import { SignalExtractor } from './src/services/signals/SignalExtractor';
import { errorMessage } from './src/services/trading/errors';
import { KeyedMutex } from './src/utils/KeyedMutex';

import logger from './src/utils/logger';

const TESTNET_BASE_URL = 'https://testnet.binancefuture.com';
const EXCHANGE_REQUESTS_PER_SECOND = 10;

export interface AppOptions {
  apiToken?: string;
  corsOrigin?: string;
  /** Released on stop(), after the pipeline has flushed its state. */
  onStop?: () => Promise<void>;
}

export class App {
  private app: express.Application;
  private server: Server;
  private tradingController: TradingController;

  constructor(
    private readonly pipeline: SignalPipeline,
    configStore: ConfigStore,
    private readonly options: AppOptions = {}
  ) {
    this.app = express();
    this.server = createServer(this.app);
    this.tradingController = new TradingController(pipeline, configStore);

    this.configureMiddleware();
    this.setupRoutes();
    // Error handling must be set up AFTER routes
    this.setupErrorHandling();
  }

  /**
   * Wire every component from the environment and the trading config file.
   */
  static async create(secrets: SecretsManager = secretsManager): Promise<App> {
    const runtime = secrets.getRuntimeConfig();
    const configStore = await ConfigStore.fromFile(runtime.configPath);
    const initialConfig = configStore.get();

    const retryPolicy = new RetryPolicy();
    const rateLimiter = new RateLimiter();
    const mutex = new KeyedMutex();

    const credentials = secrets.getExchangeCredentials();
    if (!credentials) {
      throw new Error('BINANCE_API_KEY and BINANCE_SECRET_KEY are required');
    }
    const broker = new BinanceFuturesBroker({
      ...credentials,
      baseUrl: credentials.baseUrl || (initialConfig.mode === 'demo' ? TESTNET_BASE_URL : undefined),
    });
    rateLimiter.addLimit(broker.name, EXCHANGE_REQUESTS_PER_SECOND);
    const exchange: ExchangeCapability = new GuardedExchange(broker, rateLimiter, retryPolicy);

    let persistence: PersistenceAdapter;
    let onStop: (() => Promise<void>) | undefined;
    if (process.env.REDIS_HOST) {
      const stateManager = new StateManager(secrets.getRedisConfig());
      await stateManager.initialize();
      persistence = stateManager;
      onStop = () => stateManager.cleanup();
    } else {
      logger.warn('Redis not configured - using in-memory state (not recommended for production)');
      persistence = new MemoryPersistenceAdapter();
    }

    const notifications = new NotificationService();
    if (process.env.NOTIFY_WEBHOOK_URL) {
      notifications.addSink(new WebhookNotificationSink(process.env.NOTIFY_WEBHOOK_URL));
    }

    const regex = new RegexSignalExtractor();
    const gemini = secrets.getGeminiConfig();
    const extractor: SignalExtractor = gemini
      ? new GeminiSignalExtractor(gemini, rateLimiter, retryPolicy, initialConfig.aiRequestsPerMinute, regex)
      : regex;
    if (!gemini) {
      logger.warn('Gemini not configured - extracting signals with the pattern matcher only');
    }

    const riskState = new RiskState(persistence);
    const tracker = new PositionTracker(persistence, riskState, configStore, mutex);
    const validator = new SignalValidator(riskState, tracker, new ProcessedSignalCache(), {
      supportedMarkets: exchange.tradableMarkets,
      mutex,
    });
    const engine = new ExecutionEngine(exchange, tracker, notifications, { retryPolicy });
    const reconciliation = new ReconciliationLoop(exchange, tracker, notifications, configStore, engine);

    const pipeline = new SignalPipeline({
      config: configStore,
      extractor,
      exchange,
      riskState,
      tracker,
      validator,
      engine,
      reconciliation,
      notifications,
    });
    await pipeline.initialize();

    return new App(pipeline, configStore, {
      apiToken: runtime.apiToken,
      corsOrigin: process.env.FRONTEND_URL,
      onStop,
    });
  }

  getExpressApp(): express.Application {
    return this.app;
  }

  private configureMiddleware(): void {
    this.app.use(cors({
      origin: this.options.corsOrigin || 'http://localhost:5173',
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization']
    }));

    this.app.use(express.json({ limit: '1mb' }));

    // Request logging
    this.app.use((req, res, next) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', (req, res) => {
      const status = this.pipeline.getStatus();
      res.json({
        success: true,
        message: 'Signal execution API is running',
        timestamp: new Date().toISOString(),
        services: {
          exchange: status.exchange,
          mode: status.mode,
          tradingEnabled: status.risk.tradingEnabled,
          reconciliation: status.reconciliationRunning ? 'running' : 'stopped',
          redis: process.env.REDIS_HOST ? 'configured' : 'not configured'
        }
      });
    });

    this.setupApiRoutes();
  }

  private setupApiRoutes(): void {
    const apiRouter = express.Router();
    const controller = this.tradingController;

    apiRouter.use(authenticate(this.options.apiToken));

    apiRouter.get('/trading/status', controller.getStatus.bind(controller));
    apiRouter.get('/trading/positions', controller.getPositions.bind(controller));
    apiRouter.post('/trading/halt', controller.halt.bind(controller));
    apiRouter.post('/trading/resume', controller.resume.bind(controller));
    apiRouter.post('/trading/reconcile', controller.reconcile.bind(controller));
    apiRouter.post('/trading/cancel-all', controller.cancelAll.bind(controller));
    apiRouter.get('/trading/stats', controller.getTradeStatistics.bind(controller));
    apiRouter.get('/trading/config', controller.getConfig.bind(controller));
    apiRouter.put('/trading/config', controller.updateConfig.bind(controller));
    apiRouter.post('/signals/messages', controller.ingestMessage.bind(controller));

    this.app.use('/api/v1', apiRouter);
  }

  private setupErrorHandling(): void {
    // 404 handler
    this.app.use((req, res) => {
      res.status(404).json({
        success: false,
        error: 'Endpoint not found',
        path: req.path
      });
    });

    // Error handler
    this.app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      const message = errorMessage(err);

      logger.error('API Error:', {
        message,
        path: req.path,
        method: req.method
      });

      res.status(500).json({
        success: false,
        error: message
      });
    });
  }

  public async start(port: number = 3001): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(port, () => {
        logger.info(`Signal execution backend listening on port ${port}`);
        logger.info(`API available at http://localhost:${port}/api/v1`);
        resolve();
      });
    });
  }

  public async stop(): Promise<void> {
    logger.info('Shutting down server...');

    await this.pipeline.cleanup();
    if (this.options.onStop) {
      await this.options.onStop();
    }

    if (!this.server.listening) return;
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('Server shutdown complete');
        resolve();
      });
    });
  }
}

async function main(): Promise<void> {
  const app = await App.create();
  await app.start(secretsManager.getRuntimeConfig().port);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    app.stop()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((error) => {
    logger.error(`Failed to start server: ${errorMessage(error)}`);
    process.exit(1);
  });
}
