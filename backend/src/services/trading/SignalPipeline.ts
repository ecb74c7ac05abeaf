/**
 * SignalPipeline - entry point from chat ingestion to execution.
 * Owns the wiring of validator, planner, engine, tracker and reconciliation
 * and their startup / shutdown.
 */

import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import { Clock, systemClock } from '../../utils/time';
import { CandidateSignal, OrderPlan, Position, Rejection, RiskSnapshot } from '../../types/trading';
import { ConfigStore } from '../../config/ConfigStore';
import { DEFAULT_CONSTRAINTS, ExchangeCapability, MarketConstraints } from '../brokers/ExchangeCapability';
import { NotificationService } from '../notifications/NotificationService';
import { IncomingMessage, SignalExtractor } from '../signals/SignalExtractor';
import { RiskState } from './RiskState';
import { SignalValidator } from './SignalValidator';
import { plan } from './OrderPlanner';
import { ExecutionEngine, ExecutionResult, TradeSnapshot } from './ExecutionEngine';
import { PositionTracker } from './PositionTracker';
import { ReconciliationLoop, ReconciliationReport } from './ReconciliationLoop';
import { TradeStatistics, TradeStats } from './TradeStatistics';
import { PlanningError, errorMessage } from './errors';

export type PipelineOutcome =
  | { status: 'dropped'; kind: 'not_a_signal' | 'parse_failed'; detail: string }
  | { status: 'rejected'; rejection: Rejection }
  | { status: 'executed'; result: ExecutionResult };

export interface PipelineComponents {
  config: ConfigStore;
  extractor: SignalExtractor;
  exchange: ExchangeCapability;
  riskState: RiskState;
  tracker: PositionTracker;
  validator: SignalValidator;
  engine: ExecutionEngine;
  reconciliation: ReconciliationLoop;
  notifications: NotificationService;
  clock?: Clock;
}

export interface PipelineStatus {
  risk: RiskSnapshot;
  mode: string;
  exchange: string;
  reconciliationRunning: boolean;
  activeTrades: TradeSnapshot[];
  stats: PipelineStats;
}

interface PipelineStats {
  messagesReceived: number;
  signalsExtracted: number;
  signalsRejected: number;
  tradesExecuted: number;
  tradesAborted: number;
}

export class SignalPipeline extends EventEmitter {
  private readonly clock: Clock;
  private readonly tradeStatistics: TradeStatistics;
  private isInitialized: boolean = false;
  private stats: PipelineStats = {
    messagesReceived: 0,
    signalsExtracted: 0,
    signalsRejected: 0,
    tradesExecuted: 0,
    tradesAborted: 0,
  };

  constructor(private readonly components: PipelineComponents) {
    super();
    this.clock = components.clock ?? systemClock;
    this.tradeStatistics = new TradeStatistics(this.clock);

    components.tracker.on('closed', (position: Position) => this.tradeStatistics.record(position));

    components.riskState.on('dailyLossHalt', (reason: string, snapshot: RiskSnapshot) => {
      components.notifications.notify({
        type: 'daily_loss_halt',
        reason,
        dailyRealizedPnL: snapshot.dailyRealizedPnL,
      });
    });
  }

  /** Restore persisted state, then reconcile it with the exchange before taking signals. */
  async initialize(): Promise<void> {
    if (this.isInitialized) return;

    const { riskState, tracker, reconciliation } = this.components;
    await riskState.initialize();
    await tracker.restore();
    const report = await reconciliation.start();

    this.isInitialized = true;
    logger.info('Signal pipeline initialized', {
      positions: tracker.snapshot().length,
      reconciliation: report,
    });
  }

  async cleanup(): Promise<void> {
    this.components.reconciliation.stop();
    await this.components.riskState.flush();
    await this.components.notifications.drain();
    this.isInitialized = false;
    logger.info('Signal pipeline stopped');
  }

  /** Inbound hook for the chat-ingestion layer. */
  async handleMessage(message: IncomingMessage): Promise<PipelineOutcome> {
    this.stats.messagesReceived++;
    const receivedAt = message.receivedAt ?? this.clock();
    const extraction = await this.components.extractor.extract(message, receivedAt);

    if (extraction.kind === 'not_a_signal') {
      logger.info(`Message ${message.messageId} from ${message.channelId} is not a signal: ${extraction.detail}`);
      return { status: 'dropped', kind: extraction.kind, detail: extraction.detail };
    }
    if (extraction.kind === 'parse_failed') {
      logger.warn(`Message ${message.messageId} from ${message.channelId} could not be parsed: ${extraction.error}`);
      return { status: 'dropped', kind: extraction.kind, detail: extraction.error };
    }

    this.stats.signalsExtracted++;
    return this.processSignal(extraction.signal);
  }

  /** Validate, plan and execute one candidate against a single config snapshot. */
  async processSignal(candidate: CandidateSignal): Promise<PipelineOutcome> {
    const { validator, engine, tracker, notifications } = this.components;
    const config = this.components.config.get();

    const validation = await validator.validate(candidate, config);
    if (validation.verdict === 'rejected') {
      return this.rejected(validation);
    }

    const constraints = await this.constraintsFor(validation.symbol, validation.marketType);

    let orderPlan: OrderPlan;
    try {
      orderPlan = plan(validation, constraints, config);
    } catch (error) {
      tracker.release(validation.tradeId);
      if (error instanceof PlanningError) {
        return this.rejected({ verdict: 'rejected', reason: error.reason, message: error.message, signal: candidate });
      }
      throw error;
    }

    let result: ExecutionResult;
    try {
      result = await engine.execute(orderPlan, config, constraints);
    } catch (error) {
      tracker.release(orderPlan.tradeId);
      logger.error(`Execution of trade ${orderPlan.tradeId} failed: ${errorMessage(error)}`);
      throw error;
    }
    if (result.status === 'aborted') {
      this.stats.tradesAborted++;
      notifications.notify({
        type: 'trade_aborted',
        tradeId: orderPlan.tradeId,
        symbol: orderPlan.symbol,
        reason: result.exchangeCode ?? result.reason,
        message: result.message,
      });
    } else {
      this.stats.tradesExecuted++;
    }

    this.emit('tradeResult', result);
    return { status: 'executed', result };
  }

  halt(reason: string): RiskSnapshot {
    this.components.riskState.halt(reason);
    return this.components.riskState.snapshot();
  }

  resume(): RiskSnapshot {
    this.components.riskState.resume();
    return this.components.riskState.snapshot();
  }

  reconcile(): Promise<ReconciliationReport> {
    return this.components.reconciliation.runOnce();
  }

  getStatus(): PipelineStatus {
    const { riskState, config, exchange, reconciliation, engine } = this.components;
    return {
      risk: riskState.snapshot(),
      mode: config.get().mode,
      exchange: exchange.name,
      reconciliationRunning: reconciliation.isRunning(),
      activeTrades: engine.activeTrades(),
      stats: { ...this.stats },
    };
  }

  getPositions(): Position[] {
    return this.components.tracker.snapshot();
  }

  getTradeStatistics(): TradeStats {
    return this.tradeStatistics.summary();
  }

  /** Emergency stop for pending entries; open positions keep their protection. */
  async cancelAll(): Promise<number> {
    const cancelled = await this.components.engine.cancelAll();
    logger.warn(`Cancel-all requested: ${cancelled} pending entries cancelled`);
    return cancelled;
  }

  private async constraintsFor(symbol: string, marketType: CandidateSignal['marketType']): Promise<MarketConstraints> {
    const { exchange } = this.components;
    if (!exchange.getMarketConstraints) {
      return DEFAULT_CONSTRAINTS[marketType];
    }
    try {
      return await exchange.getMarketConstraints(symbol, marketType);
    } catch (error) {
      logger.warn(`Market constraints for ${symbol} unavailable, using defaults: ${errorMessage(error)}`);
      return DEFAULT_CONSTRAINTS[marketType];
    }
  }

  private rejected(rejection: Rejection): PipelineOutcome {
    this.stats.signalsRejected++;
    this.components.notifications.notify({
      type: 'signal_rejected',
      reason: rejection.reason,
      message: rejection.message,
      symbol: rejection.signal.symbol,
      messageId: rejection.signal.sourceMessageId,
    });
    return { status: 'rejected', rejection };
  }
}

export default SignalPipeline;
