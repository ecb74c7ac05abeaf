import { EventEmitter } from 'events';
import axios from 'axios';
import logger from '../../utils/logger';
import { Clock, systemClock } from '../../utils/time';
import { Direction, MarketType, RejectionReason } from '../../types/trading';
import { ReconciliationDiscrepancy, errorMessage } from '../trading/errors';

export type TradingNotification =
  | {
      type: 'signal_rejected';
      reason: RejectionReason;
      message: string;
      symbol: string;
      messageId: string;
    }
  | {
      type: 'trade_entered';
      tradeId: string;
      symbol: string;
      marketType: MarketType;
      direction: Direction;
      price: number;
      quantity: number;
      leverage: number;
    }
  | {
      type: 'trade_aborted';
      tradeId: string;
      symbol: string;
      reason: string;
      message: string;
    }
  | {
      type: 'position_protected';
      tradeId: string;
      symbol: string;
      stopLossOrderId: string;
      takeProfitOrderIds: string[];
    }
  | {
      type: 'position_unprotected';
      tradeId: string;
      symbol: string;
      reason: string;
    }
  | {
      type: 'position_closed';
      positionId: string;
      symbol: string;
      marketType: MarketType;
      realizedPnL: number;
    }
  | {
      type: 'reconciliation_discrepancy';
      kind: ReconciliationDiscrepancy['kind'];
      symbol: string;
      message: string;
    }
  | {
      type: 'daily_loss_halt';
      reason: string;
      dailyRealizedPnL: number;
    };

export type NotificationType = TradingNotification['type'];
export type Severity = 'info' | 'warning' | 'critical';

export type DeliveredNotification = TradingNotification & {
  severity: Severity;
  timestamp: number;
};

/** Outbound channel of the control surface (chat bot, webhook, ...). */
export interface NotificationSink {
  readonly name: string;
  deliver(notification: DeliveredNotification): Promise<void> | void;
}

const SEVERITY: Record<NotificationType, Severity> = {
  signal_rejected: 'info',
  trade_entered: 'info',
  trade_aborted: 'warning',
  position_protected: 'info',
  position_unprotected: 'critical',
  position_closed: 'info',
  reconciliation_discrepancy: 'warning',
  daily_loss_halt: 'warning',
};

/**
 * Fire-and-forget fan-out of lifecycle events. Delivery failures are
 * logged here and never reach the caller.
 *
 * Emits `notification` with every delivered notification.
 */
export class NotificationService extends EventEmitter {
  private sinks: NotificationSink[] = [];
  private inFlight: Set<Promise<void>> = new Set();

  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  addSink(sink: NotificationSink): void {
    this.sinks.push(sink);
    logger.info(`Notification sink registered: ${sink.name}`);
  }

  notify(notification: TradingNotification): void {
    const delivered: DeliveredNotification = {
      ...notification,
      severity: SEVERITY[notification.type],
      timestamp: this.clock(),
    };

    if (delivered.severity === 'critical') {
      logger.error(`CRITICAL ${delivered.type}`, delivered);
    } else {
      logger.info(`Notification ${delivered.type}`, delivered);
    }

    try {
      this.emit('notification', delivered);
    } catch (error) {
      logger.error(`Notification listener failed for ${delivered.type}: ${errorMessage(error)}`);
    }

    for (const sink of this.sinks) {
      const delivery = this.deliver(sink, delivered);
      this.inFlight.add(delivery);
      void delivery.finally(() => this.inFlight.delete(delivery));
    }
  }

  /** Resolves once every delivery started so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async deliver(sink: NotificationSink, notification: DeliveredNotification): Promise<void> {
    try {
      await sink.deliver(notification);
    } catch (error) {
      logger.error(`Notification sink ${sink.name} failed for ${notification.type}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Posts each notification as JSON to a control-surface webhook.
 */
export class WebhookNotificationSink implements NotificationSink {
  readonly name = 'webhook';
  private readonly http: { post(url: string, data: unknown): Promise<unknown> };

  constructor(url: string, timeoutMs: number = 5000, http?: { post(url: string, data: unknown): Promise<unknown> }) {
    this.http = http ?? axios.create({ baseURL: url, timeout: timeoutMs });
  }

  async deliver(notification: DeliveredNotification): Promise<void> {
    await this.http.post('', notification);
  }
}

export default NotificationService;
