import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import logger from '../../utils/logger';
import {
  DeliveredNotification,
  NotificationService,
  NotificationSink,
  WebhookNotificationSink,
} from '../../services/notifications/NotificationService';
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

class RecordingSink implements NotificationSink {
  readonly delivered: DeliveredNotification[] = [];

  constructor(readonly name: string = 'recording') {}

  async deliver(notification: DeliveredNotification): Promise<void> {
    this.delivered.push(notification);
  }
}

describe('NotificationService', () => {
  let clock: ManualClock;
  let service: NotificationService;

  beforeEach(() => {
    jest.clearAllMocks();
    clock = new ManualClock();
    service = new NotificationService(clock.clock);
  });

  it('stamps severity and time on every notification', async () => {
    const sink = new RecordingSink();
    service.addSink(sink);

    service.notify({ type: 'trade_aborted', tradeId: 't-1', symbol: 'BTCUSDT', reason: 'ENTRY_TIMEOUT', message: 'no fill' });
    await service.drain();

    expect(sink.delivered).toEqual([{
      type: 'trade_aborted',
      tradeId: 't-1',
      symbol: 'BTCUSDT',
      reason: 'ENTRY_TIMEOUT',
      message: 'no fill',
      severity: 'warning',
      timestamp: clock.now,
    }]);
  });

  it('escalates an unprotected position', () => {
    const listener = jest.fn();
    service.on('notification', listener);

    service.notify({ type: 'position_unprotected', tradeId: 't-1', symbol: 'BTCUSDT', reason: 'stop loss rejected' });

    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ severity: 'critical' }));
    expect(logger.error).toHaveBeenCalledWith('CRITICAL position_unprotected', expect.objectContaining({ tradeId: 't-1' }));
  });

  it('logs a failing sink and keeps delivering to the others', async () => {
    const healthy = new RecordingSink();
    service.addSink({
      name: 'broken',
      deliver: async () => {
        throw new Error('connection refused');
      },
    });
    service.addSink(healthy);

    expect(() => service.notify({ type: 'daily_loss_halt', reason: 'limit', dailyRealizedPnL: -300 })).not.toThrow();
    await service.drain();

    expect(healthy.delivered).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith('Notification sink broken failed for daily_loss_halt: connection refused');
  });

  it('survives a throwing listener', () => {
    service.on('notification', () => {
      throw new Error('listener bug');
    });

    expect(() => service.notify({
      type: 'position_closed', positionId: 'p-1', symbol: 'ETHUSDT', marketType: 'futures', realizedPnL: 12.5,
    })).not.toThrow();
    expect(logger.error).toHaveBeenCalledWith('Notification listener failed for position_closed: listener bug');
  });
});

describe('WebhookNotificationSink', () => {
  it('posts the notification body to the webhook', async () => {
    const post = jest.fn<(url: string, data: unknown) => Promise<unknown>>().mockResolvedValue({});
    const sink = new WebhookNotificationSink('https://hooks.invalid/trading', 1000, { post });
    const notification: DeliveredNotification = {
      type: 'signal_rejected',
      reason: 'BLACKLISTED',
      message: 'DOGEUSDT is blacklisted',
      symbol: 'DOGEUSDT',
      messageId: 'msg-1',
      severity: 'info',
      timestamp: 1,
    };

    await sink.deliver(notification);

    expect(post).toHaveBeenCalledWith('', notification);
  });
});
