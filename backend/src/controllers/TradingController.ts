import { Request, Response, NextFunction } from 'express';
import { SignalPipeline } from '../services/trading/SignalPipeline';
import { ConfigStore } from '../config/ConfigStore';
import { buildConfigSnapshot, toRawConfig } from '../config/TradingConfig';
import { ConfigValidationError } from '../services/trading/errors';
import logger from '../utils/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Operator control surface: status, kill switch, reconciliation and
 * live config, plus the inbound hook for chat ingestion.
 */
export class TradingController {
  constructor(
    private readonly pipeline: SignalPipeline,
    private readonly config: ConfigStore
  ) {}

  /**
   * GET /api/v1/trading/status
   */
  async getStatus(req: Request, res: Response, next: NextFunction) {
    try {
      res.json({ success: true, data: this.pipeline.getStatus() });
    } catch (error) {
      logger.error('Error getting trading status:', error);
      next(error);
    }
  }

  /**
   * GET /api/v1/trading/positions
   */
  async getPositions(req: Request, res: Response, next: NextFunction) {
    try {
      res.json({ success: true, data: this.pipeline.getPositions() });
    } catch (error) {
      logger.error('Error getting positions:', error);
      next(error);
    }
  }

  /**
   * GET /api/v1/trading/stats
   */
  async getTradeStatistics(req: Request, res: Response, next: NextFunction) {
    try {
      res.json({ success: true, data: this.pipeline.getTradeStatistics() });
    } catch (error) {
      logger.error('Error getting trade statistics:', error);
      next(error);
    }
  }

  /**
   * POST /api/v1/trading/cancel-all
   * Emergency stop for entries still resting; protective orders stay in place.
   */
  async cancelAll(req: Request, res: Response, next: NextFunction) {
    try {
      const cancelled = await this.pipeline.cancelAll();
      res.json({ success: true, data: { cancelled } });
    } catch (error) {
      logger.error('Error cancelling pending entries:', error);
      next(error);
    }
  }

  /**
   * POST /api/v1/trading/halt
   * Kill switch: no new entries until resumed. Open positions keep their protection.
   */
  async halt(req: Request, res: Response, next: NextFunction) {
    try {
      const body: unknown = req.body;
      const reason = isRecord(body) && typeof body.reason === 'string' && body.reason.trim() !== ''
        ? body.reason
        : 'Manual halt';
      const risk = this.pipeline.halt(reason);
      logger.warn(`Trading halted by operator: ${reason}`);
      res.json({ success: true, data: risk });
    } catch (error) {
      logger.error('Error halting trading:', error);
      next(error);
    }
  }

  /**
   * POST /api/v1/trading/resume
   */
  async resume(req: Request, res: Response, next: NextFunction) {
    try {
      const risk = this.pipeline.resume();
      logger.info('Trading resumed by operator');
      res.json({ success: true, data: risk });
    } catch (error) {
      logger.error('Error resuming trading:', error);
      next(error);
    }
  }

  /**
   * POST /api/v1/trading/reconcile
   */
  async reconcile(req: Request, res: Response, next: NextFunction) {
    try {
      const report = await this.pipeline.reconcile();
      res.json({ success: true, data: report });
    } catch (error) {
      logger.error('Error running reconciliation:', error);
      next(error);
    }
  }

  /**
   * GET /api/v1/trading/config
   */
  async getConfig(req: Request, res: Response, next: NextFunction) {
    try {
      res.json({ success: true, data: toRawConfig(this.config.get()) });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/trading/config
   * Partial update; takes effect for signals that arrive after it.
   */
  async updateConfig(req: Request, res: Response, next: NextFunction) {
    try {
      const snapshot = this.config.publish(buildConfigSnapshot(req.body, this.config.get()));
      await this.config.persist();
      res.json({ success: true, data: toRawConfig(snapshot) });
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        res.status(400).json({ success: false, error: error.message, problems: error.problems });
        return;
      }
      logger.error('Error updating config:', error);
      next(error);
    }
  }

  /**
   * POST /api/v1/signals/messages
   */
  async ingestMessage(req: Request, res: Response, next: NextFunction) {
    try {
      const body: unknown = req.body;
      if (
        !isRecord(body) ||
        typeof body.text !== 'string' ||
        typeof body.channelId !== 'string' ||
        typeof body.messageId !== 'string'
      ) {
        res.status(400).json({
          success: false,
          error: 'text, channelId and messageId are required'
        });
        return;
      }

      const outcome = await this.pipeline.handleMessage({
        text: body.text,
        channelId: body.channelId,
        messageId: body.messageId,
        imageUrl: typeof body.imageUrl === 'string' ? body.imageUrl : undefined,
      });
      res.json({ success: true, data: outcome });
    } catch (error) {
      logger.error('Error handling inbound message:', error);
      next(error);
    }
  }
}
