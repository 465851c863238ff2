import type { Telegram } from 'telegraf';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { formatAnalysisAlert, formatError } from './formatters.js';
import type { EngineEmitter } from '../events/event-emitter.js';
import type { Analysis, VerdictDecision } from '../types.js';

export type MessageSender = Pick<Telegram, 'sendMessage'>;

export interface NotificationOptions {
  notifyDecisions: readonly VerdictDecision[];
  notifyErrors?: boolean;
}

/** Telegram alerts for webhook-triggered analyses and background failures */
export class NotificationService {
  constructor(
    private readonly telegram: MessageSender,
    private readonly chatId: string,
    private readonly options: NotificationOptions,
  ) {}

  start(emitter: EngineEmitter): void {
    emitter.on('analysisCompleted', (analysis) => {
      if (!this.shouldNotify(analysis)) return;
      this.sendAnalysis(analysis).catch((err: unknown) => {
        logger.error(`[notifications] Unexpected alert failure: ${errorMessage(err)}`);
      });
    });

    if (this.options.notifyErrors ?? true) {
      emitter.on('error', (error, context) => {
        this.sendError(error, context).catch((err: unknown) => {
          logger.error(`[notifications] Unexpected error-alert failure: ${errorMessage(err)}`);
        });
      });
    }

    logger.info(`[notifications] Service started (decisions: ${this.options.notifyDecisions.join(', ') || 'none'})`);
  }

  shouldNotify(analysis: Analysis): boolean {
    return analysis.source === 'webhook' && this.options.notifyDecisions.includes(analysis.verdictDecision);
  }

  async sendAnalysis(analysis: Analysis): Promise<void> {
    try {
      await this.telegram.sendMessage(this.chatId, formatAnalysisAlert(analysis), {
        parse_mode: 'HTML',
      });
    } catch (err) {
      logger.error('[notifications] Failed to send analysis alert', { error: errorMessage(err) });
    }
  }

  async sendError(error: Error, context: string): Promise<void> {
    try {
      await this.telegram.sendMessage(this.chatId, formatError(error.message, context), {
        parse_mode: 'HTML',
      });
    } catch (err) {
      logger.error('[notifications] Failed to send error notification', { error: errorMessage(err) });
    }
  }
}
