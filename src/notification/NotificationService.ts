/**
 * Notification Service
 *
 * Output layer for scan results: formats alerts, batches them into
 * Telegram-sized messages and delivers them. Without Telegram credentials
 * messages are written to the log instead.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import type { ErrorNotification, ScanReport } from '../types.js';
import type { MessageSender, NotificationServiceConfig } from './types.js';
import { TelegramClient } from './TelegramClient.js';
import {
  batchMessages,
  formatAlert,
  formatErrorMessage,
  formatScanSummary,
  formatShutdownMessage,
  formatStartupMessage,
} from './formatter.js';

interface NotificationEventTypes {
  sent: [string];
  error: [Error];
}

/**
 * Writes messages to the log when no chat is configured
 */
export class LogMessageSender implements MessageSender {
  public async sendMessage(text: string): Promise<boolean> {
    logger.info(`Notification (Telegram disabled)\n${text}`);
    return true;
  }

  public async verifyConnection(): Promise<boolean> {
    return true;
  }
}

export class NotificationService extends EventEmitter<NotificationEventTypes> {
  private sender: MessageSender;
  private maxMessageLength: number;

  constructor(config: NotificationServiceConfig, sender?: MessageSender) {
    super();
    this.maxMessageLength = config.maxMessageLength;

    if (sender) {
      this.sender = sender;
    } else if (config.botToken && config.chatId) {
      this.sender = new TelegramClient({
        botToken: config.botToken,
        chatId: config.chatId,
        retryAttempts: config.retryAttempts,
        retryDelayMs: config.retryDelayMs,
      });
    } else {
      logger.warn('Telegram credentials missing, notifications will be logged only');
      this.sender = new LogMessageSender();
    }

    logger.info('Notification Service initialized');
  }

  /**
   * Verify the delivery channel on startup
   */
  public async verifyConnection(): Promise<boolean> {
    return this.sender.verifyConnection();
  }

  /**
   * Deliver the scan summary followed by every alert
   *
   * @returns Number of messages delivered
   */
  public async sendScanReport(report: ScanReport): Promise<number> {
    const messages = [formatScanSummary(report), ...report.alerts.map((alert) => formatAlert(alert))];
    const chunks = batchMessages(messages, this.maxMessageLength);

    let delivered = 0;
    for (const chunk of chunks) {
      if (await this.deliver(chunk)) {
        delivered++;
      }
    }

    logger.info('Scan report delivered', {
      alerts: report.alerts.length,
      messages: chunks.length,
      delivered,
    });
    return delivered;
  }

  /**
   * Send startup notification
   */
  public async sendStartupNotification(intervalMinutes: number, votingPolicy: string): Promise<boolean> {
    return this.deliver(formatStartupMessage(intervalMinutes, votingPolicy, Date.now()));
  }

  /**
   * Send shutdown notification
   */
  public async sendShutdownNotification(reason: string): Promise<boolean> {
    return this.deliver(formatShutdownMessage(reason, Date.now()));
  }

  /**
   * Send error notification, separate from scan reports
   */
  public async sendErrorNotification(errorType: string, errorMessage: string): Promise<boolean> {
    const notification: ErrorNotification = {
      errorType,
      message: errorMessage,
      timestamp: Date.now(),
    };

    logger.warn('Sending error notification', { errorType, errorMessage });

    return this.deliver(formatErrorMessage(notification));
  }

  private async deliver(text: string): Promise<boolean> {
    const success = await this.sender.sendMessage(text);
    if (success) {
      this.emit('sent', text);
    } else {
      this.emit('error', new Error('Failed to send notification'));
    }
    return success;
  }
}
