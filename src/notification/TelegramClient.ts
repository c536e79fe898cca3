/**
 * Telegram Client
 *
 * Handles communication with Telegram Bot API.
 * Includes retry logic and rate limit handling.
 */

import TelegramBot from 'node-telegram-bot-api';
import { logger, maskSecret } from '../logger.js';
import { isRecord } from '../state/jsonFile.js';
import type { MessageSender } from './types.js';

export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
  retryAttempts: number;
  retryDelayMs: number;
}

export class TelegramClient implements MessageSender {
  private bot: TelegramBot;
  private chatId: string;
  private retryAttempts: number;
  private retryDelayMs: number;

  constructor(config: TelegramClientConfig) {
    this.bot = new TelegramBot(config.botToken);
    this.chatId = config.chatId;
    this.retryAttempts = config.retryAttempts;
    this.retryDelayMs = config.retryDelayMs;

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Send a message with retry logic
   * Returns true if message was sent successfully
   */
  public async sendMessage(
    text: string,
    parseMode: 'Markdown' | 'HTML' = 'Markdown'
  ): Promise<boolean> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        await this.bot.sendMessage(this.chatId, text, {
          parse_mode: parseMode,
          disable_web_page_preview: true,
        });

        logger.debug('Telegram message sent successfully', { attempt });
        return true;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt >= this.retryAttempts) {
          break;
        }

        const retryAfterMs = extractRetryAfterMs(error);
        if (retryAfterMs !== null) {
          logger.warn('Telegram rate limit hit, waiting...', {
            attempt,
            waitTime: retryAfterMs,
          });
          await this.sleep(retryAfterMs);
        } else {
          logger.warn('Telegram send failed, retrying...', {
            attempt,
            error: lastError.message,
          });
          await this.sleep(this.retryDelayMs * attempt);
        }
      }
    }

    logger.error('Failed to send Telegram message after all retries', {
      error: lastError?.message,
    });
    return false;
  }

  /**
   * Verify the bot token is valid
   */
  public async verifyConnection(): Promise<boolean> {
    try {
      const me = await this.bot.getMe();
      logger.info('Telegram bot verified', {
        username: me.username,
      });
      return true;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Wait time from a 429 response, null for any other error
 */
export function extractRetryAfterMs(error: unknown): number | null {
  const response = isRecord(error) ? error.response : undefined;
  if (!isRecord(response) || response.statusCode !== 429) {
    return null;
  }

  const body = response.body;
  const parameters = isRecord(body) ? body.parameters : undefined;
  const retryAfter = isRecord(parameters) ? parameters.retry_after : undefined;
  if (typeof retryAfter === 'number' && retryAfter > 0) {
    return retryAfter * 1000; // Convert to milliseconds
  }
  return 1000;
}
