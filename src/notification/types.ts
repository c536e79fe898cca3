/**
 * Types for Notification Service
 */

/**
 * Configuration for Notification Service
 */
export interface NotificationServiceConfig {
  botToken: string;
  chatId: string;
  retryAttempts: number;
  retryDelayMs: number;
  /** Maximum characters per delivered message */
  maxMessageLength: number;
}

/**
 * Delivers one pre-formatted message
 */
export interface MessageSender {
  sendMessage(text: string): Promise<boolean>;
  verifyConnection(): Promise<boolean>;
}
