export { NotificationService, LogMessageSender } from './NotificationService.js';
export { TelegramClient, extractRetryAfterMs } from './TelegramClient.js';
export {
  formatAlert,
  formatPlan,
  formatScanSummary,
  formatErrorMessage,
  formatStartupMessage,
  formatShutdownMessage,
  batchMessages,
  truncateMessage,
  TELEGRAM_MESSAGE_LIMIT,
} from './formatter.js';
export type { NotificationServiceConfig, MessageSender } from './types.js';
