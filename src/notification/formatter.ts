/**
 * Message Formatter
 *
 * Formats grid alerts, scan summaries and error notifications for Telegram
 * (legacy Markdown).
 */

import type {
  Alert,
  ErrorNotification,
  GridSignal,
  ScanReport,
  StateEntry,
  Zone,
} from '../types.js';

/** Telegram rejects messages above 4096 characters */
export const TELEGRAM_MESSAGE_LIMIT = 4000;

const ZONE_LABEL: Record<Zone, string> = {
  LONG: '🟢 Long',
  SHORT: '🔴 Short',
};

/**
 * Format a single alert
 */
export function formatAlert(alert: Alert): string {
  switch (alert.kind) {
    case 'NEW':
      return `🆕 *${alert.symbol}* grid opportunity\n${formatPlan(alert.signal)}`;

    case 'FLIPPED':
      return `🔄 *${alert.symbol}* flipped ${ZONE_LABEL[alert.previousZone]} → ${ZONE_LABEL[alert.signal.zone]}
_Restart the grid bot in the new direction._
${formatPlan(alert.signal)}`;

    case 'EXITED_RANGE':
      return `⚠️ *${alert.symbol}* broke its range \`${formatRange(alert.previous)}\` at \`$${formatPrice(alert.signal.price)}\`
_Close the old grid; new range below._
${formatPlan(alert.signal)}`;

    case 'EXITED':
      return `🛑 *${alert.symbol}* dropped – consider closing its grid bot.
📊 Last range: \`${formatRange(alert.previous)}\`  |  Ref price: \`$${formatPrice(alert.proxyPrice)}\``;

    case 'CYCLE_WARNING':
      return `⏱️ *${alert.symbol}* grid cycle nearly complete (${formatRemaining(alert.remainingMs)})
📊 Range: \`${formatRange(alert.entry)}\`  |  ${ZONE_LABEL[alert.entry.zone]}
_Review the grid or take profit._`;
  }
}

/**
 * Grid plan block shared by opening alerts
 */
export function formatPlan(signal: GridSignal): string {
  const { plan, indicators } = signal;
  return `📊 Range: \`$${formatPrice(plan.low)} – $${formatPrice(plan.high)}\`
📈 Entry Zone: ${ZONE_LABEL[signal.zone]}
💰 Grids: \`${plan.gridCount}\`  |  📏 Spacing: \`${plan.spacingPct.toFixed(2)}%\`
🌪️ Volatility: \`${indicators.volatilityPct.toFixed(1)}%\`  |  ⏱️ Cycle: \`${plan.cycleDays} days\`
⭐ Score: \`${signal.score.toFixed(1)}\`  |  RSI: \`${indicators.rsi.toFixed(1)}\`  |  Bars: \`${signal.resolution}\``;
}

/**
 * Header line summarising one scan
 */
export function formatScanSummary(report: ScanReport): string {
  const time = formatUtc(report.finishedAt);
  if (report.alerts.length === 0) {
    return `📉 *Grid Scanner* — ${time}
No grid changes (${report.scanned} scanned, ${report.activeCount} active).`;
  }

  return `📈 *Grid Scanner* — ${time}
Scanned: \`${report.scanned}\`  |  Signals: \`${report.signals.length}\`  |  Active: \`${report.activeCount}\``;
}

/**
 * Format an error notification into a Telegram message
 */
export function formatErrorMessage(error: ErrorNotification): string {
  return `❌ *Grid Scanner error*

• Type: \`${error.errorType}\`
• Message: \`${escapeMarkdown(error.message)}\`
• Time: \`${formatUtc(error.timestamp)}\``;
}

/**
 * Format a startup notification
 */
export function formatStartupMessage(intervalMinutes: number, votingPolicy: string, timestamp: number): string {
  return `🚀 *Grid Scanner started*

• Scan interval: \`${intervalMinutes} min\`
• Voting policy: \`${votingPolicy}\`
• Time: \`${formatUtc(timestamp)}\``;
}

/**
 * Format a shutdown notification
 */
export function formatShutdownMessage(reason: string, timestamp: number): string {
  return `🛑 *Grid Scanner stopped*

• Reason: \`${reason}\`
• Time: \`${formatUtc(timestamp)}\``;
}

/**
 * Join messages into chunks no longer than `maxLength`
 */
export function batchMessages(messages: readonly string[], maxLength: number = TELEGRAM_MESSAGE_LIMIT): string[] {
  const separator = '\n\n';
  const chunks: string[] = [];
  let buffer = '';

  for (const raw of messages) {
    const message = truncateMessage(raw, maxLength);
    if (buffer === '') {
      buffer = message;
    } else if (buffer.length + separator.length + message.length > maxLength) {
      chunks.push(buffer);
      buffer = message;
    } else {
      buffer += separator + message;
    }
  }

  if (buffer !== '') {
    chunks.push(buffer);
  }
  return chunks;
}

/**
 * Shorten a message to at most `maxLength` UTF-16 units
 *
 * Cuts at the last line break that fits so Markdown spans stay closed; a
 * single long line is cut between code points.
 */
export function truncateMessage(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const lineEnd = text.lastIndexOf('\n', maxLength);
  if (lineEnd > 0) {
    return text.slice(0, lineEnd);
  }

  let result = '';
  for (const char of text) {
    if (result.length + char.length > maxLength) break;
    result += char;
  }
  return result;
}

/**
 * Format price with appropriate decimal places
 */
export function formatPrice(price: number): string {
  if (price >= 1000) {
    return price.toLocaleString('en-US', {
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    });
  } else if (price >= 1) {
    return price.toFixed(4);
  } else {
    return price.toFixed(8);
  }
}

function formatRange(entry: Pick<StateEntry, 'low' | 'high'>): string {
  return `$${formatPrice(entry.low)} – $${formatPrice(entry.high)}`;
}

/**
 * Remaining cycle time, or how far past the estimate the grid is
 */
export function formatRemaining(remainingMs: number): string {
  const hours = Math.abs(remainingMs) / 3_600_000;
  const text = hours >= 1 ? `${hours.toFixed(1)}h` : `${Math.round(hours * 60)}m`;
  return remainingMs >= 0 ? `~${text} left` : `${text} overdue`;
}

export function formatUtc(timestamp: number): string {
  return `${new Date(timestamp).toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

/**
 * Escape special Markdown characters
 */
function escapeMarkdown(text: string): string {
  return text.replace(/[_*[\]()~`>#+\-=|{}.!]/g, '\\$&');
}
