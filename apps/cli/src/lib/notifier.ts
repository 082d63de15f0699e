/**
 * Discord webhook notifier
 *
 * Posts the session summary as an embed, falling back to a plain message.
 * Delivery problems are logged and reported as `false`; they never fail a run.
 */

import { request, type Dispatcher } from 'undici';
import { VidshiftError, type SessionSummary } from '@vidshift/core';
import { createLogger, maskUrl, retry, type RetryOptions } from '@vidshift/utils';

const logger = createLogger({ module: 'notifier' });

export const EMBED_COLOR = 0x2ecc71;
export const MAX_LISTED_FAILURES = 10;
export const FALLBACK_MESSAGE = 'Media conversion batch completed. Check logs for details.';

export class WebhookError extends VidshiftError {
  constructor(
    public readonly statusCode: number,
    body: string
  ) {
    super(`Webhook responded with HTTP ${statusCode}`, 'WEBHOOK_ERROR', {
      statusCode,
      body: body.substring(0, 200),
    });
    this.name = 'WebhookError';
  }
}

export interface EmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface SummaryEmbed {
  title: string;
  color: number;
  fields: EmbedField[];
}

export interface DiscordNotifierOptions {
  webhookUrl: string;
  dispatcher?: Dispatcher;
  retry?: Partial<RetryOptions>;
}

export function buildSummaryEmbed(summary: SessionSummary): SummaryEmbed {
  const fields: EmbedField[] = [
    { name: 'Mode', value: summary.mode, inline: true },
    { name: 'Total Files', value: String(summary.totalFiles), inline: true },
    { name: 'Converted', value: String(summary.converted), inline: true },
    { name: 'Skipped', value: String(summary.skipped), inline: true },
    { name: 'Failed', value: String(summary.failed), inline: true },
  ];

  if (summary.failures['audio-validation'] > 0) {
    fields.push({
      name: 'Audio Failures',
      value: String(summary.failures['audio-validation']),
      inline: true,
    });
  }
  if (summary.failures['retry-exhausted'] > 0) {
    fields.push({
      name: 'Retry Failures',
      value: String(summary.failures['retry-exhausted']),
      inline: true,
    });
  }

  if (summary.failedFiles.length > 0) {
    let value = summary.failedFiles
      .slice(0, MAX_LISTED_FAILURES)
      .map((file) => `- ${file.path}`)
      .join('\n');
    if (summary.failedFiles.length > MAX_LISTED_FAILURES) {
      value += '\n... (more omitted)';
    }
    fields.push({ name: 'Failed Files', value, inline: false });
  }

  return { title: 'Media Conversion Summary', color: EMBED_COLOR, fields };
}

// Server errors, rate limiting and network failures are worth another try
function isTransient(error: unknown): boolean {
  if (error instanceof WebhookError) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }
  return true;
}

export class DiscordNotifier {
  private readonly webhookUrl: string;
  private readonly dispatcher?: Dispatcher;
  private readonly retryOptions: Partial<RetryOptions>;

  constructor(options: DiscordNotifierOptions) {
    this.webhookUrl = options.webhookUrl;
    this.dispatcher = options.dispatcher;
    this.retryOptions = { maxAttempts: 3, initialDelay: 1000, ...options.retry };
  }

  /**
   * Send the summary embed; on failure, try the plain fallback message
   */
  async sendSummary(summary: SessionSummary): Promise<boolean> {
    if (await this.deliver({ embeds: [buildSummaryEmbed(summary)] }, 'Summary embed')) {
      return true;
    }
    return this.sendMessage(FALLBACK_MESSAGE);
  }

  async sendMessage(content: string): Promise<boolean> {
    return this.deliver({ content }, 'Message');
  }

  private async deliver(payload: Record<string, unknown>, label: string): Promise<boolean> {
    const masked = maskUrl(this.webhookUrl);
    try {
      await retry(() => this.post(payload), {
        ...this.retryOptions,
        retryIf: isTransient,
        onRetry: (error, attempt) => {
          logger.warn({ webhook: masked, attempt, err: error }, 'Webhook delivery failed, retrying');
        },
      });
      logger.info({ webhook: masked }, `${label} sent to Discord`);
      return true;
    } catch (error) {
      logger.error({ webhook: masked, err: error }, `${label} could not be delivered`);
      return false;
    }
  }

  private async post(payload: Record<string, unknown>): Promise<void> {
    const { statusCode, body } = await request(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      dispatcher: this.dispatcher,
    });

    const text = await body.text();
    if (statusCode < 200 || statusCode >= 300) {
      throw new WebhookError(statusCode, text);
    }
  }
}
