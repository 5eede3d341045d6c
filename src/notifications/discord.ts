/**
 * Discord webhook notifications for job events
 *
 * Sends rich embeds to Discord when jobs complete or fail.
 * Only active if DISCORD_WEBHOOK_URL is configured.
 */

import { formatDuration } from '../feed/document.js';
import type { FeedEntry } from '../feed/types.js';
import type { JobNotifier } from '../jobs/orchestrator.js';
import type { IngestJob } from '../jobs/types.js';

/**
 * Discord embed color codes
 */
const COLORS = {
  success: 0x28a745,  // Green
  failure: 0xdc3545,  // Red
  warning: 0xffc107,  // Yellow
  info: 0x17a2b8,     // Blue
};

interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface DiscordEmbed {
  title: string;
  description?: string;
  color: number;
  fields?: EmbedField[];
  timestamp?: string;
  footer?: {
    text: string;
  };
}

interface DiscordPayload {
  content?: string;
  embeds?: DiscordEmbed[];
}

/**
 * Send a message to a Discord webhook
 * Never throws: notifications are best-effort.
 */
async function sendToDiscord(webhookUrl: string, payload: DiscordPayload): Promise<void> {
  try {
    const response = await fetch(webhookUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const body = await response.text();
      console.error(`[Discord] Webhook failed: ${response.status} ${response.statusText}`, body);
    }
  } catch (error) {
    console.error('[Discord] Notification error:', error instanceof Error ? error.message : error);
  }
}

/**
 * Truncate text to fit Discord's limits
 */
function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function describeSource(job: IngestJob): string {
  return job.source.kind === 'remote' ? job.source.value : job.source.originalName;
}

export function buildCompletedEmbed(job: IngestJob, entry: FeedEntry | undefined): DiscordEmbed {
  const fields: EmbedField[] = [
    { name: 'Source', value: truncate(describeSource(job), 1024), inline: false },
  ];

  if (entry) {
    fields.push({ name: 'Title', value: truncate(entry.title, 256), inline: false });
    fields.push({ name: 'Size', value: formatSize(entry.fileSizeBytes), inline: true });
    if (entry.durationSeconds) {
      fields.push({ name: 'Duration', value: formatDuration(entry.durationSeconds), inline: true });
    }
  }

  if (job.warnings.length > 0) {
    fields.push({ name: 'Warnings', value: truncate(job.warnings.join('\n'), 1024), inline: false });
  }

  return {
    title: job.duplicate ? 'Already in Feed' : 'Episode Published',
    color: job.warnings.length > 0 ? COLORS.warning : job.duplicate ? COLORS.info : COLORS.success,
    fields,
    timestamp: new Date().toISOString(),
    footer: { text: `Job ${job.id}` },
  };
}

export function buildFailedEmbed(job: IngestJob): DiscordEmbed {
  const fields: EmbedField[] = [
    { name: 'Source', value: truncate(describeSource(job), 1024), inline: false },
    { name: 'Error', value: truncate(job.errorMessage ?? job.message, 1024), inline: false },
  ];

  if (job.errorCategory) {
    fields.push({ name: 'Category', value: job.errorCategory, inline: true });
  }

  return {
    title: 'Ingest Failed',
    color: COLORS.failure,
    fields,
    timestamp: new Date().toISOString(),
    footer: { text: `Job ${job.id}` },
  };
}

export function createDiscordNotifier(webhookUrl: string): JobNotifier {
  return {
    async jobCompleted(job, entry) {
      await sendToDiscord(webhookUrl, { embeds: [buildCompletedEmbed(job, entry)] });
    },
    async jobFailed(job) {
      // Cancellation was requested by the user, nothing to report
      if (job.errorCategory === 'Cancelled') return;
      await sendToDiscord(webhookUrl, { embeds: [buildFailedEmbed(job)] });
    },
  };
}
