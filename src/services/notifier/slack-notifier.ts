import axios, { type AxiosInstance } from "axios";

import { logger } from "../../util/logger.js";
import { NotificationFailure, errorMessage } from "../../util/errors.js";
import { truncateText } from "../../util/text.js";
import type { CrawlRunResult } from "../../models/scrapinghistory.js";

export interface SourceRef {
  id: string;
  name: string;
}

export interface Notifier {
  notifyStart(source: SourceRef): Promise<void>;
  notifyComplete(summary: CrawlRunResult): Promise<void>;
  notifyError(source: SourceRef, message: string): Promise<void>;
}

export type NotificationType = "info" | "success" | "warning" | "error";

export interface NotificationMessage {
  title: string;
  message: string;
  type: NotificationType;
  source?: SourceRef;
  timestamp: Date;
  metadata?: Record<string, string | number | boolean | null>;
}

const EMOJI: Record<NotificationType, string> = {
  info: ":information_source:",
  success: ":white_check_mark:",
  warning: ":warning:",
  error: ":x:",
};

interface TextObject {
  type: "plain_text" | "mrkdwn";
  text: string;
}

type Block =
  | { type: "header"; text: TextObject }
  | { type: "section"; text?: TextObject; fields?: TextObject[] }
  | { type: "context"; elements: TextObject[] };

export interface SlackPayload {
  username: string;
  text: string;
  blocks: Block[];
  channel?: string;
}

function formatValue(value: string | number | boolean | null): string {
  if (value === null) {
    return "-";
  }
  if (typeof value === "boolean") {
    return value ? "yes" : "no";
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? value.toLocaleString("en-US") : value.toFixed(2);
  }
  return value;
}

export function buildPayload(
  message: NotificationMessage,
  username: string,
  channel?: string,
): SlackPayload {
  const title = `${EMOJI[message.type]} ${message.title}`;
  const blocks: Block[] = [
    { type: "header", text: { type: "plain_text", text: title } },
    { type: "section", text: { type: "mrkdwn", text: message.message } },
  ];

  const fields: TextObject[] = [];
  if (message.source) {
    fields.push({ type: "mrkdwn", text: `*Source:*\n${message.source.name}` });
    fields.push({ type: "mrkdwn", text: `*Source ID:*\n${message.source.id}` });
  }
  for (const [key, value] of Object.entries(message.metadata ?? {})) {
    fields.push({ type: "mrkdwn", text: `*${key}:*\n${formatValue(value)}` });
  }
  if (fields.length) {
    blocks.push({ type: "section", fields });
  }

  const epoch = Math.floor(message.timestamp.getTime() / 1000);
  blocks.push({
    type: "context",
    elements: [
      {
        type: "mrkdwn",
        text: `<!date^${epoch}^{date_num} {time_secs}|${message.timestamp.toISOString()}>`,
      },
    ],
  });

  const payload: SlackPayload = {
    username,
    text: `${title}\n${message.message}`,
    blocks,
  };
  if (channel) {
    payload.channel = channel;
  }
  return payload;
}

export interface SlackNotifierOptions {
  channel?: string;
  username?: string;
  timeoutMs?: number;
  client?: AxiosInstance;
  now?: () => Date;
}

export class SlackNotifier implements Notifier {
  private readonly webhookUrl: string;
  private readonly channel?: string;
  private readonly username: string;
  private readonly client: AxiosInstance;
  private readonly now: () => Date;

  constructor(webhookUrl: string, options: SlackNotifierOptions = {}) {
    this.webhookUrl = webhookUrl;
    this.channel = options.channel;
    this.username = options.username ?? "shop-harvester";
    this.client = options.client ?? axios.create({ timeout: options.timeoutMs ?? 10_000 });
    this.now = options.now ?? (() => new Date());

    logger.info("SlackNotifier initialized", { channel: this.channel }, "notification");
  }

  async send(message: NotificationMessage): Promise<void> {
    const payload = buildPayload(message, this.username, this.channel);

    try {
      await this.client.post(this.webhookUrl, payload);
    } catch (e) {
      throw new NotificationFailure(
        `Failed to send Slack notification: ${errorMessage(e)}`,
        { cause: e, details: { title: message.title } },
      );
    }

    logger.info(
      "Slack notification sent",
      { title: message.title, type: message.type },
      "notification",
    );
  }

  notifyStart(source: SourceRef) {
    return this.send({
      title: "Scraping started",
      message: `Started scraping ${source.name}.`,
      type: "info",
      source,
      timestamp: this.now(),
    });
  }

  notifyComplete(summary: CrawlRunResult) {
    const failed = summary.status === "failed";
    const partial = summary.status === "partial";

    return this.send({
      title: failed
        ? "Scraping failed"
        : partial
          ? "Scraping completed with warnings"
          : "Scraping completed",
      message: `Run \`${summary.runId}\` finished with status *${summary.status}*.`,
      type: failed ? "error" : partial ? "warning" : "success",
      source: { id: summary.sourceId, name: summary.sourceName },
      timestamp: this.now(),
      metadata: {
        "Total shops": summary.totalShops,
        "New": summary.newShops,
        "Updated": summary.updatedShops,
        "Geocoded": summary.geocodedShops,
        "Duration (s)": summary.durationSeconds,
      },
    });
  }

  notifyError(source: SourceRef, message: string) {
    return this.send({
      title: "Scraping error",
      // section text is capped at 3000 characters
      message: `\`\`\`${truncateText(message, 2900)}\`\`\``,
      type: "error",
      source,
      timestamp: this.now(),
    });
  }
}

export class NoopNotifier implements Notifier {
  async notifyStart(source: SourceRef) {
    logger.debug("Notification skipped (start)", { sourceId: source.id }, "notification");
  }

  async notifyComplete(summary: CrawlRunResult) {
    logger.debug(
      "Notification skipped (complete)",
      { sourceId: summary.sourceId },
      "notification",
    );
  }

  async notifyError(source: SourceRef, message: string) {
    logger.debug("Notification skipped (error)", { sourceId: source.id, message }, "notification");
  }
}
