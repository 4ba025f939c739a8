import { logger } from '../utils/logger.js';
import { describeSlackError } from '../utils/slack-errors.js';

/**
 * Anything able to post a text message to a Slack conversation or user
 */
export interface MessageSender {
  sendMessage(channelId: string, text: string): Promise<unknown>;
}

export interface AdminNotifierOptions {
  /** admin.notify_on_error */
  enabled: boolean;
  /** admin.ids */
  adminIds: readonly string[];
  sender: MessageSender;
}

export const NOTIFICATION_HEADER = ':rotating_light: Admin Notification :rotating_light:';

/**
 * Render a notification payload as text. Errors contribute their message.
 */
export function formatPayload(payload: unknown): string {
  if (payload instanceof Error) {
    return payload.message;
  }
  if (typeof payload === 'string') {
    return payload;
  }
  if (typeof payload === 'object' && payload !== null) {
    try {
      return JSON.stringify(payload);
    } catch {
      return String(payload);
    }
  }
  return String(payload);
}

/**
 * Best-effort diagnostic channel to the configured admins.
 *
 * Built once at startup from the global config and injected wherever
 * failures are reported. Delivery is fire-and-forget: a failure to reach one
 * admin is logged and the remaining admins are still tried.
 */
export class AdminNotifier {
  private readonly enabled: boolean;
  private readonly adminIds: readonly string[];
  private readonly sender: MessageSender;

  constructor(options: AdminNotifierOptions) {
    this.enabled = options.enabled;
    this.adminIds = options.adminIds;
    this.sender = options.sender;
  }

  get isEnabled(): boolean {
    return this.enabled && this.adminIds.length > 0;
  }

  /**
   * Send `payload` to every admin without waiting and hand it back unchanged,
   * so it can be used inline: `logger.error(notifier.notify(err).message)`
   */
  notify<T>(payload: T): T {
    if (this.isEnabled) {
      void this.broadcast(formatPayload(payload));
    }
    return payload;
  }

  /**
   * Deliver a notification to every admin. Never rejects.
   */
  async broadcast(text: string): Promise<void> {
    if (!this.isEnabled) {
      return;
    }

    const message = `${NOTIFICATION_HEADER}\n${text}`;

    for (const adminId of this.adminIds) {
      try {
        await this.sender.sendMessage(adminId, message);
      } catch (error) {
        logger.error(`Not possible to notify admin id '${adminId}'`, {
          adminId,
          error: describeSlackError(error),
        });
      }
    }
  }
}
