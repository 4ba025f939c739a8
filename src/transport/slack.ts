import type { App, SlashCommand } from '@slack/bolt';
import { Dispatcher, type HandlerErrorReporter } from './dispatcher.js';
import type { ChatEvent, ConversationType, Handler, HandlerContext, SentMessage, Transport } from './types.js';
import { logger, errorMessage } from '../utils/logger.js';
import { describeSlackError } from '../utils/slack-errors.js';

export interface SlackTransportOptions {
  /** Name shown in denial notices until `identify()` resolves the real one */
  botName?: string;
  onHandlerError?: HandlerErrorReporter;
}

function splitArgs(text: string): string[] {
  return text.trim().split(/\s+/).filter((arg) => arg.length > 0);
}

/**
 * Translate a slash command payload
 */
export function commandEvent(command: SlashCommand): ChatEvent {
  const text = command.text.trim();
  return {
    kind: 'command',
    command: command.command.replace(/^\//, '').toLowerCase(),
    text,
    args: splitArgs(text),
    userId: command.user_id,
    userName: command.user_name,
    channelId: command.channel_id,
    conversationType: command.channel_name === 'directmessage' ? 'direct' : undefined,
    isBot: false,
  };
}

/**
 * Slack adapter for the transport interface.
 *
 * Registers one catch-all slash command listener and one message listener
 * with Bolt and feeds both into a {@link Dispatcher}, so plugin handlers can
 * come and go without touching Bolt's own listener list.
 */
export class SlackTransport implements Transport {
  readonly dispatcher: Dispatcher;
  private name: string;
  private readonly conversationTypes = new Map<string, ConversationType>();

  constructor(
    private readonly app: App,
    options: SlackTransportOptions = {}
  ) {
    this.name = options.botName ?? 'bot';
    this.dispatcher = new Dispatcher(options.onHandlerError);

    this.app.command(/.*/, async ({ command, ack }) => {
      await ack();
      await this.handle(commandEvent(command));
    });

    this.app.message(async ({ message }) => {
      // Plain user messages only: edits, joins and bot posts carry a subtype
      if (message.subtype !== undefined) return;

      const text = message.text ?? '';
      await this.handle({
        kind: 'message',
        text,
        args: splitArgs(text),
        userId: message.user,
        channelId: message.channel,
        conversationType: message.channel_type === 'im' ? 'direct' : 'group',
        messageId: message.ts,
        isBot: message.bot_id !== undefined,
      });
    });
  }

  get botName(): string {
    return this.name;
  }

  /**
   * Resolve the bot's own user name from the token
   */
  async identify(): Promise<string> {
    try {
      const auth = await this.app.client.auth.test();
      if (auth.user) {
        this.name = auth.user;
      }
    } catch (error) {
      logger.warn('Could not resolve bot identity', { error: describeSlackError(error) });
    }
    return this.name;
  }

  addHandler(handler: Handler, group = 0): void {
    this.dispatcher.addHandler(handler, group);
  }

  removeHandler(handler: Handler): boolean {
    return this.dispatcher.removeHandler(handler);
  }

  async sendMessage(channelId: string, text: string): Promise<SentMessage> {
    const result = await this.app.client.chat.postMessage({ channel: channelId, text });
    return {
      channelId: result.channel ?? channelId,
      messageId: result.ts ?? '',
    };
  }

  async deleteMessage(channelId: string, messageId: string): Promise<void> {
    await this.app.client.chat.delete({ channel: channelId, ts: messageId });
  }

  async getConversationType(channelId: string): Promise<ConversationType> {
    const cached = this.conversationTypes.get(channelId);
    if (cached) return cached;

    const info = await this.app.client.conversations.info({ channel: channelId });
    const type: ConversationType = info.channel?.is_im ? 'direct' : 'group';
    this.conversationTypes.set(channelId, type);
    return type;
  }

  /**
   * Dispatch a normalized event. Never throws; failures are logged.
   */
  async handle(event: ChatEvent): Promise<void> {
    if (event.conversationType) {
      this.conversationTypes.set(event.channelId, event.conversationType);
    }

    const ctx: HandlerContext = {
      event,
      reply: (text) => this.sendMessage(event.channelId, text),
      transport: this,
    };

    try {
      await this.dispatcher.dispatch(event, ctx);
    } catch (error) {
      logger.error('Dispatch failed', { channelId: event.channelId, error: errorMessage(error) });
    }
  }
}
