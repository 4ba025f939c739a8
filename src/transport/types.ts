/**
 * Transport-neutral view of the chat platform.
 *
 * Plugins and the framework only ever see these types; the Slack adapter in
 * ./slack.ts is the one place Bolt payloads are translated.
 */

export type ConversationType = 'direct' | 'group';

/**
 * Inbound chat event
 */
export interface ChatEvent {
  kind: 'command' | 'message';
  /** Lowercased command name without the leading slash (commands only) */
  command?: string;
  /** Command arguments as typed, or the full message text */
  text: string;
  /** `text` split on whitespace */
  args: string[];
  userId: string;
  userName?: string;
  channelId: string;
  /** Known when the platform tells us in the payload */
  conversationType?: ConversationType;
  /** Platform message id (Slack `ts`), for messages */
  messageId?: string;
  isBot: boolean;
}

/**
 * A message the bot posted
 */
export interface SentMessage {
  channelId: string;
  messageId: string;
}

/**
 * What a handler receives when invoked
 */
export interface HandlerContext {
  event: ChatEvent;
  /** Post a message into the event's conversation */
  reply(text: string): Promise<SentMessage>;
  transport: Transport;
}

export type HandlerCallback = (ctx: HandlerContext) => void | Promise<void>;

/**
 * A registered event handler. `matches` selects events; `invoke` runs the body.
 */
export interface Handler {
  /** Description for logs, e.g. "command:/feedback" */
  readonly label: string;
  /** Run on a detached task instead of holding up dispatch */
  readonly runAsync: boolean;
  matches(event: ChatEvent): boolean;
  invoke(ctx: HandlerContext): void | Promise<void>;
}

/**
 * Outbound surface of the chat platform
 */
export interface Transport {
  /** Bot's display name, used in denial notices */
  readonly botName: string;
  addHandler(handler: Handler, group?: number): void;
  removeHandler(handler: Handler): boolean;
  sendMessage(channelId: string, text: string): Promise<SentMessage>;
  deleteMessage(channelId: string, messageId: string): Promise<void>;
  getConversationType(channelId: string): Promise<ConversationType>;
}
