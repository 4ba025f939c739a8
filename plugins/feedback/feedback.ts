/**
 * Feedback Plugin
 *
 * Commands:
 * - /feedback <text> - Forward feedback to the admins and store it
 */

import {
  BasePlugin,
  commandHandler,
  rateLimit,
  type HandlerContext,
  type PluginContext,
} from '../../src/plugins/index.js';
import { logger } from '../../src/utils/logger.js';

export const MAX_LENGTH = 1000;
export const THANKS = 'Thanks for letting us know :heart:';

/** Seconds before the thank-you note disappears from a channel */
export const THANKS_TTL = 60;

export default class Feedback extends BasePlugin {
  async setup(ctx: PluginContext): Promise<void> {
    if (!ctx.tableExists('feedback')) {
      const create = await ctx.getResource('create_feedback.sql');
      if (create === undefined) {
        throw new Error('Missing resource create_feedback.sql');
      }
      const result = ctx.execute(create);
      if (!result.success) {
        logger.warn('Feedback will not be stored', { reason: result.data });
      }
    }

    ctx.registerHandler(
      commandHandler(ctx.handle, (handler) => this.onFeedback(ctx, handler), {
        filters: [rateLimit({ max: 3, windowSeconds: 60 })],
      })
    );
  }

  private async onFeedback(ctx: PluginContext, { event, reply }: HandlerContext): Promise<void> {
    if (event.args.length === 0) {
      const usage = await ctx.getUsage({ '{{max_length}}': MAX_LENGTH });
      await reply(usage ?? `Usage: /${ctx.handle} <your feedback>`);
      return;
    }

    const text = event.text.slice(0, MAX_LENGTH);
    const name = event.userName ? `@${event.userName}` : event.userId;

    ctx.notify(`Feedback from ${name}: ${text}`);

    const sent = await reply(THANKS);
    await ctx.removeMessage(sent, THANKS_TTL, { inDirect: false });

    const insert = await ctx.getResource('insert_feedback.sql');
    if (insert !== undefined) {
      ctx.execute(insert, [event.userId, name, event.channelId, text]);
    }
  }
}
