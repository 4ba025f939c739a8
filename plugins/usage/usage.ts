/**
 * Usage Plugin
 *
 * Records every command used outside direct conversations. Runs in its own
 * dispatch group so it sees commands other plugins also handle.
 */

import { BasePlugin, eventHandler, type HandlerContext, type PluginContext } from '../../src/plugins/index.js';

/** Dispatch group, after the default group 0 */
export const USAGE_GROUP = 1;

export default class Usage extends BasePlugin {
  async setup(ctx: PluginContext): Promise<void> {
    if (!ctx.tableExists('usage')) {
      const create = await ctx.getResource('create_usage.sql');
      if (create === undefined) {
        throw new Error('Missing resource create_usage.sql');
      }
      const result = ctx.execute(create);
      if (!result.success) {
        throw new Error(`Could not create usage table: ${String(result.data)}`);
      }
    }

    ctx.registerHandler(
      eventHandler('any-command', (event) => event.kind === 'command', (handler) => this.record(ctx, handler), {
        runAsync: true,
      }),
      USAGE_GROUP
    );
  }

  private async record(ctx: PluginContext, { event, transport }: HandlerContext): Promise<void> {
    if (event.isBot) return;

    const type = event.conversationType ?? (await transport.getConversationType(event.channelId));
    if (type === 'direct') return;

    const insert = await ctx.getResource('insert_usage.sql');
    if (insert === undefined) return;

    ctx.execute(insert, [event.channelId, event.userId, event.userName ?? event.userId, `/${event.command ?? ''}`]);
  }
}
