/**
 * About Plugin
 *
 * Commands:
 * - /about - Describe the bot
 */

import { BasePlugin, commandHandler, type PluginContext } from '../../src/plugins/index.js';

export const INFO_FILE = 'info.md';

export default class About extends BasePlugin {
  setup(ctx: PluginContext): void {
    ctx.registerHandler(
      commandHandler(ctx.handle, async ({ reply }) => {
        const info = await ctx.getResource(INFO_FILE);
        await reply(info ?? 'No information available.');
      })
    );
  }
}
