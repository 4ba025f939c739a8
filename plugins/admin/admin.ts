/**
 * Admin Plugin
 *
 * Commands (private chat, owners only):
 * - /admin plugins - List known plugins and their state
 * - /admin enable <name> - Enable a plugin
 * - /admin disable <name> - Disable a plugin
 * - /admin jobs - List scheduled jobs
 */

import {
  BasePlugin,
  commandHandler,
  ownerOnly,
  privateOnly,
  type HandlerContext,
  type PluginContext,
  type PluginInfo,
} from '../../src/plugins/index.js';

export function formatPlugin(info: PluginInfo): string {
  const state = info.active ? ':large_green_circle:' : ':red_circle:';
  const version = info.version ? ` v${info.version}` : '';
  const description = info.description ? ` - ${info.description}` : '';
  return `${state} *${info.name}*${version} \`/${info.handle}\`${description}`;
}

export default class Admin extends BasePlugin {
  setup(ctx: PluginContext): void {
    ctx.registerHandler(
      commandHandler(ctx.handle, (handler) => this.onCommand(ctx, handler), {
        filters: [privateOnly(), ownerOnly()],
      })
    );
  }

  private async onCommand(ctx: PluginContext, { event, reply }: HandlerContext): Promise<void> {
    const [subcommand, target] = event.args;

    switch (subcommand?.toLowerCase()) {
      case 'plugins': {
        const lines = ctx.describePlugins().map(formatPlugin);
        await reply(lines.length > 0 ? lines.join('\n') : 'No plugins loaded');
        return;
      }
      case 'enable': {
        if (!target) break;
        const enabled = await ctx.enablePlugin(target);
        await reply(
          enabled ? `:white_check_mark: Plugin '${target}' enabled` : `:x: Plugin '${target}' not enabled`
        );
        return;
      }
      case 'disable': {
        if (!target) break;
        if (target.toLowerCase() === this.name) {
          await reply(':x: The admin plugin cannot disable itself');
          return;
        }
        const disabled = await ctx.disablePlugin(target);
        await reply(
          disabled ? `:white_check_mark: Plugin '${target}' disabled` : `:x: Plugin '${target}' not disabled`
        );
        return;
      }
      case 'jobs': {
        const jobs = ctx.getJobs();
        await reply(
          jobs.length > 0 ? jobs.map((job) => `• ${job.name} (runs: ${job.runs})`).join('\n') : 'No scheduled jobs'
        );
        return;
      }
    }

    const usage = await ctx.getUsage();
    await reply(usage ?? `Usage: /${ctx.handle} plugins|enable|disable|jobs`);
  }
}
