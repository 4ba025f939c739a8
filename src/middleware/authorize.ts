import { ADMIT, deny, type Filter } from './gate.js';
import { logger } from '../utils/logger.js';

/**
 * Only run in a direct conversation with the bot.
 * Bypassed when the plugin config sets `"private": false`.
 */
export function privateOnly(): Filter {
  return {
    name: 'private',
    stage: 'visibility',
    async admit(ctx) {
      if (ctx.plugin.config.get('private') === false) {
        return ADMIT;
      }
      if ((await ctx.conversationType()) === 'direct') {
        return ADMIT;
      }
      return deny(`:information_source: Only allowed to execute in a private chat with @${ctx.botName}`);
    },
  };
}

/**
 * Only run outside direct conversations.
 * Bypassed when the plugin config sets `"public": false`.
 */
export function publicOnly(): Filter {
  return {
    name: 'public',
    stage: 'visibility',
    async admit(ctx) {
      if (ctx.plugin.config.get('public') === false) {
        return ADMIT;
      }
      if ((await ctx.conversationType()) !== 'direct') {
        return ADMIT;
      }
      return deny(':information_source: Only allowed to execute in a public chat');
    },
  };
}

/**
 * Only run for admins: users in the global `admin.ids` or in the plugin's own
 * `admins` list. Bypassed when the plugin config sets `"owner": false`.
 *
 * Rejection is silent. Nothing is replied, so non-admins cannot tell the
 * command exists; the attempt is logged instead.
 */
export function ownerOnly(): Filter {
  return {
    name: 'owner',
    stage: 'ownership',
    admit(ctx) {
      if (ctx.plugin.config.get('owner') === false) {
        return ADMIT;
      }

      const userId = ctx.event.userId;
      if (ctx.adminIds.includes(userId)) {
        return ADMIT;
      }

      const pluginAdmins = ctx.plugin.config.get('admins');
      if (Array.isArray(pluginAdmins) && pluginAdmins.some((id) => String(id) === userId)) {
        return ADMIT;
      }

      logger.warn('Unauthorized user attempted owner-only command', {
        plugin: ctx.plugin.name,
        userId,
        userName: ctx.event.userName,
        channelId: ctx.event.channelId,
        command: ctx.event.command,
        args: ctx.event.text,
      });
      return deny();
    },
  };
}
