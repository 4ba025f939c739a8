import type { ConfigStore } from '../config/config-store.js';
import type { ChatEvent, ConversationType } from '../transport/types.js';
import { logger, errorMessage } from '../utils/logger.js';

/**
 * Filters run in this order, whatever order they were attached in
 */
export const FILTER_STAGES = ['visibility', 'ownership', 'dependency', 'courtesy'] as const;

export type FilterStage = (typeof FILTER_STAGES)[number];

/**
 * What a filter can see about the invocation
 */
export interface FilterContext {
  event: ChatEvent;
  plugin: {
    name: string;
    config: ConfigStore;
  };
  /** admin.ids from the global config */
  adminIds: readonly string[];
  /** Names of the currently active plugins */
  activePlugins(): readonly string[];
  conversationType(): Promise<ConversationType>;
  botName: string;
}

export type FilterDecision = { admitted: true } | { admitted: false; notice?: string };

/**
 * Admission check attached to a handler. A denial may carry a notice that is
 * replied to the user; a denial without one is silent.
 */
export interface Filter {
  readonly name: string;
  readonly stage: FilterStage;
  admit(ctx: FilterContext): FilterDecision | Promise<FilterDecision>;
}

export const ADMIT: FilterDecision = { admitted: true };

export function deny(notice?: string): FilterDecision {
  return notice === undefined ? { admitted: false } : { admitted: false, notice };
}

/**
 * Stable sort by stage; filters of the same stage keep their attach order
 */
export function orderFilters(filters: readonly Filter[]): Filter[] {
  return filters
    .map((filter, index) => ({ filter, index }))
    .sort(
      (a, b) =>
        FILTER_STAGES.indexOf(a.filter.stage) - FILTER_STAGES.indexOf(b.filter.stage) || a.index - b.index
    )
    .map(({ filter }) => filter);
}

/**
 * Evaluate filters in stage order, stopping at the first denial.
 *
 * @param reply - Posts a denial notice back to the user
 * @returns whether the handler may run
 */
export async function runFilters(
  filters: readonly Filter[],
  ctx: FilterContext,
  reply: (text: string) => Promise<unknown>
): Promise<boolean> {
  for (const filter of orderFilters(filters)) {
    const decision = await filter.admit(ctx);
    if (decision.admitted) continue;

    logger.debug('Handler denied by filter', {
      plugin: ctx.plugin.name,
      filter: filter.name,
      userId: ctx.event.userId,
      channelId: ctx.event.channelId,
    });

    if (decision.notice !== undefined) {
      try {
        await reply(decision.notice);
      } catch (error) {
        logger.warn('Failed to send denial notice', {
          plugin: ctx.plugin.name,
          filter: filter.name,
          error: errorMessage(error),
        });
      }
    }
    return false;
  }
  return true;
}
