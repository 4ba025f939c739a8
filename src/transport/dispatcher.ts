import type { ChatEvent, Handler, HandlerContext } from './types.js';
import { runDetached } from '../utils/detached.js';
import { logger, errorMessage } from '../utils/logger.js';

export type HandlerErrorReporter = (error: unknown, handler: Handler) => void;

/**
 * Routes inbound events to registered handlers.
 *
 * Handlers are kept per group. Groups are visited in ascending order and in
 * each group the first handler that matches the event runs; within a group,
 * registration order decides. A failing handler is logged and reported and
 * dispatch moves on to the next group.
 */
export class Dispatcher {
  private readonly groups = new Map<number, Handler[]>();

  constructor(private readonly reportError?: HandlerErrorReporter) {}

  addHandler(handler: Handler, group = 0): void {
    if (!Number.isInteger(group)) {
      throw new Error(`Handler group must be an integer, got ${String(group)}`);
    }
    const handlers = this.groups.get(group) ?? [];
    handlers.push(handler);
    this.groups.set(group, handlers);
    logger.debug('Handler added', { handler: handler.label, group });
  }

  removeHandler(handler: Handler): boolean {
    for (const [group, handlers] of this.groups) {
      const index = handlers.indexOf(handler);
      if (index !== -1) {
        handlers.splice(index, 1);
        if (handlers.length === 0) {
          this.groups.delete(group);
        }
        logger.debug('Handler removed', { handler: handler.label, group });
        return true;
      }
    }
    return false;
  }

  /**
   * Number of handlers currently registered
   */
  get size(): number {
    let count = 0;
    for (const handlers of this.groups.values()) {
      count += handlers.length;
    }
    return count;
  }

  /**
   * Dispatch an event. Resolves once every synchronous handler has finished;
   * asynchronous handlers are only started.
   */
  async dispatch(event: ChatEvent, ctx: HandlerContext): Promise<void> {
    const groupIds = Array.from(this.groups.keys()).sort((a, b) => a - b);

    for (const group of groupIds) {
      const handler = this.groups.get(group)?.find((candidate) => candidate.matches(event));
      if (!handler) continue;

      if (handler.runAsync) {
        runDetached(() => this.invoke(handler, ctx), handler.label);
      } else {
        await this.invoke(handler, ctx);
      }
    }
  }

  private async invoke(handler: Handler, ctx: HandlerContext): Promise<void> {
    try {
      await handler.invoke(ctx);
    } catch (error) {
      logger.error('Handler failed', {
        handler: handler.label,
        userId: ctx.event.userId,
        channelId: ctx.event.channelId,
        error: errorMessage(error),
      });
      this.reportError?.(error, handler);
    }
  }
}
