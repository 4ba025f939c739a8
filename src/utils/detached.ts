import { logger, errorMessage } from './logger.js';

export type DetachedTask = () => unknown;

/**
 * Run a task on the next turn of the event loop and forget about it.
 *
 * There is no join and no propagated failure: a task that throws or rejects
 * is only logged. Use it for non-critical background work that must not hold
 * up event dispatch, never for work whose outcome matters to the caller.
 *
 * @param task - Work to run
 * @param label - Name used in the failure log entry
 */
export function runDetached(task: DetachedTask, label = 'detached task'): void {
  setImmediate(() => {
    Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        logger.error('Detached task failed', { task: label, error: errorMessage(error) });
      });
  });
}
