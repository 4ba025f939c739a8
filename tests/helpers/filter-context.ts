import { ConfigStore } from '../../src/config/config-store.js';
import type { FilterContext } from '../../src/middleware/gate.js';
import type { ChatEvent } from '../../src/transport/types.js';
import { command } from './fake-transport.js';

export interface FilterContextOptions {
  plugin?: string;
  config?: Record<string, unknown>;
  event?: Partial<ChatEvent>;
  adminIds?: string[];
  active?: string[];
}

/**
 * Filter context for a command sent from a public channel unless the event
 * says otherwise
 */
export function filterContext(options: FilterContextOptions = {}): FilterContext {
  const name = options.plugin ?? 'weather';
  const event = command(name, '', options.event);
  return {
    event,
    plugin: { name, config: new ConfigStore(`${name}.json`, options.config ?? {}) },
    adminIds: options.adminIds ?? [],
    activePlugins: () => options.active ?? [],
    conversationType: () =>
      Promise.resolve(event.conversationType ?? (event.channelId.startsWith('D') ? 'direct' : 'group')),
    botName: 'testbot',
  };
}
