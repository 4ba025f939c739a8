import { ADMIT, deny, type Filter } from './gate.js';
import { logger } from '../utils/logger.js';

/**
 * Only run while every plugin named in the config's `dependencies` list is
 * active. A missing dependency is reported to the user by name.
 *
 * A `dependencies` value that is not a list is a configuration error: it is
 * logged and the handler still runs. Only an actually missing dependency
 * blocks the call.
 */
export function requireDependencies(): Filter {
  return {
    name: 'dependency',
    stage: 'dependency',
    admit(ctx) {
      const dependencies = ctx.plugin.config.get('dependencies');

      if (!Array.isArray(dependencies)) {
        logger.error(`Dependencies for plugin '${ctx.plugin.name}' not defined as list`, {
          plugin: ctx.plugin.name,
          dependencies,
        });
        return ADMIT;
      }

      const active = new Set(ctx.activePlugins());
      for (const dependency of dependencies) {
        const name = String(dependency);
        if (!active.has(name.toLowerCase())) {
          return deny(`:x: Plugin '${ctx.plugin.name}' is missing dependency '${name}'`);
        }
      }
      return ADMIT;
    },
  };
}
