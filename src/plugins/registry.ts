import { PluginContext, type HostServices } from './context.js';
import { discoverPlugins, loadPluginModule } from './loader.js';
import { PluginConfigurationError, type Plugin, type PluginDirectory, type PluginInfo } from './types.js';
import { withTimeout } from '../utils/timeout.js';
import { logger, errorMessage } from '../utils/logger.js';

/**
 * Lifecycle timeouts (in milliseconds)
 */
export const SETUP_TIMEOUT_MS = 10_000;
export const TEARDOWN_TIMEOUT_MS = 5_000;

interface PluginEntry {
  plugin: Plugin;
  context: PluginContext;
  /** setup() completed and teardown() has not run since */
  active: boolean;
}

/**
 * Owns every loaded plugin and its lifecycle.
 *
 * Plugins are kept in load order. A plugin becomes active only when its
 * setup completes; a failing plugin is logged, reported and left inactive
 * without affecting the others. Every mutation runs under one async lock,
 * since enable/disable can be triggered from a handler while other plugins
 * are being dispatched.
 */
export class PluginRegistry implements PluginDirectory {
  private readonly entries = new Map<string, PluginEntry>();
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly services: HostServices) {}

  /**
   * Discover plugin modules under `<root>/plugins`, then load them
   * @throws PluginConfigurationError on duplicate plugin names
   */
  async load(): Promise<void> {
    const files = await discoverPlugins(this.services.paths.pluginsRoot);
    const plugins: Plugin[] = [];

    for (const file of files) {
      const plugin = await loadPluginModule(file);
      if (plugin) plugins.push(plugin);
    }

    await this.loadPlugins(plugins);
  }

  /**
   * Add plugins and run their setup, in the given order
   * @throws PluginConfigurationError on duplicate plugin names, before any setup runs
   */
  async loadPlugins(plugins: readonly Plugin[]): Promise<void> {
    await this.withLock(async () => {
      const seen = new Set(this.entries.keys());
      for (const plugin of plugins) {
        if (seen.has(plugin.name)) {
          throw new PluginConfigurationError(`Duplicate plugin name '${plugin.name}'`);
        }
        seen.add(plugin.name);
      }

      if (plugins.length > 0) {
        logger.info('Loading plugins', { count: plugins.length });
      }

      for (const plugin of plugins) {
        let context: PluginContext;
        try {
          context = new PluginContext(plugin.name, this.services, this);
        } catch (error) {
          logger.error('Failed to create plugin context', { name: plugin.name, error: errorMessage(error) });
          this.services.notifier.notify(error);
          continue;
        }
        const entry: PluginEntry = { plugin, context, active: false };
        this.entries.set(plugin.name, entry);
        await this.setup(entry);
      }

      logger.info('Plugin loading complete', { active: this.list().length, known: this.entries.size });
    });
  }

  /**
   * Run setup for a known, inactive plugin
   * @returns whether the plugin is now active after being inactive
   */
  async enable(name: string): Promise<boolean> {
    return this.withLock(async () => {
      const entry = this.entries.get(name);
      if (!entry || entry.active) return false;
      return this.setup(entry);
    });
  }

  /**
   * Tear down an active plugin and remove its handlers and endpoints
   * @returns whether an active plugin was disabled
   */
  async disable(name: string): Promise<boolean> {
    return this.withLock(async () => {
      const entry = this.entries.get(name);
      if (!entry || !entry.active) return false;
      await this.teardown(entry);
      return true;
    });
  }

  /**
   * Tear down every active plugin, in reverse load order
   */
  async shutdown(): Promise<void> {
    await this.withLock(async () => {
      const active = Array.from(this.entries.values()).filter((entry) => entry.active);
      logger.debug('Shutting down plugins', { count: active.length });
      for (const entry of active.reverse()) {
        await this.teardown(entry);
      }
    });
  }

  /** Active plugins in load order */
  list(): Plugin[] {
    return Array.from(this.entries.values())
      .filter((entry) => entry.active)
      .map((entry) => entry.plugin);
  }

  describe(): PluginInfo[] {
    return Array.from(this.entries.values()).map(({ plugin, context, active }) => ({
      name: plugin.name,
      version: plugin.version,
      handle: context.handle,
      category: context.category,
      description: context.description,
      active,
    }));
  }

  isActive(name: string): boolean {
    return this.entries.get(name)?.active ?? false;
  }

  get(name: string): Plugin | undefined {
    return this.entries.get(name)?.plugin;
  }

  /**
   * Context of a known plugin (for diagnostics and tests)
   */
  contextOf(name: string): PluginContext | undefined {
    return this.entries.get(name)?.context;
  }

  private async setup(entry: PluginEntry): Promise<boolean> {
    const { plugin, context } = entry;
    context.openRegistrations();
    try {
      await withTimeout(
        Promise.resolve().then(() => plugin.setup(context)),
        SETUP_TIMEOUT_MS,
        `Plugin "${plugin.name}" setup()`
      );
      entry.active = true;
      logger.info('Plugin loaded successfully', {
        name: plugin.name,
        version: plugin.version,
        handlers: context.handlers.length,
        endpoints: context.endpoints.size,
      });
      return true;
    } catch (error) {
      // Remove whatever was registered before the failure, and anything a
      // timed-out setup would still register
      context.closeRegistrations();
      logger.error('Failed to set up plugin', { name: plugin.name, error: errorMessage(error) });
      this.services.notifier.notify(`Plugin '${plugin.name}' failed to set up: ${errorMessage(error)}`);
      return false;
    }
  }

  private async teardown(entry: PluginEntry): Promise<void> {
    const { plugin, context } = entry;
    entry.active = false;

    if (plugin.teardown) {
      const teardown = plugin.teardown.bind(plugin);
      try {
        await withTimeout(
          Promise.resolve().then(() => teardown(context)),
          TEARDOWN_TIMEOUT_MS,
          `Plugin "${plugin.name}" teardown()`
        );
      } catch (error) {
        logger.error('Failed to tear down plugin', { name: plugin.name, error: errorMessage(error) });
        this.services.notifier.notify(error);
      }
    }

    context.closeRegistrations();
    logger.info('Plugin disabled', { name: plugin.name });
  }

  /**
   * Run an async function under the registry lock to prevent concurrent mutations
   */
  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const acquired = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.lock;
    this.lock = acquired;
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
