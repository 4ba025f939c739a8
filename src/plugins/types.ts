import type { PluginContext } from './context.js';

/**
 * Plugin names double as directory, config and database file names
 */
export const PLUGIN_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Plugin interface for extending the bot
 *
 * SECURITY WARNING: Plugins run with full process privileges.
 * Only install plugins from trusted sources.
 *
 * Lifecycle:
 * - `setup(ctx)` acquires resources, creates tables and registers handlers,
 *   endpoints and jobs. The plugin becomes active only if it resolves.
 * - `teardown(ctx)` runs when the plugin is disabled or the process shuts
 *   down, and only if setup had completed. Handlers and endpoints registered
 *   through the context are removed afterwards by the registry.
 */
export interface Plugin {
  /** Unique lowercase identifier */
  readonly name: string;

  /** Optional version string, shown in listings */
  readonly version?: string;

  /**
   * TIMEOUT: Must complete within 10 seconds or the plugin stays inactive.
   */
  setup(ctx: PluginContext): void | Promise<void>;

  /**
   * TIMEOUT: Must complete within 5 seconds.
   */
  teardown?(ctx: PluginContext): void | Promise<void>;
}

/**
 * Convenience base class: the plugin's name is its lowercased class name.
 *
 * ```typescript
 * export default class Weather extends BasePlugin {  // name: "weather"
 *   setup(ctx: PluginContext) { ... }
 * }
 * ```
 *
 * Override `name` to pick a different one.
 */
export abstract class BasePlugin implements Plugin {
  get name(): string {
    return this.constructor.name.toLowerCase();
  }

  abstract setup(ctx: PluginContext): void | Promise<void>;
}

/**
 * Summary of a known plugin, for listings
 */
export interface PluginInfo {
  name: string;
  version?: string;
  handle: string;
  category?: string;
  description?: string;
  active: boolean;
}

/**
 * Registry operations exposed to plugin code through its context
 */
export interface PluginDirectory {
  /** Active plugins in load order */
  list(): Plugin[];
  /** Every known plugin, active or not, in load order */
  describe(): PluginInfo[];
  isActive(name: string): boolean;
  enable(name: string): Promise<boolean>;
  disable(name: string): Promise<boolean>;
}

/**
 * Fatal plugin set-up problem detected while loading, such as two plugins
 * resolving to the same name
 */
export class PluginConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PluginConfigurationError';
  }
}

/**
 * Type guard to validate plugin structure at runtime
 */
export function isValidPlugin(obj: unknown): obj is Plugin {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }

  const plugin = obj as Record<string, unknown>;

  if (typeof plugin.name !== 'string' || !PLUGIN_NAME_PATTERN.test(plugin.name)) {
    return false;
  }

  if (plugin.version !== undefined && typeof plugin.version !== 'string') {
    return false;
  }

  if (typeof plugin.setup !== 'function') {
    return false;
  }

  if (plugin.teardown !== undefined && typeof plugin.teardown !== 'function') {
    return false;
  }

  return true;
}
