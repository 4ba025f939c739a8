/**
 * Plugin System
 *
 * Plugins live in `plugins/<name>/` next to their resources, config and data,
 * and are auto-discovered at startup.
 *
 * Example plugin (`plugins/hello/hello.ts`):
 * ```typescript
 * import { BasePlugin, commandHandler, privateOnly, type PluginContext } from '../../src/plugins/index.js';
 *
 * export default class Hello extends BasePlugin {
 *   setup(ctx: PluginContext) {
 *     ctx.registerHandler(
 *       commandHandler(ctx.handle, async ({ reply }) => {
 *         await reply('Hello from my plugin!');
 *       }, { filters: [privateOnly()] })
 *     );
 *   }
 * }
 * ```
 */

// Types for plugin authors
export type { Plugin, PluginInfo, PluginDirectory } from './types.js';
export { BasePlugin, isValidPlugin, PluginConfigurationError, PLUGIN_NAME_PATTERN } from './types.js';
export { PluginContext } from './context.js';
export type { HostServices, StorageOptions, RemoveMessageOptions } from './context.js';
export { commandHandler, messageHandler, eventHandler } from './handlers.js';
export type { HandlerDefinition, HandlerOptions } from './handlers.js';

// Filters
export { privateOnly, publicOnly, ownerOnly, requireDependencies, rateLimit } from '../middleware/index.js';
export type { Filter, FilterContext } from '../middleware/index.js';

// Transport-facing types handlers work with
export type { ChatEvent, HandlerContext, SentMessage, ConversationType } from '../transport/types.js';
export type { StorageResult, Row } from '../services/storage-gateway.js';
export type { Job } from '../services/scheduler.js';
export type { EndpointHandler } from '../web/server.js';

// Registry and paths for internal use
export { PluginRegistry, SETUP_TIMEOUT_MS, TEARDOWN_TIMEOUT_MS } from './registry.js';
export { discoverPlugins, loadPluginModule } from './loader.js';
export { HostPaths } from './paths.js';
