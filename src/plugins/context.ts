import fs from 'fs/promises';
import path from 'path';
import { ConfigStore } from '../config/config-store.js';
import { PluginConfigSchema } from '../config/schema.js';
import { runFilters, type FilterContext } from '../middleware/gate.js';
import type { AdminNotifier } from '../services/notifier.js';
import type { JobQueue, Job, JobCallback, OneShotWhen, JobOptions, RepeatingJobOptions } from '../services/scheduler.js';
import type { StorageGateway, StorageResult, StorageTarget } from '../services/storage-gateway.js';
import type { ChatEvent, ConversationType, Handler, SentMessage, Transport } from '../transport/types.js';
import type { EndpointHandler, EndpointRegistrar } from '../web/server.js';
import { normalizeEndpointPath } from '../web/server.js';
import type { HandlerDefinition } from './handlers.js';
import type { HostPaths } from './paths.js';
import type { Plugin, PluginDirectory, PluginInfo } from './types.js';
import { runDetached, type DetachedTask } from '../utils/detached.js';
import { auditLog, logger, errorMessage } from '../utils/logger.js';

/**
 * Shared services every plugin context draws on
 */
export interface HostServices {
  paths: HostPaths;
  /** Global config document, read-only for plugins */
  globalConfig: ConfigStore;
  /** admin.ids */
  adminIds: readonly string[];
  storage: StorageGateway;
  jobs: JobQueue;
  notifier: AdminNotifier;
  transport: Transport;
  /** Absent when web.use_web is off */
  web?: EndpointRegistrar;
}

/**
 * Selects another plugin's storage, or a non-default database file
 */
export interface StorageOptions {
  plugin?: string;
  database?: string;
}

export interface RemoveMessageOptions {
  /** Remove when posted in a direct conversation (default true) */
  inDirect?: boolean;
  /** Remove when posted anywhere else (default true) */
  inGroup?: boolean;
}

interface RegisteredHandler {
  handler: Handler;
  group: number;
}

/**
 * Everything a plugin reaches the host through.
 *
 * Created by the registry before `setup()`; the plugin's config document is
 * created on construction if it does not exist yet. Handlers and endpoints
 * registered here are tracked so the registry can remove them on disable.
 */
export class PluginContext {
  readonly config: ConfigStore;
  private readonly registeredHandlers: RegisteredHandler[] = [];
  private readonly registeredEndpoints = new Map<string, EndpointHandler>();
  private accepting = true;

  constructor(
    readonly name: string,
    private readonly services: HostServices,
    private readonly directory: PluginDirectory
  ) {
    this.config = ConfigStore.openOrCreate(services.paths.pluginConfigFile(name));

    const check = PluginConfigSchema.safeParse(this.config.snapshot());
    if (!check.success) {
      logger.warn('Plugin config has invalid values', {
        plugin: name,
        errors: check.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Identity and config
  // ---------------------------------------------------------------------------

  get globalConfig(): ConfigStore {
    return this.services.globalConfig;
  }

  /** Command that triggers the plugin: config `handle`, else the name */
  get handle(): string {
    const handle = this.config.get('handle');
    return typeof handle === 'string' && handle.length > 0 ? handle.toLowerCase() : this.name;
  }

  get category(): string | undefined {
    const category = this.config.get('category');
    return typeof category === 'string' ? category : undefined;
  }

  get description(): string | undefined {
    const description = this.config.get('description');
    return typeof description === 'string' ? description : undefined;
  }

  // ---------------------------------------------------------------------------
  // Handlers and endpoints
  // ---------------------------------------------------------------------------

  /** Registered handlers in registration order */
  get handlers(): readonly Handler[] {
    return this.registeredHandlers.map(({ handler }) => handler);
  }

  get endpoints(): ReadonlyMap<string, EndpointHandler> {
    return this.registeredEndpoints;
  }

  /**
   * Register an event handler in a dispatch group (lower groups first).
   * Its filters run before its callback on every invocation.
   */
  registerHandler(definition: HandlerDefinition, group = 0): Handler {
    this.assertAccepting(`handler '${definition.label}'`);
    const handler: Handler = {
      label: `${this.name}:${definition.label}`,
      runAsync: definition.runAsync,
      matches: (event) => definition.matches(event),
      invoke: async (ctx) => {
        const admitted = await runFilters(definition.filters, this.filterContext(ctx.event), (text) => ctx.reply(text));
        if (!admitted) return;

        if (ctx.event.kind === 'command') {
          auditLog({
            plugin: this.name,
            userId: ctx.event.userId,
            userName: ctx.event.userName,
            channelId: ctx.event.channelId,
            command: `/${ctx.event.command ?? ''}`,
            args: ctx.event.text,
          });
        }
        await definition.callback(ctx);
      },
    };

    this.services.transport.addHandler(handler, group);
    this.registeredHandlers.push({ handler, group });
    logger.info(`Plugin '${this.name}': handler added`, { handler: handler.label, group });
    return handler;
  }

  /**
   * Expose a web endpoint. The path is normalized to begin with `/`.
   */
  registerEndpoint(endpointPath: string, handler: EndpointHandler): void {
    const normalized = normalizeEndpointPath(endpointPath);
    this.assertAccepting(`endpoint '${normalized}'`);

    if (this.services.web) {
      this.services.web.addEndpoint(normalized, handler);
    } else {
      logger.warn(`Plugin '${this.name}': web server disabled, endpoint not exposed`, { path: normalized });
    }
    this.registeredEndpoints.set(normalized, handler);
    logger.info(`Plugin '${this.name}': endpoint '${normalized}' added`);
  }

  /**
   * Whether handlers and endpoints may be registered right now
   */
  get acceptingRegistrations(): boolean {
    return this.accepting;
  }

  /**
   * Allow registrations again; the registry calls this before every setup
   */
  openRegistrations(): void {
    this.accepting = true;
  }

  /**
   * Refuse further registrations and remove every existing one. A setup that
   * outlives its timeout can no longer attach handlers afterwards.
   */
  closeRegistrations(): void {
    this.accepting = false;
    this.deregisterAll();
  }

  private assertAccepting(what: string): void {
    if (this.accepting) return;
    logger.warn(`Plugin '${this.name}': registration refused while inactive`, { registration: what });
    throw new Error(`Plugin '${this.name}' is not accepting registrations`);
  }

  /**
   * Remove every handler and endpoint this context registered
   */
  deregisterAll(): void {
    for (const { handler } of this.registeredHandlers) {
      this.services.transport.removeHandler(handler);
    }
    for (const endpointPath of this.registeredEndpoints.keys()) {
      this.services.web?.removeEndpoint(endpointPath);
    }

    if (this.registeredHandlers.length > 0 || this.registeredEndpoints.size > 0) {
      logger.debug(`Plugin '${this.name}': registrations removed`, {
        handlers: this.registeredHandlers.length,
        endpoints: this.registeredEndpoints.size,
      });
    }
    this.registeredHandlers.length = 0;
    this.registeredEndpoints.clear();
  }

  private filterContext(event: ChatEvent): FilterContext {
    let conversationType: Promise<ConversationType> | undefined;
    return {
      event,
      plugin: { name: this.name, config: this.config },
      adminIds: this.services.adminIds,
      activePlugins: () => this.directory.list().map((plugin) => plugin.name),
      conversationType: () => {
        conversationType ??= event.conversationType
          ? Promise.resolve(event.conversationType)
          : this.services.transport.getConversationType(event.channelId);
        return conversationType;
      },
      botName: this.services.transport.botName,
    };
  }

  // ---------------------------------------------------------------------------
  // Paths and resources
  // ---------------------------------------------------------------------------

  pluginDir(plugin: string = this.name): string {
    return this.services.paths.pluginDir(plugin.toLowerCase());
  }

  resourceDir(plugin: string = this.name): string {
    return this.services.paths.resourceDir(plugin.toLowerCase());
  }

  configDir(plugin: string = this.name): string {
    return this.services.paths.configDir(plugin.toLowerCase());
  }

  dataDir(plugin: string = this.name): string {
    return this.services.paths.dataDir(plugin.toLowerCase());
  }

  /**
   * Content of a file in a plugin's resource directory (default: own),
   * or `undefined` if it cannot be read
   */
  async getResource(filename: string, plugin?: string): Promise<string | undefined> {
    return this.readText(path.join(this.resourceDir(plugin), filename));
  }

  /**
   * Content of a file in the global resource directory
   */
  async getGlobalResource(filename: string): Promise<string | undefined> {
    return this.readText(path.join(this.services.paths.globalResourceDir(), filename));
  }

  /**
   * Usage text from `<name>.md` with `{{handle}}` and every given
   * placeholder substituted
   * @example ctx.getUsage({ '{{limit}}': 5 })
   */
  async getUsage(replacements: Record<string, unknown> = {}): Promise<string | undefined> {
    const usage = await this.getResource(`${this.name}.md`);
    if (usage === undefined) return undefined;

    let text = usage.replaceAll('{{handle}}', this.handle);
    for (const [placeholder, value] of Object.entries(replacements)) {
      text = text.replaceAll(placeholder, String(value));
    }
    return text;
  }

  private async readText(filePath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      logger.error('Failed to read resource', { plugin: this.name, path: filePath, error: errorMessage(error) });
      this.notify(error);
      return undefined;
    }
  }

  // ---------------------------------------------------------------------------
  // Storage
  // ---------------------------------------------------------------------------

  /**
   * Run a statement on this plugin's database, or on another plugin's
   */
  execute(sql: string, params: readonly unknown[] = [], options: StorageOptions = {}): StorageResult {
    return this.services.storage.execute(sql, params, this.storageTarget(options));
  }

  executeGlobal(sql: string, params: readonly unknown[] = []): StorageResult {
    return this.services.storage.execute(sql, params, { scope: 'global' });
  }

  tableExists(table: string, options: StorageOptions = {}): boolean {
    return this.services.storage.tableExists(table, this.storageTarget(options));
  }

  globalTableExists(table: string): boolean {
    return this.services.storage.tableExists(table, { scope: 'global' });
  }

  private storageTarget(options: StorageOptions): StorageTarget {
    return {
      scope: 'plugin',
      plugin: (options.plugin ?? this.name).toLowerCase(),
      database: options.database,
    };
  }

  // ---------------------------------------------------------------------------
  // Jobs
  // ---------------------------------------------------------------------------

  /**
   * Run `callback` once at `when` (a Date, or seconds from now).
   * The job is named after the plugin unless `options.name` is given.
   */
  runOnce(callback: JobCallback, when: OneShotWhen, options: JobOptions = {}): Job {
    return this.services.jobs.runOnce(callback, when, { ...options, name: options.name || this.name });
  }

  /**
   * Run `callback` every `intervalSeconds`, first after `options.first` seconds.
   * The job is named after the plugin unless `options.name` is given.
   */
  runRepeating(callback: JobCallback, intervalSeconds: number, options: RepeatingJobOptions = {}): Job {
    return this.services.jobs.runRepeating(callback, intervalSeconds, {
      ...options,
      name: options.name || this.name,
    });
  }

  /**
   * Jobs with the given name, or every scheduled job
   */
  getJobs(name?: string): Job[] {
    return name ? this.services.jobs.getJobsByName(name) : this.services.jobs.jobs();
  }

  /**
   * Delete a message the bot posted after a delay, depending on where it was
   * posted
   */
  async removeMessage(
    message: SentMessage,
    afterSeconds: number,
    options: RemoveMessageOptions = {}
  ): Promise<Job | undefined> {
    let type: ConversationType;
    try {
      type = await this.services.transport.getConversationType(message.channelId);
    } catch (error) {
      logger.error('Not possible to look up conversation type', {
        plugin: this.name,
        channelId: message.channelId,
        error: errorMessage(error),
      });
      return undefined;
    }

    const remove = type === 'direct' ? (options.inDirect ?? true) : (options.inGroup ?? true);
    if (!remove) return undefined;

    const transport = this.services.transport;
    return this.runOnce(
      async () => {
        try {
          await transport.deleteMessage(message.channelId, message.messageId);
        } catch (error) {
          logger.error('Not possible to remove message', {
            plugin: this.name,
            channelId: message.channelId,
            messageId: message.messageId,
            error: errorMessage(error),
          });
        }
      },
      afterSeconds,
      { context: message }
    );
  }

  // ---------------------------------------------------------------------------
  // Registry, notification, background work
  // ---------------------------------------------------------------------------

  /** Active plugins in load order */
  plugins(): Plugin[] {
    return this.directory.list();
  }

  /** Every known plugin with its handle, metadata and state */
  describePlugins(): PluginInfo[] {
    return this.directory.describe();
  }

  pluginAvailable(name: string): boolean {
    return this.directory.isActive(name.toLowerCase());
  }

  enablePlugin(name: string): Promise<boolean> {
    return this.directory.enable(name.toLowerCase());
  }

  disablePlugin(name: string): Promise<boolean> {
    return this.directory.disable(name.toLowerCase());
  }

  /**
   * Relay something to the admins; returns `payload` unchanged
   */
  notify<T>(payload: T): T {
    return this.services.notifier.notify(payload);
  }

  /**
   * Fire-and-forget escape hatch for non-critical background work.
   * No join and no propagated failure; failures are only logged.
   */
  runDetached(task: DetachedTask): void {
    runDetached(task, `${this.name}:detached`);
  }
}
