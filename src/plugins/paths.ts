import path from 'path';

export const PLUGINS_DIR = 'plugins';
export const RESOURCES_DIR = 'resources';
export const CONFIG_DIR = 'config';
export const DATA_DIR = 'data';

export const GLOBAL_CONFIG_FILE = 'config.json';
export const GLOBAL_DATABASE_FILE = 'global.db';

/**
 * Filesystem layout of a plugin host:
 *
 * ```
 * <root>/config/config.json          global config
 * <root>/resources/                  global resources (table_exists.sql)
 * <root>/data/global.db              global storage
 * <root>/plugins/<name>/             plugin module
 * <root>/plugins/<name>/resources/   usage text, SQL scripts
 * <root>/plugins/<name>/config/      <name>.json
 * <root>/plugins/<name>/data/        <name>.db
 * ```
 *
 * Every method is a pure function of the root and its arguments.
 */
export class HostPaths {
  readonly root: string;

  constructor(root: string = process.cwd()) {
    this.root = path.resolve(root);
  }

  get pluginsRoot(): string {
    return path.join(this.root, PLUGINS_DIR);
  }

  pluginDir(plugin: string): string {
    return path.join(this.pluginsRoot, plugin);
  }

  resourceDir(plugin: string): string {
    return path.join(this.pluginDir(plugin), RESOURCES_DIR);
  }

  configDir(plugin: string): string {
    return path.join(this.pluginDir(plugin), CONFIG_DIR);
  }

  dataDir(plugin: string): string {
    return path.join(this.pluginDir(plugin), DATA_DIR);
  }

  pluginConfigFile(plugin: string): string {
    return path.join(this.configDir(plugin), `${plugin}.json`);
  }

  globalResourceDir(): string {
    return path.join(this.root, RESOURCES_DIR);
  }

  globalConfigFile(): string {
    return path.join(this.root, CONFIG_DIR, GLOBAL_CONFIG_FILE);
  }

  globalDatabaseFile(): string {
    return path.join(this.root, DATA_DIR, GLOBAL_DATABASE_FILE);
  }
}
