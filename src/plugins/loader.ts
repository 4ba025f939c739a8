import { readdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { createJiti } from 'jiti';
import type { Plugin } from './types.js';
import { isValidPlugin } from './types.js';
import { logger, errorMessage } from '../utils/logger.js';

/**
 * Create a jiti instance for dynamic TypeScript imports
 * This allows plugins to be written in TypeScript without pre-compilation
 */
const jiti = createJiti(import.meta.url, {
  interopDefault: true,
});

const ENTRY_EXTENSIONS = ['.ts', '.js'];

/**
 * Find the entry file of a plugin directory: `<dir>/<dir>.ts|js`, else
 * `<dir>/index.ts|js`
 */
function findEntry(dir: string, name: string): string | undefined {
  for (const base of [name, 'index']) {
    for (const ext of ENTRY_EXTENSIONS) {
      const candidate = join(dir, `${base}${ext}`);
      if (existsSync(candidate)) return candidate;
    }
  }
  return undefined;
}

/**
 * Discover plugin entry files under the plugins root, one per plugin
 * directory, sorted by directory name
 * @returns Array of absolute file paths
 */
export async function discoverPlugins(pluginsRoot: string): Promise<string[]> {
  if (!existsSync(pluginsRoot)) {
    logger.debug('No plugins directory found, skipping plugin discovery', { dir: pluginsRoot });
    return [];
  }

  try {
    const entries = await readdir(pluginsRoot, { withFileTypes: true });
    const pluginFiles = entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort()
      .flatMap((name) => {
        const entry = findEntry(join(pluginsRoot, name), name);
        return entry ? [entry] : [];
      });

    logger.debug('Discovered plugin files', { count: pluginFiles.length, files: pluginFiles });
    return pluginFiles;
  } catch (error) {
    logger.error('Failed to read plugins directory', { dir: pluginsRoot, error: errorMessage(error) });
    return [];
  }
}

/**
 * Import a plugin module and build its plugin.
 *
 * The default export may be a plugin object or a class, which is
 * constructed once without arguments.
 *
 * @returns Plugin instance or null if loading failed
 */
export async function loadPluginModule(filePath: string): Promise<Plugin | null> {
  try {
    let exported: unknown;

    if (filePath.endsWith('.ts')) {
      // jiti.import with { default: true } returns the default export directly
      exported = await jiti.import(filePath, { default: true });
    } else {
      const module = (await import(pathToFileURL(filePath).href)) as { default?: unknown };
      exported = module.default;
    }

    if (!exported) {
      logger.warn('Plugin has no default export', { file: filePath });
      return null;
    }

    const candidate: unknown = typeof exported === 'function' ? Reflect.construct(exported, []) : exported;

    if (!isValidPlugin(candidate)) {
      logger.warn('Plugin has invalid structure', { file: filePath });
      return null;
    }

    return candidate;
  } catch (error) {
    logger.error('Failed to load plugin', { file: filePath, error: errorMessage(error) });
    return null;
  }
}
