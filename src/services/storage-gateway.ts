import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { HostPaths } from '../plugins/paths.js';
import type { AdminNotifier } from './notifier.js';
import { logger, errorMessage } from '../utils/logger.js';

export const DATABASE_DISABLED = 'Database disabled';
export const TABLE_EXISTS_RESOURCE = 'table_exists.sql';
const DB_SUFFIX = '.db';

/**
 * Where a statement runs: the shared global database, or a plugin's own
 * database (optionally a non-default file inside that plugin's data dir)
 */
export type StorageTarget =
  | { scope: 'global' }
  | { scope: 'plugin'; plugin: string; database?: string };

export type Row = Record<string, unknown>;

/**
 * Outcome of a statement. Failures carry the error text instead of rows;
 * nothing is ever thrown past the gateway.
 */
export type StorageResult =
  | { success: true; data: Row[] }
  | { success: false; data: string };

export interface StorageSettings {
  /** database.use_db */
  enabled: boolean;
  /** database.timeout, in seconds */
  timeoutSeconds: number;
}

/**
 * Append the `.db` suffix unless the name already carries it
 */
export function withDatabaseSuffix(name: string): string {
  return name.toLowerCase().endsWith(DB_SUFFIX) ? name : `${name}${DB_SUFFIX}`;
}

/**
 * Storage access for plugins.
 *
 * Each call opens its own connection with a bounded busy timeout, runs one
 * statement and closes the connection on every exit path. Results come back
 * as a {@link StorageResult}; failures are logged and relayed to the admins.
 */
export class StorageGateway {
  constructor(
    private readonly paths: HostPaths,
    private readonly settings: StorageSettings,
    private readonly notifier: AdminNotifier
  ) {}

  /**
   * Physical database file for a target
   */
  resolvePath(target: StorageTarget): string {
    if (target.scope === 'global') {
      return this.paths.globalDatabaseFile();
    }
    const plugin = target.plugin.toLowerCase();
    const file = target.database ? withDatabaseSuffix(target.database) : `${plugin}${DB_SUFFIX}`;
    return path.join(this.paths.dataDir(plugin), file);
  }

  /**
   * Run one parameterized statement and return its rows
   */
  execute(sql: string, params: readonly unknown[] = [], target: StorageTarget): StorageResult {
    if (!this.settings.enabled) {
      return { success: false, data: DATABASE_DISABLED };
    }

    const dbPath = this.resolvePath(target);
    let db: Database.Database | undefined;

    try {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });

      db = new Database(dbPath, { timeout: this.timeoutMs });
      const statement = db.prepare<unknown[], Row>(sql);

      // Writes commit immediately in autocommit mode; only readers yield rows
      if (statement.reader) {
        return { success: true, data: statement.all(...params) };
      }
      statement.run(...params);
      return { success: true, data: [] };
    } catch (error) {
      return { success: false, data: this.report('Statement failed', dbPath, error) };
    } finally {
      db?.close();
    }
  }

  /**
   * Whether `table` exists in the target database. A database file that
   * does not exist is a plain `false`; a failing probe is logged and also
   * reads as `false`.
   */
  tableExists(table: string, target: StorageTarget): boolean {
    const dbPath = this.resolvePath(target);
    if (!fs.existsSync(dbPath)) {
      return false;
    }

    let db: Database.Database | undefined;
    try {
      const probe = fs.readFileSync(
        path.join(this.paths.globalResourceDir(), TABLE_EXISTS_RESOURCE),
        'utf-8'
      );
      db = new Database(dbPath, { fileMustExist: true, timeout: this.timeoutMs });
      return db.prepare(probe).get(table) !== undefined;
    } catch (error) {
      this.report('Table existence probe failed', dbPath, error);
      return false;
    } finally {
      db?.close();
    }
  }

  private get timeoutMs(): number {
    return this.settings.timeoutSeconds * 1000;
  }

  private report(message: string, dbPath: string, error: unknown): string {
    const text = errorMessage(error);
    logger.error(message, { path: dbPath, error: text });
    this.notifier.notify(error);
    return text;
  }
}
