import fs from 'fs';
import path from 'path';
import type { ZodError } from 'zod';
import { ConfigStore } from './config-store.js';
import {
  GlobalConfigSchema,
  SlackCredentialsSchema,
  type GlobalConfig,
  type SlackCredentials,
} from './schema.js';

/**
 * Fully loaded process configuration
 */
export interface AppConfig {
  /** Project root holding config/, resources/, data/ and plugins/ */
  root: string;
  /** Validated global settings used by the framework itself */
  global: GlobalConfig;
  /** Key-path lookup over the same global document, handed to plugins */
  store: ConfigStore;
  slack: SlackCredentials;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function formatZodError(error: ZodError): string {
  return error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

/**
 * Validate a parsed global document
 * @throws Error listing every invalid key
 */
export function parseGlobalConfig(raw: unknown): GlobalConfig {
  const result = GlobalConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Read Slack credentials from the environment and check that the tokens the
 * selected receiver needs are present
 */
export function parseSlackCredentials(env: NodeJS.ProcessEnv, useWebhook: boolean): SlackCredentials {
  const result = SlackCredentialsSchema.safeParse({
    botToken: env.SLACK_BOT_TOKEN ?? '',
    appToken: env.SLACK_APP_TOKEN || undefined,
    signingSecret: env.SLACK_SIGNING_SECRET || undefined,
  });

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${formatZodError(result.error)}`);
  }

  if (useWebhook && !result.data.signingSecret) {
    throw new Error('Webhook mode requires SLACK_SIGNING_SECRET to be set');
  }
  if (!useWebhook && !result.data.appToken) {
    throw new Error('Socket Mode requires SLACK_APP_TOKEN to be set');
  }

  return result.data;
}

/**
 * Load and validate configuration.
 *
 * The global document is read from CONFIG_PATH (default config/config.json
 * under the project root); the project root is PLUGIN_ROOT or the working
 * directory.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const root = path.resolve(options.cwd ?? process.cwd(), env.PLUGIN_ROOT ?? '.');
  const configPath = path.resolve(root, env.CONFIG_PATH ?? path.join('config', 'config.json'));

  if (!fs.existsSync(configPath)) {
    throw new Error(`Global config not found at '${configPath}'. Copy config/config.example.json to get started.`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Global config at '${configPath}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const global = parseGlobalConfig(raw);
  const slack = parseSlackCredentials(env, global.webhook.use_webhook);

  return {
    root,
    global,
    // Plugins read their own copy; nothing they change reaches the validated config
    store: new ConfigStore(configPath, structuredClone(global)),
    slack,
  };
}

export { ConfigStore } from './config-store.js';
export type { GlobalConfig, PluginConfig, SlackCredentials } from './schema.js';
