import { z } from 'zod';

/**
 * Slack user ID format: U or W followed by alphanumeric characters
 */
export const SlackUserIdSchema = z.string().regex(/^[UW][A-Z0-9]+$/, 'Invalid Slack user ID format');

/**
 * Global configuration document (config/config.json)
 *
 * Unknown top-level keys are kept so plugins can read their own global
 * settings through the config store.
 */
export const GlobalConfigSchema = z
  .object({
    admin: z
      .object({
        /** Slack user IDs with owner rights on every plugin */
        ids: z.array(SlackUserIdSchema).default([]),
        /** Relay internal failures to every admin */
        notify_on_error: z.boolean().default(false),
      })
      .default({}),

    database: z
      .object({
        /** Master switch for all plugin and global storage */
        use_db: z.boolean().default(true),
        /** Busy timeout per connection, in seconds */
        timeout: z.number().positive().default(5),
      })
      .default({}),

    web: z
      .object({
        use_web: z.boolean().default(false),
        port: z.number().int().min(0).max(65535).default(5000),
        /** Shared secret required on plugin endpoints when set */
        password: z.string().min(1).optional(),
      })
      .default({}),

    webhook: z
      .object({
        /** Receive events over HTTP instead of Socket Mode */
        use_webhook: z.boolean().default(false),
        port: z.number().int().min(0).max(65535).default(3000),
      })
      .default({}),
  })
  .passthrough();

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

/**
 * Slack credentials, read from the environment
 */
export const SlackCredentialsSchema = z.object({
  /** Bot User OAuth Token (xoxb-...) */
  botToken: z.string().startsWith('xoxb-', 'Bot token must start with xoxb-'),
  /** App-Level Token for Socket Mode (xapp-...) */
  appToken: z.string().startsWith('xapp-', 'App token must start with xapp-').optional(),
  /** Signing secret for the HTTP receiver */
  signingSecret: z.string().min(1).optional(),
});

export type SlackCredentials = z.infer<typeof SlackCredentialsSchema>;

/**
 * Recognized keys of a per-plugin configuration document.
 *
 * `dependencies` is deliberately absent: a malformed list must still reach the
 * dependency filter, which logs it and lets the handler run.
 */
export const PluginConfigSchema = z
  .object({
    handle: z.string().regex(/^[a-zA-Z][a-zA-Z0-9_-]*$/, 'Handle must be a single word').optional(),
    category: z.string().optional(),
    description: z.string().optional(),
    private: z.boolean().optional(),
    public: z.boolean().optional(),
    owner: z.boolean().optional(),
    admins: z.array(SlackUserIdSchema).optional(),
  })
  .passthrough();

export type PluginConfig = z.infer<typeof PluginConfigSchema>;
