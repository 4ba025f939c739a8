import { App, LogLevel } from '@slack/bolt';
import { loadConfig } from './config/index.js';
import { HostPaths } from './plugins/paths.js';
import { PluginRegistry } from './plugins/registry.js';
import { AdminNotifier } from './services/notifier.js';
import { JobQueue } from './services/scheduler.js';
import { StorageGateway } from './services/storage-gateway.js';
import { SlackTransport } from './transport/slack.js';
import { WebServer } from './web/index.js';
import { logger, getLogLevel, errorMessage } from './utils/logger.js';

/**
 * Slack Plugin Host
 *
 * Loads every plugin under plugins/, routes Slack commands and messages to
 * their handlers, and serves their web endpoints and scheduled jobs.
 */

// Map our log level to Bolt's LogLevel
function getBoltLogLevel(): LogLevel {
  switch (getLogLevel()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const { global } = config;
  const useWebhook = global.webhook.use_webhook;

  // Socket Mode unless webhook.use_webhook selects the HTTP receiver
  const app = new App({
    token: config.slack.botToken,
    ...(useWebhook
      ? { signingSecret: config.slack.signingSecret }
      : { appToken: config.slack.appToken, socketMode: true }),
    logLevel: getBoltLogLevel(),
  });

  app.error((error): Promise<void> => {
    logger.error('Unhandled error in Bolt app', { error: error.message, stack: error.stack });
    return Promise.resolve();
  });

  const transport = new SlackTransport(app, {
    onHandlerError: (error) => {
      notifier.notify(error);
    },
  });

  const notifier = new AdminNotifier({
    enabled: global.admin.notify_on_error,
    adminIds: global.admin.ids,
    sender: transport,
  });

  const paths = new HostPaths(config.root);
  const jobs = new JobQueue((error) => {
    notifier.notify(error);
  });
  const storage = new StorageGateway(
    paths,
    { enabled: global.database.use_db, timeoutSeconds: global.database.timeout },
    notifier
  );
  const web = global.web.use_web ? new WebServer({ password: global.web.password, notifier }) : undefined;

  const registry = new PluginRegistry({
    paths,
    globalConfig: config.store,
    adminIds: global.admin.ids,
    storage,
    jobs,
    notifier,
    transport,
    web,
  });

  // Graceful shutdown handler
  async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
      await app.stop();
      await registry.shutdown();
      jobs.stop();
      await web?.stop();
      logger.info('App stopped successfully');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await transport.identify();
  await registry.load();

  if (useWebhook) {
    await app.start(global.webhook.port);
  } else {
    await app.start();
  }

  if (web) {
    await web.start(global.web.port);
  }

  logger.info('Slack Plugin Host is running!', {
    socketMode: !useWebhook,
    plugins: registry.list().map((plugin) => plugin.name),
    adminNotify: notifier.isEnabled,
    database: global.database.use_db,
    web: !!web,
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start app', { error: errorMessage(error) });
  process.exit(1);
});
