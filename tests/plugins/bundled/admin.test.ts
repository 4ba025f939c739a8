import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
  auditLog: vi.fn(),
}));

import Admin, { formatPlugin } from '../../../plugins/admin/admin.js';
import type { Plugin } from '../../../src/plugins/types.js';
import { command } from '../../helpers/fake-transport.js';
import { createTestHost, installBundledPlugin, writePluginConfig, type TestHost } from '../../helpers/host.js';

const DIRECT = { userId: 'U0ADMIN', channelId: 'D0ADMIN' };

describe('formatPlugin', () => {
  it('should show state, version, handle and description', () => {
    expect(
      formatPlugin({ name: 'weather', version: '1.0.0', handle: 'sky', description: 'Forecasts', active: true })
    ).toBe(':large_green_circle: *weather* v1.0.0 `/sky` - Forecasts');
    expect(formatPlugin({ name: 'stats', handle: 'stats', active: false })).toBe(':red_circle: *stats* `/stats`');
  });
});

describe('admin plugin', () => {
  let host: TestHost;
  const weather: Plugin = { name: 'weather', setup: () => undefined };

  async function run(text: string, overrides = DIRECT): Promise<string[]> {
    await host.transport.emit(command('admin', text, overrides));
    return host.transport.textsIn(overrides.channelId);
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    host = createTestHost({ adminIds: ['U0ADMIN'] });
    installBundledPlugin(host.root, 'admin');
    writePluginConfig(host.root, 'weather', { description: 'Forecasts' });
    await host.registry.loadPlugins([new Admin(), weather]);
  });

  afterEach(() => {
    host.cleanup();
  });

  it('should list plugins', async () => {
    expect(await run('plugins')).toEqual([
      ':large_green_circle: *admin* `/admin` - Manage plugins and jobs\n:large_green_circle: *weather* `/weather` - Forecasts',
    ]);
  });

  it('should disable and enable plugins', async () => {
    expect(await run('disable weather')).toEqual([":white_check_mark: Plugin 'weather' disabled"]);
    expect(host.registry.isActive('weather')).toBe(false);

    await run('enable Weather');
    expect(host.registry.isActive('weather')).toBe(true);
    expect(host.transport.textsIn('D0ADMIN')[1]).toBe(":white_check_mark: Plugin 'Weather' enabled");
  });

  it('should report plugins it cannot change', async () => {
    expect(await run('enable weather')).toEqual([":x: Plugin 'weather' not enabled"]);
    await run('disable missing');
    expect(host.transport.textsIn('D0ADMIN')[1]).toBe(":x: Plugin 'missing' not disabled");
  });

  it('should refuse to disable itself', async () => {
    expect(await run('disable admin')).toEqual([':x: The admin plugin cannot disable itself']);
    expect(host.registry.isActive('admin')).toBe(true);
  });

  it('should list scheduled jobs', async () => {
    expect(await run('jobs')).toEqual(['No scheduled jobs']);

    host.registry.contextOf('weather')?.runOnce(() => undefined, 600);
    await run('jobs');

    expect(host.transport.textsIn('D0ADMIN')[1]).toBe('• weather (runs: 0)');
  });

  it('should reply with usage for unknown or incomplete subcommands', async () => {
    const usage =
      '`/admin plugins` list plugins\n`/admin enable <name>` enable a plugin\n`/admin disable <name>` disable a plugin\n`/admin jobs` list scheduled jobs\n';

    expect(await run('')).toEqual([usage]);
    await run('enable');
    expect(host.transport.textsIn('D0ADMIN')[1]).toBe(usage);
  });

  it('should ignore non-admins without a reply', async () => {
    expect(await run('disable weather', { userId: 'U0STRANGER', channelId: 'D0STRANGER' })).toEqual([]);
    expect(host.registry.isActive('weather')).toBe(true);
  });

  it('should only answer in a private chat', async () => {
    expect(await run('plugins', { userId: 'U0ADMIN', channelId: 'C0PUBLIC' })).toEqual([
      ':information_source: Only allowed to execute in a private chat with @testbot',
    ]);
  });
});
