import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig, parseGlobalConfig, parseSlackCredentials } from '../../src/config/index.js';

const SOCKET_ENV = {
  SLACK_BOT_TOKEN: 'xoxb-test',
  SLACK_APP_TOKEN: 'xapp-test',
};

describe('config', () => {
  let root: string;

  function writeGlobal(document: unknown, file = path.join(root, 'config', 'config.json')): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(document));
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'load-config-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should load the global document from the working directory', () => {
      writeGlobal({ admin: { ids: ['U0ADMIN'], notify_on_error: true } });

      const config = loadConfig({ env: SOCKET_ENV, cwd: root });

      expect(config.root).toBe(path.resolve(root));
      expect(config.global.admin.ids).toEqual(['U0ADMIN']);
      expect(config.global.admin.notify_on_error).toBe(true);
      expect(config.slack).toEqual({ botToken: 'xoxb-test', appToken: 'xapp-test' });
    });

    it('should expose the validated document through the store', () => {
      writeGlobal({ database: { timeout: 2 }, weather: { units: 'metric' } });

      const { store } = loadConfig({ env: SOCKET_ENV, cwd: root });

      expect(store.get('database', 'timeout')).toBe(2);
      expect(store.get('database', 'use_db')).toBe(true);
      expect(store.get('weather', 'units')).toBe('metric');
      expect(store.get('missing')).toBeUndefined();
    });

    it('should keep the store apart from the validated document', () => {
      writeGlobal({ admin: { ids: ['U0ADMIN'] } });

      const config = loadConfig({ env: SOCKET_ENV, cwd: root });
      const ids = config.store.get('admin', 'ids');
      if (Array.isArray(ids)) ids.push('U0INTRUDER');

      expect(ids).toEqual(['U0ADMIN', 'U0INTRUDER']);
      expect(config.global.admin.ids).toEqual(['U0ADMIN']);
    });

    it('should honour PLUGIN_ROOT and CONFIG_PATH', () => {
      const project = path.join(root, 'project');
      writeGlobal({ web: { use_web: true } }, path.join(project, 'settings', 'host.json'));

      const config = loadConfig({
        env: { ...SOCKET_ENV, PLUGIN_ROOT: 'project', CONFIG_PATH: 'settings/host.json' },
        cwd: root,
      });

      expect(config.root).toBe(path.resolve(project));
      expect(config.global.web.use_web).toBe(true);
    });

    it('should throw when the global document is missing', () => {
      expect(() => loadConfig({ env: SOCKET_ENV, cwd: root })).toThrow('Global config not found');
    });

    it('should throw when the global document is not JSON', () => {
      fs.mkdirSync(path.join(root, 'config'));
      fs.writeFileSync(path.join(root, 'config', 'config.json'), '{');

      expect(() => loadConfig({ env: SOCKET_ENV, cwd: root })).toThrow('is not valid JSON');
    });

    it('should require a signing secret in webhook mode', () => {
      writeGlobal({ webhook: { use_webhook: true } });

      expect(() => loadConfig({ env: { SLACK_BOT_TOKEN: 'xoxb-test' }, cwd: root })).toThrow(
        'Webhook mode requires SLACK_SIGNING_SECRET to be set'
      );
    });
  });

  describe('parseGlobalConfig', () => {
    it('should list every invalid key', () => {
      expect(() => parseGlobalConfig({ admin: { ids: ['bad'] }, database: { timeout: -1 } })).toThrow(
        /Configuration validation failed:\n {2}- admin\.ids\.0: Invalid Slack user ID format\n {2}- database\.timeout/
      );
    });
  });

  describe('parseSlackCredentials', () => {
    it('should require an app token in Socket Mode', () => {
      expect(() => parseSlackCredentials({ SLACK_BOT_TOKEN: 'xoxb-test' }, false)).toThrow(
        'Socket Mode requires SLACK_APP_TOKEN to be set'
      );
    });

    it('should accept a signing secret in webhook mode', () => {
      const slack = parseSlackCredentials(
        { SLACK_BOT_TOKEN: 'xoxb-test', SLACK_SIGNING_SECRET: 'test-secret' },
        true
      );
      expect(slack).toEqual({ botToken: 'xoxb-test', signingSecret: 'test-secret' });
    });

    it('should treat empty variables as unset', () => {
      expect(() =>
        parseSlackCredentials({ SLACK_BOT_TOKEN: 'xoxb-test', SLACK_APP_TOKEN: '' }, false)
      ).toThrow('Socket Mode requires SLACK_APP_TOKEN to be set');
    });

    it('should reject a missing bot token', () => {
      expect(() => parseSlackCredentials({}, false)).toThrow('Bot token must start with xoxb-');
    });
  });
});
