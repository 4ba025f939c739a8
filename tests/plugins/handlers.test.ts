import { describe, it, expect } from 'vitest';
import { commandHandler, eventHandler, messageHandler } from '../../src/plugins/handlers.js';
import { rateLimit } from '../../src/middleware/rate-limit.js';
import { command, message } from '../helpers/fake-transport.js';

const noop = (): void => undefined;

describe('commandHandler', () => {
  it('should match its command only', () => {
    const definition = commandHandler('weather', noop);

    expect(definition.matches(command('weather'))).toBe(true);
    expect(definition.matches(command('feedback'))).toBe(false);
    expect(definition.matches(message('weather'))).toBe(false);
  });

  it('should strip a leading slash and ignore case', () => {
    const definition = commandHandler('/Weather', noop);

    expect(definition.label).toBe('command:/weather');
    expect(definition.matches(command('weather'))).toBe(true);
  });

  it('should default to no filters and synchronous dispatch', () => {
    const definition = commandHandler('weather', noop);

    expect(definition.filters).toEqual([]);
    expect(definition.runAsync).toBe(false);
  });

  it('should keep the given options', () => {
    const limit = rateLimit();
    const definition = commandHandler('weather', noop, { filters: [limit], runAsync: true });

    expect(definition.filters).toEqual([limit]);
    expect(definition.runAsync).toBe(true);
  });
});

describe('messageHandler', () => {
  it('should match every message by default', () => {
    const definition = messageHandler(noop);

    expect(definition.matches(message('hello'))).toBe(true);
    expect(definition.matches(command('hello'))).toBe(false);
  });

  it('should narrow by predicate', () => {
    const definition = messageHandler(noop, (event) => event.text.includes('rain'));

    expect(definition.matches(message('rain today?'))).toBe(true);
    expect(definition.matches(message('sunny'))).toBe(false);
  });
});

describe('eventHandler', () => {
  it('should use the predicate as is', () => {
    const definition = eventHandler('any-command', (event) => event.kind === 'command', noop);

    expect(definition.label).toBe('any-command');
    expect(definition.matches(command('anything'))).toBe(true);
    expect(definition.matches(message('anything'))).toBe(false);
  });
});
