import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Mock the logger
vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

import { AdminNotifier } from '../../src/services/notifier.js';
import { normalizeEndpointPath, WebServer } from '../../src/web/server.js';
import { logger } from '../../src/utils/logger.js';

describe('normalizeEndpointPath', () => {
  it('should add a leading slash', () => {
    expect(normalizeEndpointPath('weather/today')).toBe('/weather/today');
    expect(normalizeEndpointPath('/weather')).toBe('/weather');
  });
});

describe('WebServer', () => {
  let server: WebServer;
  let baseUrl: string;

  async function start(instance: WebServer): Promise<void> {
    server = instance;
    const port = await server.start(0);
    baseUrl = `http://127.0.0.1:${String(port)}`;
  }

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(async () => {
    await server.stop();
  });

  it('should answer the health check', async () => {
    await start(new WebServer());
    server.addEndpoint('/weather', (_req, res) => {
      res.send('ok');
    });

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', endpoints: 1 });
  });

  it('should route to a registered endpoint', async () => {
    await start(new WebServer());
    server.addEndpoint('weather', (req, res) => {
      res.json({ city: req.query.city });
    });

    const response = await fetch(`${baseUrl}/weather?city=Oslo`);

    expect(response.status).toBe(200);
    expect(response.headers.get('x-content-type-options')).toBe('nosniff');
    expect(await response.json()).toEqual({ city: 'Oslo' });
  });

  it('should answer 404 for unknown and removed endpoints', async () => {
    await start(new WebServer());
    server.addEndpoint('/weather', (_req, res) => {
      res.send('ok');
    });

    expect(server.removeEndpoint('weather')).toBe(true);
    expect(server.removeEndpoint('weather')).toBe(false);

    const response = await fetch(`${baseUrl}/weather`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('should add endpoints while running', async () => {
    await start(new WebServer());

    expect((await fetch(`${baseUrl}/late`)).status).toBe(404);
    server.addEndpoint('/late', (_req, res) => {
      res.send('here');
    });

    const response = await fetch(`${baseUrl}/late`);
    expect(await response.text()).toBe('here');
  });

  it('should replace an endpoint registered twice', async () => {
    await start(new WebServer());
    server.addEndpoint('/weather', (_req, res) => {
      res.send('first');
    });
    server.addEndpoint('/weather', (_req, res) => {
      res.send('second');
    });

    expect(server.getEndpoints()).toEqual(['/weather']);
    expect(logger.warn).toHaveBeenCalledWith('Replacing existing endpoint', { path: '/weather' });
    expect(await (await fetch(`${baseUrl}/weather`)).text()).toBe('second');
  });

  it('should require the password on endpoints when one is set', async () => {
    await start(new WebServer({ password: 'test-secret' }));
    server.addEndpoint('/weather', (_req, res) => {
      res.send('ok');
    });

    const denied = await fetch(`${baseUrl}/weather`);
    expect(denied.status).toBe(401);
    expect(await denied.json()).toEqual({ error: 'Unauthorized' });

    const byHeader = await fetch(`${baseUrl}/weather`, { headers: { Authorization: 'Bearer test-secret' } });
    expect(byHeader.status).toBe(200);

    const byQuery = await fetch(`${baseUrl}/weather?password=test-secret`);
    expect(byQuery.status).toBe(200);

    const health = await fetch(`${baseUrl}/health`);
    expect(health.status).toBe(200);
  });

  it('should answer 500 and notify the admins when a handler throws', async () => {
    const sendMessage = vi.fn(() => Promise.resolve());
    const notifier = new AdminNotifier({ enabled: true, adminIds: ['U0ADMIN'], sender: { sendMessage } });
    await start(new WebServer({ notifier }));
    server.addEndpoint('/broken', () => {
      throw new Error('handler exploded');
    });

    const response = await fetch(`${baseUrl}/broken`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Internal error' });
    expect(logger.error).toHaveBeenCalledWith('Endpoint handler failed', {
      path: '/broken',
      error: 'handler exploded',
    });
    expect(sendMessage).toHaveBeenCalledTimes(1);
  });

  it('should accept JSON bodies', async () => {
    await start(new WebServer());
    server.addEndpoint('/echo', (req, res) => {
      res.json(req.body);
    });

    const response = await fetch(`${baseUrl}/echo`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ city: 'Lima' }),
    });

    expect(await response.json()).toEqual({ city: 'Lima' });
  });

  it('should refuse to start twice', async () => {
    await start(new WebServer());
    await expect(server.start(0)).rejects.toThrow('Web server already started');
  });
});
