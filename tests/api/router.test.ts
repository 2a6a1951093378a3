import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createApp } from '../../src/server.js';
import { createContainer } from '../../src/container.js';
import { loadConfig } from '../../src/config.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { TrafficLogEvent } from '../../src/providers/ILogProvider.js';
import { FakeClock } from '../mocks/clock.js';

describe('app', () => {
  let logProvider: ConsoleLogProvider;
  let records: ConsoleLogProvider;
  let handle: Handler;

  const ctx: HandlerContext = { clientAddress: '203.0.113.5' };

  function build(env: Record<string, string> = {}): void {
    logProvider = new ConsoleLogProvider();
    records = new ConsoleLogProvider();
    const container = createContainer({
      config: loadConfig(env),
      logProvider,
      recordProvider: records,
      clock: new FakeClock(5_000).read,
    });
    handle = createApp(container);
  }

  function postJson(path: string, body: string): Request {
    return new Request(`http://localhost${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  function record(): TrafficLogEvent {
    return records.events[0] as TrafficLogEvent;
  }

  beforeEach(() => build());

  describe('GET /api/health', () => {
    it('reports the service name', async () => {
      const res = await handle(new Request('http://localhost/api/health'), ctx);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', service: 'traffic-log' });
      expect(record().message.startsWith('\nip: 203.0.113.5\nGET http://localhost/api/health?\n')).toBe(true);
    });
  });

  describe('POST /api/echo', () => {
    it('lets both the logger and the handler read the JSON body', async () => {
      const res = await handle(postJson('/api/echo', '{"k":"v"}'), ctx);

      expect(await res.json()).toEqual({ received: { k: 'v' } });
      expect(record().message).toContain('\ncontent-type: application/json\n\n{"k":"v"}\n');
    });

    it('logs the echoed response when TRAFFIC_LOG_RESP is on', async () => {
      build({ TRAFFIC_LOG_RESP: 'true' });

      const res = await handle(postJson('/api/echo', '{"k":"v"}'), ctx);
      await res.text();

      await vi.waitFor(() => expect(records.events).toHaveLength(1));
      expect(record().message.endsWith('response info: {"received":{"k":"v"}}\n')).toBe(true);
    });

    it('logs the response of a whitelisted route only', async () => {
      build({ TRAFFIC_LOG_WHITE_PATTERNS: '/api/echo' });

      await (await handle(postJson('/api/echo', '{"a":1}'), ctx)).text();
      await (await handle(new Request('http://localhost/api/health'), ctx)).text();

      await vi.waitFor(() => expect(records.events).toHaveLength(2));
      const byPath = new Map(records.events.map((e) => [(e as TrafficLogEvent).path, e as TrafficLogEvent] as const));
      expect(byPath.get('/api/echo')?.responseCaptured).toBe(true);
      expect(byPath.get('/api/health')?.responseCaptured).toBe(false);
    });

    it('turns a handler failure into a 400 after recording it', async () => {
      const res = await handle(postJson('/api/echo', '{not json'), ctx);
      const body = (await res.json()) as { error: { code: string } };

      expect(res.status).toBe(400);
      expect(body.error.code).toBe('BODY_READ_FAILED');
      expect(records.events).toHaveLength(1);
      expect(record().status).toBeUndefined();
      expect(record().message).toContain('{not json\n');
      expect(logProvider.find('exception caught from downstream handler')).toHaveLength(1);
    });

    it('answers 413 for bodies above TRAFFIC_LOG_MAX_BODY_BYTES', async () => {
      build({ TRAFFIC_LOG_MAX_BODY_BYTES: '16' });

      const res = await handle(postJson('/api/echo', '{"text":"far more than sixteen bytes"}'), ctx);

      expect(res.status).toBe(413);
      expect(records.events).toHaveLength(0);
    });
  });

  describe('POST /api/upload', () => {
    it('parses the multipart body the logger left alone', async () => {
      const form = new FormData();
      form.append('title', 'report');
      form.append('notes', 'quarterly');

      const res = await handle(
        new Request('http://localhost/api/upload', { method: 'POST', body: form }),
        ctx
      );

      expect(await res.json()).toEqual({ parts: 2, fields: ['title', 'notes'] });
      expect(record().message).toContain('[multipart/form-data]\nstart time 5000');
    });
  });

  describe('unmatched routes', () => {
    it('returns 404 for an unknown path', async () => {
      const res = await handle(new Request('http://localhost/api/nothing'), ctx);
      expect(res.status).toBe(404);
      expect(record().status).toBe(404);
    });

    it('returns 405 with Allow for a known path', async () => {
      const res = await handle(new Request('http://localhost/api/echo'), ctx);
      expect(res.status).toBe(405);
      expect(res.headers.get('Allow')).toBe('POST');
    });
  });
});
