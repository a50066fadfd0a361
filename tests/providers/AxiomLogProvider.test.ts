import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

/** Make the next ingest request hang until the returned function is called. */
function holdNextRequest(): () => void {
  let release: () => void = () => {};
  mockFetch.mockImplementationOnce(
    () =>
      new Promise<Response>((resolve) => {
        release = () => resolve(new Response(null, { status: 200 }));
      })
  );
  return () => release();
}

function sentBody(call: number): Array<Record<string, unknown>> {
  return JSON.parse(mockFetch.mock.calls[call][1]?.body as string);
}

describe('AxiomLogProvider', () => {
  let provider: AxiomLogProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockImplementation(async () => new Response(null, { status: 200 }));
    provider = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'poi-monitor-test',
      minLevel: 'debug',
      flushIntervalMs: 60_000,
      flushThreshold: 5,
    });
  });

  afterEach(async () => {
    await provider.dispose();
    vi.unstubAllGlobals();
  });

  // --- flush() ---

  it('should buffer events without sending until flush', () => {
    provider.info('hello');
    provider.warn('world');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should send buffered events to the dataset ingest endpoint', async () => {
    provider.info('Reported POI discrepancy', { deploymentId: 'QmABC', blockNumber: 100 });
    provider.warn('POI reuse lookup failed');
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.axiom.co/v1/datasets/poi-monitor-test/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });

    const body = sentBody(0);
    expect(body).toHaveLength(2);
    expect(body[0]).toMatchObject({
      service: 'poi-monitor',
      level: 'info',
      message: 'Reported POI discrepancy',
      fields: { deploymentId: 'QmABC', blockNumber: 100 },
    });
    expect(body[0]._time).toEqual(expect.any(String));
    expect(body[1]).not.toHaveProperty('fields');
  });

  it('should not call fetch when buffer is empty', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should clear buffer after successful flush', async () => {
    provider.info('event');
    await provider.flush();
    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should share one request between concurrent flushes', async () => {
    provider.info('event');
    await Promise.all([provider.flush(), provider.flush()]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should auto-flush when buffer reaches threshold', async () => {
    for (let i = 0; i < 5; i++) provider.info(`event ${i}`);
    await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(1));
    expect(sentBody(0)).toHaveLength(5);
  });

  // --- levels ---

  it('should drop events below the minimum level', async () => {
    const quiet = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'poi-monitor-test',
      flushIntervalMs: 0,
    });
    quiet.debug('Already notified about this POI set');
    quiet.info('POI check iteration finished');
    await quiet.flush();

    expect(sentBody(0).map((e) => e.message)).toEqual(['POI check iteration finished']);
  });

  // --- error resilience ---

  it('should not throw when Axiom returns an error', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Server Error', { status: 500 }));
    provider.error('bad');
    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.failedFlushes).toBe(1);
  });

  it('should retain events when flush fails so they can be retried', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.info('important');
    await provider.flush();
    expect(provider.failedFlushes).toBe(1);

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sentBody(1).map((e) => e.message)).toEqual(['important']);
  });

  it('should drop the oldest events beyond the buffer cap', async () => {
    const capped = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'poi-monitor-test',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferSize: 2,
    });
    capped.info('one');
    capped.info('two');
    capped.info('three');
    await capped.flush();

    expect(sentBody(0).map((e) => e.message)).toEqual(['two', 'three']);
  });

  it('should send events logged during an in-flight flush once it completes', async () => {
    provider.info('before');
    const release = holdNextRequest();
    const first = provider.flush();
    provider.info('during');
    const second = provider.flush();

    release();
    await Promise.all([first, second]);

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sentBody(0).map((e) => e.message)).toEqual(['before']);
    expect(sentBody(1).map((e) => e.message)).toEqual(['during']);
  });

  it('should keep newer events when the cap trims an in-flight batch', async () => {
    const capped = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'poi-monitor-test',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferSize: 3,
    });
    capped.info('a');
    capped.info('b');
    capped.info('c');
    const release = holdNextRequest();
    const flushing = capped.flush();
    capped.info('NEW-1');
    capped.info('NEW-2');

    release();
    await flushing;

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sentBody(0).map((e) => e.message)).toEqual(['a', 'b', 'c']);
    expect(sentBody(1).map((e) => e.message)).toEqual(['NEW-1', 'NEW-2']);
  });

  it('should stop draining after a failed send', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Server Error', { status: 503 }));
    provider.info('kept');

    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(provider.failedFlushes).toBe(1);
  });

  // --- dispose ---

  it('dispose() should flush remaining events', async () => {
    provider.info('final');
    await provider.dispose();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  // --- disabled mode (no token) ---

  it('should silently no-op when apiToken is empty', async () => {
    const disabled = new AxiomLogProvider({ apiToken: '', dataset: 'x' });
    disabled.info('ignored');
    await disabled.flush();
    expect(mockFetch).not.toHaveBeenCalled();
    await disabled.dispose();
  });
});
