import { ExternalFetchError, requestText } from '../../../src/util/fetch.js';

describe('fetch helpers', () => {
  let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('returns status and body without throwing on HTTP errors', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('nope', { status: 404 }));

    await expect(requestText('http://localhost:9000/x')).resolves.toEqual({ ok: false, status: 404, body: 'nope' });
  });

  it('passes method, body and headers', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('{}', { status: 200 }));

    await requestText('http://localhost:9000/', { method: 'POST', body: 'text', headers: { 'X-Test': '1' } });

    const init = fetchSpy.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('text');
    expect(init?.headers).toEqual({ 'X-Test': '1' });
  });

  it('classifies network failures', async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

    const err = await requestText('http://localhost:9000/').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExternalFetchError);
    expect(err instanceof ExternalFetchError && err.kind).toBe('network');
  });

  it('aborts slow requests', async () => {
    fetchSpy.mockImplementationOnce(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const abort = new Error('aborted');
            abort.name = 'AbortError';
            reject(abort);
          });
        }),
    );

    const err = await requestText('http://localhost:9000/', { timeoutMs: 10 }).catch((e: unknown) => e);

    expect(err instanceof ExternalFetchError && err.kind).toBe('timeout');
    expect(err instanceof Error && err.message).toBe('Request to http://localhost:9000/ timed out after 10ms');
  });
});
