export class ExternalFetchError extends Error {
  kind: 'timeout' | 'network';
  constructor(kind: 'timeout' | 'network', message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExternalFetchError';
    this.kind = kind;
  }
}

export interface TextResponse {
  ok: boolean;
  status: number;
  body: string;
}

/**
 * Single HTTP request with a timeout. No retries: the CoreNLP server is a
 * local process, a failed call is reported straight away.
 */
export async function requestText(
  url: string,
  opts: { method?: 'GET' | 'POST'; body?: string; timeoutMs?: number; headers?: Record<string, string> } = {},
): Promise<TextResponse> {
  const timeoutMs = opts.timeoutMs ?? 4000;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await globalThis.fetch(url, {
      method: opts.method ?? 'GET',
      body: opts.body,
      headers: opts.headers,
      signal: controller.signal,
    });
    const body = await res.text();
    return { ok: res.ok, status: res.status, body };
  } catch (e) {
    if (e instanceof Error && e.name === 'AbortError') {
      throw new ExternalFetchError('timeout', `Request to ${url} timed out after ${timeoutMs}ms`, { cause: e });
    }
    const reason = e instanceof Error ? e.message : String(e);
    throw new ExternalFetchError('network', `Request to ${url} failed: ${reason}`, { cause: e });
  } finally {
    clearTimeout(timer);
  }
}
