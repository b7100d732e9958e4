import type { CompletionRequest } from '@/modules/carbon/application/ports/completion-provider.port';
import { ProviderHttpError, ProviderNetworkError } from '@/modules/carbon/domain/errors';
import { OpenAiCompletionAdapter } from '@/modules/carbon/infrastructure/adapters/openai';
import { buildConfigService } from '../../../_helpers/config';

const TEXT_REQUEST: CompletionRequest = {
  kind: 'text',
  model: 'gpt-4o-mini',
  content: 'Dish: Lasagna',
  maxTokens: 200,
  timeoutMs: 1000,
};

function buildAdapter(overrides: Record<string, unknown> = {}): OpenAiCompletionAdapter {
  return new OpenAiCompletionAdapter(
    buildConfigService({
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'https://llm.test/v1/',
      ...overrides,
    }),
  );
}

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

describe('OpenAiCompletionAdapter', () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('posts a chat completion and returns the raw body', async () => {
    const fetchMock = jest.fn().mockResolvedValue({
      ok: true,
      status: 200,
      text: async () => '{"choices":[]}',
    });
    global.fetch = fetchMock as typeof fetch;

    const body = await buildAdapter().complete(TEXT_REQUEST);

    expect(body).toBe('{"choices":[]}');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] as [string, RequestInit];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'Dish: Lasagna' }],
      max_tokens: 200,
      temperature: 0,
    });
  });

  it('raises the HTTP status of a failed reply', async () => {
    global.fetch = jest.fn().mockResolvedValue({
      ok: false,
      status: 503,
      text: async () => 'overloaded',
    }) as typeof fetch;

    const failure = await buildAdapter().complete(TEXT_REQUEST).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProviderHttpError);
    expect(failure).toMatchObject({ status: 503, body: 'overloaded', message: 'Provider HTTP 503' });
  });

  it('maps an aborted request to a timeout', async () => {
    global.fetch = jest.fn().mockRejectedValue(abortError()) as typeof fetch;

    const failure = await buildAdapter().complete(TEXT_REQUEST).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProviderNetworkError);
    expect(failure).toMatchObject({ code: 'timeout', timeoutMs: 1000 });
  });

  it('aborts the request once the timeout elapses', async () => {
    jest.useFakeTimers();
    global.fetch = jest.fn(
      (_url: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(abortError()));
        }),
    ) as typeof fetch;

    const pending = buildAdapter().complete(TEXT_REQUEST);
    const assertion = expect(pending).rejects.toMatchObject({ code: 'timeout' });

    await jest.advanceTimersByTimeAsync(1000);
    await assertion;
  });

  it('maps other transport failures to a network error', async () => {
    global.fetch = jest.fn().mockRejectedValue(new TypeError('fetch failed')) as typeof fetch;

    const failure = await buildAdapter().complete(TEXT_REQUEST).catch((error: unknown) => error);

    expect(failure).toMatchObject({
      code: 'network',
      message: 'Provider request failed: network error',
    });
  });

  it('reports whether an API key is configured', async () => {
    const adapter = buildAdapter({ OPENAI_API_KEY: '  ' });

    expect(adapter.isConfigured()).toBe(false);
    expect(buildAdapter().isConfigured()).toBe(true);
    await expect(adapter.complete(TEXT_REQUEST)).rejects.toThrow(
      'Provider API key is not configured',
    );
  });

  it('uses the public endpoint when no base URL is set', async () => {
    const fetchMock = jest.fn().mockResolvedValue({ ok: true, status: 200, text: async () => '{}' });
    global.fetch = fetchMock as typeof fetch;

    await buildAdapter({ OPENAI_BASE_URL: undefined }).complete(TEXT_REQUEST);

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
  });
});
