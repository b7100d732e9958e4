/**
 * Fetches a URL and reads the body as text, aborting once `timeoutMs` elapses.
 * The timeout covers the whole exchange, body included.
 *
 * @throws Error with name 'AbortError' if the timeout fires
 */
export async function fetchTextWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
): Promise<{ status: number; ok: boolean; body: string }> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });

    return {
      status: response.status,
      ok: response.ok,
      body: await response.text(),
    };
  } finally {
    clearTimeout(timeoutId);
  }
}
