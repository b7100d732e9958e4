import { truncateText } from '../../../../../common/utils/string.utils';
import type { CompletionRequest } from '../../../application/ports/completion-provider.port';
import { ProviderHttpError, ProviderNetworkError } from '../../../domain/errors';
import { fetchTextWithTimeout } from '../shared';
import { CHAT_COMPLETIONS_ENDPOINT, COMPLETION_TEMPERATURE, MAX_ERROR_BODY_CHARS } from './constants';
import type { ChatCompletionRequestBody } from './types';

export function chatCompletionsUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${CHAT_COMPLETIONS_ENDPOINT}`;
}

export function buildChatCompletionBody(request: CompletionRequest): ChatCompletionRequestBody {
  return {
    model: request.model,
    messages: [{ role: 'user', content: request.content }],
    max_tokens: request.maxTokens,
    temperature: COMPLETION_TEMPERATURE,
  };
}

/**
 * Sends one chat-completions request and returns the raw reply body.
 * Non-2xx replies become ProviderHttpError; aborts and transport failures
 * become ProviderNetworkError.
 */
export async function requestChatCompletion(input: {
  apiKey: string;
  baseUrl: string;
  request: CompletionRequest;
}): Promise<string> {
  let response: Awaited<ReturnType<typeof fetchTextWithTimeout>>;

  try {
    response = await fetchTextWithTimeout(
      chatCompletionsUrl(input.baseUrl),
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${input.apiKey}`,
        },
        body: JSON.stringify(buildChatCompletionBody(input.request)),
      },
      input.request.timeoutMs,
    );
  } catch (error: unknown) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new ProviderNetworkError('timeout', input.request.timeoutMs);
    }

    throw new ProviderNetworkError('network');
  }

  if (!response.ok) {
    throw new ProviderHttpError(response.status, truncateText(response.body, MAX_ERROR_BODY_CHARS));
  }

  return response.body;
}
