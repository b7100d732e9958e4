import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ENV_DEFAULTS } from '../../../../../common/config/env.validation';
import { MISSING_API_KEY_MESSAGE } from '../../../../../common/constants/error-messages.constants';
import { createLogger } from '../../../../../common/utils/logger';
import { resolveOptionalString } from '../../../../../common/utils/string.utils';
import type {
  CompletionProviderPort,
  CompletionRequest,
} from '../../../application/ports/completion-provider.port';
import { ProviderHttpError, ProviderNetworkError } from '../../../domain/errors';
import { requestChatCompletion } from './openai-client';

@Injectable()
export class OpenAiCompletionAdapter implements CompletionProviderPort {
  private readonly logger = createLogger(OpenAiCompletionAdapter.name);
  private readonly baseUrl: string;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl =
      this.configService.get<string>('OPENAI_BASE_URL') ?? ENV_DEFAULTS.OPENAI_BASE_URL;
  }

  isConfigured(): boolean {
    return this.resolveApiKey() !== undefined;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const apiKey = this.resolveApiKey();
    if (!apiKey) {
      throw new Error(MISSING_API_KEY_MESSAGE);
    }

    const startedAt = Date.now();

    try {
      const body = await requestChatCompletion({ apiKey, baseUrl: this.baseUrl, request });

      this.logger.provider('chat_completion_succeeded', {
        event: 'chat_completion_succeeded',
        kind: request.kind,
        model: request.model,
        latency_ms: Date.now() - startedAt,
        body_chars: body.length,
      });

      return body;
    } catch (error: unknown) {
      this.logger.warn('chat_completion_failed', {
        event: 'chat_completion_failed',
        kind: request.kind,
        model: request.model,
        latency_ms: Date.now() - startedAt,
        status: error instanceof ProviderHttpError ? error.status : null,
        network_code: error instanceof ProviderNetworkError ? error.code : null,
        response_body: error instanceof ProviderHttpError ? error.body : null,
      });
      throw error;
    }
  }

  private resolveApiKey(): string | undefined {
    return resolveOptionalString(this.configService.get<string>('OPENAI_API_KEY'));
  }
}
