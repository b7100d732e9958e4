import type { CompletionContentPart } from '../../../application/ports/completion-provider.port';

export interface ChatCompletionRequestBody {
  model: string;
  messages: Array<{
    role: 'user';
    content: string | CompletionContentPart[];
  }>;
  max_tokens: number;
  temperature: number;
}
