export type CompletionKind = 'text' | 'vision';

export type CompletionContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface CompletionRequest {
  kind: CompletionKind;
  model: string;
  content: string | CompletionContentPart[];
  maxTokens: number;
  timeoutMs: number;
}

/**
 * One outbound chat-completion attempt. Resolves with the raw reply body;
 * rejects with the provider error types from the domain.
 */
export interface CompletionProviderPort {
  isConfigured(): boolean;
  complete(request: CompletionRequest): Promise<string>;
}
