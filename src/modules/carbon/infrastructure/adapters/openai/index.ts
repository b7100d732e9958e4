export { OpenAiCompletionAdapter } from './openai-completion.adapter';
export { buildChatCompletionBody, chatCompletionsUrl, requestChatCompletion } from './openai-client';
