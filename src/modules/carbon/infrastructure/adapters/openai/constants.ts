export const CHAT_COMPLETIONS_ENDPOINT = '/chat/completions';
export const COMPLETION_TEMPERATURE = 0;
export const MAX_ERROR_BODY_CHARS = 500;
