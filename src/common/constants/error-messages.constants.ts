/**
 * User-facing error messages.
 *
 * HTTP-layer messages are returned by the exception filter; estimate messages
 * land in the `error` field of fallback results.
 */

export const BACKEND_ERROR_MESSAGE = 'Something went wrong on our side. Please try again in a moment.';

export const INVALID_PAYLOAD_MESSAGE = 'Invalid payload.';

export const NOT_FOUND_MESSAGE = 'Resource not found.';

export const NO_FILE_UPLOADED_MESSAGE = 'No file uploaded';

export const EMPTY_IMAGE_MESSAGE = 'Empty image uploaded';

export const BLANK_DISH_MESSAGE = 'Dish name must not be blank';

export const EMPTY_DISH_NAME_MESSAGE = 'Vision model returned empty dish name';

export const MISSING_API_KEY_MESSAGE = 'Provider API key is not configured';

export const UNKNOWN_ERROR_MESSAGE = 'Unknown error';

export const RATE_LIMIT_NOTICE = 'rate limit reached, please wait a moment and try again';
