import { isRecord, readPath } from '../../../../common/utils/object.utils';
import { ProviderResponseParseError } from '../errors';

export const PLACEHOLDER_INGREDIENTS: ReadonlyArray<string> = Object.freeze(['rice']);

const MESSAGE_CONTENT_PATH = ['choices', 0, 'message', 'content'] as const;
const FIRST_BRACKET_BLOCK = /\[[\s\S]*?\]/;

type ParseAttempt = (text: string) => string[] | undefined;

export interface ProviderEnvelope {
  /** `choices[0].message.content` when the provider sent it as a string. */
  content: string | undefined;
}

/**
 * Parses the provider reply body. Anything that is not a JSON object is a
 * parse error; a missing content field is not.
 */
export function parseEnvelope(rawPayload: string): ProviderEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawPayload);
  } catch {
    throw new ProviderResponseParseError('Provider response is not valid JSON');
  }

  if (!isRecord(parsed)) {
    throw new ProviderResponseParseError('Provider response is not a JSON object');
  }

  const content = readPath(parsed, MESSAGE_CONTENT_PATH);
  return { content: typeof content === 'string' ? content : undefined };
}

export function parseStringArray(text: string): string[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }

  if (!Array.isArray(parsed) || parsed.length === 0) {
    return undefined;
  }

  const items: string[] = [];
  for (const item of parsed) {
    if (typeof item === 'string') {
      items.push(item);
    } else if (typeof item === 'number' && Number.isFinite(item)) {
      items.push(String(item));
    } else {
      return undefined;
    }
  }

  return items;
}

export function parseFirstBracketBlock(text: string): string[] | undefined {
  const match = FIRST_BRACKET_BLOCK.exec(text);
  return match ? parseStringArray(match[0]) : undefined;
}

function firstSuccessful(text: string, attempts: ReadonlyArray<ParseAttempt>): string[] | undefined {
  for (const attempt of attempts) {
    const result = attempt(text);
    if (result) {
      return result;
    }
  }

  return undefined;
}

/**
 * Recovers ingredient names from a provider reply:
 * content as a JSON array, then the first `[...]` block of the content
 * (or of the raw body when there is no content field), then the placeholder.
 */
export function extractIngredientList(rawPayload: string): string[] {
  const { content } = parseEnvelope(rawPayload);
  const attempts: ParseAttempt[] =
    content === undefined ? [parseFirstBracketBlock] : [parseStringArray, parseFirstBracketBlock];

  return firstSuccessful(content ?? rawPayload, attempts) ?? [...PLACEHOLDER_INGREDIENTS];
}

/** Returns the trimmed content, or "" when the reply carries none. */
export function extractDishName(rawPayload: string): string {
  const { content } = parseEnvelope(rawPayload);
  return (content ?? '').trim();
}
