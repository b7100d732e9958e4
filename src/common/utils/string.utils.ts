/**
 * Resolves a value to an optional non-empty string.
 * Returns undefined if value is not a string or is empty after trim.
 */
export function resolveOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Upper-cases the first letter of every whitespace-separated word and
 * lower-cases the rest. Runs of whitespace collapse to a single space.
 */
export function toTitleCase(value: string): string {
  return value
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function truncateText(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }

  return `${value.slice(0, Math.max(0, maxChars - 3))}...`;
}
