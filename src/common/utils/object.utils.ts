export function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/**
 * Reads a nested value by walking object keys and array indexes.
 * Returns undefined as soon as a segment is missing.
 */
export function readPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;

  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current) || segment >= current.length) {
        return undefined;
      }
      current = current[segment];
      continue;
    }

    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }

  return current;
}
