/**
 * Read a single string field exactly as sent, e.g. a password.
 * Repeated fields yield their first value; empty or non-string is absent.
 */
export function rawFieldOf(source: unknown, name: string): string | undefined {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }

  const raw: unknown = Object.getOwnPropertyDescriptor(source, name)?.value;
  const value: unknown = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Read a single string field from a parsed body, query or cookie jar,
 * trimmed. Blank fields are absent.
 */
export function fieldOf(source: unknown, name: string): string | undefined {
  const trimmed = rawFieldOf(source, name)?.trim();
  return trimmed ? trimmed : undefined;
}

export function flagOf(source: unknown, name: string): boolean {
  const value = fieldOf(source, name);
  return value !== undefined && value !== '0' && value.toLowerCase() !== 'false';
}
