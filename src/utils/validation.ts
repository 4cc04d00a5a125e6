/**
 * Request body validation helpers
 */

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a non-empty string field from an untyped body
 */
export function readString(body: unknown, field: string): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const value = body[field];
  return isNonEmptyString(value) ? value : undefined;
}

/**
 * Read an array of strings; undefined when the field is missing or holds
 * anything other than strings.
 */
export function readStringArray(body: unknown, field: string): string[] | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const value = body[field];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    return undefined;
  }
  return value;
}

/**
 * E.164 phone number, as SNS expects for direct SMS
 */
export function isValidPhoneNumber(value: string): boolean {
  return /^\+[1-9]\d{1,14}$/.test(value);
}
