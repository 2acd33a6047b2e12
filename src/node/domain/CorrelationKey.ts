/**
 * Issue-tracker keys: an uppercase project prefix, a hyphen and 1-5 digits (ABC-123).
 */
const CORRELATION_KEY_PATTERN = /\b[A-Z]+-\d{1,5}\b/

export function extractCorrelationKey(message: string): string | null {
  const match = CORRELATION_KEY_PATTERN.exec(message)
  return match ? match[0] : null
}

/**
 * Keys are compatible when equal or when at least one is absent.
 */
export function areKeysCompatible(a: string | null, b: string | null): boolean {
  return a === null || b === null || a === b
}
