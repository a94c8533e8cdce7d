/**
 * Input validation utilities
 */

// Simple email regex - not RFC 5322 compliant but good enough
const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Check email address format
 */
export function isValidEmail(value: string): boolean {
  return EMAIL_REGEX.test(value);
}

/**
 * Pull the bare address out of a From header ("Ada <ada@example.com>" -> "ada@example.com").
 * Returns null when the header holds no usable address.
 */
export function extractEmailAddress(header: string): string | null {
  const bracketed = /<([^<>]+)>/.exec(header);
  const candidate = (bracketed?.[1] ?? header).trim();
  return isValidEmail(candidate) ? candidate.toLowerCase() : null;
}
