/**
 * Outbound payload sanitizer
 * Pattern redaction for strings, value removal for sensitive object keys
 */

export interface RedactionRule {
  pattern: RegExp;
  replacement: string;
}

export const DEFAULT_REDACTION_RULES: readonly RedactionRule[] = [
  // US social security numbers
  { pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '[REDACTED-SSN]' },
  // Card numbers, contiguous
  { pattern: /\b\d{13,19}\b/g, replacement: '[REDACTED-PAN]' },
  // Card numbers with single space or dash separators
  {
    pattern: /(?<!\d)(?:\d[ -]?){12,18}\d(?!\d)/g,
    replacement: '[REDACTED-PAN]',
  },
  {
    pattern: /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi,
    replacement: '[REDACTED-EMAIL]',
  },
  {
    pattern:
      /\b(?:\+?\d{1,3}[-.\s]?)?(?:\(\d{3}\)|\d{3})[-.\s]?\d{3}[-.\s]?\d{4}\b/g,
    replacement: '[REDACTED-PHONE]',
  },
];

export const DEFAULT_KEY_BLOCKLIST: readonly string[] = [
  'ssn',
  'social_security',
  'social_security_number',
  'credit_card',
  'card_number',
  'pan',
  'password',
  'passphrase',
  'secret',
  'token',
  'api_key',
];

export const DEFAULT_KEY_SUBSTRINGS: readonly string[] = [
  'secret',
  'token',
  'password',
];

export const REMOVED_VALUE = '[REMOVED]';

export interface SanitizerOptions {
  rules?: readonly RedactionRule[];
  keyBlocklist?: readonly string[];
  keySubstrings?: readonly string[];
}

export interface Sanitizer {
  sanitize(payload: unknown): unknown;
  sanitizeText(text: string): string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function createSanitizer(options: SanitizerOptions = {}): Sanitizer {
  const rules = options.rules ?? DEFAULT_REDACTION_RULES;
  const blocklist = new Set(
    (options.keyBlocklist ?? DEFAULT_KEY_BLOCKLIST).map((key) =>
      key.toLowerCase()
    )
  );
  const substrings = (options.keySubstrings ?? DEFAULT_KEY_SUBSTRINGS).map(
    (part) => part.toLowerCase()
  );

  function shouldRemoveKey(key: string): boolean {
    const lower = key.toLowerCase();
    if (blocklist.has(lower)) {
      return true;
    }
    return substrings.some((part) => lower.includes(part));
  }

  function sanitizeText(text: string): string {
    let sanitized = text;
    for (const rule of rules) {
      sanitized = sanitized.replace(rule.pattern, rule.replacement);
    }
    return sanitized;
  }

  function sanitize(payload: unknown): unknown {
    if (typeof payload === 'string') {
      return sanitizeText(payload);
    }
    if (Array.isArray(payload)) {
      return payload.map((item: unknown) => sanitize(item));
    }
    if (isPlainObject(payload)) {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(payload)) {
        result[key] = shouldRemoveKey(key) ? REMOVED_VALUE : sanitize(value);
      }
      return result;
    }
    return payload;
  }

  return { sanitize, sanitizeText };
}

const defaultSanitizer = createSanitizer();

/**
 * Sanitize a payload with the default rules
 */
export function sanitizeOutput(payload: unknown): unknown {
  return defaultSanitizer.sanitize(payload);
}

export function sanitizeText(text: string): string {
  return defaultSanitizer.sanitizeText(text);
}
