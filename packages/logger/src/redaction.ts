export type RedactionMode = 'development' | 'staging' | 'production' | 'test';

const SENSITIVE_KEY_REGEX = /(password|secret|token|authorization|cookie|api[_-]?key)/i;

// Listing descriptions regularly carry seller phone numbers and e-mail addresses.
const EMAIL_REGEX = /[^@\s]+@[^@\s]+\.[a-z]{2,}/gi;
const PHONE_REGEX = /\+?\d[\d\s.-]{7,}\d/g;

export function redactDeep(value: unknown, mode: RedactionMode): unknown {
  if (value == null) return value;
  if (typeof value === 'string') return redactString(value);
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Error) {
    return {
      code: 'ERROR',
      message: redactString(value.message),
      ...(value.stack ? { stack: truncateStack(value.stack, mode) } : {}),
    };
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactDeep(item, mode));
  }
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (SENSITIVE_KEY_REGEX.test(key)) {
        out[key] = '[REDACTED]';
      } else if (key === 'stack' && typeof entry === 'string') {
        out[key] = truncateStack(entry, mode);
      } else {
        out[key] = redactDeep(entry, mode);
      }
    }
    return out;
  }
  return value;
}

export function redactString(input: string): string {
  return input
    .replace(EMAIL_REGEX, (email) => {
      const tld = email.split('.').pop() ?? 'com';
      return `${email.slice(0, 1)}***@***.${tld}`;
    })
    .replace(PHONE_REGEX, (phone) => {
      const digits = phone.replace(/\D/g, '');
      if (digits.length < 9) return phone;
      return `${digits.slice(0, 2)}***${digits.slice(-2)}`;
    });
}

function truncateStack(stack: string, mode: RedactionMode): string {
  if (mode !== 'production') return stack;
  return stack.split('\n').slice(0, 3).join('\n');
}
