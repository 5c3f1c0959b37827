/**
 * Masks obvious credentials in text before it leaves the machine.
 *
 * Conservative on purpose: only long key-shaped tokens and explicit
 * `token=` / `password=` / `api_key=` assignments are replaced, so ordinary
 * prose and code survive untouched.
 */

interface RedactionRule {
  pattern: RegExp;
  replacement: string;
}

const RULES: readonly RedactionRule[] = [
  { pattern: /sk-lf-[a-zA-Z0-9-]{20,}/gi, replacement: "sk-lf-[REDACTED]" },
  { pattern: /sk-[a-zA-Z0-9]{20,}/gi, replacement: "sk-[REDACTED]" },
  { pattern: /Bearer [a-zA-Z0-9._-]{20,}/gi, replacement: "Bearer [REDACTED]" },
  {
    pattern: /token["']?\s*[:=]\s*["']?[a-zA-Z0-9._-]{20,}/gi,
    replacement: "token: [REDACTED]",
  },
  {
    pattern: /password["']?\s*[:=]\s*["']?[^\s"']{8,}/gi,
    replacement: "password: [REDACTED]",
  },
  {
    pattern: /api[_-]?key["']?\s*[:=]\s*["']?[a-zA-Z0-9._-]{16,}/gi,
    replacement: "api_key: [REDACTED]",
  },
];

export function redactText(text: string): string {
  let result = text;
  for (const rule of RULES) {
    result = result.replace(rule.pattern, rule.replacement);
  }
  return result;
}

/**
 * Redact every string inside a JSON-like value: strings, arrays and plain
 * objects are walked, everything else is returned as-is. Object keys are
 * left alone.
 */
export function redactValue(value: unknown): unknown {
  if (typeof value === "string") return redactText(value);
  if (Array.isArray(value)) return value.map(redactValue);
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = redactValue(inner);
    }
    return out;
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
