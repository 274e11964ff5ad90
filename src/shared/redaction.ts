const REDACTED = "***REDACTED***";
const SENSITIVE_KEY_PATTERN = /(token|secret|key|authorization|password)/i;
const TOKEN_PATTERNS = [
  /([?&](?:key|token)=)[^&\s"']+/gi,
  /(bearer\s+)[a-z0-9._-]{8,}/gi,
  /((?:api[_-]?key|token|secret)\s*[:=]\s*)[a-z0-9._-]{8,}/gi
];

function reset(pattern: RegExp): RegExp {
  pattern.lastIndex = 0;
  return pattern;
}

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERN.test(key);
}

export function redactString(value: string): string {
  if (!value) {
    return value;
  }
  let result = value;
  for (const pattern of TOKEN_PATTERNS) {
    result = result.replace(reset(pattern), `$1${REDACTED}`);
  }
  return result;
}

export function redactUnknown(value: unknown): unknown {
  if (typeof value === "string") {
    return redactString(value);
  }
  if (Array.isArray(value)) {
    return value.map(entry => redactUnknown(entry));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (isSensitiveKey(key)) {
        result[key] = REDACTED;
        continue;
      }
      result[key] = redactUnknown(entry);
    }
    return result;
  }
  return value;
}
