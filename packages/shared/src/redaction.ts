const REDACTION_PLACEHOLDER = '[REDACTED]';

// Credentials passed on a version-control command line
const commandLinePatterns = [/(--password(?:=|\s+))("[^"]*"|'[^']*'|\S+)/g];

// user:password@ in repository URLs
const urlCredentialPattern = /(\b[a-z][a-z0-9+.-]*:\/\/[^\s/:@]+:)([^\s/@]+)(@)/gi;

// Patterns for environment variables
const envVarPatterns = [
  /(?:TOKEN|SECRET|PASSWORD|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g,
];

const SENSITIVE_KEY_NAMES = new Set(['token', 'secret', 'apikey', 'api_key', 'auth', 'password']);

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of commandLinePatterns) {
    redacted = redacted.replace(pattern, (_match, flag: string) => {
      redactionCount++;
      return `${flag}${REDACTION_PLACEHOLDER}`;
    });
  }

  redacted = redacted.replace(
    urlCredentialPattern,
    (_match, prefix: string, _password: string, at: string) => {
      redactionCount++;
      return `${prefix}${REDACTION_PLACEHOLDER}${at}`;
    },
  );

  for (const pattern of envVarPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

/**
 * Replaces every literal occurrence of the given secrets.
 * Used for command output, where the configured password may be echoed back verbatim.
 */
export function redactSecrets(input: string, secrets: Array<string | undefined>): string {
  let redacted = input;
  for (const secret of secrets) {
    if (!secret) continue;
    redacted = redacted.split(secret).join(REDACTION_PLACEHOLDER);
  }
  return redacted;
}

export function redactUnknown(input: unknown): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let totalRedactions = 0;
    const redactedArray = input.map((item) => {
      const { redacted, redactionCount } = redactUnknown(item);
      totalRedactions += redactionCount;
      return redacted;
    });
    return { redacted: redactedArray, redactionCount: totalRedactions };
  }

  if (typeof input === 'object' && input !== null) {
    let totalRedactions = 0;
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (typeof value === 'string' && SENSITIVE_KEY_NAMES.has(key.toLowerCase())) {
        totalRedactions++;
        redactedObj[key] = REDACTION_PLACEHOLDER;
        continue;
      }
      const { redacted, redactionCount } = redactUnknown(value);
      totalRedactions += redactionCount;
      redactedObj[key] = redacted;
    }
    return { redacted: redactedObj, redactionCount: totalRedactions };
  }

  return { redacted: input, redactionCount: 0 };
}

export function redact(input: unknown): unknown {
  return redactUnknown(input).redacted;
}

/**
 * Redacts a value before it is written to a log sink.
 */
export function redactForLogs<T>(input: T): unknown {
  return redact(input);
}
