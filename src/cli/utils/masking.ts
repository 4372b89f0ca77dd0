/**
 * Credential masking utilities for CLI output and pino redaction.
 *
 * Keeps the Slack bot token and capability API keys out of logs, status
 * output and error messages.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Patterns that identify credential values embedded in free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // Slack bot, user and app tokens
  /xox[abprs]-[A-Za-z0-9-]{10,}/g,
  /xapp-[A-Za-z0-9-]{10,}/g,
  // Bearer header values
  /Bearer\s+[A-Za-z0-9._~+/-]{16,}=*/g,
]

/**
 * Pino redaction paths. Pass to `pino({ redact: ... })`.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  'apiKey',
  'api_key',
  '*.token',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  '*.headers.authorization',
  'env.ANTHROPIC_API_KEY',
  'env.SLACK_BOT_TOKEN',
]

/**
 * Replace any known secret patterns in a string with `***`.
 *
 * Best-effort scrub for log lines and error strings; it does not guarantee
 * removal of every possible secret format.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

const CREDENTIAL_FIELDS = new Set(['api_key', 'apiKey', 'token', 'secret', 'password'])

/**
 * Deep-clone a plain-object tree and replace known credential fields with `***`.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
