/**
 * Secret masking for published action logs and Pino logger redaction.
 *
 * Action logs end up in a public snapshot, so any credential carried in a
 * task address or header must never reach them.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Query parameter names whose values are treated as credentials.
 * Compared case-insensitively.
 */
export const SECRET_QUERY_PARAMS: ReadonlySet<string> = new Set([
  'token',
  'access_token',
  'key',
  'api_key',
  'apikey',
  'secret',
  'password',
])

/**
 * Known Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  '*.token',
  'headers.authorization',
  'headers.Authorization',
  '*.headers.authorization',
  '*.headers.Authorization',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

const QUERY_PARAM_PATTERN = /([?&])([^=&#\s]+)=([^&#\s]*)/g

/**
 * Replace the values of credential-like query parameters in a string with `***`.
 *
 * Works on bare URLs and on messages that embed one.
 *
 * @example
 * maskSecrets('https://api.example.com/q?city=Oslo&apikey=abc')
 * // => 'https://api.example.com/q?city=Oslo&apikey=***'
 */
export function maskSecrets(input: string): string {
  return input.replace(QUERY_PARAM_PATTERN, (match, sep: string, name: string) =>
    SECRET_QUERY_PARAMS.has(name.toLowerCase()) ? `${sep}${name}=${MASKED_VALUE}` : match
  )
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

const CREDENTIAL_FIELDS = new Set(['authorization', 'token', 'secret', 'password'])

/**
 * Deep-clone a plain-object tree and replace credential fields with `***`.
 * String values are scrubbed with {@link maskSecrets}.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (typeof value === 'string') return maskSecrets(value)
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k.toLowerCase()) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
