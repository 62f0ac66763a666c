// PII Masking Utilities
// Use these to keep subscriber contact details out of logs

/**
 * Mask email, showing first char and domain
 * "jo@example.com" -> "j***@example.com"
 */
export function maskEmail(email: string | null | undefined): string {
  if (!email || !email.includes('@')) return '****'
  const [local, domain] = email.split('@')
  return local[0] + '***@' + domain
}

/**
 * Mask phone number, showing only last 4 digits
 * "+15550001234" -> "********1234"
 */
export function maskPhone(phone: string | null | undefined): string {
  if (!phone || phone.length < 4) return '****'
  return '*'.repeat(phone.length - 4) + phone.slice(-4)
}

const SENSITIVE_FIELDS = [
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
]

const PARTIAL_MASK_FIELDS = ['email', 'phone']

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

/**
 * Create a sanitized version of an object for logging
 * Redacts credentials, masks contact fields
 */
export function sanitizeForLogging(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase()

    if (SENSITIVE_FIELDS.some(f => lowerKey.includes(f))) {
      result[key] = '[REDACTED]'
    } else if (PARTIAL_MASK_FIELDS.some(f => lowerKey.includes(f)) && typeof value === 'string') {
      result[key] = lowerKey.includes('email') ? maskEmail(value) : maskPhone(value)
    } else if (isPlainObject(value)) {
      result[key] = sanitizeForLogging(value)
    } else {
      result[key] = value
    }
  }

  return result
}
