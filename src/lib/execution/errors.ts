/**
 * Failure taxonomy for remote calls
 *
 * Every failure crossing the remote-call boundary is mapped to one category.
 * The category alone decides whether the call is retried and which
 * remediation hint is shown to the caller.
 */

export type ErrorCategory =
  | 'Auth'
  | 'BadRequest'
  | 'Network'
  | 'NotFound'
  | 'NotReady'
  | 'Permission'
  | 'RateLimit'
  | 'TransientServer'
  | 'Unknown'

const RETRYABLE: ReadonlySet<ErrorCategory> = new Set<ErrorCategory>([
  'Network',
  'NotReady',
  'RateLimit',
  'TransientServer',
])

export const HINTS: Readonly<Record<ErrorCategory, string>> = {
  Auth: 'Re-authenticate: refresh the token of the active profile (lakeops profile create --force).',
  BadRequest: 'Check the arguments passed to the operation.',
  Network: 'Could not reach the platform; will auto-retry. Check connectivity and the profile host if it persists.',
  NotFound: 'Verify the identifier; the resource does not exist or is not visible to this profile.',
  NotReady: 'The resource is not ready yet; will auto-retry. Wait for it to reach a usable state if it persists.',
  Permission: 'Check access: the profile lacks permission for this resource or operation.',
  RateLimit: 'Rate limited by the platform; will auto-retry. Reduce call frequency if persistent.',
  TransientServer: 'The platform returned a transient server error; will auto-retry.',
  Unknown: 'Unexpected failure; see the message for details.',
}

type Matcher = RegExp | string

export interface ClassificationRule {
  category: ErrorCategory
  matches: readonly Matcher[]
}

/**
 * Ordered rules, first match wins.
 * String matchers are lowercase substrings; status codes use word boundaries
 * so identifiers that merely contain the digits do not match.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    category: 'Network',
    matches: [
      'connection reset',
      'connection refused',
      'connection aborted',
      'connection error',
      'econnreset',
      'econnrefused',
      'enotfound',
      'etimedout',
      'eai_again',
      'socket hang up',
      'fetch failed',
      'network',
      'timed out',
      'timeout',
    ],
  },
  {
    category: 'RateLimit',
    matches: [
      'rate limit',
      'ratelimit',
      'too many requests',
      'request_limit_exceeded',
      'resource_exhausted',
      'throttl',
      /\b429\b/,
    ],
  },
  {
    category: 'TransientServer',
    matches: [
      'internal server error',
      'internal_error',
      'bad gateway',
      'service unavailable',
      'temporarily unavailable',
      'temporarily_unavailable',
      /\b50[0234]\b/,
    ],
  },
  {
    category: 'NotReady',
    matches: [
      'not ready',
      'invalid_state',
      'invalid state',
      'is starting',
      'is pending',
      'still starting',
      'try again later',
    ],
  },
  {
    category: 'Auth',
    matches: [
      'unauthenticated',
      'unauthorized',
      'invalid token',
      'invalid access token',
      'token expired',
      'expired token',
      'credential',
      /\b401\b/,
    ],
  },
  {
    category: 'Permission',
    matches: [
      'permission denied',
      'permission_denied',
      'forbidden',
      'not authorized',
      'access denied',
      /\b403\b/,
    ],
  },
  {
    category: 'NotFound',
    matches: [
      'not found',
      'not_found',
      'does not exist',
      'does_not_exist',
      'no such',
      /\b404\b/,
    ],
  },
  {
    category: 'BadRequest',
    matches: [
      'invalid',
      'bad request',
      'bad_request',
      'malformed',
      'missing required',
      /\b400\b/,
    ],
  },
]

export interface ClassifiedErrorJson {
  attemptCategories?: ErrorCategory[]
  attempts?: number
  category: ErrorCategory
  exhausted: boolean
  hint: string
  message: string
  retryable: boolean
}

interface ClassifiedErrorInit {
  attemptCategories?: readonly ErrorCategory[]
  attempts?: number
  cause?: unknown
  exhausted?: boolean
}

/**
 * A failure annotated with category, retryability and remediation hint.
 * Instances are never mutated; markers are added by deriving a new instance.
 */
export class ClassifiedError extends Error {
  readonly attemptCategories: readonly ErrorCategory[]
  readonly attempts?: number
  readonly category: ErrorCategory
  readonly exhausted: boolean
  readonly hint: string
  readonly retryable: boolean

  constructor(category: ErrorCategory, message: string, init: ClassifiedErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause })
    this.name = 'ClassifiedError'
    this.category = category
    this.retryable = RETRYABLE.has(category)
    this.hint = HINTS[category]
    this.exhausted = init.exhausted ?? false
    this.attempts = init.attempts
    this.attemptCategories = Object.freeze([...(init.attemptCategories ?? [])])
  }

  /**
   * Copy of this error marked as the final failure of an exhausted retry sequence
   */
  asExhausted(attempts: number, attemptCategories: readonly ErrorCategory[]): ClassifiedError {
    return new ClassifiedError(this.category, this.message, {
      attemptCategories,
      attempts,
      cause: this.cause,
      exhausted: true,
    })
  }

  /**
   * One-line description for logs and text responses
   */
  describe(): string {
    const marker = this.exhausted ? `, retries exhausted after ${this.attempts} attempts` : ''
    return `[${this.category}${marker}] ${this.message}`
  }

  toJSON(): ClassifiedErrorJson {
    const json: ClassifiedErrorJson = {
      category: this.category,
      exhausted: this.exhausted,
      hint: this.hint,
      message: this.message,
      retryable: this.retryable,
    }
    if (this.attempts !== undefined) {
      json.attempts = this.attempts
      json.attemptCategories = [...this.attemptCategories]
    }

    return json
  }
}

/**
 * Arguments rejected before any remote call. Classified as BadRequest so
 * every adapter treats it like any other non-retryable failure, while
 * adapters that distinguish caller mistakes can still recognise it.
 */
export class InvalidArgumentsError extends ClassifiedError {
  readonly issues: readonly string[]

  constructor(operationId: string, issues: readonly string[]) {
    super('BadRequest', `Invalid arguments for ${operationId}: ${issues.join('; ')}`)
    this.name = 'InvalidArgumentsError'
    this.issues = Object.freeze([...issues])
  }
}

/**
 * Local routing failure: the operation identifier is not in the catalog.
 * Never retried and never produced by classification.
 */
export class UnknownOperationError extends Error {
  readonly code = 'UNKNOWN_OPERATION'
  readonly operationId: string
  readonly retryable = false

  constructor(operationId: string) {
    super(`Unknown operation: ${operationId}`)
    this.name = 'UnknownOperationError'
    this.operationId = operationId
  }

  toJSON(): { code: string; message: string; operationId: string; retryable: boolean } {
    return {
      code: this.code,
      message: this.message,
      operationId: this.operationId,
      retryable: this.retryable,
    }
  }
}

/**
 * Extract the inspectable text of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }

  if (typeof error === 'string') {
    return error
  }

  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }

  try {
    return JSON.stringify(error) ?? String(error)
  } catch {
    return String(error)
  }
}

function matches(text: string, matcher: Matcher): boolean {
  return typeof matcher === 'string' ? text.includes(matcher) : matcher.test(text)
}

/**
 * Category for a message, by rule precedence
 */
export function categorize(message: string, rules: readonly ClassificationRule[] = CLASSIFICATION_RULES): ErrorCategory {
  const text = message.toLowerCase()
  for (const rule of rules) {
    if (rule.matches.some(matcher => matches(text, matcher))) {
      return rule.category
    }
  }

  return 'Unknown'
}

/**
 * Classify any caught failure. Already-classified errors pass through unchanged.
 */
export function classify(error: unknown): ClassifiedError {
  if (error instanceof ClassifiedError) {
    return error
  }

  const message = errorMessage(error)
  return new ClassifiedError(categorize(message), message, { cause: error })
}

export function isRetryable(category: ErrorCategory): boolean {
  return RETRYABLE.has(category)
}
