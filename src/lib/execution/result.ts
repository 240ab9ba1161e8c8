/**
 * Tagged success/failure value returned by the execution layer,
 * so callers branch on `ok` instead of catching.
 *
 * @example
 * ```ts
 * const result = await runWithRetry(() => client.clusters.get(id))
 * if (!result.ok) return result            // propagate the ClassifiedError
 * const cluster = result.value             // narrowed to the success type
 * ```
 */

export interface Success<T> {
  readonly ok: true
  readonly value: T
}

export interface Failure<E> {
  readonly error: E
  readonly ok: false
}

export type Result<T, E> = Failure<E> | Success<T>

export function succeed<T>(value: T): Success<T> {
  return { ok: true, value }
}

export function fail<E>(error: E): Failure<E> {
  return { error, ok: false }
}

/**
 * Value of a successful result, or throw its error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value
  }

  throw result.error
}
