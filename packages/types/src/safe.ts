/**
 * Result tuples for fallible work: the error first, the value second, exactly
 * one of them set. Decoders and resolvers return these; the interpreter loop
 * unwraps them back into thrown errors.
 */

export type Safe<T, E extends Error = Error> = SafeError<E> | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

/**
 * The value of `result`, or its error thrown
 */
export function unwrapSafe<T, E extends Error>(result: Safe<T, E>): T {
  const [error, value] = result
  if (error) throw error
  return value
}
