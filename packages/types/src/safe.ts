/**
 * Set of functions to wrap around promises to make them safe
 * Also works to wrap around try catch statements
 */

export type SafePromise<T, E extends Error = Error> = Promise<
  SafeError<E> | SafeResult<T>
>

export type Safe<T, E extends Error = Error> = SafeError<E> | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Runs an async function and captures anything it throws or rejects with
 */
export function safeTry<T>(fn: () => Promise<T>): SafePromise<T> {
  return Promise.resolve()
    .then(fn)
    .then(
      (res): Safe<T> => safeResult(res),
      (error: unknown): Safe<T> => safeError(toError(error)),
    )
}
