import { CounterStoreError } from './CounterStoreError'
import type { CounterStoreOperation } from './CounterStoreError'

function abortError(operation: CounterStoreOperation, signal: AbortSignal): CounterStoreError {
  return new CounterStoreError(operation, `Counter store ${operation} aborted`, { cause: signal.reason })
}

/**
 * Runs `call` unless `signal` has already aborted, then settles with its result
 * or rejects as soon as `signal` aborts. An aborted backend call keeps running;
 * only the caller stops waiting.
 */
export function abortable<T>(
  operation: CounterStoreOperation,
  call: () => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (!signal) {
    return call()
  }
  if (signal.aborted) {
    return Promise.reject(abortError(operation, signal))
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError(operation, signal))
    signal.addEventListener('abort', onAbort, { once: true })

    call().then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}
