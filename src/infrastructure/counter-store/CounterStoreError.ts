export type CounterStoreOperation = 'get' | 'set' | 'reset'

export class CounterStoreError extends Error {
  readonly operation: CounterStoreOperation

  constructor(operation: CounterStoreOperation, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CounterStoreError'
    this.operation = operation
  }
}
