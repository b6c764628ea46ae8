import { Cause } from 'effect'

export interface SerializableErrorSummary {
  readonly message: string
  readonly name?: string
  readonly hint?: string
}

const truncate = (value: string, maxLen: number): string => (value.length <= maxLen ? value : value.slice(0, maxLen))

const stringField = (value: object, key: string): string | undefined => {
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'string' && field.length > 0 ? field : undefined
}

const messageOf = (error: unknown): string => {
  if (typeof error === 'string') return error
  if (typeof error === 'number' || typeof error === 'boolean' || typeof error === 'bigint') return String(error)
  if (error instanceof Error) return error.message || error.name || 'Error'
  if (typeof error === 'object' && error !== null) return stringField(error, 'message') ?? 'Unknown error'
  return 'Unknown error'
}

/**
 * Plain summary of a failure, safe to put on a debug event. A `Cause` is squashed to its most relevant error.
 */
export const toSerializableErrorSummary = (
  cause: unknown,
  options?: { readonly maxMessageLength?: number },
): SerializableErrorSummary => {
  const error = Cause.isCause(cause) ? Cause.squash(cause) : cause
  const message = truncate(messageOf(error), options?.maxMessageLength ?? 256)
  if (typeof error !== 'object' || error === null) return { message }

  const name = stringField(error, 'name')
  const hint = stringField(error, 'hint')
  return {
    message,
    ...(name !== undefined && name !== 'Error' ? { name } : {}),
    ...(hint !== undefined ? { hint } : {}),
  }
}
