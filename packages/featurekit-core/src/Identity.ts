import { Brand, Option } from 'effect'

/**
 * Opaque token attached to a trackable state instance.
 *
 * A copy of an instance (the value a transition mutates) keeps the identity of the instance it was copied from,
 * so identity answers "is this the same logical state?" independently of "did its value change?".
 */
export type Identity = string & Brand.Brand<'@featurekit/core/Identity'>

export const Identity = Brand.nominal<Identity>()

let nextSeq = 0

const attached = new WeakMap<object, Identity>()

/**
 * Returns a fresh, process-unique identity.
 */
export const allocate = (): Identity => {
  nextSeq += 1
  return Identity(`i${nextSeq}`)
}

/**
 * Binds `identity` to `instance`. Copies call this with the identity of their source.
 */
export const attach = <T extends object>(instance: T, identity: Identity): T => {
  attached.set(instance, identity)
  return instance
}

export const identityOf = (instance: unknown): Option.Option<Identity> => {
  if (typeof instance !== 'object' || instance === null) return Option.none()
  return Option.fromNullable(attached.get(instance))
}

/**
 * `true`/`false` when both values are tracked, `undefined` when at least one of them never was.
 */
export const isIdentityEqual = (a: unknown, b: unknown): boolean | undefined => {
  const left = identityOf(a)
  const right = identityOf(b)
  if (Option.isNone(left) || Option.isNone(right)) return undefined
  return left.value === right.value
}
