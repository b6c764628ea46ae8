import { Option } from 'effect'
import * as Identity from '../../Identity.js'
import { untracked } from '../../Observation.js'
import type { FieldOwner } from '../../TrackedField.js'
import { TrackedField } from '../../TrackedField.js'

/**
 * Declaration of one field of an observable state, as recorded at definition time.
 */
export interface FieldSpec {
  readonly key: string
  readonly untracked: boolean
  readonly validate: (value: unknown) => boolean
}

export interface StateInternals {
  readonly definition: symbol
  readonly owner: FieldOwner
  readonly fields: ReadonlyMap<string, TrackedField<unknown>>
}

const instances = new WeakMap<object, StateInternals>()

export const internalsOf = (value: unknown): StateInternals | undefined =>
  typeof value === 'object' && value !== null ? instances.get(value) : undefined

export const isObservableInstance = (value: unknown): value is object => internalsOf(value) !== undefined

const defineAccessor = (instance: object, field: TrackedField<unknown>): void => {
  Object.defineProperty(instance, field.key, {
    enumerable: true,
    configurable: false,
    get: () => field.get(),
    set: (next: unknown) => field.set(next),
  })
}

/**
 * Turns the own data properties named by `specs` into tracked accessors and seals the object.
 */
export const installFields = <S extends object>(
  target: S,
  definition: symbol,
  specs: ReadonlyArray<FieldSpec>,
  owner: FieldOwner,
  read: (key: string) => unknown,
): S => {
  const fields = new Map<string, TrackedField<unknown>>()
  for (const spec of specs) {
    const field = new TrackedField<unknown>(spec.key, read(spec.key), owner, { untracked: spec.untracked })
    fields.set(spec.key, field)
    defineAccessor(target, field)
  }
  Identity.attach(target, owner.identity)
  instances.set(target, { definition, owner, fields })
  return Object.seal(target)
}

// ---------------------------------------------------------------------------
// Case values: `{ _tag, payload }` of an enum composite, each carrying the identity of its case instance.

export interface CaseValue<Tag extends string, Payload> {
  readonly _tag: Tag
  readonly payload: Payload
}

export type AnyCaseValue = CaseValue<string, unknown>

const caseValues = new WeakSet<object>()

/**
 * Registers `value` as a case value carrying `identity` and freezes it.
 */
export const adoptCaseValue = <T extends AnyCaseValue>(value: T, identity: Identity.Identity): T => {
  Identity.attach(value, identity)
  caseValues.add(Object.freeze(value))
  return value
}

export const makeCaseValue = <Tag extends string, Payload>(
  tag: Tag,
  payload: Payload,
  identity?: Identity.Identity,
): CaseValue<Tag, Payload> =>
  adoptCaseValue(
    { _tag: tag, payload },
    identity ?? Option.getOrElse(Identity.identityOf(payload), () => Identity.allocate()),
  )

export const isCaseValue = (value: unknown): value is AnyCaseValue =>
  typeof value === 'object' && value !== null && caseValues.has(value)

// ---------------------------------------------------------------------------
// Value semantics

/**
 * Deep copy of observable instances and case values; each copy keeps the identity and registrar of its source.
 * Anything else is immutable by convention and shared.
 */
export const copyValue = <T>(value: T): T => {
  const internals = internalsOf(value)
  if (internals !== undefined && typeof value === 'object' && value !== null) {
    const source: T & object = value
    const copy = untracked(() => ({ ...source }))
    const fields = new Map<string, TrackedField<unknown>>()
    for (const [key, field] of internals.fields) {
      const next = field.copyTo(internals.owner, copyValue(field.peek()))
      fields.set(key, next)
      defineAccessor(copy, next)
    }
    Identity.attach(copy, internals.owner.identity)
    instances.set(copy, { definition: internals.definition, owner: internals.owner, fields })
    return Object.seal(copy)
  }

  if (isCaseValue(value)) {
    const copy = { ...value, payload: copyValue(value.payload) }
    return adoptCaseValue(copy, Option.getOrElse(Identity.identityOf(value), () => Identity.allocate()))
  }

  return value
}

/**
 * Whether `value`, or a state or case nested in it, carries `identity`. Reads are not tracked.
 */
export const holdsIdentity = (value: unknown, identity: Identity.Identity): boolean => {
  const own = Identity.identityOf(value)
  if (Option.isSome(own) && own.value === identity) return true

  const internals = internalsOf(value)
  if (internals !== undefined) {
    for (const field of internals.fields.values()) {
      if (holdsIdentity(field.peek(), identity)) return true
    }
    return false
  }

  if (isCaseValue(value)) return holdsIdentity(value.payload, identity)
  if (Array.isArray(value)) return value.some((item) => holdsIdentity(item, identity))
  return false
}

/**
 * Plain, recursively detached view of a value: observable instances become plain objects, case values plain
 * `{ _tag, payload }` records. Reads are not tracked.
 */
export const snapshotValue = (value: unknown): unknown => {
  const internals = internalsOf(value)
  if (internals !== undefined) {
    const out: Record<string, unknown> = {}
    for (const [key, field] of internals.fields) {
      out[key] = snapshotValue(field.peek())
    }
    return out
  }

  if (isCaseValue(value)) {
    return { _tag: value._tag, payload: snapshotValue(value.payload) }
  }

  if (Array.isArray(value)) {
    return value.map(snapshotValue)
  }

  return value
}
