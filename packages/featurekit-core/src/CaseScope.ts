import { Option } from 'effect'
import * as Identity from './Identity.js'
import { adoptCaseValue, type AnyCaseValue } from './internal/state/values.js'

/**
 * Read/write access to the parent slot that holds an enum value.
 */
export interface CompositeRef<V> {
  readonly get: () => V
  readonly set: (value: V) => void
}

export type Status = 'active' | 'inactive'

export type CaseOf<V extends AnyCaseValue, Tag extends V['_tag']> = Extract<V, { readonly _tag: Tag }>

export type PayloadOf<V extends AnyCaseValue, Tag extends V['_tag']> = CaseOf<V, Tag>['payload']

/**
 * Handle on one case of an enum slot, acquired while the slot held that case.
 */
export interface CaseScope<Tag extends string, P> {
  readonly tag: Tag
  readonly identity: Identity.Identity
  /**
   * The payload as it was when the scope was acquired.
   */
  readonly state: P
  readonly status: () => Status
  /**
   * Installs `next` as the payload of the case, only if the slot still holds this case (same tag and identity).
   * Returns `false` and leaves the slot untouched otherwise.
   */
  readonly writeBack: (next: P) => boolean
}

const isCase = <V extends AnyCaseValue, Tag extends V['_tag']>(value: V, tag: Tag): value is CaseOf<V, Tag> =>
  value._tag === tag

const identityOfCase = (value: AnyCaseValue): Identity.Identity | undefined =>
  Option.getOrUndefined(Identity.identityOf(value))

/**
 * Narrows the enum value held by `ref` to the case `tag`. `None` when the slot is empty or holds another case.
 */
export const scope = <V extends AnyCaseValue, Tag extends V['_tag']>(
  ref: CompositeRef<V | undefined>,
  tag: Tag,
): Option.Option<CaseScope<Tag, PayloadOf<V, Tag>>> => {
  const acquired = ref.get()
  if (acquired === undefined || !isCase(acquired, tag)) return Option.none()
  const identity = identityOfCase(acquired)
  if (identity === undefined) return Option.none()

  const live = (): CaseOf<V, Tag> | undefined => {
    const value = ref.get()
    if (value === undefined || !isCase(value, tag)) return undefined
    return identityOfCase(value) === identity ? value : undefined
  }

  return Option.some({
    tag,
    identity,
    state: acquired.payload,
    status: () => (live() === undefined ? 'inactive' : 'active'),
    writeBack: (next) => {
      const current = live()
      if (current === undefined) return false
      ref.set(adoptCaseValue({ ...current, payload: next }, identity))
      return true
    },
  })
}

/**
 * Identity of the case currently held by `ref`, if any.
 */
export const identityOf = <V extends AnyCaseValue>(ref: CompositeRef<V | undefined>): Option.Option<Identity.Identity> => {
  const value = ref.get()
  return value === undefined ? Option.none() : Identity.identityOf(value)
}
