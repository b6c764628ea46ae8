import { Option, Schema } from 'effect'
import type { CompositeRef } from './CaseScope.js'
import * as Fx from './Fx.js'
import * as Reducer from './Reducer.js'
import { isTagged, type ActionValue } from './internal/action.js'
import { report } from './internal/reducer/transition.js'

/**
 * Action of an optional child: an action for the presented child, or the request to dismiss it.
 */
export type PresentationAction<A> =
  | { readonly _tag: 'presented'; readonly payload: A }
  | { readonly _tag: 'dismiss' }

export const presented = <A>(action: A): PresentationAction<A> => ({ _tag: 'presented', payload: action })

export const dismiss: PresentationAction<never> = { _tag: 'dismiss' }

/**
 * What a parent needs to host a child in one of its slots.
 */
export interface Presentable<V, A> {
  /**
   * Runs the child on the value held by the slot. Effects come back scoped to the identity of that value.
   * The slot can be emptied while the child runs; `get` then answers `undefined`.
   */
  readonly reducer: Reducer.Reducer<CompositeRef<V | undefined>, A>
}

/**
 * Schema of `PresentationAction<A>`, to declare the presentation action of a parent feature.
 */
export const actionSchema = <A>(child: Schema.Schema<A>): Schema.Schema<PresentationAction<A>> => {
  const isChild = Schema.is(child)
  return Schema.declare(
    (value: unknown): value is PresentationAction<A> =>
      isTagged(value) && (value._tag === 'dismiss' || (value._tag === 'presented' && isChild(value.payload))),
    { identifier: 'PresentationAction' },
  )
}

type Slot<K extends PropertyKey, V> = { [P in K]: V | undefined }

type Hosted<K extends PropertyKey, V> = { [P in K]: V }

/**
 * Hosts `child` in the optional slot `state[stateKey]`, driven by the parent actions tagged `actionTag`.
 *
 * Combine it before the parent's own reducer so the child sees its actions first. A `dismiss` action or a
 * top-level `Fx.dismiss` from the child empties the slot within the same transition. Emptying or replacing the
 * slot retires the identity of the value it held, which cancels that value's effects.
 */
export const ifLet = <K extends PropertyKey, T extends string, V, CA>(
  stateKey: K,
  actionTag: T,
  child: Presentable<V, CA>,
): Reducer.Reducer<Slot<K, V>, ActionValue<T, PresentationAction<CA>>> =>
  Reducer.make((state, action) => {
    if (action._tag !== actionTag) return Fx.none
    const inner = action.payload
    if (inner._tag === 'dismiss') {
      state[stateKey] = undefined
      return Fx.none
    }

    const present: V | undefined = state[stateKey]
    if (present === undefined) {
      report({
        code: 'presentation::absent',
        severity: 'warning',
        message: `Action for "${String(stateKey)}" arrived while nothing is presented; it was dropped.`,
        hint: 'Effects of a dismissed child are cancelled, but actions sent before the dismissal can still arrive.',
        actionTag,
      })
      return Fx.none
    }

    const ref: CompositeRef<V | undefined> = {
      get: () => state[stateKey],
      set: (value) => {
        state[stateKey] = value
      },
    }
    const { dismiss: dismissed, rest } = Fx.extractDismiss(Fx.unwrapStop(child.reducer.reduce(ref, inner.payload)))
    if (dismissed) state[stateKey] = undefined
    return Fx.map(rest, (childAction): ActionValue<T, PresentationAction<CA>> => ({
      _tag: actionTag,
      payload: presented(childAction),
    }))
  })

/**
 * Routes the actions tagged `actionTag` to the enum reducer `child` over the non-optional slot `state[stateKey]`.
 */
export const ifCaseLet = <K extends PropertyKey, T extends string, V, CA>(
  stateKey: K,
  actionTag: T,
  child: Reducer.Reducer<CompositeRef<V | undefined>, CA>,
): Reducer.Reducer<Hosted<K, V>, ActionValue<T, CA>> =>
  Reducer.scope(
    {
      get: (state: Hosted<K, V>): CompositeRef<V | undefined> => ({
        get: () => state[stateKey],
        set: (value) => {
          if (value !== undefined) state[stateKey] = value
        },
      }),
      extract: (action: ActionValue<T, CA>) => (action._tag === actionTag ? Option.some(action.payload) : Option.none()),
      embed: (childAction: CA): ActionValue<T, CA> => ({ _tag: actionTag, payload: childAction }),
    },
    child,
  )
