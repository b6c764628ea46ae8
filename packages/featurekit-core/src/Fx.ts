import { Effect } from 'effect'
import type { Identity } from './Identity.js'

/**
 * Key under which an in-flight effect can be cancelled. Ids scoped to a case are prefixed with the case identity
 * (`<identity>/<id>`), so retiring the identity cancels everything started inside that case.
 */
export type CancelId = string

export type Send<A> = (action: A) => Effect.Effect<void>

export interface RunOptions<A> {
  /**
   * Turns a failure of the run body into an action. Without it a failure is reported as a diagnostic.
   */
  readonly onFailure?: (error: unknown) => A
}

/**
 * Description of asynchronous work returned by a transition function. Results re-enter the store as actions;
 * nothing in an `Fx` mutates state.
 */
export type Fx<A> =
  | { readonly _tag: 'None' }
  | { readonly _tag: 'Send'; readonly action: A }
  | {
      readonly _tag: 'Run'
      readonly body: (send: Send<A>) => Effect.Effect<void, unknown>
      readonly onFailure?: (error: unknown) => A
    }
  | { readonly _tag: 'Merge'; readonly fxs: ReadonlyArray<Fx<A>> }
  | { readonly _tag: 'Concat'; readonly fxs: ReadonlyArray<Fx<A>> }
  | { readonly _tag: 'Cancellable'; readonly id: CancelId; readonly cancelInFlight: boolean; readonly fx: Fx<A> }
  | { readonly _tag: 'Cancel'; readonly ids: ReadonlyArray<CancelId> }
  | { readonly _tag: 'Retire'; readonly identities: ReadonlyArray<Identity> }
  | { readonly _tag: 'Dismiss' }
  | { readonly _tag: 'Stop'; readonly fx: Fx<A> }

export const none: Fx<never> = { _tag: 'None' }

export const send = <A>(action: A): Fx<A> => ({ _tag: 'Send', action })

/**
 * Runs `body` as a fiber of the store; `send` feeds actions back through the store's serialized entry point.
 */
export const run = <A>(body: (send: Send<A>) => Effect.Effect<void, unknown>, options?: RunOptions<A>): Fx<A> => ({
  _tag: 'Run',
  body,
  onFailure: options?.onFailure,
})

/**
 * Runs `effect` and sends the action built from its outcome.
 */
export const fromEffect = <B, E, A>(
  effect: Effect.Effect<B, E>,
  handlers: { readonly onSuccess: (value: B) => A; readonly onFailure: (error: E) => A },
): Fx<A> =>
  run((sendAction) =>
    Effect.matchEffect(effect, {
      onSuccess: (value) => sendAction(handlers.onSuccess(value)),
      onFailure: (error) => sendAction(handlers.onFailure(error)),
    }),
  )

const flatten = <A>(tag: 'Merge' | 'Concat', fxs: ReadonlyArray<Fx<A>>): ReadonlyArray<Fx<A>> => {
  const out: Array<Fx<A>> = []
  for (const fx of fxs) {
    if (fx._tag === 'None') continue
    if (fx._tag === tag) {
      out.push(...fx.fxs)
      continue
    }
    out.push(fx)
  }
  return out
}

/**
 * Runs every effect concurrently. Order of the list is the declared order.
 */
export const merge = <A>(...fxs: ReadonlyArray<Fx<A>>): Fx<A> => {
  const flat = flatten('Merge', fxs)
  if (flat.length === 0) return none
  if (flat.length === 1) return flat[0] ?? none
  return { _tag: 'Merge', fxs: flat }
}

/**
 * Runs the effects one after another.
 */
export const concat = <A>(...fxs: ReadonlyArray<Fx<A>>): Fx<A> => {
  const flat = flatten('Concat', fxs)
  if (flat.length === 0) return none
  if (flat.length === 1) return flat[0] ?? none
  return { _tag: 'Concat', fxs: flat }
}

export const cancellable = <A>(fx: Fx<A>, id: CancelId, options?: { readonly cancelInFlight?: boolean }): Fx<A> =>
  fx._tag === 'None' ? none : { _tag: 'Cancellable', id, cancelInFlight: options?.cancelInFlight ?? false, fx }

/**
 * Cancels every in-flight effect registered under one of `ids`, or under an id scoped below one of them.
 */
export const cancel = (...ids: ReadonlyArray<CancelId>): Fx<never> => ({ _tag: 'Cancel', ids })

/**
 * Cancels every in-flight effect started inside one of `identities`, at any depth: a case hosted below another
 * one registers its effects as `<outer>/<inner>/...`.
 */
export const retire = (...identities: ReadonlyArray<Identity>): Fx<never> => ({ _tag: 'Retire', identities })

/**
 * Asks the nearest enclosing presentation to dismiss the feature that returned it, within the same transition.
 */
export const dismiss: Fx<never> = { _tag: 'Dismiss' }

/**
 * Marks the result of a reducer in a sequential combination: reducers declared after it do not run.
 */
export const stopPropagation = <A>(fx: Fx<A> = none): Fx<A> => ({ _tag: 'Stop', fx })

export const isStopped = <A>(fx: Fx<A>): boolean => fx._tag === 'Stop'

export const unwrapStop = <A>(fx: Fx<A>): Fx<A> => (fx._tag === 'Stop' ? fx.fx : fx)

export const isNone = <A>(fx: Fx<A>): boolean => {
  switch (fx._tag) {
    case 'None':
      return true
    case 'Merge':
    case 'Concat':
      return fx.fxs.every(isNone)
    case 'Stop':
    case 'Cancellable':
      return isNone(fx.fx)
    default:
      return false
  }
}

/**
 * Transforms every action the effect can produce.
 */
export const map = <A, B>(fx: Fx<A>, f: (action: A) => B): Fx<B> => {
  switch (fx._tag) {
    case 'None':
      return none
    case 'Send':
      return { _tag: 'Send', action: f(fx.action) }
    case 'Run': {
      const { body, onFailure } = fx
      return {
        _tag: 'Run',
        body: (sendB) => body((a) => sendB(f(a))),
        onFailure: onFailure === undefined ? undefined : (error) => f(onFailure(error)),
      }
    }
    case 'Merge':
      return { _tag: 'Merge', fxs: fx.fxs.map((child) => map(child, f)) }
    case 'Concat':
      return { _tag: 'Concat', fxs: fx.fxs.map((child) => map(child, f)) }
    case 'Cancellable':
      return { _tag: 'Cancellable', id: fx.id, cancelInFlight: fx.cancelInFlight, fx: map(fx.fx, f) }
    case 'Cancel':
      return { _tag: 'Cancel', ids: fx.ids }
    case 'Retire':
      return { _tag: 'Retire', identities: fx.identities }
    case 'Dismiss':
      return dismiss
    case 'Stop':
      return { _tag: 'Stop', fx: map(fx.fx, f) }
  }
}

export const scopedId = (identity: Identity, id: CancelId): CancelId => `${identity}/${id}`

export const matchesCancelId = (target: CancelId, id: CancelId): boolean => id === target || id.startsWith(`${target}/`)

export const isScopedTo = (identity: Identity, id: CancelId): boolean => id.split('/').includes(identity)

export type Cancellation = Extract<Fx<never>, { readonly _tag: 'Cancel' | 'Retire' }>

/**
 * Whether `cancellation` reaches the effect registered under `id`.
 */
export const cancels = (cancellation: Cancellation, id: CancelId): boolean =>
  cancellation._tag === 'Cancel'
    ? cancellation.ids.some((target) => matchesCancelId(target, id))
    : cancellation.identities.some((identity) => isScopedTo(identity, id))

const prefixIds = <A>(fx: Fx<A>, identity: Identity): Fx<A> => {
  switch (fx._tag) {
    case 'Merge':
      return { _tag: 'Merge', fxs: fx.fxs.map((child) => prefixIds(child, identity)) }
    case 'Concat':
      return { _tag: 'Concat', fxs: fx.fxs.map((child) => prefixIds(child, identity)) }
    case 'Cancellable':
      return {
        _tag: 'Cancellable',
        id: scopedId(identity, fx.id),
        cancelInFlight: fx.cancelInFlight,
        fx: prefixIds(fx.fx, identity),
      }
    case 'Cancel':
      return { _tag: 'Cancel', ids: fx.ids.map((id) => scopedId(identity, id)) }
    case 'Stop':
      return { _tag: 'Stop', fx: prefixIds(fx.fx, identity) }
    default:
      return fx
  }
}

/**
 * Tags an effect produced inside the case `identity`: its cancel ids are scoped below the identity and the whole
 * effect is cancellable by the identity itself.
 */
export const scopeCancellation = <A>(fx: Fx<A>, identity: Identity): Fx<A> =>
  isNone(fx) ? none : cancellable(prefixIds(fx, identity), identity)

/**
 * Splits off the cancellations that would run before any other work of `fx`. The store performs them while the
 * transition is still being committed.
 */
export const splitLeadingCancellations = <A>(
  fx: Fx<A>,
): { readonly cancellations: ReadonlyArray<Cancellation>; readonly rest: Fx<A> } => {
  switch (fx._tag) {
    case 'Cancel':
      return { cancellations: [{ _tag: 'Cancel', ids: fx.ids }], rest: none }
    case 'Retire':
      return { cancellations: [{ _tag: 'Retire', identities: fx.identities }], rest: none }
    case 'Stop':
      return splitLeadingCancellations(fx.fx)
    case 'Merge': {
      const parts = fx.fxs.map(splitLeadingCancellations)
      return {
        cancellations: parts.flatMap((part) => part.cancellations),
        rest: merge(...parts.map((part) => part.rest)),
      }
    }
    case 'Concat': {
      const cancellations: Array<Cancellation> = []
      let index = 0
      let head: Fx<A> = none
      while (index < fx.fxs.length) {
        const child = fx.fxs[index]
        index += 1
        if (child === undefined) continue
        const part = splitLeadingCancellations(child)
        cancellations.push(...part.cancellations)
        if (!isNone(part.rest)) {
          head = part.rest
          break
        }
      }
      return { cancellations, rest: concat(head, ...fx.fxs.slice(index)) }
    }
    default:
      return { cancellations: [], rest: fx }
  }
}

/**
 * Removes `dismiss` requests from the structural part of `fx`.
 */
export const extractDismiss = <A>(fx: Fx<A>): { readonly dismiss: boolean; readonly rest: Fx<A> } => {
  switch (fx._tag) {
    case 'Dismiss':
      return { dismiss: true, rest: none }
    case 'Merge':
    case 'Concat': {
      const parts = fx.fxs.map(extractDismiss)
      const rest = parts.map((part) => part.rest)
      return {
        dismiss: parts.some((part) => part.dismiss),
        rest: fx._tag === 'Merge' ? merge(...rest) : concat(...rest),
      }
    }
    case 'Stop': {
      const part = extractDismiss(fx.fx)
      return { dismiss: part.dismiss, rest: stopPropagation(part.rest) }
    }
    case 'Cancellable': {
      const part = extractDismiss(fx.fx)
      return { dismiss: part.dismiss, rest: cancellable(part.rest, fx.id, { cancelInFlight: fx.cancelInFlight }) }
    }
    default:
      return { dismiss: false, rest: fx }
  }
}
