import { Option } from 'effect'
import * as Fx from './Fx.js'
import type { Identity } from './Identity.js'
import * as Transition from './internal/reducer/transition.js'
import { copyValue } from './internal/state/values.js'

/**
 * Transition function of a feature. `reduce` mutates the state it is given (always a copy owned by the running
 * transition) and describes the follow-up work as an `Fx`.
 */
export interface Reducer<S, A> {
  reduce(state: S, action: A): Fx.Fx<A>
}

export type Diagnostic = Transition.Diagnostic

/**
 * A reducer, or anything carrying one (a feature).
 */
export type Source<S, A> = Reducer<S, A> | { readonly reducer: Reducer<S, A> }

export const from = <S, A>(source: Source<S, A>): Reducer<S, A> => ('reduce' in source ? source : source.reducer)

export const make = <S, A>(reduce: (state: S, action: A) => Fx.Fx<A>): Reducer<S, A> => ({ reduce })

export const empty = <S, A>(): Reducer<S, A> => make(() => Fx.none)

/**
 * Runs `reducers` in order against the same state and merges their effects in that order. A reducer returning
 * `Fx.stopPropagation(...)` ends the run; the stop does not leak out of this combination.
 */
export const combine = <S, A>(...reducers: ReadonlyArray<Reducer<S, A>>): Reducer<S, A> =>
  make((state, action) => {
    const fxs: Array<Fx.Fx<A>> = []
    for (const reducer of reducers) {
      const fx = reducer.reduce(state, action)
      fxs.push(Fx.unwrapStop(fx))
      if (Fx.isStopped(fx)) break
    }
    return Fx.merge(...fxs)
  })

export interface ScopeOptions<S, A, CS, CA> {
  /**
   * The child's state inside the parent, mutated in place by the child.
   */
  readonly get: (state: S) => CS
  readonly extract: (action: A) => Option.Option<CA>
  readonly embed: (childAction: CA) => A
}

/**
 * Routes the actions `extract` recognises to `child`, running it on its slice of the parent state. Other actions
 * are ignored. The child's effects are mapped back with `embed`.
 */
export const scope = <S, A, CS, CA>(options: ScopeOptions<S, A, CS, CA>, child: Reducer<CS, CA>): Reducer<S, A> =>
  make((state, action) => {
    const childAction = options.extract(action)
    if (Option.isNone(childAction)) return Fx.none
    return Fx.map(Fx.unwrapStop(child.reduce(options.get(state), childAction.value)), options.embed)
  })

export interface RunResult<S, A> {
  readonly state: S
  /**
   * Starts with the cancellation of every identity retired by the transition.
   */
  readonly fx: Fx.Fx<A>
  readonly diagnostics: ReadonlyArray<Diagnostic>
  readonly retired: ReadonlyArray<Identity>
}

/**
 * Pure form of a transition: runs `reducer` on a copy of `state` (the input is left untouched) and returns the new
 * state, its effects and the diagnostics raised while reducing.
 */
export const run = <S, A>(reducer: Reducer<S, A>, state: S, action: A): RunResult<S, A> => {
  const next = copyValue(state)
  const { value, diagnostics, retired } = Transition.collect(() => reducer.reduce(next, action))
  const fx = retired.length === 0 ? value : Fx.concat(Fx.retire(...retired), value)
  return { state: next, fx, diagnostics, retired }
}
