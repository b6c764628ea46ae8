import { Cause, Effect, Fiber, Option, PubSub, Runtime, Stream, SubscriptionRef } from 'effect'
import type { Queue, Scope } from 'effect'
import * as Config from './Config.js'
import * as Fx from './Fx.js'
import * as ObservableState from './ObservableState.js'
import * as Observation from './Observation.js'
import * as Reducer from './Reducer.js'
import { isTagged } from './internal/action.js'
import { isDevEnv } from './internal/env.js'
import * as Debug from './internal/runtime/DebugSink.js'
import { toSerializableErrorSummary } from './internal/runtime/errorSummary.js'
import { isMarkedViewAction } from './internal/runtime/viewAction.js'
import { holdsIdentity, snapshotValue } from './internal/state/values.js'

export interface StoreOptions {
  /**
   * Overrides the label of the `StoreConfig` service for this store.
   */
  readonly label?: string
  /**
   * Tag of the parent action that wraps view actions. Sending such an action without `ViewAction.sender` is
   * reported in dev.
   */
  readonly viewActionTag?: string
}

/**
 * Where a committed action came from: the outside (`send`/`dispatch`) or an effect of an earlier transition.
 */
export type Origin = 'send' | 'effect'

export interface Commit<S, A> {
  readonly action: A
  readonly origin: Origin
  readonly state: S
  readonly diagnostics: ReadonlyArray<Reducer.Diagnostic>
}

export interface Store<S, A> {
  readonly id: string
  readonly label: string | undefined
  /**
   * Reduces `action` against the committed state, commits the result and starts its effects. Transitions are
   * serialized; the returned effect completes once the transition is committed, not when its effects finish.
   */
  readonly dispatch: (action: A) => Effect.Effect<void>
  /**
   * Fire-and-forget `dispatch`.
   */
  readonly send: (action: A) => void
  readonly getState: Effect.Effect<S>
  readonly current: () => S
  /**
   * The committed state, then every state committed afterwards.
   */
  readonly changes: Stream.Stream<S>
  /**
   * Every transition committed after subscribing, in commit order.
   */
  readonly commits: Effect.Effect<Queue.Dequeue<Commit<S, A>>, never, Scope.Scope>
  /**
   * Runs `apply` on the committed state with an ambient observer; `onChange` fires once, before the first
   * later write to a field `apply` read.
   */
  readonly observe: <X>(
    apply: (state: S) => X,
    onChange: () => void,
  ) => { readonly value: X; readonly observer: Observation.Observer }
  /**
   * Persistent subscription to the writes of field `key` of the observable value `select` picks from the committed
   * state. A value that is not observable yields a subscription that never fires.
   */
  readonly subscribe: (
    select: (state: S) => unknown,
    key: Observation.FieldKey,
    listener: Observation.ChangeListener,
  ) => () => void
  /**
   * Number of transitions whose effects are still running.
   */
  readonly inFlight: () => number
}

interface Guard {
  closed: boolean
}

interface Registration {
  readonly id: Fx.CancelId
  readonly guard: Guard
  fiber: Fiber.RuntimeFiber<void> | undefined
}

type CancellableFx<A> = Extract<Fx.Fx<A>, { readonly _tag: 'Cancellable' }>

const collectCancellables = <A>(fx: Fx.Fx<A>, out: Array<CancellableFx<A>>): void => {
  switch (fx._tag) {
    case 'Merge':
    case 'Concat':
      for (const child of fx.fxs) collectCancellables(child, out)
      return
    case 'Stop':
      collectCancellables(fx.fx, out)
      return
    case 'Cancellable':
      out.push(fx)
      collectCancellables(fx.fx, out)
      return
    default:
      return
  }
}

let storeSeq = 0

/**
 * Creates a store over `source` (a feature or a bare reducer) holding `initial`. Effects run as fibers of the
 * surrounding scope; closing it interrupts them.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const store = yield* Store.make(Counter, Counter.initial({ count: 0 }))
 *   yield* store.dispatch(Counter.actions.increment())
 *   return store.current().count
 * })
 * ```
 */
export const make = <S, A>(
  source: Reducer.Source<S, A>,
  initial: S,
  options?: StoreOptions,
): Effect.Effect<Store<S, A>, never, Scope.Scope> =>
  Effect.gen(function* () {
    const config = yield* Config.current
    const label = options?.label ?? config.label
    storeSeq += 1
    const id = `store-${storeSeq}`
    const base = label === undefined ? { storeId: id } : { storeId: id, label }
    const verbose = config.diagnostics !== 'off'
    const full = config.diagnostics === 'full'

    const reducer = Reducer.from(source)
    const runtime = yield* Effect.runtime<never>()
    const scope = yield* Effect.scope
    const semaphore = yield* Effect.makeSemaphore(1)
    const stateRef = yield* SubscriptionRef.make(initial)
    const commitHub = yield* PubSub.unbounded<Commit<S, A>>()

    let committed = initial
    let tasks = 0
    const registry = new Set<Registration>()

    const tagOf = (action: A): string | undefined => (isTagged(action) ? action._tag : undefined)

    const recordDiagnostic = (diagnostic: Reducer.Diagnostic): Effect.Effect<void> =>
      verbose || diagnostic.severity === 'error' ? Debug.record({ type: 'diagnostic', ...base, ...diagnostic }) : Effect.void

    const reportUnhandled = (cause: Cause.Cause<unknown>): Effect.Effect<void> => {
      const summary = toSerializableErrorSummary(cause)
      return Effect.zipRight(
        recordDiagnostic({
          code: 'fx::unhandled_failure',
          severity: 'error',
          message: summary.message,
          hint: summary.hint ?? 'Pass onFailure to Fx.run to turn the failure into an action.',
        }),
        Debug.record({ type: 'lifecycle:error', ...base, phase: 'effect', cause }),
      )
    }

    // Marks the matching registrations closed right away; the fibers are interrupted without waiting, since the
    // fiber asking for the cancellation can be one of them.
    const cancel = (cancellations: ReadonlyArray<Fx.Cancellation>): Effect.Effect<void> =>
      Effect.suspend(() => {
        if (cancellations.length === 0) return Effect.void
        const fibers: Array<Fiber.RuntimeFiber<void>> = []
        for (const entry of Array.from(registry)) {
          if (!cancellations.some((cancellation) => Fx.cancels(cancellation, entry.id))) continue
          entry.guard.closed = true
          registry.delete(entry)
          if (entry.fiber !== undefined) fibers.push(entry.fiber)
        }
        return Effect.forEach(fibers, (fiber) => Fiber.interruptFork(fiber), { discard: true })
      })

    const deliver = (action: A, guards: ReadonlyArray<Guard>): Effect.Effect<void> =>
      Effect.suspend(() =>
        guards.some((guard) => guard.closed)
          ? recordDiagnostic({
              code: 'fx::delivery_after_cancel',
              severity: 'info',
              message: 'An effect delivered an action after it was cancelled; the action was dropped.',
              actionTag: tagOf(action),
            })
          : dispatchFrom(action, 'effect'),
      )

    const runBody = (fx: Extract<Fx.Fx<A>, { readonly _tag: 'Run' }>, guards: ReadonlyArray<Guard>) => {
      const { onFailure } = fx
      return Effect.suspend(() => fx.body((action) => deliver(action, guards))).pipe(
        Effect.catchAllCause((cause) => {
          if (Cause.isInterruptedOnly(cause)) return Effect.void
          const failure = Cause.failureOption(cause)
          if (onFailure !== undefined && Option.isSome(failure)) return deliver(onFailure(failure.value), guards)
          return reportUnhandled(cause)
        }),
      )
    }

    type Armed = ReadonlyMap<CancellableFx<A>, Registration>

    // Registers every cancellable of a task while its transition still holds the lock, so a cancellation sent
    // before a fiber starts still reaches it.
    const arm = (fx: Fx.Fx<A>): Effect.Effect<Armed> =>
      Effect.gen(function* () {
        const nodes: Array<CancellableFx<A>> = []
        collectCancellables(fx, nodes)
        const armed = new Map<CancellableFx<A>, Registration>()
        for (const node of nodes) {
          if (node.cancelInFlight) yield* cancel([{ _tag: 'Cancel', ids: [node.id] }])
          const entry: Registration = { id: node.id, guard: { closed: false }, fiber: undefined }
          registry.add(entry)
          armed.set(node, entry)
        }
        return armed
      })

    const runCancellable = (fx: CancellableFx<A>, armed: Armed, guards: ReadonlyArray<Guard>) =>
      Effect.gen(function* () {
        const entry = armed.get(fx)
        if (entry === undefined || entry.guard.closed) return
        const fiber = yield* Effect.fork(interpret(fx.fx, armed, [...guards, entry.guard]))
        entry.fiber = fiber
        if (entry.guard.closed) yield* Fiber.interruptFork(fiber)
        yield* Fiber.await(fiber).pipe(
          Effect.ensuring(
            Effect.sync(() => {
              registry.delete(entry)
            }),
          ),
        )
      })

    const interpret = (fx: Fx.Fx<A>, armed: Armed, guards: ReadonlyArray<Guard>): Effect.Effect<void> => {
      switch (fx._tag) {
        case 'None':
        case 'Dismiss':
          return Effect.void
        case 'Send':
          return deliver(fx.action, guards)
        case 'Run':
          return runBody(fx, guards)
        case 'Merge':
          return Effect.forEach(fx.fxs, (child) => interpret(child, armed, guards), {
            concurrency: 'unbounded',
            discard: true,
          })
        case 'Concat':
          return Effect.forEach(fx.fxs, (child) => interpret(child, armed, guards), { discard: true })
        case 'Cancellable':
          return runCancellable(fx, armed, guards)
        case 'Cancel':
        case 'Retire':
          return cancel([fx])
        case 'Stop':
          return interpret(fx.fx, armed, guards)
      }
    }

    // Transitions run uninterruptibly; the effects they start must stay interruptible to be cancellable.
    const start = (fx: Fx.Fx<A>): Effect.Effect<void> =>
      Effect.gen(function* () {
        const armed = yield* arm(fx)
        tasks += 1
        yield* Effect.forkIn(
          Effect.interruptible(interpret(fx, armed, [])).pipe(
            Effect.ensuring(
              Effect.sync(() => {
                tasks -= 1
                for (const entry of armed.values()) registry.delete(entry)
              }),
            ),
          ),
          scope,
        )
      })

    const transition = (action: A, origin: Origin): Effect.Effect<void> =>
      Effect.gen(function* () {
        if (verbose) {
          yield* Debug.record({
            type: 'action:dispatch',
            ...base,
            actionTag: tagOf(action),
            ...(full ? { action } : {}),
          })
        }

        const result = Reducer.run(reducer, committed, action)
        const { cancellations, rest } = Fx.splitLeadingCancellations(result.fx)
        yield* cancel(cancellations)

        committed = result.state
        yield* SubscriptionRef.set(stateRef, result.state)
        yield* Effect.forEach(result.diagnostics, recordDiagnostic, { discard: true })
        if (verbose) {
          yield* Debug.record({
            type: 'state:update',
            ...base,
            ...(full ? { state: snapshotValue(result.state) } : {}),
          })
        }
        yield* PubSub.publish(commitHub, { action, origin, state: result.state, diagnostics: result.diagnostics })

        if (!Fx.isNone(rest)) yield* start(rest)
      })

    const dispatchFrom = (action: A, origin: Origin): Effect.Effect<void> =>
      semaphore.withPermits(1)(Effect.uninterruptible(transition(action, origin)))

    const checkViewAction = (action: A): Effect.Effect<void> => {
      const viewTag = options?.viewActionTag
      if (viewTag === undefined || !isDevEnv() || tagOf(action) !== viewTag || isMarkedViewAction(action)) {
        return Effect.void
      }
      return recordDiagnostic({
        code: 'view_action::direct_send',
        severity: 'warning',
        message: `Action "${viewTag}" wraps a view action but was sent directly.`,
        hint: 'Send view actions through ViewAction.sender(store, token).',
        actionTag: viewTag,
      })
    }

    const dispatch = (action: A): Effect.Effect<void> => Effect.zipRight(checkViewAction(action), dispatchFrom(action, 'send'))

    const registrar = Option.getOrElse(ObservableState.registrarOf(initial), () => Observation.defaultRegistrar)
    // Stores share a registrar; each records the diagnostics about its own state.
    const stopDiagnostics = registrar.onDiagnostic((diagnostic) => {
      if (!holdsIdentity(committed, diagnostic.identity)) return
      Runtime.runFork(runtime)(
        recordDiagnostic({
          code: diagnostic.code,
          severity: diagnostic.code === 'observation::callback_failure' ? 'error' : 'warning',
          message: diagnostic.message,
        }),
      )
    })

    yield* Effect.addFinalizer(() =>
      Effect.gen(function* () {
        stopDiagnostics()
        registry.clear()
        yield* PubSub.shutdown(commitHub)
        if (verbose) yield* Debug.record({ type: 'store:destroy', ...base })
      }),
    )
    if (verbose) yield* Debug.record({ type: 'store:init', ...base })

    const store: Store<S, A> = {
      id,
      label,
      dispatch,
      send: (action) => {
        Runtime.runFork(runtime)(
          dispatch(action).pipe(
            Effect.catchAllCause((cause) => Debug.record({ type: 'lifecycle:error', ...base, phase: 'effect', cause })),
          ),
        )
      },
      getState: Effect.sync(() => committed),
      current: () => committed,
      changes: stateRef.changes,
      commits: PubSub.subscribe(commitHub),
      observe: (apply, onChange) => Observation.observe(() => apply(committed), onChange),
      subscribe: (select, key, listener) => {
        const target = select(committed)
        return Option.match(ObservableState.identityOf(target), {
          onNone: () => () => undefined,
          onSome: (identity) =>
            Option.getOrElse(ObservableState.registrarOf(target), () => Observation.defaultRegistrar).subscribe(
              identity,
              key,
              listener,
            ),
        })
      },
      inFlight: () => tasks,
    }
    return store
  })
