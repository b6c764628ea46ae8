import { Effect, Equal, Queue, Utils } from 'effect'
import type { Scope } from 'effect'
import { create, type Draft } from 'mutative'
import { ObservableState, Store, type Reducer } from '@featurekit/core'
import { waitUntil, type WaitUntilOptions } from './utils/waitUntil.js'

export class TestStoreError extends Error {
  readonly _tag = 'TestStoreError' as const

  constructor(
    message: string,
    readonly expected?: unknown,
    readonly actual?: unknown,
  ) {
    super(message)
    this.name = 'TestStoreError'
  }
}

/**
 * Describes the expected state change as a mutation of a plain copy of the state before the action.
 */
export type Expectation<S> = (draft: Draft<S>) => void

export type ActionMatch<A> = A | ((action: A) => boolean)

export interface TestStore<S, A> {
  readonly store: Store.Store<S, A>
  /**
   * Plain snapshot of the committed state.
   */
  readonly state: () => S
  /**
   * Every diagnostic raised by the transitions consumed so far.
   */
  readonly diagnostics: () => ReadonlyArray<Reducer.Diagnostic>
  /**
   * Sends `action` and checks the resulting state. Without `expect` the state must be unchanged. Fails while actions
   * produced by effects are still waiting to be received.
   */
  readonly send: (action: A, expect?: Expectation<S>) => Effect.Effect<void, TestStoreError>
  /**
   * Waits for the next action produced by an effect, checks it against `match` and checks the state it produced.
   */
  readonly receive: (
    match: ActionMatch<A>,
    expect?: Expectation<S>,
    options?: WaitUntilOptions,
  ) => Effect.Effect<void, TestStoreError>
  /**
   * Drops received actions without checking them; all of them when `count` is omitted.
   */
  readonly skipReceived: (count?: number) => Effect.Effect<void>
  /**
   * Waits for every effect to finish, then fails if any received action was left unchecked.
   */
  readonly finish: (options?: WaitUntilOptions) => Effect.Effect<void, TestStoreError>
}

const structurallyEqual = (a: unknown, b: unknown): boolean => Utils.structuralRegion(() => Equal.equals(a, b))

const tagOf = (action: unknown): string =>
  typeof action === 'object' && action !== null && '_tag' in action && typeof action._tag === 'string'
    ? action._tag
    : String(action)

const render = (value: unknown): string => JSON.stringify(value, null, 2)

/**
 * Drives a store step by step: every transition is checked in commit order, the ones started by effects through
 * `receive`. Meant to run inside `it.effect`/`it.scoped`, where waiting advances the TestClock.
 *
 * @example
 * ```ts
 * it.scoped('increments', () =>
 *   Effect.gen(function* () {
 *     const test = yield* TestStore.make(Counter, Counter.initial({ count: 0 }))
 *     yield* test.send(Counter.actions.increment(), (draft) => {
 *       draft.count = 1
 *     })
 *     yield* test.finish()
 *   }),
 * )
 * ```
 */
export const make = <S, A>(
  source: Reducer.Source<S, A>,
  initial: S,
  options?: Store.StoreOptions,
): Effect.Effect<TestStore<S, A>, never, Scope.Scope> =>
  Effect.gen(function* () {
    const store = yield* Store.make(source, initial, options)
    const commits = yield* store.commits

    const received: Array<Store.Commit<S, A>> = []
    const diagnostics: Array<Reducer.Diagnostic> = []
    let expectedBase = ObservableState.snapshot(initial)

    const drain = Effect.map(Queue.takeAll(commits), (chunk) => {
      for (const commit of chunk) received.push(commit)
    })

    const requireNoReceived = (context: string): Effect.Effect<void, TestStoreError> =>
      received.length === 0
        ? Effect.void
        : Effect.fail(
            new TestStoreError(
              `${context}: ${received.length} received action(s) were not handled: ${received
                .map((commit) => tagOf(commit.action))
                .join(', ')}`,
            ),
          )

    const check = (commit: Store.Commit<S, A>, expect: Expectation<S> | undefined): Effect.Effect<void, TestStoreError> =>
      Effect.suspend(() => {
        diagnostics.push(...commit.diagnostics)
        const expected = expect === undefined ? expectedBase : create(expectedBase, expect)
        const actual = ObservableState.snapshot(commit.state)
        expectedBase = actual
        if (structurallyEqual(expected, actual)) return Effect.void
        return Effect.fail(
          new TestStoreError(
            `State after "${tagOf(commit.action)}" does not match the expectation.\nexpected: ${render(expected)}\nactual: ${render(actual)}`,
            expected,
            actual,
          ),
        )
      })

    const send = (action: A, expect?: Expectation<S>): Effect.Effect<void, TestStoreError> =>
      Effect.gen(function* () {
        yield* drain
        yield* requireNoReceived(`Before sending "${tagOf(action)}"`)
        yield* store.dispatch(action)

        let commit = yield* Queue.take(commits)
        while (commit.origin !== 'send') {
          received.push(commit)
          commit = yield* Queue.take(commits)
        }
        yield* requireNoReceived(`Before sending "${tagOf(action)}"`)
        yield* check(commit, expect)
      })

    const isPredicate = (match: ActionMatch<A>): match is (action: A) => boolean => typeof match === 'function'

    const matches = (match: ActionMatch<A>, action: A): boolean =>
      isPredicate(match) ? match(action) : structurallyEqual(match, action)

    const receive = (
      match: ActionMatch<A>,
      expect?: Expectation<S>,
      waitOptions?: WaitUntilOptions,
    ): Effect.Effect<void, TestStoreError> =>
      Effect.gen(function* () {
        const next = yield* waitUntil(
          Effect.flatMap(drain, () => {
            const head = received.shift()
            return head === undefined
              ? Effect.fail(new TestStoreError('Expected to receive an action, but none arrived.'))
              : Effect.succeed(head)
          }),
          waitOptions,
        )
        if (!matches(match, next.action)) {
          return yield* Effect.fail(
            new TestStoreError(
              `Received "${tagOf(next.action)}", which does not match the expected action.\nreceived: ${render(next.action)}`,
              match,
              next.action,
            ),
          )
        }
        yield* check(next, expect)
      })

    const skipReceived = (count?: number): Effect.Effect<void> =>
      Effect.map(drain, () => {
        const skipped = received.splice(0, count ?? received.length)
        const last = skipped[skipped.length - 1]
        for (const commit of skipped) diagnostics.push(...commit.diagnostics)
        if (last !== undefined) expectedBase = ObservableState.snapshot(last.state)
      })

    const finish = (waitOptions?: WaitUntilOptions): Effect.Effect<void, TestStoreError> =>
      Effect.gen(function* () {
        yield* waitUntil(
          Effect.suspend(() =>
            store.inFlight() === 0
              ? Effect.void
              : Effect.fail(new TestStoreError(`${store.inFlight()} effect(s) are still running.`)),
          ),
          waitOptions,
        )
        yield* drain
        yield* requireNoReceived('At finish')
      })

    const testStore: TestStore<S, A> = {
      store,
      state: () => ObservableState.snapshot(store.current()),
      diagnostics: () => diagnostics.slice(),
      send,
      receive,
      skipReceived,
      finish,
    }
    return testStore
  })
