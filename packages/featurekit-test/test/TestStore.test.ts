import { describe, expect, it } from '@effect/vitest'
import { Effect, Schema, TestClock } from 'effect'
import { Feature, Fx, ObservableState } from '@featurekit/core'
import { TestStore, waitUntil } from '../src/index.js'
import { Catalog, Item, dismissSheet, itemSheet, makeCatalog, toItem } from './fixtures/catalog.js'

const TallyState = ObservableState.Struct('TallyState', { total: Schema.Number })

const Tally = Feature.make('Tally', {
  state: TallyState,
  actions: { add: Schema.Number, reset: Schema.Void },
  reducer: ($) =>
    $.reduce((state, action) => {
      switch (action._tag) {
        case 'add':
          state.total += action.payload
          return Fx.none
        case 'reset':
          state.total = 0
          return Fx.none
      }
    }),
})

const idle = (test: { readonly store: { readonly inFlight: () => number } }) =>
  waitUntil(Effect.suspend(() => (test.store.inFlight() === 0 ? Effect.void : Effect.fail('busy'))))

describe('TestStore', () => {
  it.scoped('checks every sent action against its expected state', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Tally, Tally.initial({ total: 0 }))

      yield* test.send(Tally.actions.add(2), (draft) => {
        draft.total = 2
      })
      yield* test.send(Tally.actions.add(3), (draft) => {
        draft.total = 5
      })
      expect(test.state()).toEqual({ total: 5 })
      yield* test.finish()
    }),
  )

  it.scoped('fails when the state does not match the expectation', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Tally, Tally.initial({ total: 0 }))

      const error = yield* Effect.flip(
        test.send(Tally.actions.add(1), (draft) => {
          draft.total = 2
        }),
      )
      expect(error._tag).toBe('TestStoreError')
      expect(error.message.split('\n')[0]).toBe('State after "add" does not match the expectation.')
      expect([error.expected, error.actual]).toEqual([{ total: 2 }, { total: 1 }])
    }),
  )

  it.scoped('requires an unchanged state when no expectation is given', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Tally, Tally.initial({ total: 4 }))

      const error = yield* Effect.flip(test.send(Tally.actions.reset()))
      expect([error.expected, error.actual]).toEqual([{ total: 4 }, { total: 0 }])
    }),
  )

  it.scoped('receives the actions of effects', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(1), (draft) => {
        draft.sheet = itemSheet(1, '', 0)
        draft.visits = 1
      })
      yield* test.send(toItem(Item.actions.reload()))
      yield* TestClock.adjust('1 second')
      yield* test.receive(toItem(Item.actions.reloaded('item-1')), (draft) => {
        draft.sheet = itemSheet(1, 'item-1', 1)
      })
      yield* test.finish()
    }),
  )

  it.scoped('matches received actions with a predicate', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(2), (draft) => {
        draft.sheet = itemSheet(2, '', 0)
        draft.visits = 1
      })
      yield* test.send(toItem(Item.actions.reload()))
      yield* TestClock.adjust('1 second')
      yield* test.receive(
        (action) => action._tag === 'sheet',
        (draft) => {
          draft.sheet = itemSheet(2, 'item-2', 1)
        },
      )
      yield* test.finish()
    }),
  )

  it.scoped('fails to receive an action that does not match', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(1), (draft) => {
        draft.sheet = itemSheet(1, '', 0)
        draft.visits = 1
      })
      yield* test.send(toItem(Item.actions.reload()))
      yield* TestClock.adjust('1 second')

      const error = yield* Effect.flip(test.receive(toItem(Item.actions.reloaded('other'))))
      expect(error.message.split('\n')[0]).toBe('Received "sheet", which does not match the expected action.')
    }),
  )

  it.scoped('fails to receive when no action arrives', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Tally, Tally.initial({ total: 0 }))

      const error = yield* Effect.flip(test.receive(Tally.actions.reset(), undefined, { maxAttempts: 2 }))
      expect(error.message).toBe('Expected to receive an action, but none arrived.')
    }),
  )

  it.scoped('refuses to send while received actions are unhandled', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(1), (draft) => {
        draft.sheet = itemSheet(1, '', 0)
        draft.visits = 1
      })
      yield* test.send(toItem(Item.actions.reload()))
      yield* TestClock.adjust('1 second')
      yield* idle(test)

      const error = yield* Effect.flip(test.send(dismissSheet()))
      expect(error.message).toBe('Before sending "sheet": 1 received action(s) were not handled: sheet')
    }),
  )

  it.scoped('reports unhandled received actions at finish', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(1), (draft) => {
        draft.sheet = itemSheet(1, '', 0)
        draft.visits = 1
      })
      yield* test.send(toItem(Item.actions.reload()))
      yield* TestClock.adjust('1 second')

      const error = yield* Effect.flip(test.finish())
      expect(error.message).toBe('At finish: 1 received action(s) were not handled: sheet')
    }),
  )

  it.scoped('skips received actions and continues from their state', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(1), (draft) => {
        draft.sheet = itemSheet(1, '', 0)
        draft.visits = 1
      })
      yield* test.send(toItem(Item.actions.reload()))
      yield* TestClock.adjust('1 second')
      yield* idle(test)
      yield* test.skipReceived()

      yield* test.send(toItem(Item.actions.rename('renamed')), (draft) => {
        draft.sheet = itemSheet(1, 'renamed', 1)
      })
      yield* test.finish()
    }),
  )
})
