import { describe, expect, it } from '@effect/vitest'
import { Effect, Option, TestClock } from 'effect'
import { Identity, Presentation, Reducer } from '@featurekit/core'
import { TestStore } from '../src/index.js'
import { Catalog, Item, Sheet, dismissSheet, itemSheet, makeCatalog, toItem } from './fixtures/catalog.js'

describe('catalog scenarios', () => {
  it.scoped('none, detail, none, then a stale reload result', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(7), (draft) => {
        draft.sheet = itemSheet(7, '', 0)
        draft.visits = 1
      })
      const opened = Option.getOrThrow(Identity.identityOf(test.store.current().sheet))

      yield* test.send(toItem(Item.actions.reload()))
      expect(test.store.inFlight()).toBe(1)

      const before = test.store.current()
      yield* test.send(dismissSheet(), (draft) => {
        draft.sheet = undefined
      })
      expect(Reducer.run(Catalog.reducer, before, dismissSheet()).retired).toEqual([opened])

      yield* TestClock.adjust('5 seconds')
      yield* test.finish()

      // What a reload started before the dismissal would have delivered.
      yield* test.send(toItem(Item.actions.reloaded('item-7')))
      expect(test.diagnostics().map((diagnostic) => diagnostic.code)).toEqual(['presentation::absent'])
    }),
  )

  it.scoped('routes only to the live case', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(1), (draft) => {
        draft.sheet = itemSheet(1, '', 0)
        draft.visits = 1
      })
      yield* test.send(Catalog.actions.toast('Saved'), (draft) => {
        draft.sheet = { _tag: 'toast', payload: 'Saved' }
      })
      yield* test.send(toItem(Item.actions.rename('late')))

      expect(test.diagnostics().map((diagnostic) => diagnostic.code)).toEqual(['case::inactive'])
      yield* test.finish()
    }),
  )

  it.scoped('dismisses a toast after its action', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.toast('Saved'), (draft) => {
        draft.sheet = { _tag: 'toast', payload: 'Saved' }
      })
      yield* test.send(Catalog.actions.sheet(Presentation.presented(Sheet.action('toast', 'dismissed'))), (draft) => {
        draft.sheet = undefined
      })
      yield* test.finish()
    }),
  )

  it.scoped('leaves an archived case alone', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.archive(3), (draft) => {
        draft.sheet = { _tag: 'archived', payload: 3 }
      })
      const archived = test.store.current().sheet
      yield* test.send(toItem(Item.actions.rename('x')))

      expect(test.store.current().sheet).toBe(archived)
      expect(test.diagnostics().map((diagnostic) => diagnostic.code)).toEqual(['case::inactive'])
    }),
  )

  it.scoped('closes from inside the child and cancels its reload', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(4), (draft) => {
        draft.sheet = itemSheet(4, '', 0)
        draft.visits = 1
      })
      yield* test.send(toItem(Item.actions.reload()))
      yield* test.send(toItem(Item.actions.close()), (draft) => {
        draft.sheet = undefined
      })
      yield* TestClock.adjust('2 seconds')
      yield* test.finish()
    }),
  )

  it.scoped('a reopened item starts from a fresh identity', () =>
    Effect.gen(function* () {
      const test = yield* TestStore.make(Catalog, makeCatalog())

      yield* test.send(Catalog.actions.open(1), (draft) => {
        draft.sheet = itemSheet(1, '', 0)
        draft.visits = 1
      })
      const first = Identity.identityOf(test.store.current().sheet)
      yield* test.send(toItem(Item.actions.reload()))
      yield* test.send(Catalog.actions.open(1), (draft) => {
        draft.visits = 2
      })
      const second = Identity.identityOf(test.store.current().sheet)

      expect(Option.isSome(first) && Option.isSome(second) && first.value !== second.value).toBe(true)
      yield* TestClock.adjust('2 seconds')
      yield* test.finish()
    }),
  )
})
