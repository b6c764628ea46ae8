import { describe, expect, it } from '@effect/vitest'
import { Chunk, Effect, Option, Queue, Schema, Stream, TestClock } from 'effect'
import { Config, Debug, Feature, Fx, ObservableState, Presentation, Reducer, Store, ViewAction } from '../src/index.js'
import {
  Counter,
  Detail,
  dismissDestination,
  makeInventory,
  Inventory,
  InventoryState,
  toDetail,
} from './fixtures/features.js'

const settle = (store: { readonly inFlight: () => number }) =>
  Effect.gen(function* () {
    while (store.inFlight() > 0) yield* Effect.yieldNow()
  })

const drain = <A>(queue: Queue.Dequeue<A>) => Effect.map(Queue.takeAll(queue), Chunk.toReadonlyArray)

const Ticker = ObservableState.Struct('Ticker', { ticks: Schema.Number, failures: Schema.Number })

type TickerAction = 'start' | 'stop' | 'tick' | 'fail' | 'failed' | 'crash'

const ticker = Reducer.make<ObservableState.Type<typeof Ticker>, TickerAction>((state, action) => {
  switch (action) {
    case 'start':
      return Fx.cancellable(
        Fx.run<TickerAction>((send) => Effect.uninterruptible(Effect.zipRight(Effect.sleep('1 second'), send('tick')))),
        'timer',
      )
    case 'stop':
      return Fx.cancel('timer')
    case 'tick':
      state.ticks += 1
      return Fx.none
    case 'fail':
      return Fx.run<TickerAction>(() => Effect.fail('boom'), { onFailure: () => 'failed' })
    case 'failed':
      state.failures += 1
      return Fx.none
    case 'crash':
      return Fx.run<TickerAction>(() => Effect.fail('boom'))
  }
})

const makeTicker = () => Ticker.make({ ticks: 0, failures: 0 })

const ShelfState = ObservableState.Struct('ShelfState', { inventory: Schema.UndefinedOr(InventoryState.schema) })

/**
 * Hosts a whole inventory, so its destination sits two presentations deep.
 */
const Shelf = Feature.make('Shelf', {
  state: ShelfState,
  actions: { inventory: Presentation.actionSchema(Inventory.actionSchema) },
  reducer: ($) => $.combine($.ifLet('inventory', 'inventory', Inventory)),
})

const toShelf = (action: Schema.Schema.Type<typeof Inventory.actionSchema>) =>
  Shelf.actions.inventory(Presentation.presented(action))

describe('Store', () => {
  it.scoped('commits dispatched actions in order', () =>
    Effect.gen(function* () {
      const store = yield* Store.make(Counter, Counter.initial({ count: 0 }))
      const commits = yield* store.commits

      yield* store.dispatch(Counter.actions.increment())
      yield* store.dispatch(Counter.actions.set(10))

      const [first, second] = yield* drain(commits)
      expect([first?.action, first?.origin, first?.state.count]).toEqual([Counter.actions.increment(), 'send', 1])
      expect([second?.action, second?.origin, second?.state.count]).toEqual([Counter.actions.set(10), 'send', 10])
      expect(store.current().count).toBe(10)
      expect((yield* store.getState).count).toBe(10)
    }),
  )

  it.scoped('starts the changes stream with the committed state', () =>
    Effect.gen(function* () {
      const store = yield* Store.make(Counter, Counter.initial({ count: 4 }))
      const head = yield* Stream.runHead(store.changes)
      expect(Option.map(head, (state) => state.count)).toEqual(Option.some(4))
    }),
  )

  it.scoped('feeds the actions of effects back into the store', () =>
    Effect.gen(function* () {
      const store = yield* Store.make(Inventory, makeInventory())
      const commits = yield* store.commits

      yield* store.dispatch(Inventory.actions.open(1))
      yield* store.dispatch(toDetail(Detail.actions.refresh()))
      expect(store.inFlight()).toBe(1)

      yield* TestClock.adjust('1 second')
      yield* settle(store)

      const received = yield* drain(commits)
      expect(received.map((commit) => commit.origin)).toEqual(['send', 'send', 'effect'])
      expect(received[2]?.action).toEqual(toDetail(Detail.actions.refreshed('fresh-1')))
      const destination = store.current().destination
      expect(destination?._tag === 'detail' ? [destination.payload.text, destination.payload.loads] : []).toEqual([
        'fresh-1',
        1,
      ])
    }),
  )

  it.scoped('cancels the effects of a dismissed child', () =>
    Effect.gen(function* () {
      const store = yield* Store.make(Inventory, makeInventory())
      const commits = yield* store.commits

      yield* store.dispatch(Inventory.actions.open(1))
      yield* store.dispatch(toDetail(Detail.actions.refresh()))
      yield* store.dispatch(dismissDestination())
      yield* TestClock.adjust('2 seconds')
      yield* settle(store)

      const received = yield* drain(commits)
      expect(received.map((commit) => commit.origin)).toEqual(['send', 'send', 'send'])
      expect(store.current().destination).toBeUndefined()
    }),
  )

  it.scoped('cancels the effects of a dismissed grandchild before the same case opens again', () =>
    Effect.gen(function* () {
      const store = yield* Store.make(Shelf, Shelf.initial({ inventory: makeInventory() }))
      const commits = yield* store.commits

      yield* store.dispatch(toShelf(Inventory.actions.open(1)))
      yield* store.dispatch(toShelf(toDetail(Detail.actions.refresh())))
      yield* store.dispatch(toShelf(dismissDestination()))
      yield* store.dispatch(toShelf(Inventory.actions.open(1)))
      yield* TestClock.adjust('2 seconds')
      yield* settle(store)

      const received = yield* drain(commits)
      expect(received.map((commit) => commit.origin)).toEqual(['send', 'send', 'send', 'send'])
      const destination = store.current().inventory?.destination
      expect(destination?._tag === 'detail' ? [destination.payload.text, destination.payload.loads] : []).toEqual(['', 0])
    }),
  )

  it.scoped('replaces an in-flight effect started with cancelInFlight', () =>
    Effect.gen(function* () {
      const store = yield* Store.make(Inventory, makeInventory())
      const commits = yield* store.commits

      yield* store.dispatch(Inventory.actions.open(1))
      yield* store.dispatch(toDetail(Detail.actions.refresh()))
      yield* TestClock.adjust('500 millis')
      yield* store.dispatch(toDetail(Detail.actions.refresh()))
      yield* TestClock.adjust('1 second')
      yield* settle(store)

      const received = yield* drain(commits)
      expect(received.filter((commit) => commit.origin === 'effect')).toHaveLength(1)
      const destination = store.current().destination
      expect(destination?._tag === 'detail' ? destination.payload.loads : undefined).toBe(1)
    }),
  )

  it.scoped('drops and reports an action delivered after its effect was cancelled', () => {
    const events: Array<Debug.Event> = []
    return Effect.gen(function* () {
      const store = yield* Store.make(ticker, makeTicker())

      yield* store.dispatch('start')
      yield* TestClock.adjust('500 millis')
      yield* store.dispatch('stop')
      yield* TestClock.adjust('1 second')
      yield* settle(store)

      expect(store.current().ticks).toBe(0)
      const codes = events.flatMap((event) => (event.type === 'diagnostic' ? [event.code] : []))
      expect(codes).toEqual(['fx::delivery_after_cancel'])
    }).pipe(Effect.provide(Debug.memoryLayer(events)), Effect.provide(Config.layer({ diagnostics: 'light' })))
  })

  it.scoped('turns a failure into an action with onFailure', () =>
    Effect.gen(function* () {
      const store = yield* Store.make(ticker, makeTicker())
      const commits = yield* store.commits

      yield* store.dispatch('fail')
      yield* settle(store)

      const received = yield* drain(commits)
      expect(received.map((commit) => [commit.action, commit.origin])).toEqual([
        ['fail', 'send'],
        ['failed', 'effect'],
      ])
      expect(store.current().failures).toBe(1)
    }),
  )

  it.scoped('reports an unhandled failure', () => {
    const events: Array<Debug.Event> = []
    return Effect.gen(function* () {
      const store = yield* Store.make(ticker, makeTicker(), { label: 'ticker' })

      yield* store.dispatch('crash')
      yield* settle(store)

      const diagnostic = events.find((event) => event.type === 'diagnostic')
      expect(
        diagnostic?.type === 'diagnostic' ? [diagnostic.code, diagnostic.severity, diagnostic.message, diagnostic.label] : [],
      ).toEqual(['fx::unhandled_failure', 'error', 'boom', 'ticker'])
      expect(events.filter((event) => event.type === 'lifecycle:error').map((event) => event.storeId)).toEqual([store.id])
    }).pipe(Effect.provide(Debug.memoryLayer(events)), Effect.provide(Config.layer({ diagnostics: 'off' })))
  })

  it.scoped('records a registrar diagnostic only in the store whose state it concerns', () => {
    const events: Array<Debug.Event> = []
    return Effect.gen(function* () {
      const failing = yield* Store.make(Counter, Counter.initial({ count: 0 }))
      const bystander = yield* Store.make(Counter, Counter.initial({ count: 0 }))
      failing.subscribe(
        (state) => state,
        'count',
        () => {
          throw new Error('listener')
        },
      )

      yield* failing.dispatch(Counter.actions.increment())
      while (!events.some((event) => event.type === 'diagnostic')) yield* Effect.yieldNow()
      yield* Effect.repeatN(Effect.yieldNow(), 10)

      const diagnostics = events.flatMap((event) => (event.type === 'diagnostic' ? [[event.code, event.storeId]] : []))
      expect(diagnostics).toEqual([['observation::callback_failure', failing.id]])
      expect(bystander.current().count).toBe(0)
    }).pipe(Effect.provide(Debug.memoryLayer(events)), Effect.provide(Config.layer({ diagnostics: 'light' })))
  })

  it.scoped('records its lifecycle with the configured label', () => {
    const events: Array<Debug.Event> = []
    return Effect.gen(function* () {
      yield* Effect.scoped(
        Effect.gen(function* () {
          const store = yield* Store.make(Counter, Counter.initial({ count: 0 }))
          yield* store.dispatch(Counter.actions.increment())
        }),
      )
      expect(events.map((event) => [event.type, event.label])).toEqual([
        ['store:init', 'counter'],
        ['action:dispatch', 'counter'],
        ['state:update', 'counter'],
        ['store:destroy', 'counter'],
      ])
      const dispatched = events[1]
      expect(dispatched?.type === 'action:dispatch' ? [dispatched.actionTag, dispatched.action] : []).toEqual([
        'increment',
        undefined,
      ])
    }).pipe(Effect.provide(Debug.memoryLayer(events)), Effect.provide(Config.layer({ label: 'counter', diagnostics: 'light' })))
  })

  it.scoped('adds actions and state snapshots with full diagnostics', () => {
    const events: Array<Debug.Event> = []
    return Effect.gen(function* () {
      const store = yield* Store.make(Counter, Counter.initial({ count: 0 }))
      yield* store.dispatch(Counter.actions.set(3))

      const dispatched = events.find((event) => event.type === 'action:dispatch')
      const updated = events.find((event) => event.type === 'state:update')
      expect(dispatched?.type === 'action:dispatch' ? dispatched.action : undefined).toEqual(Counter.actions.set(3))
      expect(updated?.type === 'state:update' ? updated.state : undefined).toEqual({ count: 3 })
    }).pipe(Effect.provide(Debug.memoryLayer(events)), Effect.provide(Config.layer({ diagnostics: 'full' })))
  })

  it.scoped('notifies observers once and subscribers on every write', () =>
    Effect.gen(function* () {
      const store = yield* Store.make(Counter, Counter.initial({ count: 0 }))
      let observed = 0
      const changes: Array<readonly [unknown, unknown]> = []

      const { value } = store.observe(
        (state) => state.count,
        () => {
          observed += 1
        },
      )
      const unsubscribe = store.subscribe(
        (state) => state,
        'count',
        (change) => {
          changes.push([change.oldValue, change.newValue])
        },
      )

      yield* store.dispatch(Counter.actions.increment())
      yield* store.dispatch(Counter.actions.increment())
      unsubscribe()
      yield* store.dispatch(Counter.actions.increment())

      expect(value).toBe(0)
      expect(observed).toBe(1)
      expect(changes).toEqual([
        [0, 1],
        [1, 2],
      ])
    }),
  )
})

const FormState = ObservableState.Struct('FormState', { submitted: Schema.Number })

const Form = Feature.make('Form', {
  state: FormState,
  actions: { view: Schema.Literal('submit'), reset: Schema.Void },
  reducer: ($) =>
    $.reduce((state, action) => {
      if (action._tag === 'view') state.submitted += 1
      if (action._tag === 'reset') state.submitted = 0
      return Fx.none
    }),
})

describe('ViewAction.sender', () => {
  it.scoped('reports view actions sent around the sender', () => {
    const events: Array<Debug.Event> = []
    return Effect.gen(function* () {
      const store = yield* Store.make(Form, Form.initial({ submitted: 0 }), { viewActionTag: 'view' })
      const commits = yield* store.commits

      ViewAction.sender(store, Form.actions.view)('submit')
      yield* Queue.take(commits)
      expect(events.filter((event) => event.type === 'diagnostic')).toEqual([])

      yield* store.dispatch(Form.actions.view('submit'))
      const codes = events.flatMap((event) => (event.type === 'diagnostic' ? [[event.code, event.severity]] : []))
      expect(codes).toEqual([['view_action::direct_send', 'warning']])
      expect(store.current().submitted).toBe(2)
    }).pipe(Effect.provide(Debug.memoryLayer(events)), Effect.provide(Config.layer({ diagnostics: 'light' })))
  })
})
