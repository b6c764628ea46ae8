import { describe, expect, it } from '@effect/vitest'
import { Effect } from 'effect'
import { Fx, Identity } from '../src/index.js'

describe('Fx', () => {
  it('drops none and flattens nested merges', () => {
    const a = Fx.send('a')
    const b = Fx.send('b')
    const c = Fx.send('c')

    expect(Fx.merge(Fx.none, a)).toBe(a)
    expect(Fx.merge()).toBe(Fx.none)
    expect(Fx.merge(a, Fx.merge(b, c))).toEqual({ _tag: 'Merge', fxs: [a, b, c] })
    expect(Fx.concat(Fx.concat(a, b), Fx.none, c)).toEqual({ _tag: 'Concat', fxs: [a, b, c] })
  })

  it('recognises effects that do nothing', () => {
    expect(Fx.isNone(Fx.none)).toBe(true)
    expect(Fx.isNone(Fx.stopPropagation())).toBe(true)
    expect(Fx.isNone(Fx.send(1))).toBe(false)
    expect(Fx.isNone(Fx.cancel('x'))).toBe(false)
    expect(Fx.cancellable(Fx.none, 'x')).toBe(Fx.none)
  })

  it('maps every action an effect can produce', () => {
    const fx = Fx.merge(Fx.send(1), Fx.cancellable(Fx.send(2), 'load'), Fx.run<number>(() => Effect.void, { onFailure: () => 3 }))
    const mapped = Fx.map(fx, (n) => `#${n}`)

    expect(mapped._tag).toBe('Merge')
    if (mapped._tag !== 'Merge') return
    expect(mapped.fxs[0]).toEqual({ _tag: 'Send', action: '#1' })
    expect(mapped.fxs[1]).toEqual({
      _tag: 'Cancellable',
      id: 'load',
      cancelInFlight: false,
      fx: { _tag: 'Send', action: '#2' },
    })
    const run = mapped.fxs[2]
    expect(run?._tag === 'Run' ? run.onFailure?.('boom') : undefined).toBe('#3')
  })

  it('matches cancel ids by prefix segment', () => {
    expect(Fx.matchesCancelId('i1', 'i1')).toBe(true)
    expect(Fx.matchesCancelId('i1', 'i1/load')).toBe(true)
    expect(Fx.matchesCancelId('i1', 'i10')).toBe(false)
    expect(Fx.matchesCancelId('i1/load', 'i1')).toBe(false)
  })

  it('scopes cancellation below a case identity', () => {
    const identity = Identity.allocate()
    const scoped = Fx.scopeCancellation(Fx.merge(Fx.cancellable(Fx.send('tick'), 'timer'), Fx.cancel('timer')), identity)

    expect(scoped).toEqual({
      _tag: 'Cancellable',
      id: identity,
      cancelInFlight: false,
      fx: {
        _tag: 'Merge',
        fxs: [
          { _tag: 'Cancellable', id: `${identity}/timer`, cancelInFlight: false, fx: { _tag: 'Send', action: 'tick' } },
          { _tag: 'Cancel', ids: [`${identity}/timer`] },
        ],
      },
    })
    expect(Fx.scopeCancellation(Fx.none, identity)).toBe(Fx.none)
  })

  it('splits the cancellations that run before any other work', () => {
    const work = Fx.send('work')
    const later = Fx.cancel('later')

    const identity = Identity.allocate()

    expect(Fx.splitLeadingCancellations(Fx.concat(Fx.retire(identity), Fx.cancel('a', 'b'), work, later))).toEqual({
      cancellations: [
        { _tag: 'Retire', identities: [identity] },
        { _tag: 'Cancel', ids: ['a', 'b'] },
      ],
      rest: { _tag: 'Concat', fxs: [work, later] },
    })
    expect(Fx.splitLeadingCancellations(Fx.merge(Fx.cancel('a'), work))).toEqual({
      cancellations: [{ _tag: 'Cancel', ids: ['a'] }],
      rest: work,
    })
    expect(Fx.splitLeadingCancellations(work)).toEqual({ cancellations: [], rest: work })
  })

  it('retires an identity at any depth of scoping', () => {
    const outer = Identity.allocate()
    const inner = Identity.allocate()
    const nested = Fx.scopeCancellation(Fx.scopeCancellation(Fx.cancellable(Fx.send('tick'), 'timer'), inner), outer)

    expect(nested).toEqual({
      _tag: 'Cancellable',
      id: outer,
      cancelInFlight: false,
      fx: {
        _tag: 'Cancellable',
        id: `${outer}/${inner}`,
        cancelInFlight: false,
        fx: { _tag: 'Cancellable', id: `${outer}/${inner}/timer`, cancelInFlight: false, fx: { _tag: 'Send', action: 'tick' } },
      },
    })

    const retireInner: Fx.Cancellation = { _tag: 'Retire', identities: [inner] }
    const cancelInner: Fx.Cancellation = { _tag: 'Cancel', ids: [inner] }
    expect(Fx.cancels(retireInner, `${outer}/${inner}`)).toBe(true)
    expect(Fx.cancels(retireInner, `${outer}/${inner}/timer`)).toBe(true)
    expect(Fx.cancels(retireInner, outer)).toBe(false)
    expect(Fx.cancels(retireInner, `${outer}/${inner}0`)).toBe(false)
    expect(Fx.cancels(cancelInner, `${outer}/${inner}`)).toBe(false)
    expect(Fx.isNone(Fx.retire(inner))).toBe(false)
    expect(Fx.map<number, number>(Fx.retire(inner), (n) => n + 1)).toEqual(Fx.retire(inner))
  })

  it('extracts dismiss requests', () => {
    const work = Fx.send('work')
    expect(Fx.extractDismiss(Fx.merge(work, Fx.dismiss))).toEqual({ dismiss: true, rest: work })
    expect(Fx.extractDismiss(work)).toEqual({ dismiss: false, rest: work })
  })

  it('marks and unwraps stopped results', () => {
    const stopped = Fx.stopPropagation(Fx.send(1))
    expect(Fx.isStopped(stopped)).toBe(true)
    expect(Fx.unwrapStop(stopped)).toEqual({ _tag: 'Send', action: 1 })
    expect(Fx.isStopped(Fx.send(1))).toBe(false)
  })
})
