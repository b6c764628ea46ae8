import { Duration, Effect, TestClock } from 'effect'

export interface WaitUntilOptions {
  readonly maxAttempts?: number
  readonly step?: Duration.DurationInput
}

/**
 * Re-runs `check` until it succeeds, advancing the TestClock and yielding between attempts so that forked effects
 * get to run. Fails with the last failure once the attempts are used up.
 */
export const waitUntil = <A, E, R>(check: Effect.Effect<A, E, R>, options: WaitUntilOptions = {}): Effect.Effect<A, E, R> =>
  Effect.gen(function* () {
    const maxAttempts = options.maxAttempts ?? 20
    const step = options.step ?? Duration.millis(10)

    let last = yield* Effect.either(check)
    for (let attempt = 1; attempt < maxAttempts && last._tag === 'Left'; attempt++) {
      yield* TestClock.adjust(step)
      yield* Effect.yieldNow()
      last = yield* Effect.either(check)
    }
    if (last._tag === 'Left') return yield* Effect.fail(last.left)
    return last.right
  })
