import { Cause, Effect, FiberRef, Layer } from 'effect'
import type { Severity } from '../reducer/transition.js'

export type Event =
  | {
      readonly type: 'store:init'
      readonly storeId: string
      readonly label?: string
      readonly timestamp?: number
    }
  | {
      readonly type: 'store:destroy'
      readonly storeId: string
      readonly label?: string
      readonly timestamp?: number
    }
  | {
      readonly type: 'action:dispatch'
      readonly storeId: string
      readonly label?: string
      readonly actionTag?: string
      /**
       * The action itself; only with `diagnostics: 'full'`.
       */
      readonly action?: unknown
      readonly timestamp?: number
    }
  | {
      readonly type: 'state:update'
      readonly storeId: string
      readonly label?: string
      /**
       * Plain snapshot of the committed state; only with `diagnostics: 'full'`.
       */
      readonly state?: unknown
      readonly timestamp?: number
    }
  | {
      readonly type: 'diagnostic'
      readonly storeId?: string
      readonly label?: string
      readonly code: string
      readonly severity: Severity
      readonly message: string
      readonly hint?: string
      readonly actionTag?: string
      readonly timestamp?: number
    }
  | {
      readonly type: 'lifecycle:error'
      readonly storeId?: string
      readonly label?: string
      readonly phase: 'effect' | 'observer'
      readonly cause: Cause.Cause<unknown>
      readonly timestamp?: number
    }

export interface Sink {
  readonly record: (event: Event) => Effect.Effect<void>
}

export const currentDebugSinks = FiberRef.unsafeMake<ReadonlyArray<Sink>>([])

const scopeOf = (event: Event): string => {
  const id = event.storeId ?? 'unknown'
  return event.label === undefined ? `store=${id}` : `store=${id} label=${event.label}`
}

const lifecycleErrorLog = (event: Extract<Event, { readonly type: 'lifecycle:error' }>) => {
  const causePretty = Cause.pretty(event.cause, { renderErrorCause: true })
  return Effect.logError(`[featurekit][${scopeOf(event)}] lifecycle:error(${event.phase})\n${causePretty}`).pipe(
    Effect.annotateLogs({
      'featurekit.storeId': event.storeId ?? 'unknown',
      'featurekit.event': 'lifecycle:error',
      'featurekit.phase': event.phase,
    }),
  )
}

const diagnosticLog = (event: Extract<Event, { readonly type: 'diagnostic' }>) => {
  const header = `[featurekit][${scopeOf(event)}] diagnostic(${event.severity})`
  const detail = `code=${event.code} message=${event.message}${
    event.actionTag !== undefined ? ` action=${event.actionTag}` : ''
  }${event.hint !== undefined ? `\nhint: ${event.hint}` : ''}`
  const message = `${header}\n${detail}`

  const base =
    event.severity === 'warning'
      ? Effect.logWarning(message)
      : event.severity === 'info'
        ? Effect.logInfo(message)
        : Effect.logError(message)

  const annotations: Record<string, unknown> = {
    'featurekit.storeId': event.storeId ?? 'unknown',
    'featurekit.event': `diagnostic(${event.severity})`,
    'featurekit.diagnostic.code': event.code,
  }
  if (event.actionTag !== undefined) {
    annotations['featurekit.diagnostic.actionTag'] = event.actionTag
  }

  return base.pipe(Effect.annotateLogs(annotations))
}

const noopSink: Sink = { record: () => Effect.void }

export const noopLayer = Layer.locallyScoped(currentDebugSinks, [noopSink])

/**
 * Errors and warnings only: `lifecycle:error` and diagnostics of severity `warning` or `error`.
 * This is also what happens when no sink is installed.
 */
const errorOnlySink: Sink = {
  record: (event) =>
    event.type === 'lifecycle:error'
      ? lifecycleErrorLog(event)
      : event.type === 'diagnostic' && event.severity !== 'info'
        ? diagnosticLog(event)
        : Effect.void,
}

export const errorOnlyLayer = Layer.locallyScoped(currentDebugSinks, [errorOnlySink])

/**
 * Every event through the Effect logger; store and action events at debug level.
 */
const consoleSink: Sink = {
  record: (event) =>
    event.type === 'lifecycle:error'
      ? lifecycleErrorLog(event)
      : event.type === 'diagnostic'
        ? diagnosticLog(event)
        : Effect.logDebug({ debugEvent: event }),
}

export const consoleLayer = Layer.locallyScoped(currentDebugSinks, [consoleSink])

/**
 * Collects every event into `buffer`.
 */
export const memorySink = (buffer: Array<Event>): Sink => ({
  record: (event) =>
    Effect.sync(() => {
      buffer.push(event)
    }),
})

export const memoryLayer = (buffer: Array<Event>) => Layer.locallyScoped(currentDebugSinks, [memorySink(buffer)])

export const defaultLayer = errorOnlyLayer

export const record = (event: Event): Effect.Effect<void> =>
  Effect.gen(function* () {
    const sinks = yield* FiberRef.get(currentDebugSinks)
    const stamped: Event = { ...event, timestamp: event.timestamp ?? Date.now() }

    if (sinks.length > 0) {
      yield* Effect.forEach(sinks, (sink) => sink.record(stamped), { discard: true })
      return
    }
    yield* errorOnlySink.record(stamped)
  })
