import { Effect, Layer } from 'effect'
import * as Internal from './internal/runtime/DebugSink.js'
import { getNodeEnv } from './internal/env.js'

// Public Debug API. The event model and the sink layers live in internal/runtime/DebugSink.ts;
// this module adds the composition entry points on top.

export type Event = Internal.Event
export interface Sink extends Internal.Sink {}

export const internal = {
  currentDebugSinks: Internal.currentDebugSinks,
}

export interface RingBufferSink {
  readonly sink: Sink
  readonly getSnapshot: () => ReadonlyArray<Event>
  readonly clear: () => void
}

/**
 * Keeps the last `capacity` events in arrival order.
 */
export const makeRingBufferSink = (capacity = 1000): RingBufferSink => {
  const buffer: Array<Event> = []

  const sink: Sink = {
    record: (event) =>
      Effect.sync(() => {
        if (capacity <= 0) return
        if (buffer.length >= capacity) buffer.shift()
        buffer.push(event)
      }),
  }

  return {
    sink,
    getSnapshot: () => buffer.slice(),
    clear: () => {
      buffer.length = 0
    },
  }
}

/**
 * Sends `event` to the sinks installed on the current fiber. Without any, errors and warnings still reach the
 * Effect logger.
 */
export const record = Internal.record

export const noopLayer = Internal.noopLayer
export const errorOnlyLayer = Internal.errorOnlyLayer
export const consoleLayer = Internal.consoleLayer
export const memoryLayer = Internal.memoryLayer

/**
 * Installs the given sinks for the scope of the layer, replacing the current ones.
 */
export const replace = (sinks: ReadonlyArray<Sink>) => Layer.locallyScoped(Internal.currentDebugSinks, sinks)

/**
 * - "auto": dev outside production, prod otherwise;
 * - "dev": every event through the Effect logger;
 * - "prod": errors and warnings only;
 * - "off": nothing.
 */
export type DebugMode = 'auto' | 'dev' | 'prod' | 'off'

const resolveMode = (mode: DebugMode | undefined): Exclude<DebugMode, 'auto'> => {
  if (mode !== undefined && mode !== 'auto') return mode
  return getNodeEnv() === 'production' ? 'prod' : 'dev'
}

export const layer = (options?: { readonly mode?: DebugMode }) => {
  switch (resolveMode(options?.mode)) {
    case 'off':
      return noopLayer
    case 'prod':
      return errorOnlyLayer
    case 'dev':
      return consoleLayer
  }
}
