import type { Identity } from './Identity.js'

export type FieldKey = string

/**
 * Delivered to persistent subscribers after a tracked write has been installed.
 */
export interface StateChange {
  readonly identity: Identity
  readonly key: FieldKey
  readonly oldValue: unknown
  readonly newValue: unknown
}

export type ChangeListener = (change: StateChange) => void

export type RegistrarDiagnosticCode = 'observation::reentrant_modify' | 'observation::callback_failure'

export interface RegistrarDiagnostic {
  readonly code: RegistrarDiagnosticCode
  readonly identity: Identity
  readonly key: FieldKey
  readonly message: string
  readonly cause?: unknown
}

/**
 * A one-shot interest in a set of (identity, field) pairs.
 *
 * The first `willModify` on any registered pair fires `onChange` and drops every registration of the observer,
 * in every registrar it was tracked by. Observing the next change takes a new observer.
 */
export class Observer {
  private fired = false
  private readonly disposers: Array<() => void> = []

  constructor(readonly onChange: () => void) {}

  get isActive(): boolean {
    return !this.fired
  }

  /** @internal */
  addDisposer(dispose: () => void): void {
    this.disposers.push(dispose)
  }

  /**
   * Drops all registrations without notifying.
   */
  cancel(): void {
    this.fired = true
    const disposers = this.disposers.splice(0, this.disposers.length)
    for (const dispose of disposers) dispose()
  }

  /** @internal */
  fire(): boolean {
    if (this.fired) return false
    this.cancel()
    this.onChange()
    return true
  }
}

let currentObserver: Observer | undefined

/**
 * The observer that tracked reads should register with, if any.
 */
export const current = (): Observer | undefined => currentObserver

/**
 * Runs `apply` with an ambient observer: every tracked read inside registers a dependency, and `onChange` runs
 * once, synchronously, right before the first of those fields is next modified.
 */
export const observe = <A>(apply: () => A, onChange: () => void): { readonly value: A; readonly observer: Observer } => {
  const observer = new Observer(onChange)
  const previous = currentObserver
  currentObserver = observer
  try {
    return { value: apply(), observer }
  } finally {
    currentObserver = previous
  }
}

/**
 * Reads inside `apply` do not register with the ambient observer.
 */
export const untracked = <A>(apply: () => A): A => {
  const previous = currentObserver
  currentObserver = undefined
  try {
    return apply()
  } finally {
    currentObserver = previous
  }
}

const getOrCreate = <K, V>(map: Map<K, V>, key: K, make: () => V): V => {
  const existing = map.get(key)
  if (existing !== undefined) return existing
  const created = make()
  map.set(key, created)
  return created
}

/**
 * Per-state bookkeeping of which observers depend on which fields.
 *
 * Copies of a state share the registrar of the instance they were copied from, so registrations keyed by
 * identity survive the copy a transition runs against.
 */
export class ObservationRegistrar {
  private readonly observers = new Map<Identity, Map<FieldKey, Set<Observer>>>()
  private readonly subscribers = new Map<Identity, Map<FieldKey, Set<ChangeListener>>>()
  private readonly diagnosticListeners = new Set<(diagnostic: RegistrarDiagnostic) => void>()
  private readonly notifying = new Set<Identity>()

  trackAccess(identity: Identity, key: FieldKey, observer: Observer): void {
    if (!observer.isActive) return
    const byKey = getOrCreate(this.observers, identity, () => new Map<FieldKey, Set<Observer>>())
    const set = getOrCreate(byKey, key, () => new Set<Observer>())
    if (set.has(observer)) return
    set.add(observer)
    observer.addDisposer(() => {
      set.delete(observer)
      if (set.size === 0) byKey.delete(key)
      if (byKey.size === 0) this.observers.delete(identity)
    })
  }

  /**
   * Must run immediately before the value behind (identity, key) is overwritten: observers still read the old
   * value from inside their callback.
   */
  willModify(identity: Identity, key: FieldKey): void {
    if (this.notifying.has(identity)) {
      this.report({
        code: 'observation::reentrant_modify',
        identity,
        key,
        message: `Field "${key}" was modified while observers of the same state were being notified; the notification is deferred to the next microtask.`,
      })
      queueMicrotask(() => this.willModify(identity, key))
      return
    }

    const set = this.observers.get(identity)?.get(key)
    if (set === undefined || set.size === 0) return

    this.notifying.add(identity)
    try {
      for (const observer of Array.from(set)) {
        try {
          observer.fire()
        } catch (cause) {
          this.report({
            code: 'observation::callback_failure',
            identity,
            key,
            message: `An observer of field "${key}" threw while being notified.`,
            cause,
          })
        }
      }
    } finally {
      this.notifying.delete(identity)
    }
  }

  didModify(identity: Identity, key: FieldKey, oldValue: unknown, newValue: unknown): void {
    const listeners = this.subscribers.get(identity)?.get(key)
    if (listeners === undefined || listeners.size === 0) return

    const change: StateChange = { identity, key, oldValue, newValue }
    for (const listener of Array.from(listeners)) {
      try {
        listener(change)
      } catch (cause) {
        this.report({
          code: 'observation::callback_failure',
          identity,
          key,
          message: `A change subscriber of field "${key}" threw.`,
          cause,
        })
      }
    }
  }

  /**
   * Persistent subscription to committed writes of (identity, key). Returns the unsubscribe function.
   */
  subscribe(identity: Identity, key: FieldKey, listener: ChangeListener): () => void {
    const byKey = getOrCreate(this.subscribers, identity, () => new Map<FieldKey, Set<ChangeListener>>())
    const set = getOrCreate(byKey, key, () => new Set<ChangeListener>())
    set.add(listener)
    return () => {
      set.delete(listener)
      if (set.size === 0) byKey.delete(key)
      if (byKey.size === 0) this.subscribers.delete(identity)
    }
  }

  onDiagnostic(listener: (diagnostic: RegistrarDiagnostic) => void): () => void {
    this.diagnosticListeners.add(listener)
    return () => {
      this.diagnosticListeners.delete(listener)
    }
  }

  observerCount(identity: Identity, key?: FieldKey): number {
    const byKey = this.observers.get(identity)
    if (byKey === undefined) return 0
    if (key !== undefined) return byKey.get(key)?.size ?? 0
    let count = 0
    for (const set of byKey.values()) count += set.size
    return count
  }

  private report(diagnostic: RegistrarDiagnostic): void {
    for (const listener of Array.from(this.diagnosticListeners)) {
      listener(diagnostic)
    }
  }
}

export const defaultRegistrar = new ObservationRegistrar()
