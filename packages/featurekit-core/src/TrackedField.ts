import type { Identity } from './Identity.js'
import { current, type FieldKey, type ObservationRegistrar } from './Observation.js'
import { noteReplaced } from './internal/reducer/transition.js'

/**
 * Where a field reports its reads and writes: the identity of the state holding it and that state's registrar.
 */
export interface FieldOwner {
  readonly identity: Identity
  readonly registrar: ObservationRegistrar
}

export interface TrackedFieldOptions {
  /**
   * Untracked fields never register reads and update without notifying (internal bookkeeping).
   */
  readonly untracked?: boolean
}

/**
 * Storage for one field of an observable state.
 *
 * `set` notifies on every write, including writes of a value equal to the current one; suppressing no-op writes is
 * left to callers. Overwriting a value that carries an identity with one that does not share it retires that
 * identity.
 */
export class TrackedField<V> {
  readonly untracked: boolean

  constructor(
    readonly key: FieldKey,
    private value: V,
    private readonly owner: FieldOwner,
    options?: TrackedFieldOptions,
  ) {
    this.untracked = options?.untracked ?? false
  }

  get(): V {
    if (!this.untracked) {
      const observer = current()
      if (observer !== undefined) {
        this.owner.registrar.trackAccess(this.owner.identity, this.key, observer)
      }
    }
    return this.value
  }

  set(next: V): void {
    const previous = this.value
    noteReplaced(previous, next)
    if (this.untracked) {
      this.value = next
      return
    }

    this.owner.registrar.willModify(this.owner.identity, this.key)
    this.value = next
    this.owner.registrar.didModify(this.owner.identity, this.key, previous, next)
  }

  /**
   * Reads the stored value without registering an access.
   */
  peek(): V {
    return this.value
  }

  /**
   * A field with the same key and value for another owner (the copy of its state).
   */
  copyTo(owner: FieldOwner, value: V = this.value): TrackedField<V> {
    return new TrackedField(this.key, value, owner, { untracked: this.untracked })
  }
}
