import { Option } from 'effect'
import * as Identity from '../../Identity.js'

/**
 * Context of the transition currently running. Reducers are synchronous and effect-free, so they report into the
 * collector installed by whoever runs the transition (the store, or `Reducer.run`): diagnostics, and the identities
 * retired by overwriting the value that carried them.
 */

export type Severity = 'error' | 'warning' | 'info'

export type DiagnosticCode =
  | 'case::inactive'
  | 'case::unknown_tag'
  | 'case::ignored'
  | 'case::stale_write_back'
  | 'presentation::absent'
  | 'fx::unhandled_failure'
  | 'fx::delivery_after_cancel'
  | 'observation::reentrant_modify'
  | 'observation::callback_failure'
  | 'view_action::direct_send'

export interface Diagnostic {
  readonly code: DiagnosticCode
  readonly severity: Severity
  readonly message: string
  readonly hint?: string
  readonly actionTag?: string
}

interface Collector {
  readonly diagnostics: Array<Diagnostic>
  readonly retired: Array<Identity.Identity>
}

let collector: Collector | undefined

/**
 * Records `diagnostic` with the innermost running collector; dropped when no transition is running.
 */
export const report = (diagnostic: Diagnostic): void => {
  collector?.diagnostics.push(diagnostic)
}

/**
 * Called on every field write: when the value being replaced carries an identity that the new value does not,
 * that logical instance is retired. Only a running transition keeps the record.
 */
export const noteReplaced = (previous: unknown, next: unknown): void => {
  const retiring = Identity.identityOf(previous)
  if (Option.isNone(retiring)) return
  const replacement = Identity.identityOf(next)
  if (Option.isSome(replacement) && replacement.value === retiring.value) return
  collector?.retired.push(retiring.value)
}

export interface Collected<A> {
  readonly value: A
  readonly diagnostics: ReadonlyArray<Diagnostic>
  readonly retired: ReadonlyArray<Identity.Identity>
}

export const collect = <A>(apply: () => A): Collected<A> => {
  const previous = collector
  const current: Collector = { diagnostics: [], retired: [] }
  collector = current
  try {
    return { value: apply(), diagnostics: current.diagnostics, retired: current.retired }
  } finally {
    collector = previous
  }
}
