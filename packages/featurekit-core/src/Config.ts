import { Context, Effect, Layer, Option, Schema } from 'effect'
import { isDevEnv } from './internal/env.js'

export type DiagnosticsLevel = 'off' | 'light' | 'full'

/**
 * Store runtime configuration.
 *
 * - `label` is attached to every debug event of the store;
 * - `diagnostics`: `off` records nothing but errors, `light` records events without payloads, `full` adds actions
 *   and state snapshots to `action:dispatch` and `state:update`.
 */
export interface StoreConfig {
  readonly label?: string
  readonly diagnostics: DiagnosticsLevel
}

export class StoreConfigTag extends Context.Tag('@featurekit/core/StoreConfig')<StoreConfigTag, StoreConfig>() {}

const DiagnosticsLevelSchema = Schema.Literal('off', 'light', 'full')

export type StoreConfigPatch = Partial<StoreConfig>

const allowedKeys: ReadonlySet<string> = new Set(['label', 'diagnostics'])

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const collectIssues = (patch: unknown): ReadonlyArray<string> => {
  if (!isRecord(patch)) return ['expected an object']
  const issues: Array<string> = []
  for (const key of Object.keys(patch)) {
    if (!allowedKeys.has(key)) issues.push(`${key}: unknown key`)
  }
  if ('label' in patch && patch.label !== undefined && typeof patch.label !== 'string') {
    issues.push('label: expected string')
  }
  if ('diagnostics' in patch && patch.diagnostics !== undefined && !Schema.is(DiagnosticsLevelSchema)(patch.diagnostics)) {
    issues.push('diagnostics: expected "off" | "light" | "full"')
  }
  return issues
}

const warnDevOnly = (issues: ReadonlyArray<string>): void => {
  if (!isDevEnv() || issues.length === 0) return
  // eslint-disable-next-line no-console
  console.warn(['[featurekit] Invalid store config detected.', 'issues:'].concat(issues.map((i) => `- ${i}`)).join('\n'))
}

export const defaults = (): StoreConfig => ({ diagnostics: isDevEnv() ? 'light' : 'off' })

/**
 * Fills the gaps of `patch` from the defaults. Invalid entries are dropped (with a warning in dev).
 */
export const resolve = (patch?: unknown): StoreConfig => {
  const base = defaults()
  if (patch === undefined) return base
  warnDevOnly(collectIssues(patch))
  if (!isRecord(patch)) return base

  const label = patch.label
  const diagnostics = patch.diagnostics
  return {
    ...(typeof label === 'string' ? { label } : {}),
    diagnostics: Schema.is(DiagnosticsLevelSchema)(diagnostics) ? diagnostics : base.diagnostics,
  }
}

export const layer = (patch: StoreConfigPatch): Layer.Layer<StoreConfigTag> =>
  Layer.sync(StoreConfigTag, () => resolve(patch))

/**
 * The configured service, or the defaults when none is provided.
 */
export const current: Effect.Effect<StoreConfig> = Effect.map(Effect.serviceOption(StoreConfigTag), (service) =>
  Option.getOrElse(service, defaults),
)
