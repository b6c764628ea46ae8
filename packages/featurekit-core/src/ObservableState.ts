import { Option, Schema } from 'effect'
import type * as Conformance from './Conformance.js'
import * as Identity from './Identity.js'
import { defaultRegistrar, type ObservationRegistrar } from './Observation.js'
import { StateDefinitionError } from './internal/errors.js'
import { isDevEnv } from './internal/env.js'
import {
  copyValue,
  installFields,
  internalsOf,
  isObservableInstance,
  snapshotValue,
  type FieldSpec,
} from './internal/state/values.js'

/**
 * Erased view of a state definition, usable wherever the concrete state type does not matter.
 */
export interface AnyStateDef {
  readonly _kind: 'StateDef'
  readonly name: string
  readonly fieldSpecs: ReadonlyArray<FieldSpec>
  readonly fieldInputs: Readonly<Record<string, FieldInput>>
  readonly conformances: ReadonlySet<Conformance.Name>
  readonly isInstance: (value: unknown) => boolean
  readonly makeUnknown: (init: unknown, options?: MakeOptions) => object
}

export interface StateDef<S extends object> extends AnyStateDef {
  /**
   * Schema of an instance of this definition; use it to declare this state as a field or case payload elsewhere.
   */
  readonly schema: Schema.Schema<S>
  readonly is: (value: unknown) => value is S
  /**
   * Builds a new logical instance: fresh identity, fields installed as tracked accessors.
   */
  readonly make: (init: S, options?: MakeOptions) => S
  /**
   * Like `make`, for values that were not type-checked (decoded data). Always validates.
   */
  readonly makeUnknown: (init: unknown, options?: MakeOptions) => S
}

/**
 * Instance type of a state definition.
 */
export type Type<D> = D extends StateDef<infer S extends object> ? S : never

export type FieldInput = Schema.Schema.AnyNoContext | AnyStateDef

export type Fields = Readonly<Record<string, FieldInput>>

export type FieldType<F> = F extends StateDef<infer S extends object> ? S : F extends Schema.Schema.AnyNoContext ? Schema.Schema.Type<F> : never

export type StateOf<F extends Fields> = { -readonly [K in keyof F]: FieldType<F[K]> }

export interface MakeOptions {
  readonly registrar?: ObservationRegistrar
  readonly identity?: Identity.Identity
}

export interface StructOptions<F extends Fields> {
  /**
   * Fields written without notifying observers (and read without registering).
   */
  readonly untracked?: ReadonlyArray<keyof F & string>
  readonly conformances?: ReadonlyArray<Conformance.Name>
}

export const isStateDef = (input: FieldInput): input is AnyStateDef => '_kind' in input && input._kind === 'StateDef'

const toFieldSpec = (key: string, input: FieldInput, untracked: ReadonlySet<string>): FieldSpec => {
  if (isStateDef(input)) {
    return { key, untracked: untracked.has(key), validate: input.isInstance }
  }
  const is = Schema.is(input)
  return { key, untracked: untracked.has(key), validate: (value) => is(value) }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const collectIssues = (name: string, specs: ReadonlyArray<FieldSpec>, init: unknown): ReadonlyArray<string> => {
  if (!isRecord(init)) return [`${name}: expected an object`]
  const issues: Array<string> = []
  const known = new Set(specs.map((spec) => spec.key))
  for (const spec of specs) {
    if (!spec.validate(init[spec.key])) {
      issues.push(`${name}.${spec.key}: value does not match its declared schema`)
    }
  }
  for (const key of Object.keys(init)) {
    if (!known.has(key)) issues.push(`${name}.${key}: unknown field`)
  }
  return issues
}

/**
 * Declares an observable state with the given fields.
 *
 * Fields are effect `Schema`s or other state definitions (nested observable state). Every instance built by the
 * definition exposes its fields as accessors backed by `TrackedField`s.
 *
 * @example
 * ```ts
 * const Counter = ObservableState.Struct('Counter', {
 *   count: Schema.Number,
 *   renders: Schema.Number,
 * }, { untracked: ['renders'], conformances: ['equatable'] })
 *
 * const state = Counter.make({ count: 0, renders: 0 })
 * state.count += 1
 * ```
 */
export const Struct = <const F extends Fields>(name: string, fields: F, options?: StructOptions<F>): StateDef<StateOf<F>> => {
  const untracked = new Set<string>(options?.untracked ?? [])
  for (const key of untracked) {
    if (!(key in fields)) {
      throw new StateDefinitionError(name, [`untracked key "${key}" is not a declared field`])
    }
  }

  const fieldSpecs = Object.entries(fields).map(([key, input]) => toFieldSpec(key, input, untracked))
  const definition = Symbol(name)

  const isInstance = (value: unknown): boolean => internalsOf(value)?.definition === definition

  const is = (value: unknown): value is StateOf<F> => isInstance(value)

  const make = (init: StateOf<F>, makeOptions?: MakeOptions): StateOf<F> => {
    if (isDevEnv()) {
      const issues = collectIssues(name, fieldSpecs, init)
      if (issues.length > 0) throw new StateDefinitionError(name, issues)
    }
    const source = { ...init }
    return installFields(
      source,
      definition,
      fieldSpecs,
      {
        identity: makeOptions?.identity ?? Identity.allocate(),
        registrar: makeOptions?.registrar ?? defaultRegistrar,
      },
      (key) => (isRecord(init) ? init[key] : undefined),
    )
  }

  const isValidInit = (init: unknown): init is StateOf<F> => collectIssues(name, fieldSpecs, init).length === 0

  const makeUnknown = (init: unknown, makeOptions?: MakeOptions): StateOf<F> => {
    if (!isValidInit(init)) {
      throw new StateDefinitionError(name, collectIssues(name, fieldSpecs, init))
    }
    return make(init, makeOptions)
  }

  return {
    _kind: 'StateDef',
    name,
    fieldSpecs,
    fieldInputs: fields,
    conformances: new Set(options?.conformances ?? []),
    isInstance,
    is,
    make,
    makeUnknown,
    schema: Schema.declare(is, { identifier: name }),
  }
}

/**
 * Value-semantics copy: nested observable states and case values are copied, identities and registrars are kept.
 */
export const copy: <T>(value: T) => T = copyValue

/**
 * Plain, detached, recursively converted view of a state value. The result has the shape of `S` but none of its
 * tracking: plain objects for observable instances, plain `{ _tag, payload }` records for case values.
 */
export function snapshot<S>(value: S): S
export function snapshot(value: unknown): unknown {
  return snapshotValue(value)
}

export const isObservable = (value: unknown): value is object => isObservableInstance(value)

export const identityOf = (value: unknown): Option.Option<Identity.Identity> =>
  isObservableInstance(value) ? Identity.identityOf(value) : Option.none()

export const registrarOf = (value: unknown): Option.Option<ObservationRegistrar> =>
  Option.fromNullable(internalsOf(value)?.owner.registrar)
