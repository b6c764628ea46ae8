import { Option, Schema } from 'effect'
import * as CaseScope from './CaseScope.js'
import * as Conformance from './Conformance.js'
import * as Fx from './Fx.js'
import * as Identity from './Identity.js'
import type { MakeOptions, StateDef } from './ObservableState.js'
import * as Presentation from './Presentation.js'
import * as Reducer from './Reducer.js'
import {
  isActionOf,
  isTagged,
  makeActions,
  type ActionOf,
  type ActionSchemas,
  type ActionTokens,
  type ActionValue,
  type PayloadSchema,
} from './internal/action.js'
import {
  ActionPayloadError,
  CompositionDefinitionError,
  ConformanceError,
  StateDefinitionError,
} from './internal/errors.js'
import { report } from './internal/reducer/transition.js'
import { copyValue, isCaseValue, makeCaseValue, type AnyCaseValue, type CaseValue } from './internal/state/values.js'

// ---------------------------------------------------------------------------
// Features

/**
 * Untyped view of a feature, used where features of different types sit side by side (enum cases).
 */
export interface ErasedFeature {
  readonly isState: (value: unknown) => boolean
  readonly isAction: (value: unknown) => boolean
  /**
   * `undefined` when `state` or `action` does not belong to the feature.
   */
  readonly reduce: (state: unknown, action: unknown) => Fx.Fx<unknown> | undefined
}

export interface AnyFeature {
  readonly _kind: 'Feature'
  readonly id: string
  readonly erased: ErasedFeature
}

export interface Feature<S extends object, A> extends AnyFeature {
  readonly state: StateDef<S>
  readonly actionSchema: Schema.Schema<A>
  readonly isAction: (value: unknown) => value is A
  readonly reducer: Reducer.Reducer<S, A>
  /**
   * Hosting of the feature in a parent slot (`$.ifLet`); effects are scoped to the hosted state's identity.
   */
  readonly presentable: Presentation.Presentable<S, A>
  readonly conformances: ReadonlySet<Conformance.Name>
  readonly initial: (init: S, options?: MakeOptions) => S
}

export interface FeatureOf<S extends object, M extends ActionSchemas> extends Feature<S, ActionOf<M>> {
  readonly actions: ActionTokens<M>
}

type Hostable<V, A> = { readonly presentable: Presentation.Presentable<V, A> }

/**
 * Composition vocabulary bound to one feature's state and actions.
 *
 * Routing helpers return reducers over the slice of state they touch; `combine` checks each of them against the
 * feature's full state and action types.
 */
export interface Builder<S extends object, M extends ActionSchemas> {
  readonly actions: ActionTokens<M>
  readonly reduce: (reduce: (state: S, action: ActionOf<M>) => Fx.Fx<ActionOf<M>>) => Reducer.Reducer<S, ActionOf<M>>
  /**
   * Key-path routing: actions tagged `actionTag` carry a child action for the child state at `stateKey`.
   */
  readonly scope: <K extends keyof S, T extends keyof M & string, CS, CA>(
    stateKey: K,
    actionTag: T,
    child: Reducer.Source<CS, CA>,
  ) => Reducer.Reducer<{ [P in K]: CS }, ActionValue<T, CA>>
  readonly ifLet: <K extends keyof S, T extends keyof M & string, V, CA>(
    stateKey: K,
    actionTag: T,
    child: Hostable<V, CA>,
  ) => Reducer.Reducer<{ [P in K]: V | undefined }, ActionValue<T, Presentation.PresentationAction<CA>>>
  readonly ifCaseLet: <K extends keyof S, T extends keyof M & string, V, CA>(
    stateKey: K,
    actionTag: T,
    child: { readonly reducer: Reducer.Reducer<CaseScope.CompositeRef<V | undefined>, CA> },
  ) => Reducer.Reducer<{ [P in K]: V }, ActionValue<T, CA>>
  readonly combine: (...reducers: ReadonlyArray<Reducer.Reducer<S, ActionOf<M>>>) => Reducer.Reducer<S, ActionOf<M>>
}

const makeBuilder = <S extends object, M extends ActionSchemas>(actions: ActionTokens<M>): Builder<S, M> => {
  const scope = <K extends keyof S, T extends keyof M & string, CS, CA>(
    stateKey: K,
    actionTag: T,
    child: Reducer.Source<CS, CA>,
  ): Reducer.Reducer<{ [P in K]: CS }, ActionValue<T, CA>> =>
    Reducer.scope(
      {
        get: (state: { [P in K]: CS }): CS => state[stateKey],
        extract: (action: ActionValue<T, CA>) =>
          action._tag === actionTag ? Option.some(action.payload) : Option.none(),
        embed: (childAction: CA): ActionValue<T, CA> => ({ _tag: actionTag, payload: childAction }),
      },
      Reducer.from(child),
    )

  return {
    actions,
    reduce: (reduce) => Reducer.make(reduce),
    scope,
    ifLet: (stateKey, actionTag, child) => Presentation.ifLet(stateKey, actionTag, child.presentable),
    ifCaseLet: (stateKey, actionTag, child) => Presentation.ifCaseLet(stateKey, actionTag, child.reducer),
    combine: (...reducers) => Reducer.combine(...reducers),
  }
}

export interface FeatureConfig<S extends object, M extends ActionSchemas> {
  readonly state: StateDef<S>
  /**
   * Payload schema per action tag.
   */
  readonly actions: M
  readonly reducer: ($: Builder<S, M>) => Reducer.Reducer<S, ActionOf<M>>
  /**
   * Capabilities the feature relies on; each must be declared by the state definition.
   */
  readonly conformances?: ReadonlyArray<Conformance.Name>
}

/**
 * Defines a feature: a state definition, the actions it reacts to and its transition function.
 *
 * @example
 * ```ts
 * const Counter = Feature.make('Counter', {
 *   state: CounterState,
 *   actions: { increment: Schema.Void, set: Schema.Number },
 *   reducer: ($) =>
 *     $.reduce((state, action) => {
 *       switch (action._tag) {
 *         case 'increment':
 *           state.count += 1
 *           return Fx.none
 *         case 'set':
 *           state.count = action.payload
 *           return Fx.none
 *       }
 *     }),
 * })
 *
 * Counter.actions.set(3) // { _tag: 'set', payload: 3 }
 * ```
 */
export const make = <S extends object, M extends ActionSchemas>(
  id: string,
  config: FeatureConfig<S, M>,
): FeatureOf<S, M> => {
  const { state } = config
  const conformances = new Set(config.conformances ?? [])
  for (const conformance of conformances) {
    if (!Conformance.has(state, conformance)) throw new ConformanceError(id, conformance)
  }

  const actions = makeActions(config.actions)
  const isAction = isActionOf(config.actions)
  const reducer = config.reducer(makeBuilder<S, M>(actions))

  const presentable: Presentation.Presentable<S, ActionOf<M>> = {
    reducer: Reducer.make((ref, action) => {
      const hosted = ref.get()
      if (hosted === undefined) return Fx.none
      const fx = Fx.unwrapStop(reducer.reduce(hosted, action))
      return Option.match(Identity.identityOf(hosted), {
        onNone: () => fx,
        onSome: (identity) => Fx.scopeCancellation(fx, identity),
      })
    }),
  }

  return {
    _kind: 'Feature',
    id,
    state,
    actions,
    isAction,
    actionSchema: Schema.declare(isAction, { identifier: `${id}.Action` }),
    reducer,
    presentable,
    conformances,
    initial: state.make,
    erased: {
      isState: state.isInstance,
      isAction,
      reduce: (value, action) => (state.is(value) && isAction(action) ? reducer.reduce(value, action) : undefined),
    },
  }
}

// ---------------------------------------------------------------------------
// Enum composites

export interface EphemeralCase<SS extends PayloadSchema, AS extends PayloadSchema> {
  readonly _kind: 'EphemeralCase'
  readonly stateSchema: SS
  readonly actionSchema: AS | undefined
}

export interface IgnoredCase<SS extends PayloadSchema> {
  readonly _kind: 'IgnoredCase'
  readonly stateSchema: SS
}

export type CaseEntry = AnyFeature | EphemeralCase<PayloadSchema, PayloadSchema> | IgnoredCase<PayloadSchema>

export type Cases = Readonly<Record<string, CaseEntry>>

export const Case = {
  /**
   * A case that only displays data. Its actions (if any) never reach a reducer; presenting it in an optional
   * slot dismisses it after the first action.
   */
  ephemeral: <SS extends PayloadSchema, AS extends PayloadSchema = typeof Schema.Never>(
    state: SS,
    action?: AS,
  ): EphemeralCase<SS, AS> => ({ _kind: 'EphemeralCase', stateSchema: state, actionSchema: action }),
  /**
   * A case opaque to the engine: never scoped, never mutated, no actions.
   */
  ignored: <SS extends PayloadSchema>(state: SS): IgnoredCase<SS> => ({ _kind: 'IgnoredCase', stateSchema: state }),
}

export type Classification = 'composed' | 'ephemeral' | 'ignored'

export type CaseStateOf<E> = E extends { readonly _kind: 'Feature'; readonly state: StateDef<infer S extends object> }
  ? S
  : E extends { readonly _kind: 'EphemeralCase' | 'IgnoredCase'; readonly stateSchema: infer SS }
    ? Schema.Schema.Type<SS>
    : never

export type CaseActionOf<E> = E extends { readonly _kind: 'Feature'; readonly actionSchema: Schema.Schema<infer A> }
  ? A
  : E extends { readonly _kind: 'EphemeralCase'; readonly actionSchema: infer AS }
    ? Schema.Schema.Type<Exclude<AS, undefined>>
    : never

export type EnumState<C> = { [K in keyof C & string]: CaseValue<K, CaseStateOf<C[K]>> }[keyof C & string]

export type EnumAction<C> = {
  [K in keyof C & string]: [CaseActionOf<C[K]>] extends [never] ? never : ActionValue<K, CaseActionOf<C[K]>>
}[keyof C & string]

export type CaseActionTag<C> = {
  [K in keyof C & string]: [CaseActionOf<C[K]>] extends [never] ? never : K
}[keyof C & string]

export interface EnumFeature<C extends Cases> {
  readonly _kind: 'EnumFeature'
  readonly id: string
  readonly cases: C
  /**
   * Classification of every case tag, fixed when the enum is defined.
   */
  readonly classifications: ReadonlyMap<string, Classification>
  readonly make: <K extends keyof C & string>(tag: K, payload: CaseStateOf<C[K]>) => EnumState<C>
  readonly action: <K extends CaseActionTag<C> & string>(tag: K, payload: CaseActionOf<C[K & keyof C]>) => EnumAction<C>
  readonly is: (value: unknown) => value is EnumState<C>
  readonly isAction: (value: unknown) => value is EnumAction<C>
  readonly stateSchema: Schema.Schema<EnumState<C>>
  readonly actionSchema: Schema.Schema<EnumAction<C>>
  /**
   * Case routing over the slot holding the enum value.
   */
  readonly reducer: Reducer.Reducer<CaseScope.CompositeRef<EnumState<C> | undefined>, EnumAction<C>>
  readonly presentable: Presentation.Presentable<EnumState<C>, EnumAction<C>>
}

type ClassifiedCase =
  | {
      readonly kind: 'composed'
      readonly isState: (value: unknown) => boolean
      readonly isAction: (value: unknown) => boolean
      readonly reduce: ErasedFeature['reduce']
    }
  | {
      readonly kind: 'ephemeral' | 'ignored'
      readonly isState: (value: unknown) => boolean
      readonly isAction: (value: unknown) => boolean
    }

const caseKinds: ReadonlySet<unknown> = new Set(['Feature', 'EphemeralCase', 'IgnoredCase'])

const reservedTags: ReadonlySet<string> = new Set(['__proto__'])

const isCaseEntry = (value: unknown): value is CaseEntry =>
  typeof value === 'object' && value !== null && '_kind' in value && caseKinds.has(value._kind)

const classify = (entry: CaseEntry): ClassifiedCase => {
  switch (entry._kind) {
    case 'Feature':
      return { kind: 'composed', ...entry.erased }
    case 'EphemeralCase': {
      const { actionSchema } = entry
      return {
        kind: 'ephemeral',
        isState: Schema.is(entry.stateSchema),
        isAction: actionSchema === undefined ? () => false : Schema.is(actionSchema),
      }
    }
    case 'IgnoredCase':
      return { kind: 'ignored', isState: Schema.is(entry.stateSchema), isAction: () => false }
  }
}

const buildTable = (id: string, cases: Cases): ReadonlyMap<string, ClassifiedCase> => {
  const issues: Array<string> = []
  const table = new Map<string, ClassifiedCase>()
  for (const [tag, entry] of Object.entries(cases)) {
    const raw: unknown = entry
    if (tag.length === 0) issues.push('case tags must be non-empty')
    if (reservedTags.has(tag)) issues.push(`case tag "${tag}" is reserved`)
    if (!isCaseEntry(raw)) {
      issues.push(`case "${tag}" is not a feature, Case.ephemeral(...) or Case.ignored(...)`)
      continue
    }
    table.set(tag, classify(raw))
  }
  if (Object.keys(cases).length === 0) issues.push('an enum needs at least one case')
  if (issues.length > 0) throw new CompositionDefinitionError(id, issues)
  return table
}

/**
 * Defines an enum composite: a tagged union of cases, exactly one of which is live in a slot at a time.
 *
 * Cases are features (composed: actions are routed to the live case and its effects are scoped to the case's
 * identity), `Case.ephemeral(...)` or `Case.ignored(...)`.
 *
 * @example
 * ```ts
 * const Destination = Feature.Enum('Destination', {
 *   detail: Detail,
 *   alert: Case.ephemeral(Schema.Struct({ title: Schema.String }), Schema.Literal('ok')),
 *   legacy: Case.ignored(Schema.String),
 * })
 *
 * const value = Destination.make('detail', Detail.initial({ id: 1 }))
 * ```
 */
export const Enum = <const C extends Cases>(id: string, cases: C): EnumFeature<C> => {
  const table = buildTable(id, cases)

  const is = (value: unknown): value is EnumState<C> => {
    if (!isCaseValue(value)) return false
    const entry = table.get(value._tag)
    return entry !== undefined && entry.isState(value.payload)
  }

  const isAction = (value: unknown): value is EnumAction<C> => {
    if (!isTagged(value)) return false
    const entry = table.get(value._tag)
    return entry !== undefined && entry.isAction(value.payload)
  }

  const toAction = (tag: string, payload: unknown): EnumAction<C> => {
    const value = { _tag: tag, payload }
    if (!isAction(value)) throw new ActionPayloadError(tag)
    return value
  }

  const make = <K extends keyof C & string>(tag: K, payload: CaseStateOf<C[K]>): EnumState<C> => {
    const value = makeCaseValue(tag, payload)
    if (!is(value)) throw new StateDefinitionError(id, [`case "${tag}": payload does not match the case`])
    return value
  }

  const reducer: Reducer.Reducer<CaseScope.CompositeRef<EnumState<C> | undefined>, EnumAction<C>> = {
    reduce(ref, action) {
      const tagged: unknown = action
      if (!isTagged(tagged)) return Fx.none
      const tag = tagged._tag
      const entry = table.get(tag)
      if (entry === undefined) {
        report({
          code: 'case::unknown_tag',
          severity: 'warning',
          message: `Enum "${id}" has no case "${tag}"; the action was dropped.`,
          actionTag: tag,
        })
        return Fx.none
      }
      if (entry.kind === 'ignored') {
        report({
          code: 'case::ignored',
          severity: 'info',
          message: `Case "${tag}" of enum "${id}" is ignored; the action was dropped.`,
          actionTag: tag,
        })
        return Fx.none
      }

      const slot: CaseScope.CompositeRef<AnyCaseValue | undefined> = {
        get: () => {
          const value: unknown = ref.get()
          return isCaseValue(value) ? value : undefined
        },
        set: (value) => {
          if (is(value)) ref.set(value)
        },
      }
      const scoped = CaseScope.scope(slot, tag)
      if (Option.isNone(scoped)) {
        report({
          code: 'case::inactive',
          severity: 'info',
          message: `Case "${tag}" of enum "${id}" is not active; the action was dropped.`,
          hint: 'Typically an effect of a case that has since been dismissed or replaced.',
          actionTag: tag,
        })
        return Fx.none
      }
      if (entry.kind !== 'composed') return Fx.none

      const scope = scoped.value
      const draft = copyValue(scope.state)
      const fx = entry.reduce(draft, tagged.payload)
      if (fx === undefined) {
        report({
          code: 'case::unknown_tag',
          severity: 'warning',
          message: `Payload of the action for case "${tag}" of enum "${id}" is not an action of that case.`,
          actionTag: tag,
        })
        return Fx.none
      }
      if (!scope.writeBack(draft)) {
        report({
          code: 'case::stale_write_back',
          severity: 'warning',
          message: `Case "${tag}" of enum "${id}" was replaced while its action ran; the result was discarded.`,
          actionTag: tag,
        })
        return Fx.none
      }
      return Fx.map(Fx.scopeCancellation(Fx.unwrapStop(fx), scope.identity), (childAction) => toAction(tag, childAction))
    },
  }

  const classifications = new Map<string, Classification>()
  for (const [tag, entry] of table) classifications.set(tag, entry.kind)

  return {
    _kind: 'EnumFeature',
    id,
    cases,
    classifications,
    make,
    action: (tag, payload) => toAction(tag, payload),
    is,
    isAction,
    stateSchema: Schema.declare(is, { identifier: id }),
    actionSchema: Schema.declare(isAction, { identifier: `${id}.Action` }),
    reducer,
    presentable: {
      // A presented action reaching a live ephemeral case dismisses it.
      reducer: Reducer.make<CaseScope.CompositeRef<EnumState<C> | undefined>, EnumAction<C>>((ref, action) => {
        const fx = reducer.reduce(ref, action)
        const value: unknown = ref.get()
        const tagged: unknown = action
        const reached = isCaseValue(value) && isTagged(tagged) && value._tag === tagged._tag
        return reached && classifications.get(value._tag) === 'ephemeral' ? Fx.merge(fx, Fx.dismiss) : fx
      }),
    },
  }
}
