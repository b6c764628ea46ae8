import { Schema } from 'effect'
import { ActionPayloadError } from './errors.js'

type ActionArgs<P> = [P] extends [void] ? [] | [P] : [P]

export type PayloadSchema = Schema.Schema.AnyNoContext

export type ActionSchemas = Readonly<Record<string, PayloadSchema>>

export interface ActionValue<Tag extends string, Payload> {
  readonly _tag: Tag
  readonly payload: Payload
}

export type AnyAction = ActionValue<string, unknown>

export type ActionToken<Tag extends string, Payload, S extends PayloadSchema = PayloadSchema> = ((
  ...args: ActionArgs<Payload>
) => ActionValue<Tag, Payload>) & {
  readonly _kind: 'ActionToken'
  readonly tag: Tag
  readonly schema: S
  readonly is: (value: unknown) => value is ActionValue<Tag, Payload>
}

export type ActionTokens<M extends ActionSchemas> = {
  readonly [K in keyof M & string]: ActionToken<K, Schema.Schema.Type<M[K]>, M[K]>
}

/**
 * Union of the action values described by a payload-schema map.
 */
export type ActionOf<M extends ActionSchemas> = {
  readonly [K in keyof M & string]: ActionValue<K, Schema.Schema.Type<M[K]>>
}[keyof M & string]

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export const isTagged = (value: unknown): value is { readonly _tag: string; readonly payload?: unknown } =>
  isRecord(value) && typeof value._tag === 'string'

export const make = <Tag extends string, S extends PayloadSchema>(
  tag: Tag,
  schema: S,
): ActionToken<Tag, Schema.Schema.Type<S>, S> => {
  const isPayload = Schema.is(schema)
  const create = (...args: ActionArgs<Schema.Schema.Type<S>>): ActionValue<Tag, Schema.Schema.Type<S>> => {
    const payload: unknown = args[0]
    if (!isPayload(payload)) throw new ActionPayloadError(tag)
    return { _tag: tag, payload }
  }
  const is = (value: unknown): value is ActionValue<Tag, Schema.Schema.Type<S>> =>
    isTagged(value) && value._tag === tag && isPayload(value.payload)
  return Object.assign(create, { _kind: 'ActionToken' as const, tag, schema, is })
}

export const makeActions = <M extends ActionSchemas>(schemas: M): ActionTokens<M> => {
  const out: Record<string, unknown> = {}
  for (const [key, schema] of Object.entries(schemas)) {
    out[key] = make(key, schema)
  }
  return out as ActionTokens<M>
}

/**
 * Guard for the union described by `schemas`: the tag must be declared and the payload must match its schema.
 */
export const isActionOf =
  <M extends ActionSchemas>(schemas: M) =>
  (value: unknown): value is ActionOf<M> => {
    if (!isTagged(value) || !Object.hasOwn(schemas, value._tag)) return false
    const schema = schemas[value._tag]
    return schema !== undefined && Schema.is(schema)(value.payload)
  }
