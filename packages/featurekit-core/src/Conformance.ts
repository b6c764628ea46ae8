import { Equivalence, Hash, Schema } from 'effect'
import { isStateDef, type AnyStateDef, type FieldInput, type StateDef } from './ObservableState.js'
import { ConformanceError } from './internal/errors.js'
import { internalsOf } from './internal/state/values.js'

/**
 * Opt-in capabilities of a state definition. Declaring one is a promise checked when the capability is derived,
 * not a runtime primitive of the store.
 */
export type Name = 'equatable' | 'hashable' | 'encodable' | 'decodable' | 'codable' | 'sendable'

export const names: ReadonlyArray<Name> = ['equatable', 'hashable', 'encodable', 'decodable', 'codable', 'sendable']

const implied: Readonly<Record<Name, ReadonlyArray<Name>>> = {
  equatable: ['hashable'],
  hashable: [],
  encodable: ['codable'],
  decodable: ['codable'],
  codable: [],
  sendable: [],
}

export interface HasConformances {
  readonly name: string
  readonly conformances: ReadonlySet<Name>
}

/**
 * Whether `target` declares `conformance`, directly or through a stronger one (`codable` covers both coding
 * directions, `hashable` covers `equatable`).
 */
export const has = (target: HasConformances, conformance: Name): boolean =>
  target.conformances.has(conformance) || implied[conformance].some((stronger) => target.conformances.has(stronger))

const requireConformance = (def: HasConformances, conformance: Name): void => {
  if (!has(def, conformance)) throw new ConformanceError(def.name, conformance)
}

const readField = (value: unknown, key: string): unknown => internalsOf(value)?.fields.get(key)?.peek()

const fieldEntries = (def: AnyStateDef): ReadonlyArray<readonly [string, FieldInput]> => Object.entries(def.fieldInputs)

const fieldEquivalence = (input: FieldInput): Equivalence.Equivalence<unknown> => {
  if (isStateDef(input)) return structuralEquivalence(input)
  const equivalence = Schema.equivalence(input)
  const is = Schema.is(input)
  return (a, b) => is(a) && is(b) && equivalence(a, b)
}

const structuralEquivalence = (def: AnyStateDef): Equivalence.Equivalence<unknown> => {
  const fields = fieldEntries(def).map(([key, input]) => [key, fieldEquivalence(input)] as const)
  return Equivalence.make((a, b) => {
    if (!def.isInstance(a) || !def.isInstance(b)) return false
    return fields.every(([key, equivalence]) => equivalence(readField(a, key), readField(b, key)))
  })
}

/**
 * Field-wise equality of two instances of `def`. Identity is not compared: a state and its copy are equal until
 * one of them is written.
 */
export const equivalence = <S extends object>(def: StateDef<S>): Equivalence.Equivalence<S> => {
  requireConformance(def, 'equatable')
  return structuralEquivalence(def)
}

const hashValue = (input: FieldInput, value: unknown): number => {
  if (isStateDef(input)) return structuralHash(input, value)
  if (Array.isArray(value)) return Hash.array(value.map((item) => Hash.hash(item)))
  if (typeof value === 'object' && value !== null) return Hash.structure(value)
  return Hash.hash(value)
}

const structuralHash = (def: AnyStateDef, value: unknown): number =>
  fieldEntries(def).reduce(
    (acc, [key, input]) => Hash.combine(hashValue(input, readField(value, key)))(acc),
    Hash.string(def.name),
  )

export const hash = <S extends object>(def: StateDef<S>): ((value: S) => number) => {
  requireConformance(def, 'hashable')
  return (value) => structuralHash(def, value)
}

const encodeFields = (def: AnyStateDef, value: unknown): Record<string, unknown> => {
  const out: Record<string, unknown> = {}
  for (const [key, input] of fieldEntries(def)) {
    const field = readField(value, key)
    out[key] = isStateDef(input) ? encodeFields(input, field) : Schema.encodeUnknownSync(input)(field)
  }
  return out
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const decodeRecord = (def: AnyStateDef, input: unknown): Record<string, unknown> => {
  const out: Record<string, unknown> = {}
  if (!isRecord(input)) return out
  for (const [key, fieldInput] of fieldEntries(def)) {
    if (!(key in input)) continue
    const raw = input[key]
    out[key] = isStateDef(fieldInput)
      ? fieldInput.makeUnknown(decodeRecord(fieldInput, raw))
      : Schema.decodeUnknownSync(fieldInput)(raw)
  }
  return out
}

/**
 * Encoded form of an instance: a plain record of each field encoded by its schema.
 */
export const encode = <S extends object>(def: StateDef<S>): ((value: S) => Record<string, unknown>) => {
  requireConformance(def, 'encodable')
  return (value) => encodeFields(def, value)
}

/**
 * Inverse of `encode`; the result is a fresh logical instance with a new identity.
 */
export const decode = <S extends object>(def: StateDef<S>): ((input: unknown) => S) => {
  requireConformance(def, 'decodable')
  return (input) => def.makeUnknown(decodeRecord(def, input))
}
