/**
 * Programming errors: structural mistakes in how states, features and enums are declared, and action values built
 * against their declared schema. They are thrown where the mistake is made rather than surfaced during transitions.
 */

abstract class DefinitionErrorBase extends Error {
  abstract readonly _tag:
    | 'StateDefinitionError'
    | 'CompositionDefinitionError'
    | 'ConformanceError'
    | 'ActionPayloadError'
  readonly hint?: string

  protected constructor(message: string, hint?: string) {
    super(message)
    this.hint = hint
  }

  toJSON(): Record<string, unknown> {
    return {
      _tag: this._tag,
      name: this.name,
      message: this.message,
      hint: this.hint,
    }
  }
}

export class StateDefinitionError extends DefinitionErrorBase {
  readonly _tag = 'StateDefinitionError' as const

  constructor(
    readonly stateName: string,
    readonly issues: ReadonlyArray<string>,
  ) {
    super(
      [`[StateDefinitionError] Invalid state "${stateName}".`, ...issues.map((issue) => `- ${issue}`)].join('\n'),
      'Every field passed to make() must be declared on the definition and match its schema.',
    )
    this.name = 'StateDefinitionError'
  }
}

export class CompositionDefinitionError extends DefinitionErrorBase {
  readonly _tag = 'CompositionDefinitionError' as const

  constructor(
    readonly compositionId: string,
    readonly issues: ReadonlyArray<string>,
  ) {
    super(
      [`[CompositionDefinitionError] Invalid composition "${compositionId}".`, ...issues.map((issue) => `- ${issue}`)].join(
        '\n',
      ),
      'Enum cases must be features, Case.ephemeral(...) or Case.ignored(...), each under a unique non-empty tag.',
    )
    this.name = 'CompositionDefinitionError'
  }
}

export class ConformanceError extends DefinitionErrorBase {
  readonly _tag = 'ConformanceError' as const

  constructor(
    readonly definitionName: string,
    readonly conformance: string,
  ) {
    super(
      `[ConformanceError] "${definitionName}" does not declare the "${conformance}" conformance.`,
      `Add "${conformance}" to the definition's conformances.`,
    )
    this.name = 'ConformanceError'
  }
}

export class ActionPayloadError extends DefinitionErrorBase {
  readonly _tag = 'ActionPayloadError' as const

  constructor(readonly actionTag: string) {
    super(
      `[ActionPayloadError] Payload of action "${actionTag}" does not match its schema.`,
      'Build actions from their token with a payload of the declared type.',
    )
    this.name = 'ActionPayloadError'
  }
}
