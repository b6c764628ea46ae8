// Public barrel for @featurekit/core
//   import * as Featurekit from "@featurekit/core"
// or pick the namespaces directly: import { Feature, Fx, Store } from "@featurekit/core"

// Identity & observation: which logical state a value is, and who depends on which of its fields
export * as Identity from './Identity.js'
export * as Observation from './Observation.js'
export * as TrackedField from './TrackedField.js'
export * as ObservableState from './ObservableState.js'

// Composition: actions, effects, reducers, enum cases, presentation
export * as Action from './Action.js'
export * as Fx from './Fx.js'
export * as Reducer from './Reducer.js'
export * as CaseScope from './CaseScope.js'
export * as Feature from './Feature.js'
export * as Presentation from './Presentation.js'
export * as Conformance from './Conformance.js'

// Runtime
export * as Store from './Store.js'
export * as ViewAction from './ViewAction.js'

// Debug, configuration and environment detection
export * as Debug from './Debug.js'
export * as Config from './Config.js'
export * as Env from './Env.js'

export {
  ActionPayloadError,
  CompositionDefinitionError,
  ConformanceError,
  StateDefinitionError,
} from './internal/errors.js'
