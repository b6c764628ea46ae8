// Action tokens: typed creators `{ _tag, payload }` built from payload schemas.
// A token validates its payload when called and doubles as a guard (`token.is(value)`).
export type {
  ActionOf,
  ActionSchemas,
  ActionToken,
  ActionTokens,
  ActionValue,
  AnyAction,
  PayloadSchema,
} from './internal/action.js'
export { isActionOf, isTagged, make, makeActions } from './internal/action.js'
