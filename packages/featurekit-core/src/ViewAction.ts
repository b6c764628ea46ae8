import type { ActionToken, ActionValue } from './internal/action.js'
import { markViewAction } from './internal/runtime/viewAction.js'

/**
 * Sender for the actions a view may send: each view action is wrapped as `{ _tag: token.tag, payload }` and sent to
 * `store`. Stores created with `viewActionTag` report wrapped actions that bypass a sender.
 *
 * @example
 * ```ts
 * const send = ViewAction.sender(store, Search.actions.view)
 * send({ _tag: 'queryChanged', payload: 'tea' })
 * ```
 */
export const sender =
  <T extends string, P>(
    store: { readonly send: (action: ActionValue<T, P>) => void },
    token: ActionToken<T, P>,
  ): ((viewAction: P) => void) =>
  (viewAction) => {
    store.send(markViewAction({ _tag: token.tag, payload: viewAction }))
  }
