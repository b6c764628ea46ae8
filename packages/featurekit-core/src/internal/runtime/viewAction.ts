const wrapped = new WeakSet<object>()

/**
 * Marks `action` as built by a view sender.
 */
export const markViewAction = <A extends object>(action: A): A => {
  wrapped.add(action)
  return action
}

export const isMarkedViewAction = (action: unknown): boolean =>
  typeof action === 'object' && action !== null && wrapped.has(action)
