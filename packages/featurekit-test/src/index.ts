export * as TestStore from './TestStore.js'
export { waitUntil } from './utils/waitUntil.js'
export type { WaitUntilOptions } from './utils/waitUntil.js'
