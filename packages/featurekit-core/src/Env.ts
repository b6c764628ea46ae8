// Runtime environment helpers:
// - getNodeEnv reads globalThis.process.env.NODE_ENV of the calling process;
// - isDevEnv treats anything other than "production" as a development environment.
export { getNodeEnv, isDevEnv } from './internal/env.js'
