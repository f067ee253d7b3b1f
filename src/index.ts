/**
 * git-prompt-status public API
 */

export * from './cli/index.js'
export * from './git/index.js'
export { debugLog, isDebugEnabled } from './logger/debug.js'
