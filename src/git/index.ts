export * from './branch-header.js'
export * from './detached-ref.js'
export * from './git-dir.js'
export * from './parse-status.js'
export * from './prompt-status.js'
export * from './spawn.js'
export * from './stash-count.js'
export * from './summary.js'
export * from './types.js'
