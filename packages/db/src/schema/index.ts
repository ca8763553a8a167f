export * from './sessions.js'
export * from './ratings.js'
