// Core functions
export { ensureModuleLoaded, isModuleLoaded } from './core'

// Scope resolution
export * from './autocomplete'
