import { loadModule } from '@libpg-query/parser'

// ============ Module Loading ============
let moduleLoaded = false
let pendingLoad: Promise<void> | null = null

/**
 * Load the libpg-query WASM module. Concurrent callers share one load; a
 * failed load is forgotten so the next call tries again. Until it resolves,
 * precise parsing is skipped and the heuristic parser stands alone.
 */
export function ensureModuleLoaded(): Promise<void> {
  if (moduleLoaded) return Promise.resolve()
  if (!pendingLoad) {
    pendingLoad = loadModule().then(
      () => {
        moduleLoaded = true
      },
      (err: unknown) => {
        pendingLoad = null
        throw err
      }
    )
  }
  return pendingLoad
}

export function isModuleLoaded(): boolean {
  return moduleLoaded
}
