export { test, expect } from './test'
export { SessionStateCache } from './sessionState'
export { createStorageState } from './storageState'
export type { StorageStateOptions } from './storageState'
