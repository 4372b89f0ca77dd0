export type { ContextStore, WriteReceipt, MemoryRecord, MemoryRecordFilter, MemoryRecordMetadata, MemoryRecordType } from './context-store.js'
export { assertQueryFilter } from './context-store.js'
export { SqliteContextStore } from './sqlite-context-store.js'
export { ResilientContextStore, DEFAULT_STORE_RETRY } from './resilient-context-store.js'
export { awaitVisible, readRecords, DEFAULT_VISIBILITY } from './visibility.js'
export type { RecordVisibility, VisibilityOptions } from './visibility.js'
