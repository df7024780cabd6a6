export { Debouncer, DEFAULT_DEBOUNCE_MS } from './services/debouncer.js';
export type { DebouncerOptions } from './services/debouncer.js';
export { SnapshotStore } from './services/snapshot-store.js';
export { DiffEngine, isBinaryContent, splitLines } from './services/diff-engine.js';
export { computeOpcodes, groupOpcodes, formatUnifiedDiff } from './services/line-matcher.js';
export {
    DirectoryWatcher,
    DEFAULT_EXCLUDED_DIRECTORIES,
    normalizeOperation,
} from './services/directory-watcher.js';
export { ChokidarWatchBackend } from './services/watch-backend.js';
export { ChangeMonitor } from './services/change-monitor.js';
export type { ChangeOutcome, ChangeHandlers, ChangeSource } from './services/change-monitor.js';
export { BoundedChannel } from './utils/bounded-channel.js';
export type { ReceiveChannel } from './utils/bounded-channel.js';
export type * from './types/diff.js';
export type * from './types/file-watcher.js';
