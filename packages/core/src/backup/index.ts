export { SnapshotManager, SnapshotFormatError, parseSnapshot } from './snapshot-manager.js';
export type { Snapshot, SnapshotContent, SnapshotInfo } from './snapshot-manager.js';
