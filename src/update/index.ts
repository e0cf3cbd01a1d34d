/**
 * Orchestration of changelog and control updates.
 */

export {
  DebianUpdater,
  DEFAULT_DEBIAN_DIR,
  summarizeStatus,
  formatOutcome,
  formatUpdateReport,
  type DebianUpdaterOptions,
  type FileOutcome,
  type TargetFile,
  type UpdateResult,
  type UpdateStatus,
} from "./orchestrator.js";
export { NodeFileStore, MemoryFileStore, PreviewFileStore, type FileStore } from "./store.js";
