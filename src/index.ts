// Repository model and storage
export type {
  BlobId,
  DirNode,
  FileNode,
  Node,
  NodeMeta,
  NodeType,
  OpenFile,
  Progress,
  ProgressBars,
  Repository,
  Snapshot,
  SpecialNode,
  SymlinkNode,
  Tree,
  TreeId,
} from './repository/types.js'
export { isDir, isFile, shortId } from './repository/types.js'
export {
  BlobNotFoundError,
  RepositoryError,
  SnapshotNotFoundError,
  TreeNotFoundError,
} from './repository/errors.js'
export { FsRepository, initRepository, hashBytes, type FsRepositoryOptions } from './repository/fs-repository.js'
export { captureSnapshot, type CaptureOptions } from './repository/capture.js'
export { restoreNode, type RestoreStats } from './repository/restore.js'
export { resolveSnapshot, walkTree, type TreeEntry } from './repository/resolve.js'
export {
  CallbackProgressBars,
  NoProgressBars,
  OraProgressBars,
  type ProgressUpdate,
} from './repository/progress.js'

// Directory summaries
export { Summary } from './summary/summary.js'
export { SummaryMap } from './summary/summary-map.js'

// Browser state machine
export {
  SnapshotBrowser,
  DEFAULT_VIEW_LIMIT,
  HELP_TEXT,
  INFO_TEXT,
  type BrowserMode,
  type BrowserResult,
  type BrowserScreen,
  type SnapshotBrowserOptions,
} from './tui/snapshot-browser.js'
export { SnapshotList, type ListResult, type ListScreen } from './tui/snapshot-list.js'
export { RestoreFlow, type RestoreStage } from './tui/restore-flow.js'
export { key, type KeyEvent } from './tui/types.js'

// Ink components
export { BrowserView } from './tui/components/views/BrowserView.js'
export { SnapshotListView } from './tui/components/views/SnapshotListView.js'
export { launchTUI, type TUIOptions } from './tui/index.js'

// Logging
export { createDebugLogger, configureLogging } from './utils/debug.js'
