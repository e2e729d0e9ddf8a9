export * from "./domain/models/bookmark";
export * from "./domain/models/errors";
export * from "./domain/models/operation";
export * from "./domain/models/store-document";
export * from "./domain/models/tag";
export { BookmarkTable, type NewBookmark } from "./domain/services/bookmark-table";
export { TagRegistry, normalizeTagName } from "./domain/services/tag-registry";
export {
  createEmptyStore,
  decodeStore,
  decodeStoreText,
  encodeStore,
  serializeStore,
  type BookmarkStore
} from "./domain/services/store-codec";
export { parseCommand } from "./domain/services/command-parser";
export {
  executeOperation,
  type CommandEnvironment,
  type CommandOutcome,
  type CommandStatus
} from "./domain/services/command-interpreter";
export { formatTimestamp, parseTimestamp } from "./domain/services/timestamp";
export { truncateWithEllipsis } from "./domain/services/text";
export { fetchPageTitle, extractPageTitle } from "./platform/page-title";
export { loadStore, saveStore, type LoadStoreResult } from "./platform/store-file";
export { resolveRuntimeConfig, type RuntimeConfig } from "./shared/config";
export { runCli } from "./cli/index";
