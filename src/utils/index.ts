/**
 * Utility exports
 */

// Checksum utilities
export {
  CHUNK_SIZE,
  computeFileChecksum,
  computeStringHash,
  computeTreeChecksum,
  computeTreeSize,
  generateShortId,
  generateUUID,
  listTreeFiles,
  type TreeFile,
  type TreeOptions,
} from "./crypto";

// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel } from "./logger";
// Logger
export { debug, error, getLogLevel, info, isLogLevel, LOG_LEVELS, logger, setLogLevel, warn } from "./logger";
export type { ParsedArchiveTag } from "./naming";
// Naming utilities
export {
  ARCHIVE_TAG_PATTERN,
  COMPRESSED_EXTENSION,
  formatArchiveTag,
  formatArchiveTimestamp,
  generateBackupName,
  MAX_ARCHIVE_SEQUENCE,
  nextArchiveTag,
  parseArchiveTag,
} from "./naming";
// Path utilities
export { getProjectName, isErrnoException, isNotFoundError, isPathWithinDir, toPosixPath } from "./path";
