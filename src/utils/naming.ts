/**
 * Backup and per-file archive naming utilities
 */

import type { BackupType } from "../types";
import { generateShortId } from "./crypto";
import { getProjectName } from "./path";

// Archive tag: UTC YYYYMMDDHHmmssSSS plus a four digit sequence
export const ARCHIVE_TAG_PATTERN = /^\d{17}-\d{4}$/;

export const COMPRESSED_EXTENSION = ".tar.gz";

export interface ParsedArchiveTag {
  timestamp: string;
  sequence: number;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

// Backup name: project_YYYYMMDD_HHMMSS_type_shortid (".tar.gz" appended when compressed)
export function generateBackupName(projectPath: string, type: BackupType, now: Date = new Date()): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1, 2)}${pad(now.getUTCDate(), 2)}`;
  const time = `${pad(now.getUTCHours(), 2)}${pad(now.getUTCMinutes(), 2)}${pad(now.getUTCSeconds(), 2)}`;
  return `${getProjectName(projectPath)}_${date}_${time}_${type.toLowerCase()}_${generateShortId()}`;
}

export function formatArchiveTimestamp(now: Date): string {
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1, 2)}${pad(now.getUTCDate(), 2)}` +
    `${pad(now.getUTCHours(), 2)}${pad(now.getUTCMinutes(), 2)}${pad(now.getUTCSeconds(), 2)}` +
    pad(now.getUTCMilliseconds(), 3)
  );
}

function parseArchiveTimestamp(timestamp: string): number {
  const part = (start: number, end: number): number => Number.parseInt(timestamp.slice(start, end), 10);
  return Date.UTC(part(0, 4), part(4, 6) - 1, part(6, 8), part(8, 10), part(10, 12), part(12, 14), part(14, 17));
}

export function formatArchiveTag(timestamp: string, sequence: number): string {
  return `${timestamp}-${pad(sequence, 4)}`;
}

export function parseArchiveTag(tag: string): ParsedArchiveTag | null {
  if (!ARCHIVE_TAG_PATTERN.test(tag)) return null;
  const [timestamp = "", sequence = "0"] = tag.split("-");
  return { timestamp, sequence: Number.parseInt(sequence, 10) };
}

export const MAX_ARCHIVE_SEQUENCE = 9999;

/**
 * Next tag for `now`, strictly greater than every tag already taken. A full
 * sequence moves on to the following millisecond.
 */
export function nextArchiveTag(now: Date, existingTags: string[]): string {
  const candidate = formatArchiveTag(formatArchiveTimestamp(now), 0);

  const latest = existingTags
    .filter((tag) => ARCHIVE_TAG_PATTERN.test(tag))
    .reduce<string | null>((max, tag) => (max === null || tag > max ? tag : max), null);
  const parsed = latest !== null && latest >= candidate ? parseArchiveTag(latest) : null;
  if (!parsed) return candidate;

  if (parsed.sequence < MAX_ARCHIVE_SEQUENCE) {
    return formatArchiveTag(parsed.timestamp, parsed.sequence + 1);
  }
  const following = new Date(parseArchiveTimestamp(parsed.timestamp) + 1);
  return formatArchiveTag(formatArchiveTimestamp(following), 0);
}
