import { posix } from "node:path";

export type EntryType = "file" | "directory" | "symlink" | "other";

export const S_IFMT = 0o170000;
export const S_IFREG = 0o100000;
export const S_IFDIR = 0o040000;
export const S_IFLNK = 0o120000;
export const S_ISUID = 0o4000;
export const PERMISSION_BITS = 0o777;

export interface FileStat {
  type: EntryType;
  /** Full st_mode: type, special and permission bits. */
  mode: number;
  size: number;
  mtime: Date | null;
  ctime: Date | null;
  btime: Date | null;
}

export interface FileEntry {
  path: string;
  name: string;
  /** `null` when the entry is listed but its metadata cannot be read. */
  stat: FileStat | null;
}

/**
 * Read-only view over a reconstructed target filesystem. Paths are absolute
 * POSIX paths inside the target.
 */
export interface FileSystemView {
  exists(path: string): Promise<boolean>;
  /** Does not follow symlinks. Throws InputUnavailableError or NotReadableError. */
  stat(path: string): Promise<FileStat>;
  /** Direct children, sorted by name. Throws InputUnavailableError or NotReadableError. */
  list(path: string): Promise<FileEntry[]>;
  /** At most `maxBytes` bytes of a regular file. Throws NotReadableError. */
  read(path: string, maxBytes: number): Promise<Buffer>;
}

export function entryTypeOf(mode: number): EntryType {
  switch (mode & S_IFMT) {
    case S_IFREG:
      return "file";
    case S_IFDIR:
      return "directory";
    case S_IFLNK:
      return "symlink";
    default:
      return "other";
  }
}

export function normalizePath(path: string): string {
  const normalized = posix.normalize(posix.join("/", path));
  return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

export function isUnder(path: string, dir: string): boolean {
  return dir === "/" || path === dir || path.startsWith(dir + "/");
}

export function formatMode(mode: number): string {
  return (mode & 0o7777).toString(8).padStart(4, "0");
}

export function parseMode(octal: string): number {
  return parseInt(octal, 8);
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
