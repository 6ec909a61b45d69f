import type { Stats } from "node:fs";
import { lstat, open, readdir, stat as statFollow, type FileHandle } from "node:fs/promises";
import { join, posix } from "node:path";
import { errnoCode, InputUnavailableError, NotReadableError } from "../core/errors.js";
import {
  compareNames,
  entryTypeOf,
  isUnder,
  normalizePath,
  S_IFDIR,
  type FileEntry,
  type FileStat,
  type FileSystemView,
} from "./view.js";

export interface Mount {
  /** Absolute path inside the target, e.g. "/" or "/var". */
  mountPoint: string;
  /** Host directory holding the extracted or mounted volume. */
  hostPath: string;
}

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

function timeOf(ms: number, date: Date): Date | null {
  return Number.isFinite(ms) ? date : null;
}

// Linux reports 0 when the host filesystem does not record birth time
function birthTimeOf(ms: number, date: Date): Date | null {
  return Number.isFinite(ms) && ms > 0 ? date : null;
}

function toFileStat(stats: Stats): FileStat {
  return {
    type: entryTypeOf(stats.mode),
    mode: stats.mode,
    size: stats.size,
    mtime: timeOf(stats.mtimeMs, stats.mtime),
    ctime: timeOf(stats.ctimeMs, stats.ctime),
    btime: birthTimeOf(stats.birthtimeMs, stats.birthtime),
  };
}

/** Directory implied by a mount point below it, with no volume of its own. */
const IMPLIED_DIRECTORY: FileStat = {
  type: "directory",
  mode: S_IFDIR | 0o755,
  size: 0,
  mtime: null,
  ctime: null,
  btime: null,
};

/**
 * Host directories stitched together into one target tree. The longest
 * matching mount point wins, so a persistent `/var` volume shadows the `var`
 * directory of the root volume.
 */
export class MountedFileSystem implements FileSystemView {
  readonly mounts: readonly Mount[];

  constructor(mounts: Mount[]) {
    const byPoint = new Map<string, Mount>();
    for (const m of mounts) {
      const mountPoint = normalizePath(m.mountPoint);
      byPoint.set(mountPoint, { mountPoint, hostPath: m.hostPath });
    }
    this.mounts = [...byPoint.values()].sort((a, b) => b.mountPoint.length - a.mountPoint.length);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await this.stat(path);
      return true;
    } catch (err) {
      if (err instanceof InputUnavailableError) return false;
      if (err instanceof NotReadableError) return true;
      throw err;
    }
  }

  async stat(path: string): Promise<FileStat> {
    const target = normalizePath(path);
    const hostPath = this.resolve(target);
    const implied = this.isMountAncestor(target);

    if (hostPath === null) {
      if (implied) return IMPLIED_DIRECTORY;
      throw new InputUnavailableError(target);
    }

    try {
      // The mount root itself may be a symlink on the host; entries inside never are followed
      const stats = this.isMountPoint(target) ? await statFollow(hostPath) : await lstat(hostPath);
      return toFileStat(stats);
    } catch (err) {
      const code = errnoCode(err);
      if (code !== undefined && MISSING_CODES.has(code)) {
        if (implied) return IMPLIED_DIRECTORY;
        throw new InputUnavailableError(target);
      }
      throw new NotReadableError(target, code ?? "lstat failed", { cause: err });
    }
  }

  async list(path: string): Promise<FileEntry[]> {
    const dir = normalizePath(path);
    const dirStat = await this.stat(dir);
    if (dirStat.type !== "directory") {
      throw new NotReadableError(dir, "not a directory");
    }

    const names = new Set<string>();
    const hostPath = this.resolve(dir);
    if (hostPath !== null && dirStat !== IMPLIED_DIRECTORY) {
      try {
        for (const name of await readdir(hostPath)) names.add(name);
      } catch (err) {
        throw new NotReadableError(dir, errnoCode(err) ?? "readdir failed", { cause: err });
      }
    }
    for (const m of this.mounts) {
      if (m.mountPoint !== "/" && posix.dirname(m.mountPoint) === dir) {
        names.add(posix.basename(m.mountPoint));
      }
    }

    const entries: FileEntry[] = [];
    for (const name of [...names].sort(compareNames)) {
      const childPath = posix.join(dir, name);
      try {
        entries.push({ path: childPath, name, stat: await this.stat(childPath) });
      } catch (err) {
        // A mount point whose volume is absent is not part of the tree
        if (err instanceof InputUnavailableError) continue;
        if (err instanceof NotReadableError) {
          entries.push({ path: childPath, name, stat: null });
          continue;
        }
        throw err;
      }
    }
    return entries;
  }

  async read(path: string, maxBytes: number): Promise<Buffer> {
    const target = normalizePath(path);
    const fileStat = await this.stat(target);
    const hostPath = this.resolve(target);
    if (fileStat.type !== "file" || hostPath === null) {
      throw new NotReadableError(target, `not a regular file (${fileStat.type})`);
    }

    const length = Math.min(fileStat.size, Math.max(0, maxBytes));
    const buffer = Buffer.alloc(length);
    let handle: FileHandle | undefined;
    try {
      handle = await open(hostPath, "r");
      let offset = 0;
      while (offset < length) {
        const { bytesRead } = await handle.read(buffer, offset, length - offset, offset);
        if (bytesRead === 0) break;
        offset += bytesRead;
      }
      return buffer.subarray(0, offset);
    } catch (err) {
      throw new NotReadableError(target, errnoCode(err) ?? "read failed", { cause: err });
    } finally {
      await handle?.close();
    }
  }

  private resolve(path: string): string | null {
    for (const m of this.mounts) {
      if (isUnder(path, m.mountPoint)) {
        const rel = m.mountPoint === "/" ? path.slice(1) : path.slice(m.mountPoint.length + 1);
        return rel ? join(m.hostPath, ...rel.split("/")) : m.hostPath;
      }
    }
    return null;
  }

  private isMountPoint(path: string): boolean {
    return this.mounts.some((m) => m.mountPoint === path);
  }

  private isMountAncestor(path: string): boolean {
    return this.mounts.some((m) => m.mountPoint !== path && isUnder(m.mountPoint, path));
  }
}
