import { posix } from "node:path";
import { InputUnavailableError, NotReadableError } from "../core/errors.js";
import {
  compareNames,
  normalizePath,
  S_IFDIR,
  S_IFLNK,
  S_IFREG,
  type EntryType,
  type FileEntry,
  type FileStat,
  type FileSystemView,
} from "./view.js";

export interface MemoryNode {
  type?: EntryType;
  content?: string | Buffer;
  /** Permission and special bits, e.g. 0o4755. Type bits come from `type`. */
  mode?: number;
  mtime?: Date | null;
  ctime?: Date | null;
  btime?: Date | null;
  unreadable?: boolean;
}

interface StoredNode {
  stat: FileStat;
  content: Buffer;
  unreadable: boolean;
}

const TYPE_BITS: Record<EntryType, number> = {
  file: S_IFREG,
  directory: S_IFDIR,
  symlink: S_IFLNK,
  other: 0o020000,
};

const DEFAULT_PERMISSIONS: Record<EntryType, number> = {
  file: 0o644,
  directory: 0o755,
  symlink: 0o777,
  other: 0o600,
};

/**
 * Synthetic target tree. Parent directories are created implicitly; every
 * timestamp not given is unknown.
 */
export class InMemoryFileSystem implements FileSystemView {
  private readonly nodes = new Map<string, StoredNode>();

  constructor(tree: Record<string, MemoryNode> = {}) {
    this.nodes.set("/", this.store({ type: "directory" }));
    for (const [path, node] of Object.entries(tree)) {
      this.insert(normalizePath(path), node);
    }
  }

  async exists(path: string): Promise<boolean> {
    return this.nodes.has(normalizePath(path));
  }

  async stat(path: string): Promise<FileStat> {
    return this.lookup(normalizePath(path)).stat;
  }

  async list(path: string): Promise<FileEntry[]> {
    const dir = normalizePath(path);
    const node = this.lookup(dir);
    if (node.stat.type !== "directory") {
      throw new NotReadableError(dir, "not a directory");
    }

    const entries: FileEntry[] = [];
    for (const [childPath, child] of this.nodes) {
      if (childPath === "/" || posix.dirname(childPath) !== dir) continue;
      entries.push({
        path: childPath,
        name: posix.basename(childPath),
        stat: child.unreadable ? null : child.stat,
      });
    }
    return entries.sort((a, b) => compareNames(a.name, b.name));
  }

  async read(path: string, maxBytes: number): Promise<Buffer> {
    const target = normalizePath(path);
    const node = this.lookup(target);
    if (node.stat.type !== "file") {
      throw new NotReadableError(target, `not a regular file (${node.stat.type})`);
    }
    return node.content.subarray(0, Math.max(0, maxBytes));
  }

  private lookup(path: string): StoredNode {
    const node = this.nodes.get(path);
    if (!node) throw new InputUnavailableError(path);
    if (node.unreadable) throw new NotReadableError(path, "permission denied");
    return node;
  }

  private insert(path: string, node: MemoryNode): void {
    const parent = posix.dirname(path);
    if (!this.nodes.has(parent)) this.insert(parent, { type: "directory" });
    this.nodes.set(path, this.store(node));
  }

  private store(node: MemoryNode): StoredNode {
    const type = node.type ?? "file";
    const content =
      node.content === undefined
        ? Buffer.alloc(0)
        : typeof node.content === "string"
          ? Buffer.from(node.content, "utf-8")
          : node.content;
    return {
      stat: {
        type,
        mode: TYPE_BITS[type] | (node.mode ?? DEFAULT_PERMISSIONS[type]),
        size: content.length,
        mtime: node.mtime ?? null,
        ctime: node.ctime ?? null,
        btime: node.btime ?? null,
      },
      content,
      unreadable: node.unreadable ?? false,
    };
  }
}
