import { errorMessage, InputUnavailableError } from "../core/errors.js";
import type { SkippedInput } from "../core/models.js";
import { normalizePath, type FileEntry, type FileSystemView } from "./view.js";

export type SkipHandler = (skip: SkippedInput) => void;

/**
 * Walks everything below `root` (the root itself is not yielded). A
 * directory's children are yielded together, before any of their own
 * contents; siblings come in name order. Symlinks are yielded but never
 * followed. Directories that cannot be listed are reported through `onSkip`
 * and the walk carries on.
 */
export async function* walk(
  view: FileSystemView,
  root: string,
  onSkip: SkipHandler,
): AsyncGenerator<FileEntry> {
  const stack: string[] = [normalizePath(root)];

  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) break;

    let children: FileEntry[];
    try {
      children = await view.list(dir);
    } catch (err) {
      onSkip({
        path: dir,
        reason: err instanceof InputUnavailableError ? "unavailable" : "unreadable",
        detail: errorMessage(err),
      });
      continue;
    }

    const subdirs: string[] = [];
    for (const child of children) {
      yield child;
      if (child.stat?.type === "directory") subdirs.push(child.path);
    }
    // Reverse so the stack pops subdirectories in name order
    for (let i = subdirs.length - 1; i >= 0; i--) stack.push(subdirs[i]);
  }
}
