import { errorMessage } from "../core/errors.js";
import { createFinding, type CheckOutput } from "../core/models.js";
import { compareNames, formatMode, S_ISUID, type FileEntry, type FileSystemView } from "../fs/view.js";
import { walk, type SkipHandler } from "../fs/walk.js";
import type { SuidRules } from "../iocs/index.js";
import { skipCollector } from "./base.js";

export interface SuidOptions {
  /** Number of top-level subtrees walked at once. */
  concurrency?: number;
}

/**
 * Walks the whole tree for setuid regular files that are not on the
 * known-good allowlist. Metadata only; no content is read.
 */
export async function checkSuidBinaries(
  view: FileSystemView,
  rules: SuidRules,
  options: SuidOptions = {},
  onSkip?: SkipHandler,
): Promise<CheckOutput> {
  const output: CheckOutput = { findings: [], skipped: [] };
  const skip = skipCollector(output, onSkip);
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));

  const visit = (entry: FileEntry): void => {
    if (entry.stat === null) {
      skip({ path: entry.path, reason: "unreadable", detail: "metadata not readable" });
      return;
    }
    if (entry.stat.type !== "file" || (entry.stat.mode & S_ISUID) === 0) return;
    if (rules.allowlist.has(entry.path)) return;

    output.findings.push(
      createFinding({
        kind: "binary/suid",
        confidence: "medium",
        message: `Binary with SUID bit set observed (mode ${formatMode(entry.stat.mode)})`,
        path: entry.path,
        check: "suid",
        details: { mode: formatMode(entry.stat.mode), size: entry.stat.size },
      }),
    );
  };

  if (concurrency === 1) {
    for await (const entry of walk(view, "/", skip)) visit(entry);
  } else {
    let top: FileEntry[];
    try {
      top = await view.list("/");
    } catch (err) {
      skip({ path: "/", reason: "unreadable", detail: errorMessage(err) });
      top = [];
    }
    top.forEach(visit);

    const subtrees = top.filter((e) => e.stat?.type === "directory").map((e) => e.path);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < subtrees.length) {
        const dir = subtrees[next++];
        for await (const entry of walk(view, dir, skip)) visit(entry);
      }
    };
    await Promise.all(Array.from({ length: Math.min(concurrency, subtrees.length) }, worker));
  }

  // Parallel walkers finish in any order
  output.findings.sort((a, b) => compareNames(a.path, b.path));
  output.skipped.sort((a, b) => compareNames(a.path, b.path));
  return output;
}
