import { errorMessage, UnsupportedLayoutError } from "../core/errors.js";
import { createFinding, type CheckOutput, type Confidence, type Finding } from "../core/models.js";
import type { FileStat, FileSystemView } from "../fs/view.js";
import { walk, type SkipHandler } from "../fs/walk.js";
import type { TimestompRules } from "../iocs/index.js";
import { skipCollector } from "./base.js";

export interface TimestompContext {
  /** Appliance install time, when known. */
  installTime: Date | null;
  fullTree?: boolean;
}

interface Anomaly {
  confidence: Confidence;
  message: string;
  details: Record<string, unknown>;
}

function seconds(later: Date, earlier: Date): number {
  return Math.floor((later.getTime() - earlier.getTime()) / 1000);
}

/**
 * Strongest timestamp inconsistency of one entry, or null. Rules whose
 * timestamps are unknown are not evaluated.
 */
export function evaluateTimestamps(
  stat: FileStat,
  parent: FileStat | undefined,
  installTime: Date | null,
  thresholdSeconds: number,
): Anomaly | null {
  const { mtime, ctime } = stat;

  if (mtime && ctime && installTime) {
    const changedAfterInstall = seconds(ctime, installTime);
    if (mtime < installTime && changedAfterInstall > thresholdSeconds) {
      return {
        confidence: "high",
        message: `Modified before install but changed ${changedAfterInstall} seconds after it`,
        details: {
          mtime: mtime.toISOString(),
          ctime: ctime.toISOString(),
          installTime: installTime.toISOString(),
        },
      };
    }
  }

  if (mtime && ctime) {
    const gap = seconds(ctime, mtime);
    if (gap > thresholdSeconds) {
      return {
        confidence: "medium",
        message: `Possibly timestomped file observed (${gap} seconds)`,
        details: { mtime: mtime.toISOString(), ctime: ctime.toISOString(), gapSeconds: gap },
      };
    }
  }

  const parentBirth = parent?.btime;
  if (mtime && parentBirth && mtime < parentBirth) {
    return {
      confidence: "low",
      message: `Modified ${seconds(parentBirth, mtime)} seconds before its directory was created`,
      details: { mtime: mtime.toISOString(), parentBtime: parentBirth.toISOString() },
    };
  }

  return null;
}

/**
 * Flags files and directories whose timestamps contradict each other in ways
 * typical of deliberate antedating.
 */
export async function checkTimestomps(
  view: FileSystemView,
  rules: TimestompRules,
  context: TimestompContext,
  onSkip?: SkipHandler,
): Promise<CheckOutput> {
  const output: CheckOutput = { findings: [], skipped: [] };
  const skip = skipCollector(output, onSkip);
  const fullTree = context.fullTree ?? rules.fullTree;
  const roots = fullTree ? ["/"] : rules.directories;
  let scanned = 0;

  for (const root of roots) {
    let rootStat: FileStat;
    try {
      rootStat = await view.stat(root);
    } catch (err) {
      skip({
        path: root,
        reason: (await view.exists(root)) ? "unreadable" : "unavailable",
        detail: errorMessage(err),
      });
      continue;
    }
    scanned++;

    // Parents are always yielded before their contents
    const directories = new Map<string, FileStat>([[root, rootStat]]);
    for await (const entry of walk(view, root, skip)) {
      if (entry.stat === null) {
        skip({ path: entry.path, reason: "unreadable", detail: "metadata not readable" });
        continue;
      }
      if (entry.stat.type === "directory") directories.set(entry.path, entry.stat);
      if (entry.stat.type !== "file" && entry.stat.type !== "directory") continue;

      const parentPath = entry.path.slice(0, entry.path.lastIndexOf("/")) || "/";
      const anomaly = evaluateTimestamps(
        entry.stat,
        directories.get(parentPath),
        context.installTime,
        rules.thresholdSeconds,
      );
      if (anomaly) output.findings.push(toFinding(entry.path, anomaly));
    }
  }

  if (scanned === 0) {
    throw new UnsupportedLayoutError("timestomp", roots);
  }
  return output;
}

function toFinding(path: string, anomaly: Anomaly): Finding {
  return createFinding({
    kind: "timestomp",
    confidence: anomaly.confidence,
    message: anomaly.message,
    path,
    check: "timestomp",
    details: anomaly.details,
  });
}
