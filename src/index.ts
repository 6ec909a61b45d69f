/**
 * ioc-triage: IOC checks over acquired appliance filesystem images.
 *
 * @example
 * ```typescript
 * import { scan, formatResult, getExitCode } from 'ioc-triage';
 *
 * // A directory holding the extracted tree, or a JSON manifest of volumes
 * const result = await scan('./images/gateway01.json');
 * console.log(result.summary.status); // "CLEAN" | "IOCS_FOUND" | ...
 *
 * // Only the cheap checks
 * const quick = await scan('./extracted/', { checks: ['webshell', 'cronjob'] });
 * process.stdout.write(formatResult(quick, 'markdown'));
 * ```
 */

import {
  confidenceRank,
  type OutputFormat,
  type ScanOptions,
  type ScanResult,
  type Target,
} from "./core/models.js";
import { ScanContext, type ScanCallbacks } from "./core/context.js";
import { Scanner } from "./core/scanner.js";
import type { FileSystemView } from "./fs/view.js";
import { fingerprint } from "./target/fingerprint.js";
import { openTarget } from "./target/open.js";
import { loadRules } from "./iocs/index.js";
import { renderJSON } from "./report/json.js";
import { renderMarkdown } from "./report/markdown.js";
import { renderTerminal } from "./report/terminal.js";

export const EXIT_TARGET_ERROR = 4;
export const EXIT_INTERNAL_ERROR = 5;

export async function scanOpened(
  target: Target,
  options: ScanOptions = {},
  callbacks?: ScanCallbacks,
): Promise<ScanResult> {
  const ctx = new ScanContext({
    checks: options.checks,
    installTime: options.installTime,
    timestompFullTree: options.timestompFullTree,
    concurrency: options.concurrency,
    callbacks,
  });
  return new Scanner(loadRules(options.rulesPath)).run(target, ctx);
}

/** Opens `targetSpec` and runs the checks. Throws TargetOpenError if it cannot be opened. */
export async function scan(targetSpec: string, options: ScanOptions = {}): Promise<ScanResult> {
  return scanOpened(await openTarget(targetSpec), options);
}

/** Runs the checks over an already constructed view, e.g. an InMemoryFileSystem. */
export async function scanView(
  view: FileSystemView,
  options: ScanOptions & { name?: string } = {},
): Promise<ScanResult> {
  const fp = await fingerprint(view);
  const target: Target = {
    view,
    info: {
      spec: options.name ?? "<view>",
      name: options.name ?? "<view>",
      ...fp,
      installTime: options.installTime ?? null,
      volumes: [],
    },
  };
  return scanOpened(target, options);
}

const RENDERERS: Record<OutputFormat, (result: ScanResult) => string> = {
  terminal: renderTerminal,
  json: renderJSON,
  markdown: renderMarkdown,
};

export function formatResult(result: ScanResult, format: OutputFormat): string {
  return RENDERERS[format](result);
}

/** 0 without findings, otherwise the rank of the strongest confidence (1-3). */
export function getExitCode(result: ScanResult): number {
  const max = result.summary.maxConfidence;
  return max === null ? 0 : confidenceRank[max];
}

export {
  type ScanResult,
  type ScanOptions,
  type CheckName,
  type CheckResult,
  type Confidence,
  type Finding,
  type FindingKind,
  type FirmwareAssessment,
  type OutputFormat,
  type SkippedInput,
  type Target,
  type TargetInfo,
  ALL_CHECKS,
  CONFIDENCE_LEVELS,
  OUTPUT_FORMATS,
  VERSION,
} from "./core/models.js";
export { ScanContext, type ScanCallbacks } from "./core/context.js";
export { Scanner } from "./core/scanner.js";
export {
  TriageError,
  InputUnavailableError,
  NotReadableError,
  MalformedDefinitionError,
  UnsupportedLayoutError,
  TargetOpenError,
  RulesError,
} from "./core/errors.js";
export type { FileEntry, FileStat, FileSystemView } from "./fs/view.js";
export { walk } from "./fs/walk.js";
export { MountedFileSystem, type Mount } from "./fs/mounted.js";
export { InMemoryFileSystem, type MemoryNode } from "./fs/memory.js";
export { openTarget, type TargetManifest } from "./target/open.js";
export { assessFirmware, parseFirmwareVersion, type FirmwareVersion } from "./target/firmware.js";
export { loadRules, bundledRules, type IocRules } from "./iocs/index.js";
export { CHECK_REGISTRY, checkWebshells, checkTimestomps, checkCronjobs, checkSuidBinaries, parseCrontab } from "./checks/index.js";
