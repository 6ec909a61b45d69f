import type { FileSystemView } from "../fs/view.js";

export type Confidence = "low" | "medium" | "high";

export const CONFIDENCE_LEVELS: readonly Confidence[] = ["low", "medium", "high"];

export const confidenceRank: Record<Confidence, number> = {
  low: 1,
  medium: 2,
  high: 3,
};

export type FindingKind =
  | "php-file-permission"
  | "php-file-contents"
  | "timestomp"
  | "cronjob/suspicious"
  | "cronjob/user"
  | "binary/suid";

export type CheckName = "webshell" | "timestomp" | "cronjob" | "suid";

/** Fixed execution order of the checks. Report ordering depends on it. */
export const ALL_CHECKS: readonly CheckName[] = ["webshell", "timestomp", "cronjob", "suid"];

export interface Finding {
  readonly kind: FindingKind;
  readonly confidence: Confidence;
  readonly message: string;
  /** Absolute path inside the target filesystem. */
  readonly path: string;
  readonly check: CheckName;
  readonly details?: Readonly<Record<string, unknown>>;
}

export function createFinding(finding: Finding): Finding {
  return Object.freeze({
    ...finding,
    details: finding.details ? Object.freeze({ ...finding.details }) : undefined,
  });
}

export type SkipReason = "unavailable" | "unreadable" | "malformed";

export interface SkippedInput {
  path: string;
  reason: SkipReason;
  detail: string;
}

export interface CheckOutput {
  findings: Finding[];
  skipped: SkippedInput[];
}

export type Coverage = "full" | "reduced";

export interface CheckResult {
  check: CheckName;
  findings: Finding[];
  skipped: SkippedInput[];
  coverage: Coverage;
  durationMs: number;
  error?: string;
}

export type ApplianceLayout = "citrix-netscaler" | "unknown";

export interface VolumeInfo {
  mountPoint: string;
  source: string;
  present: boolean;
}

export interface TargetInfo {
  /** The spec the target was opened from (directory or manifest path). */
  spec: string;
  name: string;
  hostname: string | null;
  version: string | null;
  layout: ApplianceLayout;
  installTime: Date | null;
  volumes: VolumeInfo[];
}

/** An opened acquisition: the reconstructed tree plus what is known about it. */
export interface Target {
  info: TargetInfo;
  view: FileSystemView;
}

export type ScanStatus = "CLEAN" | "INFORMATIONAL" | "WARNINGS" | "IOCS_FOUND";

export interface ScanSummary {
  total: number;
  high: number;
  medium: number;
  low: number;
  status: ScanStatus;
  maxConfidence: Confidence | null;
  coverage: Coverage;
}

/** What the fingerprinted firmware version implies, independent of any finding. */
export interface FirmwareAssessment {
  version: string;
  fips: boolean;
  eol: boolean;
  /** CVE identifiers whose advisories cover this version. */
  vulnerableTo: string[];
}

export interface ScanResult {
  version: string;
  timestamp: string;
  target: TargetInfo;
  firmware: FirmwareAssessment | null;
  checks: CheckResult[];
  findings: Finding[];
  summary: ScanSummary;
  durationMs: number;
}

export type OutputFormat = "terminal" | "json" | "markdown";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "json", "markdown"];

export interface ScanOptions {
  checks?: CheckName[];
  /** Overrides the install time read from the target manifest. */
  installTime?: Date;
  timestompFullTree?: boolean;
  /** Path to a JSON file replacing sections of the bundled rule tables. */
  rulesPath?: string;
  /** Parallel subtree walkers for the SUID check. */
  concurrency?: number;
}

export const VERSION = "0.1.0";
