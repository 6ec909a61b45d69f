import { ALL_CHECKS, type CheckName, type SkippedInput } from "./models.js";

export interface ScanCallbacks {
  onCheckStart?: (check: CheckName) => void;
  onCheckComplete?: (check: CheckName, durationMs: number, findings: number) => void;
  onSkip?: (check: CheckName, skip: SkippedInput) => void;
}

export class ScanContext {
  readonly checks: CheckName[];
  readonly installTime: Date | undefined;
  readonly timestompFullTree: boolean | undefined;
  readonly concurrency: number;
  readonly callbacks: ScanCallbacks;

  constructor(opts: {
    checks?: CheckName[];
    installTime?: Date;
    timestompFullTree?: boolean;
    concurrency?: number;
    callbacks?: ScanCallbacks;
  } = {}) {
    const selected = new Set(opts.checks ?? ALL_CHECKS);
    // Selection never changes the execution order
    this.checks = ALL_CHECKS.filter((c) => selected.has(c));
    this.installTime = opts.installTime;
    this.timestompFullTree = opts.timestompFullTree;
    this.concurrency = opts.concurrency ?? 1;
    this.callbacks = opts.callbacks ?? {};
  }
}
