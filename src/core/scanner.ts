import {
  confidenceRank,
  VERSION,
  type CheckResult,
  type Confidence,
  type Finding,
  type ScanResult,
  type ScanSummary,
  type SkippedInput,
  type Target,
} from "./models.js";
import { ScanContext } from "./context.js";
import { errorMessage } from "./errors.js";
import { CHECK_REGISTRY } from "../checks/index.js";
import { bundledRules, type IocRules } from "../iocs/index.js";
import { assessFirmware } from "../target/firmware.js";

export class Scanner {
  private readonly rules: IocRules;

  constructor(rules: IocRules = bundledRules()) {
    this.rules = rules;
  }

  /**
   * Runs the selected checks one after another in their fixed order. A check
   * that throws contributes no findings and is marked as reduced coverage;
   * the remaining checks still run.
   */
  async run(target: Target, ctx: ScanContext = new ScanContext()): Promise<ScanResult> {
    const startTime = Date.now();
    const info = ctx.installTime ? { ...target.info, installTime: ctx.installTime } : target.info;
    const checkResults: CheckResult[] = [];
    const allFindings: Finding[] = [];

    for (const checkName of ctx.checks) {
      ctx.callbacks.onCheckStart?.(checkName);

      const checkStart = Date.now();
      let findings: Finding[] = [];
      let skipped: SkippedInput[] = [];
      let error: string | undefined;

      try {
        const output = await CHECK_REGISTRY[checkName].run(target.view, {
          rules: this.rules,
          target: info,
          onSkip: (skip) => ctx.callbacks.onSkip?.(checkName, skip),
          timestompFullTree: ctx.timestompFullTree,
          concurrency: ctx.concurrency,
        });
        findings = output.findings;
        skipped = output.skipped;
      } catch (err) {
        error = errorMessage(err);
      }

      const durationMs = Date.now() - checkStart;
      ctx.callbacks.onCheckComplete?.(checkName, durationMs, findings.length);

      const reduced = error !== undefined || skipped.some((s) => s.reason !== "unavailable");
      checkResults.push({
        check: checkName,
        findings,
        skipped,
        coverage: reduced ? "reduced" : "full",
        durationMs,
        error,
      });

      allFindings.push(...findings);
    }

    return {
      version: VERSION,
      timestamp: new Date().toISOString(),
      target: info,
      firmware: assessFirmware(info.version, this.rules.firmware),
      checks: checkResults,
      findings: allFindings,
      summary: buildSummary(allFindings, checkResults),
      durationMs: Date.now() - startTime,
    };
  }
}

export function buildSummary(findings: Finding[], checks: CheckResult[]): ScanSummary {
  const counts = { high: 0, medium: 0, low: 0 };
  let maxConfidence: Confidence | null = null;

  for (const f of findings) {
    counts[f.confidence]++;
    if (maxConfidence === null || confidenceRank[f.confidence] > confidenceRank[maxConfidence]) {
      maxConfidence = f.confidence;
    }
  }

  let status: ScanSummary["status"];
  if (counts.high > 0) status = "IOCS_FOUND";
  else if (counts.medium > 0) status = "WARNINGS";
  else if (counts.low > 0) status = "INFORMATIONAL";
  else status = "CLEAN";

  return {
    total: findings.length,
    ...counts,
    status,
    maxConfidence,
    coverage: checks.some((c) => c.coverage === "reduced") ? "reduced" : "full",
  };
}
