import ora from "ora";
import chalk from "chalk";
import type { CheckName, ScanResult } from "../core/models.js";
import type { ScanCallbacks } from "../core/context.js";
import { CHECK_REGISTRY } from "../checks/index.js";
import { CHECK_TITLES } from "../report/terminal.js";

export function createProgressCallbacks(totalChecks: number): ScanCallbacks {
  let spinner: ora.Ora | null = null;
  let completedCount = 0;
  let skippedCount = 0;

  const text = (check: CheckName): string =>
    chalk.dim(`[${completedCount + 1}/${totalChecks}] `) +
    CHECK_REGISTRY[check].label +
    (skippedCount > 0 ? chalk.dim(` (${skippedCount} skipped)`) : "");

  return {
    onCheckStart(check) {
      skippedCount = 0;
      spinner = ora({ text: text(check), stream: process.stderr }).start();
    },
    onSkip(check, skip) {
      if (skip.reason === "unavailable") return;
      skippedCount++;
      if (spinner) spinner.text = text(check);
    },
    onCheckComplete(check, durationMs, findings) {
      completedCount++;
      if (spinner) {
        const label = `${CHECK_REGISTRY[check].label} ${chalk.dim(`(${findings} findings, ${durationMs}ms)`)}`;
        if (findings > 0) spinner.warn(label);
        else spinner.succeed(label);
        spinner = null;
      }
    },
  };
}

/** Reduced-coverage notices on stderr; with `verbose`, every skipped input. */
export function printCoverage(result: ScanResult, verbose: boolean): void {
  for (const check of result.checks) {
    const title = CHECK_TITLES[check.check];
    if (check.error) {
      console.error(chalk.yellow(`[!] ${result.target.name}: ${title} check failed: ${check.error}`));
    } else if (check.coverage === "reduced") {
      const count = check.skipped.filter((s) => s.reason !== "unavailable").length;
      console.error(chalk.yellow(`[!] ${result.target.name}: ${title} coverage reduced (${count} inputs skipped)`));
    }
    if (!verbose) continue;
    for (const s of check.skipped) {
      console.error(chalk.dim(`    ${check.check}: ${s.reason} ${s.path}: ${s.detail}`));
    }
  }
}
