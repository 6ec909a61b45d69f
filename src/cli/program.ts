import { Command } from "commander";
import chalk from "chalk";
import {
  ALL_CHECKS,
  OUTPUT_FORMATS,
  VERSION,
  type CheckName,
  type OutputFormat,
  type ScanResult,
} from "../core/models.js";
import { ScanContext } from "../core/context.js";
import { Scanner } from "../core/scanner.js";
import { errorMessage } from "../core/errors.js";
import { loadRules, type IocRules } from "../iocs/index.js";
import { openTarget } from "../target/open.js";
import { EXIT_TARGET_ERROR, formatResult, getExitCode } from "../index.js";
import { printBanner } from "./banner.js";
import { createProgressCallbacks, printCoverage } from "./display.js";

interface CliOptions {
  format: string;
  checks?: string;
  installTime?: string;
  timestompFullTree?: boolean;
  rules?: string;
  concurrency: string;
  banner: boolean;
  verbose?: boolean;
}

type Fail = (message: string) => never;

function parseFormat(value: string, fail: Fail): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    return fail(`Unknown format "${value}". Available: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return format;
}

function parseChecks(value: string | undefined, fail: Fail): CheckName[] {
  if (!value) return [...ALL_CHECKS];
  const requested = value.split(",").map((c) => c.trim()).filter((c) => c.length > 0);
  const checks: CheckName[] = [];
  const invalid: string[] = [];
  for (const name of requested) {
    const check = ALL_CHECKS.find((c) => c === name);
    if (!check) invalid.push(name);
    else if (!checks.includes(check)) checks.push(check);
  }
  if (invalid.length > 0) {
    return fail(`Unknown checks: ${invalid.join(", ")}. Available: ${ALL_CHECKS.join(", ")}`);
  }
  return checks;
}

function parseConcurrency(value: string, fail: Fail): number {
  const concurrency = Number(value);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    return fail(`--concurrency must be a positive integer, got "${value}"`);
  }
  return concurrency;
}

function parseInstallTime(value: string | undefined, fail: Fail): Date | undefined {
  if (value === undefined) return undefined;
  const installTime = new Date(value);
  if (Number.isNaN(installTime.getTime())) {
    return fail(`--install-time is not a valid date: "${value}"`);
  }
  return installTime;
}

function parseRules(path: string | undefined, fail: Fail): IocRules {
  try {
    return loadRules(path);
  } catch (err) {
    return fail(errorMessage(err));
  }
}

export function createProgram(): Command {
  const program: Command = new Command();
  const fail: Fail = (message) => program.error(message);

  program
    .name("ioc-triage")
    .description("Check acquired appliance filesystem images for indicators of compromise")
    .version(VERSION)
    .argument("<targets...>", "Extracted/mounted target directories or JSON volume manifests")
    .option("-f, --format <format>", `Output format: ${OUTPUT_FORMATS.join(", ")}`, "terminal")
    .option("-c, --checks <checks>", `Comma-separated list of checks to run (${ALL_CHECKS.join(", ")})`)
    .option("--install-time <iso>", "Appliance install time, for the timestomp check")
    .option("--timestomp-full-tree", "Run the timestomp check over the whole tree")
    .option("--rules <file>", "JSON file replacing sections of the bundled IOC rules")
    .option("--concurrency <n>", "Parallel subtree walkers for the SUID check", "1")
    .option("--no-banner", "Suppress the ASCII banner")
    .option("-v, --verbose", "List every input a check could not inspect")
    .action(async (targets: string[], opts: CliOptions) => {
      const format = parseFormat(opts.format, fail);
      const checks = parseChecks(opts.checks, fail);
      const concurrency = parseConcurrency(opts.concurrency, fail);
      const installTime = parseInstallTime(opts.installTime, fail);
      const rules = parseRules(opts.rules, fail);

      const isInteractive = format === "terminal" && process.stderr.isTTY === true;
      if (isInteractive && opts.banner) {
        printBanner(targets.length);
      }

      const scanner = new Scanner(rules);
      const results: ScanResult[] = [];
      let exitCode = 0;

      // Targets are independent; one that cannot be opened does not stop the rest
      for (const spec of targets) {
        let result: ScanResult;
        try {
          const target = await openTarget(spec);
          const ctx = new ScanContext({
            checks,
            installTime,
            timestompFullTree: opts.timestompFullTree,
            concurrency,
            callbacks: isInteractive ? createProgressCallbacks(checks.length) : {},
          });
          result = await scanner.run(target, ctx);
        } catch (err) {
          console.error(chalk.red(`[!] ${errorMessage(err)}`));
          exitCode = Math.max(exitCode, EXIT_TARGET_ERROR);
          continue;
        }

        printCoverage(result, opts.verbose === true);
        exitCode = Math.max(exitCode, getExitCode(result));
        results.push(result);

        if (format !== "json") {
          process.stdout.write(formatResult(result, format) + "\n");
        }
      }

      if (format === "json") {
        const rendered = results.map((r) => formatResult(r, "json"));
        process.stdout.write((rendered.length === 1 ? rendered[0] : `[\n${rendered.join(",\n")}\n]`) + "\n");
      } else if (format === "terminal") {
        console.log("All targets analyzed.");
      }

      process.exitCode = exitCode;
    });

  return program;
}
