import chalk from "chalk";
import type {
  CheckName,
  Confidence,
  Finding,
  FirmwareAssessment,
  ScanResult,
  ScanStatus,
} from "../core/models.js";
import { renderTable } from "./table.js";

const confidenceColor: Record<Confidence, (s: string) => string> = {
  high: chalk.red.bold,
  medium: chalk.yellow.bold,
  low: chalk.blue,
};

const statusColor: Record<ScanStatus, (s: string) => string> = {
  IOCS_FOUND: chalk.bgRed.white.bold,
  WARNINGS: chalk.yellow.bold,
  INFORMATIONAL: chalk.blue,
  CLEAN: chalk.green.bold,
};

export const CHECK_TITLES: Record<CheckName, string> = {
  webshell: "Webshells",
  timestomp: "Timestomped files",
  cronjob: "Suspicious cronjobs",
  suid: "SUID binaries",
};

export const FINDING_HEADERS = ["Confidence", "Type", "Alert", "Artefact Location"];

export function findingRow(f: Finding): string[] {
  return [f.confidence, f.kind, f.message, f.path];
}

function findingTable(findings: Finding[]): string[] {
  return renderTable(FINDING_HEADERS, findings.map(findingRow), (cell, row, col) =>
    col === 0 ? confidenceColor[findings[row].confidence](cell) : cell,
  );
}

export function describeFirmware(f: FirmwareAssessment): string {
  const flags = [f.fips ? "FIPS" : null, f.eol ? "end of life" : null].filter((x) => x !== null);
  const vulns = f.vulnerableTo.length > 0 ? f.vulnerableTo.join(", ") : "none known";
  return `${f.version}${flags.length > 0 ? ` (${flags.join(", ")})` : ""}, vulnerable to: ${vulns}`;
}

export function renderTerminal(result: ScanResult): string {
  const lines: string[] = [];
  const { target } = result;

  lines.push("");
  lines.push(chalk.bold(`IOC triage of ${target.name} — ${new Date(result.timestamp).toUTCString()}`));
  lines.push(
    chalk.dim(
      `Host: ${target.hostname ?? "unknown"} | Version: ${target.version ?? "unknown"} | Layout: ${target.layout}`,
    ),
  );
  if (result.firmware) {
    const exposed = result.firmware.eol || result.firmware.vulnerableTo.length > 0;
    lines.push((exposed ? chalk.red : chalk.dim)(`Firmware: ${describeFirmware(result.firmware)}`));
  }
  lines.push(
    chalk.dim(
      `Install time: ${target.installTime ? target.installTime.toISOString() : "unknown"} | Volumes: ` +
        target.volumes.map((v) => `${v.mountPoint} (${v.present ? "present" : "missing"})`).join(", "),
    ),
  );
  lines.push(chalk.dim(`Scan duration: ${(result.durationMs / 1000).toFixed(1)}s`));

  for (const check of result.checks) {
    lines.push("");
    lines.push(chalk.bold(`*** ${CHECK_TITLES[check.check]} ***`));
    if (check.findings.length === 0) {
      lines.push(chalk.green("  No findings."));
    } else {
      lines.push(...findingTable(check.findings).map((l) => `  ${l}`));
    }
    if (check.error) {
      lines.push(chalk.yellow(`  Check failed, coverage reduced: ${check.error}`));
    } else if (check.coverage === "reduced") {
      const count = check.skipped.filter((s) => s.reason !== "unavailable").length;
      lines.push(chalk.yellow(`  Coverage reduced: ${count} input(s) could not be inspected`));
    }
  }

  lines.push("");
  if (result.findings.length > 0) {
    lines.push(chalk.red.bold("There were findings for Indicators of Compromise."));
    lines.push(chalk.red("Please consider performing further forensic investigation of the system."));
    lines.push("");
  }

  const { summary } = result;
  const parts: string[] = [];
  if (summary.high > 0) parts.push(chalk.red(`${summary.high} high`));
  if (summary.medium > 0) parts.push(chalk.yellow(`${summary.medium} medium`));
  if (summary.low > 0) parts.push(chalk.blue(`${summary.low} low`));

  lines.push(
    `Status: ${statusColor[summary.status](summary.status)}` +
      (parts.length > 0 ? ` — ${parts.join(", ")}` : "") +
      (summary.coverage === "reduced" ? chalk.yellow(" (reduced coverage)") : ""),
  );
  lines.push("");
  return lines.join("\n");
}
