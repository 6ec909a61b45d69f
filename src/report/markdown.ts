import type { ScanResult } from "../core/models.js";
import { CHECK_TITLES, describeFirmware, FINDING_HEADERS, findingRow } from "./terminal.js";

function escapeCell(cell: string): string {
  return cell.replace(/\\/g, "\\\\").replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function renderMarkdown(result: ScanResult): string {
  const { target, summary } = result;
  const lines: string[] = [];

  lines.push(`# IOC triage: ${target.name}`);
  lines.push("");
  lines.push(`- Scanned: ${result.timestamp}`);
  lines.push(`- Host: ${target.hostname ?? "unknown"}`);
  lines.push(`- Version: ${target.version ?? "unknown"}`);
  lines.push(`- Layout: ${target.layout}`);
  lines.push(`- Firmware: ${result.firmware ? describeFirmware(result.firmware) : "unknown"}`);
  lines.push(`- Install time: ${target.installTime ? target.installTime.toISOString() : "unknown"}`);
  lines.push(
    `- Volumes: ${target.volumes.map((v) => `\`${v.mountPoint}\` (${v.present ? "present" : "missing"})`).join(", ")}`,
  );
  lines.push(`- Status: **${summary.status}** (${summary.total} findings, coverage ${summary.coverage})`);

  for (const check of result.checks) {
    lines.push("");
    lines.push(`## ${CHECK_TITLES[check.check]}`);
    lines.push("");
    if (check.findings.length === 0) {
      lines.push("No findings.");
    } else {
      lines.push(`| ${FINDING_HEADERS.join(" | ")} |`);
      lines.push(`| ${FINDING_HEADERS.map(() => "---").join(" | ")} |`);
      for (const f of check.findings) {
        lines.push(`| ${findingRow(f).map(escapeCell).join(" | ")} |`);
      }
    }
    if (check.error) {
      lines.push("");
      lines.push(`> Check failed, coverage reduced: ${escapeCell(check.error)}`);
    }
  }

  return lines.join("\n") + "\n";
}
