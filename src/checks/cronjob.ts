import { posix } from "node:path";
import { errorMessage, MalformedDefinitionError } from "../core/errors.js";
import { createFinding, type CheckOutput } from "../core/models.js";
import type { FileSystemView } from "../fs/view.js";
import type { SkipHandler } from "../fs/walk.js";
import type { CronjobRules, CronSource } from "../iocs/index.js";
import { skipCollector, truncate } from "./base.js";
import { parseCrontab, type CronEntry } from "./crontab.js";

const COMMAND_DISPLAY_LENGTH = 120;

interface DefinitionFile {
  path: string;
  format: CronSource["format"];
}

async function definitionFiles(
  view: FileSystemView,
  source: CronSource,
  skip: SkipHandler,
): Promise<DefinitionFile[]> {
  if (!(await view.exists(source.path))) {
    skip({ path: source.path, reason: "unavailable", detail: `no ${source.kind} in target` });
    return [];
  }

  try {
    if (source.kind === "file") {
      return [{ path: source.path, format: source.format }];
    }
    const files: DefinitionFile[] = [];
    for (const entry of await view.list(source.path)) {
      if (entry.stat === null) {
        skip({ path: entry.path, reason: "unreadable", detail: "metadata not readable" });
      } else if (entry.stat.type === "file") {
        files.push({ path: entry.path, format: source.format });
      }
    }
    return files;
  } catch (err) {
    skip({ path: source.path, reason: "unreadable", detail: errorMessage(err) });
    return [];
  }
}

/**
 * Parses the scheduled-task definitions of both volumes and flags entries
 * whose command or owner matches the suspicious-pattern table.
 */
export async function checkCronjobs(
  view: FileSystemView,
  rules: CronjobRules,
  onSkip?: SkipHandler,
): Promise<CheckOutput> {
  const output: CheckOutput = { findings: [], skipped: [] };
  const skip = skipCollector(output, onSkip);
  const seen = new Set<string>();
  const suspiciousUsers = new Set(rules.suspiciousUsers);

  for (const source of rules.sources) {
    for (const file of await definitionFiles(view, source, skip)) {
      if (seen.has(file.path)) continue;
      seen.add(file.path);

      let entries: CronEntry[];
      try {
        const content = await view.read(file.path, rules.maxFileBytes);
        const parsed = parseCrontab(file.path, content, file.format);
        if (parsed.malformedLines.length > 0) {
          skip({
            path: file.path,
            reason: "malformed",
            detail: `unparseable lines ${parsed.malformedLines.join(", ")}`,
          });
        }
        entries = parsed.entries;
      } catch (err) {
        skip({
          path: file.path,
          reason: err instanceof MalformedDefinitionError ? "malformed" : "unreadable",
          detail: errorMessage(err),
        });
        continue;
      }

      const owner = file.format === "user" ? posix.basename(file.path) : null;
      for (const entry of entries) {
        const user = entry.user ?? owner;
        const details = { line: entry.line, schedule: entry.schedule, user, command: entry.command };
        const shown = truncate(entry.command, COMMAND_DISPLAY_LENGTH);

        if (user !== null && suspiciousUsers.has(user)) {
          output.findings.push(
            createFinding({
              kind: "cronjob/user",
              confidence: "high",
              message: `Crontab entry by ${user} user observed: ${shown}`,
              path: file.path,
              check: "cronjob",
              details,
            }),
          );
        }

        for (const pattern of rules.patterns) {
          const match = pattern.regex.exec(entry.command);
          if (!match) continue;
          output.findings.push(
            createFinding({
              kind: "cronjob/suspicious",
              confidence: pattern.confidence,
              message: `${pattern.name} in crontab command (${match[0]}): ${shown}`,
              path: file.path,
              check: "cronjob",
              details: { ...details, pattern: pattern.name, match: match[0] },
            }),
          );
        }
      }
    }
  }

  return output;
}
