import { errorMessage, UnsupportedLayoutError } from "../core/errors.js";
import { createFinding, type CheckOutput } from "../core/models.js";
import { formatMode, PERMISSION_BITS, type FileSystemView } from "../fs/view.js";
import { walk, type SkipHandler } from "../fs/walk.js";
import type { WebshellRules } from "../iocs/index.js";
import { skipCollector, truncate } from "./base.js";

const SIGNATURE_DISPLAY_LENGTH = 64;

type FileClass = WebshellRules["fileClasses"][number];

function classify(name: string, rules: WebshellRules): FileClass | undefined {
  const lower = name.toLowerCase();
  return rules.fileClasses.find((c) => c.extensions.some((ext) => lower.endsWith(ext)));
}

/**
 * Scans the web-facing portal directories for script files whose permissions
 * deviate from the firmware baseline or whose contents carry known injected
 * webshell code.
 */
export async function checkWebshells(
  view: FileSystemView,
  rules: WebshellRules,
  onSkip?: SkipHandler,
): Promise<CheckOutput> {
  const output: CheckOutput = { findings: [], skipped: [] };
  const skip = skipCollector(output, onSkip);
  let scanned = 0;

  for (const dir of rules.directories) {
    if (!(await view.exists(dir))) {
      skip({ path: dir, reason: "unavailable", detail: "directory not present in target" });
      continue;
    }
    scanned++;

    for await (const entry of walk(view, dir, skip)) {
      if (entry.stat === null) {
        skip({ path: entry.path, reason: "unreadable", detail: "metadata not readable" });
        continue;
      }
      if (entry.stat.type !== "file") continue;

      const fileClass = classify(entry.name, rules);
      if (!fileClass) continue;

      const permissions = entry.stat.mode & PERMISSION_BITS;
      if (permissions !== fileClass.expectedMode) {
        output.findings.push(
          createFinding({
            kind: "php-file-permission",
            confidence: "high",
            message: `Suspicious ${fileClass.name} permission ${formatMode(permissions)}`,
            path: entry.path,
            check: "webshell",
            details: {
              mode: formatMode(permissions),
              expectedMode: formatMode(fileClass.expectedMode),
            },
          }),
        );
      }

      // Injected webshells are small; large portal files legitimately use the same calls
      if (entry.stat.size > rules.maxContentBytes) continue;

      let content: string;
      try {
        const bytes = await view.read(entry.path, rules.maxContentBytes);
        content = bytes.toString("latin1").toLowerCase();
      } catch (err) {
        skip({ path: entry.path, reason: "unreadable", detail: errorMessage(err) });
        continue;
      }

      for (const signature of rules.signatures) {
        if (!content.includes(signature.toLowerCase())) continue;
        output.findings.push(
          createFinding({
            kind: "php-file-contents",
            confidence: "high",
            message: `Suspicious PHP code '${truncate(signature, SIGNATURE_DISPLAY_LENGTH)}'`,
            path: entry.path,
            check: "webshell",
            details: { signature },
          }),
        );
      }
    }
  }

  if (scanned === 0) {
    throw new UnsupportedLayoutError("webshell", rules.directories);
  }
  return output;
}
