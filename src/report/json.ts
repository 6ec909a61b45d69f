import type { ScanResult } from "../core/models.js";

export function renderJSON(result: ScanResult): string {
  return JSON.stringify(
    {
      ...result,
      target: {
        ...result.target,
        installTime: result.target.installTime?.toISOString() ?? null,
      },
    },
    null,
    2,
  );
}
