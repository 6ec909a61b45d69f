import type { CheckName, CheckOutput, TargetInfo } from "../core/models.js";
import type { FileSystemView } from "../fs/view.js";
import type { IocRules } from "../iocs/index.js";
import type { SkipHandler } from "../fs/walk.js";

export interface CheckInput {
  rules: IocRules;
  target: TargetInfo;
  /** Called for every input the check could not inspect, as it happens. */
  onSkip?: SkipHandler;
  timestompFullTree?: boolean;
  concurrency?: number;
}

export interface Check {
  readonly name: CheckName;
  readonly label: string;
  run(view: FileSystemView, input: CheckInput): Promise<CheckOutput>;
}

/** Collects skipped inputs and forwards them to the caller's handler. */
export function skipCollector(output: CheckOutput, onSkip?: SkipHandler): SkipHandler {
  return (skip) => {
    output.skipped.push(skip);
    onSkip?.(skip);
  };
}

export function truncate(s: string, max: number): string {
  return s.length > max ? s.slice(0, max) + "..." : s;
}
