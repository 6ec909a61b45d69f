import type { CheckName } from "../core/models.js";
import type { Check } from "./base.js";
import { checkCronjobs } from "./cronjob.js";
import { checkSuidBinaries } from "./suid.js";
import { checkTimestomps } from "./timestomp.js";
import { checkWebshells } from "./webshell.js";

export const CHECK_REGISTRY: Record<CheckName, Check> = {
  webshell: {
    name: "webshell",
    label: "Checking for webshells",
    run: (view, input) => checkWebshells(view, input.rules.webshell, input.onSkip),
  },
  timestomp: {
    name: "timestomp",
    label: "Checking for timestomped files",
    run: (view, input) =>
      checkTimestomps(
        view,
        input.rules.timestomp,
        { installTime: input.target.installTime, fullTree: input.timestompFullTree },
        input.onSkip,
      ),
  },
  cronjob: {
    name: "cronjob",
    label: "Checking for suspicious cronjobs",
    run: (view, input) => checkCronjobs(view, input.rules.cronjob, input.onSkip),
  },
  suid: {
    name: "suid",
    label: "Checking for SUID binaries (this takes a while)",
    run: (view, input) =>
      checkSuidBinaries(view, input.rules.suid, { concurrency: input.concurrency }, input.onSkip),
  },
};

export { checkCronjobs } from "./cronjob.js";
export { checkSuidBinaries, type SuidOptions } from "./suid.js";
export { checkTimestomps, evaluateTimestamps, type TimestompContext } from "./timestomp.js";
export { checkWebshells } from "./webshell.js";
export { parseCrontab, type CronEntry, type CrontabFormat, type ParsedCrontab } from "./crontab.js";
export type { Check, CheckInput } from "./base.js";
