import { readFileSync } from "node:fs";
import { z } from "zod";
import { errorMessage, RulesError } from "../core/errors.js";
import { normalizePath, parseMode } from "../fs/view.js";
import { parseFirmwareVersion } from "../target/firmware.js";
import cronjobTable from "./cronjob.json";
import firmwareTable from "./firmware.json";
import suidTable from "./suid.json";
import timestompTable from "./timestomp.json";
import webshellTable from "./webshell.json";

const TargetPath = z
  .string()
  .startsWith("/", "must be an absolute path inside the target")
  .transform(normalizePath);

const OctalMode = z
  .string()
  .regex(/^0?[0-7]{3,4}$/, 'must be an octal mode such as "0444"')
  .transform(parseMode);

const ConfidenceSchema = z.enum(["low", "medium", "high"]);

const WebshellRulesSchema = z.object({
  directories: z.array(TargetPath).min(1),
  fileClasses: z
    .array(
      z.object({
        name: z.string().min(1),
        extensions: z
          .array(z.string().startsWith("."))
          .min(1)
          .transform((exts) => exts.map((e) => e.toLowerCase())),
        expectedMode: OctalMode,
      }),
    )
    .min(1),
  maxContentBytes: z.number().int().positive(),
  signatures: z.array(z.string().min(1)).min(1),
});

const TimestompRulesSchema = z.object({
  directories: z.array(TargetPath).min(1),
  thresholdSeconds: z.number().positive(),
  fullTree: z.boolean().default(false),
});

const CronPatternSchema = z
  .object({
    name: z.string().min(1),
    pattern: z.string().min(1),
    confidence: ConfidenceSchema,
  })
  .transform((p, ctx) => {
    try {
      return { name: p.name, confidence: p.confidence, regex: new RegExp(p.pattern, "i") };
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid pattern: ${errorMessage(err)}` });
      return z.NEVER;
    }
  });

const CronjobRulesSchema = z.object({
  sources: z.array(
    z.object({
      path: TargetPath,
      kind: z.enum(["file", "directory"]),
      format: z.enum(["system", "user"]),
    }),
  ),
  maxFileBytes: z.number().int().positive(),
  suspiciousUsers: z.array(z.string().min(1)),
  patterns: z.array(CronPatternSchema),
});

const SuidRulesSchema = z.object({
  allowlist: z.array(TargetPath).transform((paths): ReadonlySet<string> => new Set(paths)),
});

const FirmwareVersionSchema = z.string().transform((s, ctx) => {
  const version = parseFirmwareVersion(s);
  if (!version) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a firmware version such as "13.1-49.13": ${s}` });
    return z.NEVER;
  }
  return version;
});

const FirmwareRulesSchema = z.object({
  fipsBuilds: z
    .array(z.string().regex(/^\d+\.\d+-\d+$/, 'must be a build such as "13.1-37"'))
    .transform((builds): ReadonlySet<string> => new Set(builds)),
  endOfLife: z.object({
    throughMajor: z.number().int().nonnegative(),
    branches: z.array(z.string().regex(/^\d+\.\d+$/, 'must be a branch such as "13.0"')),
  }),
  advisories: z.array(
    z.object({
      id: z.string().min(1),
      cves: z.array(z.string().regex(/^CVE-\d{4}-\d+$/)).min(1),
      fixedIn: z.array(FirmwareVersionSchema),
      fipsFixedIn: z.array(FirmwareVersionSchema).default([]),
    }),
  ),
});

const RulesFileSchema = z
  .object({
    webshell: WebshellRulesSchema.optional(),
    timestomp: TimestompRulesSchema.optional(),
    cronjob: CronjobRulesSchema.optional(),
    suid: SuidRulesSchema.optional(),
    firmware: FirmwareRulesSchema.optional(),
  })
  .strict();

export type WebshellRules = z.output<typeof WebshellRulesSchema>;
export type TimestompRules = z.output<typeof TimestompRulesSchema>;
export type CronjobRules = z.output<typeof CronjobRulesSchema>;
export type CronPattern = CronjobRules["patterns"][number];
export type CronSource = CronjobRules["sources"][number];
export type SuidRules = z.output<typeof SuidRulesSchema>;
export type FirmwareRules = z.output<typeof FirmwareRulesSchema>;
export type FirmwareAdvisory = FirmwareRules["advisories"][number];

export interface IocRules {
  readonly webshell: Readonly<WebshellRules>;
  readonly timestomp: Readonly<TimestompRules>;
  readonly cronjob: Readonly<CronjobRules>;
  readonly suid: Readonly<SuidRules>;
  readonly firmware: Readonly<FirmwareRules>;
}

function parseSection<S extends z.ZodTypeAny>(schema: S, data: unknown, source: string): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new RulesError(`Invalid rules in ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
}

let bundled: IocRules | undefined;

/** The rule tables shipped with the package, parsed once per process. */
export function bundledRules(): IocRules {
  bundled ??= Object.freeze({
    webshell: Object.freeze(parseSection(WebshellRulesSchema, webshellTable, "webshell.json")),
    timestomp: Object.freeze(parseSection(TimestompRulesSchema, timestompTable, "timestomp.json")),
    cronjob: Object.freeze(parseSection(CronjobRulesSchema, cronjobTable, "cronjob.json")),
    suid: Object.freeze(parseSection(SuidRulesSchema, suidTable, "suid.json")),
    firmware: Object.freeze(parseSection(FirmwareRulesSchema, firmwareTable, "firmware.json")),
  });
  return bundled;
}

/**
 * Bundled rules, with any top-level section present in `overridePath`
 * replacing the bundled one wholesale.
 */
export function loadRules(overridePath?: string): IocRules {
  const base = bundledRules();
  if (!overridePath) return base;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(overridePath, "utf-8"));
  } catch (err) {
    throw new RulesError(`Cannot load rules file ${overridePath}: ${errorMessage(err)}`, { cause: err });
  }

  const override = parseSection(RulesFileSchema, raw, overridePath);
  return Object.freeze({
    webshell: override.webshell ? Object.freeze(override.webshell) : base.webshell,
    timestomp: override.timestomp ? Object.freeze(override.timestomp) : base.timestomp,
    cronjob: override.cronjob ? Object.freeze(override.cronjob) : base.cronjob,
    suid: override.suid ? Object.freeze(override.suid) : base.suid,
    firmware: override.firmware ? Object.freeze(override.firmware) : base.firmware,
  });
}
