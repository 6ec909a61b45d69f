import type { FirmwareAssessment } from "../core/models.js";
import type { FirmwareAdvisory, FirmwareRules } from "../iocs/index.js";

export interface FirmwareVersion {
  major: number;
  minor: number;
  build: number;
  patch: number;
}

/**
 * Parses "13.1-49.13" (or the "13.1-37-241" spelling some FIPS builds use).
 * Returns null for anything that does not carry all four numbers.
 */
export function parseFirmwareVersion(version: string): FirmwareVersion | null {
  const parts = version.trim().replace(/\./g, "-").split("-");
  if (parts.length !== 4 || !parts.every((p) => /^\d+$/.test(p))) return null;
  const [major, minor, build, patch] = parts.map(Number);
  return { major, minor, build, patch };
}

export function compareVersions(a: FirmwareVersion, b: FirmwareVersion): number {
  return a.major - b.major || a.minor - b.minor || a.build - b.build || a.patch - b.patch;
}

const branchOf = (v: FirmwareVersion): string => `${v.major}.${v.minor}`;
const fipsBuildOf = (v: FirmwareVersion): string => `${v.major}.${v.minor}-${v.build}`;

export function isFips(v: FirmwareVersion, rules: FirmwareRules): boolean {
  return rules.fipsBuilds.has(fipsBuildOf(v));
}

/** FIPS/NDcPP builds keep receiving fixes on otherwise retired branches. */
export function isEndOfLife(v: FirmwareVersion, rules: FirmwareRules): boolean {
  if (isFips(v, rules)) return false;
  return rules.endOfLife.branches.includes(branchOf(v)) || v.major <= rules.endOfLife.throughMajor;
}

export function isAffected(v: FirmwareVersion, advisory: FirmwareAdvisory, rules: FirmwareRules): boolean {
  if (isFips(v, rules)) {
    const fix = advisory.fipsFixedIn.find((f) => fipsBuildOf(f) === fipsBuildOf(v));
    // FIPS builds without a listed fix are outside the advisory
    return fix !== undefined && compareVersions(v, fix) < 0;
  }
  const fix =
    advisory.fixedIn.find((f) => branchOf(f) === branchOf(v)) ??
    advisory.fixedIn.find((f) => f.major === v.major);
  return fix ? compareVersions(v, fix) < 0 : isEndOfLife(v, rules);
}

/** Offline classification of the firmware version read from the image. */
export function assessFirmware(version: string | null, rules: FirmwareRules): FirmwareAssessment | null {
  if (version === null) return null;
  const parsed = parseFirmwareVersion(version);
  if (!parsed) return null;

  return {
    version,
    fips: isFips(parsed, rules),
    eol: isEndOfLife(parsed, rules),
    vulnerableTo: rules.advisories.filter((a) => isAffected(parsed, a, rules)).flatMap((a) => a.cves),
  };
}
