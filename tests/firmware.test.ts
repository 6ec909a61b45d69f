import { assessFirmware, isAffected, isEndOfLife, isFips, parseFirmwareVersion, type FirmwareVersion } from '../src/target/firmware';
import { InMemoryFileSystem } from '../src/fs/memory';
import { bundledRules } from '../src/iocs';
import { scanView } from '../src';
import { cleanTree } from './fixtures';

const rules = bundledRules().firmware;

function v(version: string): FirmwareVersion {
  const parsed = parseFirmwareVersion(version);
  if (!parsed) throw new Error(`unparseable test version ${version}`);
  return parsed;
}

function affectedBy(id: string, version: string): boolean {
  const advisory = rules.advisories.find((a) => a.id === id);
  if (!advisory) throw new Error(`no advisory ${id}`);
  return isAffected(v(version), advisory, rules);
}

describe('parseFirmwareVersion', () => {
  test('reads both spellings of a version', () => {
    expect(parseFirmwareVersion('12.1-55.328')).toEqual({ major: 12, minor: 1, build: 55, patch: 328 });
    expect(parseFirmwareVersion('13.1-37-241')).toEqual({ major: 13, minor: 1, build: 37, patch: 241 });
  });

  test('rejects incomplete versions', () => {
    expect(parseFirmwareVersion('unknown')).toBeNull();
    expect(parseFirmwareVersion('13.1-49')).toBeNull();
    expect(parseFirmwareVersion('')).toBeNull();
  });
});

describe('isFips', () => {
  test('recognises the FIPS/NDcPP builds', () => {
    expect(isFips(v('13.1-37-241'), rules)).toBe(true);
    expect(isFips(v('13.1-9.60'), rules)).toBe(false);
    expect(isFips(v('12.1-55-12345'), rules)).toBe(true);
    expect(isFips(v('12.1-62.27'), rules)).toBe(false);
  });
});

describe('isEndOfLife', () => {
  test.each([
    ['12.1-55.328', false],
    ['13.1-37.241', false],
    ['13.0-0.0', true],
    ['11.1-65.20', true],
    ['12.1-50.28', true],
    ['14.1-47.48', false],
  ])('%s -> %s', (version, expected) => {
    expect(isEndOfLife(v(version), rules)).toBe(expected);
  });
});

describe('isAffected', () => {
  test.each([
    ['13.1-37-234', true],
    ['13.1-37-235', false],
    ['14.1-43.56', false],
    ['14.1-43.55', true],
    ['13.1-58.32', false],
    ['13.1-58.31', true],
    ['12.1-55.328', false],
    ['12.1-55.320', true],
    ['12.1-50.28', true],
  ])('CTX693420 %s -> %s', (version, expected) => {
    expect(affectedBy('CTX693420', version)).toBe(expected);
  });

  test.each([
    ['14.1-47.46', false],
    ['14.1-47.45', true],
    ['13.1-59.19', false],
    ['13.1-59.18', true],
    ['13.1-37.236', false],
    ['13.1-37.235', true],
    ['12.1-55.132', false],
    ['12.1-55.328', false],
    ['12.1-55.327', false],
  ])('CTX694788 %s -> %s', (version, expected) => {
    expect(affectedBy('CTX694788', version)).toBe(expected);
  });

  test.each([
    ['14.1-47.48', false],
    ['14.1-47.47', true],
    ['13.1-59.22', false],
    ['13.1-59.21', true],
    ['13.1-37.241', false],
    ['13.1-37.240', true],
    ['12.1-55.330', false],
    ['12.1-55.329', true],
  ])('CTX694938 %s -> %s', (version, expected) => {
    expect(affectedBy('CTX694938', version)).toBe(expected);
  });

  test('the 13.0 branch takes the 13.1 fix line', () => {
    expect(affectedBy('CTX694938', '13.0-92.21')).toBe(true);
  });
});

describe('assessFirmware', () => {
  test('lists the CVEs of every advisory covering the version', () => {
    expect(assessFirmware('14.1-47.47', rules)).toEqual({
      version: '14.1-47.47',
      fips: false,
      eol: false,
      vulnerableTo: ['CVE-2025-7775', 'CVE-2025-7776', 'CVE-2025-8424'],
    });
    expect(assessFirmware('14.1-47.48', rules)?.vulnerableTo).toEqual([]);
  });

  test('marks FIPS builds', () => {
    expect(assessFirmware('12.1-55.329', rules)).toEqual({
      version: '12.1-55.329',
      fips: true,
      eol: false,
      vulnerableTo: ['CVE-2025-7775', 'CVE-2025-7776', 'CVE-2025-8424'],
    });
  });

  test('unknown versions are not assessed', () => {
    expect(assessFirmware(null, rules)).toBeNull();
    expect(assessFirmware('13.1-49', rules)).toBeNull();
  });

  test('is part of every scan result', async () => {
    const result = await scanView(new InMemoryFileSystem(cleanTree()));
    expect(result.firmware).toEqual({
      version: '13.1-49.13',
      fips: false,
      eol: false,
      vulnerableTo: ['CVE-2025-5349', 'CVE-2025-5777', 'CVE-2025-6543', 'CVE-2025-7775', 'CVE-2025-7776', 'CVE-2025-8424'],
    });
  });
});
