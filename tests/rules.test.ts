import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RulesError } from '../src/core/errors';
import { bundledRules, loadRules } from '../src/iocs';

let tmpDir: string;

function rulesFile(name: string, content: unknown): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
  return file;
}

beforeAll(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ioc-triage-rules-'));
});

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('bundledRules', () => {
  test('parses the shipped tables', () => {
    const rules = bundledRules();

    expect(rules.webshell.directories).toEqual(['/var/netscaler/logon', '/var/vpn', '/var/netscaler/ns_gui']);
    expect(rules.webshell.fileClasses).toEqual([{ name: 'php', extensions: ['.php'], expectedMode: 0o444 }]);
    expect(rules.timestomp.thresholdSeconds).toBe(1209600);
    expect(rules.suid.allowlist.has('/netscaler/ping')).toBe(true);
    expect(rules.cronjob.patterns.map((p) => p.name)).toEqual([
      'download utility',
      'inline interpreter code',
      'interpreter running local script',
      'base64 payload',
      'temporary path',
      'ip address',
    ]);
  });

  test('is parsed once and frozen', () => {
    expect(bundledRules()).toBe(bundledRules());
    expect(Object.isFrozen(bundledRules().webshell)).toBe(true);
  });

  test('compiles cron patterns case-insensitively', () => {
    const download = bundledRules().cronjob.patterns[0];
    expect(download.regex.test('/usr/bin/WGET -q http://x')).toBe(true);
    expect(download.regex.test('/usr/bin/wgetrc-sync')).toBe(false);
  });
});

describe('loadRules', () => {
  test('returns the bundled rules without an override', () => {
    expect(loadRules()).toBe(bundledRules());
  });

  test('replaces only the sections present in the override', () => {
    const file = rulesFile('suid-only.json', { suid: { allowlist: ['/usr/local/bin/helper/'] } });
    const rules = loadRules(file);

    expect([...rules.suid.allowlist]).toEqual(['/usr/local/bin/helper']);
    expect(rules.webshell).toBe(bundledRules().webshell);
    expect(rules.cronjob).toBe(bundledRules().cronjob);
  });

  test('rejects invalid modes with the offending path', () => {
    const file = rulesFile('bad-mode.json', {
      webshell: {
        directories: ['/var/vpn'],
        fileClasses: [{ name: 'php', extensions: ['.php'], expectedMode: '0999' }],
        maxContentBytes: 2048,
        signatures: ['eval($_'],
      },
    });

    expect(() => loadRules(file)).toThrow(RulesError);
    expect(() => loadRules(file)).toThrow(`Invalid rules in ${file}: webshell.fileClasses.0.expectedMode: must be an octal mode such as "0444"`);
  });

  test('rejects patterns that do not compile', () => {
    const file = rulesFile('bad-pattern.json', {
      cronjob: {
        sources: [],
        maxFileBytes: 1024,
        suspiciousUsers: [],
        patterns: [{ name: 'broken', pattern: '(curl', confidence: 'high' }],
      },
    });

    expect(() => loadRules(file)).toThrow(/cronjob\.patterns\.0: invalid pattern/);
  });

  test('rejects advisories with incomplete fix versions', () => {
    const file = rulesFile('bad-firmware.json', {
      firmware: {
        fipsBuilds: [],
        endOfLife: { throughMajor: 12, branches: [] },
        advisories: [{ id: 'CTX000000', cves: ['CVE-2025-0001'], fixedIn: ['14.1'] }],
      },
    });

    expect(() => loadRules(file)).toThrow(
      /firmware\.advisories\.0\.fixedIn\.0: not a firmware version such as "13\.1-49\.13": 14\.1/,
    );
  });

  test('rejects unknown sections', () => {
    const file = rulesFile('unknown.json', { yara: {} });
    expect(() => loadRules(file)).toThrow(RulesError);
  });

  test('rejects unreadable files', () => {
    expect(() => loadRules(path.join(tmpDir, 'missing.json'))).toThrow(/^Cannot load rules file/);
  });
});
