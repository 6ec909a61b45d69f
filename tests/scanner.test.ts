import { ScanContext } from '../src/core/context';
import type { CheckName, Target } from '../src/core/models';
import { Scanner } from '../src/core/scanner';
import { InMemoryFileSystem, type MemoryNode } from '../src/fs/memory';
import type { FileEntry, FileStat, FileSystemView } from '../src/fs/view';
import { scanView } from '../src';
import { cleanTree, INSTALL_TIME } from './fixtures';

function targetOf(view: FileSystemView): Target {
  return {
    view,
    info: {
      spec: 'fixture',
      name: 'fixture',
      hostname: null,
      version: null,
      layout: 'citrix-netscaler',
      installTime: null,
      volumes: [],
    },
  };
}

function scanTree(tree: Record<string, MemoryNode>, ctx?: ScanContext) {
  return new Scanner().run(targetOf(new InMemoryFileSystem(tree)), ctx);
}

/** Throws a plain error from exists() for one path. */
class FailingView implements FileSystemView {
  constructor(
    private readonly inner: FileSystemView,
    private readonly failPath: string,
  ) {}

  exists(path: string): Promise<boolean> {
    if (path === this.failPath) return Promise.reject(new Error('device error'));
    return this.inner.exists(path);
  }

  stat(path: string): Promise<FileStat> {
    return this.inner.stat(path);
  }

  list(path: string): Promise<FileEntry[]> {
    return this.inner.list(path);
  }

  read(path: string, maxBytes: number): Promise<Buffer> {
    return this.inner.read(path, maxBytes);
  }
}

describe('Scanner', () => {
  test('a clean target yields no findings', async () => {
    const result = await scanTree(cleanTree());

    expect(result.findings).toEqual([]);
    expect(result.checks.map((c) => [c.check, c.findings.length, c.coverage])).toEqual([
      ['webshell', 0, 'full'],
      ['timestomp', 0, 'full'],
      ['cronjob', 0, 'full'],
      ['suid', 0, 'full'],
    ]);
    expect(result.summary).toEqual({
      total: 0,
      high: 0,
      medium: 0,
      low: 0,
      status: 'CLEAN',
      maxConfidence: null,
      coverage: 'full',
    });
  });

  test('a webshell with loose permissions yields exactly two high findings', async () => {
    const result = await scanTree({
      ...cleanTree(),
      '/var/vpn/config.php': { mode: 0o644, content: '<?php array_filter($_GET, "system"); ?>' },
    });

    expect(result.findings.map((f) => [f.kind, f.confidence, f.path])).toEqual([
      ['php-file-permission', 'high', '/var/vpn/config.php'],
      ['php-file-contents', 'high', '/var/vpn/config.php'],
    ]);
    expect(result.summary.status).toBe('IOCS_FOUND');
    expect(result.summary.maxConfidence).toBe('high');
  });

  test('concatenates findings in the fixed check order', async () => {
    const result = await scanTree({
      ...cleanTree(),
      '/usr/libexec/helper': { mode: 0o4755 },
      '/var/cron/tabs/nobody': { content: '0 * * * * /usr/bin/true\n' },
      '/var/tmp/old': { mtime: new Date('2020-01-01T00:00:00Z'), ctime: new Date('2023-06-01T00:00:00Z') },
      '/var/netscaler/logon/x.php': { mode: 0o666 },
    });

    expect(result.findings.map((f) => f.kind)).toEqual([
      'php-file-permission',
      'timestomp',
      'cronjob/user',
      'binary/suid',
    ]);
    expect(result.summary).toMatchObject({ total: 4, high: 2, medium: 2, low: 0 });
  });

  test('runs selected checks in the fixed order regardless of how they were requested', async () => {
    const started: CheckName[] = [];
    const ctx = new ScanContext({
      checks: ['suid', 'webshell'],
      callbacks: { onCheckStart: (c) => started.push(c) },
    });
    const result = await scanTree(cleanTree(), ctx);

    expect(started).toEqual(['webshell', 'suid']);
    expect(result.checks.map((c) => c.check)).toEqual(['webshell', 'suid']);
  });

  test('a target without the volatile root volume still completes every check', async () => {
    const result = await scanTree({
      '/var/vpn/index.php': { mode: 0o444 },
      '/var/cron/tabs/root': { content: '0 3 * * * /usr/bin/true\n' },
    });

    expect(result.checks.map((c) => c.check)).toEqual(['webshell', 'timestomp', 'cronjob', 'suid']);
    expect(result.checks.every((c) => c.error === undefined)).toBe(true);
    expect(result.findings).toEqual([]);
  });

  test('an unsupported layout is contained in the affected checks', async () => {
    const result = await scanTree({ '/opt/evil': { mode: 0o4755 } });
    const byCheck = Object.fromEntries(result.checks.map((c) => [c.check, c]));

    expect(byCheck.webshell.error).toMatch(/^Unsupported layout for webshell check/);
    expect(byCheck.webshell.coverage).toBe('reduced');
    expect(byCheck.timestomp.error).toMatch(/^Unsupported layout for timestomp check/);
    expect(byCheck.cronjob.error).toBeUndefined();
    expect(result.findings.map((f) => f.path)).toEqual(['/opt/evil']);
    expect(result.summary.coverage).toBe('reduced');
  });

  test('a failing check does not stop the remaining checks', async () => {
    const view = new FailingView(
      new InMemoryFileSystem({ ...cleanTree(), '/opt/evil': { mode: 0o4755 } }),
      '/var/netscaler/logon',
    );
    const result = await new Scanner().run(targetOf(view));

    expect(result.checks[0]).toMatchObject({ check: 'webshell', error: 'device error', findings: [] });
    expect(result.checks[3].findings.map((f) => f.path)).toEqual(['/opt/evil']);
  });

  test('reports skipped inputs through the callback and marks coverage reduced', async () => {
    const skipped: string[] = [];
    const ctx = new ScanContext({
      checks: ['cronjob'],
      callbacks: { onSkip: (check, skip) => skipped.push(`${check}:${skip.reason}:${skip.path}`) },
    });
    const result = await scanTree({ ...cleanTree(), '/etc/cron.d/bad': { content: 'x y\n' } }, ctx);

    expect(skipped).toContain('cronjob:malformed:/etc/cron.d/bad');
    expect(result.checks[0].coverage).toBe('reduced');
  });

  test('uses the install time from the context', async () => {
    const tree = {
      ...cleanTree(),
      '/var/tmp/old': { mtime: new Date('2021-01-01T00:00:00Z'), ctime: new Date('2023-06-01T00:00:00Z') },
    };
    const ctx = new ScanContext({ checks: ['timestomp'], installTime: INSTALL_TIME });
    const result = await scanTree(tree, ctx);

    expect(result.target.installTime).toEqual(INSTALL_TIME);
    expect(result.findings.map((f) => f.confidence)).toEqual(['high']);
  });

  test('repeated runs over the same tree yield identical findings', async () => {
    const tree = {
      ...cleanTree(),
      '/var/vpn/config.php': { mode: 0o644, content: 'eval($_REQUEST[0]);' },
      '/a/x': { mode: 0o4755 },
      '/b/y': { mode: 0o4755 },
    };
    const view = new InMemoryFileSystem(tree);
    const first = await new Scanner().run(targetOf(view));
    const second = await new Scanner().run(targetOf(view), new ScanContext({ concurrency: 4 }));

    expect(second.findings).toEqual(first.findings);
  });

  test('scanView fingerprints the tree for the report header', async () => {
    const result = await scanView(new InMemoryFileSystem(cleanTree()), { name: 'gw01-image' });

    expect(result.target).toMatchObject({
      name: 'gw01-image',
      hostname: 'gw01',
      version: '13.1-49.13',
      layout: 'citrix-netscaler',
    });
  });
});
