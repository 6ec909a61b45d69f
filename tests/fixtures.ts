import type { MemoryNode } from '../src/fs/memory';

export const BUILD_TIME = new Date('2023-01-10T08:00:00Z');
export const INSTALL_TIME = new Date('2023-03-01T00:00:00Z');

const stable = { mtime: BUILD_TIME, ctime: BUILD_TIME };

/** A NetScaler-like tree without any indicator. */
export function cleanTree(): Record<string, MemoryNode> {
  return {
    '/flash/nsconfig/ns.conf': { content: '#NS13.1 Build 49.13\nset ns hostName gw01\n' },
    '/netscaler/ping': { mode: 0o4555, content: 'ELF' },
    '/netscaler/nsfsyncd': { mode: 0o555, content: 'ELF' },
    '/usr/bin/passwd': { mode: 0o4555, content: 'ELF' },
    '/bin/sh': { mode: 0o555, content: 'ELF' },
    '/dev/null': { type: 'other', mode: 0o666 },
    '/etc/crontab': {
      content:
        'SHELL=/bin/sh\n' +
        '# system crontab\n' +
        '*/5 * * * * root /netscaler/nsfsyncd -p\n' +
        '@reboot root /usr/sbin/newsyslog\n',
    },
    '/var/cron/tabs/root': { content: '0 3 * * * /usr/bin/bzip2 -9 /var/nslog/oldlog\n' },
    '/var/netscaler/logon/index.php': { mode: 0o444, content: "<?php include 'header.php'; ?>", ...stable },
    '/var/netscaler/logon/LogonPoint/index.html': { mode: 0o644, content: '<html></html>', ...stable },
    '/var/vpn/index.php': { mode: 0o444, content: '<?php echo "vpn"; ?>', ...stable },
    '/var/netscaler/ns_gui/admin_ui/php/index.php': { mode: 0o444, content: '<?php require "app.php"; ?>', ...stable },
    '/var/tmp/ns_upgrade.log': { mode: 0o644, content: 'ok', ...stable },
  };
}
