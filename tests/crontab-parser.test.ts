import { parseCrontab } from '../src/checks/crontab';
import { MalformedDefinitionError } from '../src/core/errors';

function parse(text: string, format: 'system' | 'user' = 'system') {
  return parseCrontab('/etc/crontab', Buffer.from(text), format);
}

describe('parseCrontab', () => {
  test('parses system entries with a user column', () => {
    const result = parse('# header\nMAILTO=""\n\n*/5 * * * * root /netscaler/nsfsyncd -p\n');
    expect(result.entries).toEqual([
      { line: 4, schedule: '*/5 * * * *', user: 'root', command: '/netscaler/nsfsyncd -p' },
    ]);
    expect(result.malformedLines).toEqual([]);
  });

  test('parses special schedules', () => {
    const result = parse('@reboot nsroot /bin/start-things --now\n');
    expect(result.entries).toEqual([
      { line: 1, schedule: '@reboot', user: 'nsroot', command: '/bin/start-things --now' },
    ]);
  });

  test('keeps the command verbatim in user crontabs', () => {
    const result = parse('0 3 * * mon-fri /usr/bin/x  --flag   y\n', 'user');
    expect(result.entries).toEqual([
      { line: 1, schedule: '0 3 * * mon-fri', user: null, command: '/usr/bin/x  --flag   y' },
    ]);
  });

  test('handles CRLF line endings', () => {
    const result = parse('1 2 3 4 5 /bin/true\r\n', 'user');
    expect(result.entries.map((e) => e.command)).toEqual(['/bin/true']);
  });

  test('reports lines that do not parse and keeps the rest', () => {
    const result = parse('this is not a cron line at all\n0 * * * * /bin/date\n* * * *\n', 'user');
    expect(result.entries.map((e) => e.line)).toEqual([2]);
    expect(result.malformedLines).toEqual([1, 3]);
  });

  test('an entry without a command is malformed', () => {
    const result = parse('0 * * * * root\n1 * * * * root /bin/ok\n');
    expect(result.malformedLines).toEqual([1]);
  });

  test('throws MalformedDefinitionError for binary content', () => {
    expect(() => parseCrontab('/var/cron/tabs/x', Buffer.from([0x2a, 0x00, 0x01]), 'user')).toThrow(
      MalformedDefinitionError,
    );
  });

  test('throws MalformedDefinitionError when no line parses', () => {
    expect(() => parse('garbage garbage\n', 'user')).toThrow('no parseable entries (lines 1)');
  });

  test('an empty or comment-only file has no entries', () => {
    expect(parse('# nothing here\n\n')).toEqual({ entries: [], malformedLines: [] });
  });
});
